import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { probeConnection } from './probe';
import { AuthHook } from '../auth/hook';
import { buildLedger } from '../auth/ledger';
import { Broker } from '../server/broker';
import { TcpListener } from '../server/listeners';
import { fakeLogger } from '../testing/logger';

describe('probeConnection', () => {
  let broker: Broker;
  let url: string;

  beforeEach(async () => {
    broker = new Broker({ logger: fakeLogger() });
    broker.addHook(new AuthHook(buildLedger('device01:\n  password: device-password\n')));
    const listener = new TcpListener({ id: 'mqtt', address: '127.0.0.1:0' });
    await broker.addListener(listener);
    broker.serve();
    url = `mqtt://${listener.address()}`;
  });

  afterEach(async () => {
    await broker.close();
  });

  it('reports a successful connection', async () => {
    const result = await probeConnection({ url, username: 'device01', password: 'device-password', timeout: 2_000 });
    expect(result.connected).toBe(true);
    expect(result.error).toBeUndefined();
    expect(result.elapsedMs).toBeGreaterThanOrEqual(0);
  });

  it('reports refused credentials', async () => {
    const result = await probeConnection({ url, username: 'device01', password: 'wrong', timeout: 2_000 });
    expect(result.connected).toBe(false);
    expect(result.error).toEqual(expect.any(String));
  });

  it('reports a broker that is gone', async () => {
    await broker.close();
    const result = await probeConnection({ url, username: 'device01', password: 'device-password', timeout: 2_000 });
    expect(result.connected).toBe(false);
    expect(result.error).toEqual(expect.any(String));
  });
});
