import { describe, expect, it } from 'vitest';
import { AllowHook, AuthHook } from './hook';
import { buildLedger } from './ledger';
import { InitError } from '../models/errors';

describe('AuthHook', () => {
  const ledger = buildLedger('device01:\n  password: device-password\n  acl:\n    up/+/device01/#: 2\n');
  const hook = new AuthHook(ledger);

  it('authenticates against the ledger', async () => {
    expect(await hook.onConnectAuthenticate({ username: 'device01', password: 'device-password' })).toBe(true);
    expect(await hook.onConnectAuthenticate({ username: 'device01', password: 'other' })).toBe(false);
  });

  it('answers acl checks from the ledger', () => {
    expect(hook.onAclCheck({ username: 'device01' }, 'up/gw/device01/state', 'publish')).toBe(true);
    expect(hook.onAclCheck({ username: 'device01' }, 'up/gw/device01/state', 'subscribe')).toBe(false);
    expect(hook.onAclCheck({ username: 'device01' }, 'up/gw/device02/state', 'publish')).toBe(false);
  });

  it('refuses a ledger without a user map', () => {
    const notAMap = { users: { get: () => undefined, has: () => false }, auth: [], acl: [] };
    expect(() => Reflect.construct(AuthHook, [notAMap])).toThrow(InitError);
  });
});

describe('AllowHook', () => {
  it('lets everything through', async () => {
    const hook = new AllowHook();
    expect(await hook.onConnectAuthenticate()).toBe(true);
    expect(hook.onAclCheck()).toBe(true);
  });
});
