import { describe, expect, it } from 'vitest';
import { connectionTable, SessionRegistry } from './registry';
import { formatUptime, renderConnections } from './render';

describe('formatUptime', () => {
  it('omits leading zero units', () => {
    expect(formatUptime(0)).toBe('0s');
    expect(formatUptime(59)).toBe('59s');
    expect(formatUptime(61)).toBe('1m 1s');
    expect(formatUptime(3_600)).toBe('1h 0m 0s');
    expect(formatUptime(90_061)).toBe('1d 1h 1m 1s');
  });
});

describe('renderConnections', () => {
  it('escapes client supplied values', async () => {
    const registry = new SessionRegistry();
    registry.open({ clientId: '<b>id</b>', username: 'u&v', remote: '', listener: 'mqtt', protocolVersion: 4 });
    const page = String(
      await renderConnections({
        time: 'now',
        uptime: '5s',
        listeners: 'mqtt: :1883',
        table: connectionTable(registry.all()),
      }),
    );
    expect(page).toContain('<td>u&amp;v</td>');
    expect(page).toContain('<td>&lt;b&gt;id&lt;/b&gt;</td>');
    expect(page).toContain('<h3>Listeners:</h3><a>mqtt: :1883</a>');
  });
});
