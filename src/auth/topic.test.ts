import { describe, expect, it } from 'vitest';
import { covers, matches, shadowedRules, validateFilter } from './topic';
import { ConfigError } from '../models/errors';
import { PermissionLevel } from '../models/type';

describe('matches', () => {
  it('lets + stand for exactly one segment', () => {
    expect(matches('sensor/+/temp', 'sensor/23/temp')).toBe(true);
    expect(matches('sensor/+/temp', 'sensor/23/24/temp')).toBe(false);
    expect(matches('sensor/+/temp', 'sensor/temp')).toBe(false);
    expect(matches('a/+', 'a/')).toBe(true);
    expect(matches('a/+', 'a')).toBe(false);
  });

  it('lets # stand for zero or more trailing segments', () => {
    expect(matches('a/#', 'a')).toBe(true);
    expect(matches('a/#', 'a/b')).toBe(true);
    expect(matches('a/#', 'a/b/c/d')).toBe(true);
    expect(matches('a/#', 'b/a')).toBe(false);
    expect(matches('#', 'anything/at/all')).toBe(true);
  });

  it('compares whole segments, case-sensitively', () => {
    expect(matches('sensor/temp', 'sensor/temp')).toBe(true);
    expect(matches('Sensor/temp', 'sensor/temp')).toBe(false);
    expect(matches('sens/temp', 'sensor/temp')).toBe(false);
    expect(matches('sensor/temp', 'sensor/temp/x')).toBe(false);
  });

  it('keeps leading wildcards away from $ topics', () => {
    expect(matches('#', '$SYS/broker/uptime')).toBe(false);
    expect(matches('+/broker/uptime', '$SYS/broker/uptime')).toBe(false);
    expect(matches('$SYS/#', '$SYS/broker/uptime')).toBe(true);
  });
});

describe('validateFilter', () => {
  it('accepts wildcards in legal positions', () => {
    expect(() => validateFilter('a/+/#')).not.toThrow();
    expect(() => validateFilter('#')).not.toThrow();
    expect(() => validateFilter('+')).not.toThrow();
  });

  it('rejects # anywhere but the last segment', () => {
    expect(() => validateFilter('a/#/b')).toThrow(ConfigError);
    expect(() => validateFilter('#/a')).toThrow(ConfigError);
    expect(() => validateFilter('a/b#')).toThrow(ConfigError);
  });

  it('rejects partial-segment + and empty filters', () => {
    expect(() => validateFilter('a/b+')).toThrow(ConfigError);
    expect(() => validateFilter('')).toThrow(ConfigError);
  });
});

describe('covers', () => {
  it('detects filters contained in broader ones', () => {
    expect(covers('a/#', 'a/b')).toBe(true);
    expect(covers('a/#', 'a')).toBe(true);
    expect(covers('+/x', 'a/x')).toBe(true);
    expect(covers('a/+', 'a/+')).toBe(true);
  });

  it('does not treat narrower filters as covering', () => {
    expect(covers('a/b', 'a/#')).toBe(false);
    expect(covers('a/+', 'a/#')).toBe(false);
    expect(covers('a/b', 'a/+')).toBe(false);
    expect(covers('a/+', 'a/b/c')).toBe(false);
  });
});

describe('shadowedRules', () => {
  it('reports a specific rule placed after a general one', () => {
    const general = { filter: 'a/#', level: PermissionLevel.Deny };
    const specific = { filter: 'a/b', level: PermissionLevel.Write };
    expect(shadowedRules([general, specific])).toEqual([{ rule: specific, shadowedBy: general }]);
  });

  it('accepts the specific-before-general order', () => {
    expect(
      shadowedRules([
        { filter: 'a/b', level: PermissionLevel.Deny },
        { filter: 'a/#', level: PermissionLevel.ReadWrite },
      ]),
    ).toEqual([]);
  });
});
