import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  buildLedger,
  createLedger,
  credentialSnapshot,
  DEFAULT_BOOTSTRAP_CREDENTIAL,
  readLedgerFile,
  SAMPLE_ACCESS_FILE,
  withBootstrapCredential,
  writeSampleAccessFile,
} from './ledger';
import { encodeObfuscated } from './obfuscation';
import { ConfigError, ParseError } from '../models/errors';
import { PermissionLevel } from '../models/type';
import { fakeLogger } from '../testing/logger';

describe('buildLedger', () => {
  it('builds the sample file without the disallowed user', () => {
    const ledger = buildLedger(SAMPLE_ACCESS_FILE);
    expect([...ledger.users.keys()]).toEqual(['control', 'device01']);
    expect(ledger.users.has('aclsample')).toBe(false);
    expect(ledger.users.get('device01')).toEqual({
      username: 'device01',
      password: 'device-password',
      rules: [
        { filter: 'down/+/device01/#', level: PermissionLevel.Read },
        { filter: 'up/+/device01/#', level: PermissionLevel.Write },
      ],
      disallowed: false,
    });
  });

  it('keeps rules in file order, numeric-looking filters included', () => {
    const ledger = buildLedger('u:\n  password: pw\n  acl:\n    z/#: 1\n    a/#: 2\n    123: 3\n');
    expect(ledger.users.get('u')?.rules.map((rule) => rule.filter)).toEqual(['z/#', 'a/#', '123']);
  });

  it('reads numeric passwords as text', () => {
    expect(buildLedger('u:\n  password: 1234\n').users.get('u')?.password).toBe('1234');
  });

  it('keeps unquoted passwords exactly as written', () => {
    const ledger = buildLedger(
      'u:\n  password: 0123\nv:\n  password: 1e3\nw:\n  password: 0x1F\nx:\n  password: true\ny:\n  password: yes\n',
    );
    expect([...ledger.users].map(([name, user]) => [name, user.password])).toEqual([
      ['u', '0123'],
      ['v', '1e3'],
      ['w', '0x1F'],
      ['x', 'true'],
      ['y', 'yes'],
    ]);
  });

  it('keeps numeric-looking usernames as written', () => {
    const ledger = buildLedger('0123:\n  password: pw\n');
    expect([...ledger.users.keys()]).toEqual(['0123']);
  });

  it('reads an empty password or acl as none', () => {
    const ledger = buildLedger('u:\n  password:\n  acl:\n');
    expect(ledger.users.get('u')).toEqual({ username: 'u', password: '', rules: [], disallowed: false });
  });

  it('gives a user without acl an empty rule list', () => {
    expect(buildLedger('u:\n  password: pw\n').users.get('u')?.rules).toEqual([]);
  });

  it('returns an empty ledger for an empty file', () => {
    const ledger = buildLedger('');
    expect(ledger.users.size).toBe(0);
    expect(ledger.auth).toEqual([]);
    expect(ledger.acl).toEqual([]);
  });

  it('decodes obfuscated passwords when asked to', () => {
    const file = `u:\n  password: ${JSON.stringify(encodeObfuscated('hidden-password'))}\n`;
    expect(buildLedger(file, { passwordsObfuscated: true }).users.get('u')?.password).toBe('hidden-password');
  });

  it('rejects a misplaced # as a configuration error', () => {
    expect(() => buildLedger('u:\n  password: pw\n  acl:\n    a/#/b: 1\n')).toThrow(ConfigError);
  });

  it('validates filters of disallowed users too', () => {
    expect(() => buildLedger('u:\n  password: pw\n  acl:\n    a/#/b: 1\n  disallow: true\n')).toThrow(ConfigError);
  });

  it('rejects malformed YAML as a parse error', () => {
    expect(() => buildLedger('u: [unclosed\n')).toThrow(ParseError);
  });

  it('rejects well-formed YAML of the wrong shape as a parse error', () => {
    expect(() => buildLedger('- a\n- b\n')).toThrow(ParseError);
    expect(() => buildLedger('u:\n  password: pw\n  acl:\n    a/#: 7\n')).toThrow(ParseError);
    expect(() => buildLedger('u:\n  disallow: maybe\n')).toThrow(ParseError);
  });

  it('warns about rules an earlier rule makes unreachable', () => {
    const logger = fakeLogger();
    buildLedger('u:\n  password: pw\n  acl:\n    a/#: 0\n    a/b: 2\n', { logger });
    expect(logger.warn).toHaveBeenCalledWith('acl rule is unreachable, an earlier rule already matches its topics', {
      user: 'u',
      filter: 'a/b',
      shadowedBy: 'a/#',
    });
  });

  it('warns about users without a password', () => {
    const logger = fakeLogger();
    buildLedger('u:\n  acl:\n    a/#: 1\n', { logger });
    expect(logger.warn).toHaveBeenCalledWith('user has no password and can never authenticate', { user: 'u' });
  });
});

describe('createLedger', () => {
  it('rejects a user defined twice', () => {
    const user = { username: 'u', password: 'pw', rules: [], disallowed: false };
    expect(() => createLedger({ users: [user, user] })).toThrow(ConfigError);
  });

  it('validates the filters of global acl entries', () => {
    expect(() =>
      createLedger({
        acl: [{ client: '', username: '', remote: '', rules: [{ filter: 'a/b+', level: PermissionLevel.Read }] }],
      }),
    ).toThrow(ConfigError);
  });

  it('returns a frozen ledger', () => {
    const ledger = createLedger();
    expect(Object.isFrozen(ledger)).toBe(true);
    expect(Object.isFrozen(ledger.acl)).toBe(true);
  });
});

describe('withBootstrapCredential', () => {
  it('adds the default admin when the ledger lacks it', () => {
    const ledger = withBootstrapCredential(buildLedger(SAMPLE_ACCESS_FILE), DEFAULT_BOOTSTRAP_CREDENTIAL);
    expect([...ledger.users.keys()]).toEqual(['control', 'device01', 'admin']);
    expect(ledger.users.get('admin')?.rules).toEqual([{ filter: '#', level: PermissionLevel.ReadWrite }]);
  });

  it('leaves a defined admin alone', () => {
    const ledger = buildLedger('admin:\n  password: own-password\n');
    expect(withBootstrapCredential(ledger, DEFAULT_BOOTSTRAP_CREDENTIAL)).toBe(ledger);
  });

  it('does nothing when disabled', () => {
    const ledger = createLedger();
    expect(withBootstrapCredential(ledger, null)).toBe(ledger);
  });
});

describe('credentialSnapshot', () => {
  it('lists users and auth entries that have a password', () => {
    const ledger = createLedger({
      users: [
        { username: 'a', password: 'pw-a', rules: [], disallowed: false },
        { username: 'b', password: '', rules: [], disallowed: false },
      ],
      auth: [
        { client: '', username: 'svc', remote: '', password: 'pw-svc', allow: true },
        { client: '', username: '', remote: '', password: 'any', allow: true },
      ],
    });
    expect([...credentialSnapshot(ledger)]).toEqual([
      ['a', 'pw-a'],
      ['svc', 'pw-svc'],
    ]);
  });
});

describe('access files on disk', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ledger-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes a sample file that reads back', async () => {
    const file = join(dir, 'auth.yaml');
    await writeSampleAccessFile(file);
    expect(await readFile(file, 'utf8')).toBe(SAMPLE_ACCESS_FILE);
    const ledger = await readLedgerFile(file);
    expect([...ledger.users.keys()]).toEqual(['control', 'device01']);
  });

  it('reads an edited file', async () => {
    const file = join(dir, 'auth.yaml');
    await writeFile(file, 'ops:\n  password: ops-password\n  acl:\n    ops/#: 3\n');
    expect((await readLedgerFile(file)).users.get('ops')?.password).toBe('ops-password');
  });

  it('fails on an empty path or a missing file', async () => {
    await expect(readLedgerFile('')).rejects.toBeInstanceOf(ConfigError);
    await expect(readLedgerFile(join(dir, 'missing.yaml'))).rejects.toBeInstanceOf(ConfigError);
  });
});
