import { readFile, writeFile } from 'node:fs/promises';
import YAML from 'yaml';
import { z } from 'zod';
import { tryDecodeObfuscated } from './obfuscation';
import { shadowedRules, validateFilter } from './topic';
import type { Logger } from '../config/logger';
import { ConfigError, ParseError, errorMessage } from '../models/errors';
import {
  PermissionLevel,
  type AclRule,
  type AuthRule,
  type BootstrapCredential,
  type Ledger,
  type UserRecord,
} from '../models/type';

export const SAMPLE_ACCESS_FILE = `# username:
#     password: plain text, or the output of \`mqtt-control code-password\` when started with --coded-pwd
#     acl:
#         <topic filter>: 0 deny, 1 read (subscribe), 2 write (publish), 3 read and write
#     disallow: true removes the user
# Rules are checked top to bottom; the first filter matching a topic decides.
aclsample:
    password: sample-password
    acl:
        deny/#: 0
        read/#: 1
        write/#: 2
        rw/#: 3
    disallow: true
control:
    password: control-password
    acl:
        down/#: 3
        up/#: 3
device01:
    password: device-password
    acl:
        down/+/device01/#: 1
        up/+/device01/#: 2
`;

/**
 * Injected when the ledger has no user of that name. Change it, or pass
 * `null` to skip the injection.
 */
export const DEFAULT_BOOTSTRAP_CREDENTIAL: BootstrapCredential = Object.freeze({
  username: 'admin',
  password: 'admin123',
  rules: Object.freeze([{ filter: '#', level: PermissionLevel.ReadWrite }]),
});

// The access file is read with the failsafe schema: every scalar arrives as
// the text written, so `0123` and `true` stay passwords, not numbers or booleans.
const LevelSchema = z
  .string()
  .regex(/^[0-3]$/, 'access level must be 0, 1, 2 or 3')
  .transform(Number)
  .pipe(z.nativeEnum(PermissionLevel));

const FlagSchema = z
  .enum(['true', 'True', 'TRUE', 'false', 'False', 'FALSE'])
  .transform((value) => value.toLowerCase() === 'true');

const EntrySchema = z.object({
  // The mapping key is authoritative; this field is accepted and ignored.
  username: z.string().optional(),
  password: z.string().nullish(),
  acl: z.union([z.map(z.string(), LevelSchema), z.literal('')]).nullish(),
  disallow: FlagSchema.optional(),
});

const AccessFileSchema = z.map(
  z.string(),
  z
    .map(z.string(), z.unknown())
    .transform((entry) => Object.fromEntries(entry))
    .pipe(EntrySchema),
);

export interface BuildOptions {
  /** Passwords were written with `code-password` and must be decoded. */
  passwordsObfuscated?: boolean;
  /** Receives warnings about rules shadowed by earlier ones. */
  logger?: Logger;
}

export interface LedgerParts {
  users?: Iterable<UserRecord>;
  auth?: readonly AuthRule[];
  acl?: readonly AclRule[];
}

/**
 * Builds an immutable ledger from records constructed in code. Disallowed
 * users are dropped and every filter is validated.
 */
export function createLedger(parts: LedgerParts = {}): Ledger {
  const users = new Map<string, UserRecord>();
  for (const user of parts.users ?? []) {
    user.rules.forEach((rule) => validateFilter(rule.filter));
    if (user.disallowed) {
      continue;
    }
    if (users.has(user.username)) {
      throw new ConfigError(`user "${user.username}" is defined twice`);
    }
    users.set(user.username, Object.freeze({ ...user, rules: Object.freeze([...user.rules]) }));
  }
  for (const entry of parts.acl ?? []) {
    entry.rules.forEach((rule) => validateFilter(rule.filter));
  }
  return Object.freeze({
    users,
    auth: Object.freeze([...(parts.auth ?? [])]),
    acl: Object.freeze([...(parts.acl ?? [])]),
  });
}

function parseAccessFile(text: string): z.infer<typeof AccessFileSchema> {
  const doc = YAML.parseDocument(text, { schema: 'failsafe' });
  if (doc.errors.length > 0) {
    throw new ParseError(`access file is not valid YAML: ${doc.errors[0].message}`, { cause: doc.errors[0] });
  }
  const value: unknown = doc.toJS({ mapAsMap: true });
  if (value === null || value === undefined) {
    return new Map();
  }
  const result = AccessFileSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
    throw new ParseError(`access file has an invalid shape: ${issues.join('; ')}`, { cause: result.error });
  }
  return result.data;
}

export function buildLedger(source: string | Buffer, options: BuildOptions = {}): Ledger {
  const text = typeof source === 'string' ? source : source.toString('utf8');
  const users: UserRecord[] = [];
  for (const [username, entry] of parseAccessFile(text)) {
    const password = entry.password ?? '';
    users.push({
      username,
      password: options.passwordsObfuscated ? tryDecodeObfuscated(password) : password,
      rules: [...(entry.acl || new Map<string, PermissionLevel>())].map(([filter, level]) => ({ filter, level })),
      disallowed: entry.disallow ?? false,
    });
  }
  const ledger = createLedger({ users });

  if (options.logger) {
    for (const user of ledger.users.values()) {
      if (user.password === '') {
        options.logger.warn('user has no password and can never authenticate', { user: user.username });
      }
      for (const { rule, shadowedBy } of shadowedRules(user.rules)) {
        options.logger.warn('acl rule is unreachable, an earlier rule already matches its topics', {
          user: user.username,
          filter: rule.filter,
          shadowedBy: shadowedBy.filter,
        });
      }
    }
  }
  return ledger;
}

export async function readLedgerFile(path: string, options: BuildOptions = {}): Promise<Ledger> {
  if (path === '') {
    throw new ConfigError('access file name is empty');
  }
  let source: Buffer;
  try {
    source = await readFile(path);
  } catch (error) {
    throw new ConfigError(`cannot read access file ${path}: ${errorMessage(error)}`, { cause: error });
  }
  return buildLedger(source, options);
}

export function writeSampleAccessFile(path: string): Promise<void> {
  return writeFile(path, SAMPLE_ACCESS_FILE, { mode: 0o664 });
}

export function withBootstrapCredential(ledger: Ledger, credential: BootstrapCredential | null): Ledger {
  if (credential === null || ledger.users.has(credential.username)) {
    return ledger;
  }
  return createLedger({
    users: [
      ...ledger.users.values(),
      { username: credential.username, password: credential.password, rules: credential.rules, disallowed: false },
    ],
    auth: ledger.auth,
    acl: ledger.acl,
  });
}

/** Username/password pairs that may log in to the control plane. */
export function credentialSnapshot(ledger: Ledger): ReadonlyMap<string, string> {
  const snapshot = new Map<string, string>();
  for (const [name, user] of ledger.users) {
    if (name !== '' && user.password !== '') {
      snapshot.set(name, user.password);
    }
  }
  for (const rule of ledger.auth) {
    if (rule.username !== '' && rule.password !== '') {
      snapshot.set(rule.username, rule.password);
    }
  }
  return snapshot;
}
