import bcrypt from 'bcryptjs';
import { matches } from './topic';
import {
  PermissionLevel,
  type AccessRule,
  type ClientIdentity,
  type Credentials,
  type Decision,
  type Ledger,
  type Operation,
} from '../models/type';

const BCRYPT_PREFIXES = ['$2a$', '$2b$', '$2y$'];

/** '' and '*' match anything, 'abc*' matches by prefix, anything else exactly. */
export function patternMatches(pattern: string, value: string): boolean {
  if (pattern === '' || pattern === '*' || pattern === value) {
    return true;
  }
  const star = pattern.indexOf('*');
  return star > 0 && value.startsWith(pattern.slice(0, star));
}

function identityMatches(
  entry: { client: string; username: string; remote: string },
  who: ClientIdentity,
): boolean {
  return (
    patternMatches(entry.client, who.clientId ?? '') &&
    patternMatches(entry.username, who.username) &&
    patternMatches(entry.remote, who.remote ?? '')
  );
}

export function permits(level: PermissionLevel, operation: Operation): boolean {
  switch (level) {
    case PermissionLevel.ReadWrite:
      return true;
    case PermissionLevel.Read:
      return operation === 'subscribe';
    case PermissionLevel.Write:
      return operation === 'publish';
    default:
      return false;
  }
}

/** First rule, in source order, whose filter matches the topic. */
export function firstMatch(rules: readonly AccessRule[], topic: string): AccessRule | undefined {
  return rules.find((rule) => matches(rule.filter, topic));
}

/**
 * First-match-wins over the user's own rules, then over the global ACL
 * entries that apply to the client. No matching rule means deny.
 */
export function decide(ledger: Ledger, who: ClientIdentity, topic: string, operation: Operation): Decision {
  const user = ledger.users.get(who.username);
  if (user) {
    const rule = firstMatch(user.rules, topic);
    if (rule) {
      return permits(rule.level, operation) ? 'allow' : 'deny';
    }
  }
  for (const entry of ledger.acl) {
    if (!identityMatches(entry, who)) {
      continue;
    }
    const rule = firstMatch(entry.rules, topic);
    if (rule) {
      return permits(rule.level, operation) ? 'allow' : 'deny';
    }
  }
  return 'deny';
}

export function isBcryptHash(value: string): boolean {
  return BCRYPT_PREFIXES.some((prefix) => value.startsWith(prefix));
}

export async function verifyPassword(supplied: string, stored: string): Promise<boolean> {
  if (stored === '') {
    return false;
  }
  if (isBcryptHash(stored)) {
    return bcrypt.compare(supplied, stored);
  }
  return supplied === stored;
}

/**
 * Checks a connecting client's credentials: a ledger user by that name
 * decides alone, otherwise the first matching global auth entry does.
 */
export async function authenticate(ledger: Ledger, credentials: Credentials): Promise<boolean> {
  const user = ledger.users.get(credentials.username);
  if (user) {
    return verifyPassword(credentials.password, user.password);
  }
  const entry = ledger.auth.find(
    (rule) => identityMatches(rule, credentials) && patternMatches(rule.password, credentials.password),
  );
  return entry?.allow ?? false;
}
