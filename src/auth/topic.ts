import { ConfigError } from '../models/errors';
import type { AccessRule } from '../models/type';

const SEPARATOR = '/';
const SINGLE = '+';
const MULTI = '#';

/**
 * Rejects filters the matcher cannot evaluate: empty filters, a `#` that is
 * not the whole last segment, and a `+` sharing a segment with other
 * characters.
 */
export function validateFilter(filter: string): void {
  if (filter === '') {
    throw new ConfigError('topic filter is empty');
  }
  const segments = filter.split(SEPARATOR);
  segments.forEach((segment, index) => {
    if (segment.includes(MULTI) && (segment !== MULTI || index !== segments.length - 1)) {
      throw new ConfigError(`topic filter "${filter}": '#' is only allowed as the last segment`);
    }
    if (segment.includes(SINGLE) && segment !== SINGLE) {
      throw new ConfigError(`topic filter "${filter}": '+' must occupy a whole segment`);
    }
  });
}

export function matches(filter: string, topic: string): boolean {
  // Wildcards at the first level never reach $SYS-style topics
  if (topic.startsWith('$') && (filter.startsWith(SINGLE) || filter.startsWith(MULTI))) {
    return false;
  }
  const wanted = filter.split(SEPARATOR);
  const actual = topic.split(SEPARATOR);
  for (let i = 0; i < wanted.length; i++) {
    const segment = wanted[i];
    if (segment === MULTI) {
      return true;
    }
    if (i >= actual.length) {
      return false;
    }
    if (segment !== SINGLE && segment !== actual[i]) {
      return false;
    }
  }
  return wanted.length === actual.length;
}

/** Whether every topic matched by `specific` is also matched by `general`. */
export function covers(general: string, specific: string): boolean {
  const outer = general.split(SEPARATOR);
  const inner = specific.split(SEPARATOR);
  for (let i = 0; i < outer.length; i++) {
    const segment = outer[i];
    if (segment === MULTI) {
      return true;
    }
    if (i >= inner.length || inner[i] === MULTI) {
      return false;
    }
    if (segment === SINGLE) {
      continue;
    }
    if (segment !== inner[i]) {
      return false;
    }
  }
  return outer.length === inner.length;
}

export interface ShadowedRule {
  rule: AccessRule;
  shadowedBy: AccessRule;
}

/**
 * Lists rules that can never decide anything because an earlier rule
 * already matches every topic they would.
 */
export function shadowedRules(rules: readonly AccessRule[]): ShadowedRule[] {
  const found: ShadowedRule[] = [];
  rules.forEach((rule, index) => {
    const earlier = rules.slice(0, index).find((candidate) => covers(candidate.filter, rule.filter));
    if (earlier) {
      found.push({ rule, shadowedBy: earlier });
    }
  });
  return found;
}
