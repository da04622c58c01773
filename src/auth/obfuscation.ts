/**
 * Reversible password obfuscation for access files.
 *
 * This keeps passwords from being read at a glance over someone's shoulder
 * or in a pasted config. It is NOT encryption: anyone with this module can
 * recover the plaintext.
 */
import { randomBytes } from 'node:crypto';
import { ConfigError } from '../models/errors';

const MARKER = 'obf1:';
const KEY = Buffer.from('mqtt-control/access-file', 'utf8');

function mask(bytes: Uint8Array, salt: number): Buffer {
  const out = Buffer.alloc(bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    out[i] = bytes[i] ^ KEY[(i + salt) % KEY.length] ^ ((salt + i * 31) & 0xff);
  }
  return out;
}

export function isObfuscated(value: string): boolean {
  return value.startsWith(MARKER);
}

export function encodeObfuscated(plain: string): string {
  const salt = randomBytes(1)[0];
  const body = mask(Buffer.from(plain, 'utf8'), salt);
  return MARKER + Buffer.concat([Buffer.from([salt]), body]).toString('base64url');
}

export function decodeObfuscated(value: string): string {
  if (!isObfuscated(value)) {
    throw new ConfigError('value is not an obfuscated password');
  }
  const raw = Buffer.from(value.slice(MARKER.length), 'base64url');
  if (raw.length === 0) {
    throw new ConfigError('obfuscated password is truncated');
  }
  return mask(raw.subarray(1), raw[0]).toString('utf8');
}

/** Decodes obfuscated values and passes anything else through unchanged. */
export function tryDecodeObfuscated(value: string): string {
  return isObfuscated(value) ? decodeObfuscated(value) : value;
}
