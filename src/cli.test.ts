import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createProgram } from './cli';
import { decodeObfuscated } from './auth/obfuscation';
import { SAMPLE_ACCESS_FILE } from './auth/ledger';

describe('cli', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints an obfuscated password', async () => {
    const print = vi.spyOn(console, 'log').mockImplementation(() => {});
    await createProgram().parseAsync(['code-password', 'control-password'], { from: 'user' });

    expect(print).toHaveBeenCalledTimes(1);
    const [encoded] = print.mock.calls[0];
    expect(typeof encoded).toBe('string');
    expect(decodeObfuscated(String(encoded))).toBe('control-password');
  });

  it('writes the sample access file', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const dir = await mkdtemp(join(tmpdir(), 'cli-'));
    try {
      const file = join(dir, 'auth.yaml');
      await createProgram().parseAsync(['initauth', '-o', file], { from: 'user' });
      expect(await readFile(file, 'utf8')).toBe(SAMPLE_ACCESS_FILE);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
