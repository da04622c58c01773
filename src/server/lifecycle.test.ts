import { describe, expect, it, vi } from 'vitest';
import { closeServer, OneShot, within } from './lifecycle';
import { ShutdownError } from '../models/errors';

describe('OneShot', () => {
  it('runs the task once for concurrent callers', async () => {
    const once = new OneShot();
    const task = vi.fn(async () => {});
    expect(once.fired).toBe(false);

    const calls = [once.run(task), once.run(task), once.run(task)];
    await Promise.all(calls);
    await once.run(task);

    expect(task).toHaveBeenCalledTimes(1);
    expect(calls[1]).toBe(calls[0]);
    expect(once.fired).toBe(true);
  });
});

describe('within', () => {
  it('passes through a result that arrives in time', async () => {
    expect(await within(Promise.resolve('done'), 1_000, 'task')).toBe('done');
  });

  it('gives up with a shutdown error', async () => {
    const never = new Promise<void>(() => {});
    await expect(within(never, 10, 'listener web')).rejects.toThrow(
      new ShutdownError('listener web did not stop within 10ms'),
    );
  });
});

describe('closeServer', () => {
  it('treats a server that is not running as closed', async () => {
    const server = {
      close: (callback?: (error?: Error) => void) =>
        callback?.(Object.assign(new Error('Server is not running.'), { code: 'ERR_SERVER_NOT_RUNNING' })),
    };
    await expect(closeServer(server)).resolves.toBeUndefined();
  });

  it('passes other close errors on', async () => {
    const server = { close: (callback?: (error?: Error) => void) => callback?.(new Error('stuck')) };
    await expect(closeServer(server)).rejects.toThrow('stuck');
  });
});
