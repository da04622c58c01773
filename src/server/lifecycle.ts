import { ShutdownError } from '../models/errors';

export const SHUTDOWN_TIMEOUT = 5_000;

/**
 * Runs a task at most once. The first caller starts it; every caller,
 * concurrent or later, gets the same promise.
 */
export class OneShot {
  private pending: Promise<void> | null = null;

  get fired(): boolean {
    return this.pending !== null;
  }

  run(task: () => Promise<void>): Promise<void> {
    if (this.pending === null) {
      this.pending = task();
    }
    return this.pending;
  }
}

/** Rejects with a ShutdownError when the task has not settled in time. */
export async function within<T>(task: Promise<T>, ms: number, what: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ShutdownError(`${what} did not stop within ${ms}ms`)), ms);
    timer.unref();
  });
  try {
    return await Promise.race([task, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

interface Closable {
  close(callback?: (error?: Error) => void): unknown;
}

/** Closes a server; a server that was never listening counts as closed. */
export function closeServer(server: Closable): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error && !('code' in error && error.code === 'ERR_SERVER_NOT_RUNNING')) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
