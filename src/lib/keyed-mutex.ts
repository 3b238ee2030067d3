import { OperationCancelledError } from '../utils/errors';

interface LockEntry {
  /** Tail of the chain; resolves when the last queued holder releases */
  tail: Promise<void>;
  holders: number;
}

/**
 * Lock table keyed by string (document id -> lock).
 *
 * Callers for the same key run one at a time in arrival order; different keys
 * never block each other. Entries are dropped once no holder or waiter
 * remains, so the table only grows with keys that are in use.
 */
export class KeyedMutex {
  private locks = new Map<string, LockEntry>();

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  get size(): number {
    return this.locks.size;
  }

  /**
   * Run `fn` while holding the lock for `key`. The lock is released on every
   * exit path. Aborting while waiting rejects with OperationCancelledError and
   * lets the next waiter through.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      throw new OperationCancelledError();
    }

    const entry = this.locks.get(key) ?? { tail: Promise.resolve(), holders: 0 };
    const previous = entry.tail;
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    entry.tail = previous.then(() => current);
    entry.holders++;
    this.locks.set(key, entry);

    try {
      await waitFor(previous, signal);
      return await fn();
    } finally {
      // Successors chain on our predecessor as well, so releasing early after
      // a cancelled wait never lets them overtake the current holder.
      release();
      entry.holders--;
      if (entry.holders === 0 && this.locks.get(key) === entry) {
        this.locks.delete(key);
      }
    }
  }
}

function waitFor(promise: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) return promise;

  return new Promise((resolve, reject) => {
    const onAbort = () => reject(new OperationCancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      () => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
