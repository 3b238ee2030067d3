/**
 * Timeout, cancellation and bounded retry for calls to external services.
 */

import { ExternalServiceTimeout, OperationCancelledError } from './errors';
import { errorMessage, logger } from './logger';

export interface RetryOptions {
  /** Total attempts including the first */
  maxAttempts: number;
  /** Delay before the second attempt; doubles on each further attempt */
  baseDelayMs: number;
  /** Per-attempt timeout. Omit for none. */
  timeoutMs?: number;
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationCancelledError();
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `fn` with its own abort signal, which fires when the parent signal
 * aborts or the timeout elapses. The returned promise settles as soon as
 * either happens, even if `fn` ignores its signal.
 */
export async function withTimeout<T>(
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  parent?: AbortSignal
): Promise<T> {
  throwIfAborted(parent);

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const guard = new Promise<never>((_resolve, reject) => {
    if (timeoutMs !== undefined && timeoutMs > 0) {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ExternalServiceTimeout(operation, timeoutMs));
      }, timeoutMs);
    }
    onAbort = () => {
      controller.abort();
      reject(new OperationCancelledError());
    };
    parent?.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([fn(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    if (onAbort) parent?.removeEventListener('abort', onAbort);
  }
}

/**
 * Retry with exponential backoff. Cancellation is never retried.
 * Throws the last error once attempts are exhausted.
 */
export async function withRetry<T>(
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { maxAttempts, baseDelayMs, timeoutMs, signal, shouldRetry = () => true } = options;
  const attempts = Math.max(1, maxAttempts);
  let lastError: unknown = new Error(`${operation} failed after retries`);

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await withTimeout(operation, fn, timeoutMs, signal);
    } catch (error) {
      if (error instanceof OperationCancelledError || !shouldRetry(error)) {
        throw error;
      }
      lastError = error;
      logger.warn(
        {
          operation,
          attempt: attempt + 1,
          maxAttempts: attempts,
          error: errorMessage(error),
        },
        `${operation} attempt failed`
      );

      if (attempt < attempts - 1) {
        await sleep(baseDelayMs * 2 ** attempt, signal);
      }
    }
  }

  throw lastError;
}
