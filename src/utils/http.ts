import type { Response } from 'express';

/**
 * Aborts when the client goes away before the response is written, so
 * in-flight model calls and lock waits stop with it.
 */
export function responseSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}
