import type { Response } from 'express';

/** Aborts when the client disconnects before the response is written. */
export function abortSignalFor(res: Response): AbortSignal {
  const controller = new AbortController();
  res.once('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}
