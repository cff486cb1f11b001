export class DeadlineExceeded extends Error {
  constructor(readonly budgetMs: number, what = 'operation') {
    super(`${what} exceeded its ${budgetMs}ms budget`);
    this.name = 'DeadlineExceeded';
  }
}

export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Aborted');
}

/** Rethrows the abort reason when the signal has fired; call first in a catch block. */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

/** A controller that aborts, with the same reason, whenever any parent does. */
export function linkedController(...parents: Array<AbortSignal | undefined>): AbortController {
  const controller = new AbortController();
  for (const parent of parents) {
    if (!parent) {
      continue;
    }
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    parent.addEventListener('abort', () => controller.abort(parent.reason), { once: true });
  }
  return controller;
}

/** Aborts `controller` with a DeadlineExceeded after `ms`; returns the cancel function. */
export function abortAfter(controller: AbortController, ms: number, what?: string): () => void {
  const timer = setTimeout(() => controller.abort(new DeadlineExceeded(ms, what)), Math.max(0, ms));
  return () => clearTimeout(timer);
}

/**
 * Settles with `promise`, or rejects with the abort reason as soon as `signal`
 * fires. A late settlement of the abandoned promise is observed and dropped.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(abortReason(signal));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      err => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}
