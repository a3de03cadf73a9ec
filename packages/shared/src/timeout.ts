import { CancelledError, TimeoutError } from './errors.js';

/**
 * Race `fn` against a timer and an optional caller abort signal.
 *
 * `fn` receives a signal that fires on either, so adapters can cancel the
 * underlying request. A timeout rejects with TimeoutError, a caller abort
 * with CancelledError.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) throw new CancelledError(`${operation} cancelled`);

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const guard = new Promise<never>((_resolve, reject) => {
    if (timeoutMs > 0 && Number.isFinite(timeoutMs)) {
      timer = setTimeout(() => {
        const err = new TimeoutError(operation, timeoutMs);
        controller.abort(err);
        reject(err);
      }, timeoutMs);
    }
    if (parent) {
      onAbort = () => {
        const err = new CancelledError(`${operation} cancelled`);
        controller.abort(err);
        reject(err);
      };
      parent.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([fn(controller.signal), guard]);
  } finally {
    if (timer) clearTimeout(timer);
    if (parent && onAbort) parent.removeEventListener('abort', onAbort);
  }
}

/** Resolve after `ms`, or reject with CancelledError as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new CancelledError());
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
