import { CancelledError, TimeoutError } from './errors.js';

/**
 * Runs `fn` with an abort signal that fires when `timeoutMs` elapses or when
 * `parent` aborts, whichever comes first. The returned promise settles as soon
 * as the signal fires; `fn` is expected to observe the signal for cleanup.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) {
    throw new CancelledError();
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const aborted = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);

    if (parent) {
      onParentAbort = () => {
        const err = new CancelledError();
        controller.abort(err);
        reject(err);
      };
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([fn(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) {
      parent.removeEventListener('abort', onParentAbort);
    }
  }
}
