/**
 * Timeout and cancellation helpers.
 *
 * Every suspension point in the coordinator (backend call, tool attempt,
 * backoff sleep) goes through these so a task's AbortSignal is observed
 * everywhere.
 */

import { CancelledError, TimeoutError } from './errors.js';

export function throwIfAborted(signal: AbortSignal | undefined, message = 'Operation cancelled'): void {
  if (signal?.aborted) {
    throw new CancelledError(message);
  }
}

/**
 * Resolve after `ms`, or reject with `CancelledError` as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError());
  }
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
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

/**
 * Run `operation` with its own AbortSignal that fires when `timeoutMs`
 * elapses or the parent signal aborts.
 *
 * The returned promise settles as soon as either happens; the operation is
 * told to stop through its signal but is not awaited further.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: { timeoutMs: number; label: string; signal?: AbortSignal },
): Promise<T> {
  const { timeoutMs, label, signal: parent } = options;
  throwIfAborted(parent);

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    if (parent) {
      onParentAbort = (): void => {
        const error = new CancelledError(`${label} cancelled`);
        controller.abort(error);
        reject(error);
      };
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([operation(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) {
      parent.removeEventListener('abort', onParentAbort);
    }
  }
}
