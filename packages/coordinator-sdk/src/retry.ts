/**
 * Centralized retryable-operation wrapper.
 *
 * Used by both the tool dispatcher and the backend call site, so backoff
 * and the retryable-error predicate live in one place.
 */

import { sleep } from './async.js';
import { CancelledError, CoordinationError } from './errors.js';

export interface BackoffPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Multiplier applied per attempt (default 2) */
  backoffFactor?: number;
}

export interface RetryOptions extends BackoffPolicy {
  signal?: AbortSignal;
  /** Defaults to `defaultIsRetryable` */
  isRetryable?: (error: unknown) => boolean;
  /** Called after every failed attempt, with the delay before the next one (null if none follows) */
  onAttemptFailed?: (error: unknown, attempt: number, nextDelayMs: number | null) => void;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

/**
 * Delay before attempt `attempt + 1`: `base * factor^(attempt-1)`, capped.
 */
export function computeBackoffDelay(attempt: number, policy: BackoffPolicy): number {
  const factor = policy.backoffFactor ?? 2;
  const delay = policy.baseDelayMs * Math.pow(factor, Math.max(0, attempt - 1));
  return Math.min(policy.maxDelayMs, delay);
}

/**
 * Coordination errors carry their own flag; anything else is assumed transient.
 */
export function defaultIsRetryable(error: unknown): boolean {
  if (error instanceof CoordinationError) {
    return error.retryable;
  }
  return true;
}

/**
 * Run `operation` up to `maxAttempts` times.
 *
 * Never throws: the outcome says whether a value was produced. Cancellation
 * (signal aborted before an attempt or during backoff) ends the loop with a
 * `CancelledError`.
 */
export async function retryOperation<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const isRetryable = options.isRetryable ?? defaultIsRetryable;
  const maxAttempts = Math.max(1, options.maxAttempts);
  let lastError: unknown = new CancelledError();
  let attempts = 0;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      return { ok: false, error: new CancelledError(), attempts };
    }

    attempts = attempt;
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts };
    } catch (error) {
      lastError = error;
      const willRetry = attempt < maxAttempts && isRetryable(error) && !options.signal?.aborted;
      const delay = willRetry ? computeBackoffDelay(attempt, options) : null;
      options.onAttemptFailed?.(error, attempt, delay);

      if (delay === null) {
        break;
      }
      try {
        await sleep(delay, options.signal);
      } catch (sleepError) {
        return { ok: false, error: sleepError, attempts };
      }
    }
  }

  return { ok: false, error: lastError, attempts };
}
