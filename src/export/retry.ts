import { toError } from '../errors.js';

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_MS = 5000;

export interface RetryOptions<T> {
  /** Total attempts, the first one included. */
  maxRetries?: number;
  /** Fixed pause between attempts; never applied before the first. */
  retryDelayMs?: number;
  signal?: AbortSignal;
  onAttempt?: (attempt: number, outcome: AttemptOutcome<T>) => void;
  onRetry?: (nextAttempt: number, delayMs: number) => void;
}

export type AttemptOutcome<T> = { ok: true; value: T } | { ok: false; value: T | null; error: Error | null };

export type RetryResult<T> = {
  ok: boolean;
  attempts: number;
  value: T | null;
  error: Error | null;
  aborted: boolean;
};

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `operation` until it reports success or `maxRetries` attempts are used.
 * A thrown error counts as a failed attempt.
 */
export async function runWithRetry<T extends { ok: boolean }>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions<T> = {}
): Promise<RetryResult<T>> {
  const maxRetries = Math.max(1, Math.floor(options.maxRetries ?? DEFAULT_MAX_RETRIES));
  const retryDelayMs = Math.max(0, options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);

  let value: T | null = null;
  let error: Error | null = null;
  let attempts = 0;

  while (attempts < maxRetries) {
    if (options.signal?.aborted) {
      return { ok: false, attempts, value, error, aborted: true };
    }

    attempts += 1;
    let outcome: AttemptOutcome<T>;
    try {
      value = await operation(attempts);
      error = null;
      outcome = value.ok ? { ok: true, value } : { ok: false, value, error: null };
    } catch (caught) {
      value = null;
      error = toError(caught);
      outcome = { ok: false, value: null, error };
    }

    options.onAttempt?.(attempts, outcome);

    if (outcome.ok) {
      return { ok: true, attempts, value: outcome.value, error: null, aborted: false };
    }

    if (attempts < maxRetries) {
      options.onRetry?.(attempts + 1, retryDelayMs);
      await sleep(retryDelayMs, options.signal);
    }
  }

  return { ok: false, attempts, value, error, aborted: false };
}
