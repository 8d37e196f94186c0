import { isRetryable as isRetryableError } from './errors.js';

export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier?: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  // Stops further attempts; the pending backoff wait ends early
  signal?: AbortSignal;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
};

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
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
 * Run `fn` with exponential backoff.
 * Non-retryable errors and the error of the last attempt are rethrown as is.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = DEFAULT_RETRY_OPTIONS): Promise<T> {
  const {
    maxAttempts,
    initialDelayMs,
    maxDelayMs,
    multiplier = 2,
    isRetryable = isRetryableError,
    onRetry,
    signal,
  } = options;

  let delay = initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxAttempts || !isRetryable(error) || signal?.aborted) {
        throw error;
      }

      const wait = Math.min(delay, maxDelayMs);
      onRetry?.(attempt, error, wait);
      await sleep(wait, signal);
      if (signal?.aborted) {
        throw error;
      }
      delay = delay * multiplier;
    }
  }
}
