import { isWaypostError } from '../core/errors.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelay: 250,
  maxDelay: 5000,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRetryable(error: unknown): boolean {
  return isWaypostError(error) && error.retryable;
}

/**
 * Retry `fn` while it fails with a retryable error (lock contention),
 * backing off exponentially. Anything else is rethrown at once.
 */
export async function withRetry<T>(
  fn: () => T | Promise<T>,
  opts: RetryOptions = DEFAULT_RETRY_OPTIONS,
  onRetry?: (error: unknown, attempt: number, delay: number) => void
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryable(error) || attempt >= opts.maxRetries) {
        throw error;
      }
      const delay = Math.min(opts.baseDelay * 2 ** attempt, opts.maxDelay);
      onRetry?.(error, attempt + 1, delay);
      await sleep(delay);
    }
  }
}
