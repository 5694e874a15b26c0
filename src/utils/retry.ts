/**
 * Retry utilities with exponential backoff
 */

import { logger } from './logger.ts';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 4000,
};

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRateLimitError(error: unknown): boolean {
  const errorMsg = String(error);
  return (
    errorMsg.includes('429') ||
    errorMsg.includes('Too Many') ||
    errorMsg.includes('rate limit')
  );
}

/**
 * Execute a function with retry on rate limit errors
 *
 * Other errors are rethrown immediately.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  label: string,
  policy: RetryPolicy = DEFAULT_RETRY,
  wait: (ms: number) => Promise<void> = sleep
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRateLimitError(error) || attempt >= policy.maxAttempts) {
        throw error;
      }

      const delay = Math.min(
        policy.baseDelayMs * Math.pow(2, attempt - 1),
        policy.maxDelayMs
      );

      logger.warn(
        `[Retry] ${label} attempt ${attempt}/${policy.maxAttempts}, ` +
          `waiting ${delay}ms`
      );
      await wait(delay);
    }
  }
}
