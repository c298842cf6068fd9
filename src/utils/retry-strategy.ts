/**
 * Retry strategy with exponential backoff and jitter
 *
 * Jitter spreads out retries of pages that failed at the same moment.
 */

import { CancelledError } from '../errors/custom-errors';
import type { RetryConfig } from '../types/config.types';

/**
 * Calculate exponential backoff with jitter
 *
 * @param retryCount - Current retry attempt (0-indexed)
 * @param initialTimeout - Initial timeout in milliseconds
 * @param backoffMultiplier - Multiplier for exponential backoff
 * @param jitterPercentage - Percentage of jitter (0-100)
 * @returns Delay in milliseconds before next retry
 *
 * @example
 * ```ts
 * // Retry 0: 1000ms + jitter
 * // Retry 1: 2000ms + jitter
 * // Retry 2: 4000ms + jitter
 * calculateBackoff(0, 1000, 2, 10);
 * ```
 */
export function calculateBackoff(
  retryCount: number,
  initialTimeout: number,
  backoffMultiplier: number,
  jitterPercentage: number,
): number {
  const baseDelay = initialTimeout * backoffMultiplier ** retryCount;
  const jitterAmount = (baseDelay * jitterPercentage) / 100;

  // Random jitter within ±jitterAmount
  const jitter = (Math.random() * 2 - 1) * jitterAmount;

  return Math.floor(Math.max(0, baseDelay + jitter));
}

/**
 * Check if a retry should be attempted based on configuration
 */
export function shouldRetry(retryCount: number, config: RetryConfig): boolean {
  return retryCount < config.maxRetries;
}

/**
 * Get the delay before the next retry
 */
export function getRetryDelay(retryCount: number, config: RetryConfig): number {
  return calculateBackoff(retryCount, config.initialTimeout, config.backoffMultiplier, config.jitterPercentage);
}

/**
 * Sleep for a specified number of milliseconds
 *
 * @throws CancelledError if the signal aborts before the delay ends
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

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

export type RetryOptions = {
  /** Only errors for which this returns true are retried (default: all) */
  retryIf?: (error: unknown) => boolean;
  /** Called before each retry */
  onRetry?: (attempt: number, error: Error, delay: number) => void;
  /** Stops waiting between attempts */
  signal?: AbortSignal;
};

/**
 * Execute a function with retry logic
 *
 * @returns Result of the function
 * @throws Last error if all retries exhausted or the error is not retryable
 *
 * @example
 * ```ts
 * await retryWithBackoff(() => source.fetchPage(handle, session), retryConfig, {
 *   retryIf: isRetryable,
 *   onRetry: (attempt, error) => logger.warning(`Retry ${attempt + 1}: ${error.message}`),
 * });
 * ```
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  config: RetryConfig,
  options: RetryOptions = {},
): Promise<T> {
  const { retryIf = () => true, onRetry, signal } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      // biome-ignore lint/performance/noAwaitInLoops: Sequential retry is intentional
      return await fn();
    } catch (error) {
      if (!shouldRetry(attempt, config) || !retryIf(error)) {
        throw error;
      }
      if (signal?.aborted) {
        throw new CancelledError();
      }

      const lastError = error instanceof Error ? error : new Error(String(error));
      const delay = getRetryDelay(attempt, config);

      onRetry?.(attempt, lastError, delay);

      await sleep(delay, signal);
    }
  }
}
