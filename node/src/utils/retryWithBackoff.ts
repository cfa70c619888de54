// Retry Backoff with Jitter

import { isAbortError } from '@/services/errors';
import { logger } from '@/services/logger';

export interface RetryOptions {
  maxRetries?: number;
  initialDelay?: number;
  maxDelay?: number;
  jitter?: boolean;
  exponentialBase?: number;
  /** Return false to stop retrying and rethrow immediately. Aborts are never retried. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  signal?: AbortSignal;
  label?: string;
}

export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'initialDelay' | 'maxDelay' | 'jitter' | 'exponentialBase'> = {},
): number {
  const { initialDelay = 100, maxDelay = 5000, jitter = true, exponentialBase = 2 } = options;
  const exponentialDelay = initialDelay * Math.pow(exponentialBase, attempt);
  // Add jitter (random 0-25% of delay)
  const jitterAmount = jitter ? Math.random() * 0.25 * exponentialDelay : 0;
  return Math.min(exponentialDelay + jitterAmount, maxDelay);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Retry function with exponential backoff and jitter.
 * `fn` receives the 0-based attempt number.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const { maxRetries = 3, shouldRetry = () => true, signal, label = 'operation' } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (
        attempt >= maxRetries ||
        signal?.aborted ||
        isAbortError(error) ||
        !shouldRetry(error, attempt)
      ) {
        throw error;
      }
      const delay = backoffDelay(attempt, options);
      logger.debug('retry:scheduled', {
        label,
        attempt: attempt + 1,
        maxRetries,
        delayMs: Math.round(delay),
      });
      await sleep(delay, signal);
    }
  }
}
