/**
 * Retry with Backoff
 *
 * Re-runs an async operation while `retryIf` accepts its failure, waiting
 * an exponentially growing delay between attempts. Aborting `signal`
 * ends the wait immediately and rethrows the last failure.
 */

import { sleep } from './time.js';

export interface RetryOptions {
  maxAttempts: number;
  initialDelay: number;       // ms before the second attempt
  maxDelay: number;           // cap on any single wait
  backoffMultiplier: number;
  retryIf?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  signal?: AbortSignal;
}

const DEFAULT_RETRY: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

/**
 * Delay before attempt `attempt + 1`
 */
export function backoffDelay(attempt: number, options: Pick<RetryOptions, 'initialDelay' | 'maxDelay' | 'backoffMultiplier'>): number {
  return Math.min(options.initialDelay * options.backoffMultiplier ** (attempt - 1), options.maxDelay);
}

/**
 * `fn` receives the 1-based attempt number. The error of the final
 * (or abandoned) attempt propagates unchanged.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const policy: RetryOptions = { ...DEFAULT_RETRY, ...options };

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const exhausted = attempt >= policy.maxAttempts;
      if (exhausted || policy.signal?.aborted || (policy.retryIf && !policy.retryIf(error, attempt))) {
        throw error;
      }

      const delay = backoffDelay(attempt, policy);
      policy.onRetry?.(error, attempt, delay);
      await sleep(delay, policy.signal);

      if (policy.signal?.aborted) {
        throw error;
      }
    }
  }
}
