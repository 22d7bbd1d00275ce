/**
 * Retry policy for model calls
 */

import type { DeepReadonly, RetryConfig } from '../types.js';
import { MalformedResponseError, QuillError } from '../errors.js';

export type RetryPolicy = DeepReadonly<RetryConfig>;

export interface RetryHooks {
  /** Called before every attempt, first one included */
  onAttempt?: (attempt: number) => void;
  /** Called after a failed attempt that will be retried */
  onRetry?: (error: unknown, retry: number, delayMs: number) => void;
  /** Delay implementation; tests pass a fake */
  sleep?: (ms: number) => Promise<void>;
}

const delay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * How many retries an error class gets, and the bucket it counts against.
 * A malformed response gets one retry whatever maxRetries says.
 */
export function retryBudget(error: unknown, maxRetries: number): { bucket: string; budget: number } {
  if (error instanceof MalformedResponseError) {
    return { bucket: 'malformed', budget: 1 };
  }
  if (error instanceof QuillError && error.retryable) {
    return { bucket: error.kind, budget: maxRetries };
  }
  return { bucket: 'none', budget: 0 };
}

/**
 * Delay before the nth retry (1-based)
 */
export function backoffDelay(retry: number, policy: RetryPolicy): number {
  const raw =
    policy.backoff === 'linear'
      ? policy.baseDelayMs * retry
      : policy.baseDelayMs * 2 ** (retry - 1);
  return Math.min(raw, policy.maxDelayMs);
}

/**
 * Run an operation, retrying retryable failures within their budget.
 * The last error is rethrown once the budget is spent.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<T> {
  const sleep = hooks.sleep ?? delay;
  const used = new Map<string, number>();
  let retries = 0;

  for (let attempt = 1; ; attempt++) {
    hooks.onAttempt?.(attempt);

    try {
      return await operation(attempt);
    } catch (error) {
      const { bucket, budget } = retryBudget(error, policy.maxRetries);
      const spent = used.get(bucket) ?? 0;
      if (spent >= budget) {
        throw error;
      }

      used.set(bucket, spent + 1);
      retries++;
      const wait = backoffDelay(retries, policy);
      hooks.onRetry?.(error, retries, wait);
      await sleep(wait);
    }
  }
}
