/**
 * Retry with bounded exponential backoff
 *
 * Used around every call to the embedding API and the index store.
 */

import { getLogger } from './logger.js';
import { isTransientError, errorMessage } from '../errors/index.js';

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay after the first failure */
  baseDelayMs: number;
  /** Ceiling for any single delay */
  maxDelayMs: number;
  /** 0.2 = delays vary by up to 20% either way */
  jitterRatio: number;
  shouldRetry: (error: unknown) => boolean;
}

export type Sleeper = (ms: number) => Promise<void>;

export interface RetryOptions {
  /** Operation name for log lines */
  label?: string;
  sleep?: Sleeper;
  /** Called before each wait, with the attempt that just failed */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  /** Source of randomness for jitter, in [0, 1) */
  random?: () => number;
}

export const sleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function defaultRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: 3,
    baseDelayMs: 4000,
    maxDelayMs: 10000,
    jitterRatio: 0.2,
    shouldRetry: isTransientError,
    ...overrides,
  };
}

/**
 * Delay to wait after failed attempt `attempt` (1-based)
 *
 * `min(maxDelayMs, baseDelayMs * 2^(attempt-1))`, scaled by a factor in
 * `[1 - jitterRatio, 1 + jitterRatio]` and clamped to `[0, maxDelayMs]`.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const factor = 1 + policy.jitterRatio * (2 * random() - 1);
  const delay = Math.round(exponential * factor);
  return Math.max(0, Math.min(policy.maxDelayMs, delay));
}

/**
 * Run `operation` until it succeeds, a non-retryable error is thrown, or
 * `policy.maxAttempts` attempts have failed. The last error is rethrown.
 *
 * @example
 * ```typescript
 * const vectors = await retryWithBackoff(
 *   () => embedder.embedBatch(texts),
 *   policy,
 *   { label: 'embedBatch' }
 * );
 * ```
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const logger = getLogger();
  const label = options.label ?? 'operation';
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  let attempt = 1;
  for (;;) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!policy.shouldRetry(error)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        logger.error('retry', `${label} failed after ${attempt} attempts`, {
          error: errorMessage(error),
        });
        throw error;
      }

      const delayMs = computeBackoffDelay(attempt, policy, options.random);
      logger.warn('retry', `${label} failed, retrying in ${delayMs}ms`, {
        attempt,
        maxAttempts,
        error: errorMessage(error),
      });
      options.onRetry?.(attempt, error, delayMs);

      await wait(delayMs);
      attempt++;
    }
  }
}
