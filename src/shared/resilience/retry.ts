/**
 * =============================================================================
 * RETRY WITH BACKOFF - Transient Failure Handling
 * =============================================================================
 *
 * Re-runs an operation that failed with a transient signal (rate limit,
 * network blip, 5xx) with exponential backoff between attempts.
 *
 * CLASSIFICATION:
 * - MapsApiError whose signal is in policy.transientSignals → retried
 * - Any other error → thrown immediately (permanent)
 * - Attempts exhausted → RetryExhaustedError wrapping the last error
 *
 * USAGE:
 * ```typescript
 * const policy = createRetryPolicy({ maxAttempts: 3, baseDelayMs: 500 });
 *
 * const element = await retryWithBackoff(
 *   () => googleMaps.distanceMatrix(origin, destination, 'driving'),
 *   policy,
 *   { operation: 'distance:driving' }
 * );
 * ```
 * =============================================================================
 */

import { logger } from '../services/logger.service';
import { isMapsApiError, MapsApiError, RetryExhaustedError } from '../../core/errors/AppError';
import { DEFAULT_TRANSIENT_SIGNALS } from '../../config/environment';

/**
 * Retry policy configuration
 */
export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Delay before the second attempt (ms) */
  baseDelayMs: number;
  /** Factor applied to the delay after each failed attempt */
  backoffMultiplier: number;
  /** Upper bound for a single delay (ms) */
  maxDelayMs: number;
  /** Failure signals considered transient */
  transientSignals: ReadonlySet<string>;
}

export type RetryPolicyOptions = Partial<Omit<RetryPolicy, 'transientSignals'>> & {
  transientSignals?: Iterable<string>;
};

/**
 * Default configuration
 */
const DEFAULT_POLICY: Omit<RetryPolicy, 'transientSignals'> = {
  maxAttempts: 3,
  baseDelayMs: 500,
  backoffMultiplier: 2,
  maxDelayMs: 8000
};

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) =>
  new Promise(resolve => {
    setTimeout(resolve, ms);
  });

export interface RetryOptions {
  /** Name used in log lines and in RetryExhaustedError */
  operation?: string;
  /** Injected in tests to avoid real waiting */
  sleep?: SleepFn;
  /** Called before each backoff wait */
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

export function createRetryPolicy(options: RetryPolicyOptions = {}): RetryPolicy {
  return {
    maxAttempts: options.maxAttempts ?? DEFAULT_POLICY.maxAttempts,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_POLICY.baseDelayMs,
    backoffMultiplier: options.backoffMultiplier ?? DEFAULT_POLICY.backoffMultiplier,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_POLICY.maxDelayMs,
    transientSignals: new Set(options.transientSignals ?? DEFAULT_TRANSIENT_SIGNALS)
  };
}

/**
 * Delay to wait after the given failed attempt (1-based)
 */
export function computeBackoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

export function isTransientError(error: unknown, policy: RetryPolicy): error is MapsApiError {
  return isMapsApiError(error) && policy.transientSignals.has(error.signal);
}

/**
 * Run `fn`, retrying transient failures according to `policy`.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const operation = options.operation ?? 'operation';
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!isTransientError(error, policy)) {
        throw error;
      }

      lastError = error;

      if (attempt === maxAttempts) {
        break;
      }

      const delayMs = computeBackoffDelay(policy, attempt);
      logger.warn(`${operation} attempt ${attempt}/${maxAttempts} failed, retrying in ${delayMs}ms`, {
        signal: error.signal
      });
      options.onRetry?.(attempt, delayMs, error);
      await wait(delayMs);
    }
  }

  throw new RetryExhaustedError(operation, maxAttempts, lastError);
}
