/**
 * Retry Logic with Configurable Strategies
 *
 * Bounded retries for transient failures of the backing stores:
 * - Multiple retry strategies (exponential, linear, fixed)
 * - Jitter to prevent thundering herd problem
 * - Caller-supplied retryability predicate
 *
 * @example
 * ```typescript
 * const { result } = await retry(
 *   () => collection.findOne({ tokenHash }),
 *   { ...RetryConfigs.store, name: 'findRefreshToken', isRetryable: isTransientStoreError }
 * );
 * ```
 */

import { logger } from '../logger.js';
import { getErrorMessage } from '../errors.js';

export type RetryStrategy = 'exponential' | 'linear' | 'fixed';

export interface RetryConfig {
  /** Maximum number of retry attempts after the first call (default: 3) */
  maxRetries?: number;
  /** Retry strategy (default: 'exponential') */
  strategy?: RetryStrategy;
  /** Base delay in milliseconds (default: 100) */
  baseDelay?: number;
  /** Maximum delay in milliseconds (default: 5000) */
  maxDelay?: number;
  /** Add jitter to prevent thundering herd (default: true) */
  jitter?: boolean;
  /** Name for logging (default: 'Retry') */
  name?: string;
  /** Function to determine if error is retryable (default: all errors are retryable) */
  isRetryable?: (error: unknown) => boolean;
}

export interface RetryResult<T> {
  result: T;
  attempts: number;
  totalDelay: number;
}

/**
 * Thrown once every attempt failed with a retryable error.
 * `lastError` is the failure of the final attempt.
 */
export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(name: string, attempts: number, lastError: unknown) {
    super(`${name}: all ${attempts} attempt(s) failed: ${getErrorMessage(lastError)}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export function calculateDelay(
  attempt: number,
  strategy: RetryStrategy,
  baseDelay: number,
  maxDelay: number
): number {
  let delay: number;

  switch (strategy) {
    case 'linear':
      delay = baseDelay * attempt;
      break;
    case 'fixed':
      delay = baseDelay;
      break;
    case 'exponential':
    default:
      delay = baseDelay * Math.pow(2, attempt - 1);
  }

  return Math.min(delay, maxDelay);
}

// Full jitter: uniform in [0, delay)
function addJitter(delay: number): number {
  return Math.floor(Math.random() * delay);
}

export async function retry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = {}
): Promise<RetryResult<T>> {
  const {
    maxRetries = 3,
    strategy = 'exponential',
    baseDelay = 100,
    maxDelay = 5000,
    jitter = true,
    name = 'Retry',
    isRetryable = () => true,
  } = config;

  let lastError: unknown;
  let totalDelay = 0;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      const result = await fn();

      if (attempt > 0) {
        logger.info(`${name}: Operation succeeded after ${attempt} retry(ies)`, {
          attempts: attempt + 1,
          totalDelay,
        });
      }

      return { result, attempts: attempt + 1, totalDelay };
    } catch (error) {
      lastError = error;

      if (!isRetryable(error)) {
        throw error;
      }

      // Don't delay after the last attempt
      if (attempt < maxRetries) {
        const delay = calculateDelay(attempt + 1, strategy, baseDelay, maxDelay);
        const finalDelay = jitter ? addJitter(delay) : delay;
        totalDelay += finalDelay;

        logger.debug(`${name}: Retrying after ${finalDelay}ms`, {
          attempt: attempt + 1,
          maxRetries,
          strategy,
          error: getErrorMessage(error),
        });

        await new Promise(resolve => setTimeout(resolve, finalDelay));
      }
    }
  }

  logger.error(`${name}: All retries exhausted`, {
    maxRetries,
    totalDelay,
    error: getErrorMessage(lastError),
  });

  throw new RetryExhaustedError(name, maxRetries + 1, lastError);
}

/**
 * Common retry configurations
 */
export const RetryConfigs = {
  /** Store round trips on the request path: small budget, short delays */
  store: {
    maxRetries: 2,
    strategy: 'exponential',
    baseDelay: 50,
    maxDelay: 500,
    jitter: true,
  },

  /** Startup connections (10 attempts, 1s base) */
  startup: {
    maxRetries: 10,
    strategy: 'exponential',
    baseDelay: 1000,
    maxDelay: 30000,
    jitter: true,
  },
} satisfies Record<string, RetryConfig>;
