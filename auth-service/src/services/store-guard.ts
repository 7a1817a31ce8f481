/**
 * Store Guard
 *
 * Bounded retry for transient store failures. When retries run out the
 * call fails with StoreUnavailable, and every caller treats that as a
 * denial. Business failures pass through untouched.
 */

import { logger, retry, RetryConfigs, RetryExhaustedError, ServiceError, isTransientStoreError } from 'core-service';
import { AUTH_ERRORS } from '../error-codes.js';

/** Unset fields fall back to `RetryConfigs.store` */
export interface StoreGuardOptions {
  /** Retries after the first attempt */
  attempts?: number;
  baseDelayMs?: number;
  /** Defaults to ten times the base delay */
  maxDelayMs?: number;
}

export class StoreGuard {
  constructor(private readonly options: StoreGuardOptions = {}) {}

  async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const baseDelay = this.options.baseDelayMs ?? RetryConfigs.store.baseDelay;

    try {
      const { result } = await retry(fn, {
        ...RetryConfigs.store,
        maxRetries: this.options.attempts ?? RetryConfigs.store.maxRetries,
        baseDelay,
        maxDelay: this.options.maxDelayMs ?? baseDelay * 10,
        name: operation,
        isRetryable: isTransientStoreError,
      });
      return result;
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        logger.error('Store unavailable', { operation, attempts: error.attempts, error: error.message });
        throw new ServiceError(AUTH_ERRORS.StoreUnavailable, 'Service temporarily unavailable', {
          retryAfter: 1,
          details: { operation },
          cause: error,
        });
      }
      throw error;
    }
  }
}
