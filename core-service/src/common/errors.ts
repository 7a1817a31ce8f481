/**
 * Error Handling Utilities
 *
 * - Generic error utilities (getErrorMessage, normalizeError)
 * - ServiceError: typed business failure with a stable code
 * - Transient store error classification
 */

// ═══════════════════════════════════════════════════════════════════
// Generic Error Utilities
// ═══════════════════════════════════════════════════════════════════

/**
 * Extract error message from any error type
 *
 * @example
 * ```typescript
 * try {
 *   await repository.findByHash(hash);
 * } catch (error) {
 *   logger.error('Lookup failed', { error: getErrorMessage(error) });
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Create a standardized error object from any error type
 */
export function normalizeError(error: unknown): { message: string; name?: string; stack?: string } {
  if (error instanceof Error) {
    return {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };
  }
  return {
    message: getErrorMessage(error),
  };
}

// ═══════════════════════════════════════════════════════════════════
// Service Error
// ═══════════════════════════════════════════════════════════════════

export interface ServiceErrorOptions {
  /** Context for logs. Never serialized to clients. */
  details?: Record<string, unknown>;
  /** Suggested delay before the caller retries, in seconds */
  retryAfter?: number;
  cause?: unknown;
}

/**
 * Deterministic business failure carrying a stable machine-readable code.
 *
 * ServiceErrors are outcomes, not faults: they are surfaced to the caller
 * as-is and are never retried automatically.
 *
 * @example
 * ```typescript
 * throw new ServiceError(AUTH_ERRORS.TokenRevoked, 'Refresh token has been revoked');
 * throw new ServiceError(AUTH_ERRORS.RateLimited, 'Too many requests', { retryAfter: 42 });
 * ```
 */
export class ServiceError<Code extends string = string> extends Error {
  readonly code: Code;
  readonly details: Record<string, unknown>;
  readonly retryAfter?: number;

  constructor(code: Code, message: string, options: ServiceErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ServiceError';
    this.code = code;
    this.details = options.details ?? {};
    if (options.retryAfter !== undefined) {
      this.retryAfter = options.retryAfter;
    }
  }
}

export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

/**
 * Narrow to a ServiceError with one specific code
 */
export function hasErrorCode<Code extends string>(error: unknown, code: Code): error is ServiceError<Code> {
  return error instanceof ServiceError && error.code === code;
}

// ═══════════════════════════════════════════════════════════════════
// Transient Store Errors
// ═══════════════════════════════════════════════════════════════════

const TRANSIENT_NAME_PATTERN = /Network|Timeout|Connection|Socket|ServerSelection|ClientClosed|PoolCleared|Reconnect/i;
const TRANSIENT_LABELS = ['TransientTransactionError', 'RetryableWriteError', 'ResetPool'];
const TRANSIENT_SYSCALL_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'EHOSTUNREACH', 'ENOTFOUND']);

function hasTransientLabel(error: Error): boolean {
  if (!('hasErrorLabel' in error) || typeof error.hasErrorLabel !== 'function') return false;
  const check = error.hasErrorLabel;
  return TRANSIENT_LABELS.some(label => check.call(error, label) === true);
}

/**
 * True for failures of the backing stores that may succeed on retry:
 * MongoDB network/selection errors and labelled transient errors,
 * Redis socket/timeout/closed-client errors, and raw socket errno codes.
 * ServiceErrors are never transient.
 */
export function isTransientStoreError(error: unknown): boolean {
  if (!(error instanceof Error) || error instanceof ServiceError) return false;

  if (hasTransientLabel(error)) return true;
  if (TRANSIENT_NAME_PATTERN.test(error.name)) return true;
  if ('code' in error && typeof error.code === 'string' && TRANSIENT_SYSCALL_CODES.has(error.code)) return true;

  return error.cause !== undefined && error.cause !== error && isTransientStoreError(error.cause);
}
