/**
 * Auth Service Error Codes
 *
 * Complete list of all error codes used by auth-service, with the HTTP
 * status each one surfaces as.
 *
 * Usage: Import constants and use directly with ServiceError
 * ```typescript
 * import { ServiceError } from 'core-service';
 * import { AUTH_ERRORS } from './error-codes.js';
 *
 * throw new ServiceError(AUTH_ERRORS.TokenRevoked, 'Refresh token has been revoked');
 * ```
 *
 * Constants are the single source of truth - array is derived from them
 */
export const AUTH_ERRORS = {
  // Credentials
  InvalidCredentials: 'MSAuthInvalidCredentials',
  AccountLocked: 'MSAuthAccountLocked',

  // Tokens
  TokenExpired: 'MSAuthTokenExpired',
  TokenRevoked: 'MSAuthTokenRevoked',
  TokenNotFound: 'MSAuthTokenNotFound',
  InvalidSignature: 'MSAuthInvalidSignature',
  MalformedToken: 'MSAuthMalformedToken',
  MissingToken: 'MSAuthMissingToken',

  // Authorization
  Forbidden: 'MSAuthForbidden',

  // Admission
  RateLimited: 'MSAuthRateLimited',
  Overloaded: 'MSAuthOverloaded',
  QueueTimeout: 'MSAuthQueueTimeout',
  StoreUnavailable: 'MSAuthStoreUnavailable',

  // Requests
  ValidationFailed: 'MSAuthValidationFailed',
  NotFound: 'MSAuthNotFound',
  MethodNotAllowed: 'MSAuthMethodNotAllowed',

  // Role administration
  RoleNotFound: 'MSAuthRoleNotFound',
  PermissionNotFound: 'MSAuthPermissionNotFound',
  SubjectNotFound: 'MSAuthSubjectNotFound',
  SystemRoleProtected: 'MSAuthSystemRoleProtected',

  InternalError: 'MSAuthInternalError',
} as const;

export type AuthErrorCode = typeof AUTH_ERRORS[keyof typeof AUTH_ERRORS];

/**
 * Array derived from constants - no duplication, automatically synced
 */
export const AUTH_ERROR_CODES: readonly AuthErrorCode[] = Object.values(AUTH_ERRORS);

export const AUTH_ERROR_STATUS: Record<AuthErrorCode, number> = {
  [AUTH_ERRORS.InvalidCredentials]: 401,
  [AUTH_ERRORS.AccountLocked]: 423,
  [AUTH_ERRORS.TokenExpired]: 401,
  [AUTH_ERRORS.TokenRevoked]: 401,
  [AUTH_ERRORS.TokenNotFound]: 401,
  [AUTH_ERRORS.InvalidSignature]: 401,
  [AUTH_ERRORS.MalformedToken]: 401,
  [AUTH_ERRORS.MissingToken]: 401,
  [AUTH_ERRORS.Forbidden]: 403,
  [AUTH_ERRORS.RateLimited]: 429,
  [AUTH_ERRORS.Overloaded]: 503,
  [AUTH_ERRORS.QueueTimeout]: 503,
  [AUTH_ERRORS.StoreUnavailable]: 503,
  [AUTH_ERRORS.ValidationFailed]: 400,
  [AUTH_ERRORS.NotFound]: 404,
  [AUTH_ERRORS.MethodNotAllowed]: 405,
  [AUTH_ERRORS.RoleNotFound]: 404,
  [AUTH_ERRORS.PermissionNotFound]: 404,
  [AUTH_ERRORS.SubjectNotFound]: 404,
  [AUTH_ERRORS.SystemRoleProtected]: 409,
  [AUTH_ERRORS.InternalError]: 500,
};

export function isAuthErrorCode(code: string): code is AuthErrorCode {
  return AUTH_ERROR_CODES.some(known => known === code);
}
