/**
 * Security Event Logging
 *
 * Authentication and authorization events go to a dedicated `security`
 * channel so they can be routed and retained separately. Never pass raw
 * tokens, hashes or passwords here.
 */

import { createChildLogger } from 'core-service';

const security = createChildLogger({ channel: 'security' });

export type LoginFailureReason = 'user_not_found' | 'invalid_password' | 'account_inactive' | 'account_locked';

export const securityLogger = {
  loginSucceeded(data: { subjectId: string; email: string; ipAddress?: string; userAgent?: string }): void {
    security.info('login_success', { eventType: 'authentication', ...data });
  },

  loginFailed(data: { email: string; reason: LoginFailureReason; ipAddress?: string; failedCount?: number }): void {
    security.warn('login_failed', { eventType: 'authentication', ...data });
  },

  accountLocked(data: { email: string; ipAddress?: string; failedCount: number; lockSeconds: number }): void {
    security.warn('account_locked', { eventType: 'security', ...data });
  },

  tokenReuse(data: { subjectId: string; tokenId: string; revokeAll: boolean }): void {
    security.warn('token_reuse', { eventType: 'security', ...data });
  },

  loggedOut(data: { subjectId: string; jti: string; refreshTokenRevoked: boolean }): void {
    security.info('logout', { eventType: 'authentication', ...data });
  },

  sessionsRevoked(data: { subjectId: string; refreshTokens: number; accessTokens: number; reason: string }): void {
    security.warn('sessions_revoked', { eventType: 'security', ...data });
  },

  permissionDenied(data: { subjectId: string; permission: string }): void {
    security.warn('permission_denied', { eventType: 'authorization', ...data });
  },

  rateLimitExceeded(data: { clientId: string; endpoint: string; limit: number }): void {
    security.warn('rate_limit_exceeded', { eventType: 'security', ...data });
  },
};
