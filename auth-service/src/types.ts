/**
 * Authentication Service Types
 */

import type { Principal } from 'access-engine';

// ═══════════════════════════════════════════════════════════════════
// Stored Records
// ═══════════════════════════════════════════════════════════════════

export interface UserRecord {
  id: string;
  email: string;
  passwordHash: string;
  isActive: boolean;
  lastLoginAt: Date | null;
  deletedAt: Date | null;
}

/**
 * Durable refresh token record. Holds the SHA-256 of the token, never
 * the token itself; only `revokedAt` ever changes after insert.
 */
export interface RefreshTokenRecord {
  id: string;
  subjectId: string;
  tokenHash: string;
  deviceInfo: string | null;
  expiresAt: Date;
  revokedAt: Date | null;
  createdAt: Date;
}

export type NewRefreshToken = Pick<RefreshTokenRecord, 'subjectId' | 'tokenHash' | 'deviceInfo' | 'expiresAt'>;

export interface RoleRecord {
  id: string;
  name: string;
  isSystem: boolean;
  deletedAt: Date | null;
}

export interface PermissionRecord {
  id: string;
  resource: string;
  action: string;
  deletedAt: Date | null;
}

export interface ResolvedPermissions {
  roles: string[];
  permissions: string[];
}

// ═══════════════════════════════════════════════════════════════════
// Request Context
// ═══════════════════════════════════════════════════════════════════

export interface RequestContext {
  ipAddress?: string;
  userAgent?: string;
}

export interface LoginRecord extends RequestContext {
  subjectId: string;
  refreshToken: NewRefreshToken;
  at: Date;
}

export interface LoginAttempt extends RequestContext {
  subjectId: string;
  success: boolean;
}

// ═══════════════════════════════════════════════════════════════════
// Inputs & Responses
// ═══════════════════════════════════════════════════════════════════

export interface LoginInput extends RequestContext {
  email: string;
  password: string;
  deviceInfo?: string;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: 'Bearer';
  /** Access token lifetime in seconds */
  expiresIn: number;
}

export interface SessionSummary {
  id: string;
  deviceInfo: string | null;
  createdAt: Date;
  expiresAt: Date;
}

/** Principal authenticated from a live access token */
export interface AuthenticatedPrincipal extends Principal {
  jti: string;
  /** Token expiry, epoch seconds */
  exp: number;
}

// ═══════════════════════════════════════════════════════════════════
// Rate Limiting
// ═══════════════════════════════════════════════════════════════════

export type EndpointClass = 'login' | 'refresh' | 'logout' | 'default';

export interface RateLimitRule {
  limit: number;
  windowSeconds: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Seconds until the current window resets */
  retryAfter: number;
}
