/**
 * Session Lifecycle Service
 *
 * Login, refresh with rotation, logout and revoke-all over the token
 * codec, the credential store and the shared registry/cache/guard state.
 *
 * A refresh token instance moves ISSUED → ACTIVE → ROTATED | REVOKED | EXPIRED;
 * every terminal state is final and rotation starts a new instance.
 *
 * Failures are ServiceErrors with AUTH_ERRORS codes. Not found, revoked
 * and expired are distinct outcomes.
 */

import {
  ServiceError,
  TokenVerificationError,
  type AccessTokenClaims,
  type TokenCodec,
} from 'core-service';
import { and, can, isAuthenticated } from 'access-engine';
import { AUTH_ERRORS } from '../error-codes.js';
import { securityLogger } from '../security-logger.js';
import type { RbacRepository } from '../repositories/rbac-repository.js';
import type { SessionRepository } from '../repositories/session-repository.js';
import type { UserRepository } from '../repositories/user-repository.js';
import type {
  AuthenticatedPrincipal,
  LoginInput,
  RefreshTokenRecord,
  RequestContext,
  ResolvedPermissions,
  SessionSummary,
  TokenPair,
  UserRecord,
} from '../types.js';
import { addSeconds, hashToken, normalizeEmail } from '../utils.js';
import type { CredentialVerifier } from './credential-verifier.js';
import type { AttemptReservation, LoginGuard } from './login-guard.js';
import type { PermissionCache } from './permission-cache.js';
import type { RevocationRegistry } from './revocation-registry.js';
import type { StoreGuard } from './store-guard.js';

export interface SessionServiceOptions {
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  /** Revoke every session of a subject when a rotated refresh token is replayed */
  refreshReuseRevokesAll: boolean;
  now?: () => Date;
}

export interface SessionServiceDeps {
  codec: TokenCodec;
  users: UserRepository;
  sessions: SessionRepository;
  rbac: RbacRepository;
  registry: RevocationRegistry;
  permissionCache: PermissionCache;
  loginGuard: LoginGuard;
  verifier: CredentialVerifier;
  storeGuard: StoreGuard;
}

export interface RevokeAllResult {
  refreshTokensRevoked: number;
  accessTokensRevoked: number;
}

const INVALID_CREDENTIALS_MESSAGE = 'Invalid email or password';

function invalidCredentials(): ServiceError {
  return new ServiceError(AUTH_ERRORS.InvalidCredentials, INVALID_CREDENTIALS_MESSAGE);
}

/** Map a codec failure onto the public error taxonomy */
export function toTokenError(error: unknown): unknown {
  if (!(error instanceof TokenVerificationError)) return error;

  switch (error.reason) {
    case 'Expired':
      return new ServiceError(AUTH_ERRORS.TokenExpired, 'Access token has expired');
    case 'InvalidSignature':
      return new ServiceError(AUTH_ERRORS.InvalidSignature, 'Access token signature is invalid');
    case 'Malformed':
      return new ServiceError(AUTH_ERRORS.MalformedToken, 'Access token is malformed');
  }
}

export class SessionService {
  private readonly now: () => Date;

  constructor(
    private readonly deps: SessionServiceDeps,
    private readonly options: SessionServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  // ═══════════════════════════════════════════════════════════════════
  // Login
  // ═══════════════════════════════════════════════════════════════════

  async login(input: LoginInput): Promise<TokenPair> {
    const { loginGuard, storeGuard, users } = this.deps;
    const email = normalizeEmail(input.email);

    const lock = await loginGuard.lockStatus(email);
    if (lock.locked) {
      securityLogger.loginFailed({ email, reason: 'account_locked', ipAddress: input.ipAddress });
      throw new ServiceError(AUTH_ERRORS.AccountLocked, 'Account is temporarily locked', {
        retryAfter: lock.retryAfter,
      });
    }

    const reservation = await loginGuard.reserveAttempt(email);
    if (!reservation.allowed) {
      securityLogger.loginFailed({
        email,
        reason: 'account_locked',
        ipAddress: input.ipAddress,
        failedCount: reservation.attempt,
      });
      throw new ServiceError(AUTH_ERRORS.AccountLocked, 'Account is temporarily locked', {
        retryAfter: reservation.retryAfter,
      });
    }

    const user = await storeGuard.run('users.findByEmail', () => users.findByEmail(email));
    const subject = await this.verifyCredentials(user, email, input, reservation);

    await loginGuard.reset(email);

    const resolved = await this.resolvePermissions(subject.id);
    const access = this.deps.codec.issueAccessToken(
      subject.id,
      resolved.roles,
      resolved.permissions,
      this.options.accessTokenTtlSeconds
    );
    const refreshToken = this.deps.codec.issueRefreshToken();
    const at = this.now();

    // Registered before the session commits so a concurrent revoke-all sees it
    await this.deps.registry.registerActive(
      subject.id,
      access.jti,
      access.expiresAt,
      this.options.accessTokenTtlSeconds
    );
    await storeGuard.run('sessions.recordLogin', () =>
      this.deps.sessions.recordLogin({
        subjectId: subject.id,
        refreshToken: {
          subjectId: subject.id,
          tokenHash: hashToken(refreshToken),
          deviceInfo: input.deviceInfo ?? null,
          expiresAt: addSeconds(at, this.options.refreshTokenTtlSeconds),
        },
        at,
        ipAddress: input.ipAddress,
        userAgent: input.userAgent,
      })
    );

    securityLogger.loginSucceeded({
      subjectId: subject.id,
      email,
      ipAddress: input.ipAddress,
      userAgent: input.userAgent,
    });

    return this.tokenPair(access.token, refreshToken);
  }

  /**
   * Every failure path counts against the lockout and answers with the
   * same InvalidCredentials, whatever the actual reason.
   */
  private async verifyCredentials(
    user: UserRecord | null,
    email: string,
    input: LoginInput,
    reservation: AttemptReservation
  ): Promise<UserRecord> {
    const { loginGuard, verifier } = this.deps;

    if (!user || user.deletedAt) {
      await verifier.verifyDummy(input.password);
      const failure = await loginGuard.recordFailure(email, reservation);
      securityLogger.loginFailed({
        email,
        reason: 'user_not_found',
        ipAddress: input.ipAddress,
        failedCount: failure.failedCount,
      });
      throw invalidCredentials();
    }

    const valid = await verifier.verify(input.password, user.passwordHash);
    if (!valid) {
      const failure = await loginGuard.recordFailure(email, reservation);
      await this.deps.storeGuard.run('sessions.recordLoginAttempt', () =>
        this.deps.sessions.recordLoginAttempt({
          subjectId: user.id,
          success: false,
          ipAddress: input.ipAddress,
          userAgent: input.userAgent,
        })
      );

      if (failure.locked) {
        securityLogger.accountLocked({
          email,
          ipAddress: input.ipAddress,
          failedCount: failure.failedCount,
          lockSeconds: (await loginGuard.lockStatus(email)).retryAfter,
        });
      } else {
        securityLogger.loginFailed({
          email,
          reason: 'invalid_password',
          ipAddress: input.ipAddress,
          failedCount: failure.failedCount,
        });
      }
      throw invalidCredentials();
    }

    if (!user.isActive) {
      securityLogger.loginFailed({ email, reason: 'account_inactive', ipAddress: input.ipAddress });
      throw invalidCredentials();
    }

    return user;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Refresh
  // ═══════════════════════════════════════════════════════════════════

  async refresh(refreshToken: string): Promise<TokenPair> {
    const { storeGuard, sessions, users } = this.deps;
    const tokenHash = hashToken(refreshToken);

    const record = await storeGuard.run('sessions.findByHash', () => sessions.findByHash(tokenHash));
    if (!record) {
      throw new ServiceError(AUTH_ERRORS.TokenNotFound, 'Refresh token not recognised');
    }

    if (record.revokedAt) {
      await this.handleReuse(record);
      throw new ServiceError(AUTH_ERRORS.TokenRevoked, 'Refresh token has been revoked');
    }

    const at = this.now();
    if (record.expiresAt.getTime() <= at.getTime()) {
      throw new ServiceError(AUTH_ERRORS.TokenExpired, 'Refresh token has expired');
    }

    const user = await storeGuard.run('users.findById', () => users.findById(record.subjectId));
    if (!user || !user.isActive || user.deletedAt) {
      throw new ServiceError(AUTH_ERRORS.InvalidCredentials, 'Account is not active');
    }

    const resolved = await this.resolvePermissions(record.subjectId);
    const nextRefreshToken = this.deps.codec.issueRefreshToken();
    const access = this.deps.codec.issueAccessToken(
      record.subjectId,
      resolved.roles,
      resolved.permissions,
      this.options.accessTokenTtlSeconds
    );
    await this.deps.registry.registerActive(
      record.subjectId,
      access.jti,
      access.expiresAt,
      this.options.accessTokenTtlSeconds
    );

    const rotated = await storeGuard.run('sessions.rotate', () =>
      sessions.rotate(
        tokenHash,
        {
          subjectId: record.subjectId,
          tokenHash: hashToken(nextRefreshToken),
          deviceInfo: record.deviceInfo,
          expiresAt: addSeconds(at, this.options.refreshTokenTtlSeconds),
        },
        at
      )
    );

    // Lost the race to a concurrent refresh of the same token
    if (!rotated) {
      throw new ServiceError(AUTH_ERRORS.TokenRevoked, 'Refresh token has been revoked');
    }

    return this.tokenPair(access.token, nextRefreshToken);
  }

  private async handleReuse(record: RefreshTokenRecord): Promise<void> {
    const revokeAll = this.options.refreshReuseRevokesAll;
    securityLogger.tokenReuse({ subjectId: record.subjectId, tokenId: record.id, revokeAll });

    if (revokeAll) {
      await this.revokeAll(record.subjectId, { reason: 'token_reuse' });
    }
  }

  // ═══════════════════════════════════════════════════════════════════
  // Logout & Revoke-all
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Blacklist the access token for its remaining lifetime, drop it from
   * the active set and, when given, revoke the subject's refresh token.
   */
  async logout(accessToken: string, refreshToken?: string): Promise<void> {
    const claims = this.verify(accessToken);
    const { registry } = this.deps;

    await registry.blacklist(claims.jti, this.deps.codec.remainingLifetime(claims));
    await registry.removeActive(claims.sub, claims.jti, claims.exp);

    let refreshTokenRevoked = false;
    if (refreshToken) {
      refreshTokenRevoked = await this.deps.storeGuard.run('sessions.revokeByHash', () =>
        this.deps.sessions.revokeByHash(hashToken(refreshToken), claims.sub, this.now())
      );
    }

    securityLogger.loggedOut({ subjectId: claims.sub, jti: claims.jti, refreshTokenRevoked });
  }

  /**
   * Revoke every refresh token in the credential store, then blacklist
   * every active access token. Safe to repeat after a partial failure.
   */
  async revokeAll(subjectId: string, context: RequestContext & { reason?: string } = {}): Promise<RevokeAllResult> {
    const refreshTokensRevoked = await this.deps.storeGuard.run('sessions.revokeAllForSubject', () =>
      this.deps.sessions.revokeAllForSubject(subjectId, this.now(), { ipAddress: context.ipAddress })
    );
    const jtis = await this.deps.registry.revokeActiveTokens(subjectId, this.options.accessTokenTtlSeconds);

    securityLogger.sessionsRevoked({
      subjectId,
      refreshTokens: refreshTokensRevoked,
      accessTokens: jtis.length,
      reason: context.reason ?? 'requested',
    });

    return { refreshTokensRevoked, accessTokensRevoked: jtis.length };
  }

  async listSessions(subjectId: string): Promise<SessionSummary[]> {
    const records = await this.deps.storeGuard.run('sessions.listActive', () =>
      this.deps.sessions.listActive(subjectId, this.now())
    );

    return records.map(record => ({
      id: record.id,
      deviceInfo: record.deviceInfo,
      createdAt: record.createdAt,
      expiresAt: record.expiresAt,
    }));
  }

  // ═══════════════════════════════════════════════════════════════════
  // Authentication & Authorization
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Verify the access token, reject it if blacklisted, and attach the
   * subject's current roles and permissions.
   */
  async authenticate(accessToken: string): Promise<AuthenticatedPrincipal> {
    const claims = this.verify(accessToken);

    if (await this.deps.registry.isBlacklisted(claims.jti)) {
      throw new ServiceError(AUTH_ERRORS.TokenRevoked, 'Access token has been revoked');
    }

    const resolved = await this.resolvePermissions(claims.sub);
    return {
      subjectId: claims.sub,
      roles: resolved.roles,
      permissions: resolved.permissions,
      jti: claims.jti,
      exp: claims.exp,
    };
  }

  async authorize(principal: AuthenticatedPrincipal, permission: string): Promise<void> {
    const allowed = await and(isAuthenticated, can(permission))(principal);
    if (!allowed) {
      securityLogger.permissionDenied({ subjectId: principal.subjectId, permission });
      throw new ServiceError(AUTH_ERRORS.Forbidden, 'Insufficient permissions', { details: { permission } });
    }
  }

  // ═══════════════════════════════════════════════════════════════════
  // Helpers
  // ═══════════════════════════════════════════════════════════════════

  private verify(accessToken: string): AccessTokenClaims {
    try {
      return this.deps.codec.verifyAccessToken(accessToken);
    } catch (error) {
      throw toTokenError(error);
    }
  }

  private resolvePermissions(subjectId: string): Promise<ResolvedPermissions> {
    return this.deps.permissionCache.getOrLoad(subjectId, () =>
      this.deps.storeGuard.run('rbac.resolvePermissions', () =>
        this.deps.rbac.resolvePermissions(subjectId, this.now())
      )
    );
  }

  private tokenPair(accessToken: string, refreshToken: string): TokenPair {
    return {
      accessToken,
      refreshToken,
      tokenType: 'Bearer',
      expiresIn: this.options.accessTokenTtlSeconds,
    };
  }
}
