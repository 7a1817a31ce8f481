/**
 * Session Lifecycle Tests
 *
 * Login, rotation, logout and revoke-all over in-memory stores.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ServiceError } from 'core-service';
import { AUTH_ERRORS } from '../src/error-codes.js';
import { REGISTRY_KEYS } from '../src/services/revocation-registry.js';
import { hashToken } from '../src/utils.js';
import { createTestAuth, TEST_PASSWORD, type TestAuth } from './helpers/fakes.js';

const T0 = new Date('2026-03-01T00:00:00Z');

describe('SessionService', () => {
  let auth: TestAuth;
  let subjectId: string;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(T0);

    auth = createTestAuth();
    const user = await auth.users.add('alice@example.com');
    subjectId = user.id;

    const role = await auth.rbac.seedRole('member', ['profile:read', 'sessions:list']);
    await auth.rbac.assignRole(subjectId, role.id, null);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  const login = (password = TEST_PASSWORD, deviceInfo?: string) =>
    auth.sessions.login({ email: 'alice@example.com', password, deviceInfo, ipAddress: '10.0.0.1' });

  // ═══════════════════════════════════════════════════════════════════
  // LOGIN
  // ═══════════════════════════════════════════════════════════════════

  describe('login', () => {
    it('should issue a token pair and persist the hashed refresh token', async () => {
      const pair = await auth.sessions.login({ email: '  Alice@Example.COM ', password: TEST_PASSWORD });

      expect(pair.tokenType).toBe('Bearer');
      expect(pair.expiresIn).toBe(1800);
      expect(auth.sessionStore.tokens).toHaveLength(1);
      expect(auth.sessionStore.tokens[0].tokenHash).toBe(hashToken(pair.refreshToken));
      expect(auth.sessionStore.tokens[0].expiresAt).toEqual(new Date(T0.getTime() + 604800 * 1000));
      expect(auth.sessionStore.audit).toEqual([{ subjectId, action: 'login' }]);

      const claims = auth.codec.verifyAccessToken(pair.accessToken);
      expect(claims.sub).toBe(subjectId);
      expect(claims.roles).toEqual(['member']);
      expect(claims.permissions).toEqual(['profile:read', 'sessions:list']);
      expect(await auth.registry.activeTokens(subjectId)).toEqual([claims.jti]);
    });

    it('should reject a wrong password with InvalidCredentials', async () => {
      await expect(login('wrong-password')).rejects.toMatchObject({ code: AUTH_ERRORS.InvalidCredentials });
      expect(auth.sessionStore.attempts).toEqual([
        { subjectId, success: false, ipAddress: '10.0.0.1', userAgent: undefined },
      ]);
    });

    it('should reject an unknown e-mail the same way and count the failure', async () => {
      await expect(
        auth.sessions.login({ email: 'ghost@example.com', password: TEST_PASSWORD })
      ).rejects.toMatchObject({ code: AUTH_ERRORS.InvalidCredentials, message: 'Invalid email or password' });

      expect(await auth.kv.get('failed_login:ghost@example.com')).toBe('1');
    });

    it('should reject an inactive account with InvalidCredentials', async () => {
      await auth.users.add('inactive@example.com', TEST_PASSWORD, { isActive: false });

      await expect(
        auth.sessions.login({ email: 'inactive@example.com', password: TEST_PASSWORD })
      ).rejects.toMatchObject({ code: AUTH_ERRORS.InvalidCredentials });
    });

    it('should lock the account after five failures, even for the right password', async () => {
      for (let i = 0; i < 5; i++) {
        await expect(login('wrong-password')).rejects.toMatchObject({ code: AUTH_ERRORS.InvalidCredentials });
      }

      await expect(login()).rejects.toMatchObject({ code: AUTH_ERRORS.AccountLocked, retryAfter: 1800 });
    });

    it('should lift the lock once the lockout duration has passed', async () => {
      for (let i = 0; i < 5; i++) {
        await expect(login('wrong-password')).rejects.toMatchObject({ code: AUTH_ERRORS.InvalidCredentials });
      }

      vi.setSystemTime(new Date(T0.getTime() + 1800 * 1000));
      await expect(login()).resolves.toMatchObject({ tokenType: 'Bearer' });
    });

    it('should verify at most five passwords under a burst of concurrent guesses', async () => {
      const verify = vi.spyOn(auth.verifier, 'verify');

      const results = await Promise.allSettled(Array.from({ length: 8 }, () => login('wrong-password')));

      const codes = results.map(result =>
        result.status === 'rejected' && result.reason instanceof ServiceError ? result.reason.code : result.status
      );
      expect(codes.filter(code => code === AUTH_ERRORS.InvalidCredentials)).toHaveLength(5);
      expect(codes.filter(code => code === AUTH_ERRORS.AccountLocked)).toHaveLength(3);
      expect(verify).toHaveBeenCalledTimes(5);
      expect(auth.sessionStore.attempts).toHaveLength(5);
      expect(await auth.kv.exists('lockout:alice@example.com')).toBe(true);
    });

    it('should reject a login whose session is revoked while it is being recorded', async () => {
      const recordLogin = auth.sessionStore.recordLogin.bind(auth.sessionStore);
      vi.spyOn(auth.sessionStore, 'recordLogin').mockImplementation(async record => {
        await recordLogin(record);
        await auth.sessions.revokeAll(subjectId);
      });

      const pair = await login();

      await expect(auth.sessions.authenticate(pair.accessToken)).rejects.toMatchObject({
        code: AUTH_ERRORS.TokenRevoked,
      });
    });

    it('should reset the failure counter after a successful login', async () => {
      await expect(login('wrong-password')).rejects.toMatchObject({ code: AUTH_ERRORS.InvalidCredentials });
      await login();

      expect(await auth.kv.get('failed_login:alice@example.com')).toBeNull();
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // REFRESH ROTATION
  // ═══════════════════════════════════════════════════════════════════

  describe('refresh', () => {
    it('should rotate A to B to C and reject every superseded token', async () => {
      const a = await login();
      const b = await auth.sessions.refresh(a.refreshToken);

      await expect(auth.sessions.refresh(a.refreshToken)).rejects.toMatchObject({ code: AUTH_ERRORS.TokenRevoked });

      const c = await auth.sessions.refresh(b.refreshToken);
      expect(c.refreshToken).not.toBe(b.refreshToken);

      await expect(auth.sessions.refresh(b.refreshToken)).rejects.toMatchObject({ code: AUTH_ERRORS.TokenRevoked });
      await expect(auth.sessions.refresh(c.refreshToken)).resolves.toMatchObject({ tokenType: 'Bearer' });
    });

    it('should let exactly one of several concurrent refreshes win', async () => {
      const pair = await login();

      const results = await Promise.allSettled(
        Array.from({ length: 5 }, () => auth.sessions.refresh(pair.refreshToken))
      );

      const fulfilled = results.filter(result => result.status === 'fulfilled');
      const rejected = results.filter(result => result.status === 'rejected');
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(4);
      for (const result of rejected) {
        expect(result.reason).toMatchObject({ code: AUTH_ERRORS.TokenRevoked });
      }

      expect(auth.sessionStore.tokens).toHaveLength(2);
      expect(auth.sessionStore.tokens.filter(token => token.revokedAt === null)).toHaveLength(1);
    });

    it('should tell unknown, revoked and expired tokens apart', async () => {
      await expect(auth.sessions.refresh('not-a-real-token')).rejects.toMatchObject({
        code: AUTH_ERRORS.TokenNotFound,
      });

      const pair = await login();
      vi.setSystemTime(new Date(T0.getTime() + 604800 * 1000));

      await expect(auth.sessions.refresh(pair.refreshToken)).rejects.toMatchObject({
        code: AUTH_ERRORS.TokenExpired,
      });
    });

    it('should register the new access token as active', async () => {
      const pair = await login();
      const next = await auth.sessions.refresh(pair.refreshToken);

      const first = auth.codec.verifyAccessToken(pair.accessToken);
      const second = auth.codec.verifyAccessToken(next.accessToken);
      expect((await auth.registry.activeTokens(subjectId)).sort()).toEqual([first.jti, second.jti].sort());
    });

    it('should reject the new access token when revoke-all lands right after the rotation', async () => {
      const pair = await login();
      const rotate = auth.sessionStore.rotate.bind(auth.sessionStore);
      vi.spyOn(auth.sessionStore, 'rotate').mockImplementation(async (oldHash, next, at) => {
        const rotated = await rotate(oldHash, next, at);
        await auth.sessions.revokeAll(subjectId);
        return rotated;
      });

      const next = await auth.sessions.refresh(pair.refreshToken);

      await expect(auth.sessions.authenticate(next.accessToken)).rejects.toMatchObject({
        code: AUTH_ERRORS.TokenRevoked,
      });
      await expect(auth.sessions.refresh(next.refreshToken)).rejects.toMatchObject({
        code: AUTH_ERRORS.TokenRevoked,
      });
    });

    it('should refuse to refresh for a deactivated account', async () => {
      const pair = await login();
      const user = auth.users.users.get(subjectId);
      if (user) user.isActive = false;

      await expect(auth.sessions.refresh(pair.refreshToken)).rejects.toMatchObject({
        code: AUTH_ERRORS.InvalidCredentials,
      });
      expect(auth.sessionStore.tokens.filter(token => token.revokedAt === null)).toHaveLength(1);
    });

    it('should keep other sessions alive on reuse by default', async () => {
      const pair = await login();
      const next = await auth.sessions.refresh(pair.refreshToken);

      await expect(auth.sessions.refresh(pair.refreshToken)).rejects.toMatchObject({ code: AUTH_ERRORS.TokenRevoked });
      await expect(auth.sessions.refresh(next.refreshToken)).resolves.toMatchObject({ tokenType: 'Bearer' });
    });

    it('should revoke every session on reuse when the policy is enabled', async () => {
      auth = createTestAuth({ REFRESH_REUSE_REVOKES_ALL: 'true' });
      const user = await auth.users.add('alice@example.com');
      subjectId = user.id;

      const pair = await login();
      const next = await auth.sessions.refresh(pair.refreshToken);

      await expect(auth.sessions.refresh(pair.refreshToken)).rejects.toMatchObject({ code: AUTH_ERRORS.TokenRevoked });
      await expect(auth.sessions.refresh(next.refreshToken)).rejects.toMatchObject({ code: AUTH_ERRORS.TokenRevoked });
      await expect(auth.sessions.authenticate(next.accessToken)).rejects.toMatchObject({
        code: AUTH_ERRORS.TokenRevoked,
      });
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // LOGOUT & REVOKE-ALL
  // ═══════════════════════════════════════════════════════════════════

  describe('logout', () => {
    it('should blacklist the access token for its remaining lifetime', async () => {
      const pair = await login();
      const { jti } = auth.codec.verifyAccessToken(pair.accessToken);

      vi.setSystemTime(new Date(T0.getTime() + 600 * 1000));
      await auth.sessions.logout(pair.accessToken);

      await expect(auth.sessions.authenticate(pair.accessToken)).rejects.toMatchObject({
        code: AUTH_ERRORS.TokenRevoked,
      });
      expect(await auth.registry.activeTokens(subjectId)).toEqual([]);

      vi.setSystemTime(new Date(T0.getTime() + 1799 * 1000));
      expect(await auth.kv.exists(REGISTRY_KEYS.blacklist(jti))).toBe(true);
      vi.setSystemTime(new Date(T0.getTime() + 1800 * 1000));
      expect(await auth.kv.exists(REGISTRY_KEYS.blacklist(jti))).toBe(false);
    });

    it('should revoke the refresh token presented with the logout', async () => {
      const pair = await login();
      await auth.sessions.logout(pair.accessToken, pair.refreshToken);

      await expect(auth.sessions.refresh(pair.refreshToken)).rejects.toMatchObject({ code: AUTH_ERRORS.TokenRevoked });
      expect(await auth.sessions.listSessions(subjectId)).toEqual([]);
    });

    it("should leave another subject's refresh token alone", async () => {
      await auth.users.add('bob@example.com');
      const bob = await auth.sessions.login({ email: 'bob@example.com', password: TEST_PASSWORD });
      const alice = await login();

      await auth.sessions.logout(alice.accessToken, bob.refreshToken);

      await expect(auth.sessions.refresh(bob.refreshToken)).resolves.toMatchObject({ tokenType: 'Bearer' });
    });

    it('should reject a token with a bad signature', async () => {
      const pair = await login();
      const [header, payload] = pair.accessToken.split('.');

      await expect(auth.sessions.logout(`${header}.${payload}.AAAA`)).rejects.toMatchObject({
        code: AUTH_ERRORS.InvalidSignature,
      });
    });
  });

  describe('revokeAll', () => {
    it('should reject every access and refresh token the subject held', async () => {
      const laptop = await login(TEST_PASSWORD, 'laptop');
      const phone = await login(TEST_PASSWORD, 'phone');

      const result = await auth.sessions.revokeAll(subjectId);
      expect(result).toEqual({ refreshTokensRevoked: 2, accessTokensRevoked: 2 });

      for (const pair of [laptop, phone]) {
        const { jti } = auth.codec.verifyAccessToken(pair.accessToken);
        expect(await auth.registry.isBlacklisted(jti)).toBe(true);
        await expect(auth.sessions.authenticate(pair.accessToken)).rejects.toMatchObject({
          code: AUTH_ERRORS.TokenRevoked,
        });
        await expect(auth.sessions.refresh(pair.refreshToken)).rejects.toMatchObject({
          code: AUTH_ERRORS.TokenRevoked,
        });
      }
      expect(auth.sessionStore.audit.at(-1)).toEqual({ subjectId, action: 'revoke_all_sessions' });
    });

    it('should be safe to repeat after a failure in the relational step', async () => {
      const pair = await login();
      auth.sessionStore.failNext = new Error('write conflict');

      await expect(auth.sessions.revokeAll(subjectId)).rejects.toThrow('write conflict');
      await expect(auth.sessions.authenticate(pair.accessToken)).resolves.toMatchObject({ subjectId });

      await expect(auth.sessions.revokeAll(subjectId)).resolves.toEqual({
        refreshTokensRevoked: 1,
        accessTokensRevoked: 1,
      });
      await expect(auth.sessions.revokeAll(subjectId)).resolves.toEqual({
        refreshTokensRevoked: 0,
        accessTokensRevoked: 0,
      });
    });
  });

  describe('listSessions', () => {
    it('should list live sessions newest first', async () => {
      await login(TEST_PASSWORD, 'laptop');
      vi.setSystemTime(new Date(T0.getTime() + 1000));
      const phone = await login(TEST_PASSWORD, 'phone');
      await auth.sessions.logout(phone.accessToken, phone.refreshToken);
      vi.setSystemTime(new Date(T0.getTime() + 2000));
      await login(TEST_PASSWORD, 'tablet');

      const sessions = await auth.sessions.listSessions(subjectId);
      expect(sessions.map(session => session.deviceInfo)).toEqual(['tablet', 'laptop']);
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // AUTHENTICATE & AUTHORIZE
  // ═══════════════════════════════════════════════════════════════════

  describe('authenticate', () => {
    it('should return the principal with its current permissions', async () => {
      const pair = await login();
      const principal = await auth.sessions.authenticate(pair.accessToken);

      expect(principal).toMatchObject({
        subjectId,
        roles: ['member'],
        permissions: ['profile:read', 'sessions:list'],
        exp: Math.floor(T0.getTime() / 1000) + 1800,
      });
    });

    it('should reject an expired access token', async () => {
      const pair = await login();
      vi.setSystemTime(new Date(T0.getTime() + 1801 * 1000));

      await expect(auth.sessions.authenticate(pair.accessToken)).rejects.toMatchObject({
        code: AUTH_ERRORS.TokenExpired,
      });
    });

    it('should fail closed when the blacklist cannot be consulted', async () => {
      const pair = await login();
      auth.kv.down = true;

      await expect(auth.sessions.authenticate(pair.accessToken)).rejects.toMatchObject({
        code: AUTH_ERRORS.StoreUnavailable,
        retryAfter: 1,
      });
    });

    it('should serve permissions from the cache after the first lookup', async () => {
      const pair = await login();
      const before = auth.rbac.resolveCalls;

      await auth.sessions.authenticate(pair.accessToken);
      await auth.sessions.authenticate(pair.accessToken);

      expect(auth.rbac.resolveCalls).toBe(before);
    });
  });

  describe('authorize', () => {
    it('should allow granted permissions and deny the rest', async () => {
      const principal = await auth.sessions.authenticate((await login()).accessToken);

      await expect(auth.sessions.authorize(principal, 'profile:read')).resolves.toBeUndefined();
      await expect(auth.sessions.authorize(principal, 'roles:assign')).rejects.toMatchObject({
        code: AUTH_ERRORS.Forbidden,
      });
    });
  });
});
