/**
 * Token Codec Tests
 */

import { describe, it, expect, beforeAll } from 'vitest';
import jwt from 'jsonwebtoken';
import { createPublicKey, type KeyObject } from 'node:crypto';
import {
  TokenCodec,
  TokenVerificationError,
  generateSigningKeyPair,
  extractToken,
  type TokenFailureReason,
} from '../src/index.js';

const T0 = Date.UTC(2026, 0, 15, 12, 0, 0);

let keys: { privateKey: KeyObject; publicKey: KeyObject };
let otherKeys: { privateKey: KeyObject; publicKey: KeyObject };

beforeAll(() => {
  keys = generateSigningKeyPair();
  otherKeys = generateSigningKeyPair();
});

function createCodec(clock: { now: number }, issuer = 'session-guard'): TokenCodec {
  return new TokenCodec({ ...keys, issuer, now: () => clock.now });
}

function failureReason(fn: () => unknown): TokenFailureReason | 'none' {
  try {
    fn();
    return 'none';
  } catch (error) {
    if (error instanceof TokenVerificationError) return error.reason;
    throw error;
  }
}

// ═══════════════════════════════════════════════════════════════════
// ISSUE / VERIFY
// ═══════════════════════════════════════════════════════════════════

describe('TokenCodec', () => {
  describe('issueAccessToken / verifyAccessToken', () => {
    it('should round trip subject, roles, permissions and jti', () => {
      const clock = { now: T0 };
      const codec = createCodec(clock);

      const issued = codec.issueAccessToken('42', ['admin'], ['users:read', 'roles:*'], 1800);
      const claims = codec.verifyAccessToken(issued.token);

      expect(claims.sub).toBe('42');
      expect(claims.roles).toEqual(['admin']);
      expect(claims.permissions).toEqual(['users:read', 'roles:*']);
      expect(claims.jti).toBe(issued.jti);
      expect(claims.iat).toBe(T0 / 1000);
      expect(claims.exp).toBe(T0 / 1000 + 1800);
      expect(claims.iss).toBe('session-guard');
      expect(issued.expiresAt.getTime()).toBe(T0 + 1800 * 1000);
    });

    it('should generate a fresh jti for every token', () => {
      const codec = createCodec({ now: T0 });
      const a = codec.issueAccessToken('1', [], [], 60);
      const b = codec.issueAccessToken('1', [], [], 60);
      expect(a.jti).not.toBe(b.jti);
    });

    it('should accept the token until expiry and reject it afterwards', () => {
      const clock = { now: T0 };
      const codec = createCodec(clock);
      const { token } = codec.issueAccessToken('7', ['user'], ['profile:read'], 60);

      clock.now = T0 + 59_000;
      expect(failureReason(() => codec.verifyAccessToken(token))).toBe('none');

      clock.now = T0 + 61_000;
      expect(failureReason(() => codec.verifyAccessToken(token))).toBe('Expired');
    });

    it('should reject a token signed with another key as InvalidSignature', () => {
      const foreign = new TokenCodec({ ...otherKeys, issuer: 'session-guard', now: () => T0 });
      const { token } = foreign.issueAccessToken('7', [], [], 60);

      expect(failureReason(() => createCodec({ now: T0 }).verifyAccessToken(token))).toBe('InvalidSignature');
    });

    it('should reject a token whose payload was altered as InvalidSignature', () => {
      const codec = createCodec({ now: T0 });
      const { token } = codec.issueAccessToken('7', ['user'], [], 60);
      const [header, , signature] = token.split('.');
      const forgedPayload = Buffer.from(
        JSON.stringify({ sub: '7', roles: ['admin'], permissions: ['*:*'], jti: 'x', iat: T0 / 1000, exp: T0 / 1000 + 60 })
      ).toString('base64url');

      expect(failureReason(() => codec.verifyAccessToken(`${header}.${forgedPayload}.${signature}`))).toBe(
        'InvalidSignature'
      );
    });

    it('should reject garbage as Malformed', () => {
      expect(failureReason(() => createCodec({ now: T0 }).verifyAccessToken('not-a-token'))).toBe('Malformed');
    });

    it('should reject a correctly signed token with missing claims as Malformed', () => {
      const codec = new TokenCodec({ ...keys, now: () => T0 });
      const token = jwt.sign({ sub: '7' }, keys.privateKey, { algorithm: 'RS256', expiresIn: 60 });

      expect(failureReason(() => codec.verifyAccessToken(token))).toBe('Malformed');
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // DECODE / LIFETIME
  // ═══════════════════════════════════════════════════════════════════

  describe('decodeAccessToken', () => {
    it('should read claims of an expired token without verifying', () => {
      const clock = { now: T0 };
      const codec = createCodec(clock);
      const issued = codec.issueAccessToken('9', [], [], 60);

      clock.now = T0 + 3600_000;
      expect(codec.decodeAccessToken(issued.token)?.jti).toBe(issued.jti);
    });

    it('should return null for a token without access claims', () => {
      const codec = createCodec({ now: T0 });
      expect(codec.decodeAccessToken('a.b.c')).toBeNull();
      expect(codec.decodeAccessToken(jwt.sign({ foo: 'bar' }, 'test-secret'))).toBeNull();
    });
  });

  describe('remainingLifetime', () => {
    it('should count down to zero and not below', () => {
      const clock = { now: T0 };
      const codec = createCodec(clock);
      const exp = T0 / 1000 + 100;

      expect(codec.remainingLifetime({ exp })).toBe(100);
      clock.now = T0 + 40_000;
      expect(codec.remainingLifetime({ exp })).toBe(60);
      clock.now = T0 + 500_000;
      expect(codec.remainingLifetime({ exp })).toBe(0);
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // REFRESH TOKENS / JWKS
  // ═══════════════════════════════════════════════════════════════════

  describe('issueRefreshToken', () => {
    it('should produce 64 random bytes as base64url', () => {
      const codec = createCodec({ now: T0 });
      const a = codec.issueRefreshToken();
      const b = codec.issueRefreshToken();

      expect(a).toMatch(/^[A-Za-z0-9_-]{86}$/);
      expect(Buffer.from(a, 'base64url')).toHaveLength(64);
      expect(a).not.toBe(b);
    });
  });

  describe('getJwks', () => {
    it('should publish a key that verifies issued tokens', () => {
      const codec = createCodec({ now: T0 });
      const jwks = codec.getJwks();

      expect(jwks.keys).toHaveLength(1);
      const [jwk] = jwks.keys;
      expect(jwk.kty).toBe('RSA');
      expect(jwk.alg).toBe('RS256');
      expect(jwk.use).toBe('sig');
      expect(jwk.kid).toBe(codec.keyId);
      expect(jwk).not.toHaveProperty('d');

      const published = createPublicKey({ key: { kty: 'RSA', n: String(jwk.n), e: String(jwk.e) }, format: 'jwk' });
      const { token } = codec.issueAccessToken('5', [], [], 60);
      const payload = jwt.verify(token, published, { algorithms: ['RS256'], clockTimestamp: T0 / 1000 });

      expect(payload).toMatchObject({ sub: '5' });
    });

    it('should write the key id into the token header', () => {
      const codec = createCodec({ now: T0 });
      const { token } = codec.issueAccessToken('5', [], [], 60);
      const decoded = jwt.decode(token, { complete: true });

      expect(decoded?.header.kid).toBe(codec.keyId);
      expect(decoded?.header.alg).toBe('RS256');
    });
  });
});

describe('extractToken', () => {
  it('should read bearer tokens case-insensitively', () => {
    expect(extractToken('Bearer abc.def.ghi')).toBe('abc.def.ghi');
    expect(extractToken('bearer abc')).toBe('abc');
  });

  it('should ignore other schemes and empty headers', () => {
    expect(extractToken('Basic dXNlcjpwYXNz')).toBeNull();
    expect(extractToken('Bearer')).toBeNull();
    expect(extractToken(undefined)).toBeNull();
  });
});
