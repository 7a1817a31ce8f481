/**
 * JWT - Token codec on the jsonwebtoken package
 *
 * Access tokens are RS256-signed and carry a unique `jti` for revocation.
 * Refresh tokens are opaque random strings and are never signed: they are
 * validated against their stored hash by the session layer.
 */

import jwt from 'jsonwebtoken';
import type { SignOptions, VerifyOptions } from 'jsonwebtoken';
import {
  createHash,
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  randomBytes,
  randomUUID,
  type KeyObject,
} from 'node:crypto';
import { type } from 'arktype';
import { validateInput } from './validation/arktype.js';

// ═══════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════

const accessTokenClaims = type({
  sub: 'string > 0',
  roles: 'string[]',
  permissions: 'string[]',
  jti: 'string > 0',
  iat: 'number',
  exp: 'number',
  'iss?': 'string',
});

export type AccessTokenClaims = typeof accessTokenClaims.infer;

export type TokenFailureReason = 'InvalidSignature' | 'Expired' | 'Malformed';

export class TokenVerificationError extends Error {
  readonly reason: TokenFailureReason;

  constructor(reason: TokenFailureReason, message: string) {
    super(message);
    this.name = 'TokenVerificationError';
    this.reason = reason;
  }
}

export interface IssuedAccessToken {
  token: string;
  jti: string;
  expiresAt: Date;
}

export interface TokenCodecConfig {
  /** PEM string or key object used to sign */
  privateKey: string | KeyObject;
  /** PEM string or key object used to verify and published via JWKS */
  publicKey: string | KeyObject;
  /** `iss` claim written and required on verification */
  issuer?: string;
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
}

export interface JsonWebKeySet {
  keys: Array<Record<string, unknown>>;
}

const ALGORITHM = 'RS256';

// ═══════════════════════════════════════════════════════════════════
// Codec
// ═══════════════════════════════════════════════════════════════════

export class TokenCodec {
  private readonly privateKey: KeyObject;
  private readonly publicKey: KeyObject;
  private readonly issuer?: string;
  private readonly now: () => number;
  readonly keyId: string;

  constructor(config: TokenCodecConfig) {
    this.privateKey = typeof config.privateKey === 'string' ? createPrivateKey(config.privateKey) : config.privateKey;
    this.publicKey = typeof config.publicKey === 'string' ? createPublicKey(config.publicKey) : config.publicKey;
    this.issuer = config.issuer;
    this.now = config.now ?? (() => Date.now());
    this.keyId = computeKeyId(this.publicKey);
  }

  /** Sign an access token with a fresh jti */
  issueAccessToken(
    subjectId: string,
    roles: readonly string[],
    permissions: readonly string[],
    ttlSeconds: number
  ): IssuedAccessToken {
    const jti = randomUUID();
    const iat = Math.floor(this.now() / 1000);
    const exp = iat + ttlSeconds;

    const payload = {
      sub: subjectId,
      roles: [...roles],
      permissions: [...permissions],
      iat,
      exp,
    };

    const options: SignOptions = {
      algorithm: ALGORITHM,
      jwtid: jti,
      keyid: this.keyId,
      ...(this.issuer ? { issuer: this.issuer } : {}),
    };

    return {
      token: jwt.sign(payload, this.privateKey, options),
      jti,
      expiresAt: new Date(exp * 1000),
    };
  }

  /** 64 random bytes, base64url encoded */
  issueRefreshToken(): string {
    return randomBytes(64).toString('base64url');
  }

  /**
   * Verify signature and expiry. Does not consult any revocation state.
   *
   * @throws TokenVerificationError with reason InvalidSignature, Expired or Malformed
   */
  verifyAccessToken(token: string): AccessTokenClaims {
    const options: VerifyOptions = {
      algorithms: [ALGORITHM],
      clockTimestamp: Math.floor(this.now() / 1000),
      ...(this.issuer ? { issuer: this.issuer } : {}),
    };

    let payload: unknown;
    try {
      payload = jwt.verify(token, this.publicKey, options);
    } catch (error) {
      throw toVerificationError(error);
    }

    return parseClaims(payload);
  }

  /**
   * Read claims without checking signature or expiry.
   * Returns null when the token is not a structurally valid access token.
   */
  decodeAccessToken(token: string): AccessTokenClaims | null {
    const payload = jwt.decode(token);
    if (payload === null) return null;
    try {
      return parseClaims(payload);
    } catch {
      return null;
    }
  }

  /** Seconds until the claims expire, floored at zero */
  remainingLifetime(claims: Pick<AccessTokenClaims, 'exp'>): number {
    return Math.max(0, claims.exp - Math.floor(this.now() / 1000));
  }

  /** Public verification key as a JSON Web Key Set */
  getJwks(): JsonWebKeySet {
    const jwk = this.publicKey.export({ format: 'jwk' });
    return {
      keys: [{ ...jwk, kid: this.keyId, use: 'sig', alg: ALGORITHM }],
    };
  }
}

// ═══════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════

function parseClaims(payload: unknown): AccessTokenClaims {
  const result = validateInput(accessTokenClaims(payload));
  if ('errors' in result) {
    throw new TokenVerificationError('Malformed', `Malformed token claims: ${result.errors.join('; ')}`);
  }
  return result;
}

function toVerificationError(error: unknown): TokenVerificationError {
  if (error instanceof jwt.TokenExpiredError) {
    return new TokenVerificationError('Expired', 'Token has expired');
  }
  if (error instanceof jwt.JsonWebTokenError) {
    // 'invalid algorithm' covers tokens signed with another (e.g. symmetric) algorithm
    if (error.message === 'invalid signature' || error.message === 'invalid algorithm') {
      return new TokenVerificationError('InvalidSignature', 'Token signature is invalid');
    }
    return new TokenVerificationError('Malformed', `Token is malformed: ${error.message}`);
  }
  return new TokenVerificationError('Malformed', 'Token could not be verified');
}

function computeKeyId(publicKey: KeyObject): string {
  const der = publicKey.export({ type: 'spki', format: 'der' });
  return createHash('sha256').update(der).digest('base64url').slice(0, 16);
}

/**
 * Ephemeral RSA-2048 signing pair for development and tests
 */
export function generateSigningKeyPair(): { privateKey: KeyObject; publicKey: KeyObject } {
  return generateKeyPairSync('rsa', { modulusLength: 2048 });
}

/** Extract Bearer token from Authorization header */
export function extractToken(header: string | undefined): string | null {
  if (!header) return null;
  const [scheme, token] = header.split(' ');
  return scheme?.toLowerCase() === 'bearer' ? token || null : null;
}
