/**
 * Authentication Service Configuration
 *
 * Environment-based configuration. Each setting falls back to its entry
 * in AUTH_CONFIG_DEFAULTS; `validateConfig` runs before anything connects.
 */

import type { KeyObject } from 'node:crypto';
import {
  logger,
  isLogLevel,
  isLogFormat,
  generateSigningKeyPair,
  type LogLevel,
  type LogFormat,
} from 'core-service';
import { AUTH_CONFIG_DEFAULTS } from './config-defaults.js';
import type { EndpointClass, RateLimitRule } from './types.js';

export interface AdmissionSettings {
  maxConcurrent: number;
  queueCapacity: number;
  rejectThreshold: number;
  waitTimeoutMs: number;
}

export interface AuthConfig {
  // Service
  port: number;
  nodeEnv: string;
  serviceName: string;
  logLevel: LogLevel;
  logFormat: LogFormat;

  // Stores
  mongoUri: string;
  mongoMaxPoolSize: number;
  mongoMinPoolSize: number;
  redisUrl: string;
  storeCommandTimeoutMs: number;
  storeRetryAttempts: number;
  storeRetryBaseDelayMs: number;

  // Tokens
  jwtPrivateKey?: string;
  jwtPublicKey?: string;
  jwtIssuer: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  refreshReuseRevokesAll: boolean;

  // Authorization
  permissionCacheTtlSeconds: number;

  // Admission & limits
  rateLimits: Record<EndpointClass, RateLimitRule>;
  admission: AdmissionSettings;
  lockoutThreshold: number;
  lockoutDurationSeconds: number;
  passwordHashConcurrency: number;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  return raw === undefined || raw === '' ? fallback : Number.parseInt(raw, 10);
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  return raw === 'true' || raw === '1';
}

/**
 * Parse a "limit/windowSeconds" rule. Malformed input yields NaN fields,
 * which validateConfig reports.
 *
 * @example
 * parseRateLimit('5/60') // { limit: 5, windowSeconds: 60 }
 */
export function parseRateLimit(value: string): RateLimitRule {
  const match = /^\s*(\d+)\s*\/\s*(\d+)\s*$/.exec(value);
  if (!match) {
    return { limit: Number.NaN, windowSeconds: Number.NaN };
  }
  return { limit: Number(match[1]), windowSeconds: Number(match[2]) };
}

/**
 * Build configuration from environment variables over registered defaults
 */
export function loadConfig(env: Env = process.env): AuthConfig {
  const defaults = AUTH_CONFIG_DEFAULTS;
  const nodeEnv = env.NODE_ENV || defaults.nodeEnv.value;

  const mongoMaxPoolSize = readInt(
    env,
    'MONGO_MAX_POOL_SIZE',
    nodeEnv === 'test' ? defaults.mongoPool.value.testMaxPoolSize : defaults.mongoPool.value.maxPoolSize
  );

  // Admission must react before the pool does
  const maxConcurrent = readInt(
    env,
    'ADMISSION_MAX_CONCURRENT',
    Math.max(1, Math.min(defaults.admission.value.maxConcurrent, mongoMaxPoolSize - 1))
  );
  const queueCapacity = readInt(env, 'ADMISSION_QUEUE_CAPACITY', defaults.admission.value.queueCapacity);

  const logLevel = env.LOG_LEVEL ?? '';
  const logFormat = env.LOG_FORMAT ?? '';

  return {
    // Service
    port: readInt(env, 'PORT', defaults.port.value),
    nodeEnv,
    serviceName: env.SERVICE_NAME || defaults.serviceName.value,
    logLevel: isLogLevel(logLevel) ? logLevel : defaults.logLevel.value,
    logFormat: isLogFormat(logFormat) ? logFormat : defaults.logFormat.value,

    // Stores
    mongoUri: env.MONGO_URI || defaults.database.value.mongoUri,
    mongoMaxPoolSize,
    mongoMinPoolSize: readInt(env, 'MONGO_MIN_POOL_SIZE', defaults.mongoPool.value.minPoolSize),
    redisUrl: env.REDIS_URL || defaults.database.value.redisUrl,
    storeCommandTimeoutMs: readInt(env, 'STORE_COMMAND_TIMEOUT_MS', defaults.storeCommandTimeoutMs.value),
    storeRetryAttempts: readInt(env, 'STORE_RETRY_ATTEMPTS', defaults.storeRetry.value.attempts),
    storeRetryBaseDelayMs: readInt(env, 'STORE_RETRY_BASE_DELAY_MS', defaults.storeRetry.value.baseDelayMs),

    // Tokens
    jwtPrivateKey: env.JWT_PRIVATE_KEY || undefined,
    jwtPublicKey: env.JWT_PUBLIC_KEY || undefined,
    jwtIssuer: env.JWT_ISSUER || defaults.jwt.value.issuer,
    accessTokenTtlSeconds: readInt(env, 'ACCESS_TOKEN_TTL_SECONDS', defaults.jwt.value.accessTokenTtlSeconds),
    refreshTokenTtlSeconds: readInt(env, 'REFRESH_TOKEN_TTL_SECONDS', defaults.jwt.value.refreshTokenTtlSeconds),
    refreshReuseRevokesAll: readBoolean(env, 'REFRESH_REUSE_REVOKES_ALL', defaults.refreshReuseRevokesAll.value),

    // Authorization
    permissionCacheTtlSeconds: readInt(env, 'PERMISSION_CACHE_TTL_SECONDS', defaults.permissionCacheTtlSeconds.value),

    // Admission & limits
    rateLimits: {
      login: parseRateLimit(env.RATE_LIMIT_LOGIN || defaults.rateLimits.value.login),
      refresh: parseRateLimit(env.RATE_LIMIT_REFRESH || defaults.rateLimits.value.refresh),
      logout: parseRateLimit(env.RATE_LIMIT_LOGOUT || defaults.rateLimits.value.logout),
      default: parseRateLimit(env.RATE_LIMIT_DEFAULT || defaults.rateLimits.value.default),
    },
    admission: {
      maxConcurrent,
      queueCapacity,
      rejectThreshold: readInt(env, 'ADMISSION_REJECT_THRESHOLD', maxConcurrent + queueCapacity),
      waitTimeoutMs: readInt(env, 'ADMISSION_WAIT_TIMEOUT_MS', defaults.admission.value.waitTimeoutMs),
    },
    lockoutThreshold: readInt(env, 'LOCKOUT_THRESHOLD', defaults.lockout.value.threshold),
    lockoutDurationSeconds: readInt(env, 'LOCKOUT_DURATION_SECONDS', defaults.lockout.value.durationSeconds),
    passwordHashConcurrency: readInt(env, 'PASSWORD_HASH_CONCURRENCY', defaults.passwordHashConcurrency.value),
  };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Validate required configuration
 */
export function validateConfig(config: AuthConfig): void {
  const errors: string[] = [];

  const positive: Array<[string, number]> = [
    ['PORT', config.port],
    ['MONGO_MAX_POOL_SIZE', config.mongoMaxPoolSize],
    ['STORE_COMMAND_TIMEOUT_MS', config.storeCommandTimeoutMs],
    ['STORE_RETRY_BASE_DELAY_MS', config.storeRetryBaseDelayMs],
    ['ACCESS_TOKEN_TTL_SECONDS', config.accessTokenTtlSeconds],
    ['REFRESH_TOKEN_TTL_SECONDS', config.refreshTokenTtlSeconds],
    ['PERMISSION_CACHE_TTL_SECONDS', config.permissionCacheTtlSeconds],
    ['ADMISSION_MAX_CONCURRENT', config.admission.maxConcurrent],
    ['ADMISSION_REJECT_THRESHOLD', config.admission.rejectThreshold],
    ['ADMISSION_WAIT_TIMEOUT_MS', config.admission.waitTimeoutMs],
    ['LOCKOUT_THRESHOLD', config.lockoutThreshold],
    ['LOCKOUT_DURATION_SECONDS', config.lockoutDurationSeconds],
    ['PASSWORD_HASH_CONCURRENCY', config.passwordHashConcurrency],
  ];

  for (const [name, value] of positive) {
    if (!isPositiveInteger(value)) {
      errors.push(`${name} must be a positive integer`);
    }
  }

  const nonNegative: Array<[string, number]> = [
    ['MONGO_MIN_POOL_SIZE', config.mongoMinPoolSize],
    ['STORE_RETRY_ATTEMPTS', config.storeRetryAttempts],
    ['ADMISSION_QUEUE_CAPACITY', config.admission.queueCapacity],
  ];

  for (const [name, value] of nonNegative) {
    if (!Number.isInteger(value) || value < 0) {
      errors.push(`${name} must be a non-negative integer`);
    }
  }

  for (const [endpoint, rule] of Object.entries(config.rateLimits)) {
    if (!isPositiveInteger(rule.limit) || !isPositiveInteger(rule.windowSeconds)) {
      errors.push(`RATE_LIMIT_${endpoint.toUpperCase()} must look like "limit/windowSeconds"`);
    }
  }

  if (config.admission.rejectThreshold < config.admission.maxConcurrent) {
    errors.push('ADMISSION_REJECT_THRESHOLD must not be below ADMISSION_MAX_CONCURRENT');
  }

  if (config.admission.maxConcurrent >= config.mongoMaxPoolSize) {
    errors.push('ADMISSION_MAX_CONCURRENT must be below MONGO_MAX_POOL_SIZE');
  }

  if (config.mongoMinPoolSize > config.mongoMaxPoolSize) {
    errors.push('MONGO_MIN_POOL_SIZE must not exceed MONGO_MAX_POOL_SIZE');
  }

  if (!config.mongoUri) {
    errors.push('MONGO_URI is required');
  }

  if (Boolean(config.jwtPrivateKey) !== Boolean(config.jwtPublicKey)) {
    errors.push('JWT_PRIVATE_KEY and JWT_PUBLIC_KEY must be set together');
  }

  if (config.nodeEnv === 'production' && !config.jwtPrivateKey) {
    errors.push('JWT_PRIVATE_KEY and JWT_PUBLIC_KEY must be set in production');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration errors:\n${errors.join('\n')}`);
  }
}

/**
 * Signing keys from configuration, or an ephemeral pair outside production
 */
export function resolveSigningKeys(config: AuthConfig): {
  privateKey: string | KeyObject;
  publicKey: string | KeyObject;
} {
  if (config.jwtPrivateKey && config.jwtPublicKey) {
    return { privateKey: config.jwtPrivateKey, publicKey: config.jwtPublicKey };
  }

  logger.warn('⚠ WARNING: No JWT keys configured, using an ephemeral RSA key pair. Tokens will not survive a restart!');
  return generateSigningKeyPair();
}

function maskUrlCredentials(url: string): string {
  return url.replace(/\/\/([^:/@]*):[^@]+@/, '//$1:***@');
}

/**
 * Print configuration summary (without sensitive data)
 */
export function printConfigSummary(config: AuthConfig): void {
  logger.info('Configuration:', {
    environment: config.nodeEnv,
    port: config.port,
    mongoUri: maskUrlCredentials(config.mongoUri),
    mongoPool: `${config.mongoMinPoolSize}-${config.mongoMaxPoolSize}`,
    redisUrl: maskUrlCredentials(config.redisUrl),
    signingKeys: config.jwtPrivateKey ? 'configured' : 'ephemeral',
    accessTokenTtlSeconds: config.accessTokenTtlSeconds,
    refreshTokenTtlSeconds: config.refreshTokenTtlSeconds,
    permissionCacheTtlSeconds: config.permissionCacheTtlSeconds,
    admission: config.admission,
    rateLimits: Object.fromEntries(
      Object.entries(config.rateLimits).map(([name, rule]) => [name, `${rule.limit}/${rule.windowSeconds}s`])
    ),
    lockout: `${config.lockoutThreshold} attempts / ${config.lockoutDurationSeconds}s`,
    refreshReuseRevokesAll: config.refreshReuseRevokesAll,
  });

  logger.debug('Configuration reference', {
    settings: Object.fromEntries(
      Object.entries(AUTH_CONFIG_DEFAULTS).map(([key, entry]) => [key, entry.description])
    ),
  });
}
