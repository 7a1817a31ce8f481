/**
 * Auth Service Configuration Defaults
 *
 * Every setting the service reads, with its default and a description.
 * `loadConfig` overlays environment variables on these values; the
 * descriptions are printed by `printConfigSummary` in debug mode.
 */

export const AUTH_CONFIG_DEFAULTS = {
  port: { value: 9001, description: 'Auth service port' },
  serviceName: { value: 'auth-service', description: 'Service name' },
  nodeEnv: { value: 'development', description: 'Node environment' },

  // Logging
  logLevel: { value: 'info', description: 'Minimum log level (debug, info, warn, error)' },
  logFormat: { value: 'json', description: 'Log output format (json, text, pretty)' },

  // Stores
  database: {
    value: {
      mongoUri: 'mongodb://localhost:27017/auth_service',
      redisUrl: 'redis://localhost:6379',
    },
    description: 'MongoDB (credential store) and Redis (registry, cache, limiter) URLs',
  },

  mongoPool: {
    value: { maxPoolSize: 20, testMaxPoolSize: 5, minPoolSize: 2 },
    description: 'MongoDB connection pool bounds (smaller in test)',
  },

  storeCommandTimeoutMs: {
    value: 2000,
    description: 'Upper bound for a single store command',
  },

  storeRetry: {
    value: { attempts: 2, baseDelayMs: 50 },
    description: 'Retries for transient store failures before failing closed',
  },

  // Tokens
  jwt: {
    value: {
      privateKey: '',
      publicKey: '',
      issuer: 'session-guard',
      accessTokenTtlSeconds: 1800,
      refreshTokenTtlSeconds: 604800,
    },
    description: 'RS256 signing keys (PEM) and token lifetimes',
  },

  refreshReuseRevokesAll: {
    value: false,
    description: 'Revoke every session of a subject when a rotated refresh token is presented again',
  },

  // Permission cache
  permissionCacheTtlSeconds: {
    value: 300,
    description: 'Maximum staleness of cached roles/permissions',
  },

  // Rate limits, as "limit/windowSeconds"
  rateLimits: {
    value: {
      login: '5/60',
      refresh: '10/60',
      logout: '10/60',
      default: '100/60',
    },
    description: 'Per-client request limits by endpoint class',
  },

  // Admission control
  admission: {
    value: {
      maxConcurrent: 15,
      queueCapacity: 200,
      waitTimeoutMs: 3000,
    },
    description: 'Concurrent request permits, waiting queue size and queue wait timeout',
  },

  // Account lockout
  lockout: {
    value: { threshold: 5, durationSeconds: 1800 },
    description: 'Failed logins before lockout and lockout duration',
  },

  passwordHashConcurrency: {
    value: 4,
    description: 'Password hash verifications allowed to run at once',
  },
} as const;
