/**
 * core-service - shared infrastructure
 *
 * Logging, errors, retries, token codec, admission control and the
 * clients of the two backing stores.
 */

// Logger
export {
  logger,
  configureLogger,
  createChildLogger,
  getCorrelationId,
  generateCorrelationId,
  withCorrelationId,
  isLogLevel,
  isLogFormat,
} from './common/logger.js';
export type { Logger, LogLevel, LogFormat, LoggerConfig } from './common/logger.js';

// Errors
export {
  getErrorMessage,
  normalizeError,
  ServiceError,
  isServiceError,
  hasErrorCode,
  isTransientStoreError,
} from './common/errors.js';
export type { ServiceErrorOptions } from './common/errors.js';

// Resilience
export { retry, RetryConfigs, RetryExhaustedError, calculateDelay } from './common/resilience/retry.js';
export type { RetryConfig, RetryResult, RetryStrategy } from './common/resilience/retry.js';

// Validation
export { validateInput } from './common/validation/arktype.js';

// Token codec
export {
  TokenCodec,
  TokenVerificationError,
  generateSigningKeyPair,
  extractToken,
} from './common/jwt.js';
export type {
  AccessTokenClaims,
  IssuedAccessToken,
  TokenCodecConfig,
  TokenFailureReason,
  JsonWebKeySet,
} from './common/jwt.js';

// Admission control
export { AdmissionController, AdmissionError } from './common/admission.js';
export type { AdmissionConfig, AdmissionFailure, AdmissionMetrics, AdmissionHealth, Permit } from './common/admission.js';

// Key-value store
export { deleteByPattern } from './databases/kv-store.js';
export type { KeyValueStore, KeyValueEntry, WindowCount } from './databases/kv-store.js';
export { MemoryKeyValueStore } from './databases/memory-store.js';

// Redis
export { connectRedis, getRedis, closeRedis, checkRedisHealth } from './databases/redis/connection.js';
export type { RedisClient, RedisConfig } from './databases/redis/connection.js';
export { RedisKeyValueStore, CommandTimeoutError } from './databases/redis/kv-store.js';
export type { RedisKeyValueStoreOptions } from './databases/redis/kv-store.js';

// MongoDB
export {
  connectDatabase,
  getDatabase,
  getClient,
  closeDatabase,
  checkDatabaseHealth,
  getConnectionPoolStats,
  registerIndexes,
  DEFAULT_MONGO_CONFIG,
} from './databases/mongodb/connection.js';
export type { MongoConfig } from './databases/mongodb/connection.js';
export { withTransaction, DEFAULT_TRANSACTION_OPTIONS } from './databases/mongodb/transaction.js';
export type { TransactionOptions } from './databases/mongodb/transaction.js';
