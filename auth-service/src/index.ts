/**
 * Authentication Service
 *
 * Credential lifecycle and admission control:
 * - Login with account lockout and bounded password hashing
 * - Refresh token rotation with reuse detection
 * - Logout and revoke-all with access token blacklisting
 * - Cache-aside permission resolution
 * - Per-client rate limits and request admission control
 */

import {
  checkDatabaseHealth,
  checkRedisHealth,
  closeDatabase,
  closeRedis,
  configureLogger,
  connectDatabase,
  connectRedis,
  getClient,
  getErrorMessage,
  logger,
  RedisKeyValueStore,
  retry,
  RetryConfigs,
} from 'core-service';
import { createAuthComponents } from './app.js';
import { loadConfig, printConfigSummary, validateConfig } from './config.js';
import { createAuthServer } from './http/server.js';
import { MongoRbacRepository, registerRbacIndexes } from './repositories/rbac-repository.js';
import { MongoSessionRepository, registerSessionIndexes } from './repositories/session-repository.js';
import { MongoUserRepository, registerUserIndexes } from './repositories/user-repository.js';

async function main() {
  const config = loadConfig();
  validateConfig(config);

  configureLogger({
    level: config.logLevel,
    format: config.logFormat,
    service: config.serviceName,
  });
  printConfigSummary(config);

  registerUserIndexes();
  registerSessionIndexes();
  registerRbacIndexes();

  // The Redis client reconnects on its own; MongoDB gets the startup budget
  const { result: db } = await retry(
    () =>
      connectDatabase(config.mongoUri, {
        maxPoolSize: config.mongoMaxPoolSize,
        minPoolSize: config.mongoMinPoolSize,
        socketTimeoutMS: config.storeCommandTimeoutMs,
      }),
    { ...RetryConfigs.startup, name: 'mongodb.connect' }
  );
  const redis = await connectRedis({ url: config.redisUrl, clientName: config.serviceName });

  const components = createAuthComponents(config, {
    kv: new RedisKeyValueStore(redis, { commandTimeoutMs: config.storeCommandTimeoutMs }),
    users: new MongoUserRepository(db),
    sessions: new MongoSessionRepository(getClient(), db),
    rbac: new MongoRbacRepository(db),
    healthChecks: {
      database: checkDatabaseHealth,
      redis: checkRedisHealth,
    },
  });

  const server = createAuthServer(components.http);
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, () => {
      server.off('error', reject);
      resolve();
    });
  });

  logger.info(`${config.serviceName} listening`, {
    port: config.port,
    jwks: `http://localhost:${config.port}/.well-known/jwks.json`,
    health: `http://localhost:${config.port}/health`,
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });

    await new Promise<void>(resolve => server.close(() => resolve()));
    await closeRedis();
    await closeDatabase();

    logger.info('Shutdown complete');
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch(err => {
        logger.error('Shutdown failed', { error: getErrorMessage(err) });
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  logger.error('Failed to start auth-service', {
    error: getErrorMessage(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception in auth-service', {
    error: getErrorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection in auth-service', {
    reason: getErrorMessage(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
});
