/**
 * Component wiring
 *
 * Builds every auth component from configuration plus the two backing
 * stores. The stores arrive as interfaces, so the same wiring runs
 * against MongoDB/Redis in production and in-memory fakes in tests.
 */

import { AdmissionController, TokenCodec, type KeyValueStore } from 'core-service';
import { resolveSigningKeys, type AuthConfig } from './config.js';
import type { HealthProbe } from './http/server.js';
import { AuthHttpHandler } from './http/server.js';
import type { RbacRepository } from './repositories/rbac-repository.js';
import type { SessionRepository } from './repositories/session-repository.js';
import type { UserRepository } from './repositories/user-repository.js';
import {
  CredentialVerifier,
  LoginGuard,
  PermissionCache,
  RateLimiter,
  RevocationRegistry,
  RoleService,
  SessionService,
  StoreGuard,
} from './services/index.js';

export interface AuthStores {
  /** Shared registry / cache / rate-limit store */
  kv: KeyValueStore;
  users: UserRepository;
  sessions: SessionRepository;
  rbac: RbacRepository;
  healthChecks?: Record<string, HealthProbe>;
}

export interface AuthComponents {
  codec: TokenCodec;
  storeGuard: StoreGuard;
  registry: RevocationRegistry;
  permissionCache: PermissionCache;
  rateLimiter: RateLimiter;
  loginGuard: LoginGuard;
  verifier: CredentialVerifier;
  admission: AdmissionController;
  sessions: SessionService;
  roles: RoleService;
  http: AuthHttpHandler;
}

export interface AuthComponentOptions {
  /** bcrypt cost for hashes created by the verifier */
  hashRounds?: number;
}

export function createAuthComponents(
  config: AuthConfig,
  stores: AuthStores,
  options: AuthComponentOptions = {}
): AuthComponents {
  const codec = new TokenCodec({ ...resolveSigningKeys(config), issuer: config.jwtIssuer });
  const storeGuard = new StoreGuard({
    attempts: config.storeRetryAttempts,
    baseDelayMs: config.storeRetryBaseDelayMs,
  });

  const registry = new RevocationRegistry(stores.kv, storeGuard);
  const permissionCache = new PermissionCache(stores.kv, storeGuard, config.permissionCacheTtlSeconds);
  const rateLimiter = new RateLimiter(stores.kv, storeGuard, config.rateLimits);
  const loginGuard = new LoginGuard(stores.kv, storeGuard, {
    threshold: config.lockoutThreshold,
    durationSeconds: config.lockoutDurationSeconds,
  });

  const verifier = new CredentialVerifier({
    concurrency: config.passwordHashConcurrency,
    queueCapacity: config.admission.queueCapacity,
    waitTimeoutMs: config.admission.waitTimeoutMs,
    rounds: options.hashRounds,
  });

  const admission = new AdmissionController({
    name: 'requests',
    maxConcurrent: config.admission.maxConcurrent,
    queueCapacity: config.admission.queueCapacity,
    rejectThreshold: config.admission.rejectThreshold,
    waitTimeoutMs: config.admission.waitTimeoutMs,
  });

  const sessions = new SessionService(
    {
      codec,
      users: stores.users,
      sessions: stores.sessions,
      rbac: stores.rbac,
      registry,
      permissionCache,
      loginGuard,
      verifier,
      storeGuard,
    },
    {
      accessTokenTtlSeconds: config.accessTokenTtlSeconds,
      refreshTokenTtlSeconds: config.refreshTokenTtlSeconds,
      refreshReuseRevokesAll: config.refreshReuseRevokesAll,
    }
  );

  const roles = new RoleService({
    rbac: stores.rbac,
    users: stores.users,
    permissionCache,
    storeGuard,
  });

  const http = new AuthHttpHandler({
    serviceName: config.serviceName,
    sessions,
    roles,
    rateLimiter,
    admission,
    verifier,
    codec,
    healthChecks: stores.healthChecks ?? {},
  });

  return {
    codec,
    storeGuard,
    registry,
    permissionCache,
    rateLimiter,
    loginGuard,
    verifier,
    admission,
    sessions,
    roles,
    http,
  };
}
