/**
 * Service exports
 */

export { StoreGuard } from './store-guard.js';
export type { StoreGuardOptions } from './store-guard.js';
export { RevocationRegistry, REGISTRY_KEYS } from './revocation-registry.js';
export { PermissionCache, permissionCacheKey } from './permission-cache.js';
export { RateLimiter } from './rate-limiter.js';
export { LoginGuard } from './login-guard.js';
export type { LockoutPolicy, LockStatus, FailureOutcome } from './login-guard.js';
export { CredentialVerifier } from './credential-verifier.js';
export type { CredentialVerifierOptions } from './credential-verifier.js';
export { SessionService, toTokenError } from './session-service.js';
export type { SessionServiceDeps, SessionServiceOptions, RevokeAllResult } from './session-service.js';
export { RoleService } from './role-service.js';
export type { RoleServiceDeps, AssignRoleInput } from './role-service.js';
