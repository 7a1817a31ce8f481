/**
 * Rate Limiter
 *
 * Fixed-window counters per (client, endpoint class). Each check is one
 * atomic increment in the shared store, so concurrent requests can never
 * both read "under the limit" and both pass.
 *
 * Key: ratelimit:{clientId}:{endpointClass}:{windowId}
 */

import { ServiceError, type KeyValueStore } from 'core-service';
import { AUTH_ERRORS } from '../error-codes.js';
import { securityLogger } from '../security-logger.js';
import type { EndpointClass, RateLimitDecision, RateLimitRule } from '../types.js';
import type { StoreGuard } from './store-guard.js';

export class RateLimiter {
  constructor(
    private readonly store: KeyValueStore,
    private readonly guard: StoreGuard,
    private readonly rules: Record<EndpointClass, RateLimitRule>,
    private readonly now: () => number = () => Date.now()
  ) {}

  ruleFor(endpoint: EndpointClass): RateLimitRule {
    return this.rules[endpoint];
  }

  /** Count this request and report whether it fits the window */
  async checkAndIncrement(clientId: string, endpoint: EndpointClass): Promise<RateLimitDecision> {
    const { limit, windowSeconds } = this.rules[endpoint];
    const windowMs = windowSeconds * 1000;
    const now = this.now();
    const windowId = Math.floor(now / windowMs);
    const key = `ratelimit:${clientId}:${endpoint}:${windowId}`;

    const { count } = await this.guard.run('rateLimiter.increment', () => this.store.incrementWindow(key, windowMs));

    const windowEnd = (windowId + 1) * windowMs;
    return {
      allowed: count <= limit,
      limit,
      remaining: Math.max(0, limit - count),
      retryAfter: Math.max(1, Math.ceil((windowEnd - now) / 1000)),
    };
  }

  /** checkAndIncrement, failing with RateLimited when over the limit */
  async enforce(clientId: string, endpoint: EndpointClass): Promise<RateLimitDecision> {
    const decision = await this.checkAndIncrement(clientId, endpoint);

    if (!decision.allowed) {
      securityLogger.rateLimitExceeded({ clientId, endpoint, limit: decision.limit });
      throw new ServiceError(AUTH_ERRORS.RateLimited, 'Too many requests', {
        retryAfter: decision.retryAfter,
        details: { endpoint, limit: decision.limit },
      });
    }

    return decision;
  }
}
