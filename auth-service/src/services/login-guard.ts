/**
 * Login Guard
 *
 * Failed-login counting and account lockout, keyed by normalized e-mail
 * so unknown addresses are throttled the same as real ones.
 *
 * Each attempt is counted before the password is checked and the count
 * is cleared on success, so concurrent guesses cannot slip past the
 * threshold while earlier ones are still being verified.
 *
 * Keys:
 *   failed_login:{email}   attempts since the last success, TTL = lockout duration from the first
 *   lockout:{email}        lock expiry (epoch ms), TTL = lockout duration
 */

import type { KeyValueStore } from 'core-service';
import { normalizeEmail } from '../utils.js';
import type { StoreGuard } from './store-guard.js';

export interface LockoutPolicy {
  /** Failures that trigger a lock */
  threshold: number;
  durationSeconds: number;
}

export interface LockStatus {
  locked: boolean;
  /** Seconds until the lock lifts (0 when unlocked) */
  retryAfter: number;
}

export interface AttemptReservation {
  /** Position of this attempt since the last success */
  attempt: number;
  /** False once the threshold is used up; the password must not be checked */
  allowed: boolean;
  /** Seconds until the attempt counter expires */
  retryAfter: number;
}

export interface FailureOutcome {
  failedCount: number;
  /** True when this failure triggered the lock */
  locked: boolean;
}

const failedKey = (email: string) => `failed_login:${normalizeEmail(email)}`;
const lockKey = (email: string) => `lockout:${normalizeEmail(email)}`;

export class LoginGuard {
  constructor(
    private readonly store: KeyValueStore,
    private readonly guard: StoreGuard,
    private readonly policy: LockoutPolicy,
    private readonly now: () => number = () => Date.now()
  ) {}

  async lockStatus(email: string): Promise<LockStatus> {
    const lockedUntil = await this.guard.run('loginGuard.lockStatus', () => this.store.get(lockKey(email)));
    if (lockedUntil === null) {
      return { locked: false, retryAfter: 0 };
    }

    const remainingMs = Number(lockedUntil) - this.now();
    return {
      locked: true,
      retryAfter: Number.isFinite(remainingMs) ? Math.max(1, Math.ceil(remainingMs / 1000)) : this.policy.durationSeconds,
    };
  }

  /** Count an attempt before its credentials are verified */
  async reserveAttempt(email: string): Promise<AttemptReservation> {
    const durationMs = this.policy.durationSeconds * 1000;
    const { count, ttlMs } = await this.guard.run('loginGuard.reserveAttempt', () =>
      this.store.incrementWindow(failedKey(email), durationMs)
    );

    return {
      attempt: count,
      allowed: count <= this.policy.threshold,
      retryAfter: Math.max(1, Math.ceil(ttlMs / 1000)),
    };
  }

  /** Settle a reserved attempt as failed; the attempt that reaches the threshold locks */
  async recordFailure(email: string, reservation: AttemptReservation): Promise<FailureOutcome> {
    if (reservation.attempt < this.policy.threshold) {
      return { failedCount: reservation.attempt, locked: false };
    }

    const durationMs = this.policy.durationSeconds * 1000;
    await this.guard.run('loginGuard.lock', () =>
      this.store.set(lockKey(email), String(this.now() + durationMs), durationMs)
    );
    return { failedCount: reservation.attempt, locked: true };
  }

  async reset(email: string): Promise<void> {
    await this.guard.run('loginGuard.reset', () => this.store.del([failedKey(email), lockKey(email)]));
  }
}
