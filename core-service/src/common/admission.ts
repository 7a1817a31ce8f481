/**
 * Admission Controller - Bounded concurrency with a bounded wait queue
 *
 * Keeps the number of requests executing business logic below the
 * database pool size, queues a bounded number of extra requests, and
 * rejects the rest immediately.
 *
 * @example
 * ```typescript
 * const admission = new AdmissionController({ maxConcurrent: 15, queueCapacity: 200, waitTimeoutMs: 3000 });
 *
 * const result = await admission.run(() => sessionService.login(input, context));
 * ```
 */

import { logger } from './logger.js';

// ═══════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════

export interface AdmissionConfig {
  /** Permits available for concurrent execution */
  maxConcurrent: number;
  /** Requests allowed to wait for a permit */
  queueCapacity: number;
  /** Reject immediately once active + queued reaches this (default: maxConcurrent + queueCapacity) */
  rejectThreshold?: number;
  /** Default queue wait before QueueTimeout */
  waitTimeoutMs: number;
  /** Name for logging (default: 'admission') */
  name?: string;
  /** Suggested retry delays in seconds */
  retryAfter?: Partial<Record<'overloaded' | 'queueFull' | 'timeout', number>>;
}

export type AdmissionFailure = 'Overloaded' | 'QueueTimeout';

export class AdmissionError extends Error {
  readonly reason: AdmissionFailure;
  /** Suggested delay before retrying, in seconds */
  readonly retryAfter: number;

  constructor(reason: AdmissionFailure, message: string, retryAfter: number) {
    super(message);
    this.name = 'AdmissionError';
    this.reason = reason;
    this.retryAfter = retryAfter;
  }
}

export interface Permit {
  /** Milliseconds spent waiting in the queue */
  readonly waitedMs: number;
  /** Return the permit. Calling it more than once has no effect. */
  release(): void;
}

export interface AdmissionMetrics {
  active: number;
  queued: number;
  maxConcurrent: number;
  queueCapacity: number;
  rejectThreshold: number;
  totalRequests: number;
  admitted: number;
  rejected: number;
  timedOut: number;
  averageWaitMs: number;
  maxWaitMs: number;
}

export type AdmissionHealth = 'healthy' | 'warning' | 'critical';

interface Waiter {
  enqueuedAt: number;
  timer: ReturnType<typeof setTimeout>;
  resolve: (permit: Permit) => void;
}

const DEFAULT_RETRY_AFTER = { overloaded: 5, queueFull: 1, timeout: 2 };

// ═══════════════════════════════════════════════════════════════════
// Controller
// ═══════════════════════════════════════════════════════════════════

export class AdmissionController {
  readonly maxConcurrent: number;
  readonly queueCapacity: number;
  readonly rejectThreshold: number;
  readonly waitTimeoutMs: number;
  private readonly name: string;
  private readonly retryAfter: typeof DEFAULT_RETRY_AFTER;

  private active = 0;
  private readonly queue: Waiter[] = [];

  private totalRequests = 0;
  private admitted = 0;
  private rejected = 0;
  private timedOut = 0;
  private totalWaitMs = 0;
  private maxWaitMs = 0;

  constructor(config: AdmissionConfig) {
    if (config.maxConcurrent < 1) throw new Error('maxConcurrent must be at least 1');
    if (config.queueCapacity < 0) throw new Error('queueCapacity must not be negative');

    this.maxConcurrent = config.maxConcurrent;
    this.queueCapacity = config.queueCapacity;
    this.rejectThreshold = config.rejectThreshold ?? config.maxConcurrent + config.queueCapacity;
    this.waitTimeoutMs = config.waitTimeoutMs;
    this.name = config.name ?? 'admission';
    this.retryAfter = { ...DEFAULT_RETRY_AFTER, ...config.retryAfter };
  }

  /**
   * Obtain a permit, waiting at most `timeoutMs` in the queue.
   *
   * @throws AdmissionError Overloaded when active + queued has reached the
   *   reject threshold or the queue is full, QueueTimeout when no permit
   *   became free in time
   */
  acquire(timeoutMs: number = this.waitTimeoutMs): Promise<Permit> {
    this.totalRequests++;

    if (this.active + this.queue.length >= this.rejectThreshold) {
      this.rejected++;
      logger.warn(`${this.name}: rejecting request, system overloaded`, {
        active: this.active,
        queued: this.queue.length,
        rejectThreshold: this.rejectThreshold,
      });
      return Promise.reject(
        new AdmissionError('Overloaded', 'System is experiencing high load', this.retryAfter.overloaded)
      );
    }

    if (this.active < this.maxConcurrent) {
      this.active++;
      this.recordAdmission(0);
      return Promise.resolve(this.createPermit(0));
    }

    if (this.queue.length >= this.queueCapacity) {
      this.rejected++;
      return Promise.reject(
        new AdmissionError('Overloaded', 'Service queue is full', this.retryAfter.queueFull)
      );
    }

    return new Promise<Permit>((resolve, reject) => {
      const waiter: Waiter = {
        enqueuedAt: Date.now(),
        resolve,
        timer: setTimeout(() => {
          const index = this.queue.indexOf(waiter);
          if (index === -1) return;
          this.queue.splice(index, 1);
          this.timedOut++;
          reject(
            new AdmissionError('QueueTimeout', `Request timed out after ${timeoutMs}ms in queue`, this.retryAfter.timeout)
          );
        }, Math.max(0, timeoutMs)),
      };
      this.queue.push(waiter);
    });
  }

  /**
   * Run `fn` holding a permit; the permit is released when `fn` settles
   */
  async run<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    const permit = await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      permit.release();
    }
  }

  getMetrics(): AdmissionMetrics {
    return {
      active: this.active,
      queued: this.queue.length,
      maxConcurrent: this.maxConcurrent,
      queueCapacity: this.queueCapacity,
      rejectThreshold: this.rejectThreshold,
      totalRequests: this.totalRequests,
      admitted: this.admitted,
      rejected: this.rejected,
      timedOut: this.timedOut,
      averageWaitMs: this.admitted > 0 ? Math.round(this.totalWaitMs / this.admitted) : 0,
      maxWaitMs: this.maxWaitMs,
    };
  }

  /** Load relative to the reject threshold: <70% healthy, <90% warning */
  getHealthStatus(): { status: AdmissionHealth; utilizationPercent: number } {
    const utilization = ((this.active + this.queue.length) / this.rejectThreshold) * 100;
    const status: AdmissionHealth = utilization < 70 ? 'healthy' : utilization < 90 ? 'warning' : 'critical';
    return { status, utilizationPercent: Math.round(utilization) };
  }

  // ─────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────

  private createPermit(waitedMs: number): Permit {
    let released = false;
    return {
      waitedMs,
      release: () => {
        if (released) return;
        released = true;
        this.releaseSlot();
      },
    };
  }

  // Hands the slot straight to the oldest waiter so `active` never dips
  private releaseSlot(): void {
    const next = this.queue.shift();
    if (!next) {
      this.active--;
      return;
    }
    clearTimeout(next.timer);
    const waitedMs = Date.now() - next.enqueuedAt;
    this.recordAdmission(waitedMs);
    next.resolve(this.createPermit(waitedMs));
  }

  private recordAdmission(waitedMs: number): void {
    this.admitted++;
    this.totalWaitMs += waitedMs;
    if (waitedMs > this.maxWaitMs) this.maxWaitMs = waitedMs;
  }
}
