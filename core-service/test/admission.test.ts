/**
 * Admission Controller Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { AdmissionController, AdmissionError, type Permit } from '../src/index.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

afterEach(() => {
  vi.useRealTimers();
});

describe('AdmissionController', () => {
  // ═══════════════════════════════════════════════════════════════════
  // BOUNDED CONCURRENCY
  // ═══════════════════════════════════════════════════════════════════

  describe('concurrency bound', () => {
    it('should never run more than maxConcurrent tasks at once', async () => {
      const admission = new AdmissionController({ maxConcurrent: 2, queueCapacity: 5, waitTimeoutMs: 5000 });
      const gates = [deferred(), deferred(), deferred()];
      let running = 0;
      let peak = 0;

      const tasks = gates.map(gate =>
        admission.run(async () => {
          running++;
          peak = Math.max(peak, running);
          await gate.promise;
          running--;
        })
      );

      await Promise.resolve();
      expect(admission.getMetrics()).toMatchObject({ active: 2, queued: 1 });

      gates.forEach(gate => gate.resolve());
      await Promise.all(tasks);

      expect(peak).toBe(2);
      expect(admission.getMetrics()).toMatchObject({ active: 0, queued: 0, admitted: 3, rejected: 0 });
    });

    it('should hand a released permit to the oldest waiter', async () => {
      const admission = new AdmissionController({ maxConcurrent: 1, queueCapacity: 5, waitTimeoutMs: 5000 });
      const order: string[] = [];

      const first = await admission.acquire();
      const second = admission.acquire().then(permit => {
        order.push('second');
        return permit;
      });
      const third = admission.acquire().then(permit => {
        order.push('third');
        return permit;
      });

      first.release();
      (await second).release();
      (await third).release();

      expect(order).toEqual(['second', 'third']);
      expect(admission.getMetrics().active).toBe(0);
    });

    it('should ignore a second release of the same permit', async () => {
      const admission = new AdmissionController({ maxConcurrent: 2, queueCapacity: 0, waitTimeoutMs: 100 });
      const permit = await admission.acquire();
      await admission.acquire();

      permit.release();
      permit.release();

      expect(admission.getMetrics().active).toBe(1);
    });

    it('should release the permit when the task throws', async () => {
      const admission = new AdmissionController({ maxConcurrent: 1, queueCapacity: 0, waitTimeoutMs: 100 });

      await expect(admission.run(async () => {
        throw new Error('boom');
      })).rejects.toThrow('boom');

      expect(admission.getMetrics().active).toBe(0);
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // REJECTION
  // ═══════════════════════════════════════════════════════════════════

  describe('rejection', () => {
    it('should reject immediately with Overloaded at the reject threshold', async () => {
      const admission = new AdmissionController({
        maxConcurrent: 1,
        queueCapacity: 10,
        rejectThreshold: 2,
        waitTimeoutMs: 5000,
      });

      const first = await admission.acquire();
      const queued = admission.acquire();

      await expect(admission.acquire()).rejects.toMatchObject({
        name: 'AdmissionError',
        reason: 'Overloaded',
        retryAfter: 5,
      });
      expect(admission.getMetrics()).toMatchObject({ active: 1, queued: 1, rejected: 1 });

      first.release();
      (await queued).release();
    });

    it('should default the reject threshold to maxConcurrent + queueCapacity', async () => {
      const admission = new AdmissionController({ maxConcurrent: 1, queueCapacity: 0, waitTimeoutMs: 5000 });
      expect(admission.rejectThreshold).toBe(1);

      await admission.acquire();
      const error = await admission.acquire().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AdmissionError);
      expect(error).toMatchObject({ reason: 'Overloaded' });
    });

    it('should reject with a short retry hint when the queue is full', async () => {
      const admission = new AdmissionController({
        maxConcurrent: 1,
        queueCapacity: 1,
        rejectThreshold: 10,
        waitTimeoutMs: 5000,
      });

      const first = await admission.acquire();
      const queued = admission.acquire();

      await expect(admission.acquire()).rejects.toMatchObject({ reason: 'Overloaded', retryAfter: 1 });

      first.release();
      (await queued).release();
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // TIMEOUT
  // ═══════════════════════════════════════════════════════════════════

  describe('queue timeout', () => {
    it('should fail a waiter with QueueTimeout when no permit frees up in time', async () => {
      vi.useFakeTimers();
      const admission = new AdmissionController({ maxConcurrent: 1, queueCapacity: 5, waitTimeoutMs: 100 });

      const holder = await admission.acquire();
      const waiting = expect(admission.acquire()).rejects.toMatchObject({ reason: 'QueueTimeout', retryAfter: 2 });

      await vi.advanceTimersByTimeAsync(100);
      await waiting;

      expect(admission.getMetrics()).toMatchObject({ active: 1, queued: 0, timedOut: 1 });
      holder.release();
      expect(admission.getMetrics().active).toBe(0);
    });

    it('should honour a per-call timeout', async () => {
      vi.useFakeTimers();
      const admission = new AdmissionController({ maxConcurrent: 1, queueCapacity: 5, waitTimeoutMs: 10_000 });

      await admission.acquire();
      const waiting = expect(admission.acquire(20)).rejects.toMatchObject({ reason: 'QueueTimeout' });

      await vi.advanceTimersByTimeAsync(20);
      await waiting;
    });

    it('should record how long an admitted waiter queued', async () => {
      vi.useFakeTimers();
      const admission = new AdmissionController({ maxConcurrent: 1, queueCapacity: 5, waitTimeoutMs: 1000 });

      const holder = await admission.acquire();
      const waiting = admission.acquire();

      await vi.advanceTimersByTimeAsync(50);
      holder.release();
      const permit: Permit = await waiting;

      expect(permit.waitedMs).toBe(50);
      expect(admission.getMetrics()).toMatchObject({ maxWaitMs: 50, averageWaitMs: 25, admitted: 2 });
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // HEALTH
  // ═══════════════════════════════════════════════════════════════════

  describe('getHealthStatus', () => {
    it('should grade load against the reject threshold', async () => {
      const admission = new AdmissionController({ maxConcurrent: 10, queueCapacity: 0, waitTimeoutMs: 100 });
      expect(admission.getHealthStatus()).toEqual({ status: 'healthy', utilizationPercent: 0 });

      for (let i = 0; i < 7; i++) await admission.acquire();
      expect(admission.getHealthStatus()).toEqual({ status: 'warning', utilizationPercent: 70 });

      for (let i = 0; i < 2; i++) await admission.acquire();
      expect(admission.getHealthStatus()).toEqual({ status: 'critical', utilizationPercent: 90 });
    });
  });
});
