/**
 * Credential Verifier
 *
 * bcrypt runs on the libuv threadpool, off the event loop. A dedicated
 * admission controller bounds how many hashes run at once so a login
 * burst cannot starve the threadpool that DNS and fs also use.
 */

import crypto from 'node:crypto';
import bcrypt from 'bcrypt';
import { AdmissionController, type AdmissionMetrics } from 'core-service';

export interface CredentialVerifierOptions {
  /** Hash operations allowed to run at once */
  concurrency: number;
  /** Waiting hash operations before callers are rejected */
  queueCapacity: number;
  waitTimeoutMs: number;
  /** bcrypt cost factor for new hashes (default: 12) */
  rounds?: number;
}

const DEFAULT_ROUNDS = 12;

export class CredentialVerifier {
  private readonly pool: AdmissionController;
  private readonly rounds: number;
  private dummyHash: Promise<string> | null = null;

  constructor(options: CredentialVerifierOptions) {
    this.rounds = options.rounds ?? DEFAULT_ROUNDS;
    this.pool = new AdmissionController({
      name: 'password-hash',
      maxConcurrent: options.concurrency,
      queueCapacity: options.queueCapacity,
      waitTimeoutMs: options.waitTimeoutMs,
    });
  }

  async hash(password: string): Promise<string> {
    return this.pool.run(() => bcrypt.hash(password, this.rounds));
  }

  async verify(password: string, hash: string): Promise<boolean> {
    return this.pool.run(() => bcrypt.compare(password, hash));
  }

  /**
   * Spend the same work as a real verification for a subject that does
   * not exist, so timing does not reveal which e-mails are registered.
   */
  async verifyDummy(password: string): Promise<void> {
    const hash = await this.loadDummyHash();
    await this.verify(password, hash);
  }

  /** Hashed once through the pool; a failed attempt is not cached */
  private async loadDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = this.hash(crypto.randomBytes(16).toString('hex'));
    }

    const pending = this.dummyHash;
    try {
      return await pending;
    } catch (error) {
      if (this.dummyHash === pending) this.dummyHash = null;
      throw error;
    }
  }

  getMetrics(): AdmissionMetrics {
    return this.pool.getMetrics();
  }
}
