/**
 * Credential Verifier Tests
 *
 * Real bcrypt at a low cost factor, behind a one-slot hash pool.
 */

import { describe, it, expect } from 'vitest';
import { AdmissionError } from 'core-service';
import { CredentialVerifier } from '../src/services/credential-verifier.js';
import { TEST_HASH_ROUNDS } from './helpers/fakes.js';

const oneSlot = () =>
  new CredentialVerifier({ concurrency: 1, queueCapacity: 0, waitTimeoutMs: 1000, rounds: TEST_HASH_ROUNDS });

describe('CredentialVerifier', () => {
  it('should verify against its own hashes', async () => {
    const verifier = oneSlot();
    const hash = await verifier.hash('test-password');

    expect(await verifier.verify('test-password', hash)).toBe(true);
    expect(await verifier.verify('wrong-password', hash)).toBe(false);
  });

  it('should compute the dummy hash inside the hash pool', async () => {
    const verifier = oneSlot();
    const hash = await verifier.hash('test-password');

    const busy = verifier.verify('test-password', hash);
    const dummy = verifier.verifyDummy('test-password');

    await expect(dummy).rejects.toBeInstanceOf(AdmissionError);
    expect(await busy).toBe(true);
    expect(verifier.getMetrics().rejected).toBe(1);
  });

  it('should compute the dummy hash again after a failed attempt', async () => {
    const verifier = oneSlot();
    const hash = await verifier.hash('test-password');

    const busy = verifier.verify('test-password', hash);
    await expect(verifier.verifyDummy('test-password')).rejects.toMatchObject({ reason: 'Overloaded' });
    await busy;

    await expect(verifier.verifyDummy('test-password')).resolves.toBeUndefined();
    // hash, verify, rejected dummy, dummy hash, dummy verify
    expect(verifier.getMetrics()).toMatchObject({ totalRequests: 5, admitted: 4, rejected: 1 });
  });
});
