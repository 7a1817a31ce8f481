/**
 * Key-Value Store - shared state contract
 *
 * Revocation registry, permission cache, rate limiter and lockout counters
 * all depend on this interface rather than on a concrete client, so a
 * process-local implementation can stand in for Redis in tests.
 *
 * All TTLs are in milliseconds and are enforced by the store itself.
 */

export interface WindowCount {
  /** Counter value after this increment */
  count: number;
  /** Milliseconds until the counter expires */
  ttlMs: number;
}

export interface KeyValueEntry {
  key: string;
  value: string;
  ttlMs: number;
}

export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
  /** Write several entries in a single round trip */
  setMany(entries: readonly KeyValueEntry[]): Promise<void>;
  /** Returns the number of keys removed */
  del(keys: string | readonly string[]): Promise<number>;
  exists(key: string): Promise<boolean>;

  /** Add a member and reset the whole set's TTL, atomically */
  addToSet(key: string, member: string, ttlMs: number): Promise<void>;
  removeFromSet(key: string, member: string): Promise<void>;
  getSetMembers(key: string): Promise<string[]>;

  /**
   * Atomically increment a counter. The first increment starts a TTL of
   * `windowMs`; later increments leave the TTL untouched.
   */
  incrementWindow(key: string, windowMs: number): Promise<WindowCount>;

  /** Iterate keys matching a glob pattern without blocking the store */
  scan(pattern: string, batchSize?: number): AsyncIterable<string>;

  ping(): Promise<boolean>;
}

/**
 * Delete every key matching `pattern` in scan-sized batches
 */
export async function deleteByPattern(
  store: KeyValueStore,
  pattern: string,
  batchSize = 100
): Promise<number> {
  let deleted = 0;
  let batch: string[] = [];

  for await (const key of store.scan(pattern, batchSize)) {
    batch.push(key);
    if (batch.length >= batchSize) {
      deleted += await store.del(batch);
      batch = [];
    }
  }
  if (batch.length > 0) {
    deleted += await store.del(batch);
  }
  return deleted;
}
