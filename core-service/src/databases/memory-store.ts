/**
 * In-process KeyValueStore
 *
 * Same TTL semantics as the Redis implementation, driven by Date.now() so
 * fake timers control expiry. Suitable for tests and single-instance
 * development; state is not shared across processes.
 */

import type { KeyValueEntry, KeyValueStore, WindowCount } from './kv-store.js';

interface Entry {
  value: string | Set<string>;
  expiresAt: number;
}

export class MemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, Entry>();

  async get(key: string): Promise<string | null> {
    const entry = this.live(key);
    return entry && typeof entry.value === 'string' ? entry.value : null;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: Date.now() + ttlMs });
  }

  async setMany(entries: readonly KeyValueEntry[]): Promise<void> {
    for (const { key, value, ttlMs } of entries) {
      this.entries.set(key, { value, expiresAt: Date.now() + ttlMs });
    }
  }

  async del(keys: string | readonly string[]): Promise<number> {
    let deleted = 0;
    for (const key of typeof keys === 'string' ? [keys] : keys) {
      if (this.live(key) && this.entries.delete(key)) deleted++;
    }
    return deleted;
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== undefined;
  }

  async addToSet(key: string, member: string, ttlMs: number): Promise<void> {
    const entry = this.live(key);
    const members = entry && entry.value instanceof Set ? entry.value : new Set<string>();
    members.add(member);
    this.entries.set(key, { value: members, expiresAt: Date.now() + ttlMs });
  }

  async removeFromSet(key: string, member: string): Promise<void> {
    const entry = this.live(key);
    if (!entry || !(entry.value instanceof Set)) return;
    entry.value.delete(member);
    // Redis removes a set once its last member is gone
    if (entry.value.size === 0) this.entries.delete(key);
  }

  async getSetMembers(key: string): Promise<string[]> {
    const entry = this.live(key);
    return entry && entry.value instanceof Set ? [...entry.value] : [];
  }

  async incrementWindow(key: string, windowMs: number): Promise<WindowCount> {
    const now = Date.now();
    const entry = this.live(key);
    if (!entry || typeof entry.value !== 'string') {
      this.entries.set(key, { value: '1', expiresAt: now + windowMs });
      return { count: 1, ttlMs: windowMs };
    }
    const count = Number(entry.value) + 1;
    entry.value = String(count);
    return { count, ttlMs: entry.expiresAt - now };
  }

  async *scan(pattern: string): AsyncIterable<string> {
    const matcher = globToRegExp(pattern);
    for (const key of [...this.entries.keys()]) {
      if (this.live(key) && matcher.test(key)) yield key;
    }
  }

  async ping(): Promise<boolean> {
    return true;
  }

  /** Number of unexpired keys */
  size(): number {
    let count = 0;
    for (const key of [...this.entries.keys()]) {
      if (this.live(key)) count++;
    }
    return count;
  }

  /** Milliseconds until `key` expires, or -2 when it does not exist (PTTL convention) */
  ttl(key: string): number {
    const entry = this.live(key);
    return entry ? entry.expiresAt - Date.now() : -2;
  }

  clear(): void {
    this.entries.clear();
  }

  // Lazy expiry on access
  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}

/** Redis glob subset: `*`, `?` and literal characters */
function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map(char => (char === '*' ? '.*' : char === '?' ? '.' : char.replace(/[.+^${}()|[\]\\]/g, '\\$&')))
    .join('');
  return new RegExp(`^${source}$`);
}
