/**
 * MemoryKeyValueStore Tests
 *
 * Exercises the TTL contract shared with the Redis implementation.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MemoryKeyValueStore, deleteByPattern } from '../src/index.js';

describe('MemoryKeyValueStore', () => {
  let store: MemoryKeyValueStore;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T00:00:00Z'));
    store = new MemoryKeyValueStore();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should expire values after their TTL', async () => {
    await store.set('blacklist:a', '1', 1000);
    expect(await store.get('blacklist:a')).toBe('1');
    expect(await store.exists('blacklist:a')).toBe(true);

    vi.advanceTimersByTime(1000);
    expect(await store.get('blacklist:a')).toBeNull();
    expect(await store.exists('blacklist:a')).toBe(false);
  });

  it('should write many entries with individual TTLs', async () => {
    await store.setMany([
      { key: 'k1', value: 'a', ttlMs: 500 },
      { key: 'k2', value: 'b', ttlMs: 1500 },
    ]);

    vi.advanceTimersByTime(1000);
    expect(await store.get('k1')).toBeNull();
    expect(await store.get('k2')).toBe('b');
  });

  it('should count only live keys as deleted', async () => {
    await store.set('x', '1', 100);
    await store.set('y', '1', 10_000);
    vi.advanceTimersByTime(200);

    expect(await store.del(['x', 'y', 'z'])).toBe(1);
  });

  it('should refresh a set TTL on every add', async () => {
    await store.addToSet('active_tokens:1', 'j1', 1000);
    vi.advanceTimersByTime(800);
    await store.addToSet('active_tokens:1', 'j2', 1000);
    vi.advanceTimersByTime(800);

    expect((await store.getSetMembers('active_tokens:1')).sort()).toEqual(['j1', 'j2']);

    vi.advanceTimersByTime(200);
    expect(await store.getSetMembers('active_tokens:1')).toEqual([]);
  });

  it('should drop a set when its last member is removed', async () => {
    await store.addToSet('s', 'only', 1000);
    await store.removeFromSet('s', 'only');
    expect(await store.exists('s')).toBe(false);
  });

  it('should start the window on the first increment only', async () => {
    expect(await store.incrementWindow('ratelimit:c:login:1', 60_000)).toEqual({ count: 1, ttlMs: 60_000 });

    vi.advanceTimersByTime(10_000);
    expect(await store.incrementWindow('ratelimit:c:login:1', 60_000)).toEqual({ count: 2, ttlMs: 50_000 });

    vi.advanceTimersByTime(50_000);
    expect(await store.incrementWindow('ratelimit:c:login:1', 60_000)).toEqual({ count: 1, ttlMs: 60_000 });
  });

  it('should scan by glob and delete matches in batches', async () => {
    await store.set('permissions:1', 'a', 10_000);
    await store.set('permissions:2', 'b', 10_000);
    await store.set('permissions:10', 'c', 10_000);
    await store.set('blacklist:1', 'd', 10_000);

    const matched: string[] = [];
    for await (const key of store.scan('permissions:?')) matched.push(key);
    expect(matched.sort()).toEqual(['permissions:1', 'permissions:2']);

    expect(await deleteByPattern(store, 'permissions:*', 2)).toBe(3);
    expect(store.size()).toBe(1);
    expect(await store.get('blacklist:1')).toBe('d');
  });

  it('should report remaining TTL in PTTL convention', async () => {
    await store.set('k', 'v', 3000);
    vi.advanceTimersByTime(1000);
    expect(store.ttl('k')).toBe(2000);
    expect(store.ttl('missing')).toBe(-2);
  });
});
