/**
 * Redis KeyValueStore
 *
 * Every command is bounded by a command timeout. Multi-step updates are
 * made atomic with MULTI or a Lua script so concurrent callers on other
 * instances never observe a half-applied change.
 */

import type { KeyValueEntry, KeyValueStore, WindowCount } from '../kv-store.js';
import type { RedisClient } from './connection.js';

// INCR, start the window on the first hit, report the remaining TTL
const INCREMENT_WINDOW_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
if count == 1 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
end
local ttl = redis.call('PTTL', KEYS[1])
if ttl < 0 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
  ttl = tonumber(ARGV[1])
end
return { count, ttl }
`;

export class CommandTimeoutError extends Error {
  constructor(command: string, timeoutMs: number) {
    super(`Redis command ${command} timed out after ${timeoutMs}ms`);
    this.name = 'CommandTimeoutError';
  }
}

export interface RedisKeyValueStoreOptions {
  /** Per-command timeout in ms (default: 2000) */
  commandTimeoutMs?: number;
}

export class RedisKeyValueStore implements KeyValueStore {
  private readonly commandTimeoutMs: number;

  constructor(
    private readonly client: RedisClient,
    options: RedisKeyValueStoreOptions = {}
  ) {
    this.commandTimeoutMs = options.commandTimeoutMs ?? 2000;
  }

  async get(key: string): Promise<string | null> {
    const value = await this.bounded('GET', this.client.get(key));
    return value === null ? null : String(value);
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    await this.bounded('PSETEX', this.client.pSetEx(key, Math.max(1, Math.ceil(ttlMs)), value));
  }

  async setMany(entries: readonly KeyValueEntry[]): Promise<void> {
    if (entries.length === 0) return;
    const pipeline = this.client.multi();
    for (const { key, value, ttlMs } of entries) {
      pipeline.pSetEx(key, Math.max(1, Math.ceil(ttlMs)), value);
    }
    await this.bounded('PIPELINE', pipeline.execAsPipeline());
  }

  async del(keys: string | readonly string[]): Promise<number> {
    const list = typeof keys === 'string' ? [keys] : [...keys];
    if (list.length === 0) return 0;
    return Number(await this.bounded('DEL', this.client.del(list)));
  }

  async exists(key: string): Promise<boolean> {
    return Number(await this.bounded('EXISTS', this.client.exists(key))) > 0;
  }

  async addToSet(key: string, member: string, ttlMs: number): Promise<void> {
    await this.bounded(
      'MULTI',
      this.client.multi().sAdd(key, member).pExpire(key, Math.max(1, Math.ceil(ttlMs))).exec()
    );
  }

  async removeFromSet(key: string, member: string): Promise<void> {
    await this.bounded('SREM', this.client.sRem(key, member));
  }

  async getSetMembers(key: string): Promise<string[]> {
    const members = await this.bounded('SMEMBERS', this.client.sMembers(key));
    return Array.from(members, member => String(member));
  }

  async incrementWindow(key: string, windowMs: number): Promise<WindowCount> {
    const reply = await this.bounded(
      'EVAL',
      this.client.eval(INCREMENT_WINDOW_SCRIPT, {
        keys: [key],
        arguments: [String(Math.max(1, Math.ceil(windowMs)))],
      })
    );
    if (!Array.isArray(reply) || reply.length !== 2) {
      throw new Error('Unexpected reply from window increment script');
    }
    return { count: Number(reply[0]), ttlMs: Number(reply[1]) };
  }

  async *scan(pattern: string, batchSize = 100): AsyncIterable<string> {
    for await (const keyOrBatch of this.client.scanIterator({ MATCH: pattern, COUNT: batchSize })) {
      // node-redis v4 yields single keys, v5 yields batches
      const keys: unknown[] = Array.isArray(keyOrBatch) ? keyOrBatch : [keyOrBatch];
      for (const key of keys) {
        yield String(key);
      }
    }
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.bounded('PING', this.client.ping())) === 'PONG';
    } catch {
      return false;
    }
  }

  private bounded<T>(command: string, operation: Promise<T>): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new CommandTimeoutError(command, this.commandTimeoutMs)), this.commandTimeoutMs);
    });
    return Promise.race([operation, timeout]).finally(() => clearTimeout(timer));
  }
}
