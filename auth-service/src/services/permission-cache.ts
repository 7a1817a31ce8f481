/**
 * Permission Cache
 *
 * Cache-aside store of resolved (roles, permissions) per subject. The
 * credential store stays the source of truth: an entry may vanish at any
 * time, and a read failure falls back to the loader instead of denying.
 *
 * A population racing a concurrent invalidation may write a stale value;
 * the TTL bounds how long it survives.
 *
 * Key: permissions:{subjectId}
 */

import { type } from 'arktype';
import { deleteByPattern, getErrorMessage, logger, type KeyValueStore } from 'core-service';
import type { ResolvedPermissions } from '../types.js';
import type { StoreGuard } from './store-guard.js';

const PREFIX = 'permissions:';

export const permissionCacheKey = (subjectId: string) => `${PREFIX}${subjectId}`;

const cachedPermissions = type({
  roles: 'string[]',
  permissions: 'string[]',
});

function parseEntry(raw: string): ResolvedPermissions | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = cachedPermissions(value);
  return parsed instanceof type.errors ? null : parsed;
}

export class PermissionCache {
  constructor(
    private readonly store: KeyValueStore,
    private readonly guard: StoreGuard,
    private readonly ttlSeconds: number
  ) {}

  async get(subjectId: string): Promise<ResolvedPermissions | null> {
    const raw = await this.guard.run('permissionCache.get', () => this.store.get(permissionCacheKey(subjectId)));
    if (raw === null) return null;

    const entry = parseEntry(raw);
    if (!entry) {
      logger.warn('Discarding unreadable permission cache entry', { subjectId });
      await this.invalidate(subjectId);
    }
    return entry;
  }

  async set(subjectId: string, value: ResolvedPermissions, ttlSeconds: number = this.ttlSeconds): Promise<void> {
    const serialized = JSON.stringify({ roles: value.roles, permissions: value.permissions });
    await this.guard.run('permissionCache.set', () =>
      this.store.set(permissionCacheKey(subjectId), serialized, ttlSeconds * 1000)
    );
  }

  async invalidate(subjectId: string): Promise<void> {
    await this.guard.run('permissionCache.invalidate', () => this.store.del(permissionCacheKey(subjectId)));
  }

  async invalidateMany(subjectIds: readonly string[]): Promise<void> {
    if (subjectIds.length === 0) return;
    await this.guard.run('permissionCache.invalidateMany', () => this.store.del(subjectIds.map(permissionCacheKey)));
  }

  /** Drop every entry by incremental SCAN; never a blocking flush */
  async invalidateAll(): Promise<number> {
    const removed = await this.guard.run('permissionCache.invalidateAll', () =>
      deleteByPattern(this.store, `${PREFIX}*`)
    );
    logger.info('Permission cache cleared', { removed });
    return removed;
  }

  /**
   * Cache-aside read. Cache failures degrade to the loader; loader
   * failures propagate.
   */
  async getOrLoad(subjectId: string, load: () => Promise<ResolvedPermissions>): Promise<ResolvedPermissions> {
    try {
      const cached = await this.get(subjectId);
      if (cached) return cached;
    } catch (error) {
      logger.warn('Permission cache read failed, loading from store', { subjectId, error: getErrorMessage(error) });
    }

    const resolved = await load();

    try {
      await this.set(subjectId, resolved);
    } catch (error) {
      logger.warn('Permission cache write failed', { subjectId, error: getErrorMessage(error) });
    }

    return resolved;
  }
}
