/**
 * Revocation Registry
 *
 * Shared answer to "is this access token jti usable" and "which jtis are
 * live for subject X". Every entry carries a TTL enforced by the store,
 * so the registry never outgrows the set of unexpired tokens.
 *
 * Keys:
 *   blacklist:{jti}              TTL = remaining token lifetime
 *   active_tokens:{subjectId}    set of "{jti}|{exp}" members, TTL = access token lifetime
 */

import type { KeyValueStore } from 'core-service';
import type { StoreGuard } from './store-guard.js';

export const REGISTRY_KEYS = {
  blacklist: (jti: string) => `blacklist:${jti}`,
  activeTokens: (subjectId: string) => `active_tokens:${subjectId}`,
} as const;

export interface BlacklistEntry {
  jti: string;
  ttlSeconds: number;
}

export interface ActiveToken {
  jti: string;
  /** Expiry in epoch seconds; null for a member written without one */
  exp: number | null;
}

const toMember = (jti: string, exp: number) => `${jti}|${exp}`;

function fromMember(member: string): ActiveToken {
  const separator = member.lastIndexOf('|');
  if (separator < 0) return { jti: member, exp: null };

  const exp = Number(member.slice(separator + 1));
  return { jti: member.slice(0, separator), exp: Number.isInteger(exp) ? exp : null };
}

export class RevocationRegistry {
  constructor(
    private readonly store: KeyValueStore,
    private readonly guard: StoreGuard,
    private readonly now: () => number = () => Date.now()
  ) {}

  /**
   * Track a freshly issued jti with its expiry; the set's TTL restarts
   * with each add. Callers register before the token is handed out.
   */
  async registerActive(subjectId: string, jti: string, expiresAt: Date, ttlSeconds: number): Promise<void> {
    const member = toMember(jti, Math.floor(expiresAt.getTime() / 1000));
    await this.guard.run('registry.registerActive', () =>
      this.store.addToSet(REGISTRY_KEYS.activeTokens(subjectId), member, ttlSeconds * 1000)
    );
  }

  async isBlacklisted(jti: string): Promise<boolean> {
    return this.guard.run('registry.isBlacklisted', () => this.store.exists(REGISTRY_KEYS.blacklist(jti)));
  }

  /**
   * Blacklist a jti for the rest of its token's lifetime. A token with
   * no lifetime left is already unusable and is not recorded.
   */
  async blacklist(jti: string, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) return;

    await this.guard.run('registry.blacklist', () =>
      this.store.set(REGISTRY_KEYS.blacklist(jti), '1', ttlSeconds * 1000)
    );
  }

  /** Blacklist several jtis in one round trip */
  async blacklistMany(entries: readonly BlacklistEntry[]): Promise<void> {
    const live = entries.filter(entry => entry.ttlSeconds > 0);
    if (live.length === 0) return;

    await this.guard.run('registry.blacklistMany', () =>
      this.store.setMany(
        live.map(entry => ({ key: REGISTRY_KEYS.blacklist(entry.jti), value: '1', ttlMs: entry.ttlSeconds * 1000 }))
      )
    );
  }

  async activeEntries(subjectId: string): Promise<ActiveToken[]> {
    const members = await this.guard.run('registry.activeTokens', () =>
      this.store.getSetMembers(REGISTRY_KEYS.activeTokens(subjectId))
    );
    return members.map(fromMember);
  }

  async activeTokens(subjectId: string): Promise<string[]> {
    return (await this.activeEntries(subjectId)).map(entry => entry.jti);
  }

  async removeActive(subjectId: string, jti: string, exp: number): Promise<void> {
    await this.guard.run('registry.removeActive', () =>
      this.store.removeFromSet(REGISTRY_KEYS.activeTokens(subjectId), toMember(jti, exp))
    );
  }

  /**
   * Token-layer half of revoke-all: read the active set, blacklist every
   * member for its remaining lifetime, then clear the set. The set is
   * cleared only after the blacklist write succeeded, so a failure in
   * between leaves it intact for the next attempt.
   *
   * A member without a readable expiry is blacklisted for `fallbackTtlSeconds`.
   */
  async revokeActiveTokens(subjectId: string, fallbackTtlSeconds: number): Promise<string[]> {
    const entries = await this.activeEntries(subjectId);
    const nowSeconds = Math.floor(this.now() / 1000);

    if (entries.length > 0) {
      await this.blacklistMany(
        entries.map(entry => ({
          jti: entry.jti,
          ttlSeconds: entry.exp === null ? fallbackTtlSeconds : entry.exp - nowSeconds,
        }))
      );
    }

    await this.guard.run('registry.clearActive', () => this.store.del(REGISTRY_KEYS.activeTokens(subjectId)));
    return entries.map(entry => entry.jti);
  }
}
