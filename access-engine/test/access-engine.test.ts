/**
 * Access Engine - Test Suite
 *
 * Unit tests for permission matching and rule composition.
 */

import { describe, it, expect } from 'vitest';
import {
  parsePermission,
  buildPermission,
  matchPermission,
  matchAnyPermission,

  isAuthenticated,
  can,
  and,

  type Principal,
} from '../src/index.js';

function principal(overrides: Partial<Principal> = {}): Principal {
  return { subjectId: 'subject-1', roles: [], permissions: [], ...overrides };
}

// ═══════════════════════════════════════════════════════════════════
// PERMISSION STRING TESTS
// ═══════════════════════════════════════════════════════════════════

describe('Permission Strings', () => {
  describe('parsePermission', () => {
    it('should parse a valid permission', () => {
      expect(parsePermission('users:read')).toEqual({
        resource: 'users',
        action: 'read',
        original: 'users:read',
        valid: true,
      });
    });

    it('should handle wildcards', () => {
      const parsed = parsePermission('*:*');
      expect(parsed.valid).toBe(true);
      expect(parsed.resource).toBe('*');
      expect(parsed.action).toBe('*');
    });

    it('should reject partial or over-long strings', () => {
      expect(parsePermission('users').valid).toBe(false);
      expect(parsePermission('users:').valid).toBe(false);
      expect(parsePermission('users:read:own').valid).toBe(false);
      expect(parsePermission('').valid).toBe(false);
    });
  });

  describe('buildPermission', () => {
    it('should build from parts', () => {
      expect(buildPermission('users', 'read')).toBe('users:read');
      expect(buildPermission({ resource: 'roles', action: 'grant' })).toBe('roles:grant');
    });

    it('should default the action to a wildcard', () => {
      expect(buildPermission('sessions')).toBe('sessions:*');
    });
  });

  describe('matchPermission', () => {
    it('should match exact permissions', () => {
      expect(matchPermission('users:read', 'users:read')).toBe(true);
    });

    it('should match wildcard action and resource', () => {
      expect(matchPermission('users:*', 'users:delete')).toBe(true);
      expect(matchPermission('*:read', 'roles:read')).toBe(true);
      expect(matchPermission('*:*', 'sessions:revoke')).toBe(true);
    });

    it('should not treat a required wildcard as granted', () => {
      expect(matchPermission('users:read', 'users:*')).toBe(false);
    });

    it('should not match different permissions or invalid input', () => {
      expect(matchPermission('users:read', 'users:update')).toBe(false);
      expect(matchPermission('users:read', 'roles:read')).toBe(false);
      expect(matchPermission('*', 'users:read')).toBe(false);
    });

    it('should match against any granted permission', () => {
      expect(matchAnyPermission(['users:read', 'sessions:*'], 'sessions:revoke')).toBe(true);
      expect(matchAnyPermission([], 'sessions:revoke')).toBe(false);
    });
  });
});

// ═══════════════════════════════════════════════════════════════════
// PERMISSION RULES TESTS
// ═══════════════════════════════════════════════════════════════════

describe('Permission Rules', () => {
  describe('isAuthenticated', () => {
    it('should pass for a principal', () => {
      expect(isAuthenticated(principal())).toBe(true);
    });

    it('should fail for no principal', () => {
      expect(isAuthenticated(undefined)).toBe(false);
      expect(isAuthenticated(principal({ subjectId: '' }))).toBe(false);
    });
  });

  describe('can', () => {
    it('should pass through a wildcard grant', () => {
      expect(can('sessions:revoke')(principal({ permissions: ['sessions:*'] }))).toBe(true);
    });

    it('should fail without a covering permission', () => {
      expect(can('sessions:revoke')(principal({ permissions: ['sessions:read'] }))).toBe(false);
    });
  });
});

// ═══════════════════════════════════════════════════════════════════
// RULE COMBINATORS TESTS
// ═══════════════════════════════════════════════════════════════════

describe('Rule Combinators', () => {
  describe('and', () => {
    it('should pass when every rule passes', async () => {
      const rule = and(isAuthenticated, can('roles:assign'));
      expect(await rule(principal({ permissions: ['roles:*'] }))).toBe(true);
    });

    it('should fail when one rule fails', async () => {
      expect(await and(isAuthenticated, can('roles:assign'))(principal({ permissions: ['users:read'] }))).toBe(false);
      expect(await and(isAuthenticated, can('roles:assign'))(principal({ subjectId: '', permissions: ['*:*'] }))).toBe(false);
    });

    it('should await async rules and stop at the first failure', async () => {
      let reached = false;
      const denied = async () => false;
      const tail = () => {
        reached = true;
        return true;
      };

      expect(await and(isAuthenticated, denied, tail)(principal())).toBe(false);
      expect(reached).toBe(false);
    });
  });
});
