/**
 * access-engine - Permission Rules
 *
 * Pre-built permission rule helpers for common authorization patterns.
 */

import type { PermissionRule } from './types.js';
import { matchAnyPermission } from './permission.js';

// ─────────────────────────────────────────────────────────────────────────────
// Basic Rules
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Allow if a principal is present (has subjectId)
 */
export const isAuthenticated: PermissionRule = (principal) => {
  return Boolean(principal?.subjectId);
};

// ─────────────────────────────────────────────────────────────────────────────
// Permission-based Rules
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Allow if principal holds a permission covering `permission`
 *
 * @example
 * can('sessions:revoke')
 */
export function can(permission: string): PermissionRule {
  return (principal) => {
    return matchAnyPermission(principal?.permissions ?? [], permission);
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Combinators
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Combine rules with AND logic - all must pass
 *
 * @example
 * and(isAuthenticated, can('roles:assign'))
 */
export function and(...rules: PermissionRule[]): PermissionRule {
  return async (principal, resource) => {
    for (const rule of rules) {
      const result = await rule(principal, resource);
      if (!result) return false;
    }
    return true;
  };
}
