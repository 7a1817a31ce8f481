/**
 * access-engine
 *
 * Permission matching and composable authorization rules.
 *
 * Permissions are `resource:action` strings; a granted `*` on either side
 * covers every value of that part.
 *
 * @example
 * ```typescript
 * import { and, isAuthenticated, can } from 'access-engine';
 *
 * const principal = { subjectId: '42', roles: ['support'], permissions: ['sessions:*'] };
 * const allowed = await and(isAuthenticated, can('sessions:revoke'))(principal);
 * console.log(allowed); // true
 * ```
 *
 * @packageDocumentation
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type { Principal, ParsedPermission, PermissionRule } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Permission strings
// ─────────────────────────────────────────────────────────────────────────────

export {
  parsePermission,
  buildPermission,
  matchPermission,
  matchAnyPermission,
} from './permission.js';

// ─────────────────────────────────────────────────────────────────────────────
// Rules
// ─────────────────────────────────────────────────────────────────────────────

export { isAuthenticated, can, and } from './rules.js';
