/**
 * access-engine - Permission Strings
 *
 * Parsing, building and matching of permission strings.
 *
 * Format: resource:action
 * Examples:
 *   - users:read      - Read user records
 *   - sessions:*      - Every action on sessions
 *   - *:read          - Read anything
 *   - *:*             - Super admin
 */

import type { ParsedPermission } from './types.js';

/**
 * Parse a permission string into components
 *
 * @example
 * parsePermission('users:read')
 * // { resource: 'users', action: 'read', original: 'users:read', valid: true }
 */
export function parsePermission(permission: string): ParsedPermission {
  const parts = permission.split(':');

  if (parts.length !== 2) {
    return {
      resource: parts[0] ?? '',
      action: parts[1] ?? '',
      original: permission,
      valid: false,
    };
  }

  const [resource, action] = parts;

  return {
    resource,
    action,
    original: permission,
    valid: Boolean(resource && action),
  };
}

/**
 * Build a permission string from components
 *
 * @example
 * buildPermission('users', 'read')                       // 'users:read'
 * buildPermission({ resource: 'roles', action: 'grant' }) // 'roles:grant'
 */
export function buildPermission(
  resourceOrComponents: string | { resource: string; action: string },
  action?: string
): string {
  if (typeof resourceOrComponents === 'object') {
    return `${resourceOrComponents.resource}:${resourceOrComponents.action}`;
  }

  return `${resourceOrComponents}:${action ?? '*'}`;
}

/**
 * Check if a granted permission covers a required one.
 * Wildcards (*) are honoured on the granted side only.
 *
 * @example
 * matchPermission('users:*', 'users:read')    // true
 * matchPermission('*:*', 'sessions:revoke')   // true
 * matchPermission('users:read', 'users:*')    // false
 */
export function matchPermission(granted: string, required: string): boolean {
  const permission = parsePermission(granted);
  const target = parsePermission(required);

  if (!permission.valid || !target.valid) {
    return false;
  }

  const resourceMatch = permission.resource === '*' || permission.resource === target.resource;
  const actionMatch = permission.action === '*' || permission.action === target.action;

  return resourceMatch && actionMatch;
}

/**
 * Check if any granted permission covers the required one
 *
 * @example
 * matchAnyPermission(['users:read', 'sessions:*'], 'sessions:revoke') // true
 */
export function matchAnyPermission(granted: readonly string[], required: string): boolean {
  return granted.some(p => matchPermission(p, required));
}
