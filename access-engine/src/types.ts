/**
 * access-engine - Type Definitions
 */

// ─────────────────────────────────────────────────────────────────────────────
// Principal
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Authenticated subject as seen by authorization checks
 */
export interface Principal {
  /** Opaque subject identifier */
  subjectId: string;
  /** Role names (e.g., ['admin', 'support']) */
  roles: readonly string[];
  /** Permissions in resource:action form (e.g., ['users:read', 'roles:*']) */
  permissions: readonly string[];
  /** Access token identifier the principal was authenticated with */
  jti?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Permissions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parsed permission string
 */
export interface ParsedPermission {
  /** Resource type (e.g., 'users', 'sessions') */
  resource: string;
  /** Action (e.g., 'read', 'revoke', '*') */
  action: string;
  /** Original permission string */
  original: string;
  /** Whether the string had exactly two non-empty parts */
  valid: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Rules
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Permission rule: decides access for a principal, optionally against a resource
 */
export type PermissionRule = (
  principal: Principal | null | undefined,
  resource?: Record<string, unknown>
) => boolean | Promise<boolean>;
