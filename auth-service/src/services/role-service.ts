/**
 * Role Service
 *
 * RBAC mutations. Each one invalidates exactly the permission cache
 * entries it can affect: a single subject for an assignment change,
 * every holder of a role for a role-permission change, the whole cache
 * for a global schema change.
 */

import { logger, ServiceError } from 'core-service';
import { parsePermission } from 'access-engine';
import { AUTH_ERRORS } from '../error-codes.js';
import type { RbacRepository } from '../repositories/rbac-repository.js';
import type { UserRepository } from '../repositories/user-repository.js';
import type { PermissionRecord, RoleRecord } from '../types.js';
import type { PermissionCache } from './permission-cache.js';
import type { StoreGuard } from './store-guard.js';

export interface RoleServiceDeps {
  rbac: RbacRepository;
  users: UserRepository;
  permissionCache: PermissionCache;
  storeGuard: StoreGuard;
  now?: () => Date;
}

export interface AssignRoleInput {
  subjectId: string;
  role: string;
  expiresAt?: Date | null;
}

export class RoleService {
  private readonly now: () => Date;

  constructor(private readonly deps: RoleServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  // ═══════════════════════════════════════════════════════════════════
  // Assignments
  // ═══════════════════════════════════════════════════════════════════

  async assignRole(input: AssignRoleInput): Promise<void> {
    const { rbac, storeGuard, permissionCache } = this.deps;

    await this.requireSubject(input.subjectId);
    const role = await this.requireRole(input.role);

    await storeGuard.run('rbac.assignRole', () => rbac.assignRole(input.subjectId, role.id, input.expiresAt ?? null));
    await permissionCache.invalidate(input.subjectId);

    logger.info('Role assigned', { subjectId: input.subjectId, role: role.name, expiresAt: input.expiresAt ?? null });
  }

  /** Returns false when the subject did not hold the role */
  async unassignRole(subjectId: string, roleName: string): Promise<boolean> {
    const { rbac, storeGuard, permissionCache } = this.deps;
    const role = await this.requireRole(roleName);

    const removed = await storeGuard.run('rbac.unassignRole', () => rbac.unassignRole(subjectId, role.id));
    if (removed) {
      await permissionCache.invalidate(subjectId);
      logger.info('Role unassigned', { subjectId, role: role.name });
    }
    return removed;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Role Permissions
  // ═══════════════════════════════════════════════════════════════════

  async grantPermission(roleName: string, permission: string): Promise<void> {
    const role = await this.requireRole(roleName);
    const record = await this.requirePermission(permission);

    await this.deps.storeGuard.run('rbac.grantPermission', () => this.deps.rbac.grantPermission(role.id, record.id));
    const affected = await this.invalidateHolders(role);

    logger.info('Permission granted', { role: role.name, permission, affected });
  }

  async revokePermission(roleName: string, permission: string): Promise<boolean> {
    const role = await this.requireRole(roleName);
    const record = await this.requirePermission(permission);

    const removed = await this.deps.storeGuard.run('rbac.revokePermission', () =>
      this.deps.rbac.revokePermission(role.id, record.id)
    );
    if (removed) {
      const affected = await this.invalidateHolders(role);
      logger.info('Permission revoked', { role: role.name, permission, affected });
    }
    return removed;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Schema Changes
  // ═══════════════════════════════════════════════════════════════════

  async definePermission(permission: string): Promise<PermissionRecord> {
    const parsed = parsePermission(permission);
    if (!parsed.valid) {
      throw new ServiceError(AUTH_ERRORS.ValidationFailed, `Invalid permission "${permission}"`, {
        details: { permission },
      });
    }

    const record = await this.deps.storeGuard.run('rbac.definePermission', () =>
      this.deps.rbac.definePermission(parsed.resource, parsed.action)
    );
    await this.deps.permissionCache.invalidateAll();

    logger.info('Permission defined', { permission: parsed.original });
    return record;
  }

  async deletePermission(permission: string): Promise<void> {
    const record = await this.requirePermission(permission);

    await this.deps.storeGuard.run('rbac.deletePermission', () =>
      this.deps.rbac.deletePermission(record.id, this.now())
    );
    await this.deps.permissionCache.invalidateAll();

    logger.info('Permission deleted', { permission });
  }

  async deleteRole(roleName: string): Promise<void> {
    const role = await this.requireRole(roleName);
    if (role.isSystem) {
      throw new ServiceError(AUTH_ERRORS.SystemRoleProtected, `Role "${role.name}" is a system role`, {
        details: { role: role.name },
      });
    }

    await this.deps.storeGuard.run('rbac.deleteRole', () => this.deps.rbac.deleteRole(role.id, this.now()));
    await this.deps.permissionCache.invalidateAll();

    logger.info('Role deleted', { role: role.name });
  }

  // ═══════════════════════════════════════════════════════════════════
  // Helpers
  // ═══════════════════════════════════════════════════════════════════

  private async invalidateHolders(role: RoleRecord): Promise<number> {
    const subjects = await this.deps.storeGuard.run('rbac.subjectsWithRole', () =>
      this.deps.rbac.subjectsWithRole(role.id)
    );
    await this.deps.permissionCache.invalidateMany(subjects);
    return subjects.length;
  }

  private async requireSubject(subjectId: string): Promise<void> {
    const user = await this.deps.storeGuard.run('users.findById', () => this.deps.users.findById(subjectId));
    if (!user || user.deletedAt) {
      throw new ServiceError(AUTH_ERRORS.SubjectNotFound, `Subject "${subjectId}" not found`);
    }
  }

  private async requireRole(name: string): Promise<RoleRecord> {
    const role = await this.deps.storeGuard.run('rbac.findRoleByName', () => this.deps.rbac.findRoleByName(name));
    if (!role || role.deletedAt) {
      throw new ServiceError(AUTH_ERRORS.RoleNotFound, `Role "${name}" not found`);
    }
    return role;
  }

  private async requirePermission(permission: string): Promise<PermissionRecord> {
    const parsed = parsePermission(permission);
    if (!parsed.valid) {
      throw new ServiceError(AUTH_ERRORS.ValidationFailed, `Invalid permission "${permission}"`, {
        details: { permission },
      });
    }

    const record = await this.deps.storeGuard.run('rbac.findPermission', () =>
      this.deps.rbac.findPermission(parsed.resource, parsed.action)
    );
    if (!record || record.deletedAt) {
      throw new ServiceError(AUTH_ERRORS.PermissionNotFound, `Permission "${permission}" not found`);
    }
    return record;
  }
}
