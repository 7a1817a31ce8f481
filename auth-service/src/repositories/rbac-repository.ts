/**
 * RBAC Repository
 *
 * Roles, permissions and the two junctions between them and subjects.
 * `resolvePermissions` is the single join the permission cache falls
 * back to on a miss.
 */

import { ObjectId, type Collection, type Db } from 'mongodb';
import { buildPermission } from 'access-engine';
import { registerIndexes } from 'core-service';
import type { PermissionRecord, ResolvedPermissions, RoleRecord } from '../types.js';
import { COLLECTIONS } from './session-repository.js';

export interface RbacRepository {
  resolvePermissions(subjectId: string, now: Date): Promise<ResolvedPermissions>;
  findRoleByName(name: string): Promise<RoleRecord | null>;
  findPermission(resource: string, action: string): Promise<PermissionRecord | null>;
  /** Upsert an assignment; `expiresAt` null means permanent */
  assignRole(subjectId: string, roleId: string, expiresAt: Date | null): Promise<void>;
  unassignRole(subjectId: string, roleId: string): Promise<boolean>;
  grantPermission(roleId: string, permissionId: string): Promise<void>;
  revokePermission(roleId: string, permissionId: string): Promise<boolean>;
  /** Create the permission, or restore it if soft-deleted */
  definePermission(resource: string, action: string): Promise<PermissionRecord>;
  deletePermission(permissionId: string, at: Date): Promise<boolean>;
  deleteRole(roleId: string, at: Date): Promise<boolean>;
  subjectsWithRole(roleId: string): Promise<string[]>;
}

// ═══════════════════════════════════════════════════════════════════
// Documents
// ═══════════════════════════════════════════════════════════════════

interface RoleDocument {
  _id: ObjectId;
  name: string;
  isSystem: boolean;
  deletedAt: Date | null;
}

interface PermissionDocument {
  _id: ObjectId;
  resource: string;
  action: string;
  deletedAt: Date | null;
}

interface RoleAssignmentDocument {
  _id: ObjectId;
  subjectId: string;
  roleId: ObjectId;
  expiresAt: Date | null;
  createdAt: Date;
}

interface RolePermissionDocument {
  _id: ObjectId;
  roleId: ObjectId;
  permissionId: ObjectId;
  createdAt: Date;
}

interface ResolvedRoleRow {
  role: string;
  permissions: Array<{ resource: string; action: string }>;
}

function toObjectId(id: string): ObjectId | null {
  return ObjectId.isValid(id) ? new ObjectId(id) : null;
}

function toRoleRecord(doc: RoleDocument): RoleRecord {
  return { id: doc._id.toHexString(), name: doc.name, isSystem: doc.isSystem, deletedAt: doc.deletedAt };
}

function toPermissionRecord(doc: PermissionDocument): PermissionRecord {
  return { id: doc._id.toHexString(), resource: doc.resource, action: doc.action, deletedAt: doc.deletedAt };
}

export function registerRbacIndexes(): void {
  registerIndexes(COLLECTIONS.roles, [
    { key: { name: 1 }, unique: true, name: 'name_unique' },
  ]);
  registerIndexes(COLLECTIONS.permissions, [
    { key: { resource: 1, action: 1 }, unique: true, name: 'resource_action_unique' },
  ]);
  registerIndexes(COLLECTIONS.roleAssignments, [
    { key: { subjectId: 1, roleId: 1 }, unique: true, name: 'subject_role_unique' },
    { key: { roleId: 1 }, name: 'role' },
  ]);
  registerIndexes(COLLECTIONS.rolePermissions, [
    { key: { roleId: 1, permissionId: 1 }, unique: true, name: 'role_permission_unique' },
  ]);
}

// ═══════════════════════════════════════════════════════════════════
// MongoDB Implementation
// ═══════════════════════════════════════════════════════════════════

export class MongoRbacRepository implements RbacRepository {
  private readonly roles: Collection<RoleDocument>;
  private readonly permissions: Collection<PermissionDocument>;
  private readonly assignments: Collection<RoleAssignmentDocument>;
  private readonly grants: Collection<RolePermissionDocument>;

  constructor(db: Db) {
    this.roles = db.collection<RoleDocument>(COLLECTIONS.roles);
    this.permissions = db.collection<PermissionDocument>(COLLECTIONS.permissions);
    this.assignments = db.collection<RoleAssignmentDocument>(COLLECTIONS.roleAssignments);
    this.grants = db.collection<RolePermissionDocument>(COLLECTIONS.rolePermissions);
  }

  async resolvePermissions(subjectId: string, now: Date): Promise<ResolvedPermissions> {
    const rows = await this.assignments
      .aggregate<ResolvedRoleRow>([
        { $match: { subjectId, $or: [{ expiresAt: null }, { expiresAt: { $gt: now } }] } },
        { $lookup: { from: COLLECTIONS.roles, localField: 'roleId', foreignField: '_id', as: 'role' } },
        { $unwind: '$role' },
        { $match: { 'role.deletedAt': null } },
        { $lookup: { from: COLLECTIONS.rolePermissions, localField: 'roleId', foreignField: 'roleId', as: 'grants' } },
        {
          $lookup: {
            from: COLLECTIONS.permissions,
            localField: 'grants.permissionId',
            foreignField: '_id',
            as: 'granted',
          },
        },
        {
          $project: {
            _id: 0,
            role: '$role.name',
            permissions: {
              $map: {
                input: { $filter: { input: '$granted', as: 'p', cond: { $eq: [{ $ifNull: ['$$p.deletedAt', null] }, null] } } },
                as: 'p',
                in: { resource: '$$p.resource', action: '$$p.action' },
              },
            },
          },
        },
      ])
      .toArray();

    const roles = new Set<string>();
    const permissions = new Set<string>();

    for (const row of rows) {
      roles.add(row.role);
      for (const permission of row.permissions) {
        permissions.add(buildPermission(permission));
      }
    }

    return {
      roles: [...roles].sort(),
      permissions: [...permissions].sort(),
    };
  }

  async findRoleByName(name: string): Promise<RoleRecord | null> {
    const doc = await this.roles.findOne({ name, deletedAt: null });
    return doc ? toRoleRecord(doc) : null;
  }

  async findPermission(resource: string, action: string): Promise<PermissionRecord | null> {
    const doc = await this.permissions.findOne({ resource, action, deletedAt: null });
    return doc ? toPermissionRecord(doc) : null;
  }

  async assignRole(subjectId: string, roleId: string, expiresAt: Date | null): Promise<void> {
    const role = toObjectId(roleId);
    if (!role) return;

    await this.assignments.updateOne(
      { subjectId, roleId: role },
      { $set: { expiresAt }, $setOnInsert: { createdAt: new Date() } },
      { upsert: true }
    );
  }

  async unassignRole(subjectId: string, roleId: string): Promise<boolean> {
    const role = toObjectId(roleId);
    if (!role) return false;

    const result = await this.assignments.deleteOne({ subjectId, roleId: role });
    return result.deletedCount > 0;
  }

  async grantPermission(roleId: string, permissionId: string): Promise<void> {
    const role = toObjectId(roleId);
    const permission = toObjectId(permissionId);
    if (!role || !permission) return;

    await this.grants.updateOne(
      { roleId: role, permissionId: permission },
      { $setOnInsert: { createdAt: new Date() } },
      { upsert: true }
    );
  }

  async revokePermission(roleId: string, permissionId: string): Promise<boolean> {
    const role = toObjectId(roleId);
    const permission = toObjectId(permissionId);
    if (!role || !permission) return false;

    const result = await this.grants.deleteOne({ roleId: role, permissionId: permission });
    return result.deletedCount > 0;
  }

  async definePermission(resource: string, action: string): Promise<PermissionRecord> {
    const doc = await this.permissions.findOneAndUpdate(
      { resource, action },
      { $set: { deletedAt: null } },
      { upsert: true, returnDocument: 'after' }
    );

    if (!doc) {
      throw new Error(`Permission upsert returned no document for ${resource}:${action}`);
    }
    return toPermissionRecord(doc);
  }

  async deletePermission(permissionId: string, at: Date): Promise<boolean> {
    const permission = toObjectId(permissionId);
    if (!permission) return false;

    const result = await this.permissions.updateOne({ _id: permission, deletedAt: null }, { $set: { deletedAt: at } });
    return result.modifiedCount > 0;
  }

  async deleteRole(roleId: string, at: Date): Promise<boolean> {
    const role = toObjectId(roleId);
    if (!role) return false;

    const result = await this.roles.updateOne({ _id: role, deletedAt: null }, { $set: { deletedAt: at } });
    return result.modifiedCount > 0;
  }

  async subjectsWithRole(roleId: string): Promise<string[]> {
    const role = toObjectId(roleId);
    if (!role) return [];

    return this.assignments.distinct('subjectId', { roleId: role });
  }
}
