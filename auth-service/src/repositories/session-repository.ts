/**
 * Session Repository
 *
 * Durable refresh-token records plus the login bookkeeping that must
 * commit with them (login history, last login, audit log).
 *
 * Rotation is a conditional update on `revokedAt: null` inside the same
 * transaction as the successor's insert: of two concurrent rotations of
 * one token only one can modify the record, on any number of instances.
 */

import { ObjectId, type Collection, type Db, type MongoClient } from 'mongodb';
import { logger, registerIndexes, withTransaction } from 'core-service';
import type {
  LoginAttempt,
  LoginRecord,
  NewRefreshToken,
  RefreshTokenRecord,
} from '../types.js';

export interface SessionRepository {
  /** Insert the refresh token and write login bookkeeping in one transaction */
  recordLogin(record: LoginRecord): Promise<void>;
  recordLoginAttempt(attempt: LoginAttempt): Promise<void>;
  findByHash(tokenHash: string): Promise<RefreshTokenRecord | null>;
  /**
   * Revoke `oldHash` and insert `next` atomically.
   * Returns false when the old record was already revoked (lost race).
   */
  rotate(oldHash: string, next: NewRefreshToken, at: Date): Promise<boolean>;
  /** Revoke one of the subject's tokens; false if none was live */
  revokeByHash(tokenHash: string, subjectId: string, at: Date): Promise<boolean>;
  /** Revoke every live token of the subject; returns how many were revoked */
  revokeAllForSubject(subjectId: string, at: Date, context?: { ipAddress?: string }): Promise<number>;
  listActive(subjectId: string, now: Date): Promise<RefreshTokenRecord[]>;
}

// ═══════════════════════════════════════════════════════════════════
// Documents
// ═══════════════════════════════════════════════════════════════════

export const COLLECTIONS = {
  users: 'users',
  refreshTokens: 'refresh_tokens',
  loginHistory: 'login_history',
  auditLogs: 'audit_logs',
  roles: 'roles',
  permissions: 'permissions',
  roleAssignments: 'role_assignments',
  rolePermissions: 'role_permissions',
} as const;

interface RefreshTokenDocument {
  _id: ObjectId;
  subjectId: string;
  tokenHash: string;
  deviceInfo: string | null;
  expiresAt: Date;
  revokedAt: Date | null;
  createdAt: Date;
}

interface LoginHistoryDocument {
  _id: ObjectId;
  subjectId: string;
  ipAddress: string | null;
  userAgent: string | null;
  success: boolean;
  createdAt: Date;
}

interface AuditLogDocument {
  _id: ObjectId;
  subjectId: string;
  action: string;
  ipAddress: string | null;
  details: Record<string, unknown>;
  createdAt: Date;
}

interface LastLoginDocument {
  _id: string;
  lastLoginAt: Date | null;
}

function toRecord(doc: RefreshTokenDocument): RefreshTokenRecord {
  return {
    id: doc._id.toHexString(),
    subjectId: doc.subjectId,
    tokenHash: doc.tokenHash,
    deviceInfo: doc.deviceInfo,
    expiresAt: doc.expiresAt,
    revokedAt: doc.revokedAt,
    createdAt: doc.createdAt,
  };
}

/** Raised inside the rotation transaction to abort it */
class RotationConflictError extends Error {
  constructor() {
    super('Refresh token was revoked concurrently');
    this.name = 'RotationConflictError';
  }
}

export function registerSessionIndexes(): void {
  registerIndexes(COLLECTIONS.refreshTokens, [
    { key: { tokenHash: 1 }, unique: true, name: 'token_hash_unique' },
    { key: { subjectId: 1, revokedAt: 1 }, name: 'subject_revoked' },
    { key: { expiresAt: 1 }, name: 'expires_at' },
  ]);
  registerIndexes(COLLECTIONS.loginHistory, [
    { key: { subjectId: 1, createdAt: -1 }, name: 'subject_created' },
  ]);
  registerIndexes(COLLECTIONS.auditLogs, [
    { key: { subjectId: 1, createdAt: -1 }, name: 'subject_created' },
  ]);
}

// ═══════════════════════════════════════════════════════════════════
// MongoDB Implementation
// ═══════════════════════════════════════════════════════════════════

export class MongoSessionRepository implements SessionRepository {
  private readonly tokens: Collection<RefreshTokenDocument>;
  private readonly history: Collection<LoginHistoryDocument>;
  private readonly audit: Collection<AuditLogDocument>;
  private readonly users: Collection<LastLoginDocument>;

  constructor(private readonly client: MongoClient, db: Db) {
    this.tokens = db.collection<RefreshTokenDocument>(COLLECTIONS.refreshTokens);
    this.history = db.collection<LoginHistoryDocument>(COLLECTIONS.loginHistory);
    this.audit = db.collection<AuditLogDocument>(COLLECTIONS.auditLogs);
    this.users = db.collection<LastLoginDocument>(COLLECTIONS.users);
  }

  async recordLogin(record: LoginRecord): Promise<void> {
    await withTransaction({ client: this.client }, async (session) => {
      await this.tokens.insertOne(
        { _id: new ObjectId(), ...record.refreshToken, revokedAt: null, createdAt: record.at },
        { session }
      );
      await this.history.insertOne(
        {
          _id: new ObjectId(),
          subjectId: record.subjectId,
          ipAddress: record.ipAddress ?? null,
          userAgent: record.userAgent ?? null,
          success: true,
          createdAt: record.at,
        },
        { session }
      );
      await this.users.updateOne({ _id: record.subjectId }, { $set: { lastLoginAt: record.at } }, { session });
      await this.audit.insertOne(
        {
          _id: new ObjectId(),
          subjectId: record.subjectId,
          action: 'login',
          ipAddress: record.ipAddress ?? null,
          details: { deviceInfo: record.refreshToken.deviceInfo },
          createdAt: record.at,
        },
        { session }
      );
    });
  }

  async recordLoginAttempt(attempt: LoginAttempt): Promise<void> {
    await this.history.insertOne({
      _id: new ObjectId(),
      subjectId: attempt.subjectId,
      ipAddress: attempt.ipAddress ?? null,
      userAgent: attempt.userAgent ?? null,
      success: attempt.success,
      createdAt: new Date(),
    });
  }

  async findByHash(tokenHash: string): Promise<RefreshTokenRecord | null> {
    const doc = await this.tokens.findOne({ tokenHash });
    return doc ? toRecord(doc) : null;
  }

  async rotate(oldHash: string, next: NewRefreshToken, at: Date): Promise<boolean> {
    try {
      await withTransaction({ client: this.client }, async (session) => {
        const result = await this.tokens.updateOne(
          { tokenHash: oldHash, revokedAt: null },
          { $set: { revokedAt: at } },
          { session }
        );

        if (result.modifiedCount === 0) {
          throw new RotationConflictError();
        }

        await this.tokens.insertOne(
          { _id: new ObjectId(), ...next, revokedAt: null, createdAt: at },
          { session }
        );
      });
      return true;
    } catch (error) {
      if (error instanceof RotationConflictError) {
        logger.debug('Refresh rotation lost to a concurrent request', { subjectId: next.subjectId });
        return false;
      }
      throw error;
    }
  }

  async revokeByHash(tokenHash: string, subjectId: string, at: Date): Promise<boolean> {
    const result = await this.tokens.updateOne(
      { tokenHash, subjectId, revokedAt: null },
      { $set: { revokedAt: at } }
    );
    return result.modifiedCount > 0;
  }

  async revokeAllForSubject(subjectId: string, at: Date, context: { ipAddress?: string } = {}): Promise<number> {
    return withTransaction({ client: this.client }, async (session) => {
      const result = await this.tokens.updateMany(
        { subjectId, revokedAt: null },
        { $set: { revokedAt: at } },
        { session }
      );
      await this.audit.insertOne(
        {
          _id: new ObjectId(),
          subjectId,
          action: 'revoke_all_sessions',
          ipAddress: context.ipAddress ?? null,
          details: { revokedRefreshTokens: result.modifiedCount },
          createdAt: at,
        },
        { session }
      );
      return result.modifiedCount;
    });
  }

  async listActive(subjectId: string, now: Date): Promise<RefreshTokenRecord[]> {
    const docs = await this.tokens
      .find({ subjectId, revokedAt: null, expiresAt: { $gt: now } })
      .sort({ createdAt: -1 })
      .toArray();
    return docs.map(toRecord);
  }
}
