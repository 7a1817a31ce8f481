/**
 * User Repository
 *
 * Read access to the subjects that log in. Registration and profile
 * editing live elsewhere; this service only looks users up.
 */

import type { Collection, Db } from 'mongodb';
import { registerIndexes } from 'core-service';
import type { UserRecord } from '../types.js';
import { normalizeEmail } from '../utils.js';
import { COLLECTIONS } from './session-repository.js';

export interface UserRepository {
  findByEmail(email: string): Promise<UserRecord | null>;
  findById(subjectId: string): Promise<UserRecord | null>;
}

interface UserDocument {
  _id: string;
  email: string;
  passwordHash: string;
  isActive: boolean;
  lastLoginAt: Date | null;
  deletedAt: Date | null;
}

function toRecord(doc: UserDocument): UserRecord {
  return {
    id: doc._id,
    email: doc.email,
    passwordHash: doc.passwordHash,
    isActive: doc.isActive,
    lastLoginAt: doc.lastLoginAt ?? null,
    deletedAt: doc.deletedAt ?? null,
  };
}

export function registerUserIndexes(): void {
  registerIndexes(COLLECTIONS.users, [
    { key: { email: 1 }, unique: true, name: 'email_unique' },
  ]);
}

export class MongoUserRepository implements UserRepository {
  private readonly users: Collection<UserDocument>;

  constructor(db: Db) {
    this.users = db.collection<UserDocument>(COLLECTIONS.users);
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const doc = await this.users.findOne({ email: normalizeEmail(email) });
    return doc ? toRecord(doc) : null;
  }

  async findById(subjectId: string): Promise<UserRecord | null> {
    const doc = await this.users.findOne({ _id: subjectId });
    return doc ? toRecord(doc) : null;
  }
}
