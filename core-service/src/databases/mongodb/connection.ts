/**
 * MongoDB Connection
 *
 * Features:
 * - Connection pooling with bounded idle lifetime
 * - Pool exhaustion protection (waitQueueTimeoutMS)
 * - Pool statistics from CMAP events
 * - Index registration applied on connect
 * - Health checks
 */

import { MongoClient, WriteConcern, type Db, type IndexDescription, type MongoClientOptions } from 'mongodb';
import { logger } from '../../common/logger.js';
import { getErrorMessage } from '../../common/errors.js';

let client: MongoClient | null = null;
let db: Db | null = null;

interface ConnectionPoolStats {
  totalConnections: number;
  checkedOut: number;
  maxPoolSize: number;
  minPoolSize: number;
  waitQueueTimeouts: number;
  lastWaitQueueTimeout: Date | null;
}

let poolStats: ConnectionPoolStats = createPoolStats(0, 0);

function createPoolStats(maxPoolSize: number, minPoolSize: number): ConnectionPoolStats {
  return {
    totalConnections: 0,
    checkedOut: 0,
    maxPoolSize,
    minPoolSize,
    waitQueueTimeouts: 0,
    lastWaitQueueTimeout: null,
  };
}

// ═══════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════

export interface MongoConfig {
  dbName?: string;
  maxPoolSize?: number;
  minPoolSize?: number;
  /** Close connections idle for longer than this */
  maxIdleTimeMS?: number;
  /** Fail a checkout that waits longer than this for a pooled connection */
  waitQueueTimeoutMS?: number;
  connectTimeoutMS?: number;
  socketTimeoutMS?: number;
  serverSelectionTimeoutMS?: number;
  writeConcern?: 'majority' | number;
  retryWrites?: boolean;
  retryReads?: boolean;
}

export const DEFAULT_MONGO_CONFIG: Required<Omit<MongoConfig, 'dbName'>> = {
  maxPoolSize: 20,
  minPoolSize: 2,
  maxIdleTimeMS: 30000,          // Drop idle connections after 30s (stale sockets after partitions)
  waitQueueTimeoutMS: 5000,
  connectTimeoutMS: 10000,
  socketTimeoutMS: 10000,
  serverSelectionTimeoutMS: 5000,
  writeConcern: 'majority',
  retryWrites: true,
  retryReads: true,
};

// ═══════════════════════════════════════════════════════════════════
// Index Registration
// ═══════════════════════════════════════════════════════════════════

const registeredIndexes = new Map<string, IndexDescription[]>();

/**
 * Register indexes for a collection (call before connectDatabase)
 *
 * @example
 * registerIndexes('refresh_tokens', [
 *   { key: { tokenHash: 1 }, unique: true },
 *   { key: { subjectId: 1, revokedAt: 1 } },
 * ]);
 */
export function registerIndexes(collection: string, indexes: IndexDescription[]): void {
  registeredIndexes.set(collection, [...(registeredIndexes.get(collection) ?? []), ...indexes]);
}

async function ensureIndexes(database: Db): Promise<void> {
  for (const [collection, indexes] of registeredIndexes) {
    await database.collection(collection).createIndexes(indexes);
    logger.debug(`Indexes ensured for ${collection}`, { count: indexes.length });
  }
}

// ═══════════════════════════════════════════════════════════════════
// Connection
// ═══════════════════════════════════════════════════════════════════

export async function connectDatabase(uri: string, config: MongoConfig = {}): Promise<Db> {
  if (db) return db;

  const cfg = { ...DEFAULT_MONGO_CONFIG, ...config };

  const options: MongoClientOptions = {
    maxPoolSize: cfg.maxPoolSize,
    minPoolSize: cfg.minPoolSize,
    maxIdleTimeMS: cfg.maxIdleTimeMS,
    waitQueueTimeoutMS: cfg.waitQueueTimeoutMS,
    connectTimeoutMS: cfg.connectTimeoutMS,
    socketTimeoutMS: cfg.socketTimeoutMS,
    serverSelectionTimeoutMS: cfg.serverSelectionTimeoutMS,
    writeConcern: new WriteConcern(cfg.writeConcern),
    retryWrites: cfg.retryWrites,
    retryReads: cfg.retryReads,
  };

  const instance = new MongoClient(uri, options);
  poolStats = createPoolStats(cfg.maxPoolSize, cfg.minPoolSize);

  instance.on('connectionCreated', () => {
    poolStats.totalConnections++;
  });
  instance.on('connectionClosed', () => {
    poolStats.totalConnections = Math.max(0, poolStats.totalConnections - 1);
  });
  instance.on('connectionCheckedOut', () => {
    poolStats.checkedOut++;
  });
  instance.on('connectionCheckedIn', () => {
    poolStats.checkedOut = Math.max(0, poolStats.checkedOut - 1);
  });
  instance.on('connectionCheckOutFailed', (event) => {
    if (event.reason === 'timeout') {
      poolStats.waitQueueTimeouts++;
      poolStats.lastWaitQueueTimeout = new Date();
      logger.warn('MongoDB connection pool exhausted - checkout timeout', {
        checkedOut: poolStats.checkedOut,
        maxPoolSize: poolStats.maxPoolSize,
      });
    }
  });

  let database: Db;
  try {
    await instance.connect();
    database = instance.db(cfg.dbName);
    await ensureIndexes(database);
  } catch (error) {
    // Leave nothing half-open for the next attempt
    await instance.close();
    throw error;
  }

  client = instance;
  db = database;

  logger.info('Connected to MongoDB', {
    database: database.databaseName,
    maxPoolSize: cfg.maxPoolSize,
    minPoolSize: cfg.minPoolSize,
    maxIdleTimeMS: cfg.maxIdleTimeMS,
    waitQueueTimeoutMS: cfg.waitQueueTimeoutMS,
  });

  return database;
}

export function getDatabase(): Db {
  if (!db) throw new Error('Database not connected');
  return db;
}

export function getClient(): MongoClient {
  if (!client) throw new Error('Database not connected');
  return client;
}

export async function closeDatabase(): Promise<void> {
  if (client) {
    const closing = client;
    client = null;
    db = null;
    await closing.close();
    logger.info('MongoDB disconnected');
  }
}

export function getConnectionPoolStats(): ConnectionPoolStats {
  return { ...poolStats };
}

// ═══════════════════════════════════════════════════════════════════
// Health Check
// ═══════════════════════════════════════════════════════════════════

export async function checkDatabaseHealth(): Promise<{
  healthy: boolean;
  latencyMs: number;
  connections: number;
  checkedOut: number;
}> {
  if (!db) {
    return { healthy: false, latencyMs: -1, connections: 0, checkedOut: 0 };
  }

  const start = Date.now();
  try {
    await db.command({ ping: 1 });
    return {
      healthy: true,
      latencyMs: Date.now() - start,
      connections: poolStats.totalConnections,
      checkedOut: poolStats.checkedOut,
    };
  } catch (error) {
    logger.warn('MongoDB health check failed', { error: getErrorMessage(error) });
    return { healthy: false, latencyMs: -1, connections: 0, checkedOut: 0 };
  }
}
