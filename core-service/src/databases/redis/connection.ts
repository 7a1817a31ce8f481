/**
 * Redis Client - connection lifecycle and health check
 *
 * Usage:
 *   const client = await connectRedis({ url: 'redis://localhost:6379', clientName: 'auth-service' });
 *   ...
 *   await closeRedis();
 */

import { createClient } from 'redis';
import { logger } from '../../common/logger.js';
import { getErrorMessage } from '../../common/errors.js';

// ═══════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════

export interface RedisConfig {
  url: string;
  /** Connection timeout in ms (default: 5000) */
  connectTimeout?: number;
  /** Enable auto-reconnect on disconnect (default: true) */
  autoReconnect?: boolean;
  /** Max reconnect attempts before giving up (default: 10) */
  maxReconnectRetries?: number;
  /** Upper bound for the reconnect delay in ms (default: 2000) */
  reconnectDelay?: number;
  /** Client name for monitoring (shows in CLIENT LIST) */
  clientName?: string;
  /** Send PING at interval in ms to keep connection alive */
  pingInterval?: number;
  /** Max commands queue length (default: unlimited) */
  commandsQueueMaxLength?: number;
  /** Reject commands while disconnected instead of queueing them (default: true) */
  disableOfflineQueue?: boolean;
}

const DEFAULT_CONFIG = {
  connectTimeout: 5000,
  autoReconnect: true,
  maxReconnectRetries: 10,
  reconnectDelay: 2000,
  disableOfflineQueue: true,
};

// ═══════════════════════════════════════════════════════════════════
// Connection
// ═══════════════════════════════════════════════════════════════════

function buildClient(config: RedisConfig) {
  const cfg = { ...DEFAULT_CONFIG, ...config };

  // Password may be embedded as redis://:password@host or supplied via env
  let url = cfg.url;
  let password = process.env.REDIS_PASSWORD;
  const urlMatch = url.match(/^redis(s?):\/\/:([^@]+)@(.+)$/);
  if (urlMatch) {
    password = urlMatch[2];
    url = `redis${urlMatch[1]}://${urlMatch[3]}`;
  }

  return createClient({
    url,
    password,
    name: cfg.clientName,
    pingInterval: cfg.pingInterval,
    commandsQueueMaxLength: cfg.commandsQueueMaxLength,
    // Fail fast while disconnected so callers see a store error instead of hanging
    disableOfflineQueue: cfg.disableOfflineQueue,
    socket: {
      connectTimeout: cfg.connectTimeout,
      reconnectStrategy: cfg.autoReconnect
        ? (retries: number) => {
            if (retries > cfg.maxReconnectRetries) {
              logger.error('Redis max reconnect attempts reached');
              return new Error('Max reconnect attempts reached');
            }
            // Exponential backoff with jitter
            const jitter = Math.floor(Math.random() * 200);
            return Math.min(Math.pow(2, retries) * 50, cfg.reconnectDelay) + jitter;
          }
        : false,
    },
  });
}

export type RedisClient = ReturnType<typeof buildClient>;

let client: RedisClient | null = null;

export async function connectRedis(urlOrConfig: string | RedisConfig): Promise<RedisClient> {
  if (client) return client;

  const config: RedisConfig = typeof urlOrConfig === 'string' ? { url: urlOrConfig } : urlOrConfig;
  const instance = buildClient(config);

  instance.on('error', (err: unknown) => logger.error('Redis error', { error: getErrorMessage(err) }));
  instance.on('reconnecting', () => logger.warn('Redis reconnecting...'));
  instance.on('ready', () => logger.debug('Redis ready'));
  instance.on('end', () => logger.debug('Redis connection closed'));

  await instance.connect();
  client = instance;

  logger.info('Connected to Redis', {
    url: config.url.replace(/:[^:@/]+@/, ':***@'),
    clientName: config.clientName || 'default',
  });

  return instance;
}

/**
 * Get the connected client, or null before connectRedis()
 */
export function getRedis(): RedisClient | null {
  return client;
}

// ═══════════════════════════════════════════════════════════════════
// Health Check
// ═══════════════════════════════════════════════════════════════════

export async function checkRedisHealth(): Promise<{ healthy: boolean; latencyMs: number }> {
  if (!client) return { healthy: false, latencyMs: -1 };

  const start = Date.now();
  try {
    await client.ping();
    return { healthy: true, latencyMs: Date.now() - start };
  } catch (error) {
    logger.warn('Redis health check failed', { error: getErrorMessage(error) });
    return { healthy: false, latencyMs: -1 };
  }
}

// ═══════════════════════════════════════════════════════════════════
// Cleanup
// ═══════════════════════════════════════════════════════════════════

export async function closeRedis(): Promise<void> {
  if (client) {
    const closing = client;
    client = null;
    await closing.close();
    logger.info('Redis disconnected');
  }
}
