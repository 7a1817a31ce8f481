/**
 * Configurable Logger - Zero dependencies
 * Structured output with request-scoped correlation IDs
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'text' | 'pretty';

// ═══════════════════════════════════════════════════════════════════
// Correlation ID Management
// ═══════════════════════════════════════════════════════════════════

const correlationStore = new AsyncLocalStorage<string>();

/**
 * Get the correlation ID of the current async context
 */
export function getCorrelationId(): string | undefined {
  return correlationStore.getStore();
}

export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Run function with correlation ID context.
 * Every log line written inside `fn` (including awaited work) carries the ID.
 */
export function withCorrelationId<T>(id: string, fn: () => Promise<T>): Promise<T> {
  return correlationStore.run(id, fn);
}

// ═══════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════

export interface LoggerConfig {
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Output format (default: 'json') */
  format?: LogFormat;
  /** Include timestamp (default: true) */
  timestamp?: boolean;
  /** Service name to include in logs */
  service?: string;
  /** Custom metadata to include in every log */
  metadata?: Record<string, unknown>;
}

const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let config: Required<Omit<LoggerConfig, 'metadata'>> & { metadata?: Record<string, unknown> } = {
  level: 'info',
  format: 'json',
  timestamp: true,
  service: '',
};

export function isLogLevel(value: string): value is LogLevel {
  return value in levels;
}

export function isLogFormat(value: string): value is LogFormat {
  return value === 'json' || value === 'text' || value === 'pretty';
}

// ═══════════════════════════════════════════════════════════════════
// Formatters
// ═══════════════════════════════════════════════════════════════════

const colors = {
  reset: '\x1b[0m',
  debug: '\x1b[36m',  // cyan
  info: '\x1b[32m',   // green
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
};

type Formatter = (level: LogLevel, message: string, data?: Record<string, unknown>) => string;

const formatJson: Formatter = (level, message, data) => {
  const correlationId = getCorrelationId();
  return JSON.stringify({
    ...(config.timestamp ? { timestamp: new Date().toISOString() } : {}),
    level,
    ...(config.service ? { service: config.service } : {}),
    ...(correlationId ? { correlationId } : {}),
    message,
    ...config.metadata,
    ...data,
  });
};

const formatText: Formatter = (level, message, data) => {
  const parts: string[] = [];
  if (config.timestamp) parts.push(new Date().toISOString());
  parts.push(`[${level.toUpperCase()}]`);
  if (config.service) parts.push(`[${config.service}]`);
  const correlationId = getCorrelationId();
  if (correlationId) parts.push(`[${correlationId}]`);
  parts.push(message);
  if (data && Object.keys(data).length > 0) {
    parts.push(JSON.stringify(data));
  }
  return parts.join(' ');
};

const formatPretty: Formatter = (level, message, data) => {
  const parts: string[] = [];
  if (config.timestamp) parts.push(`\x1b[90m${new Date().toISOString()}\x1b[0m`);
  parts.push(`${colors[level]}${level.toUpperCase().padEnd(5)}${colors.reset}`);
  if (config.service) parts.push(`\x1b[90m[${config.service}]\x1b[0m`);
  const correlationId = getCorrelationId();
  if (correlationId) parts.push(`\x1b[90m[${correlationId}]\x1b[0m`);
  parts.push(message);
  if (data && Object.keys(data).length > 0) {
    parts.push(`\x1b[90m${JSON.stringify(data)}\x1b[0m`);
  }
  return parts.join(' ');
};

const formatters: Record<LogFormat, Formatter> = {
  json: formatJson,
  text: formatText,
  pretty: formatPretty,
};

// ═══════════════════════════════════════════════════════════════════
// Core Logger
// ═══════════════════════════════════════════════════════════════════

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (levels[level] < levels[config.level]) return;

  const formatted = formatters[config.format](level, message, data);
  (level === 'error' ? process.stderr : process.stdout).write(formatted + '\n');
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

export const logger: Logger & {
  configure(cfg: LoggerConfig): void;
  getConfig(): LoggerConfig;
} = {
  debug: (msg, data) => log('debug', msg, data),
  info: (msg, data) => log('info', msg, data),
  warn: (msg, data) => log('warn', msg, data),
  error: (msg, data) => log('error', msg, data),

  configure: (cfg) => {
    config = { ...config, ...cfg };
  },

  getConfig: () => ({ ...config }),
};

export function configureLogger(cfg: LoggerConfig): void {
  logger.configure(cfg);
}

// ═══════════════════════════════════════════════════════════════════
// Child Logger (for creating scoped loggers)
// ═══════════════════════════════════════════════════════════════════

/**
 * Scoped logger whose metadata is merged into every entry,
 * e.g. `createChildLogger({ channel: 'security' })`.
 */
export function createChildLogger(metadata: Record<string, unknown>): Logger {
  return {
    debug: (msg, data) => log('debug', msg, { ...metadata, ...data }),
    info: (msg, data) => log('info', msg, { ...metadata, ...data }),
    warn: (msg, data) => log('warn', msg, { ...metadata, ...data }),
    error: (msg, data) => log('error', msg, { ...metadata, ...data }),
  };
}
