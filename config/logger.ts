/**
 * Structured logging for the migration ledger, built on Winston.
 *
 * • Coloured console output in development, JSON lines in production
 * • Daily rotated files (combined + error) in production via winston-daily-rotate-file
 * • Sensitive keys (connection strings, secrets) are redacted from metadata
 * • Module-scoped child loggers: ledger | lock | db | migration | cli
 * • Silent under NODE_ENV=test
 */
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'node:path';
import os from 'node:os';
import { fileURLToPath } from 'node:url';

const { combine, timestamp, printf, errors, json, metadata } = winston.format;

// ─── Constants ───────────────────────────────────────────────────────────────
const SERVICE_NAME = 'kv-migration-ledger';
const SERVICE_VERSION = process.env.npm_package_version || '0.1.0';
const HOSTNAME = os.hostname();
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const LOG_DIR = process.env.LOG_DIR || path.resolve(__dirname, '..', 'logs');
const nodeEnv = process.env.NODE_ENV || 'development';
const isTest = nodeEnv === 'test';
const isProd = nodeEnv === 'production';

const LOG_LEVELS = new Set(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);
const configuredLevel = process.env.LOG_LEVEL?.trim().toLowerCase();
const level = configuredLevel && LOG_LEVELS.has(configuredLevel) ? configuredLevel : isProd ? 'info' : 'debug';

// Maximum payload size in log entries
const MAX_PAYLOAD_SIZE = 4096;
const MAX_SERIALIZE_DEPTH = 6;

// ─── Sensitive Data Redaction ────────────────────────────────────────────────
const REDACTED = '[REDACTED]';
const SENSITIVE_KEYS = new Set([
  'password', 'passwd', 'pass', 'secret', 'token', 'authorization',
  'apikey', 'accesskey', 'secretkey', 'sessiontoken', 'privatekey',
  'mongodburi', 'databaseurl', 'connectionstring', 'uri',
]);

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase().replace(/[-_]/g, ''));
}

/**
 * Deep-clone and redact sensitive fields from an object.
 * Handles circular references and enforces depth/size limits.
 */
function sanitize(obj: unknown, depth = 0, seen = new WeakSet<object>()): unknown {
  if (depth > MAX_SERIALIZE_DEPTH) return '[MAX_DEPTH]';
  if (obj === null || obj === undefined) return obj;

  if (typeof obj === 'string') {
    if (obj.length > MAX_PAYLOAD_SIZE) {
      return obj.slice(0, MAX_PAYLOAD_SIZE) + `...[truncated ${obj.length - MAX_PAYLOAD_SIZE} chars]`;
    }
    return obj;
  }

  if (typeof obj !== 'object') return obj;

  if (seen.has(obj)) return '[CIRCULAR]';
  seen.add(obj);

  if (Array.isArray(obj)) {
    if (obj.length > 100) {
      return [
        ...obj.slice(0, 100).map((item) => sanitize(item, depth + 1, seen)),
        `...[${obj.length - 100} more items]`,
      ];
    }
    return obj.map((item) => sanitize(item, depth + 1, seen));
  }

  if (obj instanceof Error) {
    const code = 'code' in obj ? obj.code : undefined;
    return {
      name: obj.name,
      message: obj.message,
      stack: obj.stack,
      ...(code !== undefined ? { code } : {}),
      ...(obj.cause !== undefined ? { cause: sanitize(obj.cause, depth + 1, seen) } : {}),
    };
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = isSensitiveKey(key) ? REDACTED : sanitize(value, depth + 1, seen);
  }
  return result;
}

// ─── Redaction Format ────────────────────────────────────────────────────────
const redactFormat = winston.format((info) => {
  if (info.metadata && typeof info.metadata === 'object') {
    info.metadata = sanitize(info.metadata);
  }
  return info;
});

// ─── Structured Schema Enrichment ────────────────────────────────────────────
const structuredEnrich = winston.format((info) => {
  info.serviceName = SERVICE_NAME;
  info.environment = nodeEnv;
  info.version = SERVICE_VERSION;
  info.hostname = HOSTNAME;
  info.pid = process.pid;
  return info;
});

// ─── Dev Console Format ──────────────────────────────────────────────────────
const levelColors: Record<string, string> = {
  error: '\x1b[31m',
  warn: '\x1b[33m',
  info: '\x1b[36m',
  http: '\x1b[35m',
  debug: '\x1b[90m',
};
const reset = '\x1b[0m';
const bold = '\x1b[1m';
const dim = '\x1b[2m';

const devFormat = printf((info) => {
  const color = levelColors[info.level] || '';
  const mod = typeof info.module === 'string' ? `${dim}[${info.module}]${reset} ` : '';
  const ts = typeof info.timestamp === 'string' ? info.timestamp : '';

  const meta: Record<string, unknown> =
    info.metadata && typeof info.metadata === 'object' ? { ...info.metadata } : {};
  for (const k of ['module', 'service', 'pid']) {
    delete meta[k];
  }
  const extra = Object.keys(meta).length
    ? `\n  ${dim}${JSON.stringify(meta, null, 2).replace(/\n/g, '\n  ')}${reset}`
    : '';

  return `${dim}${ts}${reset} ${color}${bold}${info.level.toUpperCase().padEnd(5)}${reset} ${mod}${String(info.message)}${extra}`;
});

// ─── Production JSON Format ──────────────────────────────────────────────────
const prodJsonFormat = combine(
  timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  errors({ stack: true }),
  metadata({ fillExcept: ['message', 'level', 'timestamp', 'module', 'serviceName', 'environment', 'version', 'hostname', 'pid'] }),
  structuredEnrich(),
  redactFormat(),
  json()
);

const devConsoleFormat = combine(
  timestamp({ format: 'HH:mm:ss.SSS' }),
  errors({ stack: true }),
  metadata({ fillExcept: ['message', 'level', 'timestamp', 'module'] }),
  redactFormat(),
  devFormat
);

// ─── Transports ──────────────────────────────────────────────────────────────
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: isProd ? prodJsonFormat : devConsoleFormat,
  }),
];

if (isProd) {
  transports.push(
    new DailyRotateFile({
      dirname: LOG_DIR,
      filename: 'migrations-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      format: prodJsonFormat,
      zippedArchive: true,
    }),
    new DailyRotateFile({
      dirname: LOG_DIR,
      filename: 'migrations-error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '20m',
      maxFiles: '90d',
      format: prodJsonFormat,
      zippedArchive: true,
    })
  );
}

// ─── Logger Instance ─────────────────────────────────────────────────────────
const logger = winston.createLogger({
  level,
  silent: isTest,
  defaultMeta: { service: SERVICE_NAME, pid: process.pid },
  transports,
  exitOnError: false,
});

export default logger;

// ─── Module-scoped Child Loggers ─────────────────────────────────────────────

export const ledgerLog = logger.child({ module: 'ledger' });
export const lockLog = logger.child({ module: 'lock' });
export const dbLog = logger.child({ module: 'db' });
export const migrationLog = logger.child({ module: 'migration' });
export const cliLog = logger.child({ module: 'cli' });
