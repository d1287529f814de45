import { z } from 'zod';
import {
  MAX_POLL_INTERVAL_MS,
  withLockId,
  withLockTableName,
  withPollInterval,
  withTableName,
  type TargetOption,
} from './options.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  MONGODB_URI: z.string().trim().min(1),
  MONGODB_DBNAME: z.string().trim().min(1).optional(),

  // Overrides for the ledger / lock names. Unset means the library defaults.
  MIGRATIONS_TABLE: z.string().trim().min(1).optional(),
  MIGRATIONS_LOCK_TABLE: z.string().trim().min(1).optional(),
  MIGRATIONS_LOCK_ID: z.string().trim().min(1).optional(),
  MIGRATIONS_LOCK_POLL_MS: z.coerce.number().int().positive().max(MAX_POLL_INTERVAL_MS).optional(),

  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional(),
  LOG_DIR: z.string().trim().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

function looksPlaceholder(value: string | undefined): boolean {
  if (!value) return true;
  const v = value.trim();
  if (!v) return true;
  if (v.includes('REPLACE_ME')) return true;
  if (v.startsWith('<') && v.endsWith('>')) return true;
  return false;
}

export function loadEnv(processEnv: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(processEnv);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${message}`);
  }

  const env = parsed.data;

  if (looksPlaceholder(env.MONGODB_URI)) {
    throw new Error(
      'Invalid environment configuration:\nMONGODB_URI: must be set to a real MongoDB connection string'
    );
  }

  return env;
}

/** Maps the MIGRATIONS_* variables onto target options, skipping unset ones. */
export function targetOptionsFromEnv(env: Env): TargetOption[] {
  const opts: TargetOption[] = [];
  if (env.MIGRATIONS_TABLE) opts.push(withTableName(env.MIGRATIONS_TABLE));
  if (env.MIGRATIONS_LOCK_TABLE) opts.push(withLockTableName(env.MIGRATIONS_LOCK_TABLE));
  if (env.MIGRATIONS_LOCK_ID) opts.push(withLockId(env.MIGRATIONS_LOCK_ID));
  if (env.MIGRATIONS_LOCK_POLL_MS !== undefined) opts.push(withPollInterval(env.MIGRATIONS_LOCK_POLL_MS));
  return opts;
}
