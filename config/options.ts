import { z } from 'zod';

export const DEFAULT_TABLE_NAME = '_migrations';
export const DEFAULT_LOCK_TABLE_NAME = '_migrations-lock';
export const DEFAULT_LOCK_ID = 'migrations';
export const DEFAULT_POLL_INTERVAL_MS = 1000;
/** Longest delay Node's timers can hold; anything above fires after 1 ms. */
export const MAX_POLL_INTERVAL_MS = 2_147_483_647;

// Names are checked, never rewritten: the resolved name is the one the caller passed.
const tableNameSchema = z.string().refine((v) => v.trim().length > 0, { message: 'must not be blank' });

const targetOptionsSchema = z.object({
  tableName: tableNameSchema,
  lockTableName: tableNameSchema,
  lockId: z.string().min(1),
  pollIntervalMs: z.number().int().positive().max(MAX_POLL_INTERVAL_MS),
});

/** Names and timings shared by the ledger and the lock of one migration target. */
export type TargetOptions = Readonly<z.infer<typeof targetOptionsSchema>>;

type MutableTargetOptions = z.infer<typeof targetOptionsSchema>;

/** Functional option; applied in order, later options win. */
export type TargetOption = (options: MutableTargetOptions) => void;

function defaultTargetOptions(): MutableTargetOptions {
  return {
    tableName: DEFAULT_TABLE_NAME,
    lockTableName: DEFAULT_LOCK_TABLE_NAME,
    lockId: DEFAULT_LOCK_ID,
    pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  };
}

/** Table that records one item per migration id. */
export function withTableName(tableName: string): TargetOption {
  return (o) => {
    o.tableName = tableName;
  };
}

/** Table that holds the single lock item. */
export function withLockTableName(lockTableName: string): TargetOption {
  return (o) => {
    o.lockTableName = lockTableName;
  };
}

/** Key of the lock item; runners sharing it exclude each other. */
export function withLockId(lockId: string): TargetOption {
  return (o) => {
    o.lockId = lockId;
  };
}

/** Delay between two lock acquisition attempts. */
export function withPollInterval(pollIntervalMs: number): TargetOption {
  return (o) => {
    o.pollIntervalMs = pollIntervalMs;
  };
}

export function resolveTargetOptions(opts: readonly TargetOption[] = []): TargetOptions {
  const options = defaultTargetOptions();
  for (const opt of opts) {
    opt(options);
  }

  const parsed = targetOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid migration target options:\n${message}`);
  }

  if (parsed.data.tableName === parsed.data.lockTableName) {
    throw new Error('Invalid migration target options:\nlockTableName: must differ from tableName');
  }

  return Object.freeze(parsed.data);
}
