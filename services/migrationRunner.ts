import { migrationLog } from '../config/logger.js';
import { isLedgerError } from './errors.js';
import type { MigrationLedger, MigrationRecord } from './ledger.js';
import type { MigrationTarget } from './target.js';

export type MigrationContext = {
  id: string;
  now: Date;
  log: (message: string) => void;
  signal?: AbortSignal;
};

export type Migration = {
  id: string;
  description: string;
  up: (ctx: MigrationContext) => Promise<void>;
};

export type RunMigrationsOptions = {
  target: MigrationTarget;
  migrations: readonly Migration[];
  /** Last id to apply (inclusive). Must be one of `migrations`. */
  to?: string;
  dryRun?: boolean;
  signal?: AbortSignal;
};

export type RunMigrationsResult = {
  applied: string[];
  /** Ids still to apply; only non-empty on a dry run. */
  pending: string[];
  current: string | null;
};

export type MigrationStatus = {
  records: MigrationRecord[];
  dirty: string[];
  current: string | null;
};

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function assertUniqueIds(migrations: readonly Migration[]): void {
  const seen = new Set<string>();
  for (const m of migrations) {
    if (seen.has(m.id)) {
      throw new Error(`Duplicate migration id: ${m.id}`);
    }
    seen.add(m.id);
  }
}

async function currentOrNull(ledger: MigrationLedger): Promise<string | null> {
  try {
    return await ledger.current();
  } catch (err) {
    if (isLedgerError(err, 'NO_CURRENT_MIGRATION')) return null;
    throw err;
  }
}

/** Inserts the dirty record, or re-marks an existing one as started. */
async function markStarted(ledger: MigrationLedger, id: string): Promise<void> {
  try {
    await ledger.add(id);
  } catch (err) {
    if (!isLedgerError(err, 'MIGRATION_ALREADY_EXISTS')) throw err;
    migrationLog.debug('Migration record already exists, marking it started again', { id });
    await ledger.startMigration(id);
  }
}

/**
 * Applies every migration the ledger does not list as done, in id order,
 * while holding the target's lock. A migration whose `up` throws stays dirty
 * and stops the run; the lock is released either way.
 */
export async function runMigrations(options: RunMigrationsOptions): Promise<RunMigrationsResult> {
  const { target, migrations, to, dryRun = false, signal } = options;
  const { ledger, lock } = target;

  assertUniqueIds(migrations);
  if (to !== undefined && !migrations.some((m) => m.id === to)) {
    throw new Error(`Unknown migration id for "to": ${to}`);
  }

  return lock.withLock(async (): Promise<RunMigrationsResult> => {
    const done = new Set(await ledger.listDone());
    const runnable = migrations
      .filter((m) => !done.has(m.id))
      .filter((m) => to === undefined || compareIds(m.id, to) <= 0)
      .sort((a, b) => compareIds(a.id, b.id));

    if (runnable.length === 0) {
      migrationLog.info('No pending migrations to run.');
      return { applied: [], pending: [], current: await currentOrNull(ledger) };
    }

    migrationLog.info(`Running ${runnable.length} migration(s)${dryRun ? ' (dry-run)' : ''}`);

    if (dryRun) {
      for (const m of runnable) migrationLog.info(`Pending: ${m.id}`, { description: m.description });
      return { applied: [], pending: runnable.map((m) => m.id), current: await currentOrNull(ledger) };
    }

    const applied: string[] = [];
    for (const m of runnable) {
      signal?.throwIfAborted();

      migrationLog.info(`==> ${m.id}`, { description: m.description });
      const startedAt = Date.now();
      await markStarted(ledger, m.id);

      try {
        await m.up({
          id: m.id,
          now: new Date(),
          log: (message) => migrationLog.info(message, { id: m.id }),
          signal,
        });
      } catch (err) {
        migrationLog.error('Migration failed; its record stays dirty', { id: m.id, error: err });
        throw err;
      }

      await ledger.finishMigration(m.id);
      applied.push(m.id);
      migrationLog.info(`Applied: ${m.id}`, { durationMs: Date.now() - startedAt });
    }

    return { applied, pending: [], current: await currentOrNull(ledger) };
  }, { signal });
}

/** Snapshot of the ledger for reporting; does not take the lock and does not fail on dirty records. */
export async function migrationStatus(target: MigrationTarget): Promise<MigrationStatus> {
  const records = await target.ledger.records();
  const dirty = records.filter((r) => r.dirty).map((r) => r.id);
  const last = records[records.length - 1];
  const current = dirty.length === 0 && last !== undefined ? last.id : null;
  return { records, dirty, current };
}
