import { z } from 'zod';
import type { TargetOptions } from '../config/options.js';
import { ledgerLog } from '../config/logger.js';
import type { KeyValueStore, WriteOutcome } from '../database/store.js';
import {
  dirtyState,
  migrationAlreadyExists,
  migrationNotFound,
  noCurrentMigration,
  storeFault,
} from './errors.js';

// Extra attributes on stored items are ignored; a missing id or dirty flag is a decode fault.
const migrationRecordSchema = z.object({
  id: z.string(),
  dirty: z.boolean(),
});

export type MigrationRecord = z.infer<typeof migrationRecordSchema>;

function byId(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Durable record of applied migrations. Each migration id has one item whose
 * `dirty` flag is set when application starts and cleared once it is confirmed,
 * so a run that crashed in between stays visible until an operator resolves it.
 */
export class MigrationLedger {
  constructor(
    private readonly store: KeyValueStore,
    private readonly options: Pick<TargetOptions, 'tableName' | 'lockTableName'>
  ) {}

  get tableName(): string {
    return this.options.tableName;
  }

  /** Creates the ledger and lock tables when they are missing. Safe to repeat. */
  async provision(): Promise<void> {
    let existing: Set<string>;
    try {
      existing = new Set(await this.store.listTables());
    } catch (err) {
      ledgerLog.error('Listing tables failed', { error: err });
      throw storeFault('failed to list tables', err);
    }

    await this.createIfMissing(existing, this.options.tableName, 'migrations table');
    await this.createIfMissing(existing, this.options.lockTableName, 'migrations lock table');
  }

  private async createIfMissing(existing: Set<string>, table: string, label: string): Promise<void> {
    if (existing.has(table)) return;
    try {
      const outcome = await this.store.createTable(table);
      ledgerLog.info(outcome === 'created' ? `Created ${label}` : `${label} already exists`, { table });
    } catch (err) {
      ledgerLog.error(`Creating ${label} failed`, { table, error: err });
      throw storeFault(`failed to create ${label}`, err, { table });
    }
  }

  /** Drops the ledger table, then the lock table. Stops at the first failure. */
  async deprovision(): Promise<void> {
    const tables: Array<[string, string]> = [
      [this.options.tableName, 'migrations table'],
      [this.options.lockTableName, 'migrations lock table'],
    ];
    for (const [table, label] of tables) {
      try {
        await this.store.deleteTable(table);
        ledgerLog.info(`Deleted ${label}`, { table });
      } catch (err) {
        ledgerLog.error(`Deleting ${label} failed`, { table, error: err });
        throw storeFault(`failed to delete ${label}`, err, { table });
      }
    }
  }

  /** Every record in the ledger, clean or dirty, sorted by id. */
  async records(): Promise<MigrationRecord[]> {
    let items: unknown[];
    try {
      items = await this.store.scan(this.options.tableName);
    } catch (err) {
      ledgerLog.error('Scanning migrations table failed', { table: this.options.tableName, error: err });
      throw storeFault('failed to scan migrations table', err);
    }

    const records: MigrationRecord[] = [];
    for (const item of items) {
      const parsed = migrationRecordSchema.safeParse(item);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
        const id = typeof item === 'object' && item !== null && 'id' in item && typeof item.id === 'string' ? item.id : undefined;
        ledgerLog.error('Undecodable migration record', { table: this.options.tableName, id, issues });
        throw storeFault('failed to decode migration record', parsed.error, { id, issues });
      }
      records.push(parsed.data);
    }

    return records.sort((a, b) => byId(a.id, b.id));
  }

  /**
   * Ids of the applied migrations, ascending. Rejects with DIRTY_STATE when any
   * migration is still marked dirty; a partial list is never returned.
   */
  async listDone(): Promise<string[]> {
    const records = await this.records();
    const dirty = records.filter((r) => r.dirty).map((r) => r.id);
    if (dirty.length > 0) {
      throw dirtyState(dirty);
    }
    return records.map((r) => r.id);
  }

  /** The greatest applied id. */
  async current(): Promise<string> {
    const done = await this.listDone();
    const last = done[done.length - 1];
    if (last === undefined) {
      throw noCurrentMigration();
    }
    return last;
  }

  /** Records a new migration as dirty. */
  async add(id: string): Promise<void> {
    let outcome: WriteOutcome;
    try {
      outcome = await this.store.insert(this.options.tableName, { id, dirty: true }, { condition: 'absent' });
    } catch (err) {
      ledgerLog.error('Adding migration failed', { id, error: err });
      throw storeFault('failed to add migration', err, { id });
    }
    if (outcome === 'precondition-failed') {
      throw migrationAlreadyExists(id);
    }
    ledgerLog.debug('Migration added', { id });
  }

  async remove(id: string): Promise<void> {
    let outcome: WriteOutcome;
    try {
      outcome = await this.store.delete(this.options.tableName, id, { condition: 'present' });
    } catch (err) {
      ledgerLog.error('Removing migration failed', { id, error: err });
      throw storeFault('failed to remove migration', err, { id });
    }
    if (outcome === 'precondition-failed') {
      throw migrationNotFound(id);
    }
    ledgerLog.debug('Migration removed', { id });
  }

  /** Marks an existing migration as in progress (dirty). */
  async startMigration(id: string): Promise<void> {
    await this.setDirty(id, true, 'start');
  }

  /** Marks an existing migration as applied (clean). */
  async finishMigration(id: string): Promise<void> {
    await this.setDirty(id, false, 'finish');
  }

  private async setDirty(id: string, dirty: boolean, verb: 'start' | 'finish'): Promise<void> {
    let outcome: WriteOutcome;
    try {
      outcome = await this.store.update(this.options.tableName, id, { dirty }, { condition: 'present' });
    } catch (err) {
      ledgerLog.error(`Failed to ${verb} migration`, { id, error: err });
      throw storeFault(`failed to ${verb} migration`, err, { id });
    }
    if (outcome === 'precondition-failed') {
      throw migrationNotFound(id);
    }
    ledgerLog.debug(verb === 'start' ? 'Migration started' : 'Migration finished', { id });
  }
}
