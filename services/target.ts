import { resolveTargetOptions, type TargetOption, type TargetOptions } from '../config/options.js';
import type { KeyValueStore } from '../database/store.js';
import { MigrationLedger } from './ledger.js';
import { MigrationLock } from './lock.js';

export type MigrationTarget = {
  readonly options: TargetOptions;
  readonly ledger: MigrationLedger;
  readonly lock: MigrationLock;
};

/** Builds the ledger and the lock over one store, with names resolved once from `opts`. */
export function createMigrationTarget(store: KeyValueStore, ...opts: TargetOption[]): MigrationTarget {
  const options = resolveTargetOptions(opts);
  return Object.freeze({
    options,
    ledger: new MigrationLedger(store, options),
    lock: new MigrationLock(store, options),
  });
}
