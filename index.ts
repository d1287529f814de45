export {
  DEFAULT_LOCK_ID,
  DEFAULT_LOCK_TABLE_NAME,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_TABLE_NAME,
  MAX_POLL_INTERVAL_MS,
  resolveTargetOptions,
  withLockId,
  withLockTableName,
  withPollInterval,
  withTableName,
} from './config/options.js';
export type { TargetOption, TargetOptions } from './config/options.js';
export { loadEnv, targetOptionsFromEnv } from './config/env.js';
export type { Env } from './config/env.js';

export { StoreError } from './database/store.js';
export type {
  CreateTableOutcome,
  KeyCondition,
  KeyValueStore,
  StoreItem,
  StoreOperation,
  StoreValue,
  WriteOutcome,
} from './database/store.js';
export { MemoryStore } from './database/memoryStore.js';
export { MongoStore, isDuplicateKeyError, isNamespaceExistsError } from './database/mongoStore.js';
export type { MongoCollectionLike, MongoConnectionLike, MongoDbLike } from './database/mongoStore.js';
export { connectMongo, disconnectMongo } from './database/mongo.js';

export { LedgerError, isLedgerError } from './services/errors.js';
export type { LedgerErrorCode } from './services/errors.js';
export { MigrationLedger } from './services/ledger.js';
export type { MigrationRecord } from './services/ledger.js';
export { LockHandle, MigrationLock } from './services/lock.js';
export type { AcquireOptions } from './services/lock.js';
export { createMigrationTarget } from './services/target.js';
export type { MigrationTarget } from './services/target.js';
export { migrationStatus, runMigrations } from './services/migrationRunner.js';
export type {
  Migration,
  MigrationContext,
  MigrationStatus,
  RunMigrationsOptions,
  RunMigrationsResult,
} from './services/migrationRunner.js';
