import { describe, expect, it } from 'vitest';

import { loadEnv, targetOptionsFromEnv } from '../config/env.js';
import {
  MAX_POLL_INTERVAL_MS,
  resolveTargetOptions,
  withLockId,
  withLockTableName,
  withPollInterval,
  withTableName,
} from '../config/options.js';
import { MemoryStore } from '../database/memoryStore.js';
import { createMigrationTarget } from '../services/target.js';

describe('resolveTargetOptions', () => {
  it('falls back to the default names and poll interval', () => {
    expect(resolveTargetOptions()).toEqual({
      tableName: '_migrations',
      lockTableName: '_migrations-lock',
      lockId: 'migrations',
      pollIntervalMs: 1000,
    });
  });

  it('applies options in order so the later one wins', () => {
    const options = resolveTargetOptions([withTableName('first'), withTableName('second'), withLockId('tenant-b')]);

    expect(options.tableName).toBe('second');
    expect(options.lockId).toBe('tenant-b');
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(resolveTargetOptions([withPollInterval(250)]))).toBe(true);
  });

  it('rejects an empty table name', () => {
    expect(() => resolveTargetOptions([withTableName('  ')])).toThrow(
      'Invalid migration target options:\ntableName: must not be blank'
    );
  });

  it('keeps table names exactly as given', () => {
    const options = resolveTargetOptions([withTableName(' history '), withLockTableName('history-lock ')]);

    expect(options.tableName).toBe(' history ');
    expect(options.lockTableName).toBe('history-lock ');
  });

  it('rejects a poll interval that is not a positive integer', () => {
    expect(() => resolveTargetOptions([withPollInterval(0)])).toThrow(/pollIntervalMs: /);
    expect(() => resolveTargetOptions([withPollInterval(1.5)])).toThrow(/pollIntervalMs: /);
  });

  it('rejects a poll interval longer than a timer can wait', () => {
    expect(() => resolveTargetOptions([withPollInterval(2 ** 31)])).toThrow(/^Invalid migration target options:\npollIntervalMs: /);
    expect(resolveTargetOptions([withPollInterval(MAX_POLL_INTERVAL_MS)]).pollIntervalMs).toBe(2_147_483_647);
  });

  it('rejects a lock table that shares the ledger table', () => {
    expect(() => resolveTargetOptions([withTableName('shared'), withLockTableName('shared')])).toThrow(
      'Invalid migration target options:\nlockTableName: must differ from tableName'
    );
  });
});

describe('createMigrationTarget', () => {
  it('uses the configured ledger table', async () => {
    const store = new MemoryStore();
    const target = createMigrationTarget(store, withTableName('schema_history'));

    await target.ledger.provision();
    await target.ledger.add('001');

    expect(target.ledger.tableName).toBe('schema_history');
    expect(await store.scan('schema_history')).toEqual([{ id: '001', dirty: true }]);
    expect((await store.listTables()).sort()).toEqual(['_migrations-lock', 'schema_history']);
  });
});

describe('loadEnv', () => {
  const base = { MONGODB_URI: 'mongodb://localhost:27017/app' };

  it('parses a valid environment with defaults', () => {
    const env = loadEnv(base);

    expect(env.NODE_ENV).toBe('development');
    expect(env.MONGODB_URI).toBe('mongodb://localhost:27017/app');
    expect(env.MIGRATIONS_TABLE).toBeUndefined();
  });

  it('requires MONGODB_URI', () => {
    expect(() => loadEnv({})).toThrow(/^Invalid environment configuration:\nMONGODB_URI: /);
  });

  it('rejects a placeholder connection string', () => {
    expect(() => loadEnv({ MONGODB_URI: '<your-mongodb-uri>' })).toThrow(
      'Invalid environment configuration:\nMONGODB_URI: must be set to a real MongoDB connection string'
    );
    expect(() => loadEnv({ MONGODB_URI: 'mongodb://REPLACE_ME' })).toThrow(/must be set to a real/);
  });

  it('coerces the poll interval from its string form', () => {
    expect(loadEnv({ ...base, MIGRATIONS_LOCK_POLL_MS: '250' }).MIGRATIONS_LOCK_POLL_MS).toBe(250);
  });

  it('rejects a poll interval longer than a timer can wait', () => {
    expect(() => loadEnv({ ...base, MIGRATIONS_LOCK_POLL_MS: '3000000000' })).toThrow(
      /^Invalid environment configuration:\nMIGRATIONS_LOCK_POLL_MS: /
    );
  });

  it('maps the MIGRATIONS_* variables onto target options', () => {
    const env = loadEnv({
      ...base,
      MIGRATIONS_TABLE: 'history',
      MIGRATIONS_LOCK_TABLE: 'history-lock',
      MIGRATIONS_LOCK_ID: 'tenant-a',
      MIGRATIONS_LOCK_POLL_MS: '250',
    });

    expect(resolveTargetOptions(targetOptionsFromEnv(env))).toEqual({
      tableName: 'history',
      lockTableName: 'history-lock',
      lockId: 'tenant-a',
      pollIntervalMs: 250,
    });
  });

  it('adds no options when the MIGRATIONS_* variables are unset', () => {
    expect(targetOptionsFromEnv(loadEnv(base))).toEqual([]);
  });
});
