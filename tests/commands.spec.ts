import { beforeEach, describe, expect, it } from 'vitest';

import { MemoryStore } from '../database/memoryStore.js';
import { executeCommand, parseArgs, type CliCommand } from '../scripts/commands.js';
import { createMigrationTarget, type MigrationTarget } from '../services/target.js';

describe('parseArgs', () => {
  it('defaults to status', () => {
    expect(parseArgs([])).toEqual({ name: 'status' });
  });

  it('reads commands with and without an id', () => {
    expect(parseArgs(['provision'])).toEqual({ name: 'provision' });
    expect(parseArgs(['unlock'])).toEqual({ name: 'unlock' });
    expect(parseArgs(['finish', '20240101-users'])).toEqual({ name: 'finish', id: '20240101-users' });
    expect(parseArgs(['remove', '001'])).toEqual({ name: 'remove', id: '001' });
  });

  it('rejects bad input with the usage text', () => {
    expect(() => parseArgs(['migrate'])).toThrow(/^Unknown command: migrate\n\nUsage: kv-migrate/);
    expect(() => parseArgs(['finish'])).toThrow(/^"finish" needs a migration id\n/);
    expect(() => parseArgs(['status', 'x'])).toThrow(/^"status" takes no argument\n/);
    expect(() => parseArgs(['remove', '001', 'extra'])).toThrow(/^Unexpected arguments: extra\n/);
  });
});

describe('executeCommand', () => {
  let store: MemoryStore;
  let target: MigrationTarget;
  let lines: string[];

  const run = (command: CliCommand) => executeCommand(target, command, (line) => lines.push(line));

  beforeEach(async () => {
    store = new MemoryStore();
    target = createMigrationTarget(store);
    await target.ledger.provision();
    lines = [];
  });

  it('provisions the tables', async () => {
    await run({ name: 'provision' });

    expect(lines).toEqual(['Tables ready: _migrations, _migrations-lock']);
  });

  it('reports an empty ledger and a free lock', async () => {
    await run({ name: 'status' });

    expect(lines).toEqual(['Migrations recorded: 0', 'Current migration: (none)', 'Lock "migrations": free']);
  });

  it('reports dirty records and a held lock', async () => {
    await target.ledger.add('001');
    await target.ledger.finishMigration('001');
    await target.ledger.add('002');
    const handle = await target.lock.acquire();

    await run({ name: 'status' });

    expect(lines).toEqual([
      'Migrations recorded: 2',
      '  - 001',
      '  - 002 (dirty)',
      'Dirty migrations: 002',
      'Lock "migrations": held',
    ]);
    await handle.release();
  });

  it('finishes a dirty record so the ledger reports it as current', async () => {
    await target.ledger.add('001');

    await run({ name: 'finish', id: '001' });
    await run({ name: 'status' });

    expect(lines).toEqual([
      'Marked as applied: 001',
      'Migrations recorded: 1',
      '  - 001',
      'Current migration: 001',
      'Lock "migrations": free',
    ]);
  });

  it('removes a record', async () => {
    await target.ledger.add('001');

    await run({ name: 'remove', id: '001' });

    expect(lines).toEqual(['Removed: 001']);
    expect(await target.ledger.records()).toEqual([]);
  });

  it('clears a lock left behind by another runner', async () => {
    await createMigrationTarget(store).lock.acquire();

    await run({ name: 'unlock' });

    expect(lines).toEqual(['Lock "migrations" released']);
    expect(await target.lock.isHeld()).toBe(false);
  });

  it('passes ledger errors through', async () => {
    await expect(run({ name: 'finish', id: '404' })).rejects.toMatchObject({ code: 'MIGRATION_NOT_FOUND' });
    expect(lines).toEqual([]);
  });
});
