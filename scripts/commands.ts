import { migrationStatus } from '../services/migrationRunner.js';
import type { MigrationTarget } from '../services/target.js';

export type CliCommand =
  | { name: 'status' }
  | { name: 'provision' }
  | { name: 'deprovision' }
  | { name: 'unlock' }
  | { name: 'finish'; id: string }
  | { name: 'remove'; id: string };

export const USAGE = [
  'Usage: kv-migrate [command]',
  '',
  'Commands:',
  '  status          List recorded migrations, the current one and the lock state (default)',
  '  provision       Create the migrations and lock tables when missing',
  '  deprovision     Delete the migrations and lock tables',
  '  finish <id>     Mark a dirty migration as applied after repairing it by hand',
  '  remove <id>     Delete a migration record',
  '  unlock          Delete the lock item left behind by a crashed runner',
].join('\n');

export function parseArgs(argv: string[]): CliCommand {
  const [name = 'status', id, ...rest] = argv;
  if (rest.length > 0) {
    throw new Error(`Unexpected arguments: ${rest.join(' ')}\n\n${USAGE}`);
  }

  switch (name) {
    case 'status':
    case 'provision':
    case 'deprovision':
    case 'unlock':
      if (id !== undefined) throw new Error(`"${name}" takes no argument\n\n${USAGE}`);
      return { name };
    case 'finish':
    case 'remove':
      if (!id) throw new Error(`"${name}" needs a migration id\n\n${USAGE}`);
      return { name, id };
    default:
      throw new Error(`Unknown command: ${name}\n\n${USAGE}`);
  }
}

export async function executeCommand(
  target: MigrationTarget,
  command: CliCommand,
  log: (message: string) => void
): Promise<void> {
  const { ledger, lock, options } = target;

  switch (command.name) {
    case 'status': {
      const status = await migrationStatus(target);
      log(`Migrations recorded: ${status.records.length}`);
      for (const r of status.records) log(`  - ${r.id}${r.dirty ? ' (dirty)' : ''}`);
      if (status.dirty.length > 0) {
        log(`Dirty migrations: ${status.dirty.join(', ')}`);
      } else {
        log(`Current migration: ${status.current ?? '(none)'}`);
      }
      log(`Lock "${options.lockId}": ${(await lock.isHeld()) ? 'held' : 'free'}`);
      return;
    }
    case 'provision':
      await ledger.provision();
      log(`Tables ready: ${options.tableName}, ${options.lockTableName}`);
      return;
    case 'deprovision':
      await ledger.deprovision();
      log(`Tables deleted: ${options.tableName}, ${options.lockTableName}`);
      return;
    case 'finish':
      await ledger.finishMigration(command.id);
      log(`Marked as applied: ${command.id}`);
      return;
    case 'remove':
      await ledger.remove(command.id);
      log(`Removed: ${command.id}`);
      return;
    case 'unlock':
      await lock.forceRelease();
      log(`Lock "${options.lockId}" released`);
      return;
  }
}
