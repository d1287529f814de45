#!/usr/bin/env node
import { loadDotenv } from '../config/dotenvLoader.js';
import { loadEnv, targetOptionsFromEnv } from '../config/env.js';
import { cliLog } from '../config/logger.js';
import { connectMongo, disconnectMongo } from '../database/mongo.js';
import { MongoStore } from '../database/mongoStore.js';
import { createMigrationTarget } from '../services/target.js';
import { executeCommand, parseArgs } from './commands.js';

function log(msg: string) {
  // eslint-disable-next-line no-console
  console.log(msg);
}

async function run() {
  loadDotenv();
  const command = parseArgs(process.argv.slice(2));
  const env = loadEnv();
  await connectMongo(env);

  const target = createMigrationTarget(new MongoStore(), ...targetOptionsFromEnv(env));
  cliLog.debug('Running migration command', { command: command.name, ...target.options });
  await executeCommand(target, command, log);
}

void run()
  .catch((err: unknown) => {
    cliLog.error('Migration command failed', { error: err });
    // eslint-disable-next-line no-console
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  })
  .finally(() =>
    disconnectMongo().catch((err: unknown) => {
      cliLog.warn('MongoDB disconnect failed', { error: err });
    })
  );
