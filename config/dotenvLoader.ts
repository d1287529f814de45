import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';

function tryLoad(filePath: string) {
  if (!filePath) return;
  if (!fs.existsSync(filePath)) return;
  dotenv.config({ path: filePath, override: false });
}

export function loadDotenv() {
  // Compiled output lives in dist/config/, sources in config/; both resolve to the package root.
  const thisDir = path.dirname(fileURLToPath(import.meta.url));
  const parentDir = path.resolve(thisDir, '..');
  const packageRoot = path.basename(parentDir) === 'dist' ? path.resolve(parentDir, '..') : parentDir;

  const explicit = process.env.DOTENV_CONFIG_PATH;
  if (explicit) {
    tryLoad(explicit);
    return;
  }

  // The working directory wins over the package root so a project embedding the CLI keeps its own .env.
  tryLoad(path.join(process.cwd(), '.env'));
  tryLoad(path.join(process.cwd(), '.env.local'));
  tryLoad(path.join(packageRoot, '.env'));
  tryLoad(path.join(packageRoot, '.env.local'));
}
