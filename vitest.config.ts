import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  root: rootDir,
  test: {
    include: ['tests/**/*.spec.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],
    environment: 'node',
    globals: true,
    // The logger reads NODE_ENV at import time and stays silent under test.
    env: { NODE_ENV: 'test' },
    // Lock tests poll on real timers; keep room for the slower CI runners.
    testTimeout: 20_000,
  },
});
