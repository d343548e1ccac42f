import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';

/**
 * Load environment variables from the project's .env file.
 *
 * Must run before ./index.js is first imported, since the config
 * singleton reads process.env at import time.
 */
export function loadEnv(projectRoot: string): void {
  // Guard: only load once
  if (process.env.__CARDFORGE_ENV_LOADED) return;

  const envPath = resolve(projectRoot, '.env');
  if (existsSync(envPath)) {
    dotenvConfig({ path: envPath });
  }

  process.env.__CARDFORGE_ENV_LOADED = '1';
}
