#!/usr/bin/env node
// CLI entry point for cardforge.
// .env must be loaded before the config module is first imported.

import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadEnv } from './config/env.js';

async function main(): Promise<void> {
  loadEnv(resolve(dirname(fileURLToPath(import.meta.url)), '..'));

  const { config } = await import('./config/index.js');
  const { runCli } = await import('./cli/index.js');

  await runCli(process.argv.slice(2), config);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
