/**
 * Database Configuration Section
 *
 * SQLite database settings.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const databaseSection = {
  name: 'database',
  description: 'SQLite database configuration.',
  options: {
    path: {
      envKey: 'CARDFORGE_DB_PATH',
      defaultValue: 'cards.db',
      description:
        'Path to SQLite database file. Supports ~ expansion and ":memory:". The default file lives under CARDFORGE_DATA_DIR.',
      schema: z.string().min(1),
      parse: 'path',
    },
    skipInit: {
      envKey: 'CARDFORGE_SKIP_INIT',
      defaultValue: false,
      description: 'Skip applying schema migrations on startup.',
      schema: z.boolean(),
    },
    verbose: {
      envKey: 'CARDFORGE_DB_VERBOSE',
      defaultValue: false,
      description: 'Log every applied migration.',
      schema: z.boolean(),
    },
    busyTimeoutMs: {
      envKey: 'CARDFORGE_DB_BUSY_TIMEOUT_MS',
      defaultValue: 5000,
      description: 'SQLite busy timeout in milliseconds. How long to wait for locks.',
      schema: z.number().int().positive(),
      parse: 'int',
    },
  },
} satisfies ConfigSectionMeta;
