/**
 * Config Registry
 *
 * Assembles all configuration sections into a complete registry.
 */

import type { ConfigRegistry } from './types.js';
import { databaseSection } from './sections/database.js';
import { restSection } from './sections/rest.js';
import { loggingSection } from './sections/logging.js';
import { runtimeSection } from './sections/runtime.js';

export const configRegistry = {
  sections: {
    database: databaseSection,
    rest: restSection,
    logging: loggingSection,
    runtime: runtimeSection,
  },
} satisfies ConfigRegistry;

export { databaseSection, restSection, loggingSection, runtimeSection };
export type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta } from './types.js';
export { buildConfigFromRegistry, getAllEnvVars, formatZodErrors } from './schema-builder.js';
export type { EnvVarInfo } from './schema-builder.js';
