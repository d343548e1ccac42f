/**
 * Centralized version module
 * Reads version from package.json - single source of truth
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { projectRoot } from './config/registry/parsers.js';
import { isObject, isString } from './utils/type-guards.js';

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(projectRoot, 'package.json'), 'utf-8'));
  return isObject(packageJson) && isString(packageJson.version) ? packageJson.version : '0.0.0';
}

export const VERSION: string = readVersion();
