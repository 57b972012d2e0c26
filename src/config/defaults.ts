/**
 * Default Configuration Values
 */

import type { AppConfig } from './schema.js';

/**
 * Default Application Configuration
 *
 * - Migrations discovered from ./migrations, bad modules skipped with a warning
 * - State kept in .codemigrate/state.db with a 5 minute stale lock timeout
 * - Untagged commits prefixed "migrate"
 * - Info-level logging with console output
 */
export const DEFAULT_CONFIG: AppConfig = {
  migrations: {
    directory: 'migrations',
    strict: false,
  },
  state: {
    directory: '.codemigrate',
    staleLockMs: 300000,
  },
  vcs: {
    commitMessagePrefix: 'migrate',
    tagCommits: false,
    timeoutMs: 30000,
  },
  logging: {
    level: 'info',
    consoleOutput: true,
    filePath: undefined,
  },
};

export const CONFIG_FILENAME = 'config.yml';

export const STATE_DATABASE_FILENAME = 'state.db';
