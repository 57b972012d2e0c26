/**
 * CLI Context
 *
 * Wires configuration into a ready MigrationManager for one command invocation.
 */

import path from 'path';
import type { Logger } from 'winston';
import { loadConfig, resolvePaths, type AppConfig } from '../config/index.js';
import { MigrationManager } from '../engine/manager.js';
import { DirectoryMigrationSource } from '../migrations/registry.js';
import { SqliteRunLock } from '../state/lock.js';
import { SqliteStateStore } from '../state/store.js';
import { GitVersionControl } from '../vcs/git.js';
import { initLogger } from './logger.js';
import { getConfigPath, getWorkingRoot, isVerboseEnabled, type GlobalOptions } from './options.js';

export interface CliContext {
  root: string;
  config: AppConfig;
  logger: Logger;
  /** Absolute migrations directory */
  migrationsDir: string;
  manager: MigrationManager;
  close(): Promise<void>;
}

/**
 * Load configuration and logger only; used by commands that never touch state
 */
export function loadCliConfig(globals: GlobalOptions): { root: string; config: AppConfig; logger: Logger } {
  const root = getWorkingRoot(globals.cwd);
  const config = loadConfig({ root, configPath: getConfigPath(globals.config) });

  const logger = initLogger({
    level: config.logging.level,
    verbose: isVerboseEnabled(globals.verbose),
    noColor: globals.color === false,
    filePath: config.logging.filePath ? path.resolve(root, config.logging.filePath) : undefined,
    consoleOutput: config.logging.consoleOutput,
  });

  return { root, config, logger };
}

/**
 * Build the full engine for a command
 */
export function createCliContext(globals: GlobalOptions): CliContext {
  const { root, config, logger } = loadCliConfig(globals);
  const { migrationsDir, stateDir, stateDatabase } = resolvePaths(config, root);

  const stateStore = SqliteStateStore.open(stateDatabase);
  const lock = new SqliteRunLock(stateStore.getConnectionManager(), {
    staleAfterMs: config.state.staleLockMs,
  });

  const relativeStateDir = path.relative(root, stateDir);
  const vcs = new GitVersionControl({
    cwd: root,
    exclude: relativeStateDir && !relativeStateDir.startsWith('..') ? [relativeStateDir] : [],
    timeout: config.vcs.timeoutMs,
    author: config.vcs.author,
  });

  const manager = new MigrationManager({
    workingRoot: root,
    source: new DirectoryMigrationSource(migrationsDir, { strict: config.migrations.strict }),
    stateStore,
    vcs,
    lock,
    logger,
    commitMessagePrefix: config.vcs.commitMessagePrefix,
    tagCommits: config.vcs.tagCommits,
  });

  logger.debug(`Working root: ${root}`);
  logger.debug(`Migrations: ${migrationsDir}`);
  logger.debug(`State database: ${stateDatabase}`);

  return {
    root,
    config,
    logger,
    migrationsDir,
    manager,
    close: () => stateStore.close(),
  };
}

/**
 * Run `fn` with a context, closing the state database afterwards
 */
export async function withCliContext<T>(
  globals: GlobalOptions,
  fn: (context: CliContext) => Promise<T>
): Promise<T> {
  const context = createCliContext(globals);
  try {
    return await fn(context);
  } finally {
    await context.close();
  }
}
