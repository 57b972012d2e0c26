/**
 * Rollback Command - Revert applied migrations
 */

import { Command } from 'commander';
import { withCliContext } from '../context.js';
import { parseGlobalOptions, ValidationError, type GlobalOptions } from '../options.js';
import { runAction } from '../report.js';
import { formatRunSummary } from './migrate.js';

export interface RollbackCommandOptions {
  all?: boolean;
}

export async function rollbackCommand(
  target: string | undefined,
  options: RollbackCommandOptions,
  globals: GlobalOptions
): Promise<void> {
  if (options.all && target !== undefined) {
    throw new ValidationError(
      `Cannot combine target "${target}" with --all`,
      'all',
      target,
      'Pass either a target or --all'
    );
  }

  const records = await withCliContext(globals, ({ manager }) =>
    manager.rollback(target, { all: options.all === true })
  );

  for (const line of formatRunSummary(records)) {
    console.log(line);
  }
}

/**
 * Register the rollback command with Commander
 */
export function registerRollbackCommand(program: Command): void {
  program
    .command('rollback [target]')
    .description('Revert the last migration, everything applied after target, or everything')
    .option('--all', 'Revert every applied migration')
    .action((target: string | undefined, options: RollbackCommandOptions, command: Command) =>
      runAction(() => rollbackCommand(target, options, parseGlobalOptions(command.optsWithGlobals())))
    )
    .addHelpText(
      'after',
      `
Examples:
  $ codemigrate rollback                            # Revert the most recent migration
  $ codemigrate rollback 20240301120000_rename_api  # Revert everything applied after it
  $ codemigrate rollback --all                      # Revert every applied migration
`
    );
}
