/**
 * Migrate Command - Apply pending migrations
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { ExecutionRecord } from '../../types/migration.js';
import { withCliContext } from '../context.js';
import { parseGlobalOptions, type GlobalOptions } from '../options.js';
import { formatRecords, runAction } from '../report.js';

/**
 * Summary printed after a successful run
 */
export function formatRunSummary(records: readonly ExecutionRecord[]): string[] {
  if (records.length === 0) {
    return [chalk.gray('Nothing to do.')];
  }

  const counts = { applied: 0, reverted: 0, skipped: 0 };
  for (const record of records) {
    counts[record.action]++;
  }

  const parts = Object.entries(counts)
    .filter(([, count]) => count > 0)
    .map(([action, count]) => `${count} ${action}`);

  return [...formatRecords(records), chalk.bold(`Done: ${parts.join(', ')}`)];
}

export async function migrateCommand(target: string | undefined, globals: GlobalOptions): Promise<void> {
  const records = await withCliContext(globals, ({ manager }) => manager.migrate(target));

  for (const line of formatRunSummary(records)) {
    console.log(line);
  }
}

/**
 * Register the migrate command with Commander
 */
export function registerMigrateCommand(program: Command): void {
  program
    .command('migrate [target]')
    .description('Apply pending migrations (up to target when given)')
    .action((target: string | undefined, _options: unknown, command: Command) =>
      runAction(() => migrateCommand(target, parseGlobalOptions(command.optsWithGlobals())))
    )
    .addHelpText(
      'after',
      `
Each migration runs in its own commit. The run stops at the first failure;
migrations committed before it stay applied.

Exit codes:
  0  success
  1  a migration failed or the working tree was dirty
  2  invalid migration set (unknown dependency, cycle, unknown target)
  3  another run holds the lock
  4  unexpected error
`
    );
}
