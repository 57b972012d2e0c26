/**
 * Status Command - Show applied/pending state of every migration
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { StatusReport } from '../../engine/manager.js';
import { withCliContext } from '../context.js';
import { parseGlobalOptions, type GlobalOptions } from '../options.js';
import { runAction, shortRef } from '../report.js';

export interface StatusOptions {
  json?: boolean;
}

/**
 * Human-readable status report
 */
export function formatStatus(report: StatusReport): string[] {
  const lines = ['', chalk.bold('Migration Status'), chalk.gray('─'.repeat(50))];

  for (const entry of report.migrations) {
    const state =
      entry.state === 'applied'
        ? chalk.green('applied')
        : entry.state === 'skipped'
          ? chalk.gray('skipped')
          : chalk.yellow('pending');
    const drift = entry.modified ? chalk.red(' (modified)') : '';
    const ref = entry.state === 'applied' ? ` ${chalk.gray(shortRef(entry.vcsRef))}` : '';
    lines.push(`  ${state.padEnd(7)} ${entry.id}${ref}${drift}`);
  }

  if (report.migrations.length === 0) {
    lines.push(chalk.gray('  No migrations found'));
  }

  lines.push(chalk.gray('─'.repeat(50)));

  for (const id of report.orphaned) {
    lines.push(chalk.yellow(`! ${id} is applied but its definition is missing`));
  }
  for (const error of report.discoveryErrors) {
    lines.push(chalk.yellow(`! ${error.file}: ${error.message}`));
  }

  return lines;
}

export async function statusCommand(options: StatusOptions, globals: GlobalOptions): Promise<void> {
  const report = await withCliContext(globals, ({ manager }) => manager.status());

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          ...report,
          discoveryErrors: report.discoveryErrors.map((error) => ({
            file: error.file,
            message: error.message,
          })),
        },
        null,
        2
      )
    );
    return;
  }

  for (const line of formatStatus(report)) {
    console.log(line);
  }
}

/**
 * Register the status command with Commander
 */
export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show migration state')
    .option('--json', 'Output in JSON format')
    .action((options: StatusOptions, command: Command) =>
      runAction(() => statusCommand(options, parseGlobalOptions(command.optsWithGlobals())))
    );
}
