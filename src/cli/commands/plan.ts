/**
 * Plan Command - Show the execution order without running anything
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { Schedule } from '../../types/migration.js';
import { withCliContext } from '../context.js';
import { parseGlobalOptions, type GlobalOptions } from '../options.js';
import { runAction } from '../report.js';

export interface PlanOptions {
  json?: boolean;
}

/**
 * Human-readable schedule, one line per migration in execution order
 */
export function formatSchedule(schedule: Schedule): string[] {
  const title = schedule.target ? `Plan up to ${schedule.target}` : 'Plan';
  const lines = [chalk.bold(`${title} (${schedule.pending.length} pending, ${schedule.applied.length} applied)`)];
  const applied = new Set(schedule.applied);

  schedule.order.forEach((id, index) => {
    const marker = applied.has(id) ? chalk.green('applied') : chalk.yellow('pending');
    lines.push(`  ${String(index + 1).padStart(3)}. ${id} ${marker}`);
  });

  if (schedule.pending.length === 0) {
    lines.push(chalk.gray('Nothing to apply.'));
  }

  return lines;
}

export async function planCommand(
  target: string | undefined,
  options: PlanOptions,
  globals: GlobalOptions
): Promise<void> {
  const schedule = await withCliContext(globals, ({ manager }) => manager.plan(target));

  if (options.json) {
    console.log(JSON.stringify(schedule, null, 2));
    return;
  }

  for (const line of formatSchedule(schedule)) {
    console.log(line);
  }
}

/**
 * Register the plan command with Commander
 */
export function registerPlanCommand(program: Command): void {
  program
    .command('plan [target]')
    .description('Compute the execution order (dry run)')
    .option('--json', 'Output in JSON format')
    .action((target: string | undefined, options: PlanOptions, command: Command) =>
      runAction(() => planCommand(target, options, parseGlobalOptions(command.optsWithGlobals())))
    )
    .addHelpText(
      'after',
      `
Examples:
  $ codemigrate plan                             # Everything not yet applied
  $ codemigrate plan 20240301120000_rename_api   # Only that migration and its dependencies
  $ codemigrate plan --json                      # Machine-readable schedule
`
    );
}
