/**
 * Run reporting shared by the CLI commands
 */

import chalk from 'chalk';
import type { Logger } from 'winston';
import { exitCodeFor, ExitCode, MigrationEngineError, toError } from '../engine/errors.js';
import type { ExecutionRecord, RunProgress } from '../types/migration.js';
import { getLogger } from './logger.js';
import { ValidationError } from './options.js';

function actionSymbol(action: ExecutionRecord['action']): string {
  switch (action) {
    case 'applied':
      return chalk.green('✓');
    case 'reverted':
      return chalk.cyan('↺');
    case 'skipped':
      return chalk.gray('○');
  }
}

/**
 * Short commit reference for display
 */
export function shortRef(ref: string | null | undefined): string {
  return ref ? ref.slice(0, 12) : '-';
}

/**
 * One line per execution record
 */
export function formatRecords(records: readonly ExecutionRecord[]): string[] {
  return records.map(
    (record) =>
      `  ${actionSymbol(record.action)} ${record.action.padEnd(8)} ${record.migrationId} ${chalk.gray(shortRef(record.vcsRef))}`
  );
}

/**
 * Completed / failed / pending summary of a halted run
 */
export function formatProgress(progress: RunProgress): string[] {
  const lines: string[] = [];

  lines.push(`Completed (${progress.completed.length}):`);
  lines.push(...formatRecords(progress.completed));

  lines.push(`Failed: ${progress.failed ?? 'none'}`);

  lines.push(`Pending (${progress.pending.length}):`);
  lines.push(...progress.pending.map((id) => `  ${chalk.yellow('•')} ${id}`));

  return lines;
}

/**
 * Lines printed when a command fails
 */
export function formatFailure(error: unknown): string[] {
  const err = toError(error);
  const lines = [`${chalk.red('Error:')} ${err.message}`];

  if (err instanceof MigrationEngineError && err.progress) {
    lines.push(...formatProgress(err.progress));
  }
  if (err instanceof ValidationError && err.suggestion) {
    lines.push(chalk.gray(`  ${err.suggestion}`));
  }

  return lines;
}

/**
 * Print a failure and map it to an exit code; stacks only at debug level
 */
export function reportFailure(error: unknown, logger: Logger): ExitCode {
  for (const line of formatFailure(error)) {
    console.error(line);
  }

  const stack = toError(error).stack;
  if (stack) {
    logger.debug(stack);
  }

  return error instanceof ValidationError ? ExitCode.ValidationFailure : exitCodeFor(error);
}

/**
 * Wrap a command body so its outcome becomes the process exit code
 */
export async function runAction(body: () => Promise<ExitCode | void>): Promise<void> {
  try {
    process.exitCode = (await body()) ?? ExitCode.Success;
  } catch (error) {
    process.exitCode = reportFailure(error, getLogger());
  }
}
