/**
 * Discover Command - List migration candidates found on disk
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ExitCode } from '../../engine/errors.js';
import { DirectoryMigrationSource, type DiscoveryResult } from '../../migrations/registry.js';
import { resolvePaths } from '../../config/index.js';
import { loadCliConfig } from '../context.js';
import { parseGlobalOptions, type GlobalOptions } from '../options.js';
import { runAction } from '../report.js';

export interface DiscoverOptions {
  json?: boolean;
}

/**
 * Human-readable discovery listing
 */
export function formatDiscovery(result: DiscoveryResult): string[] {
  const lines = [chalk.bold(`Discovered ${result.candidates.length} migration(s)`)];

  for (const unit of result.candidates) {
    const deps = unit.dependencies.length > 0 ? chalk.gray(` <- ${unit.dependencies.join(', ')}`) : '';
    lines.push(`  ${unit.id}${deps}`);
    if (unit.description) {
      lines.push(chalk.gray(`      ${unit.description}`));
    }
  }

  if (result.errors.length > 0) {
    lines.push(chalk.yellow(`Skipped ${result.errors.length} file(s):`));
    for (const error of result.errors) {
      lines.push(`  ${chalk.yellow('!')} ${error.file}: ${error.message}`);
    }
  }

  return lines;
}

/**
 * Execute the discover command.
 * Any discovery error yields a validation exit code.
 */
export async function discoverCommand(options: DiscoverOptions, globals: GlobalOptions): Promise<ExitCode> {
  const { root, config } = loadCliConfig(globals);
  const { migrationsDir } = resolvePaths(config, root);
  const result = await new DirectoryMigrationSource(migrationsDir, {
    strict: config.migrations.strict,
  }).discover();

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          candidates: result.candidates.map((unit) => ({
            id: unit.id,
            orderKey: unit.orderKey,
            dependencies: unit.dependencies,
            description: unit.description ?? null,
            checksum: unit.checksum ?? null,
          })),
          errors: result.errors.map((error) => ({ file: error.file, message: error.message })),
        },
        null,
        2
      )
    );
  } else {
    for (const line of formatDiscovery(result)) {
      console.log(line);
    }
  }

  return result.errors.length > 0 ? ExitCode.ValidationFailure : ExitCode.Success;
}

/**
 * Register the discover command with Commander
 */
export function registerDiscoverCommand(program: Command): void {
  program
    .command('discover')
    .description('List migrations found in the migrations directory')
    .option('--json', 'Output in JSON format')
    .action((options: DiscoverOptions, command: Command) =>
      runAction(() => discoverCommand(options, parseGlobalOptions(command.optsWithGlobals())))
    );
}
