/**
 * Create Command - Scaffold a new migration module
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { resolvePaths } from '../../config/index.js';
import { DirectoryMigrationSource } from '../../migrations/registry.js';
import { generateMigrationFile, type MigrationFileFormat } from '../../migrations/template.js';
import { loadCliConfig } from '../context.js';
import { parseGlobalOptions, parseIdentityList, validateEnum, type GlobalOptions } from '../options.js';
import { runAction } from '../report.js';

export interface CreateOptions {
  dependsOn?: string[];
  format?: string;
}

const FORMATS: readonly MigrationFileFormat[] = ['mjs', 'ts'];

/**
 * Execute the create command
 *
 * @returns Path of the new file
 */
export async function createCommand(
  name: string,
  options: CreateOptions,
  globals: GlobalOptions
): Promise<string> {
  const { root, config, logger } = loadCliConfig(globals);
  const { migrationsDir } = resolvePaths(config, root);
  const dependencies = parseIdentityList(options.dependsOn);
  const format = validateEnum(options.format ?? 'mjs', 'format', FORMATS);

  if (dependencies.length > 0) {
    const { candidates } = await new DirectoryMigrationSource(migrationsDir).discover();
    const known = new Set(candidates.map((unit) => unit.id));
    for (const dependency of dependencies.filter((id) => !known.has(id))) {
      logger.warn(`Dependency ${dependency} is not a discovered migration`);
    }
  }

  const { id, filepath } = await generateMigrationFile(name, { migrationsDir, dependencies, format });

  console.log(`${chalk.green('Created')} ${id}`);
  console.log(chalk.gray(`  ${filepath}`));
  return filepath;
}

/**
 * Register the create command with Commander
 */
export function registerCreateCommand(program: Command): void {
  program
    .command('create <name>')
    .description('Create a new migration from the template')
    .option('--depends-on <ids...>', 'Migrations this one depends on (space or comma separated)')
    .option('--format <format>', 'Module format: mjs or ts', 'mjs')
    .action((name: string, options: CreateOptions, command: Command) =>
      runAction(async () => {
        await createCommand(name, options, parseGlobalOptions(command.optsWithGlobals()));
      })
    );
}
