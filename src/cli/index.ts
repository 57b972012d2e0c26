#!/usr/bin/env node

/**
 * codemigrate CLI Entry Point
 *
 * Commands:
 * - discover              - List migrations found on disk
 * - plan [target]         - Show the execution order (dry run)
 * - migrate [target]      - Apply pending migrations
 * - rollback [target]     - Revert applied migrations
 * - status                - Show applied/pending state
 * - create <name>         - Scaffold a new migration
 *
 * Global Options:
 * - --verbose, -v       - Enable detailed output
 * - --config <path>     - Specify custom config file
 * - -C, --cwd <dir>     - Codebase to migrate (default: current directory)
 * - --no-color          - Disable colored output
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import chalk from 'chalk';
import { z } from 'zod';
import { ExitCode } from '../engine/errors.js';
import { initLogger, log } from './logger.js';
import { isVerboseEnabled, parseGlobalOptions } from './options.js';
import { registerCreateCommand } from './commands/create.js';
import { registerDiscoverCommand } from './commands/discover.js';
import { registerMigrateCommand } from './commands/migrate.js';
import { registerPlanCommand } from './commands/plan.js';
import { registerRollbackCommand } from './commands/rollback.js';
import { registerStatusCommand } from './commands/status.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf8')));

/**
 * Create and configure the CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('codemigrate')
    .description('Ordered, reversible, version-controlled codebase migrations')
    .version(packageJson.version, '-V, --version', 'Output the current version');

  program
    .option('-v, --verbose', 'Enable verbose output')
    .option('--config <path>', 'Path to configuration file')
    .option('-C, --cwd <dir>', 'Codebase to migrate')
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      // Commands re-initialize with configured level once config is loaded
      const globals = parseGlobalOptions(thisCommand.opts());
      if (globals.color === false) {
        chalk.level = 0;
      }
      initLogger({
        verbose: isVerboseEnabled(globals.verbose),
        noColor: globals.color === false,
      });
    });

  registerDiscoverCommand(program);
  registerPlanCommand(program);
  registerMigrateCommand(program);
  registerRollbackCommand(program);
  registerStatusCommand(program);
  registerCreateCommand(program);

  program.addHelpText(
    'after',
    `
Environment Variables:
  CODEMIGRATE_CONFIG_PATH     Override config file path
  CODEMIGRATE_ROOT            Codebase to migrate
  CODEMIGRATE_LOG_LEVEL       Set log level (error, warn, info, debug)
  CODEMIGRATE_VERBOSE         Enable verbose mode (true/false)
  CODEMIGRATE_MIGRATIONS_DIR  Migrations directory

Examples:
  $ codemigrate create rename_api_client
  $ codemigrate plan
  $ codemigrate migrate
  $ codemigrate rollback
`
  );

  return program;
}

function setupErrorHandlers(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    console.error(chalk.red('Unhandled promise rejection:'));
    console.error(reason);
    process.exit(ExitCode.Unexpected);
  });
}

async function main(): Promise<void> {
  setupErrorHandlers();

  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(chalk.red('Error:'), error.message);
      if (error.stack) {
        log.debug(error.stack);
      }
    } else {
      console.error(chalk.red('Unknown error:'), error);
    }
    process.exitCode = ExitCode.Unexpected;
  }
}

void main();
