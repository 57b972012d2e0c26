/**
 * CLI Logging Infrastructure
 *
 * Winston logger shared by the CLI and the migration engine:
 * - Log levels error, warn, info, debug
 * - Colored console output (unless --no-color is specified)
 * - Optional file transport
 * - CODEMIGRATE_LOG_LEVEL environment override
 */

import winston from 'winston';
import chalk from 'chalk';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggerOptions {
  level?: LogLevel;
  noColor?: boolean;
  verbose?: boolean;
  /** Append JSON lines to this file as well */
  filePath?: string;
  /** Write to the console (default: true) */
  consoleOutput?: boolean;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

/**
 * Custom formatter for console output with chalk colors
 */
const consoleFormat = (noColor: boolean) =>
  winston.format.printf(({ level, message, timestamp }) => {
    const time = String(timestamp);
    if (noColor) {
      return `[${time}] ${level.toUpperCase()}: ${String(message)}`;
    }

    const colorMap: Record<string, (text: string) => string> = {
      error: chalk.red,
      warn: chalk.yellow,
      info: chalk.blue,
      debug: chalk.gray,
    };

    const colorFn = colorMap[level] ?? ((text: string) => text);
    return `${chalk.gray(`[${time}]`)} ${colorFn(level.toUpperCase())}: ${String(message)}`;
  });

/**
 * Create a configured logger instance
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const envLevel = process.env.CODEMIGRATE_LOG_LEVEL;
  const {
    level = isLogLevel(envLevel) ? envLevel : 'info',
    noColor = false,
    verbose = false,
    filePath,
    consoleOutput = true,
  } = options;

  const transports: winston.transport[] = [];

  if (consoleOutput) {
    transports.push(
      new winston.transports.Console({
        format: consoleFormat(noColor),
        stderrLevels: ['error', 'warn'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        format: winston.format.json(),
      })
    );
  }

  return winston.createLogger({
    level: verbose ? 'debug' : level,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'HH:mm:ss' }),
      winston.format.errors({ stack: true })
    ),
    transports,
    silent: transports.length === 0,
  });
}

/**
 * Logger that discards everything; default for library use
 */
export function createSilentLogger(): winston.Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console()],
  });
}

// Global logger instance (initialized by CLI entry point)
let globalLogger: winston.Logger | null = null;

export function initLogger(options: LoggerOptions = {}): winston.Logger {
  globalLogger = createLogger(options);
  return globalLogger;
}

/**
 * Get the global logger instance, creating a default one if needed
 */
export function getLogger(): winston.Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

export const log = {
  error: (message: string, ...args: unknown[]) => getLogger().error(message, ...args),
  warn: (message: string, ...args: unknown[]) => getLogger().warn(message, ...args),
  info: (message: string, ...args: unknown[]) => getLogger().info(message, ...args),
  debug: (message: string, ...args: unknown[]) => getLogger().debug(message, ...args),
};
