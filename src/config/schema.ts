/**
 * Configuration Schema Definition
 *
 * Defines TypeScript interfaces and Zod schemas for runtime validation
 * of codemigrate configuration settings.
 */

import { z } from 'zod';

/**
 * Migrations Configuration
 *
 * Where migration modules are discovered and how discovery problems are treated.
 */
export interface MigrationsConfig {
  /**
   * Directory containing migration modules, relative to the working root.
   *
   * @default "migrations"
   * @example "tools/migrations"
   */
  directory: string;

  /**
   * Abort on the first discovery error instead of skipping the bad module.
   *
   * @default false
   */
  strict: boolean;
}

/**
 * State Configuration
 *
 * Location of the state database and run lock behavior.
 */
export interface StateConfig {
  /**
   * State directory, relative to the working root. Holds state.db and is
   * never reported as a working tree change.
   *
   * @default ".codemigrate"
   */
  directory: string;

  /**
   * Lock age in milliseconds after which a run lock is taken over.
   *
   * @default 300000
   * @minimum 1000
   */
  staleLockMs: number;
}

/**
 * Version Control Configuration
 */
export interface VcsConfig {
  /**
   * Prefix of every migration commit message ("<prefix>: apply <id>").
   *
   * @default "migrate"
   */
  commitMessagePrefix: string;

  /**
   * Tag each migration commit as codemigrate/<id>/<direction>.
   *
   * @default false
   */
  tagCommits: boolean;

  /**
   * Timeout for a single git invocation in milliseconds.
   *
   * @default 30000
   */
  timeoutMs: number;

  /**
   * Committer identity for repositories without one configured.
   *
   * @default undefined
   * @example { name: "Migration Bot", email: "migrations@example.com" }
   */
  author?: {
    name: string;
    email: string;
  };
}

/**
 * Logging Configuration
 *
 * Controls logging behavior, output destinations, and verbosity.
 */
export interface LoggingConfig {
  /**
   * Log level controlling verbosity of output.
   *
   * @default "info"
   * @example "debug"
   */
  level: 'debug' | 'info' | 'warn' | 'error';

  /**
   * Optional file path for log output. If undefined, only console logging is used.
   *
   * @default undefined
   * @example ".codemigrate/codemigrate.log"
   */
  filePath?: string;

  /**
   * Whether to output logs to console.
   *
   * @default true
   */
  consoleOutput: boolean;
}

/**
 * Application Configuration
 */
export interface AppConfig {
  migrations: MigrationsConfig;
  state: StateConfig;
  vcs: VcsConfig;
  logging: LoggingConfig;
}

export const MigrationsConfigSchema = z.object({
  directory: z.string().min(1, {
    message: 'Migrations directory must be a non-empty string',
  }),
  strict: z.boolean(),
});

export const StateConfigSchema = z.object({
  directory: z.string().min(1, {
    message: 'State directory must be a non-empty string',
  }),
  staleLockMs: z.number().int().min(1000, {
    message: 'staleLockMs must be at least 1000',
  }),
});

export const VcsConfigSchema = z.object({
  commitMessagePrefix: z.string().min(1, {
    message: 'commitMessagePrefix must be a non-empty string',
  }),
  tagCommits: z.boolean(),
  timeoutMs: z.number().int().positive({
    message: 'timeoutMs must be a positive integer',
  }),
  author: z
    .object({
      name: z.string().min(1),
      email: z.string().min(1),
    })
    .optional(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']),
  filePath: z.string().optional(),
  consoleOutput: z.boolean(),
});

/**
 * Complete Application Configuration Schema
 */
export const AppConfigSchema = z.object({
  migrations: MigrationsConfigSchema,
  state: StateConfigSchema,
  vcs: VcsConfigSchema,
  logging: LoggingConfigSchema,
});

/**
 * Partial configuration as it appears in a file or the environment
 */
export const PartialAppConfigSchema = z.object({
  migrations: MigrationsConfigSchema.partial().optional(),
  state: StateConfigSchema.partial().optional(),
  vcs: VcsConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

export type PartialAppConfig = z.infer<typeof PartialAppConfigSchema>;

export type ValidatedAppConfig = z.infer<typeof AppConfigSchema>;
