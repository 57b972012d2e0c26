/**
 * Configuration File Loader
 *
 * Loads configuration from multiple sources with precedence:
 * 1. Environment variables (highest priority)
 * 2. Project-local config (<root>/.codemigrate/config.yml, or --config <path>)
 * 3. Global user config (~/.codemigrate/config.yml)
 * 4. Built-in defaults (lowest priority)
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import {
  AppConfigSchema,
  PartialAppConfigSchema,
  type AppConfig,
  type PartialAppConfig,
} from './schema.js';
import { CONFIG_FILENAME, DEFAULT_CONFIG, STATE_DATABASE_FILENAME } from './defaults.js';

/**
 * Where to look for configuration
 */
export interface LoadConfigOptions {
  /** Working root of the codebase being migrated (default: process.cwd()) */
  root?: string;
  /** Explicit project config file, replacing <root>/.codemigrate/config.yml */
  configPath?: string;
  /** Home directory holding the global config (default: os.homedir()) */
  homeDir?: string;
  /** Environment to read CODEMIGRATE_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and merge configuration from all sources.
 *
 * @throws {Error} If a file cannot be parsed or the merged configuration is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const root = path.resolve(options.root ?? process.cwd());
  const homeDir = options.homeDir ?? os.homedir();
  const env = options.env ?? process.env;

  let config: Record<string, unknown> = deepMerge(DEFAULT_CONFIG, {});

  const globalConfig = loadConfigFile(path.join(homeDir, DEFAULT_CONFIG.state.directory, CONFIG_FILENAME));
  if (globalConfig) {
    config = deepMerge(config, globalConfig);
  }

  if (options.configPath) {
    const explicitPath = path.resolve(root, options.configPath);
    const explicitConfig = loadConfigFile(explicitPath);
    if (!explicitConfig) {
      throw new Error(`Configuration file not found: ${explicitPath}`);
    }
    config = deepMerge(config, explicitConfig);
  } else {
    const projectConfig = loadConfigFile(path.join(root, DEFAULT_CONFIG.state.directory, CONFIG_FILENAME));
    if (projectConfig) {
      config = deepMerge(config, projectConfig);
    }
  }

  const envConfig = loadEnvironmentConfig(env);
  if (envConfig) {
    config = deepMerge(config, envConfig);
  }

  try {
    return AppConfigSchema.parse(config);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(formatValidationErrors(error));
    }
    throw error;
  }
}

/**
 * Load configuration from a YAML file.
 *
 * @returns Parsed configuration or null if the file doesn't exist or is empty
 * @throws {Error} If YAML parsing or shape validation fails
 */
export function loadConfigFile(filePath: string): PartialAppConfig | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new Error(
        `YAML parsing error in ${filePath}:\n` + `  Line ${error.mark.line + 1}: ${error.reason}`
      );
    }
    throw error;
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return null;
  }

  if (!isPlainObject(parsed)) {
    throw new Error(`Invalid configuration file: ${filePath} - expected object`);
  }

  const result = PartialAppConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`${formatValidationErrors(result.error)}\n  (in ${filePath})`);
  }
  return result.data;
}

/**
 * Load configuration from environment variables:
 * - CODEMIGRATE_MIGRATIONS_DIR
 * - CODEMIGRATE_STRICT
 * - CODEMIGRATE_LOG_LEVEL
 * - CODEMIGRATE_LOG_FILE
 * - CODEMIGRATE_TAG_COMMITS
 * - CODEMIGRATE_COMMIT_PREFIX
 * - CODEMIGRATE_GIT_TIMEOUT_MS
 * - CODEMIGRATE_STALE_LOCK_MS
 *
 * Values are passed through unvalidated; the merged result is checked by loadConfig.
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> | null {
  const migrations: Record<string, unknown> = {};
  const state: Record<string, unknown> = {};
  const vcs: Record<string, unknown> = {};
  const logging: Record<string, unknown> = {};

  if (env.CODEMIGRATE_MIGRATIONS_DIR) {
    migrations.directory = env.CODEMIGRATE_MIGRATIONS_DIR;
  }
  if (env.CODEMIGRATE_STRICT !== undefined) {
    migrations.strict = env.CODEMIGRATE_STRICT === 'true';
  }

  if (env.CODEMIGRATE_STALE_LOCK_MS) {
    state.staleLockMs = Number(env.CODEMIGRATE_STALE_LOCK_MS);
  }

  if (env.CODEMIGRATE_COMMIT_PREFIX) {
    vcs.commitMessagePrefix = env.CODEMIGRATE_COMMIT_PREFIX;
  }
  if (env.CODEMIGRATE_TAG_COMMITS !== undefined) {
    vcs.tagCommits = env.CODEMIGRATE_TAG_COMMITS === 'true';
  }
  if (env.CODEMIGRATE_GIT_TIMEOUT_MS) {
    vcs.timeoutMs = Number(env.CODEMIGRATE_GIT_TIMEOUT_MS);
  }

  if (env.CODEMIGRATE_LOG_LEVEL) {
    logging.level = env.CODEMIGRATE_LOG_LEVEL;
  }
  if (env.CODEMIGRATE_LOG_FILE) {
    logging.filePath = env.CODEMIGRATE_LOG_FILE;
  }

  const config: Record<string, unknown> = {};
  for (const [key, section] of Object.entries({ migrations, state, vcs, logging })) {
    if (Object.keys(section).length > 0) {
      config[key] = section;
    }
  }

  return Object.keys(config).length > 0 ? config : null;
}

/**
 * Deep merge two objects, with source overriding target.
 *
 * - Nested objects are merged recursively
 * - Arrays are replaced entirely (not merged)
 * - Undefined source values are ignored
 */
export function deepMerge(target: object, source: object): Record<string, unknown> {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(target));

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }

    const targetValue = result[key];
    result[key] =
      isPlainObject(sourceValue) && isPlainObject(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format Zod validation errors into human-readable message.
 */
export function formatValidationErrors(error: ZodError): string {
  const errors = error.issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`);
  return `Configuration validation failed:\n${errors.join('\n')}`;
}

/**
 * Resolve configured directories against the working root
 */
export function resolvePaths(config: AppConfig, root: string): {
  migrationsDir: string;
  stateDir: string;
  stateDatabase: string;
} {
  const stateDir = path.resolve(root, config.state.directory);
  return {
    migrationsDir: path.resolve(root, config.migrations.directory),
    stateDir,
    stateDatabase: path.join(stateDir, STATE_DATABASE_FILENAME),
  };
}
