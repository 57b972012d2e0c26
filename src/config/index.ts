/**
 * Configuration Management Module
 *
 * @example
 * ```typescript
 * import { loadConfig, resolvePaths } from './config/index.js';
 *
 * const config = loadConfig({ root: '/path/to/project' });
 * const { migrationsDir, stateDatabase } = resolvePaths(config, '/path/to/project');
 * ```
 */

export {
  type MigrationsConfig,
  type StateConfig,
  type VcsConfig,
  type LoggingConfig,
  type AppConfig,
  type PartialAppConfig,
  type ValidatedAppConfig,
  MigrationsConfigSchema,
  StateConfigSchema,
  VcsConfigSchema,
  LoggingConfigSchema,
  AppConfigSchema,
  PartialAppConfigSchema,
} from './schema.js';

export { DEFAULT_CONFIG, CONFIG_FILENAME, STATE_DATABASE_FILENAME } from './defaults.js';

export {
  loadConfig,
  loadConfigFile,
  loadEnvironmentConfig,
  deepMerge,
  formatValidationErrors,
  resolvePaths,
  type LoadConfigOptions,
} from './loader.js';
