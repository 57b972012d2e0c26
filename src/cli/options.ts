/**
 * Option Parsing and Validation
 *
 * Utilities for parsing, validating, and normalizing CLI options:
 * - Global options shared by every command
 * - Migration identity lists (--depends-on)
 * - Environment variable fallbacks
 */

import path from 'path';

/**
 * Options registered on the root program
 */
export interface GlobalOptions {
  verbose?: boolean;
  /** Commander turns --no-color into color: false */
  color?: boolean;
  config?: string;
  cwd?: string;
}

/**
 * Validation error with helpful message
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
    public readonly suggestion?: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Read global options out of a Commander option bag
 */
export function parseGlobalOptions(opts: Record<string, unknown>): GlobalOptions {
  return {
    verbose: typeof opts.verbose === 'boolean' ? opts.verbose : undefined,
    color: typeof opts.color === 'boolean' ? opts.color : undefined,
    config: typeof opts.config === 'string' ? opts.config : undefined,
    cwd: typeof opts.cwd === 'string' ? opts.cwd : undefined,
  };
}

/**
 * Parse migration identities given as repeated and/or comma-separated values
 *
 * @example parseIdentityList(['a,b', 'c']) // ['a', 'b', 'c']
 * @throws ValidationError on an empty identity
 */
export function parseIdentityList(values: readonly string[] = []): string[] {
  const ids: string[] = [];

  for (const value of values) {
    for (const part of value.split(',')) {
      const id = part.trim();
      if (!id) {
        throw new ValidationError(
          `Empty migration identity in "${value}"`,
          'depends-on',
          value,
          'Separate identities with commas, e.g. --depends-on 20240101000000_a,20240102000000_b',
        );
      }
      if (!ids.includes(id)) {
        ids.push(id);
      }
    }
  }

  return ids;
}

/**
 * Validate enum value
 *
 * @throws ValidationError if not in allowed values
 */
export function validateEnum<T extends string>(
  value: unknown,
  field: string,
  allowedValues: readonly T[],
): T {
  const strValue = String(value).toLowerCase();
  const found = allowedValues.find((v) => v.toLowerCase() === strValue);

  if (!found) {
    throw new ValidationError(
      `Invalid ${field}: "${String(value)}"`,
      field,
      value,
      `Use one of: ${allowedValues.join(', ')}`,
    );
  }

  return found;
}

/**
 * Working root from -C/--cwd, else CODEMIGRATE_ROOT, else the current directory
 */
export function getWorkingRoot(cwdOption?: string): string {
  return path.resolve(cwdOption || process.env.CODEMIGRATE_ROOT || process.cwd());
}

/**
 * Configuration file path from --config or CODEMIGRATE_CONFIG_PATH.
 * Undefined means the default project config is used.
 */
export function getConfigPath(configOption?: string): string | undefined {
  return configOption || process.env.CODEMIGRATE_CONFIG_PATH || undefined;
}

/**
 * Check if verbose mode is enabled
 *
 * Checks both --verbose flag and CODEMIGRATE_VERBOSE environment variable
 */
export function isVerboseEnabled(verboseFlag?: boolean): boolean {
  if (verboseFlag !== undefined) {
    return verboseFlag;
  }

  const envVerbose = process.env.CODEMIGRATE_VERBOSE;
  return envVerbose === 'true' || envVerbose === '1';
}
