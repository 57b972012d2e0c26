/**
 * Migration Registry / Discovery
 *
 * Enumerates migration units from a source location:
 * - Directory source loading `YYYYMMDDHHMMSS_<slug>.(ts|js|mjs)` modules
 * - Static source wrapping an in-memory list
 * - Per-file error collection with optional strict mode
 */

import { createHash } from 'crypto';
import { readdir, readFile, stat } from 'fs/promises';
import { join, resolve } from 'path';
import { pathToFileURL } from 'url';
import { DiscoveryError, toError } from '../engine/errors.js';
import type { MigrationUnit } from '../types/migration.js';
import { compareMigrationUnits, defineMigration, formatIssues, MigrationDefinitionSchema } from './unit.js';

/**
 * Result of a discovery pass
 */
export interface DiscoveryResult {
  /** Loaded units, sorted by orderKey then identity */
  candidates: MigrationUnit[];
  /** Units that failed to load (excluded from candidates) */
  errors: DiscoveryError[];
}

/**
 * Anything the manager can pull candidates from
 */
export interface MigrationSource {
  discover(): Promise<DiscoveryResult>;
}

/**
 * Directory source options
 */
export interface DirectorySourceOptions {
  /** Throw the first discovery error instead of collecting it */
  strict?: boolean;
}

/**
 * Parsed migration filename
 */
export interface MigrationFilename {
  /** Filename without extension; used as identity */
  name: string;
  /** Numeric YYYYMMDDHHMMSS prefix */
  timestamp: number;
  /** Slug after the timestamp */
  description: string;
}

const MIGRATION_FILE_PATTERN = /^(\d{14})_(.+)\.(?:ts|js|mjs)$/;

/**
 * Exports a migration module must provide
 */
export const MigrationModuleSchema = MigrationDefinitionSchema.pick({
  apply: true,
  revert: true,
  isNeeded: true,
  dependencies: true,
  description: true,
});

/**
 * Parse migration filename to extract timestamp and description
 */
export function parseMigrationFilename(filename: string): MigrationFilename | null {
  const match = filename.match(MIGRATION_FILE_PATTERN);
  if (!match) return null;

  const [, timestampStr, description] = match;
  return {
    name: filename.replace(/\.(?:ts|js|mjs)$/, ''),
    timestamp: parseInt(timestampStr, 10),
    description,
  };
}

/**
 * Calculate SHA-256 checksum from string content
 */
export function calculateChecksumFromContent(content: string): string {
  const hash = createHash('sha256');
  hash.update(content);
  return hash.digest('hex');
}

/**
 * Split units into unique candidates and duplicate-identity errors
 */
function partitionDuplicates(
  units: Array<{ unit: MigrationUnit; origin: string }>
): DiscoveryResult {
  const seen = new Map<string, string>();
  const candidates: MigrationUnit[] = [];
  const errors: DiscoveryError[] = [];

  for (const { unit, origin } of units) {
    const first = seen.get(unit.id);
    if (first !== undefined) {
      errors.push(
        new DiscoveryError(origin, `Duplicate migration id ${unit.id} (already defined by ${first})`)
      );
      continue;
    }
    seen.set(unit.id, origin);
    candidates.push(unit);
  }

  candidates.sort(compareMigrationUnits);
  return { candidates, errors };
}

/**
 * Migration source backed by a directory of migration modules
 */
export class DirectoryMigrationSource implements MigrationSource {
  private readonly directory: string;
  private readonly strict: boolean;

  constructor(directory: string, options: DirectorySourceOptions = {}) {
    this.directory = resolve(directory);
    this.strict = options.strict ?? false;
  }

  /**
   * Discover migrations from filesystem.
   * A missing directory yields an empty result.
   *
   * @throws {DiscoveryError} In strict mode, on the first bad definition
   */
  async discover(): Promise<DiscoveryResult> {
    let filenames: string[];

    try {
      const info = await stat(this.directory);
      if (!info.isDirectory()) {
        throw new DiscoveryError(this.directory, `Migrations path is not a directory: ${this.directory}`);
      }
      filenames = await readdir(this.directory);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return { candidates: [], errors: [] };
      }
      throw error;
    }

    const loaded: Array<{ unit: MigrationUnit; origin: string }> = [];
    const errors: DiscoveryError[] = [];

    for (const filename of filenames.sort()) {
      const parsed = parseMigrationFilename(filename);
      if (!parsed) continue;

      try {
        loaded.push({ unit: await this.loadUnit(filename, parsed), origin: filename });
      } catch (error) {
        const discoveryError =
          error instanceof DiscoveryError
            ? error
            : new DiscoveryError(
                filename,
                `Failed to load migration ${parsed.name}: ${toError(error).message}`,
                { cause: error }
              );
        if (this.strict) {
          throw discoveryError;
        }
        errors.push(discoveryError);
      }
    }

    const result = partitionDuplicates(loaded);
    if (this.strict && result.errors.length > 0) {
      throw result.errors[0];
    }

    return { candidates: result.candidates, errors: [...errors, ...result.errors] };
  }

  getDirectory(): string {
    return this.directory;
  }

  /**
   * Import one module and validate its exports
   */
  private async loadUnit(filename: string, parsed: MigrationFilename): Promise<MigrationUnit> {
    const filepath = join(this.directory, filename);
    const source = await readFile(filepath, 'utf-8');
    const imported: unknown = await import(pathToFileURL(filepath).href);

    const exported = pickExports(imported);
    const validation = MigrationModuleSchema.safeParse(exported);

    if (!validation.success) {
      throw new DiscoveryError(filename, `Invalid migration ${parsed.name}: ${formatIssues(validation.error)}`);
    }

    const definition = validation.data;
    return defineMigration({
      id: parsed.name,
      orderKey: parsed.timestamp,
      dependencies: definition.dependencies,
      description: definition.description,
      checksum: calculateChecksumFromContent(source),
      isNeeded: definition.isNeeded,
      apply: definition.apply,
      revert: definition.revert,
    });
  }
}

/**
 * Migration source over a fixed list of units
 */
export class StaticMigrationSource implements MigrationSource {
  constructor(private readonly units: readonly MigrationUnit[]) {}

  async discover(): Promise<DiscoveryResult> {
    return partitionDuplicates(
      this.units.map((unit, index) => ({ unit, origin: `unit #${index}` }))
    );
  }
}

/**
 * Accept both named exports and a default-exported definition object
 */
function pickExports(imported: unknown): unknown {
  if (typeof imported === 'object' && imported !== null && 'default' in imported) {
    const fallback = imported.default;
    if (typeof fallback === 'object' && fallback !== null && 'apply' in fallback) {
      return fallback;
    }
  }
  return imported;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
