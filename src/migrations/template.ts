/**
 * Migration Template Generator
 *
 * Generates new migration modules from a template
 */

import { existsSync } from 'fs';
import { mkdir, writeFile } from 'fs/promises';
import { join, resolve } from 'path';

export type MigrationFileFormat = 'ts' | 'mjs';

export interface GenerateMigrationOptions {
  /** Target directory (default: ./migrations) */
  migrationsDir?: string;
  /** Identities the new migration depends on */
  dependencies?: readonly string[];
  /** Module flavour (default: 'mjs', loadable without a TypeScript loader) */
  format?: MigrationFileFormat;
  /** Creation time, used for the filename timestamp */
  timestamp?: Date;
}

export interface GeneratedMigration {
  /** Migration identity (filename without extension) */
  id: string;
  filepath: string;
}

const TS_TEMPLATE = `/**
 * Migration: {{NAME}}
 * Created: {{TIMESTAMP}}
 *
 * Description:
 * {{DESCRIPTION}}
 */

import type { MigrationContext, OperationReturn } from 'codemigrate';

export const description = '{{DESCRIPTION}}';

export const dependencies: string[] = [{{DEPENDENCIES}}];

/**
 * Return false when the codebase already has the desired shape
 */
export async function isNeeded(context: MigrationContext): Promise<boolean> {
  return true;
}

/**
 * Apply migration (forward)
 */
export async function apply(context: MigrationContext): Promise<OperationReturn> {
  // Rewrite files under context.workingRoot here
}

/**
 * Revert migration (backward)
 */
export async function revert(context: MigrationContext): Promise<OperationReturn> {
  // Undo the forward change, or delegate to revertFromHistory(context)
}
`;

const MJS_TEMPLATE = `/**
 * Migration: {{NAME}}
 * Created: {{TIMESTAMP}}
 *
 * Description:
 * {{DESCRIPTION}}
 */

export const description = '{{DESCRIPTION}}';

export const dependencies = [{{DEPENDENCIES}}];

/**
 * Return false when the codebase already has the desired shape
 */
export async function isNeeded(context) {
  return true;
}

/**
 * Apply migration (forward)
 */
export async function apply(context) {
  // Rewrite files under context.workingRoot here
}

/**
 * Revert migration (backward)
 */
export async function revert(context) {
  // Undo the forward change, or delegate to revertFromHistory(context)
}
`;

/**
 * Generate migration filename from timestamp and description
 *
 * Format: YYYYMMDDHHMMSS_<slug>.<ext>
 */
export function generateMigrationFilename(
  description: string,
  timestamp?: Date,
  format: MigrationFileFormat = 'mjs'
): string {
  const ts = timestamp ?? new Date();

  const year = ts.getFullYear();
  const month = String(ts.getMonth() + 1).padStart(2, '0');
  const day = String(ts.getDate()).padStart(2, '0');
  const hours = String(ts.getHours()).padStart(2, '0');
  const minutes = String(ts.getMinutes()).padStart(2, '0');
  const seconds = String(ts.getSeconds()).padStart(2, '0');

  const slug = description
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');

  if (!slug) {
    throw new Error(`Migration name "${description}" has no usable characters`);
  }

  return `${year}${month}${day}${hours}${minutes}${seconds}_${slug}.${format}`;
}

/**
 * Render a migration module
 */
export function renderMigrationTemplate(
  name: string,
  description: string,
  dependencies: readonly string[],
  format: MigrationFileFormat,
  createdAt: Date
): string {
  const template = format === 'ts' ? TS_TEMPLATE : MJS_TEMPLATE;
  const deps = dependencies.map((dep) => `'${escapeSingleQuoted(dep)}'`).join(', ');

  // Replacer functions keep `$&` and friends in user text literal
  return template
    .replace(/{{NAME}}/g, () => name)
    .replace(/{{TIMESTAMP}}/g, () => createdAt.toISOString())
    .replace(/{{DESCRIPTION}}/g, () => escapeSingleQuoted(description))
    .replace(/{{DEPENDENCIES}}/g, () => deps);
}

/**
 * Generate migration file from template
 *
 * @throws {Error} If the file already exists or cannot be written
 */
export async function generateMigrationFile(
  name: string,
  options: GenerateMigrationOptions = {}
): Promise<GeneratedMigration> {
  const dir = resolve(options.migrationsDir ?? './migrations');
  const format = options.format ?? 'mjs';
  const createdAt = options.timestamp ?? new Date();

  await mkdir(dir, { recursive: true });

  const filename = generateMigrationFilename(name, createdAt, format);
  const filepath = join(dir, filename);
  const id = filename.slice(0, -(format.length + 1));

  if (existsSync(filepath)) {
    throw new Error(`Migration file already exists: ${filepath}`);
  }

  const description = name.replace(/_/g, ' ').replace(/\b\w/g, (c) => c.toUpperCase());
  const content = renderMigrationTemplate(id, description, options.dependencies ?? [], format, createdAt);

  try {
    await writeFile(filepath, content, 'utf-8');
  } catch (error) {
    throw new Error(
      `Failed to write migration file: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return { id, filepath };
}

function escapeSingleQuoted(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}
