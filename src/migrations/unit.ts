/**
 * Migration Unit Helpers
 *
 * Builders and helpers for migration units:
 * - defineMigration() validates and freezes a programmatic definition
 * - normalizeOperationResult() folds hook return values into one shape
 * - revertFromHistory() restores files touched by the forward commit
 */

import { mkdir, rm, writeFile } from 'fs/promises';
import { dirname, isAbsolute, join, normalize, sep } from 'path';
import { z, type ZodError } from 'zod';
import type {
  MigrationContext,
  MigrationUnit,
  OperationResult,
  OperationReturn,
} from '../types/migration.js';

/**
 * Definition accepted by defineMigration()
 */
export interface MigrationDefinition {
  id: string;
  /** Defaults to 0; ties fall back to identity order */
  orderKey?: number;
  dependencies?: readonly string[];
  description?: string;
  checksum?: string;
  isNeeded?: MigrationUnit['isNeeded'];
  apply: MigrationUnit['apply'];
  revert: MigrationUnit['revert'];
}

/**
 * Function-valued field check
 */
export const migrationHook = <T extends (...args: never[]) => unknown>(label: string) =>
  z.custom<T>((value) => typeof value === 'function', { message: `${label} must be a function` });

/**
 * Shape of a migration definition, shared with module discovery
 */
export const MigrationDefinitionSchema = z.object({
  id: z.string().refine((id) => id.trim().length > 0, { message: 'id must be a non-empty string' }),
  orderKey: z.number().finite({ message: 'orderKey must be a finite number' }).default(0),
  dependencies: z.array(z.string().min(1)).default([]),
  description: z.string().optional(),
  checksum: z.string().optional(),
  isNeeded: migrationHook<NonNullable<MigrationUnit['isNeeded']>>('isNeeded').optional(),
  apply: migrationHook<MigrationUnit['apply']>('apply'),
  revert: migrationHook<MigrationUnit['revert']>('revert'),
});

/**
 * One-line summary of validation issues
 */
export function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(module)'}: ${issue.message}`).join('; ');
}

/**
 * Validate a definition and return an immutable migration unit.
 *
 * @throws {Error} If the identity, ordering key or hooks are invalid
 */
export function defineMigration(definition: MigrationDefinition): MigrationUnit {
  const validation = MigrationDefinitionSchema.safeParse(definition);

  if (!validation.success) {
    const label = typeof definition.id === 'string' && definition.id.trim() ? definition.id : '(unnamed)';
    throw new Error(`Invalid migration ${label}: ${formatIssues(validation.error)}`);
  }

  const parsed = validation.data;
  const unit: MigrationUnit = {
    id: parsed.id,
    orderKey: parsed.orderKey,
    dependencies: Object.freeze(Array.from(new Set(parsed.dependencies))),
    description: parsed.description,
    checksum: parsed.checksum,
    isNeeded: parsed.isNeeded,
    apply: parsed.apply,
    revert: parsed.revert,
  };

  return Object.freeze(unit);
}

/**
 * Canonical unit ordering: ascending orderKey, then identity
 */
export function compareMigrationUnits(
  a: Pick<MigrationUnit, 'id' | 'orderKey'>,
  b: Pick<MigrationUnit, 'id' | 'orderKey'>
): number {
  if (a.orderKey !== b.orderKey) {
    return a.orderKey - b.orderKey;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Fold a hook's return value into an OperationResult
 */
export function normalizeOperationResult(value: OperationReturn): OperationResult {
  if (isOperationResult(value)) {
    return value;
  }
  if (value === false) {
    return { success: false, message: 'operation reported failure' };
  }
  return { success: true };
}

/**
 * Type guard for OperationResult
 */
export function isOperationResult(value: unknown): value is OperationResult {
  return (
    typeof value === 'object' &&
    value !== null &&
    'success' in value &&
    typeof value.success === 'boolean'
  );
}

/**
 * Resolve a repository-relative path inside the working root.
 *
 * @throws {Error} If the path escapes the working root
 */
export function resolveInsideRoot(workingRoot: string, relativePath: string): string {
  const normalized = normalize(relativePath);
  if (isAbsolute(normalized) || normalized === '..' || normalized.startsWith(`..${sep}`)) {
    throw new Error(`Path escapes working root: ${relativePath}`);
  }
  return join(workingRoot, normalized);
}

/**
 * Ready-made revert hook.
 *
 * Restores every file the forward commit touched to its content in that
 * commit's parent; files the forward commit created are deleted.
 *
 * @example
 * ```typescript
 * export const revert = revertFromHistory;
 * ```
 */
export async function revertFromHistory(context: MigrationContext): Promise<OperationResult> {
  const { appliedRef, history, workingRoot } = context;

  if (!appliedRef) {
    return { success: false, message: 'no applied commit to restore from' };
  }

  const parent = await history.parentOf(appliedRef);
  const files = await history.filesChangedIn(appliedRef);

  for (const file of files) {
    const target = resolveInsideRoot(workingRoot, file);
    const previous = parent ? await history.readFileAt(parent, file) : null;

    if (previous === null) {
      await rm(target, { force: true });
      context.logger.debug(`Removed ${file}`);
    } else {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, previous);
      context.logger.debug(`Restored ${file} from ${parent}`);
    }
  }

  return {
    success: true,
    message: `restored ${files.length} file(s)`,
    metadata: { restoredFrom: parent, files },
  };
}
