/**
 * Migration Type Definitions
 *
 * Contract shared by migration units, the engine and the state store.
 */

import type { Logger } from 'winston';

/**
 * Direction of a migration operation
 */
export type MigrationDirection = 'apply' | 'revert';

/**
 * Result an operation may return instead of throwing
 */
export interface OperationResult {
  /** Whether the operation succeeded */
  success: boolean;
  /** Human-readable outcome */
  message?: string;
  /** Free-form data persisted with the execution record */
  metadata?: Record<string, unknown>;
}

/**
 * What `apply`/`revert` hooks may return.
 * Nothing means success, `false` means failure.
 */
export type OperationReturn = void | boolean | OperationResult;

/**
 * Read-only view of version-control history, handed to migration hooks
 */
export interface HistoryReader {
  /** File content at `ref`, or null when the file does not exist there */
  readFileAt(ref: string, path: string): Promise<Buffer | null>;
  /** Paths (relative to the working root) touched by the commit `ref` */
  filesChangedIn(ref: string): Promise<string[]>;
  /** First parent of `ref`, or null for a root commit */
  parentOf(ref: string): Promise<string | null>;
}

/**
 * Context passed to every migration hook
 */
export interface MigrationContext {
  /** Absolute path of the codebase being migrated */
  workingRoot: string;
  /** Identifier of the manager call driving this operation */
  runId: string;
  /** Logger scoped to the run */
  logger: Logger;
  /** Version-control history */
  history: HistoryReader;
  /** Commit that applied the migration (revert only) */
  appliedRef?: string;
}

/**
 * A single, identified, reversible code transformation
 */
export interface MigrationUnit {
  /** Stable unique name */
  readonly id: string;
  /** Ordering key used as tie-break (timestamp for file-based units) */
  readonly orderKey: number;
  /** Identities that must be applied first */
  readonly dependencies: readonly string[];
  readonly description?: string;
  /** SHA-256 of the definition source, when known */
  readonly checksum?: string;
  /** Side-effect-free applicability check; absent means always needed */
  isNeeded?(context: MigrationContext): boolean | Promise<boolean>;
  /** Forward transformation */
  apply(context: MigrationContext): OperationReturn | Promise<OperationReturn>;
  /** Inverse transformation */
  revert(context: MigrationContext): OperationReturn | Promise<OperationReturn>;
}

/**
 * Action stored in the append-only history
 */
export type ExecutionAction = 'applied' | 'reverted' | 'skipped';

/**
 * Execution Record (one row of state history)
 */
export interface ExecutionRecord {
  /** Row id, monotonically increasing */
  id: number;
  migrationId: string;
  action: ExecutionAction;
  runId: string;
  /** Commit created by the transition; null for skips */
  vcsRef: string | null;
  /** ISO timestamp */
  recordedAt: string;
  durationMs: number;
  checksum: string | null;
  metadata: Record<string, unknown> | null;
}

/**
 * Optional fields accepted when recording a transition
 */
export interface RecordDetails {
  runId?: string;
  durationMs?: number;
  checksum?: string | null;
  metadata?: Record<string, unknown> | null;
}

/**
 * Ephemeral schedule computed by `plan()`
 */
export interface Schedule {
  /** Requested target, if any */
  target: string | null;
  /** Full ordered sequence covering the target closure (or every candidate) */
  order: string[];
  /** `order` minus currently applied identities */
  pending: string[];
  /** Identities from `order` already applied */
  applied: string[];
}

/**
 * Per-migration status line
 */
export interface MigrationStatusEntry {
  id: string;
  description?: string;
  state: 'applied' | 'pending' | 'skipped';
  /** Timestamp of the last transition */
  updatedAt?: string;
  vcsRef?: string;
  /** Source changed since it was applied */
  modified: boolean;
}

/**
 * Progress of a halted run
 */
export interface RunProgress {
  /** Records written before the halt */
  completed: ExecutionRecord[];
  /** Identity that failed, if the halt happened inside a migration */
  failed: string | null;
  /** Identities that were scheduled but not reached */
  pending: string[];
}
