/**
 * Migration Engine Errors
 *
 * Typed error hierarchy for discovery, validation, execution and locking,
 * plus the exit code mapping consumed by the CLI.
 */

import type { MigrationDirection, RunProgress } from '../types/migration.js';

/**
 * Error codes
 */
export enum EngineErrorCode {
  Discovery = 'E_DISCOVERY',
  UnresolvedDependency = 'E_UNRESOLVED_DEPENDENCY',
  CyclicDependency = 'E_CYCLIC_DEPENDENCY',
  UnknownTarget = 'E_UNKNOWN_TARGET',
  DirtyWorkingTree = 'E_DIRTY_WORKING_TREE',
  MigrationFailed = 'E_MIGRATION_FAILED',
  ConcurrentRun = 'E_CONCURRENT_RUN',
  StateStore = 'E_STATE_STORE',
  VersionControl = 'E_VCS',
}

/**
 * Process exit codes reported by the CLI
 */
export enum ExitCode {
  Success = 0,
  PartialFailure = 1,
  ValidationFailure = 2,
  ConcurrencyConflict = 3,
  Unexpected = 4,
}

/**
 * Base class for every error raised by the engine
 */
export class MigrationEngineError extends Error {
  /** Set by the manager when a run halts part-way */
  public progress?: RunProgress;

  constructor(
    public readonly code: EngineErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MigrationEngineError';
  }
}

/**
 * A migration definition could not be loaded
 */
export class DiscoveryError extends MigrationEngineError {
  constructor(
    public readonly file: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(EngineErrorCode.Discovery, message, options);
    this.name = 'DiscoveryError';
  }
}

/**
 * A unit names a dependency that was not discovered
 */
export class UnresolvedDependencyError extends MigrationEngineError {
  constructor(
    public readonly migrationId: string,
    public readonly missingId: string
  ) {
    super(
      EngineErrorCode.UnresolvedDependency,
      `Migration ${migrationId} depends on unknown migration ${missingId}`
    );
    this.name = 'UnresolvedDependencyError';
  }
}

/**
 * The dependency graph contains a cycle
 */
export class CyclicDependencyError extends MigrationEngineError {
  constructor(public readonly cyclePath: string[]) {
    super(
      EngineErrorCode.CyclicDependency,
      `Circular migration dependency: ${cyclePath.join(' -> ')}`
    );
    this.name = 'CyclicDependencyError';
  }
}

/**
 * A requested target is not a known (or, for rollback, applied) migration
 */
export class UnknownTargetError extends MigrationEngineError {
  constructor(public readonly target: string, reason = 'is not a discovered migration') {
    super(EngineErrorCode.UnknownTarget, `Target ${target} ${reason}`);
    this.name = 'UnknownTargetError';
  }
}

/**
 * The working tree has uncommitted changes before a transaction
 */
export class DirtyWorkingTreeError extends MigrationEngineError {
  constructor(public readonly paths: string[]) {
    const listed = paths.slice(0, 10).join(', ');
    const more = paths.length > 10 ? ` (+${paths.length - 10} more)` : '';
    super(
      EngineErrorCode.DirtyWorkingTree,
      `Working tree has uncommitted changes: ${listed}${more}. ` +
        'Commit or reset them before running migrations.'
    );
    this.name = 'DirtyWorkingTreeError';
  }
}

/**
 * A migration operation failed and its changes were discarded
 */
export class MigrationFailedError extends MigrationEngineError {
  constructor(
    public readonly migrationId: string,
    public readonly direction: MigrationDirection,
    cause: Error
  ) {
    super(
      EngineErrorCode.MigrationFailed,
      `Migration ${migrationId} failed during ${direction}: ${cause.message}`,
      { cause }
    );
    this.name = 'MigrationFailedError';
  }
}

/**
 * Another process holds the run lock
 */
export class ConcurrentRunDetectedError extends MigrationEngineError {
  constructor(
    public readonly holder: string,
    public readonly since: string
  ) {
    super(
      EngineErrorCode.ConcurrentRun,
      `Another migration run (process ${holder}) holds the lock since ${since}`
    );
    this.name = 'ConcurrentRunDetectedError';
  }
}

/**
 * Inconsistent or failed state store operation
 */
export class StateStoreError extends MigrationEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(EngineErrorCode.StateStore, message, options);
    this.name = 'StateStoreError';
  }
}

/**
 * A version-control command failed
 */
export class VersionControlError extends MigrationEngineError {
  constructor(
    message: string,
    public readonly command?: string,
    public readonly stderr?: string,
    options?: { cause?: unknown }
  ) {
    super(EngineErrorCode.VersionControl, message, options);
    this.name = 'VersionControlError';
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Map an error raised by the manager to a process exit code
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (!(error instanceof MigrationEngineError)) {
    return ExitCode.Unexpected;
  }

  switch (error.code) {
    case EngineErrorCode.MigrationFailed:
    case EngineErrorCode.DirtyWorkingTree:
      return ExitCode.PartialFailure;
    case EngineErrorCode.Discovery:
    case EngineErrorCode.UnresolvedDependency:
    case EngineErrorCode.CyclicDependency:
    case EngineErrorCode.UnknownTarget:
      return ExitCode.ValidationFailure;
    case EngineErrorCode.ConcurrentRun:
      return ExitCode.ConcurrencyConflict;
    default:
      return ExitCode.Unexpected;
  }
}
