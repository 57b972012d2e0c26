/**
 * Transaction Wrapper
 *
 * Makes one migration operation atomic with respect to the working tree:
 * 1. Refuse to start on a dirty tree
 * 2. Run the operation
 * 3. Commit exactly the touched paths (optionally tag the commit)
 * 4. On any failure, hard reset to the pre-operation commit
 */

import type { Logger } from 'winston';
import {
  DirtyWorkingTreeError,
  MigrationFailedError,
  toError,
} from '../engine/errors.js';
import { normalizeOperationResult } from '../migrations/unit.js';
import type {
  MigrationContext,
  MigrationDirection,
  MigrationUnit,
  OperationResult,
} from '../types/migration.js';
import type { VersionControl } from '../vcs/types.js';

/**
 * Transaction options
 */
export interface TransactionWrapperOptions {
  logger: Logger;
  /** Commit message prefix (default: 'migrate') */
  commitMessagePrefix?: string;
  /** Tag every migration commit (default: false) */
  tagCommits?: boolean;
  /** Tag namespace (default: 'codemigrate') */
  tagPrefix?: string;
}

/**
 * Outcome of a committed transaction
 */
export interface TransactionResult {
  /** Commit created for the transition */
  ref: string;
  /** Paths included in the commit */
  files: string[];
  durationMs: number;
  /** Normalized operation result */
  result: OperationResult;
}

/**
 * Version-control backed transaction boundary
 */
export class TransactionWrapper {
  private readonly logger: Logger;
  private readonly commitMessagePrefix: string;
  private readonly tagCommits: boolean;
  private readonly tagPrefix: string;

  constructor(
    private readonly vcs: VersionControl,
    options: TransactionWrapperOptions
  ) {
    this.logger = options.logger;
    this.commitMessagePrefix = options.commitMessagePrefix ?? 'migrate';
    this.tagCommits = options.tagCommits ?? false;
    this.tagPrefix = options.tagPrefix ?? 'codemigrate';
  }

  /**
   * Run a unit's forward operation inside a transaction
   *
   * @throws {DirtyWorkingTreeError} Before any mutation when the tree is dirty
   * @throws {MigrationFailedError} After restoring the tree on failure
   */
  async runApply(unit: MigrationUnit, context: MigrationContext): Promise<TransactionResult> {
    return this.run('apply', unit, context);
  }

  /**
   * Run a unit's backward operation inside a transaction.
   * `context.appliedRef` should carry the forward commit.
   */
  async runRevert(unit: MigrationUnit, context: MigrationContext): Promise<TransactionResult> {
    return this.run('revert', unit, context);
  }

  /**
   * Pre-flight check shared with the manager
   *
   * @throws {DirtyWorkingTreeError}
   */
  async assertClean(): Promise<void> {
    const dirty = await this.vcs.changedPaths();
    if (dirty.length > 0) {
      throw new DirtyWorkingTreeError(dirty);
    }
  }

  private async run(
    direction: MigrationDirection,
    unit: MigrationUnit,
    context: MigrationContext
  ): Promise<TransactionResult> {
    await this.assertClean();

    const restorePoint = await this.vcs.head();
    const startTime = Date.now();
    this.logger.debug(`${direction} ${unit.id} starting at ${restorePoint}`);

    try {
      const raw =
        direction === 'apply' ? await unit.apply(context) : await unit.revert(context);
      const result = normalizeOperationResult(raw);

      if (!result.success) {
        throw new Error(result.message ?? 'operation reported failure');
      }

      const files = await this.vcs.changedPaths();
      const ref = await this.vcs.commit(files, `${this.commitMessagePrefix}: ${direction} ${unit.id}`);

      if (this.tagCommits) {
        await this.vcs.tag(`${this.tagPrefix}/${unit.id}/${direction}`, ref);
      }

      const durationMs = Date.now() - startTime;
      this.logger.debug(`${direction} ${unit.id} committed ${ref} (${files.length} file(s))`);

      return { ref, files, durationMs, result };
    } catch (error) {
      const cause = toError(error);
      throw new MigrationFailedError(
        unit.id,
        direction,
        await this.restore(restorePoint, unit.id, cause)
      );
    }
  }

  /**
   * Hard reset to the restore point.
   *
   * @returns The original cause, extended when the reset itself fails
   */
  private async restore(restorePoint: string, migrationId: string, cause: Error): Promise<Error> {
    try {
      await this.vcs.reset(restorePoint);
      this.logger.debug(`Restored working tree to ${restorePoint} after ${migrationId} failed`);
      return cause;
    } catch (resetError) {
      const message = toError(resetError).message;
      this.logger.error(`Failed to restore working tree to ${restorePoint}: ${message}`);
      return new Error(`${cause.message}; restoring ${restorePoint} also failed: ${message}`, {
        cause,
      });
    }
  }
}
