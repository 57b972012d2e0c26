/**
 * Migration Manager
 *
 * Orchestrates Discovery → Graph Builder → Scheduler → Transaction Wrapper →
 * State Store. The only component front ends talk to.
 */

import { EventEmitter } from 'events';
import { resolve } from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'winston';
import { createSilentLogger } from '../cli/logger.js';
import { buildMigrationGraph, type MigrationGraph } from '../graph/builder.js';
import { rollbackOrder, scheduleMigrations, type RollbackOptions } from '../graph/scheduler.js';
import type { DiscoveryResult, MigrationSource } from '../migrations/registry.js';
import type { RunLock } from '../state/lock.js';
import type { StateStore } from '../state/store.js';
import { TransactionWrapper } from '../transaction/wrapper.js';
import type {
  ExecutionRecord,
  MigrationContext,
  MigrationDirection,
  MigrationStatusEntry,
  MigrationUnit,
  Schedule,
} from '../types/migration.js';
import type { VersionControl } from '../vcs/types.js';
import { DiscoveryError, MigrationEngineError, MigrationFailedError, toError } from './errors.js';

/**
 * Manager configuration
 */
export interface MigrationManagerOptions {
  /** Codebase being migrated */
  workingRoot: string;
  source: MigrationSource;
  stateStore: StateStore;
  vcs: VersionControl;
  /** Single-writer lease; runs are unguarded without one */
  lock?: RunLock;
  logger?: Logger;
  commitMessagePrefix?: string;
  tagCommits?: boolean;
}

/**
 * Status report returned by status()
 */
export interface StatusReport {
  migrations: MigrationStatusEntry[];
  /** Currently applied identities, oldest first */
  applied: string[];
  /** Applied identities whose definition is no longer discovered */
  orphaned: string[];
  /** Applied identities whose source changed since they were applied */
  modified: string[];
  discoveryErrors: DiscoveryError[];
}

/**
 * Payload of every lifecycle event
 */
export interface MigrationEvent {
  migrationId: string;
  direction: MigrationDirection;
  runId: string;
  record?: ExecutionRecord;
  error?: Error;
}

/**
 * Migration Manager
 *
 * Emits `migration:start`, `migration:applied`, `migration:skipped`,
 * `migration:reverted` and `migration:failed` with a MigrationEvent.
 */
export class MigrationManager extends EventEmitter {
  private readonly workingRoot: string;
  private readonly source: MigrationSource;
  private readonly stateStore: StateStore;
  private readonly vcs: VersionControl;
  private readonly lock?: RunLock;
  private readonly logger: Logger;
  private readonly transaction: TransactionWrapper;

  constructor(options: MigrationManagerOptions) {
    super();
    this.workingRoot = resolve(options.workingRoot);
    this.source = options.source;
    this.stateStore = options.stateStore;
    this.vcs = options.vcs;
    this.lock = options.lock;
    this.logger = options.logger ?? createSilentLogger();
    this.transaction = new TransactionWrapper(options.vcs, {
      logger: this.logger,
      commitMessagePrefix: options.commitMessagePrefix,
      tagCommits: options.tagCommits,
    });
  }

  /**
   * Enumerate candidates; never mutates state
   */
  async discover(): Promise<DiscoveryResult> {
    return this.source.discover();
  }

  /**
   * Compute the schedule without executing anything (dry run).
   *
   * @throws {UnresolvedDependencyError | CyclicDependencyError | UnknownTargetError}
   */
  async plan(target?: string): Promise<Schedule> {
    const { graph } = await this.loadGraph();
    const order = scheduleMigrations(graph, target);
    const applied = new Set(await this.stateStore.appliedInOrder());

    return {
      target: target ?? null,
      order,
      pending: order.filter((id) => !applied.has(id)),
      applied: order.filter((id) => applied.has(id)),
    };
  }

  /**
   * Apply pending migrations up to `target` (all when omitted).
   * Stops at the first failure; earlier commits stay applied.
   */
  async migrate(target?: string): Promise<ExecutionRecord[]> {
    const runId = uuidv4();

    return this.withLock(async () => {
      const { graph } = await this.loadGraph();
      const order = scheduleMigrations(graph, target);
      const pending = await this.stateStore.pending(order);
      const records: ExecutionRecord[] = [];

      if (pending.length === 0) {
        this.logger.info('No pending migrations');
        return records;
      }

      await this.guard(() => this.transaction.assertClean(), {
        runId,
        direction: 'apply',
        completed: records,
        failed: null,
        remaining: pending,
      });
      this.logger.info(`Applying ${pending.length} migration(s)...`);

      for (let i = 0; i < pending.length; i++) {
        const id = pending[i];
        const unit = requireUnit(graph, id);
        const remaining = pending.slice(i + 1);

        await this.guard(() => this.confirmLease(), {
          runId,
          direction: 'apply',
          completed: records,
          failed: null,
          remaining: pending.slice(i),
        });
        const record = await this.guard(
          () => this.applyOne(unit, runId, `[${i + 1}/${pending.length}]`),
          { runId, direction: 'apply', completed: records, failed: id, remaining }
        );
        records.push(record);
      }

      return records;
    });
  }

  /**
   * Revert applied migrations in reverse apply order.
   * Without a target only the most recently applied migration is reverted;
   * with one, everything applied after it is reverted; `all` reverts everything.
   */
  async rollback(target?: string, options: RollbackOptions = {}): Promise<ExecutionRecord[]> {
    const runId = uuidv4();

    return this.withLock(async () => {
      const applied = await this.stateStore.appliedInOrder();
      const toRevert = rollbackOrder(applied, target, options);
      const records: ExecutionRecord[] = [];

      if (toRevert.length === 0) {
        this.logger.info('No migrations to roll back');
        return records;
      }

      const { candidates } = await this.discoverWithWarnings();
      const units = new Map(candidates.map((unit) => [unit.id, unit]));

      await this.guard(() => this.transaction.assertClean(), {
        runId,
        direction: 'revert',
        completed: records,
        failed: null,
        remaining: toRevert,
      });
      this.logger.info(`Rolling back ${toRevert.length} migration(s)...`);

      for (let i = 0; i < toRevert.length; i++) {
        const id = toRevert[i];
        const remaining = toRevert.slice(i + 1);

        await this.guard(() => this.confirmLease(), {
          runId,
          direction: 'revert',
          completed: records,
          failed: null,
          remaining: toRevert.slice(i),
        });
        const record = await this.guard(
          () => this.revertOne(id, units.get(id), runId, `[${i + 1}/${toRevert.length}]`),
          { runId, direction: 'revert', completed: records, failed: id, remaining }
        );
        records.push(record);
      }

      return records;
    });
  }

  /**
   * Applied/pending/skipped state of every discovered migration
   */
  async status(): Promise<StatusReport> {
    const { candidates, errors } = await this.source.discover();
    const applied = await this.stateStore.appliedInOrder();
    const appliedSet = new Set(applied);
    const known = new Set(candidates.map((unit) => unit.id));

    const migrations: MigrationStatusEntry[] = [];
    const modified: string[] = [];

    for (const unit of candidates) {
      const last = await this.stateStore.lastRecord(unit.id);
      const isApplied = appliedSet.has(unit.id);
      let isModified = false;

      if (isApplied && unit.checksum) {
        const appliedRecord = await this.stateStore.lastRecord(unit.id, 'applied');
        isModified = Boolean(appliedRecord?.checksum) && appliedRecord?.checksum !== unit.checksum;
      }
      if (isModified) {
        modified.push(unit.id);
      }

      migrations.push({
        id: unit.id,
        description: unit.description,
        state: isApplied ? 'applied' : last?.action === 'skipped' ? 'skipped' : 'pending',
        updatedAt: last?.recordedAt,
        vcsRef: last?.vcsRef ?? undefined,
        modified: isModified,
      });
    }

    return {
      migrations,
      applied,
      orphaned: applied.filter((id) => !known.has(id)),
      modified,
      discoveryErrors: errors,
    };
  }

  getWorkingRoot(): string {
    return this.workingRoot;
  }

  private async applyOne(unit: MigrationUnit, runId: string, step: string): Promise<ExecutionRecord> {
    const context = this.createContext(runId, unit.id);
    this.emit('migration:start', { migrationId: unit.id, direction: 'apply', runId });

    let needed: boolean;
    try {
      needed = unit.isNeeded ? await unit.isNeeded(context) : true;
    } catch (error) {
      throw new MigrationFailedError(unit.id, 'apply', toError(error));
    }

    if (!needed) {
      const record = await this.stateStore.recordSkipped(unit.id, {
        runId,
        checksum: unit.checksum ?? null,
        metadata: { reason: 'not-needed' },
      });
      this.logger.info(`${step} ${unit.id} not needed, skipped`);
      this.emit('migration:skipped', { migrationId: unit.id, direction: 'apply', runId, record });
      return record;
    }

    this.logger.info(`${step} Applying ${unit.id}`);
    const tx = await this.transaction.runApply(unit, context);
    const record = await this.stateStore.recordApplied(unit.id, tx.ref, {
      runId,
      durationMs: tx.durationMs,
      checksum: unit.checksum ?? null,
      metadata: { ...tx.result.metadata, message: tx.result.message, files: tx.files },
    });

    this.logger.info(`✓ Applied ${unit.id} (${tx.durationMs}ms, ${tx.ref.slice(0, 12)})`);
    this.emit('migration:applied', { migrationId: unit.id, direction: 'apply', runId, record });
    return record;
  }

  private async revertOne(
    id: string,
    unit: MigrationUnit | undefined,
    runId: string,
    step: string
  ): Promise<ExecutionRecord> {
    this.emit('migration:start', { migrationId: id, direction: 'revert', runId });

    if (!unit) {
      throw new MigrationFailedError(id, 'revert', new Error('definition not found'));
    }

    const appliedRecord = await this.stateStore.lastRecord(id, 'applied');
    const context = this.createContext(runId, id, appliedRecord?.vcsRef ?? undefined);

    this.logger.info(`${step} Reverting ${id}`);
    const tx = await this.transaction.runRevert(unit, context);
    const record = await this.stateStore.recordReverted(id, tx.ref, {
      runId,
      durationMs: tx.durationMs,
      checksum: unit.checksum ?? null,
      metadata: { ...tx.result.metadata, message: tx.result.message, files: tx.files },
    });

    this.logger.info(`✓ Reverted ${id} (${tx.durationMs}ms, ${tx.ref.slice(0, 12)})`);
    this.emit('migration:reverted', { migrationId: id, direction: 'revert', runId, record });
    return record;
  }

  private createContext(runId: string, migrationId: string, appliedRef?: string): MigrationContext {
    return {
      workingRoot: this.workingRoot,
      runId,
      logger: this.logger.child({ migration: migrationId }),
      history: this.vcs,
      appliedRef,
    };
  }

  private async discoverWithWarnings(): Promise<DiscoveryResult> {
    const discovery = await this.source.discover();
    for (const error of discovery.errors) {
      this.logger.warn(`Skipping ${error.file}: ${error.message}`);
    }
    return discovery;
  }

  private async loadGraph(): Promise<{ discovery: DiscoveryResult; graph: MigrationGraph }> {
    const discovery = await this.discoverWithWarnings();
    return { discovery, graph: buildMigrationGraph(discovery.candidates) };
  }

  /**
   * Run a step; on failure attach run progress and emit `migration:failed`
   */
  private async guard<T>(step: () => Promise<T>, scope: GuardScope): Promise<T> {
    try {
      return await step();
    } catch (error) {
      const { runId, direction, completed, failed, remaining } = scope;
      if (error instanceof MigrationEngineError) {
        error.progress = { completed: [...completed], failed, pending: [...remaining] };
      }
      if (failed !== null) {
        this.logger.error(`✗ ${failed} failed: ${toError(error).message}`);
        this.emit('migration:failed', {
          migrationId: failed,
          direction,
          runId,
          error: toError(error),
        });
      }
      throw error;
    }
  }

  /**
   * Renew the run lock before a step; fails if another run took it over
   */
  private async confirmLease(): Promise<void> {
    if (this.lock) {
      await this.lock.refresh();
    }
  }

  private async withLock<T>(operation: () => Promise<T>): Promise<T> {
    if (!this.lock) {
      return operation();
    }

    await this.lock.acquire();
    try {
      return await operation();
    } finally {
      await this.lock.release();
    }
  }
}

interface GuardScope {
  runId: string;
  direction: MigrationDirection;
  /** Records written so far in this run */
  completed: ExecutionRecord[];
  /** Migration being executed, null for run-level checks */
  failed: string | null;
  /** Migrations not reached if the step fails */
  remaining: string[];
}

function requireUnit(graph: MigrationGraph, id: string): MigrationUnit {
  const node = graph.nodes.get(id);
  if (!node) {
    throw new Error(`Scheduled migration ${id} missing from graph`);
  }
  return node.unit;
}
