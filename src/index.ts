/**
 * codemigrate - Barrel Export
 *
 * Public API for embedding the migration engine.
 *
 * @example
 * ```typescript
 * import {
 *   MigrationManager,
 *   DirectoryMigrationSource,
 *   SqliteStateStore,
 *   GitVersionControl,
 * } from 'codemigrate';
 *
 * const manager = new MigrationManager({
 *   workingRoot: root,
 *   source: new DirectoryMigrationSource(join(root, 'migrations')),
 *   stateStore: SqliteStateStore.open(join(root, '.codemigrate', 'state.db')),
 *   vcs: new GitVersionControl({ cwd: root, exclude: ['.codemigrate'] }),
 * });
 * await manager.migrate();
 * ```
 */

// Types
export type {
  MigrationDirection,
  OperationResult,
  OperationReturn,
  HistoryReader,
  MigrationContext,
  MigrationUnit,
  ExecutionAction,
  ExecutionRecord,
  RecordDetails,
  Schedule,
  MigrationStatusEntry,
  RunProgress,
} from './types/migration.js';

// Errors
export {
  EngineErrorCode,
  ExitCode,
  MigrationEngineError,
  DiscoveryError,
  UnresolvedDependencyError,
  CyclicDependencyError,
  UnknownTargetError,
  DirtyWorkingTreeError,
  MigrationFailedError,
  ConcurrentRunDetectedError,
  StateStoreError,
  VersionControlError,
  toError,
  exitCodeFor,
} from './engine/errors.js';

// Manager
export {
  MigrationManager,
  type MigrationManagerOptions,
  type StatusReport,
  type MigrationEvent,
} from './engine/manager.js';

// Units and discovery
export {
  defineMigration,
  compareMigrationUnits,
  normalizeOperationResult,
  revertFromHistory,
  resolveInsideRoot,
  type MigrationDefinition,
} from './migrations/unit.js';
export {
  DirectoryMigrationSource,
  StaticMigrationSource,
  parseMigrationFilename,
  type DiscoveryResult,
  type MigrationSource,
  type DirectorySourceOptions,
} from './migrations/registry.js';
export { generateMigrationFile, type GenerateMigrationOptions } from './migrations/template.js';

// Graph
export {
  buildMigrationGraph,
  dependencyClosure,
  type MigrationGraph,
  type MigrationNode,
} from './graph/builder.js';
export { scheduleMigrations, rollbackOrder, type RollbackOptions } from './graph/scheduler.js';

// State
export { SqliteStateStore, type StateStore } from './state/store.js';
export { SqliteRunLock, type RunLock } from './state/lock.js';

// Version control
export type { VersionControl } from './vcs/types.js';
export { GitVersionControl, type GitOptions } from './vcs/git.js';
export { TransactionWrapper, type TransactionResult } from './transaction/wrapper.js';
