/**
 * Version-Control Capability
 *
 * Narrow interface the transaction wrapper commits and resets through.
 * Paths are relative to the working root.
 */

import type { HistoryReader } from '../types/migration.js';

export interface VersionControl extends HistoryReader {
  /** Uncommitted changes (modified, added, deleted, untracked) */
  changedPaths(): Promise<string[]>;
  /** Current commit reference */
  head(): Promise<string>;
  /** Commit exactly `paths` (an empty commit when none) and return its ref */
  commit(paths: readonly string[], message: string): Promise<string>;
  /** Discard all uncommitted changes and move back to `ref` */
  reset(ref: string): Promise<void>;
  /** Attach a named reference to `ref` */
  tag(name: string, ref: string): Promise<void>;
}
