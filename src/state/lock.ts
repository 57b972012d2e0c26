/**
 * Migration Run Lock
 *
 * Single-writer lease on a target codebase, stored as a one-row
 * migration_lock table in the state database. A lock older than the
 * stale timeout is taken over, so the holder renews it on a heartbeat
 * while the lease is held.
 */

import { z } from 'zod';
import { ConnectionManager } from '../db/connection.js';
import { ConcurrentRunDetectedError, toError } from '../engine/errors.js';

/**
 * Migration lock record
 */
export interface MigrationLock {
  /** Timestamp when lock was acquired */
  lockedAt: string;
  /** Holder identity (process id unless overridden) */
  lockedBy: string;
}

/**
 * Lease acquired for the duration of a migrate/rollback call
 */
export interface RunLock {
  acquire(): Promise<void>;
  /**
   * Renew the lease and confirm it is still ours
   *
   * @throws {ConcurrentRunDetectedError} If another holder took the lock over
   */
  refresh(): Promise<void>;
  release(): Promise<void>;
}

export interface SqliteRunLockOptions {
  /** Lock age after which it is considered abandoned (default: 5 minutes) */
  staleAfterMs?: number;
  /** Holder identity written to the lock row (default: process id) */
  holder?: string;
  /** Renewal interval while held (default: a third of staleAfterMs) */
  heartbeatMs?: number;
}

const LockRowSchema = z.object({
  locked_at: z.string(),
  locked_by: z.string(),
});

export const DEFAULT_STALE_LOCK_MS = 5 * 60 * 1000;

/**
 * Lock stored in the state database
 */
export class SqliteRunLock implements RunLock {
  private readonly staleAfterMs: number;
  private readonly holder: string;
  private readonly heartbeatMs: number;
  private heartbeat: NodeJS.Timeout | null = null;
  private heartbeatError: Error | null = null;
  private tableReady = false;

  constructor(
    private readonly connectionManager: ConnectionManager,
    options: SqliteRunLockOptions = {}
  ) {
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_STALE_LOCK_MS;
    this.holder = options.holder ?? process.pid.toString();
    this.heartbeatMs = options.heartbeatMs ?? Math.max(Math.floor(this.staleAfterMs / 3), 10);
  }

  /**
   * Ensure migration_lock table exists
   */
  async ensureLockTable(): Promise<void> {
    if (this.tableReady) return;

    await this.connectionManager.exec(`
      CREATE TABLE IF NOT EXISTS migration_lock (
        id INTEGER PRIMARY KEY CHECK(id = 1),
        locked_at TEXT NOT NULL,
        locked_by TEXT NOT NULL
      )
    `);

    this.tableReady = true;
  }

  /**
   * Acquire migration lock
   *
   * @throws {ConcurrentRunDetectedError} If a live lock is held
   */
  async acquire(): Promise<void> {
    await this.ensureLockTable();
    const now = new Date().toISOString();

    const existing = await this.connectionManager.transaction((db) => {
      const row = db.prepare('SELECT locked_at, locked_by FROM migration_lock WHERE id = 1').get();
      const lock = parseLock(row);

      if (!lock) {
        db.prepare('INSERT INTO migration_lock (id, locked_at, locked_by) VALUES (1, ?, ?)').run(
          now,
          this.holder
        );
        return null;
      }

      if (this.isStale(lock)) {
        db.prepare('UPDATE migration_lock SET locked_at = ?, locked_by = ? WHERE id = 1').run(
          now,
          this.holder
        );
        return null;
      }

      return lock;
    });

    if (existing) {
      throw new ConcurrentRunDetectedError(existing.lockedBy, existing.lockedAt);
    }

    this.startHeartbeat();
  }

  /**
   * Renew locked_at if this holder still owns the row
   *
   * @throws {ConcurrentRunDetectedError} If the lease was lost
   */
  async refresh(): Promise<void> {
    if (this.heartbeatError) {
      const error = this.heartbeatError;
      this.heartbeatError = null;
      throw error;
    }

    await this.ensureLockTable();
    const result = await this.connectionManager.execute(
      'UPDATE migration_lock SET locked_at = ? WHERE id = 1 AND locked_by = ?',
      [new Date().toISOString(), this.holder]
    );

    if (result.changes === 0) {
      const current = await this.getLock();
      throw new ConcurrentRunDetectedError(
        current?.lockedBy ?? 'unknown',
        current?.lockedAt ?? 'the lease was released'
      );
    }
  }

  /**
   * Release migration lock (only if held by this holder)
   */
  async release(): Promise<void> {
    this.stopHeartbeat();
    this.heartbeatError = null;
    await this.ensureLockTable();
    await this.connectionManager.execute('DELETE FROM migration_lock WHERE id = 1 AND locked_by = ?', [
      this.holder,
    ]);
  }

  /**
   * Check if a live migration lock is held
   */
  async isLocked(): Promise<boolean> {
    const lock = await this.getLock();
    return lock !== null && !this.isStale(lock);
  }

  /**
   * Get current lock info
   */
  async getLock(): Promise<MigrationLock | null> {
    await this.ensureLockTable();
    return parseLock(
      await this.connectionManager.get('SELECT locked_at, locked_by FROM migration_lock WHERE id = 1')
    );
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeat = setInterval(() => {
      this.refresh().catch((error: unknown) => {
        // Surfaced by the next explicit refresh()
        this.heartbeatError = toError(error);
        this.stopHeartbeat();
      });
    }, this.heartbeatMs);
    this.heartbeat.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
  }

  private isStale(lock: MigrationLock): boolean {
    const lockAge = Date.now() - new Date(lock.lockedAt).getTime();
    return lockAge > this.staleAfterMs;
  }
}

function parseLock(row: unknown): MigrationLock | null {
  const parsed = LockRowSchema.safeParse(row);
  return parsed.success ? { lockedAt: parsed.data.locked_at, lockedBy: parsed.data.locked_by } : null;
}
