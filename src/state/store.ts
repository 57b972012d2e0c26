/**
 * Migration State Store
 *
 * Durable, append-only ledger of migration transitions:
 * - migration_history table (applied / reverted / skipped rows)
 * - Applied set derived by replaying the history in row order
 * - Nothing is ever deleted
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type Database from 'better-sqlite3';
import { ConnectionManager } from '../db/connection.js';
import { StateStoreError } from '../engine/errors.js';
import type {
  ExecutionAction,
  ExecutionRecord,
  RecordDetails,
} from '../types/migration.js';

/**
 * Durable record of migration transitions
 */
export interface StateStore {
  recordApplied(migrationId: string, vcsRef: string, details?: RecordDetails): Promise<ExecutionRecord>;
  recordReverted(migrationId: string, vcsRef: string, details?: RecordDetails): Promise<ExecutionRecord>;
  recordSkipped(migrationId: string, details?: RecordDetails): Promise<ExecutionRecord>;
  isApplied(migrationId: string): Promise<boolean>;
  /** Currently applied identities, in the order they were applied */
  appliedInOrder(): Promise<string[]>;
  /** Full history, oldest first, optionally for one migration */
  history(migrationId?: string): Promise<ExecutionRecord[]>;
  /** Most recent record of the given action (any action when omitted) */
  lastRecord(migrationId: string, action?: ExecutionAction): Promise<ExecutionRecord | null>;
  /** Scheduled order minus currently applied */
  pending(order: readonly string[]): Promise<string[]>;
  close(): Promise<void>;
}

const HistoryRowSchema = z.object({
  id: z.number().int(),
  migration_id: z.string(),
  action: z.enum(['applied', 'reverted', 'skipped']),
  run_id: z.string(),
  vcs_ref: z.string().nullable(),
  recorded_at: z.string(),
  duration_ms: z.number(),
  checksum: z.string().nullable(),
  metadata: z.string().nullable(),
});

type HistoryRow = z.infer<typeof HistoryRowSchema>;

const MetadataSchema = z.record(z.unknown());

const HISTORY_COLUMNS =
  'id, migration_id, action, run_id, vcs_ref, recorded_at, duration_ms, checksum, metadata';

/**
 * Replay history rows into the currently applied sequence
 */
export function replayApplied(records: ReadonlyArray<Pick<ExecutionRecord, 'migrationId' | 'action'>>): string[] {
  const applied: string[] = [];

  for (const record of records) {
    const index = applied.indexOf(record.migrationId);
    if (record.action === 'applied') {
      if (index !== -1) applied.splice(index, 1);
      applied.push(record.migrationId);
    } else if (record.action === 'reverted' && index !== -1) {
      applied.splice(index, 1);
    }
  }

  return applied;
}

/**
 * SQLite-backed state store
 */
export class SqliteStateStore implements StateStore {
  private schemaReady = false;

  constructor(private readonly connectionManager: ConnectionManager) {}

  /**
   * Open (and create if needed) a state database file
   */
  static open(filename: string): SqliteStateStore {
    const connectionManager = new ConnectionManager({ filename });
    connectionManager.connect();
    return new SqliteStateStore(connectionManager);
  }

  getConnectionManager(): ConnectionManager {
    return this.connectionManager;
  }

  /**
   * Ensure migration_history table exists
   */
  async ensureSchema(): Promise<void> {
    if (this.schemaReady) return;

    await this.connectionManager.exec(`
      CREATE TABLE IF NOT EXISTS migration_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        migration_id TEXT NOT NULL,
        action TEXT NOT NULL CHECK(action IN ('applied', 'reverted', 'skipped')),
        run_id TEXT NOT NULL,
        vcs_ref TEXT,
        recorded_at TEXT NOT NULL,
        duration_ms INTEGER NOT NULL DEFAULT 0,
        checksum TEXT,
        metadata TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_migration_history_migration
        ON migration_history(migration_id);
    `);

    this.schemaReady = true;
  }

  async recordApplied(
    migrationId: string,
    vcsRef: string,
    details: RecordDetails = {}
  ): Promise<ExecutionRecord> {
    return this.append(migrationId, 'applied', vcsRef, details);
  }

  async recordReverted(
    migrationId: string,
    vcsRef: string,
    details: RecordDetails = {}
  ): Promise<ExecutionRecord> {
    return this.append(migrationId, 'reverted', vcsRef, details);
  }

  async recordSkipped(migrationId: string, details: RecordDetails = {}): Promise<ExecutionRecord> {
    return this.append(migrationId, 'skipped', null, details);
  }

  async isApplied(migrationId: string): Promise<boolean> {
    const applied = await this.appliedInOrder();
    return applied.includes(migrationId);
  }

  async appliedInOrder(): Promise<string[]> {
    return replayApplied(await this.history());
  }

  async history(migrationId?: string): Promise<ExecutionRecord[]> {
    await this.ensureSchema();

    const rows =
      migrationId === undefined
        ? await this.connectionManager.query(
            `SELECT ${HISTORY_COLUMNS} FROM migration_history ORDER BY id ASC`
          )
        : await this.connectionManager.query(
            `SELECT ${HISTORY_COLUMNS} FROM migration_history WHERE migration_id = ? ORDER BY id ASC`,
            [migrationId]
          );

    return rows.map(toRecord);
  }

  async lastRecord(migrationId: string, action?: ExecutionAction): Promise<ExecutionRecord | null> {
    await this.ensureSchema();

    const row =
      action === undefined
        ? await this.connectionManager.get(
            `SELECT ${HISTORY_COLUMNS} FROM migration_history
             WHERE migration_id = ? ORDER BY id DESC LIMIT 1`,
            [migrationId]
          )
        : await this.connectionManager.get(
            `SELECT ${HISTORY_COLUMNS} FROM migration_history
             WHERE migration_id = ? AND action = ? ORDER BY id DESC LIMIT 1`,
            [migrationId, action]
          );

    return row === undefined ? null : toRecord(row);
  }

  async pending(order: readonly string[]): Promise<string[]> {
    const applied = new Set(await this.appliedInOrder());
    return order.filter((id) => !applied.has(id));
  }

  async close(): Promise<void> {
    await this.connectionManager.disconnect();
  }

  /**
   * Insert one history row after checking the transition is consistent
   */
  private async append(
    migrationId: string,
    action: ExecutionAction,
    vcsRef: string | null,
    details: RecordDetails
  ): Promise<ExecutionRecord> {
    await this.ensureSchema();

    const recordedAt = new Date().toISOString();
    const runId = details.runId ?? uuidv4();
    const metadata = details.metadata ? JSON.stringify(details.metadata) : null;

    return this.connectionManager.transaction((db) => {
      if (action !== 'skipped') {
        const applied = currentlyApplied(db, migrationId);
        if (action === 'applied' && applied) {
          throw new StateStoreError(`Migration ${migrationId} is already recorded as applied`);
        }
        if (action === 'reverted' && !applied) {
          throw new StateStoreError(`Migration ${migrationId} is not recorded as applied`);
        }
      }

      const result = db
        .prepare(
          `INSERT INTO migration_history
             (migration_id, action, run_id, vcs_ref, recorded_at, duration_ms, checksum, metadata)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          migrationId,
          action,
          runId,
          vcsRef,
          recordedAt,
          Math.round(details.durationMs ?? 0),
          details.checksum ?? null,
          metadata
        );

      return toRecord(
        db
          .prepare(`SELECT ${HISTORY_COLUMNS} FROM migration_history WHERE id = ?`)
          .get(result.lastInsertRowid)
      );
    });
  }
}

function currentlyApplied(db: Database.Database, migrationId: string): boolean {
  const row = db
    .prepare(
      `SELECT action FROM migration_history
       WHERE migration_id = ? AND action IN ('applied', 'reverted')
       ORDER BY id DESC LIMIT 1`
    )
    .get(migrationId);

  const parsed = z.object({ action: z.string() }).safeParse(row);
  return parsed.success && parsed.data.action === 'applied';
}

function toRecord(row: unknown): ExecutionRecord {
  const parsed = HistoryRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new StateStoreError(`Corrupt migration_history row: ${parsed.error.message}`);
  }
  return fromRow(parsed.data);
}

function fromRow(row: HistoryRow): ExecutionRecord {
  let metadata: Record<string, unknown> | null = null;
  if (row.metadata !== null) {
    const decoded = MetadataSchema.safeParse(JSON.parse(row.metadata));
    metadata = decoded.success ? decoded.data : null;
  }

  return {
    id: row.id,
    migrationId: row.migration_id,
    action: row.action,
    runId: row.run_id,
    vcsRef: row.vcs_ref,
    recordedAt: row.recorded_at,
    durationMs: row.duration_ms,
    checksum: row.checksum,
    metadata,
  };
}
