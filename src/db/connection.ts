/**
 * Database Connection Manager
 *
 * Owns the SQLite connection backing the state store, with transaction
 * support and retry on lock contention.
 */

import Database from 'better-sqlite3';
import { EventEmitter } from 'events';
import { mkdirSync } from 'fs';
import { dirname } from 'path';

/**
 * Database Configuration Options
 */
export interface DatabaseConfig {
  /** Path to database file (use ':memory:' for in-memory database) */
  filename: string;
  /** Enable read-only mode */
  readonly?: boolean;
  /** Busy timeout in milliseconds (default: 5000) */
  timeout?: number;
  /** Maximum retry attempts for busy/locked errors (default: 3) */
  maxRetries?: number;
  /** Base delay for exponential backoff in milliseconds (default: 100) */
  retryBaseDelay?: number;
}

/**
 * Transaction Options
 */
export interface TransactionOptions {
  /** Transaction mode (default: 'IMMEDIATE') */
  mode?: 'DEFERRED' | 'IMMEDIATE' | 'EXCLUSIVE';
}

const RETRYABLE_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED']);

/**
 * Database Connection Manager
 */
export class ConnectionManager extends EventEmitter {
  private config: Required<DatabaseConfig>;
  private db: Database.Database | null = null;
  private isClosed = false;

  constructor(config: DatabaseConfig) {
    super();
    this.config = {
      filename: config.filename,
      readonly: config.readonly ?? false,
      timeout: config.timeout ?? 5000,
      maxRetries: config.maxRetries ?? 3,
      retryBaseDelay: config.retryBaseDelay ?? 100,
    };
  }

  /**
   * Open the database, creating its directory if needed
   */
  connect(): void {
    if (this.db) {
      throw new Error('Connection manager already initialized');
    }

    if (this.isClosed) {
      throw new Error('Connection manager has been closed');
    }

    try {
      if (this.config.filename !== ':memory:') {
        mkdirSync(dirname(this.config.filename), { recursive: true });
      }

      const db = new Database(this.config.filename, {
        readonly: this.config.readonly,
        timeout: this.config.timeout,
      });

      // WAL lets readers proceed while a run is writing
      if (!this.config.readonly) {
        db.pragma('journal_mode = WAL');
      }
      db.pragma('synchronous = NORMAL');

      this.db = db;
      this.emit('connected', { filename: this.config.filename });
    } catch (error) {
      if (this.listenerCount('error') > 0) {
        this.emit('error', error);
      }
      throw new Error(
        `Failed to open database ${this.config.filename}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private connection(): Database.Database {
    if (this.isClosed) {
      throw new Error('Connection manager has been closed');
    }
    if (!this.db) {
      throw new Error('Connection manager not initialized. Call connect() first.');
    }
    return this.db;
  }

  /**
   * Execute operation with retry on busy/locked errors
   */
  async withRetry<T>(
    operation: (db: Database.Database) => T,
    retries: number = this.config.maxRetries
  ): Promise<T> {
    let lastError: Error | undefined;

    for (let attempt = 0; attempt <= retries; attempt++) {
      try {
        return operation(this.connection());
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (!isRetryable(error)) {
          throw lastError;
        }

        if (attempt < retries) {
          const delay = this.config.retryBaseDelay * Math.pow(2, attempt);
          await new Promise((resolve) => setTimeout(resolve, delay));
          this.emit('retry', { attempt: attempt + 1, error: lastError.message });
        }
      }
    }

    throw new Error(`Operation failed after ${retries + 1} attempts: ${lastError?.message}`);
  }

  /**
   * Execute a synchronous transaction
   */
  async transaction<T>(
    operations: (db: Database.Database) => T,
    options: TransactionOptions = {}
  ): Promise<T> {
    const mode = options.mode ?? 'IMMEDIATE';

    return this.withRetry((db) => {
      db.exec(`BEGIN ${mode}`);

      try {
        const result = operations(db);
        db.exec('COMMIT');
        return result;
      } catch (error) {
        db.exec('ROLLBACK');
        throw error;
      }
    });
  }

  /**
   * Execute a raw SQL query
   */
  async query(sql: string, params: unknown[] = []): Promise<unknown[]> {
    return this.withRetry((db) => db.prepare(sql).all(...params));
  }

  /**
   * Execute a raw SQL statement (INSERT, UPDATE, DELETE)
   */
  async execute(sql: string, params: unknown[] = []): Promise<Database.RunResult> {
    return this.withRetry((db) => db.prepare(sql).run(...params));
  }

  /**
   * Get a single row from query
   */
  async get(sql: string, params: unknown[] = []): Promise<unknown> {
    return this.withRetry((db) => db.prepare(sql).get(...params));
  }

  /**
   * Execute one or more statements without parameters
   */
  async exec(sql: string): Promise<void> {
    await this.withRetry((db) => db.exec(sql));
  }

  isConnected(): boolean {
    return this.db !== null && !this.isClosed;
  }

  getFilePath(): string {
    return this.config.filename;
  }

  /**
   * Close the connection
   */
  async disconnect(): Promise<void> {
    if (!this.db || this.isClosed) {
      return;
    }

    this.db.close();
    this.db = null;
    this.isClosed = true;
    this.emit('disconnected');
  }
}

function isRetryable(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    RETRYABLE_CODES.has(error.code)
  );
}

/**
 * In-memory database configuration for testing
 */
export const TEST_CONFIG: DatabaseConfig = {
  filename: ':memory:',
  readonly: false,
  timeout: 5000,
  maxRetries: 3,
  retryBaseDelay: 10,
};
