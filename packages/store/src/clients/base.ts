/**
 * Base database client with connection management
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import Database from 'better-sqlite3';

import { ConnectionError } from '../errors.js';

/** Path that opens a private in-memory database */
export const IN_MEMORY = ':memory:';

/**
 * Configuration for database client connections
 */
export interface DatabaseClientConfig {
  /** Path to the database file (relative to the working directory or absolute), or ':memory:' */
  dbPath: string;
  /** Timeout in milliseconds to wait on a locked database */
  timeoutMs?: number;
}

/**
 * Base class for SQLite database clients.
 * The database file and its schema are created on first use.
 */
export abstract class BaseDatabaseClient {
  protected db: Database.Database | null = null;
  protected readonly config: Required<DatabaseClientConfig>;

  constructor(config: DatabaseClientConfig) {
    this.config = {
      dbPath: config.dbPath,
      timeoutMs: config.timeoutMs ?? 5000,
    };
  }

  /**
   * Create tables and indexes (idempotent)
   */
  protected abstract migrate(db: Database.Database): void;

  /**
   * Resolve the full database path
   */
  protected getFullDbPath(): string {
    if (this.config.dbPath === IN_MEMORY || path.isAbsolute(this.config.dbPath)) {
      return this.config.dbPath;
    }
    return path.resolve(process.cwd(), this.config.dbPath);
  }

  /**
   * Ensure database connection is established (lazy initialization)
   */
  protected ensureConnected(): Database.Database {
    if (this.db) {
      return this.db;
    }

    const fullPath = this.getFullDbPath();

    try {
      if (fullPath !== IN_MEMORY) {
        fs.mkdirSync(path.dirname(fullPath), { recursive: true });
      }

      const db = new Database(fullPath, { timeout: this.config.timeoutMs });
      if (fullPath !== IN_MEMORY) {
        db.pragma('journal_mode = WAL');
      }
      db.pragma('foreign_keys = ON');
      this.migrate(db);

      this.db = db;
      return db;
    } catch (err) {
      throw new ConnectionError(fullPath, err instanceof Error ? err : new Error(String(err)));
    }
  }

  /**
   * Close the database connection
   */
  public close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  /**
   * Get the configured database path
   */
  public get dbPath(): string {
    return this.config.dbPath;
  }

  /**
   * Check if the database is currently connected
   */
  public get isConnected(): boolean {
    return this.db !== null;
  }
}
