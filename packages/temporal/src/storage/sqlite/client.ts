/**
 * SQLite Client Wrapper
 *
 * Wraps better-sqlite3 with WAL mode and foreign key support.
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';

/**
 * SQLite client configuration
 */
export interface SQLiteClientConfig {
  /** Path to the database file */
  dbPath: string;
  /** Enable WAL mode (default: true, ignored for in-memory databases) */
  walMode?: boolean | undefined;
  /** Enable foreign keys (default: true) */
  foreignKeys?: boolean | undefined;
}

/**
 * SQLite client wrapper
 */
export class SQLiteClient {
  private db: DatabaseType;

  constructor(config: SQLiteClientConfig) {
    this.db = new Database(config.dbPath);

    if ((config.walMode ?? true) && config.dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    if (config.foreignKeys ?? true) {
      this.db.pragma('foreign_keys = ON');
    }
  }

  /**
   * Execute raw SQL
   */
  exec(sql: string): void {
    this.db.exec(sql);
  }

  /**
   * Prepare a statement
   */
  prepare(sql: string): Database.Statement {
    return this.db.prepare(sql);
  }

  /**
   * Run a transaction. Nested calls run as savepoints.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
  }
}
