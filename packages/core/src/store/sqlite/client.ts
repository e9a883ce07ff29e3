/**
 * SQLite Client Wrapper
 *
 * Wraps better-sqlite3 with WAL mode and enforced foreign keys.
 */

import Database from 'better-sqlite3';

import { PersistenceError } from '../../errors/index.js';

import type { Database as DatabaseType } from 'better-sqlite3';

/**
 * SQLite client configuration
 */
export interface SQLiteClientConfig {
  /** Path to the database file, or `:memory:` */
  dbPath: string;
  /** Enable WAL mode (default: true) */
  walMode?: boolean;
  /** Log every statement through this function */
  verbose?: ((message?: unknown, ...args: unknown[]) => void) | undefined;
}

export class SQLiteClient {
  private readonly db: DatabaseType;

  constructor(config: SQLiteClientConfig) {
    try {
      this.db = new Database(config.dbPath, config.verbose ? { verbose: config.verbose } : {});
    } catch (error) {
      throw new PersistenceError(`Cannot open database at ${config.dbPath}`, error);
    }

    if (config.walMode ?? true) {
      this.db.pragma('journal_mode = WAL');
    }

    // pattern_scores rows must never outlive their scan
    this.db.pragma('foreign_keys = ON');
    if (this.db.pragma('foreign_keys', { simple: true }) !== 1) {
      this.db.close();
      throw new PersistenceError('SQLite build does not enforce foreign keys');
    }
  }

  get database(): DatabaseType {
    return this.db;
  }

  exec(sql: string): void {
    this.db.exec(sql);
  }

  /**
   * Run `fn` inside a transaction; any throw rolls everything back
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  get path(): string {
    return this.db.name;
  }
}
