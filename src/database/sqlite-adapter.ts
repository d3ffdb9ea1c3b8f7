/**
 * SQLite Adapter
 *
 * Wraps better-sqlite3 to conform to the DatabaseAdapter interface.
 */

import type Database from 'better-sqlite3';
import type { DatabaseAdapter, PreparedStatement, QueryResult } from './adapter.js';

/**
 * Prepared statement wrapper for better-sqlite3
 */
class SqlitePreparedStatement implements PreparedStatement {
  constructor(private stmt: Database.Statement) {}

  async all<T = unknown>(...params: readonly unknown[]): Promise<QueryResult<T>> {
    const rows = this.stmt.all(...params) as T[];
    return { rows };
  }

  async first<T = unknown>(...params: readonly unknown[]): Promise<T | null> {
    const row = this.stmt.get(...params) as T | undefined;
    return row ?? null;
  }

  async run(...params: readonly unknown[]): Promise<{ readonly changes: number }> {
    const info = this.stmt.run(...params);
    return { changes: info.changes };
  }
}

/**
 * Runs queued tasks one at a time, in call order
 */
class TaskQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // The caller observes failures through `result`; the queue only waits for settlement
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

/**
 * Handle passed to a transaction callback. Statements run inside the open
 * transaction; `transaction()` on it opens a savepoint one level deeper.
 */
class SqliteTransaction implements DatabaseAdapter {
  private queue = new TaskQueue();

  constructor(
    private db: Database.Database,
    private depth: number
  ) {}

  prepare(sql: string): PreparedStatement {
    return new SqlitePreparedStatement(this.db.prepare(sql));
  }

  async exec(sql: string): Promise<void> {
    this.db.exec(sql);
  }

  transaction<T>(fn: (tx: DatabaseAdapter) => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      const name = `tablegate_sp_${this.depth}`;

      this.db.exec(`SAVEPOINT ${name}`);
      try {
        const result = await fn(new SqliteTransaction(this.db, this.depth + 1));
        this.db.exec(`RELEASE ${name}`);
        return result;
      } catch (error) {
        this.db.exec(`ROLLBACK TO ${name}`);
        this.db.exec(`RELEASE ${name}`);
        throw error;
      }
    });
  }

  close(): void {
    throw new Error('Cannot close the connection from inside a transaction');
  }
}

/**
 * SQLite database adapter for better-sqlite3
 *
 * Top-level transactions on one adapter are serialized: a transaction that
 * starts while another is awaiting waits for it to commit or roll back.
 */
export class SqliteAdapter implements DatabaseAdapter {
  private queue = new TaskQueue();

  constructor(private db: Database.Database) {}

  prepare(sql: string): PreparedStatement {
    const stmt = this.db.prepare(sql);
    return new SqlitePreparedStatement(stmt);
  }

  async exec(sql: string): Promise<void> {
    this.db.exec(sql);
  }

  transaction<T>(fn: (tx: DatabaseAdapter) => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      this.db.exec('BEGIN IMMEDIATE');
      try {
        const result = await fn(new SqliteTransaction(this.db, 1));
        this.db.exec('COMMIT');
        return result;
      } catch (error) {
        if (this.db.inTransaction) {
          this.db.exec('ROLLBACK');
        }
        throw error;
      }
    });
  }

  close(): void {
    this.db.close();
  }

  /**
   * Get the underlying better-sqlite3 database instance
   */
  getDb(): Database.Database {
    return this.db;
  }
}
