/**
 * Database Adapter - Statement execution collaborator
 *
 * The engine only builds statements; running them goes through this interface
 * so that the access service can be exercised against any SQLite binding.
 */

/**
 * Result from a database query
 */
export interface QueryResult<T = unknown> {
  readonly rows: readonly T[];
}

/**
 * Prepared statement interface
 */
export interface PreparedStatement {
  /**
   * Execute query and return all rows
   */
  all<T = unknown>(...params: readonly unknown[]): Promise<QueryResult<T>>;

  /**
   * Execute query and return first row
   */
  first<T = unknown>(...params: readonly unknown[]): Promise<T | null>;

  /**
   * Execute query without returning results, reporting the affected row count
   */
  run(...params: readonly unknown[]): Promise<{ readonly changes: number }>;
}

/**
 * Database adapter interface
 */
export interface DatabaseAdapter {
  /**
   * Prepare a SQL statement
   */
  prepare(sql: string): PreparedStatement;

  /**
   * Execute raw SQL (schema setup, administrative scripts)
   */
  exec(sql: string): Promise<void>;

  /**
   * Run `fn` as one atomic unit.
   *
   * Commits when `fn` resolves, rolls back and rethrows when it rejects.
   * Calls made on the `tx` handle become savepoints; separate top-level
   * calls run one after another.
   */
  transaction<T>(fn: (tx: DatabaseAdapter) => Promise<T>): Promise<T>;

  /**
   * Close the database connection
   */
  close(): void;
}
