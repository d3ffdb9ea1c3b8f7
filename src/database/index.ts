/**
 * Database Adapters
 */

export type { DatabaseAdapter, PreparedStatement, QueryResult } from './adapter.js';
export { SqliteAdapter } from './sqlite-adapter.js';
