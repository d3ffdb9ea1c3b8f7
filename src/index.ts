/**
 * tablegate
 *
 * Policy-enforced table access for SQLite: schema introspection, row-level
 * policies, typed parameter mapping and statement building, with HS256
 * identity tokens supplying who the policies evaluate against.
 */

// Schema
export { SchemaCatalog } from './schema/index.js';
export type {
  ColumnDescriptor,
  ForeignKeyInfo,
  GenerationKind,
  SchemaCatalogOptions,
  TableDescriptor,
} from './schema/index.js';

// Policies
export * from './rls/index.js';

// Values
export { mapValue, placeholder, toBindable, toJsonValue } from './values/index.js';
export type { ParamKind, PayloadValue, TypedParam } from './values/index.js';

// Query builder
export { QueryBuilder } from './compiler/index.js';
export type { BuildRequest, Fields, ParameterizedStatement } from './compiler/index.js';

// Auth
export * from './auth/index.js';

// Database
export { SqliteAdapter } from './database/index.js';
export type { DatabaseAdapter, PreparedStatement, QueryResult } from './database/index.js';

// API
export * from './api/index.js';

// Hooks
export { HookList, type BindOptions, type HookHandler } from './hooks/index.js';

// Configuration
export { loadConfig, type AppConfig } from './config/index.js';

// Logging
export {
  consoleLogger,
  createConsoleLogger,
  silentLogger,
  type LogLevel,
  type Logger,
} from './utils/logger.js';

// Errors
export * from './errors/index.js';
