/**
 * Schema Introspection for SQLite
 *
 * Describes one table (columns, keys, foreign keys, index membership and the
 * enabled access policies) with a single catalog query that SQLite assembles
 * into one JSON document.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { CatalogError, NotFoundError } from '../errors/index.js';
import { ensurePolicyTable, policyRowSchema, rowToPolicy } from '../rls/storage.js';
import type { Policy } from '../rls/types.js';
import { DEFAULT_SCHEMA, POLICY_TABLE, SYSTEM_TABLES } from '../utils/constants.js';

export type GenerationKind = 'normal' | 'virtual' | 'stored';

export interface ForeignKeyInfo {
  readonly referencesTable: string;
  readonly referencesColumn: string;
  readonly onUpdate: string;
  readonly onDelete: string;
}

export interface ColumnDescriptor {
  /** Catalog-assigned position, starting at 0 */
  readonly position: number;
  readonly name: string;
  /** Raw declared type, e.g. `INTEGER` or `VARCHAR(32)`; empty when undeclared */
  readonly declaredType: string;
  readonly isNotNull: boolean;
  readonly defaultValue?: string;
  readonly isPrimaryKey: boolean;
  /** 1-based order within the primary key; only set on primary key columns */
  readonly primaryKeyOrder?: number;
  readonly generationKind: GenerationKind;
  readonly foreignKey?: ForeignKeyInfo;
  readonly indexMembership: readonly string[];
}

export interface TableDescriptor {
  readonly name: string;
  readonly schema: string;
  /** Original CREATE TABLE statement, informational */
  readonly originSql: string | null;
  readonly columns: readonly ColumnDescriptor[];
  /** Enabled policies only */
  readonly policies: readonly Policy[];
}

/**
 * Options for the catalog reader
 */
export interface SchemaCatalogOptions {
  /** Keep descriptors until `invalidate()` is called (default: false) */
  readonly cache?: boolean;
}

const DESCRIBE_TABLE_SQL = `
  SELECT json_object(
    'name', m.name,
    'schema', '${DEFAULT_SCHEMA}',
    'sql', m.sql,
    'policies', json((
      SELECT json_group_array(json_object(
        'id', p.id,
        'name', p.name,
        'description', p.description,
        'is_enabled', p.is_enabled,
        'table_name', p.table_name,
        'operation', p.operation,
        'policy_type', p.policy_type,
        'using_expr', p.using_expr,
        'check_expr', p.check_expr
      ))
      FROM ${POLICY_TABLE} p
      WHERE p.table_name = m.name AND p.is_enabled = 1
    )),
    'columns', json((
      SELECT json_group_array(json_object(
        'column_id', txi.cid,
        'column_name', txi.name,
        'data_type', txi.type,
        'is_not_null', txi."notnull",
        'default_value', txi.dflt_value,
        'primary_key_order', txi.pk,
        'hidden', txi.hidden,
        'reference_table', fkl."table",
        'reference_column', COALESCE(fkl."to", (
          SELECT ppk.name FROM pragma_table_info(fkl."table") AS ppk WHERE ppk.pk = 1
        ), 'rowid'),
        'foreign_key_on_update', fkl.on_update,
        'foreign_key_on_delete', fkl.on_delete,
        'indexes', json((
          SELECT json_group_array(il.name)
          FROM pragma_index_list(m.name) AS il
          JOIN pragma_index_info(il.name) AS ii ON ii.name = txi.name
        ))
      ))
      FROM pragma_table_xinfo(m.name) AS txi
      LEFT JOIN pragma_foreign_key_list(m.name) AS fkl ON fkl."from" = txi.name
    ))
  ) AS table_details
  FROM sqlite_master AS m
  WHERE m.type = 'table' AND m.name = ?
`;

const LIST_TABLES_SQL = `
  SELECT name FROM sqlite_master
  WHERE type = 'table'
  AND name NOT LIKE 'sqlite_%'
  ORDER BY name
`;

const columnRowSchema = z.object({
  column_id: z.number().int(),
  column_name: z.string(),
  data_type: z.string(),
  is_not_null: z.number().int(),
  default_value: z.string().nullable(),
  primary_key_order: z.number().int(),
  hidden: z.number().int(),
  reference_table: z.string().nullable(),
  reference_column: z.string().nullable(),
  foreign_key_on_update: z.string().nullable(),
  foreign_key_on_delete: z.string().nullable(),
  indexes: z.array(z.string()),
});

type ColumnRow = z.infer<typeof columnRowSchema>;

const tableDocumentSchema = z.object({
  name: z.string(),
  schema: z.string(),
  sql: z.string().nullable(),
  policies: z.array(policyRowSchema),
  columns: z.array(columnRowSchema),
});

/**
 * Introspect SQLite tables into TableDescriptors
 */
export class SchemaCatalog {
  private db: Database.Database;
  private cache: Map<string, TableDescriptor> | null;

  constructor(db: Database.Database, options: SchemaCatalogOptions = {}) {
    this.db = db;
    this.cache = options.cache ? new Map() : null;
    ensurePolicyTable(db);
  }

  /**
   * Describe a table
   *
   * @throws NotFoundError when the table does not exist
   * @throws CatalogError when the catalog query fails or its result is malformed
   */
  describe(tableName: string): TableDescriptor {
    const cached = this.cache?.get(tableName);
    if (cached) {
      return cached;
    }

    let row: unknown;
    try {
      row = this.db.prepare(DESCRIBE_TABLE_SQL).get(tableName);
    } catch (error) {
      throw new CatalogError(`Failed to read catalog for table '${tableName}'`, error);
    }

    if (row === undefined) {
      throw new NotFoundError(`Table '${tableName}' not found`, { table: tableName });
    }

    const descriptor = parseTableDocument(row);
    this.cache?.set(tableName, descriptor);
    return descriptor;
  }

  /**
   * Names of user tables, excluding SQLite internals and engine-owned tables
   */
  listTables(): string[] {
    let rows: unknown[];
    try {
      rows = this.db.prepare(LIST_TABLES_SQL).all();
    } catch (error) {
      throw new CatalogError('Failed to list tables', error);
    }

    const parsed = z.array(z.object({ name: z.string() })).safeParse(rows);
    if (!parsed.success) {
      throw new CatalogError('Table list is malformed', parsed.error);
    }
    return parsed.data.map((r) => r.name).filter((name) => !SYSTEM_TABLES.has(name));
  }

  /**
   * Drop cached descriptors (one table, or all of them)
   */
  invalidate(tableName?: string): void {
    if (tableName === undefined) {
      this.cache?.clear();
    } else {
      this.cache?.delete(tableName);
    }
  }
}

/**
 * Parse the `table_details` document produced by the catalog query
 */
function parseTableDocument(row: unknown): TableDescriptor {
  const wrapper = z.object({ table_details: z.string() }).safeParse(row);
  if (!wrapper.success) {
    throw new CatalogError('Catalog returned no table document', wrapper.error);
  }

  let document: unknown;
  try {
    document = JSON.parse(wrapper.data.table_details);
  } catch (error) {
    throw new CatalogError('Catalog document is not valid JSON', error);
  }

  const parsed = tableDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new CatalogError('Catalog document is malformed', parsed.error);
  }

  return {
    name: parsed.data.name,
    schema: parsed.data.schema,
    originSql: parsed.data.sql,
    columns: toColumns(parsed.data.columns),
    policies: [...parsed.data.policies].sort((a, b) => a.id - b.id).map(rowToPolicy),
  };
}

/**
 * Order columns by position and keep one row per column.
 *
 * A column referenced by several foreign keys yields several joined rows;
 * only the first edge is kept (composite keys are not modelled).
 */
function toColumns(rows: readonly ColumnRow[]): ColumnDescriptor[] {
  const byPosition = new Map<number, ColumnDescriptor>();

  for (const row of [...rows].sort((a, b) => a.column_id - b.column_id)) {
    if (!byPosition.has(row.column_id)) {
      byPosition.set(row.column_id, toColumn(row));
    }
  }

  return [...byPosition.values()];
}

function toColumn(row: ColumnRow): ColumnDescriptor {
  const isPrimaryKey = row.primary_key_order > 0;

  return {
    position: row.column_id,
    name: row.column_name,
    declaredType: row.data_type,
    isNotNull: row.is_not_null === 1,
    ...(row.default_value !== null ? { defaultValue: row.default_value } : {}),
    isPrimaryKey,
    ...(isPrimaryKey ? { primaryKeyOrder: row.primary_key_order } : {}),
    generationKind: generationKind(row.hidden),
    ...(row.reference_table !== null
      ? {
          foreignKey: {
            referencesTable: row.reference_table,
            referencesColumn: row.reference_column ?? 'rowid',
            onUpdate: row.foreign_key_on_update ?? 'NO ACTION',
            onDelete: row.foreign_key_on_delete ?? 'NO ACTION',
          },
        }
      : {}),
    indexMembership: [...new Set(row.indexes)],
  };
}

/**
 * `pragma_table_xinfo.hidden`: 2 is a virtual generated column, 3 a stored one
 */
function generationKind(hidden: number): GenerationKind {
  switch (hidden) {
    case 2:
      return 'virtual';
    case 3:
      return 'stored';
    default:
      return 'normal';
  }
}
