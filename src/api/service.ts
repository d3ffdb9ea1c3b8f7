/**
 * Table Access Service - Query Execution Layer
 *
 * Orchestrates one table operation end to end:
 * 1. Describe the table (columns and enabled policies)
 * 2. Merge the policies into `using` / `check` predicates
 * 3. Build one parameterized statement
 * 4. Run the `beforeExecute` hooks
 * 5. Execute it (writes inside a transaction) and decode the row documents
 */

import { z } from 'zod';
import type { RequestContext } from '../auth/types.js';
import { QueryBuilder, type Fields, type ParameterizedStatement } from '../compiler/index.js';
import type { DatabaseAdapter } from '../database/index.js';
import { CatalogError, NotFoundError, PolicyDeniedError } from '../errors/index.js';
import { HookList } from '../hooks/index.js';
import { appliesTo, mergePolicies } from '../rls/predicate.js';
import type { Operation, Policy } from '../rls/types.js';
import type { SchemaCatalog, TableDescriptor } from '../schema/index.js';
import { SYSTEM_TABLES } from '../utils/constants.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { toBindable } from '../values/index.js';

/**
 * One result row, decoded from its JSON document
 */
export type Row = Record<string, unknown>;

export interface SelectOptions {
  readonly filters?: Fields | undefined;
  readonly columns?: readonly string[] | undefined;
}

/**
 * Table Access Service configuration
 */
export interface TableAccessServiceConfig {
  readonly db: DatabaseAdapter;
  readonly catalog: SchemaCatalog;
  readonly logger?: Logger;
  /** Called with every statement before it runs */
  readonly beforeExecute?: HookList<ParameterizedStatement>;
}

const resultRowSchema = z.object({
  data: z.string(),
  check_passed: z.number().optional(),
});

const documentSchema = z.record(z.unknown());

/**
 * Executes table operations under the table's access policies
 */
export class TableAccessService {
  private db: DatabaseAdapter;
  private catalog: SchemaCatalog;
  private logger: Logger;
  private builder: QueryBuilder;

  readonly beforeExecute: HookList<ParameterizedStatement>;

  constructor(config: TableAccessServiceConfig) {
    this.db = config.db;
    this.catalog = config.catalog;
    this.logger = config.logger ?? silentLogger;
    this.builder = new QueryBuilder();
    this.beforeExecute = config.beforeExecute ?? new HookList('beforeExecute', this.logger);
  }

  /**
   * Describe a user table; engine-owned tables are reported as not found
   */
  describe(table: string): TableDescriptor {
    if (SYSTEM_TABLES.has(table)) {
      throw new NotFoundError(`Table '${table}' not found`, { table });
    }
    return this.catalog.describe(table);
  }

  listTables(): string[] {
    return this.catalog.listTables();
  }

  /**
   * Enabled policies governing `operation` on a table
   */
  policiesFor(table: string, operation: Operation): readonly Policy[] {
    return this.describe(table).policies.filter((p) => appliesTo(p, operation));
  }

  /**
   * Rows visible to the caller. A denied read returns no rows.
   */
  async select(table: string, options: SelectOptions, context: RequestContext): Promise<Row[]> {
    const statement = this.prepare(table, 'select', context, {
      filters: options.filters,
      columns: options.columns,
    });

    await this.beforeExecute.trigger(statement);
    const result = await this.db.prepare(statement.sql).all(...statement.params.map(toBindable));
    return this.decodeRows(result.rows, statement);
  }

  /**
   * Insert one row and return it as written
   *
   * @throws PolicyDeniedError when the written row fails the table's check policies
   */
  async insert(table: string, values: Fields, context: RequestContext): Promise<Row[]> {
    return this.write(this.prepare(table, 'insert', context, { values }));
  }

  /**
   * Update the visible rows matching `filters` and return them as written
   *
   * @throws PolicyDeniedError when any updated row fails the table's check policies
   */
  async update(
    table: string,
    values: Fields,
    filters: Fields,
    context: RequestContext
  ): Promise<Row[]> {
    return this.write(this.prepare(table, 'update', context, { values, filters }));
  }

  /**
   * Delete the visible rows matching `filters` and return them
   */
  async delete(table: string, filters: Fields, context: RequestContext): Promise<Row[]> {
    return this.write(this.prepare(table, 'delete', context, { filters }));
  }

  private prepare(
    table: string,
    operation: Operation,
    context: RequestContext,
    payload: Pick<SelectOptions, 'filters' | 'columns'> & { readonly values?: Fields }
  ): ParameterizedStatement {
    const descriptor = this.describe(table);
    const predicates = mergePolicies(descriptor.policies, operation);

    const statement = this.builder.build({
      table: descriptor,
      operation,
      values: payload.values,
      filters: payload.filters,
      columns: payload.columns,
      predicates,
      context,
    });

    this.logger.debug(`Built ${operation} on ${table}`, {
      sql: statement.sql,
      guarded: statement.guarded,
    });
    return statement;
  }

  /**
   * Run a write in its own transaction; a failed guard rolls it back
   */
  private async write(statement: ParameterizedStatement): Promise<Row[]> {
    await this.beforeExecute.trigger(statement);

    return this.db.transaction(async (tx) => {
      const result = await tx.prepare(statement.sql).all(...statement.params.map(toBindable));
      return this.decodeRows(result.rows, statement);
    });
  }

  private decodeRows(rows: readonly unknown[], statement: ParameterizedStatement): Row[] {
    const decoded: Row[] = [];

    for (const raw of rows) {
      const parsed = resultRowSchema.safeParse(raw);
      if (!parsed.success) {
        throw new CatalogError(`Unexpected result row from ${statement.operation} on ${statement.table}`, parsed.error);
      }

      if (statement.guarded && parsed.data.check_passed !== 1) {
        this.logger.warn(`Rejected ${statement.operation} on ${statement.table}`, {
          table: statement.table,
          operation: statement.operation,
        });
        throw new PolicyDeniedError();
      }

      decoded.push(documentSchema.parse(JSON.parse(parsed.data.data)));
    }

    return decoded;
  }
}
