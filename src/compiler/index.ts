/**
 * Query Builder
 *
 * Compiles one table operation into a single parameterized SQLite statement
 * with the table's access predicates already embedded.
 *
 * - Values are always bound; identifiers are spliced in only after passing
 *   the plain-identifier check and matching a column of the table.
 * - Rows come back as one JSON document per row (`data`), whatever the table.
 * - Writes governed by a `check` predicate also return `check_passed`,
 *   computed on the row as written; the executor rejects the write (and rolls
 *   back) when any returned row has it at 0.
 */

import type { RequestContext } from '../auth/types.js';
import { EmptyWriteSetError, InvalidColumnSetError } from '../errors/index.js';
import { bindContext } from '../rls/context.js';
import { predicateSql } from '../rls/predicate.js';
import type { Operation, PolicyPredicates, Predicate } from '../rls/types.js';
import type { ColumnDescriptor, TableDescriptor } from '../schema/index.js';
import { CHECK_GUARD_COLUMN, DATA_COLUMN } from '../utils/constants.js';
import { escapeIdentifier, isPlainIdentifier, qualifiedName, quoteLiteral } from '../utils/identifier.js';
import { mapValue, placeholder, type PayloadValue, type TypedParam } from '../values/index.js';

/**
 * Column/value pairs of a payload
 */
export type Fields = Readonly<Record<string, PayloadValue>>;

/**
 * Everything needed to build one statement
 */
export interface BuildRequest {
  readonly table: TableDescriptor;
  readonly operation: Operation;
  /** Columns to write (insert, update) */
  readonly values?: Fields | undefined;
  /** Equality filters selecting rows (select, update, delete) */
  readonly filters?: Fields | undefined;
  /** Projection (select); all columns when omitted */
  readonly columns?: readonly string[] | undefined;
  readonly predicates: PolicyPredicates;
  readonly context: RequestContext;
}

/**
 * Statement ready for execution
 */
export interface ParameterizedStatement {
  readonly operation: Operation;
  readonly table: string;
  readonly sql: string;
  readonly params: readonly TypedParam[];
  /** The statement returns a `check_passed` column that must be 1 on every row */
  readonly guarded: boolean;
}

/**
 * Parameters collected in placeholder order for one build call
 */
class ParamList {
  readonly params: TypedParam[] = [];

  add(value: PayloadValue): string {
    const param = mapValue(value);
    this.params.push(param);
    return placeholder(param);
  }

  addAll(params: readonly TypedParam[]): void {
    this.params.push(...params);
  }
}

/**
 * Builds parameterized statements for a described table
 */
export class QueryBuilder {
  /**
   * Build a statement
   *
   * @throws InvalidColumnSetError for identifiers that are not plain or not columns of the table
   * @throws EmptyWriteSetError for an insert or update without values
   */
  build(request: BuildRequest): ParameterizedStatement {
    const { table, operation } = request;
    this.assertTableName(table);

    switch (operation) {
      case 'select':
        return this.buildSelect(request);
      case 'insert':
        return this.buildInsert(request);
      case 'update':
        return this.buildUpdate(request);
      case 'delete':
        return this.buildDelete(request);
    }
  }

  private buildSelect(request: BuildRequest): ParameterizedStatement {
    const { table } = request;
    const projection = this.resolveColumns(table, request.columns ?? null, 'read');
    const filters = this.entries(table, request.filters, 'read');
    const params = new ParamList();

    let sql = `SELECT ${this.rowDocument(projection)} AS ${DATA_COLUMN} FROM ${qualifiedName(table.schema, table.name)}`;
    sql += this.whereClause(filters, request.predicates.using, request.context, params);

    return this.statement(request, sql, params, false);
  }

  private buildInsert(request: BuildRequest): ParameterizedStatement {
    const { table } = request;
    const values = this.entries(table, request.values, 'write');
    if (values.length === 0) {
      throw new EmptyWriteSetError(table.name);
    }

    const params = new ParamList();
    const columnList = values.map(([column]) => escapeIdentifier(column)).join(', ');
    const valueList = values.map(([, value]) => params.add(value)).join(', ');

    let sql = `INSERT INTO ${qualifiedName(table.schema, table.name)} (${columnList}) VALUES (${valueList})`;
    sql += this.returningClause(table, request.predicates.check, request.context, params);

    return this.statement(request, sql, params, request.predicates.check.type !== 'allow');
  }

  private buildUpdate(request: BuildRequest): ParameterizedStatement {
    const { table } = request;
    const values = this.entries(table, request.values, 'write');
    const filters = this.entries(table, request.filters, 'read');
    if (values.length === 0) {
      throw new EmptyWriteSetError(table.name);
    }

    const params = new ParamList();
    const setClause = values
      .map(([column, value]) => `${escapeIdentifier(column)} = ${params.add(value)}`)
      .join(', ');

    let sql = `UPDATE ${qualifiedName(table.schema, table.name)} SET ${setClause}`;
    sql += this.whereClause(filters, request.predicates.using, request.context, params);
    sql += this.returningClause(table, request.predicates.check, request.context, params);

    return this.statement(request, sql, params, request.predicates.check.type !== 'allow');
  }

  private buildDelete(request: BuildRequest): ParameterizedStatement {
    const { table } = request;
    const filters = this.entries(table, request.filters, 'read');
    const params = new ParamList();

    let sql = `DELETE FROM ${qualifiedName(table.schema, table.name)}`;
    sql += this.whereClause(filters, request.predicates.using, request.context, params);
    sql += ` RETURNING ${this.rowDocument(table.columns)} AS ${DATA_COLUMN}`;

    return this.statement(request, sql, params, false);
  }

  /**
   * ` WHERE ...` from equality filters and the merged using-predicate, or ''
   */
  private whereClause(
    filters: ReadonlyArray<readonly [string, PayloadValue]>,
    using: Predicate,
    context: RequestContext,
    params: ParamList
  ): string {
    const terms = filters.map(([column, value]) =>
      value === null || value === undefined
        ? `${escapeIdentifier(column)} IS NULL`
        : `${escapeIdentifier(column)} = ${params.add(value)}`
    );

    if (using.type !== 'allow') {
      const bound = bindContext(predicateSql(using), context);
      terms.push(bound.sql);
      params.addAll(bound.params);
    }

    return terms.length > 0 ? ` WHERE ${terms.join(' AND ')}` : '';
  }

  /**
   * ` RETURNING data[, check_passed]` for insert and update
   */
  private returningClause(
    table: TableDescriptor,
    check: Predicate,
    context: RequestContext,
    params: ParamList
  ): string {
    let clause = ` RETURNING ${this.rowDocument(table.columns)} AS ${DATA_COLUMN}`;

    if (check.type !== 'allow') {
      const bound = bindContext(predicateSql(check), context);
      clause += `, CASE WHEN ${bound.sql} THEN 1 ELSE 0 END AS ${CHECK_GUARD_COLUMN}`;
      params.addAll(bound.params);
    }

    return clause;
  }

  /**
   * `json_object('a', "a", ...)` over the given columns
   */
  private rowDocument(columns: readonly ColumnDescriptor[]): string {
    const pairs = columns.map((c) => `${quoteLiteral(c.name)}, ${escapeIdentifier(c.name)}`);
    return `json_object(${pairs.join(', ')})`;
  }

  /**
   * Validated (column, value) pairs of a payload, in payload order
   */
  private entries(
    table: TableDescriptor,
    fields: Fields | undefined,
    mode: 'read' | 'write'
  ): Array<readonly [string, PayloadValue]> {
    const pairs = Object.entries(fields ?? {});
    this.resolveColumns(table, pairs.map(([column]) => column), mode);
    return pairs;
  }

  /**
   * Map names to descriptor columns; null means every column
   */
  private resolveColumns(
    table: TableDescriptor,
    names: readonly string[] | null,
    mode: 'read' | 'write'
  ): ColumnDescriptor[] {
    if (names === null) {
      return [...table.columns];
    }

    const byName = new Map(table.columns.map((c) => [c.name, c]));
    const resolved: ColumnDescriptor[] = [];
    const invalid: string[] = [];

    for (const name of names) {
      const column = isPlainIdentifier(name) ? byName.get(name) : undefined;
      if (!column || (mode === 'write' && column.generationKind !== 'normal')) {
        invalid.push(name);
      } else {
        resolved.push(column);
      }
    }

    if (invalid.length > 0) {
      throw new InvalidColumnSetError(
        `Invalid columns for table '${table.name}': ${invalid.join(', ')}`,
        invalid
      );
    }
    return resolved;
  }

  private assertTableName(table: TableDescriptor): void {
    const invalid = [table.schema, table.name].filter((name) => !isPlainIdentifier(name));
    if (invalid.length > 0) {
      throw new InvalidColumnSetError(`Invalid table identifier '${table.name}'`, invalid);
    }
  }

  private statement(
    request: BuildRequest,
    sql: string,
    params: ParamList,
    guarded: boolean
  ): ParameterizedStatement {
    return {
      operation: request.operation,
      table: request.table.name,
      sql,
      params: params.params,
      guarded,
    };
  }
}
