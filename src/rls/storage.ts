/**
 * SQLite Policy Store
 *
 * Stores and retrieves access policies in the `_policies` table.
 * Implements the PolicyStore interface.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { CatalogError, NotFoundError, PolicyConflictError, PolicyDefinitionError } from '../errors/index.js';
import { POLICY_TABLE } from '../utils/constants.js';
import { PLAIN_IDENTIFIER } from '../utils/identifier.js';
import { parsePolicyStatement } from './parser.js';
import type { Operation, Policy, PolicyInput, PolicyStore } from './types.js';

const POLICY_TABLE_DDL = `
  CREATE TABLE IF NOT EXISTS ${POLICY_TABLE} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT UNIQUE NOT NULL,
    description TEXT,
    is_enabled INTEGER NOT NULL DEFAULT 1,
    table_name TEXT NOT NULL,
    operation TEXT NOT NULL CHECK (operation IN ('select', 'update', 'insert', 'delete', 'all')),
    policy_type TEXT NOT NULL DEFAULT 'PERMISSIVE' CHECK (policy_type IN ('PERMISSIVE', 'RESTRICTIVE')),
    using_expr TEXT,
    check_expr TEXT,
    CHECK (using_expr IS NOT NULL OR check_expr IS NOT NULL)
  );
  CREATE INDEX IF NOT EXISTS idx_policies_table_operation
  ON ${POLICY_TABLE}(table_name, operation);
`;

/**
 * Create the policy registry table if it does not exist yet
 */
export function ensurePolicyTable(db: Database.Database): void {
  db.exec(POLICY_TABLE_DDL);
}

/**
 * Shape of a `_policies` row, as read directly or from the catalog document
 */
export const policyRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string().nullable(),
  is_enabled: z.number().int(),
  table_name: z.string(),
  operation: z.enum(['select', 'insert', 'update', 'delete', 'all']),
  policy_type: z.enum(['PERMISSIVE', 'RESTRICTIVE']),
  using_expr: z.string().nullable(),
  check_expr: z.string().nullable(),
});

export type PolicyRow = z.infer<typeof policyRowSchema>;

/**
 * Convert a database row to a Policy
 */
export function rowToPolicy(row: PolicyRow): Policy {
  return {
    id: row.id,
    name: row.name,
    ...(row.description !== null ? { description: row.description } : {}),
    isEnabled: row.is_enabled === 1,
    tableName: row.table_name,
    operation: row.operation,
    kind: row.policy_type === 'RESTRICTIVE' ? 'restrictive' : 'permissive',
    ...(row.using_expr !== null ? { usingExpr: row.using_expr } : {}),
    ...(row.check_expr !== null ? { checkExpr: row.check_expr } : {}),
  };
}

const expression = z.string().trim().min(1);

const policyInputSchema = z
  .object({
    name: z.string().trim().min(1),
    tableName: z.string().regex(PLAIN_IDENTIFIER, 'table name must be a plain identifier'),
    operation: z.enum(['select', 'insert', 'update', 'delete', 'all']).default('all'),
    kind: z.enum(['permissive', 'restrictive']).default('permissive'),
    description: z.string().optional(),
    usingExpr: expression.optional(),
    checkExpr: expression.optional(),
    isEnabled: z.boolean().default(true),
  })
  .refine((p) => p.usingExpr !== undefined || p.checkExpr !== undefined, {
    message: 'a policy needs a USING or a WITH CHECK expression',
    path: ['usingExpr'],
  });

const SELECT_COLUMNS =
  'id, name, description, is_enabled, table_name, operation, policy_type, using_expr, check_expr';

/**
 * SQLite-based policy store
 */
export class SqlitePolicyStore implements PolicyStore {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    ensurePolicyTable(db);
  }

  async policiesFor(tableName: string, operation: Operation): Promise<readonly Policy[]> {
    return this.query(
      `SELECT ${SELECT_COLUMNS} FROM ${POLICY_TABLE}
       WHERE table_name = ?
       AND is_enabled = 1
       AND (operation = ? OR operation = 'all')
       ORDER BY id`,
      [tableName, operation]
    );
  }

  async listPolicies(tableName?: string): Promise<readonly Policy[]> {
    if (tableName === undefined) {
      return this.query(`SELECT ${SELECT_COLUMNS} FROM ${POLICY_TABLE} ORDER BY id`, []);
    }
    return this.query(
      `SELECT ${SELECT_COLUMNS} FROM ${POLICY_TABLE} WHERE table_name = ? ORDER BY id`,
      [tableName]
    );
  }

  async createPolicy(input: PolicyInput): Promise<Policy> {
    const parsed = policyInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new PolicyDefinitionError(
        parsed.error.issues[0]?.message ?? 'invalid policy definition',
        parsed.error.issues
      );
    }
    const policy = parsed.data;

    if (await this.findByName(policy.name)) {
      throw new PolicyConflictError(policy.name);
    }

    const info = this.db
      .prepare(
        `INSERT INTO ${POLICY_TABLE}
           (name, description, is_enabled, table_name, operation, policy_type, using_expr, check_expr)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        policy.name,
        policy.description ?? null,
        policy.isEnabled ? 1 : 0,
        policy.tableName,
        policy.operation,
        policy.kind === 'restrictive' ? 'RESTRICTIVE' : 'PERMISSIVE',
        policy.usingExpr ?? null,
        policy.checkExpr ?? null
      );

    const created = await this.findById(Number(info.lastInsertRowid));
    if (!created) {
      throw new CatalogError(`Policy '${policy.name}' was not stored`);
    }
    return created;
  }

  async setEnabled(name: string, enabled: boolean): Promise<Policy> {
    const info = this.db
      .prepare(`UPDATE ${POLICY_TABLE} SET is_enabled = ? WHERE name = ?`)
      .run(enabled ? 1 : 0, name);

    const policy = info.changes > 0 ? await this.findByName(name) : null;
    if (!policy) {
      throw new NotFoundError(`Policy '${name}' not found`, { name });
    }
    return policy;
  }

  /**
   * Apply an administrative statement (CREATE POLICY, ALTER POLICY ... ENABLE|DISABLE)
   */
  async execute(sql: string): Promise<Policy> {
    const statement = parsePolicyStatement(sql);
    if (!statement) {
      throw new PolicyDefinitionError('Not a policy statement', { sql });
    }

    switch (statement.type) {
      case 'create_policy':
        return this.createPolicy(statement.policy);
      case 'enable_policy':
      case 'disable_policy': {
        const existing = await this.findByName(statement.policyName);
        if (!existing || existing.tableName !== statement.tableName) {
          throw new NotFoundError(
            `Policy '${statement.policyName}' not found on table '${statement.tableName}'`,
            { name: statement.policyName, table: statement.tableName }
          );
        }
        return this.setEnabled(statement.policyName, statement.type === 'enable_policy');
      }
    }
  }

  private async findByName(name: string): Promise<Policy | null> {
    const [policy] = await this.query(
      `SELECT ${SELECT_COLUMNS} FROM ${POLICY_TABLE} WHERE name = ?`,
      [name]
    );
    return policy ?? null;
  }

  private async findById(id: number): Promise<Policy | null> {
    const [policy] = await this.query(
      `SELECT ${SELECT_COLUMNS} FROM ${POLICY_TABLE} WHERE id = ?`,
      [id]
    );
    return policy ?? null;
  }

  private query(sql: string, params: readonly unknown[]): Policy[] {
    let rows: unknown[];
    try {
      rows = this.db.prepare(sql).all(...params);
    } catch (error) {
      throw new CatalogError('Policy store query failed', error);
    }

    const parsed = z.array(policyRowSchema).safeParse(rows);
    if (!parsed.success) {
      throw new CatalogError('Policy store returned malformed rows', parsed.error);
    }
    return parsed.data.map(rowToPolicy);
  }
}
