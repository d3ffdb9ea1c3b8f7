/**
 * Row Level Security (RLS) Type Definitions
 *
 * Policies are opaque boolean SQL fragments stored in the `_policies` table.
 * `using` filters the existing rows an operation can see, `check` constrains
 * the rows it writes.
 */

/**
 * Operation a policy applies to; `all` matches every operation
 */
export type PolicyOperation = 'select' | 'insert' | 'update' | 'delete' | 'all';

/**
 * Concrete operation a statement performs
 */
export type Operation = Exclude<PolicyOperation, 'all'>;

export const OPERATIONS: readonly Operation[] = ['select', 'insert', 'update', 'delete'];

/**
 * Permissive policies are OR-combined, restrictive ones AND-combined on top
 */
export type PolicyKind = 'permissive' | 'restrictive';

/**
 * Stored policy
 */
export interface Policy {
  readonly id: number;
  readonly name: string;
  readonly description?: string;
  readonly isEnabled: boolean;
  readonly tableName: string;
  readonly operation: PolicyOperation;
  readonly kind: PolicyKind;
  /** Row visibility expression (select, update, delete) */
  readonly usingExpr?: string;
  /** Written-row expression (insert, update) */
  readonly checkExpr?: string;
}

/**
 * Input for creating a policy
 */
export interface PolicyInput {
  readonly name: string;
  readonly tableName: string;
  readonly operation?: PolicyOperation | undefined;
  readonly kind?: PolicyKind | undefined;
  readonly description?: string | undefined;
  readonly usingExpr?: string | undefined;
  readonly checkExpr?: string | undefined;
  readonly isEnabled?: boolean | undefined;
}

/**
 * Merged condition for one clause of one statement
 */
export type Predicate =
  | { readonly type: 'allow' }
  | { readonly type: 'deny' }
  | { readonly type: 'expr'; readonly sql: string };

/**
 * Result of merging the policies that apply to one operation
 */
export interface PolicyPredicates {
  /** Which existing rows the operation may see */
  readonly using: Predicate;
  /** What the written rows must satisfy */
  readonly check: Predicate;
}

/**
 * Policy store interface
 */
export interface PolicyStore {
  /**
   * Enabled policies for a table whose operation is `operation` or `all`
   */
  policiesFor(tableName: string, operation: Operation): Promise<readonly Policy[]>;

  /**
   * All policies, enabled or not, optionally for one table
   */
  listPolicies(tableName?: string): Promise<readonly Policy[]>;

  createPolicy(input: PolicyInput): Promise<Policy>;

  /**
   * Enable or retire a policy; policies are never deleted
   */
  setEnabled(name: string, enabled: boolean): Promise<Policy>;
}

/**
 * Parsed administrative statement
 */
export type PolicyStatement =
  | {
      readonly type: 'create_policy';
      readonly policy: PolicyInput;
    }
  | {
      readonly type: 'enable_policy';
      readonly policyName: string;
      readonly tableName: string;
    }
  | {
      readonly type: 'disable_policy';
      readonly policyName: string;
      readonly tableName: string;
    };
