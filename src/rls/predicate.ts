/**
 * Policy predicate merging
 *
 * Turns the enabled policies of a table into the two conditions a statement
 * needs: `using` (which existing rows are visible) and `check` (what written
 * rows must satisfy).
 *
 *   (P1 OR P2) AND R1 AND R2
 *
 * A table with no enabled policy is unrestricted; a table with policies but no
 * permissive one for the operation denies everything.
 */

import { ALLOW_ALL_SQL, DENY_ALL_SQL } from '../utils/constants.js';
import type { Operation, Policy, PolicyPredicates, Predicate } from './types.js';

export const ALLOW: Predicate = Object.freeze({ type: 'allow' });
export const DENY: Predicate = Object.freeze({ type: 'deny' });

const UNRESTRICTED: PolicyPredicates = Object.freeze({ using: ALLOW, check: ALLOW });

/**
 * Whether an enabled policy governs `operation`
 */
export function appliesTo(policy: Policy, operation: Operation): boolean {
  return policy.isEnabled && (policy.operation === operation || policy.operation === 'all');
}

/**
 * Merge a table's policies into the predicates for one operation
 *
 * @param tablePolicies - every policy defined on the table (disabled ones are ignored)
 */
export function mergePolicies(
  tablePolicies: readonly Policy[],
  operation: Operation
): PolicyPredicates {
  const enabled = tablePolicies.filter((p) => p.isEnabled);
  if (enabled.length === 0) {
    return UNRESTRICTED;
  }

  const applicable = enabled.filter((p) => appliesTo(p, operation));

  const filtersRows = operation !== 'insert';
  const validatesRows = operation === 'insert' || operation === 'update';

  return {
    using: filtersRows ? mergeClause(applicable, (p) => p.usingExpr) : ALLOW,
    check: validatesRows ? mergeClause(applicable, (p) => p.checkExpr ?? p.usingExpr) : ALLOW,
  };
}

/**
 * Combine one clause across policies.
 *
 * A permissive policy without an expression for the clause grants nothing
 * through it; a restrictive one without an expression places no constraint.
 */
function mergeClause(
  policies: readonly Policy[],
  pick: (policy: Policy) => string | undefined
): Predicate {
  const granted = policies
    .filter((p) => p.kind === 'permissive')
    .map(pick)
    .filter(isDefined);
  if (granted.length === 0) {
    return DENY;
  }

  const terms = [
    granted.length === 1 ? `(${granted[0]})` : `(${granted.map((e) => `(${e})`).join(' OR ')})`,
  ];

  for (const expr of policies.filter((p) => p.kind === 'restrictive').map(pick)) {
    if (expr !== undefined) {
      terms.push(`(${expr})`);
    }
  }

  return { type: 'expr', sql: terms.join(' AND ') };
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined;
}

/**
 * SQL text of a predicate, for use inside WHERE or CASE WHEN
 */
export function predicateSql(predicate: Predicate): string {
  switch (predicate.type) {
    case 'allow':
      return ALLOW_ALL_SQL;
    case 'deny':
      return DENY_ALL_SQL;
    case 'expr':
      return predicate.sql;
  }
}
