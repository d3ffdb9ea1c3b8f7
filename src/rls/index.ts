/**
 * Row-Level Security (RLS) Module
 *
 * Policy registry (`_policies`), administrative statement parser, predicate
 * merging and request context binding.
 */

// Storage
export { SqlitePolicyStore, ensurePolicyTable } from './storage.js';

// Administrative statements
export { parsePolicyStatement } from './parser.js';

// Predicate merging
export { ALLOW, DENY, appliesTo, mergePolicies, predicateSql } from './predicate.js';

// Request context binding
export { bindContext, type BoundFragment } from './context.js';

// Types
export { OPERATIONS } from './types.js';
export type {
  Operation,
  Policy,
  PolicyInput,
  PolicyKind,
  PolicyOperation,
  PolicyPredicates,
  PolicyStatement,
  PolicyStore,
  Predicate,
} from './types.js';
