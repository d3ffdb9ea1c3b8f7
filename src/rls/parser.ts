/**
 * Policy Statement Parser
 *
 * Parses the administrative statements policies are managed with:
 * - CREATE POLICY name ON table [AS PERMISSIVE|RESTRICTIVE] [FOR op]
 *   [USING (expr)] [WITH CHECK (expr)]
 * - ALTER POLICY name ON table ENABLE|DISABLE
 *
 * Expressions are kept verbatim; only their surrounding parentheses are
 * located (with nesting and quoted strings taken into account).
 */

import { stripQuotes } from '../utils/identifier.js';
import type { PolicyInput, PolicyKind, PolicyOperation, PolicyStatement } from './types.js';

const NAME = String.raw`("[^"]+"|\w+)`;

const OPERATIONS: Record<string, PolicyOperation> = {
  SELECT: 'select',
  INSERT: 'insert',
  UPDATE: 'update',
  DELETE: 'delete',
  ALL: 'all',
};

const KINDS: Record<string, PolicyKind> = {
  PERMISSIVE: 'permissive',
  RESTRICTIVE: 'restrictive',
};

/**
 * Parse a policy statement from SQL
 * Returns null if the statement is not a policy statement
 */
export function parsePolicyStatement(sql: string): PolicyStatement | null {
  const normalized = normalizeStatement(sql).replace(/;$/, '').trim();

  if (!normalized) {
    return null;
  }

  return parseAlterPolicy(normalized) ?? parseCreatePolicy(normalized);
}

/**
 * Drop `--` comments and collapse whitespace, leaving quoted text untouched
 */
function normalizeStatement(sql: string): string {
  let out = '';
  let quote: string | null = null;
  let i = 0;

  while (i < sql.length) {
    const ch = sql.charAt(i);

    if (quote !== null) {
      out += ch;
      if (ch === quote) quote = null;
      i++;
    } else if (ch === "'" || ch === '"') {
      quote = ch;
      out += ch;
      i++;
    } else if (ch === '-' && sql.charAt(i + 1) === '-') {
      const end = sql.indexOf('\n', i);
      i = end === -1 ? sql.length : end;
    } else if (/\s/.test(ch)) {
      if (out.length > 0 && !out.endsWith(' ')) out += ' ';
      while (i < sql.length && /\s/.test(sql.charAt(i))) i++;
    } else {
      out += ch;
      i++;
    }
  }

  return out.trim();
}

/**
 * Parse ALTER POLICY ... ENABLE|DISABLE
 */
function parseAlterPolicy(sql: string): PolicyStatement | null {
  const pattern = new RegExp(`^ALTER POLICY ${NAME} ON ${NAME} (ENABLE|DISABLE)$`, 'i');
  const match = pattern.exec(sql);

  if (!match) {
    return null;
  }

  const [, policyName, tableName, action] = match;
  return {
    type: action!.toUpperCase() === 'ENABLE' ? 'enable_policy' : 'disable_policy',
    policyName: stripQuotes(policyName!),
    tableName: stripQuotes(tableName!),
  };
}

/**
 * Parse CREATE POLICY
 */
function parseCreatePolicy(sql: string): PolicyStatement | null {
  const pattern = new RegExp(
    `^CREATE POLICY ${NAME} ON ${NAME}(?: AS (PERMISSIVE|RESTRICTIVE))?(?: FOR (SELECT|INSERT|UPDATE|DELETE|ALL))?(.*)$`,
    'i'
  );
  const match = pattern.exec(sql);

  if (!match) {
    return null;
  }

  const [, policyName, tableName, kind, operation, rest] = match;

  const clauses = parseClauses(rest ?? '');
  if (!clauses) {
    return null;
  }

  const policy: PolicyInput = {
    name: stripQuotes(policyName!),
    tableName: stripQuotes(tableName!),
    operation: (operation ? OPERATIONS[operation.toUpperCase()] : undefined) ?? 'all',
    kind: (kind ? KINDS[kind.toUpperCase()] : undefined) ?? 'permissive',
    usingExpr: clauses.using,
    checkExpr: clauses.check,
  };

  return { type: 'create_policy', policy };
}

/**
 * Parse the trailing `USING (...)` / `WITH CHECK (...)` clauses
 */
function parseClauses(input: string): { using?: string; check?: string } | null {
  const clauses: { using?: string; check?: string } = {};
  let rest = input.trim();

  while (rest.length > 0) {
    const keyword = /^(USING|WITH CHECK)\s*\(/i.exec(rest);
    if (!keyword) {
      return null;
    }

    const open = keyword[0].length - 1;
    const close = findClosingParen(rest, open);
    if (close === -1) {
      return null;
    }

    const expr = rest.slice(open + 1, close).trim();
    if (keyword[1]!.toUpperCase() === 'USING') {
      clauses.using = expr;
    } else {
      clauses.check = expr;
    }
    rest = rest.slice(close + 1).trim();
  }

  return clauses;
}

/**
 * Index of the parenthesis closing the one at `open`, skipping quoted text
 */
function findClosingParen(text: string, open: number): number {
  let depth = 0;
  let quote: string | null = null;

  for (let i = open; i < text.length; i++) {
    const ch = text[i];

    if (quote !== null) {
      if (ch === quote) {
        // doubled quote is an escaped quote inside the literal
        if (text[i + 1] === quote) {
          i++;
        } else {
          quote = null;
        }
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }

  return -1;
}
