/**
 * Request context binding for policy expressions
 *
 * Policy fragments may call `auth.uid()` and `auth.role()`. Each call is
 * replaced by a `?` placeholder and the matching value is appended to the
 * parameter list, so request data never becomes SQL text.
 */

import type { RequestContext } from '../auth/types.js';
import { mapValue, type TypedParam } from '../values/index.js';

const AUTH_FUNCTION = /^auth\.(uid|role)\(\s*\)/i;

/**
 * SQL fragment with its bound parameters, in placeholder order
 */
export interface BoundFragment {
  readonly sql: string;
  readonly params: readonly TypedParam[];
}

/**
 * Replace auth functions in a policy expression with bound parameters.
 *
 * Text inside single-quoted literals and double-quoted identifiers is left
 * untouched.
 */
export function bindContext(expression: string, context: RequestContext): BoundFragment {
  const params: TypedParam[] = [];
  let sql = '';
  let quote: string | null = null;

  for (let i = 0; i < expression.length; i++) {
    const ch = expression[i] ?? '';

    if (quote !== null) {
      sql += ch;
      if (ch === quote) {
        quote = null;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      sql += ch;
      continue;
    }

    const match = ch === 'a' || ch === 'A' ? AUTH_FUNCTION.exec(expression.slice(i)) : null;
    if (match && !isIdentifierChar(expression[i - 1])) {
      const fn = match[1]?.toLowerCase();
      params.push(mapValue(fn === 'uid' ? (context.subject ?? null) : context.role));
      sql += '?';
      i += match[0].length - 1;
      continue;
    }

    sql += ch;
  }

  return { sql, params };
}

function isIdentifierChar(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_.]/.test(ch);
}
