/**
 * SQL Identifier Utilities
 *
 * Identifiers (table and column names) cannot be bound as parameters, so they
 * are only ever spliced into SQL after passing `isPlainIdentifier`.
 */

/**
 * Shape every interpolated identifier must have
 */
export const PLAIN_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Check whether a name is a plain identifier (letters, digits, underscore,
 * not starting with a digit)
 *
 * @example
 * isPlainIdentifier('role_id') // => true
 * isPlainIdentifier('name; DROP TABLE users') // => false
 */
export function isPlainIdentifier(name: string): boolean {
  return PLAIN_IDENTIFIER.test(name);
}

/**
 * Escape a SQL identifier by wrapping in double quotes and escaping internal quotes
 *
 * @example
 * escapeIdentifier('users') // => "users"
 * escapeIdentifier('user"s') // => "user""s"
 */
export function escapeIdentifier(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

/**
 * Quote a value as a SQL string literal
 *
 * @example
 * quoteLiteral("it's") // => 'it''s'
 */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Quote a schema-qualified table name
 *
 * @example
 * qualifiedName('main', 'users') // => "main"."users"
 */
export function qualifiedName(schema: string, table: string): string {
  return `${escapeIdentifier(schema)}.${escapeIdentifier(table)}`;
}

/**
 * Remove surrounding quotes from an identifier
 *
 * @example
 * stripQuotes('"users"') // => 'users'
 * stripQuotes('users') // => 'users'
 */
export function stripQuotes(identifier: string): string {
  return identifier.replace(/^["'`]|["'`]$/g, '');
}
