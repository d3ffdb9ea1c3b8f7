/**
 * Value Mapper
 *
 * Converts untyped payload values into a closed set of parameter kinds that
 * can be bound into a statement. The mapping is total: every input has a kind.
 * No coercion against the column's declared type happens here; mismatches
 * surface as execution errors from the database.
 */

/**
 * Untyped payload value (JSON value, plus bigint from lossless parsers)
 */
export type PayloadValue =
  | null
  | undefined
  | boolean
  | number
  | bigint
  | string
  | readonly PayloadValue[]
  | { readonly [key: string]: PayloadValue };

/**
 * Typed statement parameter
 */
export type TypedParam =
  | { readonly kind: 'null' }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'int'; readonly value: bigint }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'json'; readonly value: readonly PayloadValue[] | { readonly [key: string]: PayloadValue } };

export type ParamKind = TypedParam['kind'];

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const NULL_PARAM: TypedParam = Object.freeze({ kind: 'null' });

/**
 * Map an untyped value to a typed parameter
 *
 * @example
 * mapValue(42) // => { kind: 'int', value: 42n }
 * mapValue(3.14) // => { kind: 'float', value: 3.14 }
 * mapValue(2n ** 70n) // => { kind: 'text', value: '1180591620717411303424' }
 */
export function mapValue(value: PayloadValue): TypedParam {
  if (value === null || value === undefined) {
    return NULL_PARAM;
  }

  switch (typeof value) {
    case 'boolean':
      return { kind: 'bool', value };
    case 'bigint':
      return value >= INT64_MIN && value <= INT64_MAX
        ? { kind: 'int', value }
        : { kind: 'text', value: value.toString() };
    case 'number':
      if (Number.isInteger(value)) {
        const int = BigInt(value);
        if (int >= INT64_MIN && int <= INT64_MAX) {
          return { kind: 'int', value: int };
        }
      }
      if (Number.isFinite(value)) {
        return { kind: 'float', value };
      }
      return { kind: 'text', value: String(value) };
    case 'string':
      return { kind: 'text', value };
    default:
      return { kind: 'json', value };
  }
}

/**
 * Value handed to the SQLite driver for a parameter.
 *
 * SQLite has no boolean or JSON storage class: booleans bind as 1/0 and JSON
 * binds as its text (the statement wraps the placeholder in `json(?)`).
 */
export function toBindable(param: TypedParam): null | number | bigint | string {
  switch (param.kind) {
    case 'null':
      return null;
    case 'bool':
      return param.value ? 1 : 0;
    case 'int':
      return param.value;
    case 'float':
      return param.value;
    case 'text':
      return param.value;
    case 'json':
      return JSON.stringify(param.value, (_key, v: unknown) =>
        typeof v === 'bigint' ? v.toString() : v
      );
  }
}

/**
 * Convert a parameter back into a JSON value
 */
export function toJsonValue(param: TypedParam): unknown {
  switch (param.kind) {
    case 'null':
      return null;
    case 'int':
      return param.value >= BigInt(Number.MIN_SAFE_INTEGER) &&
        param.value <= BigInt(Number.MAX_SAFE_INTEGER)
        ? Number(param.value)
        : param.value.toString();
    case 'bool':
    case 'float':
    case 'text':
    case 'json':
      return param.value;
  }
}

/**
 * SQL placeholder for a parameter
 */
export function placeholder(param: TypedParam): string {
  return param.kind === 'json' ? 'json(?)' : '?';
}
