/**
 * SQL Escaping Utilities
 *
 * Filter expressions for LanceDB are plain SQL strings; every value placed in
 * one goes through these helpers.
 *
 * @module utils/sql
 */

/**
 * Escape a string literal body for a single-quoted SQL string
 *
 * Quotes are doubled, backslashes doubled, and NUL and non-whitespace
 * control characters removed.
 *
 * @example
 * ```typescript
 * escapeSqlString("it's");
 * // => "it''s"
 * ```
 */
export function escapeSqlString(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "''")
    .replace(/[\x00-\x08\x0b\x0c\x0e-\x1f]/g, '');
}

/**
 * `column IN ('a', 'b')` filter for a non-empty list of string values
 *
 * @example
 * ```typescript
 * inFilter('id', ['a', "b'c"]);
 * // => "id IN ('a', 'b''c')"
 * ```
 */
export function inFilter(column: string, values: readonly string[]): string {
  if (values.length === 0) {
    throw new Error('inFilter requires at least one value');
  }
  const list = values.map((value) => `'${escapeSqlString(value)}'`).join(', ');
  return `${column} IN (${list})`;
}
