/**
 * Normalization utility functions
 *
 * Common helpers for mapping vendor CSV cells onto canonical records.
 */

const DECIMAL_NUMBER_REGEX = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Strip surrounding whitespace from a CSV header cell
 */
export function trimColumnName(column: string): string {
  return column.trim();
}

/**
 * Coerce a CSV cell to a number
 *
 * Only plain decimal notation is accepted (no hex, no `Infinity`). Anything
 * else becomes NaN rather than throwing:
 * - `' 12.5 '` -> 12.5
 * - `''` -> NaN
 * - `'n/a'` -> NaN
 *
 * @param value - Raw cell text (undefined when the row is short)
 */
export function coerceNumber(value: string | undefined): number {
  if (value === undefined) {
    return NaN;
  }

  const trimmed = value.trim();
  if (!DECIMAL_NUMBER_REGEX.test(trimmed)) {
    return NaN;
  }

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : NaN;
}

/**
 * Build a lookup from trimmed column name to the column's original spelling
 *
 * When two columns trim to the same name the first one wins.
 */
export function indexColumns(columns: readonly string[]): Map<string, string> {
  const index = new Map<string, string>();
  for (const column of columns) {
    const trimmed = trimColumnName(column);
    if (!index.has(trimmed)) {
      index.set(trimmed, column);
    }
  }
  return index;
}
