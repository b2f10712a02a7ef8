import type { CellValue } from '../types/index.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Convert a cell string to a number where it reads as one.
 *
 * - `''` becomes `emptyValue`
 * - integers and decimals become numbers; integers too large to hold
 *   exactly stay strings
 * - everything else is returned unchanged
 */
export function numericise<E = string>(value: CellValue, emptyValue?: E): CellValue | E {
  if (value === '') {
    return emptyValue === undefined ? '' : emptyValue;
  }
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  if (INTEGER_PATTERN.test(trimmed)) {
    const parsed = parseInt(trimmed, 10);
    // beyond 2^53 a number would drop digits
    return Number.isSafeInteger(parsed) ? parsed : value;
  }
  if (FLOAT_PATTERN.test(trimmed) || /^[+-]?(inf|infinity)$/i.test(trimmed)) {
    return parseFloat(trimmed.replace(/^([+-]?)inf(inity)?$/i, '$1Infinity'));
  }
  return value;
}

export function numericiseAll<E = string>(values: CellValue[], emptyValue?: E): Array<CellValue | E> {
  return values.map(value => numericise(value, emptyValue));
}

/**
 * Normalize an API cell value (`string | number | boolean | null | undefined`)
 */
export function toCellValue(value: unknown): CellValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return value === null || value === undefined ? '' : String(value);
}

/**
 * Pad every row of a matrix to `width` with `fill`
 */
export function padRows<T>(rows: T[][], width: number, fill: T): T[][] {
  return rows.map(row => (row.length >= width ? row : [...row, ...Array<T>(width - row.length).fill(fill)]));
}

/**
 * Length of the longest row
 */
export function maxLineLength(lines: unknown[][]): number {
  return lines.reduce((longest, line) => (line.length > longest ? line.length : longest), 0);
}
