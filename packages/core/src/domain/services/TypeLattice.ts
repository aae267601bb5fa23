import { ColumnType, joinColumnTypes } from '../model/ColumnType.js';

// ASCII whitespace (space, tab, LF, VT, FF, CR); values are trimmed of these on both ends.
const INTEGER_SHAPE = /^[ \t\n\v\f\r]*[+-]?\d+[ \t\n\v\f\r]*$/;
const REAL_SHAPE = /^[ \t\n\v\f\r]*[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?[ \t\n\v\f\r]*$/;

/** Optional sign followed by one or more decimal digits. */
export function isIntegerShaped(value: string): boolean {
  return INTEGER_SHAPE.test(value);
}

/**
 * Optional sign, digits with at most one decimal point (at least one digit on
 * either side of it), then an optional exponent with its own optional sign and
 * at least one digit.
 */
export function isRealShaped(value: string): boolean {
  return REAL_SHAPE.test(value);
}

/**
 * The narrowest type that describes a single non-empty value. Total over all
 * strings: anything neither integer- nor real-shaped is `TEXT`.
 */
export function classifyValue(value: string): ColumnType {
  if (isIntegerShaped(value)) return ColumnType.INTEGER;
  if (isRealShaped(value)) return ColumnType.REAL;
  return ColumnType.TEXT;
}

/**
 * Advance a column's type with one more cell value. Empty values carry no
 * evidence and a `TEXT` column is never looked at again.
 */
export function observeValue(current: ColumnType, value: string): ColumnType {
  if (value === '' || current === ColumnType.TEXT) return current;
  return joinColumnTypes(current, classifyValue(value));
}
