/**
 * A cell value as seen by the comparison engine, after the workbook adapter has
 * resolved formulas, rich text, hyperlinks and error codes to plain values.
 */
export type CellValue = number | string | boolean | Date | null;

// Decimal notation with optional sign, fraction and exponent: "42", "-3.", ".5", "+1e-5".
// "nan" is not accepted, so a cell holding that text compares as text.
const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INFINITE_TEXT = /^[+-]?inf(inity)?$/i;

/**
 * Null and the empty string are both "empty", and are treated as the same value.
 */
export function isEmptyValue(value: CellValue): value is null | '' {
  return value === null || value === '';
}

/**
 * Converts a cell value to a float. Null converts to 0, booleans to 1 or 0, and strings
 * are parsed after trimming whitespace. Throws a TypeError for anything else.
 */
export function toFloat(value: CellValue): number {
  if (value === null) { return 0; }
  if (typeof value === 'number') { return value; }
  if (typeof value === 'boolean') { return value ? 1 : 0; }
  if (typeof value === 'string') {
    const text = value.trim();
    if (NUMERIC_TEXT.test(text)) { return parseFloat(text); }
    if (INFINITE_TEXT.test(text)) { return text.startsWith('-') ? -Infinity : Infinity; }
    throw new TypeError(`could not convert string to float: '${value}'`);
  }
  throw new TypeError(`cannot convert a date to float: ${value.toISOString()}`);
}

/**
 * Returns true for non-empty values that toFloat() accepts. NaN is not numeric.
 */
export function isNumeric(value: CellValue): boolean {
  if (isEmptyValue(value)) { return false; }
  if (typeof value === 'number') { return !Number.isNaN(value); }
  try {
    toFloat(value);
    return true;
  } catch (e) {
    return false;
  }
}

/**
 * Strict equality without coercion: 5 and "5" differ, as do true and 1. Dates are equal
 * when they denote the same instant.
 */
export function cellValuesEqual(a: CellValue, b: CellValue): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return a === b;
}
