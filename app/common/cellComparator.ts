import {CellValue, cellValuesEqual, isEmptyValue, isNumeric, toFloat} from 'app/common/CellValue';

export type DifferenceKind = 'numeric' | 'textual';

/**
 * The value to write into the output cell, and how the difference is counted.
 */
export interface CellChange {
  kind: DifferenceKind;
  value: CellValue;
}

export interface NumericParser {
  isNumeric(value: CellValue): boolean;
  toFloat(value: CellValue): number;
}

export const defaultNumericParser: NumericParser = {isNumeric, toFloat};

/**
 * Handling of a new value that passes isNumeric() but fails toFloat(), when the previous
 * value is not numeric. 'skip' records nothing and leaves the output cell alone; 'textual'
 * writes the new value as a textual difference, like the numeric-to-numeric case does.
 */
export type MixedParseFailure = 'skip' | 'textual';

export const MIXED_PARSE_FAILURE_MODES: readonly MixedParseFailure[] = ['skip', 'textual'];

export function isMixedParseFailure(value: string): value is MixedParseFailure {
  return MIXED_PARSE_FAILURE_MODES.some(mode => mode === value);
}

export interface CellCompareOptions {
  parser?: NumericParser;
  mixedParseFailure?: MixedParseFailure;
}

/**
 * Decides what, if anything, goes into the output cell for one coordinate. Returns null
 * when there is no difference to record.
 *
 *  - both empty, or equal under cellValuesEqual(): nothing.
 *  - both numeric: the delta new - prev, numeric.
 *  - only new numeric: the new value as a number, numeric.
 *  - only prev numeric, or neither: the new value as is, textual.
 */
export function compareCell(newValue: CellValue, prevValue: CellValue,
                            options: CellCompareOptions = {}): CellChange|null {
  if (isEmptyValue(newValue) && isEmptyValue(prevValue)) { return null; }
  if (cellValuesEqual(newValue, prevValue)) { return null; }

  const parser = options.parser || defaultNumericParser;
  const newIsNumeric = parser.isNumeric(newValue);
  const prevIsNumeric = parser.isNumeric(prevValue);

  if (newIsNumeric && prevIsNumeric) {
    const newNum = tryFloat(parser, newValue);
    const prevNum = tryFloat(parser, prevValue);
    if (newNum === undefined || prevNum === undefined) {
      return {kind: 'textual', value: newValue};
    }
    return {kind: 'numeric', value: newNum - prevNum};
  }

  if (newIsNumeric) {
    const newNum = tryFloat(parser, newValue);
    if (newNum === undefined) {
      return options.mixedParseFailure === 'textual' ? {kind: 'textual', value: newValue} : null;
    }
    return {kind: 'numeric', value: newNum};
  }

  return {kind: 'textual', value: newValue};
}

function tryFloat(parser: NumericParser, value: CellValue): number|undefined {
  try {
    return parser.toFloat(value);
  } catch (e) {
    return undefined;
  }
}
