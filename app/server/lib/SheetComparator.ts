import {CellValue} from 'app/common/CellValue';
import {CellCompareOptions, compareCell} from 'app/common/cellComparator';
import {createSheetResult, recordDifference, SheetResult} from 'app/common/ComparisonResults';
import {getErrorMessage} from 'app/common/ErrorWithCode';
import log from 'app/server/lib/log';

/**
 * A sheet that can be read by 1-based (row, col). maxRow and maxColumn give the extent
 * of the occupied area.
 */
export interface ReadableSheet {
  readonly name: string;
  readonly maxRow: number;
  readonly maxColumn: number;
  getValue(row: number, col: number): CellValue;
}

/**
 * A sheet that receives the computed values. highlight() marks a cell as changed.
 */
export interface AnnotatableSheet {
  setValue(row: number, col: number, value: CellValue): void;
  highlight(row: number, col: number): void;
}

/**
 * Compares one sheet of the new and previous workbooks, writing each difference into the
 * output sheet and highlighting it. Every coordinate of the union of both extents is visited in
 * row-major order, and counts towards cellsCompared whatever happens to it. An error at a single
 * cell is logged and recorded in cellErrors, and the traversal moves on to the next cell.
 */
export function compareSheet(newSheet: ReadableSheet, prevSheet: ReadableSheet, outputSheet: AnnotatableSheet,
                             options: CellCompareOptions = {}): SheetResult {
  const maxRow = Math.max(newSheet.maxRow, prevSheet.maxRow);
  const maxCol = Math.max(newSheet.maxColumn, prevSheet.maxColumn);
  const result = createSheetResult(newSheet.name, maxRow, maxCol);

  for (let row = 1; row <= maxRow; row++) {
    for (let col = 1; col <= maxCol; col++) {
      result.cellsCompared++;
      try {
        const newValue = newSheet.getValue(row, col);
        const prevValue = prevSheet.getValue(row, col);

        const change = compareCell(newValue, prevValue, options);
        if (!change) { continue; }

        outputSheet.setValue(row, col, change.value);
        outputSheet.highlight(row, col);
        recordDifference(result, row, col, change);
      } catch (e) {
        const message = `Error processing cell ${row},${col}: ${getErrorMessage(e)}`;
        log.warn("Sheet %s: %s", newSheet.name, message);
        result.cellErrors.push(message);
      }
    }
  }

  if (result.differencesFound) {
    log.info("Found %s differences in sheet '%s' (%s numeric, %s text)",
      result.differencesCount, result.sheetName, result.numericDifferences, result.textDifferences);
  }
  return result;
}
