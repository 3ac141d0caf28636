import {getCellAddress} from 'app/common/cellAddress';
import {CellValue} from 'app/common/CellValue';
import {CellChange, DifferenceKind} from 'app/common/cellComparator';

/**
 * One recorded difference, at a 1-based coordinate.
 */
export interface CellDifference {
  kind: DifferenceKind;
  row: number;
  col: number;
  address: string;      // A1-style reference, e.g. "C2".
  value: CellValue;     // value written to the output cell.
}

export interface SheetResult {
  sheetName: string;
  maxRow: number;
  maxColumn: number;
  cellsCompared: number;
  differencesCount: number;
  numericDifferences: number;
  textDifferences: number;
  differencesFound: boolean;
  differences: CellDifference[];
  cellErrors: string[];
}

export type FileStatus = 'completed' | 'failed';

export interface FileResult {
  filename: string;
  outputPath: string;
  status: FileStatus;
  sheetsProcessed: string[];
  totalDifferences: number;
  sheetDetails: {[sheetName: string]: SheetResult};
  errors: string[];
  warnings: string[];
}

export interface RunSummary {
  timestamp: string;
  filesProcessed: FileResult[];
  totalDifferences: number;
  errors: string[];
  warnings: string[];
}

export function createSheetResult(sheetName: string, maxRow: number, maxColumn: number): SheetResult {
  return {
    sheetName,
    maxRow,
    maxColumn,
    cellsCompared: 0,
    differencesCount: 0,
    numericDifferences: 0,
    textDifferences: 0,
    differencesFound: false,
    differences: [],
    cellErrors: [],
  };
}

/**
 * Counts a difference in a sheet result. All counters are updated together, so that
 * differencesCount is always the sum of numericDifferences and textDifferences.
 */
export function recordDifference(result: SheetResult, row: number, col: number, change: CellChange) {
  result.differences.push({
    kind: change.kind,
    row,
    col,
    address: getCellAddress(row, col),
    value: change.value,
  });
  result.differencesCount++;
  if (change.kind === 'numeric') {
    result.numericDifferences++;
  } else {
    result.textDifferences++;
  }
  result.differencesFound = true;
}

export function createFileResult(filename: string, outputPath: string): FileResult {
  return {
    filename,
    outputPath,
    status: 'failed',
    sheetsProcessed: [],
    totalDifferences: 0,
    sheetDetails: {},
    errors: [],
    warnings: [],
  };
}

/**
 * Adds a finished sheet to a file result.
 */
export function addSheetResult(fileResult: FileResult, sheetResult: SheetResult) {
  fileResult.sheetDetails[sheetResult.sheetName] = sheetResult;
  fileResult.sheetsProcessed.push(sheetResult.sheetName);
  fileResult.totalDifferences += sheetResult.differencesCount;
}

export function createRunSummary(timestamp: Date = new Date()): RunSummary {
  return {
    timestamp: timestamp.toISOString(),
    filesProcessed: [],
    totalDifferences: 0,
    errors: [],
    warnings: [],
  };
}

/**
 * Adds a finished file to the run summary, carrying its errors and warnings up to the run.
 */
export function addFileResult(summary: RunSummary, fileResult: FileResult) {
  summary.filesProcessed.push(fileResult);
  summary.totalDifferences += fileResult.totalDifferences;
  summary.errors.push(...fileResult.errors);
  summary.warnings.push(...fileResult.warnings);
}
