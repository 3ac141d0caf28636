import {CellValue} from 'app/common/CellValue';
import {ErrorWithCode, getErrorMessage} from 'app/common/ErrorWithCode';
import {AnnotatableSheet, ReadableSheet} from 'app/server/lib/SheetComparator';
import {CellFormulaValue, CellValue as ExcelCellValue, Fill, Font, Workbook, Worksheet} from 'exceljs';
import * as fse from 'fs-extra';
import * as path from 'path';

export interface LoadOptions {
  // When set, formula cells give their last computed result rather than their formula.
  dataOnly: boolean;
}

// The one style applied to every changed cell: solid red fill with bold white text.
const changedFill: Fill = {
  type: 'pattern',
  pattern: 'solid',
  fgColor: { argb: 'FFFF0000' },
  bgColor: { argb: 'FFFF0000' },
};

const changedFont: Partial<Font> = {
  color: { argb: 'FFFFFFFF' },
  bold: true,
};

/**
 * An xlsx workbook opened for comparison, wrapping an exceljs Workbook. Sheets are looked up by
 * name; once close() is called, any further use throws.
 */
export class ExcelWorkbook {
  /**
   * Reads the workbook at `filePath`. Failures are rethrown as LOAD_FAILED.
   */
  public static async load(filePath: string, options: LoadOptions): Promise<ExcelWorkbook> {
    const workbook = new Workbook();
    try {
      await workbook.xlsx.readFile(filePath);
    } catch (e) {
      throw new ErrorWithCode('LOAD_FAILED', `${path.basename(filePath)}: ${getErrorMessage(e)}`,
        {path: filePath, cause: e});
    }
    return new ExcelWorkbook(filePath, workbook, options);
  }

  private _workbook?: Workbook;
  private _sheets = new Map<string, ExcelSheet>();

  constructor(public readonly filePath: string, workbook: Workbook, private _options: LoadOptions) {
    this._workbook = workbook;
  }

  public get isClosed(): boolean {
    return !this._workbook;
  }

  /**
   * Names of the worksheets, in workbook order.
   */
  public sheetNames(): string[] {
    return this._getWorkbook().worksheets.map(ws => ws.name);
  }

  public hasSheet(name: string): boolean {
    return this._getWorkbook().getWorksheet(name) !== undefined;
  }

  public getSheet(name: string): ExcelSheet {
    const worksheet = this._getWorkbook().getWorksheet(name);
    if (!worksheet) {
      throw new ErrorWithCode('SHEET_NOT_FOUND', `No sheet named ${name} in ${path.basename(this.filePath)}`,
        {path: this.filePath, sheetName: name});
    }
    let sheet = this._sheets.get(name);
    if (!sheet) {
      sheet = new ExcelSheet(worksheet, this._options);
      this._sheets.set(name, sheet);
    }
    return sheet;
  }

  /**
   * Writes the workbook to `filePath`, creating its directory if needed. Failures are rethrown
   * as SAVE_FAILED.
   */
  public async save(filePath: string): Promise<void> {
    const workbook = this._getWorkbook();
    try {
      await fse.mkdirp(path.dirname(filePath));
      await workbook.xlsx.writeFile(filePath);
    } catch (e) {
      throw new ErrorWithCode('SAVE_FAILED', getErrorMessage(e), {path: filePath, cause: e});
    }
  }

  /**
   * Releases the workbook. Safe to call more than once.
   */
  public close(): void {
    this._workbook = undefined;
    this._sheets.clear();
  }

  private _getWorkbook(): Workbook {
    if (!this._workbook) {
      throw new ErrorWithCode('WORKBOOK_CLOSED', `Workbook ${path.basename(this.filePath)} is closed`,
        {path: this.filePath});
    }
    return this._workbook;
  }
}

/**
 * One worksheet of an ExcelWorkbook, addressed by 1-based (row, col).
 */
export class ExcelSheet implements ReadableSheet, AnnotatableSheet {
  constructor(private _worksheet: Worksheet, private _options: LoadOptions) {}

  public get name(): string {
    return this._worksheet.name;
  }

  public get maxRow(): number {
    return this._worksheet.rowCount;
  }

  public get maxColumn(): number {
    return this._worksheet.columnCount;
  }

  public getValue(row: number, col: number): CellValue {
    return fromExcelValue(this._worksheet.getCell(row, col).value, this._options.dataOnly);
  }

  public setValue(row: number, col: number, value: CellValue): void {
    this._worksheet.getCell(row, col).value = value;
  }

  public highlight(row: number, col: number): void {
    const cell = this._worksheet.getCell(row, col);
    // Cells read from a file may share one style object; replace it rather than edit it.
    cell.style = {...cell.style, fill: changedFill, font: changedFont};
  }
}

/**
 * Normalizes an exceljs cell value to a plain CellValue:
 *  - formulas give their cached result when `dataOnly` is set, and "=<formula>" otherwise;
 *  - rich text gives the concatenation of its runs;
 *  - hyperlinks give their display text;
 *  - error cells give the error code, e.g. "#DIV/0!".
 */
export function fromExcelValue(value: ExcelCellValue, dataOnly: boolean): CellValue {
  if (value === undefined || value === null) { return null; }
  if (typeof value !== 'object' || value instanceof Date) { return value; }
  if ('sharedFormula' in value) {
    return dataOnly ? fromFormulaResult(value.result) : `=${value.formula ?? value.sharedFormula}`;
  }
  if ('formula' in value) {
    return dataOnly ? fromFormulaResult(value.result) : `=${value.formula}`;
  }
  if ('richText' in value) {
    return value.richText.map(run => run.text).join('');
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  return getErrorCode(value.error);
}

function fromFormulaResult(result: CellFormulaValue['result']): CellValue {
  if (result === undefined || result === null) { return null; }
  if (typeof result !== 'object' || result instanceof Date) { return result; }
  return getErrorCode(result.error);
}

// exceljs stores an error as {error: '#N/A'}, both as a cell value and as a formula result.
function getErrorCode(error: string|{error: string}): string {
  return typeof error === 'string' ? error : error.error;
}
