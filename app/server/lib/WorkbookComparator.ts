import {CellCompareOptions} from 'app/common/cellComparator';
import {addSheetResult, createFileResult, FileResult} from 'app/common/ComparisonResults';
import {getErrorMessage} from 'app/common/ErrorWithCode';
import {ExcelWorkbook} from 'app/server/lib/ExcelWorkbook';
import log from 'app/server/lib/log';
import {compareSheet} from 'app/server/lib/SheetComparator';
import * as path from 'path';

// Export dependencies for stubbing in tests.
export const Deps = {
  loadWorkbook: ExcelWorkbook.load,
};

export interface FileComparisonPaths {
  newPath: string;
  prevPath: string;
  templatePath: string;
  outputPath: string;
}

/**
 * Compares the new and previous versions of one workbook, and writes the annotated result to
 * `outputPath`. The output starts as a fresh copy of the template workbook, so it keeps the
 * template's formatting; the new and previous workbooks are only read, with formulas giving
 * their cached results.
 *
 * Only sheets present in all three workbooks are compared, in the order of the new workbook.
 * Failing to load any workbook ends the comparison for this file. A failure in one sheet is
 * recorded and the remaining sheets are still compared. The file is "completed" if the output was
 * saved, and "failed" otherwise. All workbooks are closed before returning.
 */
export async function compareFile(paths: FileComparisonPaths, options: CellCompareOptions = {}): Promise<FileResult> {
  const filename = path.basename(paths.newPath);
  const result = createFileResult(filename, paths.outputPath);
  const opened: ExcelWorkbook[] = [];
  const open = async (filePath: string, dataOnly: boolean) => {
    const workbook = await Deps.loadWorkbook(filePath, {dataOnly});
    opened.push(workbook);
    return workbook;
  };

  try {
    let newWorkbook: ExcelWorkbook, prevWorkbook: ExcelWorkbook, outputWorkbook: ExcelWorkbook;
    try {
      newWorkbook = await open(paths.newPath, true);
      prevWorkbook = await open(paths.prevPath, true);
      outputWorkbook = await open(paths.templatePath, false);
    } catch (e) {
      const message = `Error loading workbooks: ${getErrorMessage(e)}`;
      log.error("%s: %s", filename, message);
      result.errors.push(message);
      return result;
    }

    const commonSheets = newWorkbook.sheetNames().filter(
      name => prevWorkbook.hasSheet(name) && outputWorkbook.hasSheet(name));
    if (commonSheets.length === 0) {
      const message = `No common sheets found in ${filename}`;
      log.warn(message);
      result.warnings.push(message);
    } else {
      log.info("Processing %s sheets in %s", commonSheets.length, filename);
    }

    for (const sheetName of commonSheets) {
      log.debug("Comparing sheet: %s", sheetName);
      try {
        const sheetResult = compareSheet(
          newWorkbook.getSheet(sheetName),
          prevWorkbook.getSheet(sheetName),
          outputWorkbook.getSheet(sheetName),
          options,
        );
        addSheetResult(result, sheetResult);
      } catch (e) {
        const message = `Error comparing sheet ${sheetName}: ${getErrorMessage(e)}`;
        log.error("%s: %s", filename, message);
        result.errors.push(message);
      }
    }

    try {
      await outputWorkbook.save(paths.outputPath);
      result.status = 'completed';
      if (result.totalDifferences > 0) {
        log.info("%s differences found and highlighted in: %s", result.totalDifferences,
          path.basename(paths.outputPath));
      } else {
        log.info("No differences found in: %s", path.basename(paths.outputPath));
      }
    } catch (e) {
      const message = `Error saving output file: ${getErrorMessage(e)}`;
      log.error("%s: %s", filename, message);
      result.errors.push(message);
      result.status = 'failed';
    }
    return result;
  } finally {
    for (const workbook of opened) {
      workbook.close();
    }
  }
}
