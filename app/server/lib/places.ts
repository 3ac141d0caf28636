/**
 * Utilities related to the layout of a comparison run's base directory, and where inputs and
 * results are stored.
 *
 *    <baseDir>/new                  new versions of the workbooks
 *    <baseDir>/prev                 previous versions
 *    <baseDir>/template             templates supplying the output formatting
 *    <baseDir>/comparison_results   annotated workbooks and reports
 *    <baseDir>/logs                 one log file per run
 */

import {formatFileStamp} from 'app/common/timeFormat';
import {InputFolders} from 'app/server/lib/fileDiscovery';
import * as path from 'path';

export const OUTPUT_SUFFIX = '_COMPARISON';

export interface ComparisonLayout {
  baseDir: string;
  inputs: InputFolders;
  outputDir: string;
  logsDir: string;
}

export function getComparisonLayout(baseDir: string): ComparisonLayout {
  const root = path.resolve(baseDir);
  return {
    baseDir: root,
    inputs: {
      new: path.join(root, 'new'),
      prev: path.join(root, 'prev'),
      template: path.join(root, 'template'),
    },
    outputDir: path.join(root, 'comparison_results'),
    logsDir: path.join(root, 'logs'),
  };
}

/**
 * Returns the name of the annotated output for an input file: the last extension is stripped,
 * the suffix appended, and the extension put back. "report.v2.xlsx" gives
 * "report.v2_COMPARISON.xlsx".
 */
export function getOutputFileName(filename: string): string {
  const dot = filename.lastIndexOf('.');
  if (dot <= 0) { return filename + OUTPUT_SUFFIX; }
  return filename.slice(0, dot) + OUTPUT_SUFFIX + filename.slice(dot);
}

export function getRunLogPath(layout: ComparisonLayout, date: Date): string {
  return path.join(layout.logsDir, `comparison_log_${formatFileStamp(date)}.txt`);
}
