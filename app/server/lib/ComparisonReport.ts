import {RunSummary} from 'app/common/ComparisonResults';
import log from 'app/server/lib/log';
import * as fse from 'fs-extra';
import * as path from 'path';

export const SUMMARY_FILE_NAME = 'comparison_summary.json';
export const REPORT_FILE_NAME = 'comparison_report.txt';

const RULE = '-'.repeat(20);

export interface ReportPaths {
  summaryPath: string;
  reportPath: string;
}

/**
 * Receives the summary of a finished run.
 */
export interface ReportWriter {
  writeReports(summary: RunSummary): Promise<ReportPaths>;
}

/**
 * Writes the run summary into `outputDir` twice: as JSON for machines, and as a plain text
 * report for people.
 */
export class FileReportWriter implements ReportWriter {
  constructor(private _outputDir: string) {}

  public async writeReports(summary: RunSummary): Promise<ReportPaths> {
    const summaryPath = path.join(this._outputDir, SUMMARY_FILE_NAME);
    const reportPath = path.join(this._outputDir, REPORT_FILE_NAME);
    await fse.mkdirp(this._outputDir);
    await fse.writeFile(summaryPath, JSON.stringify(summary, null, 2) + "\n");
    await fse.writeFile(reportPath, formatTextReport(summary));
    log.info("Summary report saved to: %s", reportPath);
    log.info("Detailed JSON data saved to: %s", summaryPath);
    return {summaryPath, reportPath};
  }
}

export function formatTextReport(summary: RunSummary): string {
  const lines: string[] = [
    "EXCEL COMPARISON SUMMARY REPORT",
    "=".repeat(50),
    "",
    `Comparison completed at: ${summary.timestamp}`,
    `Total files processed: ${summary.filesProcessed.length}`,
    `Total differences found: ${summary.totalDifferences}`,
    "",
  ];

  if (summary.errors.length > 0) {
    lines.push("ERRORS ENCOUNTERED:", RULE);
    lines.push(...summary.errors.map(error => `- ${error}`));
    lines.push("");
  }

  if (summary.warnings.length > 0) {
    lines.push("WARNINGS:", RULE);
    lines.push(...summary.warnings.map(warning => `- ${warning}`));
    lines.push("");
  }

  lines.push("FILE DETAILS:", RULE);
  for (const file of summary.filesProcessed) {
    lines.push(
      "",
      `File: ${file.filename}`,
      `  Status: ${file.status}`,
      `  Sheets processed: ${file.sheetsProcessed.length}`,
      `  Total differences: ${file.totalDifferences}`,
    );
    const sheets = Object.values(file.sheetDetails);
    if (sheets.length > 0) {
      lines.push("  Sheet breakdown:");
      for (const sheet of sheets) {
        lines.push(`    ${sheet.sheetName}: ${sheet.differencesCount} differences ` +
          `(${sheet.numericDifferences} numeric, ${sheet.textDifferences} text)`);
      }
    }
    if (file.errors.length > 0) {
      lines.push("  Errors:");
      lines.push(...file.errors.map(error => `    - ${error}`));
    }
  }
  return lines.join("\n") + "\n";
}
