import {CellCompareOptions} from 'app/common/cellComparator';
import {addFileResult, createRunSummary, RunSummary} from 'app/common/ComparisonResults';
import {getErrorMessage} from 'app/common/ErrorWithCode';
import {FileReportWriter, ReportWriter} from 'app/server/lib/ComparisonReport';
import {discoverMatchingFiles, DiscoveryResult} from 'app/server/lib/fileDiscovery';
import log from 'app/server/lib/log';
import {ComparisonLayout, getOutputFileName, getRunLogPath} from 'app/server/lib/places';
import {compareFile} from 'app/server/lib/WorkbookComparator';
import * as fse from 'fs-extra';
import * as path from 'path';

// Export dependencies for stubbing in tests.
export const Deps = {
  compareFile,
};

export interface ComparisonRunnerOptions {
  layout: ComparisonLayout;
  extensions: string[];
  compareOptions?: CellCompareOptions;
  // Defaults to writing the JSON and text reports into the layout's output folder.
  reporter?: ReportWriter;
  // Whether to copy the log of the run into a file in the layout's logs folder. Defaults to true.
  runLogFile?: boolean;
}

/**
 * Runs a comparison over every workbook found under the same name in the new, prev and template
 * folders, one file at a time, and hands the resulting summary to the reporter.
 *
 * A run always finishes with a summary. Problems are recorded in the summary's errors: a file
 * that fails is noted and the run moves on to the next one.
 */
export class ComparisonRunner {
  private _reporter: ReportWriter;

  constructor(private _options: ComparisonRunnerOptions) {
    this._reporter = _options.reporter || new FileReportWriter(_options.layout.outputDir);
  }

  public async run(): Promise<RunSummary> {
    const {layout} = this._options;
    const startedAt = new Date();
    const summary = createRunSummary(startedAt);

    let removeRunLog: (() => void)|undefined;
    if (this._options.runLogFile !== false) {
      try {
        await fse.mkdirp(layout.logsDir);
        removeRunLog = log.addRunLogFile(getRunLogPath(layout, startedAt));
      } catch (e) {
        recordError(summary, `Error creating run log file: ${getErrorMessage(e)}`);
      }
    }

    try {
      log.info("Starting comparison in %s", layout.baseDir);
      try {
        await fse.mkdirp(layout.outputDir);
      } catch (e) {
        recordError(summary, `Error creating output folder: ${getErrorMessage(e)}`);
      }
      await this._compareAll(summary);
      log.info("Comparison process completed. Results saved in: %s", layout.outputDir);
      log.info("Total differences found: %s", summary.totalDifferences);
      await this._report(summary);
    } finally {
      removeRunLog?.();
    }
    return summary;
  }

  private async _compareAll(summary: RunSummary) {
    const {layout, extensions, compareOptions} = this._options;
    let discovery: DiscoveryResult;
    try {
      discovery = await discoverMatchingFiles(layout.inputs, extensions);
    } catch (e) {
      recordError(summary, `Error discovering files: ${getErrorMessage(e)}`);
      return;
    }
    if (discovery.missingFolders.length > 0) {
      recordError(summary, `Missing required folders: ${discovery.missingFolders.join(', ')}`);
    }
    for (const warning of discovery.warnings) {
      log.warn(warning);
      summary.warnings.push(warning);
    }
    if (discovery.matched.length === 0) {
      log.info("No files to compare");
      return;
    }

    log.info("Processing %s files", discovery.matched.length);
    for (const filename of discovery.matched) {
      log.info("Processing file: %s", filename);
      try {
        const fileResult = await Deps.compareFile({
          newPath: path.join(layout.inputs.new, filename),
          prevPath: path.join(layout.inputs.prev, filename),
          templatePath: path.join(layout.inputs.template, filename),
          outputPath: path.join(layout.outputDir, getOutputFileName(filename)),
        }, compareOptions);
        addFileResult(summary, fileResult);
      } catch (e) {
        recordError(summary, `Error processing ${filename}: ${getErrorMessage(e)}`);
      }
    }
  }

  private async _report(summary: RunSummary) {
    try {
      await this._reporter.writeReports(summary);
    } catch (e) {
      recordError(summary, `Error writing reports: ${getErrorMessage(e)}`);
    }
  }
}

function recordError(summary: RunSummary, message: string) {
  log.error(message);
  summary.errors.push(message);
}
