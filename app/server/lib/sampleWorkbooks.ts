import {getComparisonLayout} from 'app/server/lib/places';
import log from 'app/server/lib/log';
import sampleData from 'app/server/lib/sampleData.json';
import {Alignment, Fill, Font, Row, Workbook} from 'exceljs';
import * as fse from 'fs-extra';
import * as path from 'path';

export const SAMPLE_FILE_NAME = 'financial_report.xlsx';

type SampleRow = Array<string|number>;

const headerFill: Fill = {
  type: 'pattern',
  pattern: 'solid',
  fgColor: { argb: 'FF366092' },
};

const headerFont: Partial<Font> = {
  color: { argb: 'FFFFFFFF' },
  bold: true,
};

const headerAlignment: Partial<Alignment> = {
  horizontal: 'center',
};

/**
 * Builds the sample workbook from a set of account rows: a "Financial_Data" sheet with the rows,
 * and a "Summary" sheet with the quarterly totals and their average.
 */
export function buildSampleWorkbook(rows: SampleRow[]): Workbook {
  const workbook = new Workbook();

  const data = workbook.addWorksheet('Financial_Data');
  data.addRow(sampleData.columns);
  for (const row of rows) {
    data.addRow(row);
  }
  styleHeader(data.getRow(1));
  for (let col = 1; col <= sampleData.columns.length; col++) {
    data.getColumn(col).width = col === 2 ? 18 : 14;
  }

  const totals = [2, 3, 4, 5].map(col => rows.reduce((sum, row) => sum + toAmount(row[col]), 0));
  const summary = workbook.addWorksheet('Summary');
  summary.addRow(['Metric', 'Value']);
  totals.forEach((total, i) => summary.addRow([`Total Q${i + 1}`, total]));
  summary.addRow(['Average', totals.reduce((a, b) => a + b, 0) / totals.length]);
  styleHeader(summary.getRow(1));
  summary.getColumn(1).width = 16;
  summary.getColumn(2).width = 14;

  return workbook;
}

/**
 * Creates the new, prev and template folders under `baseDir` with one sample workbook in each.
 * The new version differs from the previous one in a few amounts and one status; the template
 * holds the previous values. Returns the paths written.
 */
export async function writeSampleWorkbooks(baseDir: string): Promise<string[]> {
  const {inputs} = getComparisonLayout(baseDir);
  const versions: Array<[string, SampleRow[]]> = [
    [inputs.new, sampleData.new],
    [inputs.prev, sampleData.previous],
    [inputs.template, sampleData.previous],
  ];
  const written: string[] = [];
  for (const [dir, rows] of versions) {
    await fse.mkdirp(dir);
    const filePath = path.join(dir, SAMPLE_FILE_NAME);
    await buildSampleWorkbook(rows).xlsx.writeFile(filePath);
    log.info("Created sample workbook: %s", filePath);
    written.push(filePath);
  }
  return written;
}

function styleHeader(row: Row) {
  row.eachCell((cell) => {
    cell.fill = headerFill;
    cell.font = headerFont;
    cell.alignment = headerAlignment;
  });
}

function toAmount(value: string|number|undefined): number {
  return typeof value === 'number' ? value : 0;
}
