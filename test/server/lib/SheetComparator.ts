import {CellValue} from 'app/common/CellValue';
import {compareSheet, ReadableSheet} from 'app/server/lib/SheetComparator';
import {assert} from 'chai';
import {MemorySheet} from '../memorySheet';
import {captureLog} from '../testUtils';

describe('SheetComparator', function() {
  it('writes and highlights numeric deltas and new text', async function() {
    const newSheet = new MemorySheet('Data', [
      ['Account', 'Q1', 'Status'],
      ['Cash', 1500, 'Review'],
      ['Stock', 250, 'Active'],
    ]);
    const prevSheet = new MemorySheet('Data', [
      ['Account', 'Q1', 'Status'],
      ['Cash', 1000, 'Active'],
      ['Stock', 1000, 'Active'],
    ]);
    const output = new MemorySheet('Data', [
      ['Account', 'Q1', 'Status'],
      ['Cash', 1000, 'Active'],
      ['Stock', 1000, 'Active'],
    ]);

    const messages = await captureLog('info', () => {
      const result = compareSheet(newSheet, prevSheet, output);
      assert.equal(result.sheetName, 'Data');
      assert.equal(result.maxRow, 3);
      assert.equal(result.maxColumn, 3);
      assert.equal(result.cellsCompared, 9);
      assert.equal(result.differencesCount, 3);
      assert.equal(result.numericDifferences, 2);
      assert.equal(result.textDifferences, 1);
      assert.isTrue(result.differencesFound);
      assert.deepEqual(result.differences.map(d => [d.address, d.value]), [
        ['B2', 500],
        ['C2', 'Review'],
        ['B3', -750],
      ]);
      assert.deepEqual(result.cellErrors, []);
    });

    assert.deepEqual(output.rows, [
      ['Account', 'Q1', 'Status'],
      ['Cash', 500, 'Review'],
      ['Stock', -750, 'Active'],
    ]);
    assert.deepEqual(output.highlighted, ['2,2', '2,3', '3,2']);
    assert.deepEqual(messages, ["info: Found 3 differences in sheet 'Data' (2 numeric, 1 text)"]);
  });

  it('leaves everything alone when the sheets are equal', async function() {
    const rows: CellValue[][] = [['a', 1], [null, 'b']];
    const output = new MemorySheet('Same', rows);
    const messages = await captureLog('info', () => {
      const result = compareSheet(new MemorySheet('Same', rows), new MemorySheet('Same', rows), output);
      assert.equal(result.cellsCompared, 4);
      assert.equal(result.differencesCount, 0);
      assert.isFalse(result.differencesFound);
    });
    assert.deepEqual(output.rows, rows);
    assert.deepEqual(output.highlighted, []);
    assert.deepEqual(messages, []);
  });

  it('visits the union of both extents', function() {
    // New is 4x4, prev is 3x4: row 4 only exists in the new version.
    const newSheet = new MemorySheet('S', [
      [1, 2, 3, 4],
      [5, 6, 7, 8],
      [9, 10, 11, 12],
      ['x', null, 20, ''],
    ]);
    const prevSheet = new MemorySheet('S', [
      [1, 2, 3, 4],
      [5, 6, 7, 8],
      [9, 10, 11, 12],
    ]);
    const output = new MemorySheet('S');
    const result = compareSheet(newSheet, prevSheet, output);
    assert.equal(result.maxRow, 4);
    assert.equal(result.maxColumn, 4);
    assert.equal(result.cellsCompared, 16);
    assert.deepEqual(result.differences.map(d => [d.address, d.kind, d.value]), [
      ['A4', 'textual', 'x'],
      ['C4', 'numeric', 20],
    ]);
  });

  it('includes cells only the previous version has', function() {
    const newSheet = new MemorySheet('S', [[1]]);
    const prevSheet = new MemorySheet('S', [[1, 'gone'], [null, 7]]);
    const output = new MemorySheet('S');
    const result = compareSheet(newSheet, prevSheet, output);
    assert.equal(result.cellsCompared, 4);
    assert.deepEqual(result.differences.map(d => [d.address, d.kind, d.value]), [
      ['B1', 'textual', null],
      ['B2', 'textual', null],
    ]);
  });

  it('compares nothing in empty sheets', function() {
    const result = compareSheet(new MemorySheet('E'), new MemorySheet('E'), new MemorySheet('E'));
    assert.equal(result.cellsCompared, 0);
    assert.equal(result.maxRow, 0);
    assert.equal(result.maxColumn, 0);
  });

  it('records a failing cell and carries on', async function() {
    const good = new MemorySheet('S', [[1, 2]]);
    const failing: ReadableSheet = {
      name: 'S',
      maxRow: 1,
      maxColumn: 2,
      getValue: (row, col) => {
        if (col === 1) { throw new Error('unreadable'); }
        return 5;
      },
    };
    const output = new MemorySheet('S');
    const messages = await captureLog('warn', () => {
      const result = compareSheet(failing, good, output);
      assert.equal(result.cellsCompared, 2);
      assert.deepEqual(result.cellErrors, ['Error processing cell 1,1: unreadable']);
      assert.deepEqual(result.differences.map(d => [d.address, d.value]), [['B1', 3]]);
    });
    assert.deepEqual(messages, ['warn: Sheet S: Error processing cell 1,1: unreadable']);
  });

  it('passes the mixed parse failure option through', function() {
    const newSheet = new MemorySheet('S', [['1,5']]);
    const prevSheet = new MemorySheet('S', [[null]]);
    const parser = {
      isNumeric: (value: CellValue) => value !== null && value !== '',
      toFloat: (value: CellValue): number => { throw new TypeError(`cannot convert ${value}`); },
    };
    const skipped = compareSheet(newSheet, prevSheet, new MemorySheet('S'), {parser});
    assert.equal(skipped.differencesCount, 0);
    const recorded = compareSheet(newSheet, prevSheet, new MemorySheet('S'), {parser, mixedParseFailure: 'textual'});
    assert.deepEqual(recorded.differences.map(d => [d.address, d.kind, d.value]), [['A1', 'textual', '1,5']]);
  });
});
