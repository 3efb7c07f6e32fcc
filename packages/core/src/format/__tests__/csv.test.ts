import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parse } from 'csv-parse/sync';
import { LosslessNumber } from 'lossless-json';
import { cellText, formatCsvRow, quoteField, separatorProblem } from '../csv.js';
import type { Row } from '../../client/types.js';

function render(rows: Row[], separator: string): string {
  return rows.map((row) => formatCsvRow(row, separator)).join('');
}

describe('quoteField', () => {
  it('quotes every value', () => {
    assert.equal(quoteField('plain'), '"plain"');
    assert.equal(quoteField(''), '""');
  });

  it('doubles embedded quotes', () => {
    assert.equal(quoteField('say "hi"'), '"say ""hi"""');
  });
});

describe('cellText', () => {
  it('renders scalars and nested values', () => {
    assert.equal(cellText(null), '');
    assert.equal(cellText('x'), 'x');
    assert.equal(cellText(42), '42');
    assert.equal(cellText(1.5), '1.5');
    assert.equal(cellText(false), 'false');
    assert.equal(cellText({ a: [1, 2] }), '{"a":[1,2]}');
  });

  it('renders decoded numbers by their original text', () => {
    assert.equal(cellText(new LosslessNumber('9007199254740993')), '9007199254740993');
    assert.equal(cellText(new LosslessNumber('1.0')), '1.0');
    assert.equal(cellText({ big: new LosslessNumber('12345678901234567890') }), '{"big":12345678901234567890}');
  });
});

describe('formatCsvRow', () => {
  it('writes a single quoted field per cell with a CRLF terminator', () => {
    assert.equal(formatCsvRow(['1'], '\t'), '"1"\r\n');
  });

  it('joins cells with the separator', () => {
    assert.equal(formatCsvRow(['a', null, 3, true], ','), '"a","","3","true"\r\n');
  });

  it('writes an empty row as a bare line break', () => {
    assert.equal(formatCsvRow([], ','), '\r\n');
  });
});

describe('csv round trip', () => {
  const rows = [
    ['id', 'comment', 'path'],
    ['1', 'tab\there', 'C:\\temp'],
    ['2', 'comma, semicolon; pipe|', ''],
    ['3', 'she said "no"', '"'],
    ['4', 'line one\nline two', 'trailing space '],
  ];

  for (const separator of ['\t', ',', ';', '||']) {
    it(`parses back to the same rows with separator ${JSON.stringify(separator)}`, () => {
      const parsed: string[][] = parse(render(rows, separator), {
        delimiter: separator,
        record_delimiter: '\r\n',
      });
      assert.deepEqual(parsed, rows);
    });
  }
});

describe('separatorProblem', () => {
  it('accepts ordinary separators', () => {
    assert.equal(separatorProblem('\t'), null);
    assert.equal(separatorProblem(','), null);
    assert.equal(separatorProblem(' | '), null);
  });

  it('rejects separators that break quoting or records', () => {
    assert.equal(separatorProblem(''), 'separator must not be empty');
    assert.equal(separatorProblem('"'), 'separator must not contain a double quote');
    assert.equal(separatorProblem('\n'), 'separator must not contain a line break');
  });
});
