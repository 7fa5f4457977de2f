/**
 * Tests for CSV reading and writing.
 */
import { describe, it, expect } from 'vitest';
import { formatCsv, parseCsv, parseCsvLines, readCsvRecords } from '../../../src/utils/csv.js';
import { ValidationError } from '../../../src/utils/errors.js';

describe('formatCsv', () => {
  it('should write a header and one line per record', () => {
    const text = formatCsv(['a', 'b'], [{ a: 1, b: 'x' }, { a: 2.5, b: 'y' }]);
    expect(text).toBe('a,b\n1,x\n2.5,y\n');
  });

  it('should write booleans as 1 and 0', () => {
    expect(formatCsv(['ok', 'bad'], [{ ok: true, bad: false }])).toBe('ok,bad\n1,0\n');
  });

  it('should quote cells with separators and double embedded quotes', () => {
    const text = formatCsv(['title'], [{ title: 'say "hi", then\nleave' }]);
    expect(text).toBe('title\n"say ""hi"", then\nleave"\n');
  });

  it('should leave missing columns empty', () => {
    expect(formatCsv(['a', 'b', 'c'], [{ a: 1 }])).toBe('a,b,c\n1,,\n');
  });
});

describe('parseCsvLines', () => {
  it('should handle CRLF and skip blank lines', () => {
    expect(parseCsvLines('a,b\r\n1,2\r\n\r\n3,4')).toEqual([
      ['a', 'b'],
      ['1', '2'],
      ['3', '4'],
    ]);
  });

  it('should read quoted cells spanning lines', () => {
    expect(parseCsvLines('x\n"line1\nline2"\n')).toEqual([['x'], ['line1\nline2']]);
  });

  it('should keep empty cells', () => {
    expect(parseCsvLines('a,,c\n')).toEqual([['a', '', 'c']]);
  });

  it('should reject an unterminated quote', () => {
    expect(() => parseCsvLines('a\n"open')).toThrow(ValidationError);
    expect(() => parseCsvLines('a\n"open')).toThrow('Unterminated quoted cell at line 2');
  });
});

describe('readCsvRecords', () => {
  it('should tag each record with the line it starts on', () => {
    expect(readCsvRecords('x\n"a\nb"\n\ny\n')).toEqual([
      { cells: ['x'], line: 1 },
      { cells: ['a\nb'], line: 2 },
      { cells: ['y'], line: 5 },
    ]);
  });
});

describe('parseCsv', () => {
  it('should key rows by header', () => {
    const table = parseCsv('name,score\nalpha,0.5\nbeta,0.25\n');

    expect(table.header).toEqual(['name', 'score']);
    expect(table.rows).toEqual([
      { name: 'alpha', score: '0.5' },
      { name: 'beta', score: '0.25' },
    ]);
  });

  it('should omit cells missing from short rows', () => {
    expect(parseCsv('a,b\n1\n').rows).toEqual([{ a: '1' }]);
  });

  it('should return an empty table for empty input', () => {
    expect(parseCsv('')).toEqual({ header: [], rows: [], lines: [] });
  });

  it('should read back what formatCsv writes', () => {
    const records = [{ id: 'T1-001', note: 'comma, "quote"', ok: true }];
    const table = parseCsv(formatCsv(['id', 'note', 'ok'], records));
    expect(table.rows).toEqual([{ id: 'T1-001', note: 'comma, "quote"', ok: '1' }]);
  });
});
