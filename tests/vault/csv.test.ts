import { describe, it, expect } from 'vitest';
import { csvEscape, parseCsv, parseCsvHeader, toCsv } from '../../src/vault/csv.js';

describe('parseCsv', () => {
  it('should parse quoted fields with commas and doubled quotes', () => {
    const { headers, rows } = parseCsv('a,b\n1,"x,y"\n2,"he said ""hi"""\n');
    expect(headers).toEqual(['a', 'b']);
    expect(rows).toEqual([
      { a: '1', b: 'x,y' },
      { a: '2', b: 'he said "hi"' },
    ]);
  });

  it('should keep line breaks inside quotes and accept CRLF', () => {
    const { rows } = parseCsv('a,b\r\n"line1\nline2",2\r\n');
    expect(rows).toEqual([{ a: 'line1\nline2', b: '2' }]);
  });

  it('should strip a UTF-8 BOM', () => {
    expect(parseCsvHeader('\uFEFFa,b\n1,2')).toEqual(['a', 'b']);
  });

  it('should skip blank lines and pad short rows', () => {
    const { rows } = parseCsv('a,b,c\n\n1\n');
    expect(rows).toEqual([{ a: '1', b: '', c: '' }]);
  });

  it('should return nothing for empty input', () => {
    expect(parseCsv('')).toEqual({ headers: [], rows: [] });
  });
});

describe('toCsv', () => {
  it('should quote only when needed and end with a newline', () => {
    const text = toCsv(['a', 'b'], [{ a: 'x,y', b: ' pad' }, { a: 'plain', b: '' }]);
    expect(text).toBe('a,b\n"x,y"," pad"\nplain,\n');
  });

  it('should read back what it writes', () => {
    const rows = [{ name: 'Quote "me"', note: 'two\nlines' }];
    expect(parseCsv(toCsv(['name', 'note'], rows)).rows).toEqual(rows);
  });
});

describe('csvEscape', () => {
  it('should leave simple values alone', () => {
    expect(csvEscape('abc')).toBe('abc');
    expect(csvEscape('a"b')).toBe('"a""b"');
  });
});
