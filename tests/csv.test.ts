import { describe, it, expect } from 'vitest';
import { CsvSyntaxError, parseCsvRows, serializeCsvRows } from '../src/storage/csv.js';

describe('parseCsvRows', () => {
  it('splits simple rows', () => {
    expect(parseCsvRows('a,b,c\n1,2,3\n')).toEqual([
      ['a', 'b', 'c'],
      ['1', '2', '3'],
    ]);
  });

  it('handles quoted commas, escaped quotes and embedded newlines', () => {
    const text = 'name,remarks\n"Doe, Jane","said ""hi""\nthen left"\n';
    expect(parseCsvRows(text)).toEqual([
      ['name', 'remarks'],
      ['Doe, Jane', 'said "hi"\nthen left'],
    ]);
  });

  it('keeps empty fields', () => {
    expect(parseCsvRows('a,b,c\n,,x\n')).toEqual([
      ['a', 'b', 'c'],
      ['', '', 'x'],
    ]);
  });

  it('accepts CRLF, a BOM and no trailing newline', () => {
    expect(parseCsvRows('\uFEFFa,b\r\n1,2')).toEqual([
      ['a', 'b'],
      ['1', '2'],
    ]);
  });

  it('skips blank lines', () => {
    expect(parseCsvRows('a\n\n1\n\n')).toEqual([['a'], ['1']]);
  });

  it('returns no rows for empty text', () => {
    expect(parseCsvRows('')).toEqual([]);
  });

  it('rejects an unterminated quote', () => {
    expect(() => parseCsvRows('a,b\n"open,2\n')).toThrow(CsvSyntaxError);
    expect(() => parseCsvRows('a,b\n"open,2\n')).toThrow('Unterminated quoted field (line 2)');
  });

  it('rejects a quote inside an unquoted field', () => {
    expect(() => parseCsvRows('ab"c\n')).toThrow('Unexpected quote inside unquoted field (line 1)');
  });
});

describe('serializeCsvRows', () => {
  it('quotes only where needed and ends with a newline', () => {
    const text = serializeCsvRows([
      ['symbol', 'remarks'],
      ['ABC', 'plain'],
      ['XYZ', 'has, comma'],
      ['Q', 'say "x"'],
    ]);
    expect(text).toBe('symbol,remarks\nABC,plain\nXYZ,"has, comma"\nQ,"say ""x"""\n');
  });

  it('reads back what it writes', () => {
    const rows = [['a', 'b'], ['line\nbreak', ''], ['"q"', 'x,y']];
    expect(parseCsvRows(serializeCsvRows(rows))).toEqual(rows);
  });
});
