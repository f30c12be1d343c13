import { describe, it, expect } from 'vitest';
import { formatCsv, formatCsvField, parseCsv, parseCsvLine } from '../../src/services/csv.js';

describe('parseCsvLine', () => {
  it('splits plain fields', () => {
    expect(parseCsvLine('a,b,,d')).toEqual(['a', 'b', '', 'd']);
  });

  it('unwraps quoted fields and escaped quotes', () => {
    expect(parseCsvLine('a,"b,c","say ""hi"""')).toEqual(['a', 'b,c', 'say "hi"']);
  });
});

describe('parseCsv', () => {
  it('keys rows by header and skips blank lines', () => {
    const table = parseCsv('x,y\r\n1,2\r\n\r\n3\r\n');

    expect(table.header).toEqual(['x', 'y']);
    expect(table.rows).toEqual([
      { line: 2, values: { x: '1', y: '2' } },
      { line: 4, values: { x: '3', y: '' } },
    ]);
  });

  it('reads quoted fields that span lines', () => {
    const table = parseCsv('name,note\n"Essay\nDraft","a, b"\r\nLab,"x\r\ny"\n');

    expect(table.rows).toEqual([
      { line: 2, values: { name: 'Essay\nDraft', note: 'a, b' } },
      { line: 4, values: { name: 'Lab', note: 'x\r\ny' } },
    ]);
  });

  it('reads back what formatCsv writes', () => {
    const text = formatCsv(['name', 'score'], [['Essay\nDraft', 81], ['Say "hi"', 5]]);
    expect(parseCsv(text).rows.map(row => row.values)).toEqual([
      { name: 'Essay\nDraft', score: '81' },
      { name: 'Say "hi"', score: '5' },
    ]);
  });

  it('ignores a byte order mark', () => {
    expect(parseCsv('\uFEFFid,name\n1,Ann').header).toEqual(['id', 'name']);
  });
});

describe('formatCsv', () => {
  it('quotes fields that need it', () => {
    expect(formatCsvField('a,b')).toBe('"a,b"');
    expect(formatCsvField('He said "x"')).toBe('"He said ""x"""');
    expect(formatCsvField(5)).toBe('5');
  });

  it('writes a header and one line per row', () => {
    expect(formatCsv(['a', 'b'], [[1, 'x'], [2, 'y, z']])).toBe('a,b\n1,x\n2,"y, z"\n');
  });
});
