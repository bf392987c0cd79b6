import { describe, expect, it } from 'vitest';
import { parseCsv, rowToRecord, stringifyCsv, stringifyCsvRow } from './csv.js';

describe('parseCsv', () => {
  it('splits plain rows and drops blank lines', () => {
    expect(parseCsv('a,b,c\n1,2,3\n\n')).toEqual([
      ['a', 'b', 'c'],
      ['1', '2', '3'],
    ]);
  });

  it('handles quoted delimiters, doubled quotes and embedded newlines', () => {
    const content = 'text,n\r\n"Hello, world",1\r\n"She said ""hi""\nthen left",2\r\n';
    expect(parseCsv(content)).toEqual([
      ['text', 'n'],
      ['Hello, world', '1'],
      ['She said "hi"\nthen left', '2'],
    ]);
  });

  it('strips a leading byte order mark', () => {
    expect(parseCsv('\uFEFFTopic,Platform\nAI,twitter')).toEqual([
      ['Topic', 'Platform'],
      ['AI', 'twitter'],
    ]);
  });

  it('keeps trailing empty cells', () => {
    expect(parseCsv('a,b,\n')).toEqual([['a', 'b', '']]);
  });
});

describe('stringifyCsvRow', () => {
  it('quotes only cells that need it', () => {
    expect(stringifyCsvRow(['plain', 'a,b', 'say "x"', 3, true])).toBe(
      'plain,"a,b","say ""x""",3,true'
    );
  });

  it('round-trips multi-line text through parseCsv', () => {
    const rows = [['id', 'text'], ['1', 'line one\nline two']];
    expect(parseCsv(stringifyCsv(rows))).toEqual(rows);
  });
});

describe('rowToRecord', () => {
  it('fills cells missing from short rows', () => {
    expect(rowToRecord(['a', 'b', 'c'], ['1'])).toEqual({ a: '1', b: '', c: '' });
  });
});
