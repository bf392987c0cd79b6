import { describe, expect, it } from 'vitest';
import { countWords, normalizeText, splitWords } from './normalize.js';

describe('normalizeText', () => {
  it('collapses whitespace runs and trims', () => {
    expect(normalizeText('  Big   news\t\ttoday\n\nfolks  ')).toBe('Big news today folks');
  });

  it('returns an empty string for non-string input', () => {
    expect(normalizeText(undefined)).toBe('');
    expect(normalizeText(null)).toBe('');
    expect(normalizeText(42)).toBe('');
  });

  it('is idempotent', () => {
    const once = normalizeText(' a \n b\r\n c ');
    expect(normalizeText(once)).toBe(once);
  });

  it('leaves no double spaces or edge whitespace', () => {
    const samples = [' x  y ', 'one\n\n\ntwo', '\t', ''];
    for (const sample of samples) {
      const result = normalizeText(sample);
      expect(result).not.toMatch(/\s{2,}/);
      expect(result).toBe(result.trim());
    }
  });
});

describe('splitWords', () => {
  it('splits on any whitespace and ignores empty tokens', () => {
    expect(splitWords(' one  two\nthree ')).toEqual(['one', 'two', 'three']);
    expect(countWords('')).toBe(0);
    expect(countWords('Ship it · #AI')).toBe(4);
  });
});
