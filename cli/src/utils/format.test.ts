import { describe, expect, it } from 'vitest';
import { clamp, formatPercent, parseCount, preview, roundTo } from './format.js';

describe('roundTo', () => {
  it('rounds half away from zero', () => {
    expect(roundTo(0.125, 2)).toBe(0.13);
    expect(roundTo(-0.125, 2)).toBe(-0.13);
    expect(roundTo(1 / 3, 4)).toBe(0.3333);
  });

  it('never returns negative zero', () => {
    expect(Object.is(roundTo(-0.0001, 3), 0)).toBe(true);
  });
});

describe('clamp', () => {
  it('keeps values inside the range', () => {
    expect(clamp(1.4, -1, 1)).toBe(1);
    expect(clamp(-3, -1, 1)).toBe(-1);
    expect(clamp(0.2, -1, 1)).toBe(0.2);
  });
});

describe('formatPercent', () => {
  it('renders ratios with two decimals', () => {
    expect(formatPercent(0.12)).toBe('12.00%');
    expect(formatPercent(0.0625)).toBe('6.25%');
  });
});

describe('preview', () => {
  it('flattens whitespace and truncates long text', () => {
    expect(preview('short\n\ntext')).toBe('short text');
    expect(preview('a'.repeat(100), 10)).toBe('aaaaaaa...');
  });
});

describe('parseCount', () => {
  it('accepts plain digits', () => {
    expect(parseCount('0')).toBe(0);
    expect(parseCount(' 1200 ')).toBe(1200);
  });

  it('rejects trailing garbage, signs and decimals', () => {
    expect(() => parseCount('12abc')).toThrow('Expected a non-negative integer, got "12abc"');
    expect(() => parseCount('-3')).toThrow();
    expect(() => parseCount('1.5')).toThrow();
    expect(() => parseCount('')).toThrow();
  });
});
