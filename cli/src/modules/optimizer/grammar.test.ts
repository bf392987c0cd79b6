import { describe, expect, it } from 'vitest';
import { applyGrammarCorrection, createDictionaryCorrector, type GrammarCorrector } from './grammar.js';

const corrector = createDictionaryCorrector(
  new Map([
    ['teh', 'the'],
    ['recieve', 'receive'],
    ['alot', 'a lot'],
  ]),
);

describe('createDictionaryCorrector', () => {
  it('replaces known misspellings and keeps trailing punctuation', () => {
    expect(corrector.correct('You will recieve teh update.')).toBe('You will receive the update.');
  });

  it('preserves a leading capital', () => {
    expect(corrector.correct('Teh best. Alot better!')).toBe('The best. A lot better!');
  });

  it('leaves hashtags, mentions and links untouched', () => {
    expect(corrector.correct('#teh @teh https://teh.example')).toBe('#teh @teh https://teh.example');
  });

  it('keeps the original whitespace', () => {
    expect(corrector.correct('teh  end')).toBe('the  end');
  });
});

describe('applyGrammarCorrection', () => {
  it('skips correction when disabled or without a corrector', () => {
    expect(applyGrammarCorrection('teh', corrector, false)).toBe('teh');
    expect(applyGrammarCorrection('teh', undefined, true)).toBe('teh');
  });

  it('returns the input unchanged when the corrector throws', () => {
    const broken: GrammarCorrector = {
      correct: () => {
        throw new Error('dictionary unavailable');
      },
    };
    expect(applyGrammarCorrection('keep me', broken, true)).toBe('keep me');
  });
});
