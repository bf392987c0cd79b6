import { describe, expect, it } from 'vitest';
import { createPolarityLexicon } from '../content/rules.js';
import { createLexiconPolarityEstimator } from './polarity-estimator.js';

const estimator = createLexiconPolarityEstimator(
  createPolarityLexicon({ great: 0.8, bad: -0.6, simple: 0.2 }, { very: 1.5 }, ['not', "don't"]),
);

describe('createLexiconPolarityEstimator', () => {
  it('averages the scores of known words', () => {
    expect(estimator.estimate('A great and simple tool')).toBeCloseTo(0.5, 10);
  });

  it('returns 0 when no lexicon word appears', () => {
    expect(estimator.estimate('Quarterly update for the team')).toBe(0);
  });

  it('ignores surrounding punctuation and hashtags', () => {
    expect(estimator.estimate('#great!')).toBeCloseTo(0.8, 10);
  });

  it('applies intensifiers from the preceding word and clamps to 1', () => {
    expect(estimator.estimate('very great')).toBe(1);
    expect(estimator.estimate('very simple')).toBeCloseTo(0.3, 10);
  });

  it('flips and halves scores after a nearby negator', () => {
    expect(estimator.estimate('not great')).toBeCloseTo(-0.4, 10);
    expect(estimator.estimate("don't look bad")).toBeCloseTo(0.3, 10);
  });

  it('only looks two words back for negation', () => {
    expect(estimator.estimate('not that it looks great')).toBeCloseTo(0.8, 10);
  });
});
