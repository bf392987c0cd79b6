import { clamp } from '../../utils/format.js';
import type { PolarityLexicon } from '../content/rules.js';
import type { PolarityEstimator } from './sentiment.js';

const NEGATION_FACTOR = -0.5;
const NEGATION_WINDOW = 2;

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .map(token => token.replace(/^[^\w']+|[^\w']+$/g, ''))
    .filter(Boolean);
}

/**
 * Default polarity estimator: averages the scores of lexicon words found in
 * the text. The preceding word may intensify a score; a negator within the
 * two preceding words flips and halves it.
 */
export function createLexiconPolarityEstimator(lexicon: PolarityLexicon): PolarityEstimator {
  return {
    estimate(text: string): number {
      const tokens = tokenize(text);
      const scores: number[] = [];

      tokens.forEach((token, i) => {
        const base = lexicon.words.get(token);
        if (base === undefined) return;

        let value = base;
        const previous = tokens[i - 1];
        const boost = previous === undefined ? undefined : lexicon.intensifiers.get(previous);
        if (boost !== undefined) value *= boost;

        const window = tokens.slice(Math.max(0, i - NEGATION_WINDOW), i);
        if (window.some(t => lexicon.negators.has(t))) value *= NEGATION_FACTOR;

        scores.push(clamp(value, -1, 1));
      });

      if (scores.length === 0) return 0;
      return scores.reduce((sum, s) => sum + s, 0) / scores.length;
    },
  };
}
