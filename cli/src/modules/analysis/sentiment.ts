import { getLogger } from '../../utils/logger.js';
import { clamp, roundTo } from '../../utils/format.js';
import type { SentimentLexicon } from '../content/rules.js';

const log = getLogger();

/**
 * Two sentiment analyzers live here and are deliberately separate:
 * - polarity: general-purpose estimator, feeds the optimizer and engagement score
 * - lexicon: fixed positive/negative word sets, feeds the metrics records
 * They are not expected to agree.
 */

export type PolarityLabel = 'Positive' | 'Neutral' | 'Negative';
export type LexiconLabel = 'positive' | 'neutral' | 'negative';

export interface PolaritySentiment {
  polarity: number; // -1..1, three decimals
  label: PolarityLabel;
}

export interface LexiconSentiment {
  score: number; // -1..1
  label: LexiconLabel;
}

export interface PolarityEstimator {
  estimate(text: string): number;
}

const POSITIVE_POLARITY = 0.3;
const LEXICON_BOUNDARY = 0.2;

export function polarityLabel(polarity: number): PolarityLabel {
  if (polarity > POSITIVE_POLARITY) return 'Positive';
  if (polarity >= 0) return 'Neutral';
  return 'Negative';
}

/**
 * Run the polarity estimator. Any estimator failure degrades to a neutral 0.
 */
export function analyzePolarity(text: string, estimator: PolarityEstimator): PolaritySentiment {
  let polarity = 0;
  try {
    const raw = estimator.estimate(text);
    if (Number.isFinite(raw)) {
      polarity = roundTo(clamp(raw, -1, 1), 3);
    } else {
      log.debug({ raw }, 'Polarity estimator returned a non-numeric score, using 0');
    }
  } catch (err) {
    log.debug({ err }, 'Polarity estimator failed, using 0');
  }
  return { polarity, label: polarityLabel(polarity) };
}

export function lexiconLabel(score: number): LexiconLabel {
  if (score > LEXICON_BOUNDARY) return 'positive';
  if (score < -LEXICON_BOUNDARY) return 'negative';
  return 'neutral';
}

/**
 * Bag-of-words sentiment: (pos - neg) / (pos + neg) over whitespace tokens.
 */
export function analyzeLexiconSentiment(text: unknown, lexicon: SentimentLexicon): LexiconSentiment {
  const tokens = (typeof text === 'string' ? text : '').toLowerCase().split(/\s+/).filter(Boolean);

  let pos = 0;
  let neg = 0;
  for (const token of tokens) {
    if (lexicon.positive.has(token)) pos++;
    else if (lexicon.negative.has(token)) neg++;
  }

  if (pos === 0 && neg === 0) return { score: 0, label: 'neutral' };

  const score = (pos - neg) / (pos + neg);
  return { score, label: lexiconLabel(score) };
}
