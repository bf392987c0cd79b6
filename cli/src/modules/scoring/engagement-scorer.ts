import { roundTo } from '../../utils/format.js';
import { extractHashtags } from '../analysis/hashtags.js';
import { analyzePolarity, type PolarityEstimator } from '../analysis/sentiment.js';
import { countWords } from '../text/normalize.js';

const WORD_WEIGHT = 0.1;
const HASHTAG_WEIGHT = 5;
const SENTIMENT_WEIGHT = 10;

/**
 * Heuristic engagement estimate (unbounded, two decimals):
 * 0.1 per word + 5 per hashtag + 10 x polarity.
 */
export function calculateEngagementScore(text: unknown, estimator: PolarityEstimator): number {
  if (typeof text !== 'string' || !text) return 0;

  const wordCount = countWords(text);
  const hashtagCount = extractHashtags(text).length;
  const { polarity } = analyzePolarity(text, estimator);

  return roundTo(wordCount * WORD_WEIGHT + hashtagCount * HASHTAG_WEIGHT + polarity * SENTIMENT_WEIGHT, 2);
}
