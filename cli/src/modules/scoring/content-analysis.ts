import { containsCallToAction } from '../analysis/call-to-action.js';
import { extractHashtags } from '../analysis/hashtags.js';
import { calculateReadability, type ReadabilityLevel } from '../analysis/readability.js';
import { analyzePolarity, type PolaritySentiment } from '../analysis/sentiment.js';
import { calculateTrendRelevance } from '../analysis/trend-relevance.js';
import type { ContentEngine } from '../content/engine.js';
import { optimizeContent } from '../optimizer/pipeline.js';
import { normalizeText } from '../text/normalize.js';
import { calculateEngagementScore } from './engagement-scorer.js';

export interface ContentAnalysis {
  cleaned: string;
  originalSentiment: PolaritySentiment;
  readability: ReadabilityLevel;
  hashtags: string[];
  trendRelevance: number;
  engagementScore: number;
  containsCta: boolean;
  optimized: string;
  optimizedSentiment: PolaritySentiment;
}

/**
 * Score a piece of copy as-is, then optimize it and re-score the result.
 */
export function analyzeContent(text: unknown, engine: ContentEngine): ContentAnalysis {
  const cleaned = normalizeText(text);
  const optimized = optimizeContent(cleaned, engine);

  return {
    cleaned,
    originalSentiment: analyzePolarity(cleaned, engine.estimator),
    readability: calculateReadability(cleaned),
    hashtags: extractHashtags(cleaned),
    trendRelevance: calculateTrendRelevance(cleaned, engine.rules.trendingKeywords),
    engagementScore: calculateEngagementScore(cleaned, engine.estimator),
    containsCta: containsCallToAction(cleaned, engine.rules.ctaPhrases),
    optimized,
    optimizedSentiment: analyzePolarity(optimized, engine.estimator),
  };
}
