import type { Config } from '../../config.js';
import { createLexiconPolarityEstimator } from '../analysis/polarity-estimator.js';
import type { PolarityEstimator } from '../analysis/sentiment.js';
import { createDictionaryCorrector, type GrammarCorrector } from '../optimizer/grammar.js';
import type { OptimizerOptions, OptimizerSettings } from '../optimizer/pipeline.js';
import { loadContentData, type ContentRules, type SentimentLexicon } from './rules.js';

/**
 * Everything the scoring and optimizing functions need, wired from config.
 */
export interface ContentEngine extends OptimizerOptions {
  rules: ContentRules;
  settings: OptimizerSettings;
  estimator: PolarityEstimator;
  sentimentLexicon: SentimentLexicon;
}

export function createContentEngine(config: Config): ContentEngine {
  const data = loadContentData(config.dataDir);
  const corrector: GrammarCorrector = createDictionaryCorrector(data.corrections);

  return {
    rules: data.rules,
    settings: {
      maxHashtags: config.maxHashtags,
      minWords: config.minWords,
      maxWords: config.maxWords,
      applyGrammarCorrection: config.applyGrammarCorrection,
    },
    estimator: createLexiconPolarityEstimator(data.polarityLexicon),
    corrector,
    sentimentLexicon: data.sentimentLexicon,
  };
}
