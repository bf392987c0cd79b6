import { containsCallToAction } from '../analysis/call-to-action.js';
import { extractHashtags } from '../analysis/hashtags.js';
import type { ContentRules } from '../content/rules.js';
import { normalizeText } from '../text/normalize.js';
import { applyGrammarCorrection, type GrammarCorrector } from './grammar.js';
import { ensureHashtagsFromKeywords, limitHashtags, truncateOrPadWords } from './hashtag-rules.js';

export interface OptimizerSettings {
  maxHashtags: number;
  minWords: number;
  maxWords: number;
  applyGrammarCorrection: boolean;
}

export const DEFAULT_OPTIMIZER_SETTINGS: OptimizerSettings = Object.freeze({
  maxHashtags: 3,
  minWords: 50,
  maxWords: 100,
  applyGrammarCorrection: true,
});

export interface OptimizerOptions {
  rules: ContentRules;
  settings?: OptimizerSettings;
  corrector?: GrammarCorrector;
}

function finalizeText(text: string): string {
  const trimmed = text.trim();
  const capitalized = trimmed ? trimmed.charAt(0).toUpperCase() + trimmed.slice(1) : trimmed;
  return capitalized.replace(/\s+/g, ' ');
}

/**
 * Rewrite arbitrary text into a house-style post:
 * normalize -> correct -> ensure CTA -> cap hashtags -> add trending tags
 * -> clamp length -> capitalize.
 *
 * Not idempotent: running it on its own output can append more tags.
 */
export function optimizeContent(text: unknown, options: OptimizerOptions): string {
  if (typeof text !== 'string') return '';

  const { rules, corrector } = options;
  const settings = options.settings ?? DEFAULT_OPTIMIZER_SETTINGS;

  let output = normalizeText(text);
  output = applyGrammarCorrection(output, corrector, settings.applyGrammarCorrection);

  if (!containsCallToAction(output, rules.ctaPhrases)) {
    output += ` ${rules.ctaSentence}`;
  }

  output = limitHashtags(output, settings.maxHashtags);

  const currentTags = extractHashtags(output).length;
  if (currentTags < settings.maxHashtags) {
    output = ensureHashtagsFromKeywords(output, rules.trendingKeywords, settings.maxHashtags - currentTags);
  }

  output = truncateOrPadWords(output, settings.minWords, settings.maxWords, rules.trendingHashtags);

  return finalizeText(output);
}
