import { getLogger } from '../../utils/logger.js';

const log = getLogger();

export interface GrammarCorrector {
  correct(text: string): string;
}

const WORD_PREFIX = /^([A-Za-z']+)(.*)$/s;

function matchCase(original: string, replacement: string): string {
  const first = original.charAt(0);
  if (first !== first.toUpperCase()) return replacement;
  return replacement.charAt(0).toUpperCase() + replacement.slice(1);
}

/**
 * Spelling corrector backed by a misspelling -> correction dictionary.
 * Hashtags, mentions and URLs are left alone.
 */
export function createDictionaryCorrector(corrections: ReadonlyMap<string, string>): GrammarCorrector {
  return {
    correct(text: string): string {
      return text
        .split(/(\s+)/)
        .map(token => {
          if (!token.trim() || token.startsWith('#') || token.startsWith('@') || token.includes('://')) {
            return token;
          }
          const match = WORD_PREFIX.exec(token);
          if (!match) return token;
          const [, word = '', rest = ''] = match;
          const replacement = corrections.get(word.toLowerCase());
          return replacement === undefined ? token : matchCase(word, replacement) + rest;
        })
        .join('');
    },
  };
}

/**
 * Run the corrector when enabled. A failing corrector leaves the text as is.
 */
export function applyGrammarCorrection(
  text: string,
  corrector: GrammarCorrector | undefined,
  enabled: boolean,
): string {
  if (!enabled || !text || !corrector) return text;
  try {
    return corrector.correct(text);
  } catch (err) {
    log.warn({ err }, 'Grammar correction failed, keeping original text');
    return text;
  }
}
