import { countWords } from '../text/normalize.js';

export type ReadabilityLevel = 'Easy' | 'Medium' | 'Complex';

const EASY_MAX_SENTENCE_LENGTH = 12;
const MEDIUM_MAX_SENTENCE_LENGTH = 20;

export function averageSentenceLength(text: string): number {
  const sentences = text.split(/[.!?]+/).filter(s => s.trim() !== '');
  return countWords(text) / Math.max(sentences.length, 1);
}

/**
 * Readability from average words per sentence.
 */
export function calculateReadability(text: string): ReadabilityLevel {
  const avg = averageSentenceLength(text);
  if (avg <= EASY_MAX_SENTENCE_LENGTH) return 'Easy';
  if (avg <= MEDIUM_MAX_SENTENCE_LENGTH) return 'Medium';
  return 'Complex';
}
