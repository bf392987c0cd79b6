export const HASHTAG_PATTERN = /#[\p{L}\p{N}_]+/gu;

/**
 * Hashtags in order of appearance, duplicates kept.
 */
export function extractHashtags(text: unknown): string[] {
  if (typeof text !== 'string') return [];
  return text.match(HASHTAG_PATTERN) ?? [];
}

/**
 * Turn a keyword into a hashtag by dropping everything but letters, digits and _
 * ("Machine Learning" -> "#MachineLearning"). Returns null when nothing is left.
 */
export function keywordToHashtag(keyword: string): string | null {
  const body = keyword.replace(/[^\p{L}\p{N}_]+/gu, '');
  return body ? `#${body}` : null;
}
