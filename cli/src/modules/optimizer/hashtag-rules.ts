import { extractHashtags, HASHTAG_PATTERN, keywordToHashtag } from '../analysis/hashtags.js';
import { splitWords } from '../text/normalize.js';

const SENTENCE_END = /[.!?]$/;
const TRUNCATION_MARKER = '...';
const PADDING_HASHTAG_COUNT = 2;

/**
 * Keep at most maxTags hashtags. Over the cap, every tag is stripped from the
 * body and the first maxTags are re-appended in their original order.
 */
export function limitHashtags(text: string, maxTags: number): string {
  const tags = extractHashtags(text);
  if (tags.length <= maxTags) return text;

  const kept = tags.slice(0, maxTags);
  const body = text.replace(HASHTAG_PATTERN, '');
  return `${body.trim()} ${kept.join(' ')}`.trim();
}

/**
 * Append up to maxTags hashtags built from keywords, skipping any tag the
 * text already carries (case-insensitive).
 */
export function ensureHashtagsFromKeywords(text: string, keywords: readonly string[], maxTags: number): string {
  const existing = new Set(extractHashtags(text).map(t => t.toLowerCase()));
  const toAdd: string[] = [];

  for (const keyword of keywords) {
    if (toAdd.length >= maxTags) break;
    const tag = keywordToHashtag(keyword);
    if (!tag || existing.has(tag.toLowerCase())) continue;
    existing.add(tag.toLowerCase());
    toAdd.push(tag);
  }

  if (toAdd.length === 0) return text;

  const separator = SENTENCE_END.test(text) ? ' ' : ' · ';
  return `${text}${separator}${toAdd.join(' ')}`.trim();
}

/**
 * Clamp the word count: truncate past maxWords, pad below minWords.
 *
 * Padding appends trending hashtags without checking the hashtag cap, so a
 * short post can end up with more than maxHashtags tags. That is accepted
 * house behavior; do not re-apply limitHashtags after this step.
 */
export function truncateOrPadWords(
  text: string,
  minWords: number,
  maxWords: number,
  paddingHashtags: readonly string[],
): string {
  const words = splitWords(text);
  if (words.length > maxWords) {
    return words.slice(0, maxWords).join(' ') + TRUNCATION_MARKER;
  }
  if (words.length < minWords) {
    const padding = paddingHashtags.slice(0, PADDING_HASHTAG_COUNT).join(' ');
    return `${text} ${padding}`.trim();
  }
  return text;
}
