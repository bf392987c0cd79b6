import { roundTo } from '../../utils/format.js';

/**
 * Fraction of trending keywords found in the text (0-1, two decimals).
 */
export function calculateTrendRelevance(text: string, keywords: readonly string[]): number {
  if (!text) return 0;
  const lower = text.toLowerCase();
  const matches = keywords.filter(keyword => lower.includes(keyword.toLowerCase())).length;
  return roundTo(matches / Math.max(1, keywords.length), 2);
}
