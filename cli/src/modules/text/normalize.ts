/**
 * Collapse whitespace runs to single spaces and trim. Non-string input
 * yields ''.
 */
export function normalizeText(text: unknown): string {
  if (typeof text !== 'string') return '';
  return text.replace(/\s+/g, ' ').trim();
}

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter(word => word.length > 0);
}

export function countWords(text: string): number {
  return splitWords(text).length;
}
