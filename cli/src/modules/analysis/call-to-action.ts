export function containsCallToAction(text: string, phrases: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return phrases.some(phrase => lower.includes(phrase.toLowerCase()));
}
