const PREVIEW_LENGTH = 80;

/**
 * Round half away from zero to a fixed number of decimals.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const rounded = Math.sign(value) * Math.round(Math.abs(value) * factor) / factor;
  return rounded === 0 ? 0 : rounded;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Render a ratio as a percentage with two decimals (0.1234 -> "12.34%").
 */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

/**
 * Single-line preview of a post for terminal listings.
 */
export function preview(text: string, maxLength = PREVIEW_LENGTH): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  if (flat.length <= maxLength) return flat;
  return flat.slice(0, maxLength - 3) + '...';
}

/**
 * Parse a non-negative integer counter. Anything but plain digits is rejected.
 */
export function parseCount(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`Expected a non-negative integer, got "${value}"`);
  }
  return Number(trimmed);
}
