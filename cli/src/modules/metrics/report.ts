import type { StoredMetricsRow } from './store.js';

export type MetricsSummary =
  | { empty: false; count: number; avgCtr: number; avgEngagementRate: number }
  | { empty: true; count: 0 };

type RateCells = Pick<StoredMetricsRow, 'ctr' | 'engagement_rate'>;

function parseRate(value: string | number | null | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string' || value.trim() === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Average CTR and engagement rate over a snapshot of rows. Rows whose rates
 * cannot be parsed are skipped; no valid rows gives an explicit empty result.
 */
export function summarizeMetrics(rows: Iterable<RateCells>): MetricsSummary {
  let count = 0;
  let sumCtr = 0;
  let sumEng = 0;

  for (const row of rows) {
    const ctr = parseRate(row.ctr);
    const eng = parseRate(row.engagement_rate);
    if (ctr === null || eng === null) continue;
    sumCtr += ctr;
    sumEng += eng;
    count++;
  }

  if (count === 0) return { empty: true, count: 0 };

  return {
    empty: false,
    count,
    avgCtr: sumCtr / count,
    avgEngagementRate: sumEng / count,
  };
}
