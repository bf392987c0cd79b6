export const METRICS_COLUMNS = [
  'timestamp',
  'post_id',          // caller-chosen correlation id, not unique
  'variant',          // A / B / single
  'text',
  'sentiment_score',
  'sentiment_label',
  'impressions',
  'clicks',
  'likes',
  'comments',
  'ctr',
  'engagement_rate',
  'ab_test_id',
  'ab_winner',        // A / B / tie, or '' for the non-winning row
  'ab_reason',
] as const;

export type MetricsColumn = (typeof METRICS_COLUMNS)[number];

export interface MetricsRecord {
  readonly timestamp: string;
  readonly post_id: string;
  readonly variant: string;
  readonly text: string;
  readonly sentiment_score: number;
  readonly sentiment_label: string;
  readonly impressions: number;
  readonly clicks: number;
  readonly likes: number;
  readonly comments: number;
  readonly ctr: number;
  readonly engagement_rate: number;
  readonly ab_test_id: string;
  readonly ab_winner: string;
  readonly ab_reason: string;
}

/**
 * A row as read back from a store. Cells keep whatever type the backend
 * gives (CSV cells are strings) and may be unparsable.
 */
export type StoredMetricsRow = Record<MetricsColumn, string | number | null>;

/**
 * Append-only record store. scan() snapshots the rows present when it is
 * called; every iteration of the returned iterable reads that snapshot again.
 */
export interface MetricsStore {
  readonly description: string;
  createIfAbsent(): void;
  append(record: MetricsRecord): void;
  scan(): Iterable<StoredMetricsRow>;
}

export class MetricsStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MetricsStoreError';
  }
}

export function recordToRow(record: MetricsRecord): Array<string | number> {
  return METRICS_COLUMNS.map(column => record[column]);
}
