import fs from 'node:fs';
import path from 'node:path';
import { getLogger } from '../../utils/logger.js';
import { parseCsv, rowToRecord, stringifyCsvRow } from '../../utils/csv.js';
import {
  METRICS_COLUMNS,
  MetricsStoreError,
  recordToRow,
  type MetricsColumn,
  type MetricsRecord,
  type MetricsStore,
  type StoredMetricsRow,
} from './store.js';

const log = getLogger();

function toStoredRow(cells: Record<string, string>): StoredMetricsRow {
  const cell = (column: MetricsColumn): string => cells[column] ?? '';
  return {
    timestamp: cell('timestamp'),
    post_id: cell('post_id'),
    variant: cell('variant'),
    text: cell('text'),
    sentiment_score: cell('sentiment_score'),
    sentiment_label: cell('sentiment_label'),
    impressions: cell('impressions'),
    clicks: cell('clicks'),
    likes: cell('likes'),
    comments: cell('comments'),
    ctr: cell('ctr'),
    engagement_rate: cell('engagement_rate'),
    ab_test_id: cell('ab_test_id'),
    ab_winner: cell('ab_winner'),
    ab_reason: cell('ab_reason'),
  };
}

/**
 * Metrics kept in a single CSV file with a fixed header, one row per record.
 */
export function createCsvMetricsStore(filePath: string): MetricsStore {
  return {
    description: `csv:${filePath}`,

    createIfAbsent(): void {
      if (fs.existsSync(filePath)) return;
      try {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, stringifyCsvRow(METRICS_COLUMNS) + '\n', 'utf-8');
      } catch (err) {
        throw new MetricsStoreError(`Could not create metrics file ${filePath}`, { cause: err });
      }
      log.info({ filePath }, 'Created metrics file');
    },

    append(record: MetricsRecord): void {
      try {
        fs.appendFileSync(filePath, stringifyCsvRow(recordToRow(record)) + '\n', 'utf-8');
      } catch (err) {
        throw new MetricsStoreError(`Could not append to metrics file ${filePath}`, { cause: err });
      }
    },

    scan(): Iterable<StoredMetricsRow> {
      if (!fs.existsSync(filePath)) return [];

      let content: string;
      try {
        content = fs.readFileSync(filePath, 'utf-8');
      } catch (err) {
        throw new MetricsStoreError(`Could not read metrics file ${filePath}`, { cause: err });
      }

      return {
        *[Symbol.iterator]() {
          const [header, ...rows] = parseCsv(content);
          if (!header) return;
          for (const row of rows) {
            yield toStoredRow(rowToRecord(header, row));
          }
        },
      };
    },
  };
}
