import type Database from 'better-sqlite3';
import { getLogger } from '../../../utils/logger.js';
import { METRICS_TABLE_SQL } from '../db.js';
import {
  MetricsStoreError,
  type MetricsRecord,
  type MetricsStore,
  type StoredMetricsRow,
} from '../../metrics/store.js';

const log = getLogger();

const INSERT_SQL = `
  INSERT INTO metrics (
    timestamp, post_id, variant, text, sentiment_score, sentiment_label,
    impressions, clicks, likes, comments, ctr, engagement_rate,
    ab_test_id, ab_winner, ab_reason
  ) VALUES (
    @timestamp, @post_id, @variant, @text, @sentiment_score, @sentiment_label,
    @impressions, @clicks, @likes, @comments, @ctr, @engagement_rate,
    @ab_test_id, @ab_winner, @ab_reason
  )
`;

const SELECT_PAGE_SQL = `
  SELECT id, timestamp, post_id, variant, text, sentiment_score, sentiment_label,
         impressions, clicks, likes, comments, ctr, engagement_rate,
         ab_test_id, ab_winner, ab_reason
  FROM metrics
  WHERE id > ? AND id <= ?
  ORDER BY id ASC
  LIMIT ?
`;

const DEFAULT_PAGE_SIZE = 500;

type PagedRow = StoredMetricsRow & { id: number };

export interface MetricsModelOptions {
  /** Rows read per query while scanning */
  pageSize?: number;
}

/**
 * SQLite-backed metrics store. Rows are only ever inserted. Statements are
 * prepared on first use so the table may be created after the model.
 *
 * scan() reads in pages keyed by id, so no statement stays open between rows
 * and the same connection can append while a scan is being consumed.
 */
export function createMetricsModel(db: Database.Database, options: MetricsModelOptions = {}): MetricsStore {
  const pageSize = Math.max(1, options.pageSize ?? DEFAULT_PAGE_SIZE);

  let insert: Database.Statement<[MetricsRecord]> | undefined;
  let highWaterMark: Database.Statement<[], { maxId: number | null }> | undefined;
  let selectPage: Database.Statement<[number, number, number], PagedRow> | undefined;

  const readPage = (afterId: number, maxId: number): PagedRow[] => {
    try {
      selectPage ??= db.prepare<[number, number, number], PagedRow>(SELECT_PAGE_SQL);
      return selectPage.all(afterId, maxId, pageSize);
    } catch (err) {
      throw new MetricsStoreError('Could not read the metrics table', { cause: err });
    }
  };

  return {
    description: `sqlite:${db.name}`,

    createIfAbsent(): void {
      try {
        db.exec(METRICS_TABLE_SQL);
      } catch (err) {
        throw new MetricsStoreError('Could not create the metrics table', { cause: err });
      }
    },

    append(record: MetricsRecord): void {
      try {
        insert ??= db.prepare<MetricsRecord>(INSERT_SQL);
        insert.run(record);
      } catch (err) {
        throw new MetricsStoreError(`Could not append metrics for post "${record.post_id}"`, { cause: err });
      }
      log.debug({ postId: record.post_id }, 'Metrics row inserted');
    },

    scan(): Iterable<StoredMetricsRow> {
      let maxId: number;
      try {
        highWaterMark ??= db.prepare<[], { maxId: number | null }>('SELECT MAX(id) as maxId FROM metrics');
        maxId = highWaterMark.get()?.maxId ?? 0;
      } catch (err) {
        throw new MetricsStoreError('Could not read the metrics table', { cause: err });
      }

      return {
        *[Symbol.iterator]() {
          let afterId = 0;
          for (;;) {
            const page = readPage(afterId, maxId);
            for (const { id, ...row } of page) {
              afterId = id;
              yield row;
            }
            if (page.length < pageSize) return;
          }
        },
      };
    },
  };
}
