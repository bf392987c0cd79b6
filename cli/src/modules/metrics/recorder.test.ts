import { describe, expect, it } from 'vitest';
import Database from 'better-sqlite3';
import { openDb } from '../state/db.js';
import { createMetricsModel } from '../state/models/metrics.js';
import { createSentimentLexicon } from '../content/rules.js';
import { buildMetricsRecord, computeRates, recordMetrics, recordSentimentOnly, type RecordMetricsInput } from './recorder.js';
import { MetricsStoreError } from './store.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

function input(overrides: Partial<RecordMetricsInput> = {}): RecordMetricsInput {
  return {
    postId: 'post_1',
    variant: 'A',
    text: 'Great launch',
    impressions: 1000,
    clicks: 120,
    likes: 180,
    comments: 25,
    sentimentScore: 1,
    sentimentLabel: 'positive',
    ...overrides,
  };
}

describe('computeRates', () => {
  it('divides by impressions', () => {
    expect(computeRates({ impressions: 1000, clicks: 120, likes: 180, comments: 25 })).toEqual({
      impressions: 1000,
      ctr: 0.12,
      engagementRate: 0.205,
    });
  });

  it('clamps a zero denominator to 1', () => {
    const rates = computeRates({ impressions: 0, clicks: 5, likes: 2, comments: 1 });
    expect(rates.impressions).toBe(1);
    expect(rates.ctr).toBe(5);
    expect(rates.engagementRate).toBe(3);
  });
});

describe('buildMetricsRecord', () => {
  it('stamps the timestamp and rounds rates to four decimals', () => {
    const record = buildMetricsRecord(input({ impressions: 3, clicks: 1, likes: 1, comments: 0, sentimentScore: 0.123456 }), NOW);

    expect(record).toEqual({
      timestamp: '2026-03-01T12:00:00.000Z',
      post_id: 'post_1',
      variant: 'A',
      text: 'Great launch',
      sentiment_score: 0.1235,
      sentiment_label: 'positive',
      impressions: 3,
      clicks: 1,
      likes: 1,
      comments: 0,
      ctr: 0.3333,
      engagement_rate: 0.3333,
      ab_test_id: '',
      ab_winner: '',
      ab_reason: '',
    });
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('stores zero-counter rows with impressions of 1', () => {
    const record = buildMetricsRecord(input({ impressions: 0, clicks: 0, likes: 0, comments: 0 }), NOW);
    expect(record.impressions).toBe(1);
    expect(record.ctr).toBe(0);
    expect(record.engagement_rate).toBe(0);
  });
});

describe('recordMetrics', () => {
  it('creates the table and appends a row', () => {
    const db = openDb(':memory:');
    db.exec('DROP TABLE metrics');
    const store = createMetricsModel(db);

    const record = recordMetrics(store, input(), NOW);

    expect(record.ctr).toBe(0.12);
    expect([...store.scan()]).toHaveLength(1);
    db.close();
  });

  it('propagates store failures', () => {
    const db = new Database(':memory:');
    db.exec('CREATE TABLE metrics (id INTEGER PRIMARY KEY)');
    const store = createMetricsModel(db);

    expect(() => recordMetrics(store, input(), NOW)).toThrow(MetricsStoreError);
    db.close();
  });
});

describe('recordSentimentOnly', () => {
  const lexicon = createSentimentLexicon(['great'], ['bad']);

  it('stores a zero-counter row with empty ids by default', () => {
    const db = openDb(':memory:');
    const store = createMetricsModel(db);

    const record = recordSentimentOnly(store, { text: 'great great bad' }, lexicon, NOW);

    expect(record.post_id).toBe('');
    expect(record.variant).toBe('');
    expect(record.sentiment_score).toBe(0.3333);
    expect(record.sentiment_label).toBe('positive');
    expect(record.impressions).toBe(1);
    expect(record.ctr).toBe(0);
    expect([...store.scan()]).toHaveLength(1);
    db.close();
  });

  it('keeps a given post id and variant', () => {
    const db = openDb(':memory:');
    const record = recordSentimentOnly(createMetricsModel(db), { text: 'bad', postId: 'post_7', variant: 'B' }, lexicon, NOW);

    expect([record.post_id, record.variant, record.sentiment_label]).toEqual(['post_7', 'B', 'negative']);
    db.close();
  });
});
