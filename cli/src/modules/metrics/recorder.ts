import { getLogger } from '../../utils/logger.js';
import { roundTo } from '../../utils/format.js';
import { analyzeLexiconSentiment } from '../analysis/sentiment.js';
import type { SentimentLexicon } from '../content/rules.js';
import type { MetricsRecord, MetricsStore } from './store.js';

const log = getLogger();

const RATE_DECIMALS = 4;

export interface EngagementCounters {
  impressions: number;
  clicks: number;
  likes: number;
  comments: number;
}

export interface EngagementRates {
  /** Impressions clamped to at least 1 */
  impressions: number;
  ctr: number;
  engagementRate: number;
}

export interface RecordMetricsInput extends EngagementCounters {
  postId: string;
  variant: string;
  text: string;
  sentimentScore: number;
  sentimentLabel: string;
  abTestId?: string;
  abWinner?: string;
  abReason?: string;
}

/**
 * CTR and engagement rate with the impressions denominator clamped to 1.
 * Unrounded.
 */
export function computeRates(counters: EngagementCounters): EngagementRates {
  const impressions = Math.max(1, counters.impressions);
  return {
    impressions,
    ctr: counters.clicks / impressions,
    engagementRate: (counters.likes + counters.comments) / impressions,
  };
}

export function buildMetricsRecord(input: RecordMetricsInput, now: Date = new Date()): MetricsRecord {
  const { impressions, ctr, engagementRate } = computeRates(input);

  return Object.freeze({
    timestamp: now.toISOString(),
    post_id: input.postId,
    variant: input.variant,
    text: input.text,
    sentiment_score: roundTo(input.sentimentScore, RATE_DECIMALS),
    sentiment_label: input.sentimentLabel,
    impressions,
    clicks: input.clicks,
    likes: input.likes,
    comments: input.comments,
    ctr: roundTo(ctr, RATE_DECIMALS),
    engagement_rate: roundTo(engagementRate, RATE_DECIMALS),
    ab_test_id: input.abTestId ?? '',
    ab_winner: input.abWinner ?? '',
    ab_reason: input.abReason ?? '',
  });
}

/**
 * Build a metrics record and append it to the store. Store failures propagate.
 */
export function recordMetrics(store: MetricsStore, input: RecordMetricsInput, now?: Date): MetricsRecord {
  const record = buildMetricsRecord(input, now);

  store.createIfAbsent();
  store.append(record);

  log.info(
    { postId: record.post_id, variant: record.variant, ctr: record.ctr, engagementRate: record.engagement_rate },
    'Metrics recorded',
  );

  return record;
}

export interface SentimentRowInput {
  text: string;
  postId?: string;
  variant?: string;
}

/**
 * Score text with the word-list analyzer and store it as a zero-counter row.
 * Post id and variant default to ''.
 */
export function recordSentimentOnly(
  store: MetricsStore,
  input: SentimentRowInput,
  lexicon: SentimentLexicon,
  now?: Date,
): MetricsRecord {
  const sentiment = analyzeLexiconSentiment(input.text, lexicon);
  return recordMetrics(
    store,
    {
      postId: input.postId ?? '',
      variant: input.variant ?? '',
      text: input.text,
      impressions: 0,
      clicks: 0,
      likes: 0,
      comments: 0,
      sentimentScore: sentiment.score,
      sentimentLabel: sentiment.label,
    },
    now,
  );
}
