import { formatPercent } from '../../utils/format.js';
import { computeRates, type EngagementCounters } from './recorder.js';

export type AlertKind = 'high-performing' | 'low-performance-negative-sentiment';

export interface AlertDecision {
  kind: AlertKind;
  message: string;
}

export interface AlertThresholds {
  highCtr: number;
  highEngagement: number;
  lowCtr: number;
}

export interface AlertInput {
  postId: string;
  variant: string;
  ctr: number;
  engagementRate: number;
  sentimentScore: number;
}

export const DEFAULT_ALERT_THRESHOLDS: AlertThresholds = Object.freeze({
  highCtr: 0.10,
  highEngagement: 0.15,
  lowCtr: 0.02,
});

/**
 * High performance wins over the low-performance check; at most one
 * decision is returned.
 */
export function shouldAlert(input: AlertInput, thresholds: AlertThresholds = DEFAULT_ALERT_THRESHOLDS): AlertDecision | null {
  const { postId, variant, ctr, engagementRate, sentimentScore } = input;

  if (ctr >= thresholds.highCtr || engagementRate >= thresholds.highEngagement) {
    return {
      kind: 'high-performing',
      message: [
        '🔥 High Performing Post!',
        `Post: ${postId} (${variant})`,
        `CTR=${formatPercent(ctr)} | ENG=${formatPercent(engagementRate)}`,
        `Sentiment=${sentimentScore.toFixed(2)}`,
      ].join('\n'),
    };
  } else if (ctr <= thresholds.lowCtr && sentimentScore < 0) {
    return {
      kind: 'low-performance-negative-sentiment',
      message: [
        '⚠️ Low Performance + Negative Sentiment',
        `Post: ${postId} (${variant})`,
        `CTR=${formatPercent(ctr)} | Sentiment=${sentimentScore.toFixed(2)}`,
      ].join('\n'),
    };
  }

  return null;
}

export interface PostAlertInput extends EngagementCounters {
  postId: string;
  variant: string;
  sentimentScore: number;
}

/**
 * Run the alert policy on rates computed from the raw counters, not the
 * four-decimal values that get stored.
 */
export function alertForPost(input: PostAlertInput, thresholds: AlertThresholds = DEFAULT_ALERT_THRESHOLDS): AlertDecision | null {
  const { ctr, engagementRate } = computeRates(input);
  return shouldAlert(
    {
      postId: input.postId,
      variant: input.variant,
      ctr,
      engagementRate,
      sentimentScore: input.sentimentScore,
    },
    thresholds,
  );
}
