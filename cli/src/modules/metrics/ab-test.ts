import { getLogger } from '../../utils/logger.js';
import { formatPercent } from '../../utils/format.js';
import { analyzeLexiconSentiment } from '../analysis/sentiment.js';
import type { SentimentLexicon } from '../content/rules.js';
import { computeRates, recordMetrics, type EngagementCounters } from './recorder.js';
import type { MetricsRecord, MetricsStore } from './store.js';

const log = getLogger();

export type ABWinner = 'A' | 'B' | 'tie';
export type ABReason = 'higher CTR' | 'higher engagement' | 'similar performance';

export interface ABTestResult {
  testId: string;
  winner: ABWinner;
  reason: ABReason;
  aCtr: number;
  aEng: number;
  bCtr: number;
  bEng: number;
}

export interface ABVariantInput extends EngagementCounters {
  text: string;
}

export interface RecordABTestInput {
  testId: string;
  postId: string;
  a: ABVariantInput;
  b: ABVariantInput;
}

export interface RecordedABTest {
  result: ABTestResult;
  records: [MetricsRecord, MetricsRecord];
}

/**
 * Pick a winner: higher CTR, then higher engagement rate, then tie.
 * Rates come straight from the counters and are not rounded.
 */
export function evaluateABTest(testId: string, a: EngagementCounters, b: EngagementCounters): ABTestResult {
  const { ctr: aCtr, engagementRate: aEng } = computeRates(a);
  const { ctr: bCtr, engagementRate: bEng } = computeRates(b);

  let winner: ABWinner;
  let reason: ABReason;

  if (aCtr > bCtr) {
    winner = 'A';
    reason = 'higher CTR';
  } else if (bCtr > aCtr) {
    winner = 'B';
    reason = 'higher CTR';
  } else if (aEng > bEng) {
    winner = 'A';
    reason = 'higher engagement';
  } else if (bEng > aEng) {
    winner = 'B';
    reason = 'higher engagement';
  } else {
    winner = 'tie';
    reason = 'similar performance';
  }

  return { testId, winner, reason, aCtr, aEng, bCtr, bEng };
}

export function formatABExplanation(result: ABTestResult): string {
  return [
    `A/B Test (${result.testId}):`,
    `A: CTR=${formatPercent(result.aCtr)}, ENG=${formatPercent(result.aEng)}`,
    `B: CTR=${formatPercent(result.bCtr)}, ENG=${formatPercent(result.bEng)}`,
    `Winner: ${result.winner} (${result.reason})`,
  ].join('\n');
}

/**
 * Evaluate the test and log one row per variant. Only the winning row carries
 * ab_winner / ab_reason; the other row, or both on a tie, get ''.
 */
export function recordABTest(
  store: MetricsStore,
  input: RecordABTestInput,
  lexicon: SentimentLexicon,
  now?: Date,
): RecordedABTest {
  const result = evaluateABTest(input.testId, input.a, input.b);
  log.info({ testId: input.testId, winner: result.winner, reason: result.reason }, 'A/B test evaluated');

  const recordVariant = (variant: 'A' | 'B', counters: ABVariantInput): MetricsRecord => {
    const sentiment = analyzeLexiconSentiment(counters.text, lexicon);
    const won = result.winner === variant;
    return recordMetrics(
      store,
      {
        postId: input.postId,
        variant,
        text: counters.text,
        impressions: counters.impressions,
        clicks: counters.clicks,
        likes: counters.likes,
        comments: counters.comments,
        sentimentScore: sentiment.score,
        sentimentLabel: sentiment.label,
        abTestId: input.testId,
        abWinner: won ? result.winner : '',
        abReason: won ? result.reason : '',
      },
      now,
    );
  };

  return {
    result,
    records: [recordVariant('A', input.a), recordVariant('B', input.b)],
  };
}
