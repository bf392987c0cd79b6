import { InvalidArgumentError, type Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig, type Config } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { formatPercent, parseCount, preview } from '../utils/format.js';
import { closeDb } from '../modules/state/db.js';
import { createContentEngine } from '../modules/content/engine.js';
import { analyzeLexiconSentiment } from '../modules/analysis/sentiment.js';
import { openMetricsStore } from '../modules/metrics/open-store.js';
import { recordMetrics, recordSentimentOnly } from '../modules/metrics/recorder.js';
import { formatABExplanation, recordABTest } from '../modules/metrics/ab-test.js';
import { summarizeMetrics } from '../modules/metrics/report.js';
import { alertForPost, type AlertThresholds } from '../modules/metrics/alerts.js';
import { createNotifier } from '../modules/notify/slack.js';

function count(value: string): number {
  try {
    return parseCount(value);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

function alertThresholds(config: Config): AlertThresholds {
  return {
    highCtr: config.alertHighCtr,
    highEngagement: config.alertHighEngagement,
    lowCtr: config.alertLowCtr,
  };
}

interface LogOptions {
  postId: string;
  variant: string;
  text: string;
  impressions: number;
  clicks: number;
  likes: number;
  comments: number;
}

interface ABOptions {
  testId: string;
  postId: string;
  aText: string;
  aImpressions: number;
  aClicks: number;
  aLikes: number;
  aComments: number;
  bText: string;
  bImpressions: number;
  bClicks: number;
  bLikes: number;
  bComments: number;
}

export function registerMetricsCommand(program: Command): void {
  const metrics = program.command('metrics').description('Record post performance and run experiments');

  metrics
    .command('sentiment')
    .description('Score text with the word-list sentiment analyzer and store it as a zero-counter row')
    .argument('<text>', 'Text to score')
    .option('--post-id <id>', 'Post id for the stored row', '')
    .option('--variant <variant>', 'Variant for the stored row', '')
    .action((text: string, opts: { postId: string; variant: string }) => {
      const config = loadConfig();
      const log = createLogger(config.logLevel);
      const engine = createContentEngine(config);
      const store = openMetricsStore(config);

      try {
        const record = recordSentimentOnly(
          store,
          { text, postId: opts.postId, variant: opts.variant },
          engine.sentimentLexicon,
        );
        console.log(`Sentiment: ${chalk.cyan(record.sentiment_score.toFixed(2))} (${record.sentiment_label})`);
        console.log(chalk.dim(`Stored in ${store.description}`));
      } catch (err) {
        log.error({ err }, 'Could not store sentiment row');
        process.exitCode = 1;
      } finally {
        closeDb();
      }
    });

  metrics
    .command('log')
    .description('Record one post\'s counters and check the alert policy')
    .requiredOption('--post-id <id>', 'Post id')
    .requiredOption('--text <text>', 'Post text')
    .option('--variant <variant>', 'Variant label', 'single')
    .option('--impressions <n>', 'Impressions', count, 0)
    .option('--clicks <n>', 'Clicks', count, 0)
    .option('--likes <n>', 'Likes', count, 0)
    .option('--comments <n>', 'Comments', count, 0)
    .action(async (opts: LogOptions) => {
      const config = loadConfig();
      const log = createLogger(config.logLevel);
      const engine = createContentEngine(config);
      const sentiment = analyzeLexiconSentiment(opts.text, engine.sentimentLexicon);
      const store = openMetricsStore(config);

      try {
        const record = recordMetrics(store, {
          postId: opts.postId,
          variant: opts.variant,
          text: opts.text,
          impressions: opts.impressions,
          clicks: opts.clicks,
          likes: opts.likes,
          comments: opts.comments,
          sentimentScore: sentiment.score,
          sentimentLabel: sentiment.label,
        });

        console.log(chalk.bold(`\nRecorded ${record.post_id} (${record.variant})`));
        console.log(chalk.dim(`  ${preview(record.text)}`));
        console.log(`  CTR:        ${chalk.cyan(formatPercent(record.ctr))}`);
        console.log(`  Engagement: ${chalk.cyan(formatPercent(record.engagement_rate))}`);
        console.log(`  Sentiment:  ${chalk.cyan(record.sentiment_score.toFixed(2))} (${record.sentiment_label})`);

        const decision = alertForPost(
          {
            postId: opts.postId,
            variant: opts.variant,
            impressions: opts.impressions,
            clicks: opts.clicks,
            likes: opts.likes,
            comments: opts.comments,
            sentimentScore: sentiment.score,
          },
          alertThresholds(config),
        );

        if (decision) {
          console.log(chalk.yellow(`\n${decision.message}`));
          const notifier = createNotifier(config);
          try {
            await notifier.send(decision.message);
          } catch (err) {
            log.warn({ err, notifier: notifier.name }, 'Alert delivery failed');
          }
        }
      } catch (err) {
        log.error({ err }, 'Could not record metrics');
        process.exitCode = 1;
      } finally {
        closeDb();
      }
    });

  metrics
    .command('ab')
    .description('Evaluate an A/B test and record both variants')
    .requiredOption('--test-id <id>', 'Experiment id')
    .requiredOption('--post-id <id>', 'Post id shared by both variants')
    .requiredOption('--a-text <text>', 'Variant A text')
    .requiredOption('--b-text <text>', 'Variant B text')
    .option('--a-impressions <n>', 'Variant A impressions', count, 0)
    .option('--a-clicks <n>', 'Variant A clicks', count, 0)
    .option('--a-likes <n>', 'Variant A likes', count, 0)
    .option('--a-comments <n>', 'Variant A comments', count, 0)
    .option('--b-impressions <n>', 'Variant B impressions', count, 0)
    .option('--b-clicks <n>', 'Variant B clicks', count, 0)
    .option('--b-likes <n>', 'Variant B likes', count, 0)
    .option('--b-comments <n>', 'Variant B comments', count, 0)
    .action((opts: ABOptions) => {
      const config = loadConfig();
      const log = createLogger(config.logLevel);
      const engine = createContentEngine(config);
      const store = openMetricsStore(config);

      try {
        const { result } = recordABTest(
          store,
          {
            testId: opts.testId,
            postId: opts.postId,
            a: {
              text: opts.aText,
              impressions: opts.aImpressions,
              clicks: opts.aClicks,
              likes: opts.aLikes,
              comments: opts.aComments,
            },
            b: {
              text: opts.bText,
              impressions: opts.bImpressions,
              clicks: opts.bClicks,
              likes: opts.bLikes,
              comments: opts.bComments,
            },
          },
          engine.sentimentLexicon,
        );

        console.log('');
        console.log(formatABExplanation(result));
        console.log(chalk.dim(`\nStored in ${store.description}`));
      } catch (err) {
        log.error({ err }, 'Could not record A/B test');
        process.exitCode = 1;
      } finally {
        closeDb();
      }
    });

  metrics
    .command('report')
    .description('Average CTR and engagement rate over all recorded rows')
    .option('--json', 'Output as JSON')
    .action((opts: { json?: boolean }) => {
      const config = loadConfig();
      createLogger(config.logLevel);
      const store = openMetricsStore(config);

      const spinner = opts.json ? null : ora(`Reading ${store.description}...`).start();
      try {
        const summary = summarizeMetrics(store.scan());
        spinner?.stop();

        if (opts.json) {
          console.log(JSON.stringify(summary, null, 2));
          return;
        }

        if (summary.empty) {
          console.log(chalk.yellow('No metrics recorded yet.'));
          return;
        }

        console.log(chalk.bold('\nMetrics Summary'));
        console.log(`  Rows:           ${chalk.cyan(summary.count)}`);
        console.log(`  Avg CTR:        ${chalk.cyan(formatPercent(summary.avgCtr))}`);
        console.log(`  Avg engagement: ${chalk.cyan(formatPercent(summary.avgEngagementRate))}`);
      } catch (err) {
        spinner?.fail(`Could not read metrics: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
      } finally {
        closeDb();
      }
    });
}
