import path from 'node:path';
import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { createContentEngine } from '../modules/content/engine.js';
import { optimizeContentFile } from '../modules/content/batch.js';
import { analyzeContent } from '../modules/scoring/content-analysis.js';

export function registerOptimizeCommand(program: Command): void {
  const optimize = program.command('optimize').description('Score and rewrite marketing copy');

  optimize
    .command('text')
    .description('Analyze one post and print its optimized version')
    .argument('<text>', 'Post text')
    .option('--json', 'Output as JSON')
    .action((text: string, opts: { json?: boolean }) => {
      const config = loadConfig();
      createLogger(config.logLevel);
      const engine = createContentEngine(config);
      const analysis = analyzeContent(text, engine);

      if (opts.json) {
        console.log(JSON.stringify(analysis, null, 2));
        return;
      }

      console.log(chalk.bold('\nOriginal:'));
      console.log(`  ${analysis.cleaned || chalk.dim('(empty)')}`);
      console.log(`  Sentiment:       ${chalk.cyan(analysis.originalSentiment.polarity)} (${analysis.originalSentiment.label})`);
      console.log(`  Readability:     ${chalk.cyan(analysis.readability)}`);
      console.log(`  Hashtags:        ${analysis.hashtags.length > 0 ? chalk.cyan(analysis.hashtags.join(' ')) : chalk.dim('none')}`);
      console.log(`  Trend relevance: ${chalk.cyan(analysis.trendRelevance)}`);
      console.log(`  Engagement:      ${chalk.cyan(analysis.engagementScore)}`);
      console.log(`  Call to action:  ${analysis.containsCta ? chalk.green('yes') : chalk.yellow('no')}`);

      console.log(chalk.bold('\nOptimized:'));
      console.log(`  ${chalk.green(analysis.optimized)}`);
      console.log(`  Sentiment:       ${chalk.cyan(analysis.optimizedSentiment.polarity)} (${analysis.optimizedSentiment.label})`);
    });

  optimize
    .command('file')
    .description('Analyze and optimize every row of a content CSV in place (keeps a .bak copy)')
    .argument('<csv>', 'CSV file with a Generated_Content column')
    .action((csv: string) => {
      const config = loadConfig();
      createLogger(config.logLevel);
      const engine = createContentEngine(config);
      const filePath = path.resolve(csv);

      const spinner = ora(`Optimizing ${filePath}...`).start();
      try {
        const result = optimizeContentFile(filePath, engine);
        if (result.failures.length > 0) {
          spinner.warn(`Processed ${result.rows} rows, ${result.failures.length} failed`);
          for (const failure of result.failures) {
            console.log(chalk.red(`  row ${failure.row}: ${failure.error}`));
          }
        } else {
          spinner.succeed(`Processed ${result.rows} rows`);
        }
        console.log(chalk.dim(`  Saved to ${result.filePath}`));
        console.log(chalk.dim(result.backupPath ? `  Backup: ${result.backupPath}` : '  No backup was written'));
      } catch (err) {
        spinner.fail(`Optimization failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
      }
    });
}
