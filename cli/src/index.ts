#!/usr/bin/env node
import { Command } from 'commander';
import { registerOptimizeCommand } from './commands/optimize.js';
import { registerMetricsCommand } from './commands/metrics.js';

const program = new Command();

program
  .name('postmetrics')
  .description('Optimize marketing copy and track post performance')
  .version('0.1.0');

// Register all commands
registerOptimizeCommand(program);
registerMetricsCommand(program);

export async function run(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv);
}

run().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
