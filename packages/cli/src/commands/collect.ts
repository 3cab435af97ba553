/**
 * @file packages/cli/src/commands/collect.ts
 * @description CLI wiring for the collect workflow. Business logic lives in
 *              `packages/core/src/workflows/collect-workflow.ts`.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import {
  createConsoleLogger,
  runCollectWorkflow,
  type CrawlResult,
  type EntityKind,
} from '@kivotos-codex/core';
import { kindArgument } from './kind';

type CollectCliOptions = {
  title?: string[];
  delay?: number;
  endpoint?: string;
};

const printSummary = (results: CrawlResult[]): void => {
  const counts = results.reduce<Record<string, number>>((acc, result) => {
    acc[result.status] = (acc[result.status] ?? 0) + 1;
    return acc;
  }, {});
  console.log(chalk.cyan('\n====== collect summary ======'));
  for (const result of results) {
    const color =
      result.status === 'failed' ? chalk.red : result.status === 'saved' ? chalk.green : chalk.gray;
    console.log(color(`  ${result.title} | ${result.status} | ${result.message}`));
  }
  console.log(
    chalk.white(
      `  saved ${counts.saved ?? 0}, skipped ${counts.skipped ?? 0}, failed ${counts.failed ?? 0}, invalid ${counts.invalid ?? 0}`,
    ),
  );
};

const collectCommand = new Command('collect')
  .description('Download wiki pages for an entity kind as Markdown snapshots')
  .addArgument(kindArgument())
  .option('-t, --title <title...>', 'Only collect these page titles')
  .option('--delay <ms>', 'Pause between pages in milliseconds', (value) => Number(value))
  .option('--endpoint <url>', 'MediaWiki api.php endpoint override')
  .action(async (kind: EntityKind, options: CollectCliOptions) => {
    const results = await runCollectWorkflow(kind, {
      titles: options.title,
      logger: createConsoleLogger('collect'),
      config: { requestDelayMs: options.delay, apiEndpoint: options.endpoint },
    });
    printSummary(results);
    if (results.some((result) => result.status === 'failed')) {
      process.exitCode = 1;
    }
  });

export default collectCommand;
