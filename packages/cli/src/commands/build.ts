/**
 * @file packages/cli/src/commands/build.ts
 * @description Builds canonical JSON records from the newest Markdown snapshot of each page.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import ora from 'ora';
import { errorMessage, runBuildWorkflow, type EntityKind } from '@kivotos-codex/core';
import { kindArgument } from './kind';

type BuildCliOptions = {
  source?: string;
  out?: string;
};

const buildCommand = new Command('build')
  .description('Convert collected Markdown snapshots into JSON records')
  .addArgument(kindArgument())
  .option('--source <dir>', 'Directory holding <name>_<revid>.md files')
  .option('--out <dir>', 'Directory receiving <name>.json records')
  .action((kind: EntityKind, options: BuildCliOptions) => {
    const spinner = ora(`[build] ${kind}: reading snapshots`).start();
    const warnings: string[] = [];
    try {
      const results = runBuildWorkflow(kind, {
        sourceDir: options.source,
        targetDir: options.out,
        logger: {
          info: (message) => {
            spinner.text = `[build] ${kind}: ${message}`;
          },
          warn: (message) => warnings.push(message),
          error: (message) => warnings.push(message),
        },
      });
      const failed = results.filter((result) => result.status === 'failed');
      const built = results.filter((result) => result.status === 'built');
      if (failed.length) {
        spinner.warn(`[build] ${kind}: ${built.length} built, ${failed.length} failed`);
        process.exitCode = 1;
      } else {
        spinner.succeed(`[build] ${kind}: ${built.length} records written`);
      }
    } catch (error) {
      spinner.fail(`[build] ${kind}: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
    for (const warning of warnings) {
      console.warn(chalk.yellow(`  ${warning}`));
    }
  });

export default buildCommand;
