#!/usr/bin/env tsx
/**
 * @file packages/cli/src/cli.ts
 * @description Bootstraps the kivotos CLI, which collects Blue Archive wiki pages as Markdown
 *              snapshots and structures them into JSON records.
 *
 * Commands exposed by the entry point:
 *   - `init`: capture the wiki endpoint and request pacing in `.kivotosrc.json`.
 *   - `collect`: download the pages of an entity kind as `<name>_<revid>.md` snapshots.
 *   - `build`: turn the newest snapshot of every page into a JSON record.
 *   - `latest`: list the newest snapshot per page in a directory.
 *
 * @example
 *   kivotos init --endpoint https://moegirl.icu/api.php
 *   kivotos collect school
 *   kivotos collect student --title 白洲梓
 *   kivotos build student
 *   kivotos latest ~/.kivotos/data/students/markdown
 */

import chalk from 'chalk';
import { Command } from 'commander';
import figlet from 'figlet';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import buildCommand from './commands/build';
import collectCommand from './commands/collect';
import initCommand from './commands/init';
import latestCommand from './commands/latest';

const pkg = z
  .object({ version: z.string() })
  .parse(
    JSON.parse(fs.readFileSync(fileURLToPath(new URL('../package.json', import.meta.url)), 'utf8')),
  );

const program = new Command();
program
  .name('kivotos')
  .description('CLI for collecting Blue Archive wiki pages and structuring them into records')
  .version(pkg.version, '-v, --version', 'Display CLI version');

program.addCommand(initCommand);
program.addCommand(collectCommand);
program.addCommand(buildCommand);
program.addCommand(latestCommand);

const args = process.argv.slice(2);

if (!args.length) {
  const banner = figlet.textSync('KIVOTOS', { font: 'Standard' });
  console.log(chalk.hex('#7fd3ff')(banner));
  program.outputHelp();
  process.exit(0);
} else {
  await program.parseAsync();
}
