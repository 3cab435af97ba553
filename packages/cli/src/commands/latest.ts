/**
 * @file packages/cli/src/commands/latest.ts
 * @description Prints the newest `<name>_<revid>` snapshot per page found in a directory.
 */

import { Command } from 'commander';
import fs from 'node:fs';
import { createConsoleLogger, selectLatest } from '@kivotos-codex/core';

type LatestCliOptions = {
  ext?: string;
};

const latestCommand = new Command('latest')
  .description('Show the newest revision file per page in a directory')
  .argument('<dir>', 'Directory to scan')
  .option('--ext <extension>', 'Only consider files with this extension', 'md')
  .action((dir: string, options: LatestCliOptions) => {
    if (!fs.existsSync(dir)) {
      throw new Error(`Directory ${dir} does not exist.`);
    }
    const selection = selectLatest(fs.readdirSync(dir).sort(), {
      extension: options.ext,
      logger: createConsoleLogger('latest'),
    });
    console.log(JSON.stringify(selection, null, 2));
  });

export default latestCommand;
