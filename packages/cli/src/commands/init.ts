/**
 * @file packages/cli/src/commands/init.ts
 * @description Interactive/non-interactive configuration. Captures the MediaWiki endpoint,
 *              User-Agent and request pacing in `.kivotosrc.json`.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import prompts from 'prompts';
import {
  CONFIG_PATH,
  FALLBACK_API_ENDPOINT,
  FALLBACK_USER_AGENT,
  readConfig,
  resolveWikiConfig,
  writeConfig,
} from '@kivotos-codex/core';

type InitOptions = {
  endpoint?: string;
  userAgent?: string;
  delay?: number;
  retries?: number;
  retryWait?: number;
  timeout?: number;
  yes?: boolean;
};

const normalize = (value?: string | null) =>
  value && value.trim().length ? value.trim() : undefined;
const normalizeUrl = (value?: string | null) =>
  value && value.trim().length ? value.trim().replace(/\/+$/, '') : undefined;
const finiteOrUndefined = (value: unknown): number | undefined =>
  typeof value === 'number' && Number.isFinite(value) ? value : undefined;

const initCommand = new Command('init')
  .description('Configure the wiki endpoint, User-Agent and request pacing')
  .option('--endpoint <url>', 'MediaWiki api.php URL')
  .option('--user-agent <ua>', 'User-Agent header sent with every request')
  .option('--delay <ms>', 'Pause between pages in milliseconds', (value) => Number(value))
  .option('--retries <number>', 'Attempts per request', (value) => Number(value))
  .option('--retry-wait <ms>', 'Pause between attempts in milliseconds', (value) => Number(value))
  .option('--timeout <ms>', 'Per-request timeout in milliseconds', (value) => Number(value))
  .option('-y, --yes', 'Accept current values for everything not given as a flag')
  .action(async (options: InitOptions) => {
    const existing = readConfig();
    const current = resolveWikiConfig({}, existing);
    const ask = !options.yes;
    const onCancel = () => {
      console.log(chalk.yellow('Initialization cancelled.'));
      process.exit(1);
    };

    const responses = await prompts(
      [
        {
          type: ask && !options.endpoint ? 'text' : null,
          name: 'endpoint',
          message: 'MediaWiki api.php URL',
          initial: existing.apiEndpoint ?? FALLBACK_API_ENDPOINT,
          validate: (value: string) =>
            value && value.trim().length ? true : 'Endpoint is required.',
        },
        {
          type: ask && !options.userAgent ? 'text' : null,
          name: 'userAgent',
          message: 'User-Agent',
          initial: existing.userAgent ?? FALLBACK_USER_AGENT,
        },
        {
          type: ask && options.delay === undefined ? 'number' : null,
          name: 'requestDelayMs',
          message: 'Milliseconds between pages',
          initial: current.requestDelayMs,
          validate: (value: number) => (value >= 0 ? true : 'Delay cannot be negative.'),
        },
        {
          type: ask && options.retries === undefined ? 'number' : null,
          name: 'retryAttempts',
          message: 'Attempts per request',
          initial: current.retryAttempts,
          validate: (value: number) => (value > 0 ? true : 'Attempts must be greater than zero.'),
        },
        {
          type: ask && options.retryWait === undefined ? 'number' : null,
          name: 'retryWaitMs',
          message: 'Milliseconds between attempts',
          initial: current.retryWaitMs,
          validate: (value: number) => (value >= 0 ? true : 'Wait cannot be negative.'),
        },
        {
          type: ask && options.timeout === undefined ? 'number' : null,
          name: 'timeoutMs',
          message: 'Request timeout in milliseconds',
          initial: current.timeoutMs,
          validate: (value: number) => (value > 0 ? true : 'Timeout must be greater than zero.'),
        },
      ],
      { onCancel },
    );

    const apiEndpoint =
      normalizeUrl(options.endpoint) ?? normalizeUrl(responses.endpoint) ?? current.apiEndpoint;
    const userAgent =
      normalize(options.userAgent) ?? normalize(responses.userAgent) ?? current.userAgent;

    try {
      const updated = writeConfig({
        apiEndpoint,
        userAgent,
        requestDelayMs:
          finiteOrUndefined(options.delay) ??
          finiteOrUndefined(responses.requestDelayMs) ??
          current.requestDelayMs,
        retryAttempts:
          finiteOrUndefined(options.retries) ??
          finiteOrUndefined(responses.retryAttempts) ??
          current.retryAttempts,
        retryWaitMs:
          finiteOrUndefined(options.retryWait) ??
          finiteOrUndefined(responses.retryWaitMs) ??
          current.retryWaitMs,
        timeoutMs:
          finiteOrUndefined(options.timeout) ??
          finiteOrUndefined(responses.timeoutMs) ??
          current.timeoutMs,
      });
      const resolved = resolveWikiConfig({}, updated);

      console.log(chalk.green('kivotos configured successfully.'));
      console.log(chalk.gray(`   Saved to ${CONFIG_PATH}`));
      console.log(
        [
          '',
          'Current defaults:',
          `  • Endpoint: ${resolved.apiEndpoint}`,
          `  • Delay between pages: ${resolved.requestDelayMs}ms`,
          `  • Attempts: ${resolved.retryAttempts} (wait ${resolved.retryWaitMs}ms)`,
          `  • Timeout: ${resolved.timeoutMs}ms`,
          `  • Redirects followed: ${resolved.maxRedirects}`,
          '',
        ].join('\n'),
      );
    } catch (error) {
      console.error(chalk.red(`[error] ${error instanceof Error ? error.message : String(error)}`));
      process.exit(1);
    }
  });

export default initCommand;
