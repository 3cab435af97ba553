/**
 * @file packages/core/src/shared/logger.ts
 * @description Logging sink handed to workflows and helpers that report diagnostics, so the
 *              structuring code never writes to the console on its own.
 */

import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const createConsoleLogger = (tag: string): Logger => ({
  info: (message) => console.log(`[${tag}] ${message}`),
  warn: (message) => console.warn(chalk.yellow(`[${tag}] ${message}`)),
  error: (message) => console.error(chalk.red(`[${tag}] ${message}`)),
});

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
