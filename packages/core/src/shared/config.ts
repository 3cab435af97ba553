/**
 * @file packages/core/src/shared/config.ts
 * @description Handles persistent kivotos CLI configuration (.kivotosrc.json).
 */

import fs from 'node:fs';
import { z } from 'zod';
import { paths } from './paths';

const configSchema = z
  .object({
    apiEndpoint: z.string().url(),
    userAgent: z.string().min(1),
    requestDelayMs: z.number().int().nonnegative(),
    retryAttempts: z.number().int().positive(),
    retryWaitMs: z.number().int().nonnegative(),
    maxRedirects: z.number().int().nonnegative(),
    timeoutMs: z.number().int().positive(),
  })
  .partial();

export type KivotosConfig = z.infer<typeof configSchema>;

export const CONFIG_PATH = paths.CONFIG;

export const FALLBACK_API_ENDPOINT = 'https://moegirl.icu/api.php';
export const FALLBACK_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';
const FALLBACK_REQUEST_DELAY_MS = 2000;
const FALLBACK_RETRY_ATTEMPTS = 3;
const FALLBACK_RETRY_WAIT_MS = 5000;
const FALLBACK_MAX_REDIRECTS = 5;
const FALLBACK_TIMEOUT_MS = 20000;

const cleanUrl = (value?: string | null): string | undefined => {
  if (!value) return undefined;
  const trimmed = value.trim().replace(/\/+$/, '');
  return trimmed.length ? trimmed : undefined;
};

const normalizeKey = (value?: string | null): string | undefined => {
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
};

const readFile = (): KivotosConfig => {
  if (!fs.existsSync(CONFIG_PATH)) {
    return {};
  }
  try {
    const raw = fs.readFileSync(CONFIG_PATH, 'utf8');
    const parsed = configSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
};

export const readConfig = (): KivotosConfig => readFile();

export const writeConfig = (update: Partial<KivotosConfig>): KivotosConfig => {
  const next = configSchema.parse({
    ...readFile(),
    ...update,
  });
  paths.ensureDir(paths.ROOT);
  fs.writeFileSync(CONFIG_PATH, JSON.stringify(next, null, 2), 'utf8');
  return next;
};

export type WikiConfig = Required<KivotosConfig>;

export type WikiConfigOverrides = Partial<KivotosConfig>;

export const resolveWikiConfig = (
  overrides: WikiConfigOverrides = {},
  file: KivotosConfig = readFile(),
): WikiConfig => ({
  apiEndpoint:
    cleanUrl(overrides.apiEndpoint) ?? cleanUrl(file.apiEndpoint) ?? FALLBACK_API_ENDPOINT,
  userAgent:
    normalizeKey(overrides.userAgent) ?? normalizeKey(file.userAgent) ?? FALLBACK_USER_AGENT,
  requestDelayMs: overrides.requestDelayMs ?? file.requestDelayMs ?? FALLBACK_REQUEST_DELAY_MS,
  retryAttempts: overrides.retryAttempts ?? file.retryAttempts ?? FALLBACK_RETRY_ATTEMPTS,
  retryWaitMs: overrides.retryWaitMs ?? file.retryWaitMs ?? FALLBACK_RETRY_WAIT_MS,
  maxRedirects: overrides.maxRedirects ?? file.maxRedirects ?? FALLBACK_MAX_REDIRECTS,
  timeoutMs: overrides.timeoutMs ?? file.timeoutMs ?? FALLBACK_TIMEOUT_MS,
});
