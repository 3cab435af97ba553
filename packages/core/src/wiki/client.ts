/**
 * @file packages/core/src/wiki/client.ts
 * @description MediaWiki API client used by the collect workflow: revision ids, rendered page
 *              HTML (following redirect stubs), and category listings. Requests are retried on
 *              network failures, timeouts, 429 and 5xx responses.
 */

import fetch from 'node-fetch';
import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import type { WikiConfig } from '../shared/config';
import { errorMessage, silentLogger, type Logger } from '../shared/logger';
import { cleanWikiHtml, findRedirectTarget } from './html';

export interface WikiClient {
  getPageRevisionId(title: string): Promise<number>;
  getPageHtml(title: string): Promise<string>;
  listCategoryMembers(category: string): Promise<string[]>;
}

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

const apiErrorSchema = z.object({
  error: z.object({ code: z.string(), info: z.string().optional() }).optional(),
});

const revisionsSchema = apiErrorSchema.extend({
  query: z
    .object({
      pages: z.array(
        z.object({
          title: z.string().optional(),
          missing: z.boolean().optional(),
          revisions: z.array(z.object({ revid: z.number() })).optional(),
        }),
      ),
    })
    .optional(),
});

const parseSchema = apiErrorSchema.extend({
  parse: z.object({ title: z.string().optional(), text: z.string().optional() }).optional(),
});

const categorySchema = apiErrorSchema.extend({
  query: z
    .object({
      categorymembers: z.array(z.object({ title: z.string().optional() })).optional(),
    })
    .optional(),
  continue: z.record(z.string(), z.union([z.string(), z.number()])).optional(),
});

const isRetryable = (error: unknown): boolean =>
  !(error instanceof HttpError) || error.status === 429 || error.status >= 500;

export const createWikiClient = (config: WikiConfig, logger: Logger = silentLogger): WikiClient => {
  const requestOnce = async (params: Record<string, string>): Promise<unknown> => {
    const query = new URLSearchParams({ format: 'json', formatversion: '2', ...params });
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), config.timeoutMs);
    try {
      const response = await fetch(`${config.apiEndpoint}?${query.toString()}`, {
        headers: { 'User-Agent': config.userAgent, Accept: 'application/json' },
        signal: controller.signal,
      });
      if (!response.ok) {
        const snippet = (await response.text()).slice(0, 200);
        throw new HttpError(
          response.status,
          `HTTP ${response.status} ${response.statusText} (${snippet})`,
        );
      }
      return await response.json();
    } finally {
      clearTimeout(timer);
    }
  };

  const request = async <T>(params: Record<string, string>, schema: z.ZodType<T>): Promise<T> => {
    const label = params.page ?? params.titles ?? params.cmtitle ?? params.action;
    let lastError: unknown;
    for (let attempt = 1; attempt <= config.retryAttempts; attempt += 1) {
      try {
        return schema.parse(await requestOnce(params));
      } catch (error) {
        lastError = error;
        if (!isRetryable(error) || error instanceof z.ZodError) break;
        if (attempt < config.retryAttempts) {
          logger.warn(
            `${label}: attempt ${attempt}/${config.retryAttempts} failed (${errorMessage(error)}), retrying`,
          );
          await sleep(config.retryWaitMs);
        }
      }
    }
    throw lastError;
  };

  const assertNoApiError = (payload: z.infer<typeof apiErrorSchema>, label: string): void => {
    if (payload.error) {
      throw new Error(
        `MediaWiki API error for '${label}': ${payload.error.code}${payload.error.info ? ` (${payload.error.info})` : ''}`,
      );
    }
  };

  const getPageRevisionId = async (title: string): Promise<number> => {
    const payload = await request(
      { action: 'query', titles: title, prop: 'revisions', rvprop: 'ids' },
      revisionsSchema,
    );
    assertNoApiError(payload, title);
    const page = payload.query?.pages[0];
    const revid = page?.revisions?.[0]?.revid;
    if (!page || page.missing || revid === undefined) {
      throw new Error(`Page '${title}' has no revisions (missing page?)`);
    }
    return revid;
  };

  const getPageHtml = async (title: string, redirectCount = 0): Promise<string> => {
    const payload = await request({ action: 'parse', page: title }, parseSchema);
    assertNoApiError(payload, title);
    const html = payload.parse?.text;
    if (html === undefined) {
      logger.warn(`unexpected parse response for '${title}': missing parse.text`);
      return '';
    }
    const redirect = findRedirectTarget(html);
    if (redirect) {
      if (redirectCount >= config.maxRedirects) {
        throw new Error(`Too many redirects while resolving '${title}'`);
      }
      logger.info(`'${title}' redirects to '${redirect}', following`);
      return getPageHtml(redirect, redirectCount + 1);
    }
    return cleanWikiHtml(html);
  };

  const listCategoryMembers = async (category: string): Promise<string[]> => {
    const titles: string[] = [];
    let continuation: Record<string, string> = {};
    for (;;) {
      const payload = await request(
        {
          action: 'query',
          list: 'categorymembers',
          cmtitle: category,
          cmlimit: 'max',
          ...continuation,
        },
        categorySchema,
      );
      assertNoApiError(payload, category);
      for (const member of payload.query?.categorymembers ?? []) {
        if (member.title) titles.push(member.title);
      }
      if (!payload.continue) break;
      continuation = Object.fromEntries(
        Object.entries(payload.continue).map(([key, value]) => [key, String(value)]),
      );
    }
    return titles;
  };

  return {
    getPageRevisionId,
    getPageHtml: (title) => getPageHtml(title),
    listCategoryMembers,
  };
};
