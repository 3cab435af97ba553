/**
 * @file packages/core/src/workflows/collect-workflow.ts
 * @description Downloads wiki pages for an entity kind and stores each one as Markdown under
 *              `data/<kind>/markdown/<title>_<revid>.md`. A page whose current revision is
 *              already on disk is skipped, so re-running only fetches what changed.
 */

import fs from 'node:fs';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import { resolveWikiConfig, type WikiConfigOverrides } from '../shared/config';
import { errorMessage, silentLogger, type Logger } from '../shared/logger';
import { paths, type EntityKind } from '../shared/paths';
import { revisionFilename } from '../shared/revisions';
import { createWikiClient, type WikiClient } from '../wiki/client';
import {
  extractStudentRoster,
  htmlToMarkdown,
  MISSING_PAGE_MARKER,
  ROSTER_TITLE_KEY,
  type RosterEntry,
} from '../wiki/html';

export type CrawlStatus = 'saved' | 'skipped' | 'failed' | 'invalid';

export interface CrawlResult {
  title: string;
  revid: number | null;
  status: CrawlStatus;
  message: string;
}

export interface CollectOptions {
  client?: WikiClient;
  config?: WikiConfigOverrides;
  logger?: Logger;
  /** Collect only these page titles instead of the kind's full listing. */
  titles?: string[];
  outputDir?: string;
}

export const GAME_PAGE_TITLE = '蔚蓝档案';
export const GAME_FILE_STEM = 'game_info';
export const SCHOOL_CATEGORY = 'Category:蔚蓝档案学校及地区';
export const STUDENT_ROSTER_PAGE = '蔚蓝档案/学生';

const titleListSchema = z.array(z.string());
const rosterSchema = z.array(z.record(z.string(), z.string()));

/** File-system safe stem for a page title; the revision suffix is added separately. */
export const fileStemFor = (kind: EntityKind, title: string): string =>
  kind === 'game' ? GAME_FILE_STEM : title.replace(/[\\/:*?"<>|]/g, '_');

const loadSchoolTitles = async (client: WikiClient, logger: Logger): Promise<string[]> => {
  const cachePath = path.join(paths.kindDir('school'), 'school_info.json');
  if (fs.existsSync(cachePath)) {
    logger.info(`loaded school list from ${cachePath}`);
    return titleListSchema.parse(JSON.parse(fs.readFileSync(cachePath, 'utf8')));
  }
  logger.warn(`${cachePath} not found, listing ${SCHOOL_CATEGORY}`);
  const titles = await client.listCategoryMembers(SCHOOL_CATEGORY);
  paths.ensureDir(path.dirname(cachePath));
  fs.writeFileSync(cachePath, JSON.stringify(titles, null, 2), 'utf8');
  logger.info(`saved ${titles.length} schools to ${cachePath}`);
  return titles;
};

const loadStudentRoster = async (client: WikiClient, logger: Logger): Promise<RosterEntry[]> => {
  const revid = await client.getPageRevisionId(STUDENT_ROSTER_PAGE);
  const cachePath = path.join(paths.kindDir('student'), `students_info_${revid}.json`);
  if (fs.existsSync(cachePath)) {
    logger.info(`loaded student roster from ${cachePath}`);
    return rosterSchema.parse(JSON.parse(fs.readFileSync(cachePath, 'utf8')));
  }
  logger.warn(`${cachePath} not found, reading ${STUDENT_ROSTER_PAGE}`);
  const roster = extractStudentRoster(await client.getPageHtml(STUDENT_ROSTER_PAGE));
  paths.ensureDir(path.dirname(cachePath));
  fs.writeFileSync(cachePath, JSON.stringify(roster, null, 2), 'utf8');
  return roster;
};

export const resolveTitles = async (
  kind: EntityKind,
  client: WikiClient,
  logger: Logger = silentLogger,
): Promise<string[]> => {
  if (kind === 'game') return [GAME_PAGE_TITLE];
  if (kind === 'school') return loadSchoolTitles(client, logger);
  const roster = await loadStudentRoster(client, logger);
  return roster
    .map((entry) => entry[ROSTER_TITLE_KEY] ?? '')
    .filter((title) => !title.includes(MISSING_PAGE_MARKER));
};

const collectPage = async (
  kind: EntityKind,
  title: string,
  client: WikiClient,
  outputDir: string,
): Promise<CrawlResult> => {
  if (!title.trim()) {
    return { title, revid: null, status: 'invalid', message: 'entry has no page title, skipped' };
  }
  try {
    const revid = await client.getPageRevisionId(title);
    const target = path.join(outputDir, revisionFilename(fileStemFor(kind, title), revid));
    if (fs.existsSync(target)) {
      return { title, revid, status: 'skipped', message: `revid=${revid} already saved` };
    }
    const markdown = htmlToMarkdown(await client.getPageHtml(title));
    fs.writeFileSync(target, markdown, 'utf8');
    return { title, revid, status: 'saved', message: `saved -> ${target}` };
  } catch (error) {
    return { title, revid: null, status: 'failed', message: errorMessage(error) };
  }
};

export const runCollectWorkflow = async (
  kind: EntityKind,
  options: CollectOptions = {},
): Promise<CrawlResult[]> => {
  const logger = options.logger ?? silentLogger;
  const config = resolveWikiConfig(options.config);
  const client = options.client ?? createWikiClient(config, logger);
  const outputDir = options.outputDir ?? paths.markdownDir(kind);
  paths.ensureDir(outputDir);

  const titles = options.titles ?? (await resolveTitles(kind, client, logger));
  const results: CrawlResult[] = [];
  for (const [index, title] of titles.entries()) {
    const result = await collectPage(kind, title, client, outputDir);
    const line = `${result.title} | ${result.status} | ${result.message}`;
    if (result.status === 'failed') {
      logger.error(line);
    } else if (result.status === 'invalid') {
      logger.warn(line);
    } else {
      logger.info(line);
    }
    results.push(result);
    if (index < titles.length - 1 && config.requestDelayMs > 0) {
      await sleep(config.requestDelayMs);
    }
  }
  return results;
};
