/**
 * @file packages/core/src/workflows/build-workflow.ts
 * @description Converts the newest Markdown snapshot of every page of an entity kind into its
 *              canonical JSON record (`data/<kind>/json/<name>.json`).
 */

import fs from 'node:fs';
import path from 'node:path';
import { ENTITY_PROFILES } from '../entities/field-tables';
import { buildEntityRecord, type EntityRecord } from '../entities/records';
import { parseMarkdownDocument } from '../parsers/markdown';
import { errorMessage, silentLogger, type Logger } from '../shared/logger';
import { paths, type EntityKind } from '../shared/paths';
import { selectLatest } from '../shared/revisions';

export type BuildStatus = 'built' | 'excluded' | 'failed';

export interface BuildResult {
  name: string;
  source: string;
  target: string | null;
  status: BuildStatus;
  message?: string;
}

export interface BuildOptions {
  logger?: Logger;
  sourceDir?: string;
  targetDir?: string;
}

export const buildRecordFromMarkdown = (kind: EntityKind, markdown: string): EntityRecord =>
  buildEntityRecord(parseMarkdownDocument(markdown), ENTITY_PROFILES[kind]);

export const runBuildWorkflow = (kind: EntityKind, options: BuildOptions = {}): BuildResult[] => {
  const logger = options.logger ?? silentLogger;
  const sourceDir = options.sourceDir ?? paths.markdownDir(kind);
  const targetDir = options.targetDir ?? paths.jsonDir(kind);
  const profile = ENTITY_PROFILES[kind];

  const files = fs.existsSync(sourceDir) ? fs.readdirSync(sourceDir) : [];
  const latest = selectLatest(files, { extension: 'md', logger });
  const names = Object.keys(latest);
  if (!names.length) {
    throw new Error(`No markdown files found in ${sourceDir}. Run 'kivotos collect ${kind}' first.`);
  }

  paths.ensureDir(targetDir);
  const results: BuildResult[] = [];
  for (const name of names) {
    const source = path.join(sourceDir, latest[name]);
    if (profile.excluded?.includes(name)) {
      logger.info(`${name}: excluded, skipped`);
      results.push({ name, source, target: null, status: 'excluded' });
      continue;
    }
    try {
      const record = buildRecordFromMarkdown(kind, fs.readFileSync(source, 'utf8'));
      const target = path.join(targetDir, `${name}.json`);
      fs.writeFileSync(target, JSON.stringify(record, null, 2), 'utf8');
      logger.info(`${name}: ${path.basename(source)} -> ${target}`);
      results.push({ name, source, target, status: 'built' });
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`${name}: ${message}`);
      results.push({ name, source, target: null, status: 'failed', message });
    }
  }
  return results;
};
