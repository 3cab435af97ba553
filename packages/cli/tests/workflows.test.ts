/**
 * @file tests/workflows.test.ts
 * @description Collect and build workflows against temporary directories and an in-memory wiki.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  buildRecordFromMarkdown,
  fileStemFor,
  runBuildWorkflow,
  runCollectWorkflow,
  type Logger,
  type WikiClient,
} from '@kivotos-codex/core';

const studentMarkdown = fs.readFileSync(
  new URL('./fixtures/student-page.md', import.meta.url),
  'utf8',
);

let workDir: string;

beforeEach(() => {
  workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'kivotos-test-'));
});

afterEach(() => {
  fs.rmSync(workDir, { recursive: true, force: true });
});

const createLogger = () => {
  const warnings: string[] = [];
  const logger: Logger = {
    info: () => undefined,
    warn: (message) => warnings.push(message),
    error: () => undefined,
  };
  return { logger, warnings };
};

describe('fileStemFor', () => {
  it('uses a fixed stem for the game page and sanitizes other titles', () => {
    expect(fileStemFor('game', '蔚蓝档案')).toBe('game_info');
    expect(fileStemFor('student', '白洲梓/泳装:2')).toBe('白洲梓_泳装_2');
  });
});

describe('runCollectWorkflow', () => {
  const revisions: Record<string, number> = { 白洲梓: 11, 阿露: 7, 蔚蓝档案: 300 };

  const createClient = (): WikiClient => ({
    getPageRevisionId: vi.fn(async (title: string) => {
      const revid = revisions[title];
      if (revid === undefined) throw new Error(`Page '${title}' has no revisions (missing page?)`);
      return revid;
    }),
    getPageHtml: vi.fn(async () => '<h2>简介</h2><p>正文内容</p>'),
    listCategoryMembers: vi.fn(async () => []),
  });

  it('saves new revisions and skips ones already on disk', async () => {
    const outputDir = path.join(workDir, 'markdown');
    fs.mkdirSync(outputDir);
    fs.writeFileSync(path.join(outputDir, '阿露_7.md'), '旧内容', 'utf8');
    const client = createClient();

    const results = await runCollectWorkflow('student', {
      client,
      outputDir,
      titles: ['白洲梓', ' ', '坏页面', '阿露'],
      config: { requestDelayMs: 0 },
    });

    expect(results).toEqual([
      {
        title: '白洲梓',
        revid: 11,
        status: 'saved',
        message: `saved -> ${path.join(outputDir, '白洲梓_11.md')}`,
      },
      { title: ' ', revid: null, status: 'invalid', message: 'entry has no page title, skipped' },
      {
        title: '坏页面',
        revid: null,
        status: 'failed',
        message: "Page '坏页面' has no revisions (missing page?)",
      },
      { title: '阿露', revid: 7, status: 'skipped', message: 'revid=7 already saved' },
    ]);
    expect(fs.readFileSync(path.join(outputDir, '白洲梓_11.md'), 'utf8')).toBe('## 简介\n\n正文内容');
    expect(fs.readFileSync(path.join(outputDir, '阿露_7.md'), 'utf8')).toBe('旧内容');
    expect(client.getPageHtml).toHaveBeenCalledTimes(1);
  });

  it('collects the single game page under its fixed stem', async () => {
    const outputDir = path.join(workDir, 'game');

    const results = await runCollectWorkflow('game', {
      client: createClient(),
      outputDir,
      config: { requestDelayMs: 0 },
    });

    expect(results.map((result) => result.status)).toEqual(['saved']);
    expect(fs.readdirSync(outputDir)).toEqual(['game_info_300.md']);
  });
});

describe('runBuildWorkflow', () => {
  it('builds the newest snapshot per page and honours exclusions', () => {
    const sourceDir = path.join(workDir, 'markdown');
    const targetDir = path.join(workDir, 'json');
    fs.mkdirSync(sourceDir);
    fs.writeFileSync(path.join(sourceDir, '白洲梓_100.md'), '## 简介\n\n旧简介', 'utf8');
    fs.writeFileSync(path.join(sourceDir, '白洲梓_200.md'), studentMarkdown, 'utf8');
    fs.writeFileSync(path.join(sourceDir, '初音未来_5.md'), '## 简介\n\n联动角色', 'utf8');
    fs.writeFileSync(path.join(sourceDir, 'readme.txt'), 'notes', 'utf8');
    const { logger, warnings } = createLogger();

    const results = runBuildWorkflow('student', { sourceDir, targetDir, logger });
    const byName = Object.fromEntries(results.map((result) => [result.name, result]));

    expect(Object.keys(byName).sort()).toEqual(['初音未来', '白洲梓'].sort());
    expect(byName['初音未来']).toEqual({
      name: '初音未来',
      source: path.join(sourceDir, '初音未来_5.md'),
      target: null,
      status: 'excluded',
    });
    expect(byName['白洲梓']).toEqual({
      name: '白洲梓',
      source: path.join(sourceDir, '白洲梓_200.md'),
      target: path.join(targetDir, '白洲梓.json'),
      status: 'built',
    });
    expect(JSON.parse(fs.readFileSync(path.join(targetDir, '白洲梓.json'), 'utf8'))).toEqual(
      buildRecordFromMarkdown('student', studentMarkdown),
    );
    expect(fs.existsSync(path.join(targetDir, '初音未来.json'))).toBe(false);
    expect(warnings).toEqual(['ignoring readme.txt: expected <name>_<revision>.<ext>']);
  });

  it('asks for a collect run when there is nothing to build', () => {
    const sourceDir = path.join(workDir, 'empty');

    expect(() => runBuildWorkflow('school', { sourceDir, targetDir: workDir })).toThrow(
      `No markdown files found in ${sourceDir}. Run 'kivotos collect school' first.`,
    );
  });
});
