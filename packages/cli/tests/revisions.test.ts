/**
 * @file tests/revisions.test.ts
 * @description Newest-revision selection over `<name>_<revid>.<ext>` snapshot names.
 */

import { describe, expect, it } from 'vitest';
import {
  parseRevisionFilename,
  revisionFilename,
  selectLatest,
  type Logger,
} from '@kivotos-codex/core';

const recordingLogger = () => {
  const warnings: string[] = [];
  const logger: Logger = {
    info: () => undefined,
    warn: (message) => warnings.push(message),
    error: () => undefined,
  };
  return { logger, warnings };
};

describe('parseRevisionFilename', () => {
  it('splits the name at the last underscore before the revision', () => {
    expect(parseRevisionFilename('game_info_12.md')).toEqual({
      name: 'game_info',
      revision: 12,
      extension: 'md',
    });
  });

  it('rejects names without a numeric revision', () => {
    expect(parseRevisionFilename('白洲梓.md')).toBeNull();
    expect(parseRevisionFilename('白洲梓_1a.md')).toBeNull();
  });
});

describe('revisionFilename', () => {
  it('defaults to the markdown extension', () => {
    expect(revisionFilename('白洲梓', 42)).toBe('白洲梓_42.md');
    expect(revisionFilename('白洲梓', 42, 'json')).toBe('白洲梓_42.json');
  });
});

describe('selectLatest', () => {
  it('keeps the numerically highest revision per name', () => {
    const { logger, warnings } = recordingLogger();
    const latest = selectLatest(
      ['白洲梓_100.md', '白洲梓_250.md', '白洲梓_99.md', 'game_info_7.md', 'notes.txt', '阿露_5.json'],
      { extension: 'md', logger },
    );
    expect(latest).toEqual({ 白洲梓: '白洲梓_250.md', game_info: 'game_info_7.md' });
    expect(warnings).toEqual([
      'ignoring notes.txt: expected <name>_<revision>.<ext>',
      'ignoring 阿露_5.json: expected a .md file',
    ]);
  });

  it('is a fixed point on its own selection', () => {
    const latest = selectLatest(['甲_10.md', '甲_7.md', '乙_3.md']);
    expect(latest).toEqual({ 甲: '甲_10.md', 乙: '乙_3.md' });
    expect(selectLatest(Object.values(latest))).toEqual(latest);
  });

  it('lets the later file win when revisions tie', () => {
    expect(selectLatest(['a_5.md', 'a_5.txt'])).toEqual({ a: 'a_5.txt' });
  });

  it('returns an empty map for an empty listing', () => {
    expect(selectLatest([])).toEqual({});
  });
});
