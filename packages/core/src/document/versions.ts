/**
 * @file packages/core/src/document/versions.ts
 * @description Sections whose sub-headings name game versions (e.g. "日服" / "国服"): quote
 *              tables and game-data blocks, keyed by version title.
 */

import { blockToText } from './content';
import { isHeading, isLeafBlock, type BlockNode } from './nodes';
import { MAJOR_HEADING_LEVEL, segmentSections } from './segment';
import { tableToRecords, type QuoteEntry } from './tables';
import { flattenText } from './text';

export interface VersionedSectionOptions {
  majorLevel?: number;
  versionLevel?: number;
}

export interface QuoteSectionOptions extends VersionedSectionOptions {
  headerLabel?: string;
}

export const QUOTE_SECTION_TITLE = '角色台词';
export const GAME_DATA_SECTION_TITLE = '游戏数据';

const sectionNodes = (nodes: BlockNode[], title: string, majorLevel: number): BlockNode[] =>
  segmentSections(nodes, [title], { level: majorLevel })[title] ?? [];

/**
 * Quote tables grouped by the version heading above them. A version heading always yields an
 * entry, even when no table follows it; tables before the first version heading are ignored.
 */
export const parseQuoteSection = (
  nodes: BlockNode[],
  title: string = QUOTE_SECTION_TITLE,
  options: QuoteSectionOptions = {},
): Record<string, QuoteEntry[]> => {
  const { majorLevel = MAJOR_HEADING_LEVEL, versionLevel = 3, headerLabel } = options;
  const quotes: Record<string, QuoteEntry[]> = {};
  let version: string | null = null;

  for (const node of sectionNodes(nodes, title, majorLevel)) {
    if (isHeading(node, versionLevel)) {
      version = flattenText(node).trim();
      quotes[version] = [];
    } else if (node.type === 'table' && version !== null) {
      quotes[version].push(...tableToRecords(node, { headerLabel }));
    }
  }
  return quotes;
};

/** Leaf texts grouped by version heading; versions without any text are left out. */
export const parseVersionedSection = (
  nodes: BlockNode[],
  title: string = GAME_DATA_SECTION_TITLE,
  options: VersionedSectionOptions = {},
): Record<string, string[]> => {
  const { majorLevel = MAJOR_HEADING_LEVEL, versionLevel = 3 } = options;
  const versions: Record<string, string[]> = {};
  let version: string | null = null;
  let content: string[] = [];

  const seal = (): void => {
    if (version !== null && content.length) {
      versions[version] = content;
    }
  };

  for (const node of sectionNodes(nodes, title, majorLevel)) {
    if (isHeading(node, versionLevel)) {
      seal();
      version = flattenText(node).trim();
      content = [];
    } else if (isLeafBlock(node)) {
      const value = blockToText(node);
      if (value) content.push(value);
    }
  }
  seal();
  return versions;
};
