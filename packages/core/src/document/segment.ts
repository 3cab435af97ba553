/**
 * @file packages/core/src/document/segment.ts
 * @description Splits a document's top-level nodes into named sections at the major heading
 *              level, keeping only the sections a caller asks for.
 */

import { isHeading, PREAMBLE_TITLE, type BlockNode, type OrphanPolicy } from './nodes';
import { flattenText } from './text';

export const MAJOR_HEADING_LEVEL = 2;

export interface SegmentOptions {
  level?: number;
  orphans?: OrphanPolicy;
}

export type SectionMap = Record<string, BlockNode[]>;

/**
 * Single pass over `nodes`. Every heading at `level` closes the pending section and opens a new
 * one named by the heading's trimmed text; other nodes are collected (without descending) only
 * while the open section is one of `targetTitles`. Content of other sections is discarded.
 *
 * A title that occurs twice is flushed twice, so the later occurrence replaces the earlier one.
 */
export const segmentSections = (
  nodes: BlockNode[],
  targetTitles: Iterable<string>,
  options: SegmentOptions = {},
): SectionMap => {
  if (!Array.isArray(nodes)) {
    throw new TypeError('segmentSections expects the document root node array.');
  }
  const { level = MAJOR_HEADING_LEVEL, orphans = 'drop' } = options;
  const targets = new Set(targetTitles);
  const sections: SectionMap = {};
  const preamble: BlockNode[] = [];
  let current: string | null = null;
  let buffer: BlockNode[] = [];

  const flush = (): void => {
    if (current !== null && targets.has(current)) {
      sections[current] = buffer;
    }
  };

  for (const node of nodes) {
    if (isHeading(node, level)) {
      flush();
      buffer = [];
      current = flattenText(node).trim();
      continue;
    }
    if (current === null) {
      if (orphans === 'preamble') preamble.push(node);
      continue;
    }
    if (targets.has(current)) {
      buffer.push(node);
    }
  }
  flush();

  if (orphans === 'preamble' && preamble.length) {
    return { [PREAMBLE_TITLE]: preamble, ...sections };
  }
  return sections;
};
