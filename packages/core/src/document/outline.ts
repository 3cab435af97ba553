/**
 * @file packages/core/src/document/outline.ts
 * @description Builds a nested outline from a flat node run, one heading level at a time.
 */

import { blockToText, type ContentItem } from './content';
import { isHeading, isLeafBlock, PREAMBLE_TITLE, type BlockNode, type OrphanPolicy } from './nodes';
import { flattenText } from './text';

export interface Section {
  title: string;
  content: ContentItem[];
  subsections?: Section[];
}

export interface GroupOptions {
  orphans?: OrphanPolicy;
}

/** Index of the first heading at or above `level` from `start`, or `nodes.length`. */
const findRunEnd = (nodes: BlockNode[], start: number, level: number): number => {
  for (let i = start; i < nodes.length; i += 1) {
    const node = nodes[i];
    if (node.type === 'heading' && node.level <= level) {
      return i;
    }
  }
  return nodes.length;
};

/**
 * Groups `nodes` by headings at `level`. Leaf blocks land in the open section's content; a
 * deeper heading takes the run of nodes up to the next heading at or above `level`, which is
 * grouped recursively at `level + 1` and attached as `subsections`.
 *
 * Content that precedes the first heading at `level` has no section to land in and is dropped,
 * unless `orphans: 'preamble'` collects it into a section titled `PREAMBLE_TITLE`.
 */
export const groupByLevel = (
  nodes: BlockNode[],
  level: number,
  options: GroupOptions = {},
): Section[] => {
  const { orphans = 'drop' } = options;
  const result: Section[] = [];
  let current: Section | null = null;

  const target = (): Section | null => {
    if (!current && orphans === 'preamble') {
      current = { title: PREAMBLE_TITLE, content: [] };
    }
    return current;
  };

  let index = 0;
  while (index < nodes.length) {
    const node = nodes[index];

    if (isHeading(node, level)) {
      if (current) result.push(current);
      current = { title: flattenText(node).trim(), content: [] };
      index += 1;
      continue;
    }

    if (node.type === 'heading' && node.level > level) {
      const end = findRunEnd(nodes, index + 1, level);
      const nested = groupByLevel(nodes.slice(index, end), level + 1, options);
      const owner = target();
      if (owner && nested.length) {
        owner.subsections = [...(owner.subsections ?? []), ...nested];
      }
      index = end;
      continue;
    }

    if (isLeafBlock(node)) {
      const value = blockToText(node);
      const owner = value ? target() : null;
      if (owner && value) {
        owner.content.push(value);
      }
    }
    index += 1;
  }

  if (current) result.push(current);
  return result;
};
