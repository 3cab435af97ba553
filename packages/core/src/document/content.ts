/**
 * @file packages/core/src/document/content.ts
 * @description Flattens a section's nodes into bare strings and one level of titled sub-blocks.
 */

import { childrenOf, isHeading, isLeafBlock, type BlockNode } from './nodes';
import { tableToText } from './tables';
import { flattenText, listItemTexts, listToText } from './text';

export interface SubBlock {
  title: string;
  content: string[];
}

export type ContentItem = string | SubBlock;

export interface FlattenContentOptions {
  /** Emit list items as separate entries instead of one newline-joined string. */
  splitListItems?: boolean;
}

/** Text form of a paragraph, list or table; `null` for every other node. */
export const blockToText = (node: BlockNode): string | null => {
  switch (node.type) {
    case 'paragraph':
      return flattenText(node).trim();
    case 'list':
      return listToText(node);
    case 'table':
      return tableToText(node);
    default:
      return null;
  }
};

/**
 * Linear scan: a heading at `minorLevel` opens a sub-block that receives the following leaf
 * texts; leaf texts before any such heading go straight into the result. Other headings are
 * ignored and nothing is recursed into.
 */
export const flattenContent = (
  nodes: BlockNode[],
  minorLevel: number,
  options: FlattenContentOptions = {},
): ContentItem[] => {
  const result: ContentItem[] = [];
  let active: SubBlock | null = null;

  const append = (entries: string[]): void => {
    const kept = entries.filter(Boolean);
    if (active) {
      active.content.push(...kept);
    } else {
      result.push(...kept);
    }
  };

  for (const node of nodes) {
    if (isHeading(node, minorLevel)) {
      active = { title: flattenText(node).trim(), content: [] };
      result.push(active);
      continue;
    }
    if (!isLeafBlock(node)) continue;
    if (node.type === 'list' && options.splitListItems) {
      append(listItemTexts(node));
      continue;
    }
    const value = blockToText(node);
    if (value) append([value]);
  }
  return result;
};

/**
 * Newline-joined dump of every heading, paragraph, list item and table in a subtree, used when a
 * section only needs to be searchable text.
 */
export const flattenNodesToText = (nodes: BlockNode[]): string => {
  const texts: string[] = [];
  for (const node of nodes) {
    if (node.type === 'paragraph' || node.type === 'heading') {
      texts.push(flattenText(node).trim());
    } else if (node.type === 'list') {
      texts.push(...listItemTexts(node));
    } else if (node.type === 'table') {
      texts.push(tableToText(node));
    } else {
      texts.push(flattenNodesToText(childrenOf(node)));
    }
  }
  return texts.filter(Boolean).join('\n');
};
