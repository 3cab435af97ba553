/**
 * @file packages/core/src/document/text.ts
 * @description Reduces block/inline nodes to plain text in document order.
 */

import { childrenOfType, type BlockNode, type ListNode } from './nodes';

/**
 * Concatenates the text of a node and its subtree. Images prefer a non-empty `title` over their
 * children (the alt text); every other parent concatenates its children, so the function is total
 * over the node union.
 */
export const flattenText = (node: BlockNode): string => {
  switch (node.type) {
    case 'text':
      return node.raw;
    case 'image':
      if (node.title) {
        return node.title;
      }
      return flattenChildren(node.children);
    default:
      return flattenChildren(node.children);
  }
};

const flattenChildren = (children: BlockNode[]): string =>
  children.map((child) => flattenText(child)).join('');

/** Trimmed text of each list item, one per line. */
export const listToText = (list: ListNode): string =>
  childrenOfType(list, 'list_item')
    .map((item) => flattenText(item).trim())
    .join('\n');

export const listItemTexts = (list: ListNode): string[] =>
  childrenOfType(list, 'list_item').map((item) => flattenText(item).trim());
