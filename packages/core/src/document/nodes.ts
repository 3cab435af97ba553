/**
 * @file packages/core/src/document/nodes.ts
 * @description Block-tree node model shared by every structuring routine. Documents arrive as a
 *              flat, ordered `BlockNode[]` (see `parsers/markdown`), headings included, so the
 *              outline is recovered from heading levels rather than from nesting.
 */

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface TextNode {
  type: 'text';
  raw: string;
}

export interface HeadingNode {
  type: 'heading';
  level: HeadingLevel;
  children: BlockNode[];
}

export interface ParagraphNode {
  type: 'paragraph';
  children: BlockNode[];
}

export interface StrongNode {
  type: 'strong';
  children: BlockNode[];
}

export interface EmphasisNode {
  type: 'emphasis';
  children: BlockNode[];
}

export interface LinkNode {
  type: 'link';
  url?: string;
  children: BlockNode[];
}

export interface ImageNode {
  type: 'image';
  title?: string;
  url?: string;
  children: BlockNode[];
}

export interface ListNode {
  type: 'list';
  ordered?: boolean;
  children: BlockNode[];
}

export interface ListItemNode {
  type: 'list_item';
  children: BlockNode[];
}

export interface TableNode {
  type: 'table';
  children: BlockNode[];
}

export interface TableHeadNode {
  type: 'table_head';
  children: BlockNode[];
}

export interface TableBodyNode {
  type: 'table_body';
  children: BlockNode[];
}

export interface TableRowNode {
  type: 'table_row';
  children: BlockNode[];
}

export interface TableCellNode {
  type: 'table_cell';
  children: BlockNode[];
}

export type BlockNode =
  | TextNode
  | HeadingNode
  | ParagraphNode
  | StrongNode
  | EmphasisNode
  | LinkNode
  | ImageNode
  | ListNode
  | ListItemNode
  | TableNode
  | TableHeadNode
  | TableBodyNode
  | TableRowNode
  | TableCellNode;

export type BlockNodeType = BlockNode['type'];

export type ParentNode = Exclude<BlockNode, TextNode>;

/** Leaf blocks whose text form lands in section content. */
export type LeafBlockNode = ParagraphNode | ListNode | TableNode;

/**
 * What to do with content that appears before the first heading a routine groups by.
 * `drop` discards it; `preamble` keeps it under an implicit section titled `PREAMBLE_TITLE`.
 */
export type OrphanPolicy = 'drop' | 'preamble';

export const PREAMBLE_TITLE = '';

export const isHeading = (node: BlockNode, level?: number): boolean =>
  node.type === 'heading' && (level === undefined || node.level === level);

export const isLeafBlock = (node: BlockNode): node is LeafBlockNode =>
  node.type === 'paragraph' || node.type === 'list' || node.type === 'table';

export const childrenOf = (node: BlockNode): BlockNode[] =>
  node.type === 'text' ? [] : node.children;

export const childrenOfType = <T extends BlockNodeType>(
  node: BlockNode,
  type: T,
): Extract<BlockNode, { type: T }>[] =>
  childrenOf(node).filter((child): child is Extract<BlockNode, { type: T }> => child.type === type);

export const text = (raw: string): TextNode => ({ type: 'text', raw });
