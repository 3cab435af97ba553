/**
 * @file tests/helpers/nodes.ts
 * @description Small builders for hand-written block trees.
 */

import { text, type BlockNode, type HeadingLevel, type TableNode } from '@kivotos-codex/core';

export { text };

export const h = (level: HeadingLevel, title: string): BlockNode => ({
  type: 'heading',
  level,
  children: [text(title)],
});

export const p = (...children: Array<BlockNode | string>): BlockNode => ({
  type: 'paragraph',
  children: children.map((child) => (typeof child === 'string' ? text(child) : child)),
});

export const link = (label: string, url = `/wiki/${label}`): BlockNode => ({
  type: 'link',
  url,
  children: [text(label)],
});

export const list = (...items: string[]): BlockNode => ({
  type: 'list',
  children: items.map((item) => ({ type: 'list_item', children: [p(item)] })),
});

export const cell = (...children: Array<BlockNode | string>): BlockNode => ({
  type: 'table_cell',
  children: children.map((child) => (typeof child === 'string' ? text(child) : child)),
});

export const row = (...cells: Array<BlockNode | string>): BlockNode => ({
  type: 'table_row',
  children: cells.map((value) => (typeof value === 'string' ? cell(value) : value)),
});

/** Table whose head holds `headers` as cells directly, the shape the Markdown adapter emits. */
export const table = (headers: string[], ...rows: BlockNode[]): TableNode => ({
  type: 'table',
  children: [
    { type: 'table_head', children: headers.map((header) => cell(header)) },
    { type: 'table_body', children: rows },
  ],
});
