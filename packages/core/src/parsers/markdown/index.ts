/**
 * @file packages/core/src/parsers/markdown/index.ts
 * @description Parses saved wiki Markdown (GFM tables included) with remark and converts the mdast
 *              tree into the flat `BlockNode[]` the structuring engine works on.
 */

import type { Nodes, Root, Table } from 'mdast';
import remarkGfm from 'remark-gfm';
import remarkParse from 'remark-parse';
import { unified } from 'unified';
import { text, type BlockNode, type HeadingLevel } from '../../document/nodes';

const processor = unified().use(remarkParse).use(remarkGfm);

const convertAll = (nodes: Nodes[]): BlockNode[] => nodes.flatMap((node) => convertNode(node));

/**
 * GFM tables carry their header as the first row. It becomes a `table_head` holding the header
 * cells directly; the remaining rows form the `table_body`.
 */
const convertTable = (table: Table): BlockNode => {
  const [headRow, ...bodyRows] = table.children;
  const head: BlockNode[] = headRow
    ? [{ type: 'table_head', children: convertAll(headRow.children) }]
    : [];
  return {
    type: 'table',
    children: [...head, { type: 'table_body', children: convertAll(bodyRows) }],
  };
};

const convertNode = (node: Nodes): BlockNode[] => {
  switch (node.type) {
    case 'root':
    case 'blockquote':
    case 'delete':
    case 'footnoteDefinition':
    case 'linkReference':
      return convertAll(node.children);
    case 'text':
    case 'inlineCode':
    case 'code':
    case 'html':
      return node.value ? [text(node.value)] : [];
    case 'break':
      return [text('\n')];
    case 'heading':
      return [
        {
          type: 'heading',
          level: node.depth satisfies HeadingLevel,
          children: convertAll(node.children),
        },
      ];
    case 'paragraph':
      return [{ type: 'paragraph', children: convertAll(node.children) }];
    case 'strong':
      return [{ type: 'strong', children: convertAll(node.children) }];
    case 'emphasis':
      return [{ type: 'emphasis', children: convertAll(node.children) }];
    case 'link':
      return [{ type: 'link', url: node.url, children: convertAll(node.children) }];
    case 'image':
      return [
        {
          type: 'image',
          url: node.url,
          title: node.title ?? undefined,
          children: node.alt ? [text(node.alt)] : [],
        },
      ];
    case 'imageReference':
      return node.alt ? [text(node.alt)] : [];
    case 'list':
      return [
        { type: 'list', ordered: node.ordered ?? false, children: convertAll(node.children) },
      ];
    case 'listItem':
      return [{ type: 'list_item', children: convertAll(node.children) }];
    case 'table':
      return [convertTable(node)];
    case 'tableRow':
      return [{ type: 'table_row', children: convertAll(node.children) }];
    case 'tableCell':
      return [{ type: 'table_cell', children: convertAll(node.children) }];
    default:
      return [];
  }
};

export const parseMarkdownTree = (markdown: string): Root => processor.parse(markdown);

export const parseMarkdownDocument = (markdown: string): BlockNode[] =>
  convertAll(parseMarkdownTree(markdown).children);
