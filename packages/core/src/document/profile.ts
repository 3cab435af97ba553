/**
 * @file packages/core/src/document/profile.ts
 * @description Extracts the infobox-style profile table (the first table of a page) as ordered
 *              key/value pairs. The relation field spans two rows: a label row followed by a row
 *              of linked names.
 */

import { childrenOf, childrenOfType, type BlockNode } from './nodes';
import { cellTexts } from './tables';
import { flattenText } from './text';

export type Profile = Record<string, string>;

export interface ProfileExtraction {
  profile: Profile;
  relations: string[];
}

export interface ProfileOptions {
  /** First-cell labels of header rows repeated inside the body. */
  headerLabels?: readonly string[];
  relationKey?: string;
  /** Rows with fewer cells are ignored. */
  minCells?: number;
}

export const RELATION_KEY = '相关人物';
export const DEFAULT_PROFILE_HEADERS = ['学生档案', '基本资料'] as const;

const NAME_SEPARATORS = /[,、，]/;
const ANNOTATION_MARKERS = /[）):：]/;

/**
 * Candidate names inside a cell: the text of every link, and the separator-delimited tokens of
 * plain text, in document order.
 */
export const extractRelationNames = (node: BlockNode): string[] => {
  if (node.type === 'link') {
    const label = flattenText(node).trim();
    return label ? [label] : [];
  }
  if (node.type === 'text') {
    return node.raw
      .split(NAME_SEPARATORS)
      .map((name) => name.trim())
      .filter(Boolean);
  }
  return childrenOf(node).flatMap((child) => extractRelationNames(child));
};

/** Drops annotations such as `某人（注）` or `备注：…` that sit among the names. */
export const filterRelationNames = (names: string[]): string[] =>
  names.filter((name) => !ANNOTATION_MARKERS.test(name));

export const extractProfile = (
  nodes: BlockNode[],
  options: ProfileOptions = {},
): ProfileExtraction => {
  const {
    headerLabels = DEFAULT_PROFILE_HEADERS,
    relationKey = RELATION_KEY,
    minCells = 1,
  } = options;
  const profile: Profile = {};
  let relations: string[] = [];

  const table = nodes.find((node) => node.type === 'table');
  if (!table) {
    return { profile, relations };
  }

  const rows = childrenOfType(table, 'table_body').flatMap((body) =>
    childrenOfType(body, 'table_row'),
  );

  let i = 0;
  while (i < rows.length) {
    const cells = cellTexts(rows[i]);
    if (cells.length < minCells) {
      i += 1;
      continue;
    }
    const [key = '', value = ''] = cells;
    if (!key || headerLabels.includes(key)) {
      i += 1;
      continue;
    }
    if (key === relationKey && i + 1 < rows.length) {
      const [firstCell] = childrenOfType(rows[i + 1], 'table_cell');
      if (firstCell) {
        relations = filterRelationNames(extractRelationNames(firstCell));
        profile[relationKey] = relations.join(',');
      }
      i += 2;
      continue;
    }
    if (value) {
      profile[key] = value;
    }
    i += 1;
  }

  return { profile, relations };
};
