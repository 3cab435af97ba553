/**
 * @file packages/core/src/document/tables.ts
 * @description Table linearization: a pipe-delimited text dump for prose sections and
 *              `{occasion, line}` records for quote tables.
 */

import { childrenOf, childrenOfType, type BlockNode, type TableNode } from './nodes';
import { flattenText } from './text';

export interface QuoteEntry {
  occasion: string;
  line: string;
}

export interface TableRecordOptions {
  /** First-cell text that marks a header row repeated inside the body. */
  headerLabel?: string;
}

export const QUOTE_HEADER_LABEL = '场合';

export const cellTexts = (row: BlockNode): string[] =>
  childrenOfType(row, 'table_cell').map((cell) => flattenText(cell).trim());

const formatRow = (row: BlockNode): string => `| ${cellTexts(row).join(' | ')} |`;

/**
 * One `| a | b |` line per `table_row` found under the table's head and body, in document order.
 * Header cells that sit directly under `table_head` are not rows and produce no line.
 */
export const tableToText = (table: TableNode): string => {
  const lines: string[] = [];
  for (const section of childrenOf(table)) {
    if (section.type !== 'table_head' && section.type !== 'table_body') continue;
    for (const row of childrenOfType(section, 'table_row')) {
      lines.push(formatRow(row));
    }
  }
  return lines.join('\n');
};

export const tableHeaders = (table: TableNode): string[] =>
  childrenOfType(table, 'table_head').flatMap((head) =>
    childrenOf(head).flatMap((child) => {
      if (child.type === 'table_cell') return [flattenText(child).trim()];
      if (child.type === 'table_row') return cellTexts(child);
      return [];
    }),
  );

/**
 * Reads body rows as quote records. Blank rows, rows repeating the header (the sentinel label or
 * the head's own first cell), and rows with fewer than two cells are skipped.
 */
export const tableToRecords = (
  table: TableNode,
  options: TableRecordOptions = {},
): QuoteEntry[] => {
  const { headerLabel = QUOTE_HEADER_LABEL } = options;
  const [firstHeader] = tableHeaders(table);
  const sentinels = new Set(firstHeader ? [headerLabel, firstHeader] : [headerLabel]);
  const records: QuoteEntry[] = [];
  for (const body of childrenOfType(table, 'table_body')) {
    for (const row of childrenOfType(body, 'table_row')) {
      const cells = cellTexts(row);
      if (!cells.some(Boolean) || sentinels.has(cells[0])) continue;
      if (cells.length < 2) continue;
      records.push({ occasion: cells[0], line: cells[1] });
    }
  }
  return records;
};
