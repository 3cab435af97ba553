/**
 * @file tests/document-text.test.ts
 * @description Text flattening and table linearization over hand-built block trees.
 */

import { describe, expect, it } from 'vitest';
import {
  flattenText,
  listToText,
  tableHeaders,
  tableToRecords,
  tableToText,
  type BlockNode,
  type ListNode,
  type TableNode,
} from '@kivotos-codex/core';
import { cell, link, list, p, row, table, text } from './helpers/nodes';

describe('flattenText', () => {
  it('concatenates nested inline text in document order', () => {
    const node = p('阿拜多斯', { type: 'strong', children: [text('高等学校')] }, link('对策委员会'));
    expect(flattenText(node)).toBe('阿拜多斯高等学校对策委员会');
  });

  it('prefers an image title over its alt text', () => {
    const titled: BlockNode = { type: 'image', title: '校徽', children: [text('logo')] };
    const untitled: BlockNode = { type: 'image', title: '', children: [text('logo')] };
    expect(flattenText(titled)).toBe('校徽');
    expect(flattenText(untitled)).toBe('logo');
  });

  it('returns an empty string for nodes without text', () => {
    expect(flattenText({ type: 'list', children: [] })).toBe('');
  });
});

describe('listToText', () => {
  it('joins trimmed item texts with newlines', () => {
    const node: ListNode = {
      type: 'list',
      children: [
        { type: 'list_item', children: [p('  第一项 ')] },
        { type: 'list_item', children: [p('第二项')] },
      ],
    };
    expect(listToText(node)).toBe('第一项\n第二项');
  });

  it('ignores children that are not list items', () => {
    const node = list('甲');
    if (node.type !== 'list') throw new Error('expected a list');
    expect(listToText({ ...node, children: [...node.children, text('stray')] })).toBe('甲');
  });
});

describe('tableToText', () => {
  it('prints one pipe-delimited line per row', () => {
    const node = table(['项目', '内容'], row('学园', '三一'), row('社团', ' 茶会 '));
    expect(tableToText(node)).toBe('| 学园 | 三一 |\n| 社团 | 茶会 |');
  });

  it('prints rows that sit inside the head section', () => {
    const node: TableNode = {
      type: 'table',
      children: [
        { type: 'table_head', children: [row('名称', '说明')] },
        { type: 'table_body', children: [row('EX技能', '造成伤害')] },
      ],
    };
    expect(tableToText(node)).toBe('| 名称 | 说明 |\n| EX技能 | 造成伤害 |');
  });

  it('returns an empty string for a table without rows', () => {
    expect(tableToText(table(['空']))).toBe('');
  });
});

describe('tableToRecords', () => {
  it('reads occasion and line from each body row', () => {
    const node = table(
      ['场合', '台词'],
      row('登录', '老师，欢迎回来。'),
      row('场合', '台词'),
      row('', ''),
      row('只有一格'),
      row('大厅', '今天也要加油。', '备注'),
    );
    expect(tableToRecords(node)).toEqual([
      { occasion: '登录', line: '老师，欢迎回来。' },
      { occasion: '大厅', line: '今天也要加油。' },
    ]);
  });

  it('treats the first head cell as a repeated header label', () => {
    const node = table(['情境', '语音'], row('情境', '语音'), row('战斗', '出发！'));
    expect(tableToRecords(node)).toEqual([{ occasion: '战斗', line: '出发！' }]);
  });

  it('accepts a custom sentinel label', () => {
    const node = table([], row('Occasion', 'Line'), row('Lobby', 'Hello, Sensei.'));
    expect(tableToRecords(node, { headerLabel: 'Occasion' })).toEqual([
      { occasion: 'Lobby', line: 'Hello, Sensei.' },
    ]);
  });

  it('reads cells through links', () => {
    const node = table(['场合', '台词'], row(cell(link('好感度')), '谢谢。'));
    expect(tableToRecords(node)).toEqual([{ occasion: '好感度', line: '谢谢。' }]);
  });
});

describe('tableHeaders', () => {
  it('collects header cells whether or not they are wrapped in a row', () => {
    const direct = table(['甲', '乙']);
    const wrapped: TableNode = {
      type: 'table',
      children: [{ type: 'table_head', children: [row('丙', '丁')] }],
    };
    expect(tableHeaders(direct)).toEqual(['甲', '乙']);
    expect(tableHeaders(wrapped)).toEqual(['丙', '丁']);
  });
});
