/**
 * @file tests/wiki-html.test.ts
 * @description Wiki HTML cleanup, redirect detection, roster parsing and the HTML → Markdown
 *              path that saved pages go through.
 */

import { describe, expect, it } from 'vitest';
import {
  cleanWikiHtml,
  extractProfile,
  extractStudentRoster,
  findRedirectTarget,
  htmlToMarkdown,
  parseMarkdownDocument,
  tableToRecords,
} from '@kivotos-codex/core';

describe('cleanWikiHtml', () => {
  it('reduces headings to their headline and strips wiki chrome', () => {
    const html =
      '<h2><span class="mw-headline" id="简介">简介</span><span class="mw-editsection">' +
      '<span class="mw-editsection-bracket">[</span><a href="#">编辑</a>' +
      '<span class="mw-editsection-bracket">]</span></span></h2>' +
      '<p>正文</p><script>alert(1)</script><div class="toc">目录</div>';
    expect(cleanWikiHtml(html)).toBe('<h2>简介</h2><p>正文</p>');
  });
});

describe('findRedirectTarget', () => {
  it('reads the target title of a redirect stub', () => {
    const html =
      '<div class="redirectMsg"><p>重定向至：</p><ul class="redirectText">' +
      '<li><a href="/wiki/x" title="白洲梓">白洲梓</a></li></ul></div>';
    expect(findRedirectTarget(html)).toBe('白洲梓');
  });

  it('returns null for an ordinary page', () => {
    expect(findRedirectTarget('<p>正文</p>')).toBeNull();
  });
});

describe('extractStudentRoster', () => {
  it('keys rows by header text and records the linked page title', () => {
    const html =
      '<table class="wikitable sortable AnnTools-MWFilter-result"><tbody>' +
      '<tr><th>姓名</th><th>学园</th><th>星级</th></tr>' +
      '<tr><td><a href="/wiki/a" title="白洲梓">梓</a></td><td>三一综合学园</td><td data-value="3">★★★</td></tr>' +
      '<tr><td><a href="/wiki/b" title="某学生（页面不存在）">某学生</a></td><td>千年</td><td data-value="1">★</td></tr>' +
      '<tr><td>无链接</td><td>格黑娜</td><td>★</td></tr>' +
      '<tr><td>短行</td></tr>' +
      '</tbody></table>';
    expect(extractStudentRoster(html)).toEqual([
      { 姓名: '梓', 学园: '三一综合学园', 星级: '3', 标题: '白洲梓' },
      { 姓名: '某学生', 学园: '千年', 星级: '1', 标题: '某学生（页面不存在）' },
    ]);
  });

  it('returns an empty roster when the table is missing', () => {
    expect(extractStudentRoster('<p>没有表格</p>')).toEqual([]);
  });
});

describe('htmlToMarkdown', () => {
  it('keeps a profile table with spanning cells readable as key/value rows', () => {
    const html =
      '<p>简介文字</p><table><tbody>' +
      '<tr><th colspan="2">学生档案</th></tr>' +
      '<tr><th>全名</th><td>白洲梓</td></tr>' +
      '<tr><th colspan="2">相关人物</th></tr>' +
      '<tr><td colspan="2"><a href="/wiki/a" title="阿慈谷日富美">阿慈谷日富美</a>、' +
      '<a href="/wiki/b" title="下江小春">下江小春</a></td></tr>' +
      '<tr><th>爱好</th><td>读书<br>射击</td></tr>' +
      '</tbody></table>';
    const nodes = parseMarkdownDocument(htmlToMarkdown(html));
    expect(extractProfile(nodes)).toEqual({
      profile: { 全名: '白洲梓', 相关人物: '阿慈谷日富美,下江小春', 爱好: '读书 射击' },
      relations: ['阿慈谷日富美', '下江小春'],
    });
  });

  it('keeps every row of a table without a header row in the body', () => {
    const html =
      '<table><tbody><tr><td>登录</td><td>早安</td></tr><tr><td>大厅</td><td>嗯。</td></tr></tbody></table>';
    const [node] = parseMarkdownDocument(htmlToMarkdown(html));
    if (node?.type !== 'table') throw new Error('expected a table');
    expect(tableToRecords(node)).toEqual([
      { occasion: '登录', line: '早安' },
      { occasion: '大厅', line: '嗯。' },
    ]);
  });

  it('writes atx headings', () => {
    expect(htmlToMarkdown('<h2>简介</h2><p>正文内容</p>')).toBe('## 简介\n\n正文内容');
  });
});
