/**
 * @file packages/core/src/wiki/html.ts
 * @description Cleans MediaWiki `action=parse` HTML, converts it to Markdown, and reads the
 *              student roster table.
 */

import { load as loadHtml } from 'cheerio';
import TurndownService from 'turndown';
import { strikethrough, tables } from 'turndown-plugin-gfm';

export type RosterEntry = Record<string, string>;

/** Column holding the linked student name on the roster page. */
export const ROSTER_NAME_HEADER = '姓名';
/** Key added to each roster entry with the student's page title. */
export const ROSTER_TITLE_KEY = '标题';
/** Marker MediaWiki puts in the title of links to pages that do not exist yet. */
export const MISSING_PAGE_MARKER = '页面不存在';

const NOISE_SELECTORS = [
  'script',
  'style',
  'link',
  '.infoBox',
  '.mobile-noteTA-0',
  '.toc',
  '.navbox.largeNavbox',
  '.mw-editsection-bracket',
  '.notice.dablink',
];

const ROSTER_TABLE_SELECTOR = 'table.wikitable.AnnTools-MWFilter-result.sortable';

const turndown = new TurndownService({
  headingStyle: 'atx',
  bulletListMarker: '-',
  codeBlockStyle: 'fenced',
});
turndown.use([tables, strikethrough]);

/**
 * Replaces h2/h3 contents with their headline text and removes scripts, styles and wiki
 * chrome (infobox templates, table of contents, navboxes, edit links, disambiguation notices).
 */
export const cleanWikiHtml = (html: string): string => {
  const $ = loadHtml(html, null, false);
  $('h2, h3').each((_, heading) => {
    const headline = $(heading).find('span.mw-headline').first();
    if (headline.length) {
      $(heading).text(headline.text().trim());
    }
  });
  $(NOISE_SELECTORS.join(', ')).remove();
  return $.html();
};

/** Title of the page a redirect stub points to, or `null` when the HTML is not a redirect. */
export const findRedirectTarget = (html: string): string | null => {
  const $ = loadHtml(html, null, false);
  const redirect = $('div.redirectMsg');
  if (!redirect.length) return null;
  const title = redirect.find('a').first().attr('title');
  return title?.trim() || null;
};

/** Placeholder that keeps empty cells from being dropped as blank nodes. */
const EMPTY_CELL = '\u200b';

/**
 * Reshapes tables into something GFM can hold: `colspan` cells are padded with empty siblings,
 * empty cells get a placeholder, line breaks inside cells become spaces, and tables whose first
 * row is not a header row get an empty one so every source row stays in the body.
 */
const prepareTables = (html: string): string => {
  const $ = loadHtml(html, null, false);
  $('td br, th br').replaceWith(' ');
  $('td p, th p').each((_, paragraph) => {
    $(paragraph).replaceWith(` ${$(paragraph).html() ?? ''} `);
  });
  $('td, th').each((_, element) => {
    const cell = $(element);
    const span = Number.parseInt(cell.attr('colspan') ?? '1', 10);
    if (!cell.text().trim()) {
      cell.append(EMPTY_CELL);
    }
    if (span > 1) {
      const tag = cell.is('th') ? 'th' : 'td';
      cell.removeAttr('colspan');
      cell.after(`<${tag}>${EMPTY_CELL}</${tag}>`.repeat(span - 1));
    }
  });
  $('table').each((_, table) => {
    const first = $(table).find('tr').first();
    if (!first.length || first.parent().is('thead')) return;
    const cells = first.children('th, td');
    if (cells.length === first.children('th').length) return;
    const header = `<tr>${`<th>${EMPTY_CELL}</th>`.repeat(cells.length)}</tr>`;
    const head = $(table).children('thead');
    if (head.length) {
      head.prepend(header);
    } else {
      $(table).prepend(`<thead>${header}</thead>`);
    }
  });
  return $.html();
};

export const htmlToMarkdown = (html: string): string =>
  turndown.turndown(prepareTables(html)).replaceAll(EMPTY_CELL, '').trim();

/**
 * Rows of the student list table keyed by header text. Cells prefer their `data-value`
 * attribute (sortable columns) over visible text; rows without a titled link in the name column
 * are skipped.
 */
export const extractStudentRoster = (html: string): RosterEntry[] => {
  const $ = loadHtml(html);
  const table = $(ROSTER_TABLE_SELECTOR).first();
  if (!table.length) return [];

  const headers = table
    .find('th')
    .toArray()
    .map((cell) => $(cell).text().trim());
  const nameIndex = headers.indexOf(ROSTER_NAME_HEADER);
  if (nameIndex === -1) return [];

  const roster: RosterEntry[] = [];
  const rows = table.find('tbody').first().children('tr').toArray().slice(1);
  for (const row of rows) {
    const cells = $(row).children('td').toArray();
    if (cells.length < headers.length) continue;
    const title = $(cells[nameIndex]).find('a').first().attr('title');
    if (!title) continue;
    const entry: RosterEntry = {};
    headers.forEach((header, index) => {
      const cell = $(cells[index]);
      entry[header] = cell.attr('data-value') ?? cell.text().trim();
    });
    entry[ROSTER_TITLE_KEY] = title;
    roster.push(entry);
  }
  return roster;
};
