import * as cheerio from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode, type Element } from 'domhandler';
import {
  DEFAULT_CATEGORY,
  defineParser,
  headingText,
  imageAltText,
  linkMarker,
  normalizeWhitespace,
  shortenCategory,
  type ParsedTable,
  type TableParseOptions,
} from '@boardsift/parser-sdk';

const HEADING_TAGS = new Set(['h1', 'h2', 'h3', 'h4']);
const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'template']);
const MARKDOWN_HEADING_LINE = /^\s{0,3}#{1,6}\s/;

function escapeText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function isPlaceholder(cell: string): boolean {
  return cell === '' || /^-+$/.test(cell);
}

/**
 * Whitespace-collapsed text of a cell, images replaced by their alt text and
 * every anchor's href appended as a link marker.
 */
export function cellText($: cheerio.CheerioAPI, cell: Element): string {
  const $cell = $(cell).clone();

  $cell.find('img').each((_index, img) => {
    $(img).replaceWith(` ${escapeText(imageAltText($(img).attr('alt')))} `);
  });
  $cell.find('br').replaceWith('; ');

  const text = normalizeWhitespace($cell.text())
    .replace(/\s+;/g, ';')
    .replace(/^;\s*|;\s*$/g, '')
    .trim();

  const markers = $(cell)
    .find('a[href]')
    .toArray()
    .map((anchor) => ($(anchor).attr('href') ?? '').trim())
    .filter((href) => href.length > 0)
    .map(linkMarker);

  return [text, ...markers].filter(Boolean).join(' ');
}

function ownRows($: cheerio.CheerioAPI, table: Element): Element[] {
  return $(table)
    .find('tr')
    .toArray()
    .filter((row) => $(row).closest('table').get(0) === table);
}

function rowCells($: cheerio.CheerioAPI, row: Element): Element[] {
  return $(row).children('th, td').toArray();
}

/**
 * Headers come from the first row holding `<th>` cells, or the first row when
 * there is none. Every other row is data.
 */
export function parseTable($: cheerio.CheerioAPI, table: Element, category: string): ParsedTable | null {
  const rows = ownRows($, table);
  if (rows.length === 0) {
    return null;
  }

  const headerRow = rows.find((row) => $(row).children('th').length > 0) ?? rows[0];
  if (!headerRow) {
    return null;
  }

  const headers = rowCells($, headerRow).map((cell) => normalizeWhitespace($(cell).text()));
  if (headers.every((header) => header === '')) {
    return null;
  }

  const body: string[][] = [];
  for (const row of rows) {
    if (row === headerRow) continue;

    const cells = rowCells($, row).map((cell) => cellText($, cell));
    if (cells.length === 0 || cells.every(isPlaceholder)) continue;

    body.push(cells);
  }

  return { headers, rows: body, format: 'html', category };
}

/**
 * Walk the document in order, tracking the latest section heading, and parse
 * each `<table>` under it. With `markdownHeadings`, `#` lines in text nodes
 * also count as headings.
 */
export function parse(content: string, options: TableParseOptions = {}): ParsedTable[] {
  const $ = cheerio.load(content);
  const tables: ParsedTable[] = [];
  let category = DEFAULT_CATEGORY;

  const setCategory = (raw: string): void => {
    const heading = headingText(raw);
    if (heading) {
      category = shortenCategory(heading);
    }
  };

  const visit = (node: AnyNode): void => {
    if (isText(node)) {
      if (options.markdownHeadings) {
        for (const line of node.data.split(/\r?\n/)) {
          if (MARKDOWN_HEADING_LINE.test(line)) {
            setCategory(line);
          }
        }
      }
      return;
    }

    if (isTag(node)) {
      const tag = node.name.toLowerCase();
      if (SKIPPED_TAGS.has(tag)) {
        return;
      }
      if (HEADING_TAGS.has(tag)) {
        setCategory($(node).text());
        return;
      }
      if (tag === 'table') {
        const table = parseTable($, node, category);
        if (table) {
          tables.push(table);
        }
        return;
      }
    }

    if (hasChildren(node)) {
      for (const child of node.children) {
        visit(child);
      }
    }
  };

  for (const node of $.root().toArray()) {
    visit(node);
  }

  return tables;
}

export const htmlTableParser = defineParser({
  manifest: {
    id: 'html',
    name: 'HTML tables',
    version: '0.1.0',
    format: 'html',
  },
  parse,
});
