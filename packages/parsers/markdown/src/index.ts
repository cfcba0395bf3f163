import {
  DEFAULT_CATEGORY,
  defineParser,
  headingText,
  imageAltText,
  inlineHtmlToText,
  linkMarker,
  shortenCategory,
  type ParsedTable,
} from '@boardsift/parser-sdk';

const ESCAPED_PIPE = '\u0000';
const SEPARATOR_CELL = /^\s*:?-+:?\s*$/;
const HEADING_LINE = /^\s{0,3}#{1,6}(?:\s|$)/;
const FENCE_LINE = /^\s*(?:```|~~~)/;

/**
 * Split a pipe-delimited line into raw cells. Leading and trailing pipes are
 * optional; `\|` is a literal pipe inside a cell.
 */
export function splitRow(line: string): string[] {
  let body = line.trim().replace(/\\\|/g, ESCAPED_PIPE);
  if (body.startsWith('|')) body = body.slice(1);
  if (body.endsWith('|')) body = body.slice(0, -1);

  return body.split('|').map((cell) => cell.replaceAll(ESCAPED_PIPE, '|').trim());
}

export function isPipeRow(line: string): boolean {
  return line.replace(/\\\|/g, '').includes('|');
}

/**
 * `|---|:--:|` style line: every cell holds only dashes, colons and spaces.
 */
export function isSeparatorLine(line: string): boolean {
  if (!isPipeRow(line)) {
    return false;
  }

  const cells = splitRow(line);
  return cells.length > 0 && cells.every((cell) => SEPARATOR_CELL.test(cell));
}

/**
 * A table starts at a pipe row directly followed by a separator line.
 */
export function isTableStart(line: string, next: string | undefined): boolean {
  return next !== undefined && isPipeRow(line) && !isSeparatorLine(line) && isSeparatorLine(next);
}

/**
 * Reduce one Markdown cell to display text with link markers.
 */
export function cellText(raw: string): string {
  let text = raw;

  text = text.replace(/!\[([^\]]*)\]\([^)]*\)/g, (_full, alt: string) => ` ${imageAltText(alt)} `);
  text = text.replace(/\[([^\]]*)\]\(\s*([^)\s]+)(?:\s+"[^"]*")?\s*\)/g, (_full, label: string, url: string) => {
    return `${label} ${linkMarker(url)}`;
  });
  text = text.replace(/\*\*([^*]*)\*\*/g, '$1');
  // snake_case names and URLs keep their underscores
  text = text.replace(/(?<![\w/])__([^_]+)__(?!\w)/g, '$1');

  return inlineHtmlToText(text);
}

function toTable(headers: string[], rows: string[][], category: string): ParsedTable {
  return { headers, rows, format: 'markdown', category };
}

/**
 * Scan a Markdown document for pipe tables. Each table takes the nearest
 * preceding heading as its category; it ends at the first blank or non-pipe line.
 */
export function parse(content: string): ParsedTable[] {
  const lines = content.split(/\r?\n/);
  const tables: ParsedTable[] = [];
  let category = DEFAULT_CATEGORY;
  let inFence = false;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';

    if (FENCE_LINE.test(line)) {
      inFence = !inFence;
      continue;
    }
    if (inFence) {
      continue;
    }

    if (HEADING_LINE.test(line)) {
      const heading = headingText(line);
      if (heading) {
        category = shortenCategory(heading);
      }
      continue;
    }

    if (!isTableStart(line, lines[i + 1])) {
      continue;
    }

    const headers = splitRow(line).map(cellText);
    const rows: string[][] = [];
    let j = i + 2;

    for (; j < lines.length; j++) {
      const rowLine = lines[j] ?? '';
      if (!rowLine.trim() || !isPipeRow(rowLine)) {
        break;
      }

      const cells = splitRow(rowLine).map(cellText);
      if (cells.some((cell) => cell.length > 0)) {
        rows.push(cells);
      }
    }

    tables.push(toTable(headers, rows, category));
    i = j - 1;
  }

  return tables;
}

export const markdownTableParser = defineParser({
  manifest: {
    id: 'markdown',
    name: 'Markdown pipe tables',
    version: '0.1.0',
    format: 'markdown',
  },
  parse,
});
