import type { ParsedTable, ParserManifest, TableFormat, TableParser } from '@boardsift/parser-sdk';
import { htmlTableParser } from '@boardsift/parser-html';
import { markdownTableParser } from '@boardsift/parser-markdown';
import { detectFormat } from './detect.js';

type ParserFormat = ParserManifest['format'];

const tableParsers = new Map<ParserFormat, TableParser>([
  [markdownTableParser.manifest.format, markdownTableParser],
  [htmlTableParser.manifest.format, htmlTableParser],
]);

export function getTableParser(format: ParserFormat): TableParser {
  const parser = tableParsers.get(format);
  if (!parser) {
    throw new Error(`No table parser registered for format: ${format}`);
  }

  return parser;
}

export function getAllTableParsers(): TableParser[] {
  return [...tableParsers.values()];
}

/**
 * Extract every table from a document in document order.
 *
 * Mixed documents prefer their HTML tables, taking `#` headings in the
 * surrounding text as categories; their Markdown tables are only parsed when
 * no HTML table yields anything.
 */
export function parseTables(content: string, format: TableFormat = detectFormat(content)): ParsedTable[] {
  switch (format) {
    case 'html':
    case 'markdown':
      return getTableParser(format).parse(content);
    case 'mixed': {
      const tables = getTableParser('html').parse(content, { markdownHeadings: true });
      return tables.length > 0 ? tables : getTableParser('markdown').parse(content);
    }
    case 'unknown':
      return [];
  }
}
