import type { TableFormat } from '@boardsift/parser-sdk';
import { isTableStart } from '@boardsift/parser-markdown';

const HTML_TABLE_TAG = /<table[\s>/]/i;

export function hasHtmlTable(content: string): boolean {
  return HTML_TABLE_TAG.test(content);
}

export function hasMarkdownTable(content: string): boolean {
  const lines = content.split(/\r?\n/);
  return lines.some((line, index) => isTableStart(line, lines[index + 1]));
}

/**
 * Classify a document by the table syntax it contains. Never throws; anything
 * that is not a non-empty string is `unknown`.
 */
export function detectFormat(content: string): TableFormat {
  if (typeof content !== 'string' || content.length === 0) {
    return 'unknown';
  }

  const html = hasHtmlTable(content);
  const markdown = hasMarkdownTable(content);

  if (html && markdown) return 'mixed';
  if (html) return 'html';
  if (markdown) return 'markdown';
  return 'unknown';
}
