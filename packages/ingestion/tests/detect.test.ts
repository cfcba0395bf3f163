import { describe, it, expect } from 'vitest';
import { detectFormat } from '../src/detect.js';
import { getAllTableParsers, getTableParser, parseTables } from '../src/tables.js';

const markdown = '| Company | Role |\n| --- | :-: |\n| Acme | Engineer |';
const html = '<p>Openings</p>\n<TABLE><tr><td>Company</td><td>Role</td></tr></TABLE>';

describe('detectFormat', () => {
  it('classifies by the table syntax present', () => {
    expect(detectFormat(html)).toBe('html');
    expect(detectFormat(markdown)).toBe('markdown');
    expect(detectFormat(`${html}\n\n${markdown}`)).toBe('mixed');
  });

  it('tolerates spacing and dash counts in separator rows', () => {
    expect(detectFormat('|Company|Role|\n|  ----  |  -  |')).toBe('markdown');
    expect(detectFormat('Company | Role\n:--- | ---:')).toBe('markdown');
  });

  it('returns unknown when no table is present', () => {
    expect(detectFormat('')).toBe('unknown');
    expect(detectFormat('just text | with a pipe')).toBe('unknown');
    expect(detectFormat('| lonely | row |')).toBe('unknown');
    expect(detectFormat('<tablet>not a table</tablet>')).toBe('unknown');
    expect(detectFormat(undefined as unknown as string)).toBe('unknown');
  });
});

describe('parseTables', () => {
  const mixed = [
    '## Backend Roles',
    '',
    '<table><tr><th>Company</th><th>Role</th></tr><tr><td>Acme</td><td>Dev</td></tr></table>',
    '',
    '| Company | Role |',
    '|---|---|',
    '| Beta | QA |',
  ].join('\n');

  it('prefers the HTML tables of a mixed document', () => {
    const tables = parseTables(mixed);

    expect(tables).toEqual([
      { headers: ['Company', 'Role'], rows: [['Acme', 'Dev']], format: 'html', category: 'Backend' },
    ]);
  });

  it('parses with the given format instead of detecting one', () => {
    const tables = parseTables(mixed, 'markdown');

    expect(tables).toEqual([
      { headers: ['Company', 'Role'], rows: [['Beta', 'QA']], format: 'markdown', category: 'Backend' },
    ]);
  });

  it('falls back to markdown tables when the HTML yields none', () => {
    const content = '<table></table>\n\n| Company | Role |\n|---|---|\n| Beta | QA |';

    expect(detectFormat(content)).toBe('mixed');
    expect(parseTables(content).map((table) => table.format)).toEqual(['markdown']);
  });

  it('returns nothing for unknown documents', () => {
    expect(parseTables('no tables here')).toEqual([]);
  });
});

describe('table parser registry', () => {
  it('looks parsers up by the format they declare', () => {
    expect(getTableParser('markdown').manifest.format).toBe('markdown');
    expect(getTableParser('html').manifest.format).toBe('html');
    expect(getAllTableParsers().map((parser) => parser.manifest.format)).toEqual(['markdown', 'html']);
  });

  it('dispatches parseTables through the registered parser', () => {
    expect(parseTables(markdown)).toEqual(getTableParser('markdown').parse(markdown));
    expect(parseTables(html, 'html')).toEqual(getTableParser('html').parse(html));
  });
});
