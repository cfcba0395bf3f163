import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { parsedTableSchema } from '@boardsift/parser-sdk';
import { cellText, isSeparatorLine, isTableStart, parse, splitRow } from '../src/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixture = readFileSync(resolve(__dirname, '../fixtures/listings.md'), 'utf-8');

describe('Markdown table parser', () => {
  describe('line predicates', () => {
    it('recognises separator lines with alignment colons and spaces', () => {
      expect(isSeparatorLine('|---|---|')).toBe(true);
      expect(isSeparatorLine('| :---- | ---: |')).toBe(true);
      expect(isSeparatorLine('  |:--:|  ')).toBe(true);
    });

    it('rejects rows that contain text', () => {
      expect(isSeparatorLine('| Company | --- |')).toBe(false);
      expect(isSeparatorLine('---')).toBe(false);
    });

    it('starts a table only when a separator follows', () => {
      expect(isTableStart('| A | B |', '|---|---|')).toBe(true);
      expect(isTableStart('| A | B |', '| 1 | 2 |')).toBe(false);
      expect(isTableStart('| A | B |', undefined)).toBe(false);
    });

    it('splits on unescaped pipes only', () => {
      expect(splitRow('| Pipe \\| Works | Analyst |')).toEqual(['Pipe | Works', 'Analyst']);
    });
  });

  describe('cellText', () => {
    it('converts links to markers', () => {
      expect(cellText('[Apply](https://test.com/job)')).toBe('Apply [[LINK:https://test.com/job]]');
    });

    it('strips bold markers', () => {
      expect(cellText('**Acme**')).toBe('Acme');
      expect(cellText('__Acme__')).toBe('Acme');
      expect(cellText('__Acme__ Robotics')).toBe('Acme Robotics');
    });

    it('keeps underscores inside words and links', () => {
      expect(cellText('my__var__name')).toBe('my__var__name');
      expect(cellText('[Apply](https://acme.example/__jobs__/1)')).toBe(
        'Apply [[LINK:https://acme.example/__jobs__/1]]',
      );
    });

    it('unwraps linked images', () => {
      expect(cellText('[![Apply](https://img.example/apply.png)](https://acme.example/apply)')).toBe(
        'Apply [[LINK:https://acme.example/apply]]',
      );
    });

    it('turns a fire image into the flag token', () => {
      expect(cellText('![fire](https://img.example/fire.png) Acme')).toBe(':fire: Acme');
    });
  });

  describe('parsing', () => {
    it('finds every active and inactive table outside code fences', () => {
      const tables = parse(fixture);
      expect(tables.length).toBe(3);
    });

    it('takes the nearest heading as category', () => {
      const tables = parse(fixture);

      expect(tables[0]!.category).toBe('💻 Software Engineering');
      expect(tables[1]!.category).toBe('📊 Data Science');
    });

    it('keeps the previous category under an inactive heading', () => {
      const tables = parse(fixture);
      expect(tables[2]!.category).toBe('📊 Data Science');
    });

    it('extracts headers and rows', () => {
      const [table] = parse(fixture);

      expect(table!.headers).toEqual(['Company', 'Role', 'Location', 'Application', 'Date Posted']);
      expect(table!.rows.length).toBe(3);
      expect(table!.format).toBe('markdown');
    });

    it('preserves links, glyphs and line breaks inside cells', () => {
      const [table] = parse(fixture);
      const [first, second] = table!.rows;

      expect(first![0]).toBe('Acme Robotics [[LINK:https://acme-robotics.example]] 🔥');
      expect(first![3]).toBe(
        'Apply [[LINK:https://acme-robotics.example/careers/42]] Simplify [[LINK:https://simplify.jobs/p/acme-42]]',
      );
      expect(second![0]).toBe('↳');
      expect(second![2]).toBe('Austin, TX; Denver, CO');
    });

    it('keeps escaped pipes inside cells', () => {
      const tables = parse(fixture);
      expect(tables[1]!.rows[0]![0]).toBe('Pipe | Works');
    });

    it('ends a table at the first blank line', () => {
      const tables = parse('| A | B |\n|---|---|\n| 1 | 2 |\n\n| 3 | 4 |');

      expect(tables.length).toBe(1);
      expect(tables[0]!.rows).toEqual([['1', '2']]);
    });

    it('defaults the category when no heading precedes the table', () => {
      const [table] = parse('| A | B |\n|---|---|\n| 1 | 2 |');
      expect(table!.category).toBe('Other');
    });

    it('unwraps underscore bold in row cells', () => {
      const [table] = parse('| Company | Role | Link |\n|---|---|---|\n| __Acme__ | Engineer | [Apply](https://acme.example/1) |');
      expect(table!.rows).toEqual([['Acme', 'Engineer', 'Apply [[LINK:https://acme.example/1]]']]);
    });

    it('returns no tables for plain text', () => {
      expect(parse('just | some text\nwithout a separator')).toEqual([]);
    });

    it('every table satisfies the ParsedTable schema', () => {
      for (const table of parse(fixture)) {
        const parsed = parsedTableSchema.safeParse(table);
        if (!parsed.success) {
          expect.fail(`Table "${table.category}" failed schema validation: ${JSON.stringify(parsed.error.issues)}`);
        }
      }
    });
  });
});
