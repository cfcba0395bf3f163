import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect, vi } from 'vitest';
import { processDocument } from '../src/pipeline.js';

const currentDir = dirname(fileURLToPath(import.meta.url));
const readme = readFileSync(resolve(currentDir, '../fixtures/readme.md'), 'utf-8');

function createLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe('processDocument', () => {
  it('turns a single markdown table into one canonical posting', () => {
    const logger = createLogger();
    const content =
      '| Company | Role | Location | Link |\n|---|---|---|---|\n| TestCo | Engineer | Remote | [Apply](https://test.com/job) |';

    const result = processDocument(content, {}, { logger, referenceDate: '2024-12-29' });

    expect(result.format).toBe('markdown');
    expect(result.tables).toHaveLength(1);
    expect(result.warnings).toEqual([]);
    expect(result.jobs).toEqual([
      {
        employer: 'TestCo',
        role: 'Engineer',
        location: 'Remote',
        country: 'USA',
        category: 'Software Engineering',
        companyLink: 'https://test.com/job',
        isFlaggedEmployer: false,
        isInternship: false,
      },
    ]);
  });

  it('processes a full listing document', () => {
    const logger = createLogger();
    const result = processDocument(
      readme,
      { title: 'Summer 2025 Tech Internships', url: 'https://example.test/internships' },
      { logger, referenceDate: '2024-12-29' },
    );

    expect(result.format).toBe('markdown');
    expect(result.tables.map((table) => table.category)).toEqual(['💻 Software Engineering', '🗓️ Daily List']);
    expect(result.jobs).toEqual([
      {
        employer: 'Acme Robotics',
        role: 'Software Engineer Intern',
        location: 'San Francisco, CA',
        country: 'USA',
        category: 'Software Engineering',
        companyLink: 'https://acme-robotics.example/careers/42',
        aggregatorLink: 'https://simplify.jobs/p/acme-42',
        aggregatorName: 'Simplify',
        datePosted: '2024-12-27',
        isFlaggedEmployer: true,
        isInternship: true,
      },
      {
        employer: 'Acme Robotics',
        role: 'Firmware Intern',
        location: 'Toronto, ON',
        country: 'Canada',
        category: 'Software Engineering',
        aggregatorLink: 'https://boards.greenhouse.io/acme/jobs/7',
        aggregatorName: 'Greenhouse',
        datePosted: '2024-12-20',
        isFlaggedEmployer: true,
        isInternship: true,
      },
      {
        employer: 'Nimbus',
        role: 'Backend Engineer Intern',
        location: 'Remote',
        country: 'USA',
        category: 'Software Engineering',
        companyLink: 'https://nimbus.example/jobs/3',
        datePosted: 'Rolling',
        isFlaggedEmployer: false,
        isInternship: true,
      },
      {
        employer: 'Quark Labs',
        role: 'Machine Learning Intern',
        location: 'Berlin, Germany',
        country: 'Germany',
        category: 'Machine Learning',
        companyLink: 'https://quark.example/ml',
        datePosted: '2024-12-27',
        isFlaggedEmployer: false,
        isInternship: true,
      },
    ]);

    expect(result.warnings).toEqual([
      '1 row skipped: no identifying link',
      '1 duplicate row removed',
      '1 date left as written: "Rolling"',
    ]);
    expect(result.stats).toEqual({
      tables: 2,
      tablesSkipped: 0,
      rows: 6,
      extracted: 4,
      rejected: 0,
      withoutLink: 1,
      duplicates: 1,
      datesNormalized: 3,
      datesUnparsed: 1,
      linksReclassified: 1,
      categoriesInferred: 1,
      validationDropped: 0,
      emitted: 4,
    });
  });

  it('keeps linkless rows when asked to', () => {
    const logger = createLogger();
    const result = processDocument(readme, {}, { logger, referenceDate: '2024-12-29', includeLinkless: true });

    const lumen = result.jobs.find((job) => job.employer === 'Lumen Data');
    expect(lumen).toEqual({
      employer: 'Lumen Data',
      role: 'Data Analyst Intern',
      location: 'London, UK',
      country: 'UK',
      category: 'Software Engineering',
      datePosted: '2024-12-22',
      isFlaggedEmployer: false,
      isInternship: true,
    });
    expect(result.jobs).toHaveLength(5);
    expect(result.warnings).toContain('1 job without an identifying link cannot be stored');
    expect(result.warnings).not.toContain('1 row skipped: no identifying link');
  });

  it('warns when a document has no tables', () => {
    const logger = createLogger();
    const result = processDocument('No listings today.', {}, { logger });

    expect(result.format).toBe('unknown');
    expect(result.jobs).toEqual([]);
    expect(result.warnings).toEqual(['No tables found in document']);
    expect(logger.warn).toHaveBeenCalledWith('[parse] No tables found in document');
  });

  it('reports tables without employer and role columns', () => {
    const logger = createLogger();
    const content = '| Name | Score |\n|---|---|\n| Ada | 10 |';

    const result = processDocument(content, {}, { logger });

    expect(result.jobs).toEqual([]);
    expect(result.stats.tablesSkipped).toBe(1);
    expect(result.warnings).toEqual(['1 table skipped: no employer and role columns']);
  });

  it('parses the HTML tables of a mixed document under markdown headings', () => {
    const logger = createLogger();
    const content = [
      '## Backend Roles',
      '',
      '<table><tr><th>Company</th><th>Role</th><th>Link</th></tr>',
      '<tr><td>Acme</td><td>API Engineer</td><td><a href="https://acme.example/jobs/1">Apply</a></td></tr></table>',
      '',
      '| Company | Role |',
      '|---|---|',
      '| Ignored | Row |',
    ].join('\n');

    const result = processDocument(content, {}, { logger });

    expect(result.format).toBe('mixed');
    expect(result.jobs).toHaveLength(1);
    expect(result.jobs[0]).toMatchObject({
      employer: 'Acme',
      role: 'API Engineer',
      category: 'Backend',
      companyLink: 'https://acme.example/jobs/1',
    });
  });

  it('logs stage progress with stage prefixes', () => {
    const logger = createLogger();
    processDocument(readme, {}, { logger, referenceDate: '2024-12-29' });

    expect(logger.info).toHaveBeenCalledWith('[parse] markdown document, 2 tables');
    expect(logger.info).toHaveBeenCalledWith('[extract] 4 candidates from 6 rows');
    expect(logger.info).toHaveBeenCalledWith('[pipeline] 4 jobs emitted from 2 tables');
    expect(logger.warn).toHaveBeenCalledWith('[extract] 1 row skipped: no identifying link');
  });

  it('fails fast without a document', () => {
    expect(() => processDocument(undefined as unknown as string)).toThrow(TypeError);
    expect(() => processDocument(null as unknown as string)).toThrow('processDocument: content must be a string');
  });
});
