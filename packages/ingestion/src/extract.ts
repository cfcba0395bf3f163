import {
  DEFAULT_CATEGORY,
  FLAG_GLYPH,
  FLAG_TOKEN,
  extractLinks,
  stripLinkMarkers,
  type JobCandidate,
  type ParsedTable,
} from '@boardsift/parser-sdk';
import { hasJobColumns, mapColumns, type ColumnMapping } from './columns.js';
import { jobIdentity } from './identity.js';
import { classifyLink } from './links.js';
import type { ExtractStats } from './types.js';

const CONTINUATION_MARKER = '↳';
const FLAG_IMAGE_ALT = /alt\s*=\s*["']?fire\b/i;
const INTERNSHIP_PATTERN = /\bintern(?:s|ship|ships)?\b/i;
const SIMPLIFY = 'Simplify';

/** State threaded from one extracted row to the next within a table. */
export interface RowCarry {
  readonly employer: string;
  readonly isFlaggedEmployer: boolean;
}

export interface ExtractRowContext {
  readonly category?: string;
  readonly previous?: RowCarry;
}

export interface ExtractedRow {
  readonly candidate: JobCandidate;
  readonly carry: RowCarry;
}

export interface ExtractOptions {
  /** Keep rows with neither a company nor an aggregator link. */
  includeLinkless?: boolean;
}

export interface ExtractResult {
  candidates: JobCandidate[];
  stats: ExtractStats;
}

export function isInternshipRole(role: string): boolean {
  return INTERNSHIP_PATTERN.test(role);
}

function isFlagged(rawEmployer: string): boolean {
  return (
    rawEmployer.includes(FLAG_GLYPH) ||
    rawEmployer.toLowerCase().includes(FLAG_TOKEN) ||
    FLAG_IMAGE_ALT.test(rawEmployer)
  );
}

function displayText(cell: string): string {
  return stripLinkMarkers(cell.replaceAll(FLAG_GLYPH, ' ').replace(/:fire:/gi, ' '));
}

function cellAt(row: readonly string[], index: number | undefined): string | undefined {
  return index === undefined ? undefined : row[index];
}

function optional(text: string | undefined): string | undefined {
  if (text === undefined) return undefined;
  const cleaned = stripLinkMarkers(text);
  return cleaned.length > 0 ? cleaned : undefined;
}

function isSimplifyLink(url: string): boolean {
  const classification = classifyLink(url);
  return classification.kind === 'aggregator' && classification.name === SIMPLIFY;
}

/**
 * Turn one table row into a job candidate.
 *
 * Returns `undefined` for rows that cannot be used: employer or role column
 * missing or out of range, empty text, an echoed header row, or a `↳`
 * continuation with no earlier row to inherit from.
 */
export function extractRow(
  row: readonly string[],
  mapping: ColumnMapping,
  context: ExtractRowContext = {},
): ExtractedRow | undefined {
  const rawEmployer = cellAt(row, mapping.employer);
  const rawRole = cellAt(row, mapping.role);
  if (rawEmployer === undefined || rawRole === undefined) {
    return undefined;
  }

  const role = stripLinkMarkers(rawRole);
  let employer = displayText(rawEmployer);
  let isFlaggedEmployer = isFlagged(rawEmployer);

  if (employer.startsWith(CONTINUATION_MARKER)) {
    if (!context.previous) {
      return undefined;
    }
    employer = context.previous.employer;
    isFlaggedEmployer = context.previous.isFlaggedEmployer;
  }

  if (!employer || !role || employer.toLowerCase() === 'company' || role.toLowerCase() === 'role') {
    return undefined;
  }

  let companyLink: string | undefined;
  let aggregatorLink: string | undefined;

  for (const link of extractLinks(cellAt(row, mapping.link) ?? '')) {
    if (isSimplifyLink(link)) {
      aggregatorLink ??= link;
    } else {
      companyLink ??= link;
    }
  }

  // The employer name itself is sometimes the link
  companyLink ??= extractLinks(rawEmployer).find((link) => !isSimplifyLink(link));

  const datePosted = optional(cellAt(row, mapping.datePosted));
  const notes = optional(cellAt(row, mapping.notes));

  const candidate: JobCandidate = {
    employer,
    role,
    location: optional(cellAt(row, mapping.location)) ?? '',
    category: context.category ?? DEFAULT_CATEGORY,
    ...(companyLink !== undefined ? { companyLink } : {}),
    ...(aggregatorLink !== undefined ? { aggregatorLink, aggregatorName: SIMPLIFY } : {}),
    ...(datePosted !== undefined ? { datePosted } : {}),
    ...(notes !== undefined ? { notes } : {}),
    isFlaggedEmployer,
    isInternship: isInternshipRole(role),
  };

  return { candidate, carry: { employer, isFlaggedEmployer } };
}

/**
 * Extract candidates from every table. Rows are taken strictly in document
 * order within a table so `↳` rows inherit from the row above; the carry is
 * reset at each table boundary.
 */
export function extractJobs(tables: readonly ParsedTable[], options: ExtractOptions = {}): ExtractResult {
  const stats: ExtractStats = {
    tables: tables.length,
    tablesSkipped: 0,
    rows: 0,
    extracted: 0,
    rejected: 0,
    withoutLink: 0,
    duplicates: 0,
  };
  const candidates: JobCandidate[] = [];
  const seen = new Set<string>();

  for (const table of tables) {
    const mapping = mapColumns(table.headers);
    if (!hasJobColumns(mapping)) {
      stats.tablesSkipped++;
      continue;
    }

    let previous: RowCarry | undefined;
    for (const row of table.rows) {
      stats.rows++;
      const extracted = extractRow(row, mapping, { category: table.category, previous });
      if (!extracted) {
        stats.rejected++;
        continue;
      }
      previous = extracted.carry;

      const { candidate } = extracted;
      if (!candidate.companyLink && !candidate.aggregatorLink) {
        stats.withoutLink++;
        if (!options.includeLinkless) continue;
      }

      const identity = jobIdentity(candidate);
      if (seen.has(identity)) {
        stats.duplicates++;
        continue;
      }
      seen.add(identity);
      candidates.push(candidate);
      stats.extracted++;
    }
  }

  return { candidates, stats };
}
