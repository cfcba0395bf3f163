import { DEFAULT_CATEGORY, type CanonicalJobPosting, type JobCandidate } from '@boardsift/parser-sdk';
import { inferCategory } from './category.js';
import { inferCountry } from './country.js';
import { DateNormalizer } from './dates.js';
import { isInternshipRole } from './extract.js';
import { aggregatorNameOf, classifyLink, domainName } from './links.js';
import { defaultLogger, plural } from './logger.js';
import type { HarmonizeOptions, HarmonizeResult, HarmonizeStats, PageMetadata } from './types.js';

/** Section labels that describe the list rather than the work. */
const GENERIC_LABELS = new Set([
  'daily list',
  'new jobs',
  'jobs',
  'listings',
  'opportunities',
  'positions',
  'all jobs',
  'other',
  'see full',
  'see more',
  'view all',
]);

const GENERIC_PATTERNS: readonly RegExp[] = [
  /\bdaily\b/,
  /\blist(?:s|ings?)?\b/,
  /\bnew[\s-]?grads?\b/,
  /\bintern(?:s|ships?)?\b/,
  /\b20\d{2}\b/,
  /\b(?:spring|summer|fall|autumn|winter)\b/,
];

const SAMPLE_LIMIT = 3;

/**
 * Drop emoji and other symbols from a section label and collapse whitespace;
 * an empty result becomes `Other`.
 */
export function normalizeCategoryLabel(label: string): string {
  const cleaned = label
    .replace(/[^\p{L}\p{N}\p{P}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  return cleaned || DEFAULT_CATEGORY;
}

export function isGenericCategory(label: string): boolean {
  const lowered = label.trim().toLowerCase();
  if (!lowered) {
    return true;
  }
  return GENERIC_LABELS.has(lowered) || GENERIC_PATTERNS.some((pattern) => pattern.test(lowered));
}

interface JobContext {
  normalizer: DateNormalizer;
  pageCategory: string;
  stats: HarmonizeStats;
  unparsedDates: string[];
}

function harmonizeJob(candidate: JobCandidate, context: JobContext): CanonicalJobPosting {
  const { stats } = context;

  let datePosted = candidate.datePosted;
  if (datePosted !== undefined) {
    const normalized = context.normalizer.normalize(datePosted);
    if (normalized === undefined) {
      stats.datesUnparsed++;
      context.unparsedDates.push(datePosted);
    } else {
      stats.datesNormalized++;
      datePosted = normalized;
    }
  }

  let companyLink = candidate.companyLink;
  let aggregatorLink = candidate.aggregatorLink;
  let aggregatorName = candidate.aggregatorName;

  if (companyLink !== undefined) {
    const classification = classifyLink(companyLink);
    if (classification.kind === 'aggregator') {
      if (aggregatorLink === undefined) {
        aggregatorLink = companyLink;
        aggregatorName = classification.name;
      }
      companyLink = undefined;
      stats.linksReclassified++;
    }
  }

  if (aggregatorLink !== undefined && aggregatorName === undefined) {
    aggregatorName = aggregatorNameOf(aggregatorLink) ?? domainName(aggregatorLink);
  }

  const label = normalizeCategoryLabel(candidate.category);
  let category = label;
  if (isGenericCategory(label)) {
    const fromRole = inferCategory(candidate.role);
    category = fromRole === 'Other' ? context.pageCategory : fromRole;
    if (category !== label) {
      stats.categoriesInferred++;
    }
  }

  return Object.freeze({
    employer: candidate.employer,
    role: candidate.role,
    location: candidate.location,
    country: candidate.country ?? inferCountry(candidate.location),
    category,
    ...(companyLink !== undefined ? { companyLink } : {}),
    ...(aggregatorLink !== undefined ? { aggregatorLink } : {}),
    ...(aggregatorName !== undefined ? { aggregatorName } : {}),
    ...(datePosted !== undefined ? { datePosted } : {}),
    ...(candidate.notes !== undefined ? { notes: candidate.notes } : {}),
    isFlaggedEmployer: candidate.isFlaggedEmployer,
    isInternship: isInternshipRole(candidate.role),
  });
}

/**
 * Reconcile extracted candidates into canonical postings: normalize dates,
 * move aggregator URLs out of the company slot, fill in the country and
 * replace structural section labels with an inferred category.
 *
 * Degradations are reported in `warnings`; the batch is never aborted.
 * Running the output through again yields identical records.
 */
export function harmonize(
  candidates: readonly JobCandidate[],
  page: PageMetadata = {},
  options: HarmonizeOptions = {},
): HarmonizeResult {
  if (!Array.isArray(candidates)) {
    throw new TypeError('harmonize: candidates must be an array');
  }

  const logger = options.logger ?? defaultLogger;
  const inferredCategory = inferCategory(page.title ?? '');
  const stats: HarmonizeStats = {
    datesNormalized: 0,
    datesUnparsed: 0,
    linksReclassified: 0,
    categoriesInferred: 0,
  };
  const context: JobContext = {
    normalizer: options.normalizer ?? new DateNormalizer(options.referenceDate),
    pageCategory: inferredCategory,
    stats,
    unparsedDates: [],
  };

  const jobs = candidates.map((candidate) => harmonizeJob(candidate, context));
  const warnings: string[] = [];

  if (context.unparsedDates.length > 0) {
    const samples = context.unparsedDates
      .slice(0, SAMPLE_LIMIT)
      .map((date) => JSON.stringify(date))
      .join(', ');
    warnings.push(`${plural(context.unparsedDates.length, 'date')} left as written: ${samples}`);
  }

  const linkless = jobs.filter((job) => !job.companyLink && !job.aggregatorLink).length;
  if (linkless > 0) {
    warnings.push(`${plural(linkless, 'job')} without an identifying link cannot be stored`);
  }

  for (const warning of warnings) {
    logger.warn(`[harmonize] ${warning}`);
  }
  logger.info(
    `[harmonize] ${plural(jobs.length, 'job')}: ${stats.datesNormalized} dates normalized, ` +
      `${stats.linksReclassified} links reclassified, ${stats.categoriesInferred} categories inferred`,
  );

  return { jobs, inferredCategory, warnings, stats };
}
