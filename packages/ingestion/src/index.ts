// Pipeline
export { processDocument } from './pipeline.js';

// Individual stages
export { detectFormat, hasHtmlTable, hasMarkdownTable } from './detect.js';
export { parseTables, getTableParser, getAllTableParsers } from './tables.js';
export { mapColumns, hasJobColumns, COLUMN_KEYWORDS } from './columns.js';
export { extractRow, extractJobs, isInternshipRole } from './extract.js';
export { classifyLink, isAggregator, aggregatorNameOf, domainName, separateLinks, AGGREGATOR_DOMAINS } from './links.js';
export { DateNormalizer } from './dates.js';
export { inferCategory, isJobCategory, JOB_CATEGORIES } from './category.js';
export { inferCountry, DEFAULT_COUNTRY } from './country.js';
export { harmonize, isGenericCategory, normalizeCategoryLabel } from './harmonize.js';
export { jobIdentity, computeIdentity } from './identity.js';
export { validate } from './validate.js';
export { saveJobs, getOrCreateSource, markSourceFetched, uniqueLinkOf } from './store.js';

// Types
export type { ColumnField, ColumnMapping } from './columns.js';
export type { RowCarry, ExtractRowContext, ExtractedRow, ExtractOptions, ExtractResult } from './extract.js';
export type { LinkClassification, SeparatedLinks, AggregatorDomain } from './links.js';
export type { JobCategory } from './category.js';
export type { IdentityFields } from './identity.js';
export type { ValidationResult } from './validate.js';
export type { SaveJobsResult } from './store.js';
export type {
  IngestionLogger,
  PageMetadata,
  ExtractStats,
  HarmonizeStats,
  HarmonizeOptions,
  HarmonizeResult,
  ProcessDocumentOptions,
  DocumentStats,
  DocumentResult,
} from './types.js';
