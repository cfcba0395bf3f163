import type { CanonicalJobPosting, ParsedTable, TableFormat } from '@boardsift/parser-sdk';
import type { JobCategory } from './category.js';
import type { DateNormalizer } from './dates.js';
import type { ExtractOptions } from './extract.js';

/**
 * Minimal logger interface, defaulting to console.
 */
export interface IngestionLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Title and address of the page a document came from. */
export interface PageMetadata {
  title?: string;
  url?: string;
}

/**
 * Per-table and per-row counts from row extraction.
 */
export interface ExtractStats {
  tables: number;
  tablesSkipped: number;
  rows: number;
  extracted: number;
  rejected: number;
  withoutLink: number;
  duplicates: number;
}

export interface HarmonizeStats {
  datesNormalized: number;
  datesUnparsed: number;
  linksReclassified: number;
  categoriesInferred: number;
}

export interface HarmonizeOptions {
  /** "Today" for relative dates; ignored when `normalizer` is given. */
  referenceDate?: Date | string;
  normalizer?: DateNormalizer;
  logger?: IngestionLogger;
}

export interface HarmonizeResult {
  jobs: CanonicalJobPosting[];
  /** Category inferred from the page title. */
  inferredCategory: JobCategory;
  warnings: string[];
  stats: HarmonizeStats;
}

export interface ProcessDocumentOptions extends HarmonizeOptions, ExtractOptions {
  /** Skip detection and parse as this format. */
  format?: TableFormat;
}

export interface DocumentStats extends ExtractStats, HarmonizeStats {
  validationDropped: number;
  emitted: number;
}

export interface DocumentResult {
  format: TableFormat;
  tables: ParsedTable[];
  jobs: CanonicalJobPosting[];
  warnings: string[];
  stats: DocumentStats;
}
