import { detectFormat } from './detect.js';
import { extractJobs } from './extract.js';
import { harmonize } from './harmonize.js';
import { defaultLogger, plural } from './logger.js';
import { parseTables } from './tables.js';
import type { DocumentResult, PageMetadata, ProcessDocumentOptions } from './types.js';
import { validate } from './validate.js';

/**
 * Run one document through the whole pipeline.
 * Stages: detect → parse tables → extract → harmonize → validate
 *
 * Only a missing document throws; everything else degrades into `warnings`.
 */
export function processDocument(
  content: string,
  page: PageMetadata = {},
  options: ProcessDocumentOptions = {},
): DocumentResult {
  if (typeof content !== 'string') {
    throw new TypeError('processDocument: content must be a string');
  }

  const logger = options.logger ?? defaultLogger;
  const warnings: string[] = [];
  const warn = (stage: string, message: string): void => {
    warnings.push(message);
    logger.warn(`[${stage}] ${message}`);
  };

  // 1. Detect
  const format = options.format ?? detectFormat(content);

  // 2. Parse tables
  const tables = parseTables(content, format);
  logger.info(`[parse] ${format} document, ${plural(tables.length, 'table')}`);
  if (tables.length === 0) {
    warn('parse', 'No tables found in document');
  }

  // 3. Extract
  const extracted = extractJobs(tables, { includeLinkless: options.includeLinkless });
  const { stats: extractStats } = extracted;
  if (extractStats.tablesSkipped > 0) {
    warn('extract', `${plural(extractStats.tablesSkipped, 'table')} skipped: no employer and role columns`);
  }
  if (extractStats.rejected > 0) {
    warn('extract', `${plural(extractStats.rejected, 'row')} rejected: missing employer or role`);
  }
  if (extractStats.withoutLink > 0 && !options.includeLinkless) {
    warn('extract', `${plural(extractStats.withoutLink, 'row')} skipped: no identifying link`);
  }
  if (extractStats.duplicates > 0) {
    warn('extract', `${plural(extractStats.duplicates, 'duplicate row')} removed`);
  }
  logger.info(`[extract] ${plural(extractStats.extracted, 'candidate')} from ${plural(extractStats.rows, 'row')}`);

  // 4. Harmonize
  const harmonized = harmonize(extracted.candidates, page, {
    referenceDate: options.referenceDate,
    normalizer: options.normalizer,
    logger,
  });
  warnings.push(...harmonized.warnings);

  // 5. Validate
  const { valid, invalidCount } = validate(harmonized.jobs, {
    onInvalid: (issues) => {
      const detail = issues.map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`).join('; ');
      logger.warn(`[validate] dropped record (${detail})`);
    },
  });
  if (invalidCount > 0) {
    warn('validate', `${plural(invalidCount, 'record')} failed validation`);
  }

  logger.info(`[pipeline] ${plural(valid.length, 'job')} emitted from ${plural(tables.length, 'table')}`);

  return {
    format,
    tables,
    jobs: valid,
    warnings,
    stats: {
      ...extractStats,
      ...harmonized.stats,
      validationDropped: invalidCount,
      emitted: valid.length,
    },
  };
}
