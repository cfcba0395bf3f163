export type TableFormat = 'html' | 'markdown' | 'mixed' | 'unknown';

/**
 * One logical table lifted out of a document.
 * Row lengths may differ from the header length; index defensively.
 */
export interface ParsedTable {
  readonly headers: readonly string[];
  readonly rows: readonly (readonly string[])[];
  readonly format: TableFormat;
  /** Section heading the table appeared under. */
  readonly category: string;
}

export interface ParserManifest {
  id: string;
  name: string;
  version: string;
  format: Exclude<TableFormat, 'mixed' | 'unknown'>;
}

export interface TableParseOptions {
  /** Also treat `#`-prefixed text lines as section headings (mixed documents). */
  markdownHeadings?: boolean;
}

export interface TableParser {
  manifest: ParserManifest;
  parse(content: string, options?: TableParseOptions): ParsedTable[];
}

/**
 * The pipeline's output unit. Identity is
 * (employer, role, location, companyLink ?? '', datePosted ?? '').
 */
export interface CanonicalJobPosting {
  readonly employer: string;
  readonly role: string;
  readonly location: string;
  readonly country: string;
  readonly category: string;
  readonly companyLink?: string;
  readonly aggregatorLink?: string;
  readonly aggregatorName?: string;
  /** `yyyy-MM-dd` once normalized, otherwise the cleaned source text. */
  readonly datePosted?: string;
  readonly notes?: string;
  readonly isFlaggedEmployer: boolean;
  readonly isInternship: boolean;
}

/**
 * A row lifted out of a table, before harmonization fills in the country
 * and reconciles dates, links and categories.
 */
export type JobCandidate = Omit<CanonicalJobPosting, 'country'> & {
  readonly country?: string;
};
