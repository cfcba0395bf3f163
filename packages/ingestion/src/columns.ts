import { stripLinkMarkers } from '@boardsift/parser-sdk';

export type ColumnField = 'employer' | 'role' | 'location' | 'link' | 'datePosted' | 'notes';

export type ColumnMapping = Readonly<Partial<Record<ColumnField, number>>>;

/**
 * Evaluation order matters: a header claimed by an earlier field is not
 * considered for later ones, so "Job Title" is the role, never a link.
 */
export const COLUMN_KEYWORDS: ReadonlyArray<readonly [ColumnField, readonly string[]]> = [
  ['employer', ['company', 'employer', 'organization', 'org']],
  ['role', ['role', 'position', 'title', 'job']],
  ['location', ['location', 'city', 'office', 'where', 'place']],
  ['link', ['apply', 'link', 'application', 'url']],
  ['datePosted', ['date', 'posted', 'added', 'age', 'when']],
  ['notes', ['note', 'info', 'requirement', 'sponsor', 'status']],
];

/**
 * Fuzzy-match each field to the first header containing one of its keywords.
 */
export function mapColumns(headers: readonly string[]): ColumnMapping {
  const normalized = headers.map((header) => stripLinkMarkers(header).toLowerCase());
  const claimed = new Set<number>();
  const mapping: Partial<Record<ColumnField, number>> = {};

  for (const [field, keywords] of COLUMN_KEYWORDS) {
    const index = normalized.findIndex(
      (header, i) => !claimed.has(i) && keywords.some((keyword) => header.includes(keyword)),
    );
    if (index !== -1) {
      mapping[field] = index;
      claimed.add(index);
    }
  }

  return Object.freeze(mapping);
}

export function hasJobColumns(mapping: ColumnMapping): boolean {
  return mapping.employer !== undefined && mapping.role !== undefined;
}
