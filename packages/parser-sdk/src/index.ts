export type {
  TableFormat,
  ParsedTable,
  ParserManifest,
  TableParseOptions,
  TableParser,
  CanonicalJobPosting,
  JobCandidate,
} from './types.js';
export { defineParser } from './factory.js';
export {
  tableFormatSchema,
  parsedTableSchema,
  canonicalJobPostingSchema,
  validatePostings,
} from './schema.js';
export type { ValidatedJobPosting, ValidatePostingsOptions } from './schema.js';
export { FLAG_GLYPH, FLAG_TOKEN, linkMarker, extractLinks, stripLinkMarkers } from './markers.js';
export { normalizeWhitespace, decodeHtmlEntities, imageAltText, inlineHtmlToText } from './inline.js';
export { DEFAULT_CATEGORY, shortenCategory, headingText } from './headings.js';
