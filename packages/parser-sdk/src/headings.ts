import { inlineHtmlToText, normalizeWhitespace } from './inline.js';
import { stripLinkMarkers } from './markers.js';

export const DEFAULT_CATEGORY = 'Other';

const FILLER_WORDS = /\b(?:positions?|roles?|jobs?|opportunities|openings|new[\s-]grad|entry[\s-]level|full[\s-]time|20[23]\d)\b/gi;
const MAX_CATEGORY_WORDS = 3;

function firstWords(text: string): string {
  return text.split(/\s+/).filter(Boolean).slice(0, MAX_CATEGORY_WORDS).join(' ');
}

/**
 * Shorten a section heading to a compact category label: filler words and
 * years removed, at most three words kept.
 */
export function shortenCategory(category: string): string {
  const shortened = firstWords(normalizeWhitespace(category.replace(FILLER_WORDS, ' ')));
  if (shortened) {
    return shortened;
  }

  return firstWords(category) || DEFAULT_CATEGORY;
}

/**
 * Visible text of a heading: leading `#`s, anchor links, inline markup and
 * emphasis removed. Returns undefined for empty headings and for sections of
 * inactive listings, which should not rename the current category.
 */
export function headingText(raw: string): string | undefined {
  let text = raw.trim().replace(/^#+/, '');
  text = text.replace(/\[([^\]]+)\]\([^)]*\)/g, '$1');
  text = stripLinkMarkers(inlineHtmlToText(text));
  text = text.replace(/\*\*|__/g, '').trim();

  if (!text || text.toLowerCase().includes('inactive')) {
    return undefined;
  }

  return text;
}
