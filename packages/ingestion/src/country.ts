import { z } from 'zod';
import { loadData } from './data.js';
import { keywordPattern } from './patterns.js';

const countryTableSchema = z.object({
  defaultCountry: z.string().min(1),
  usMarkers: z.array(z.string().min(1)),
  usStateCodes: z.array(z.string().regex(/^[a-z]{2}$/)),
  countries: z.array(
    z.object({
      country: z.string().min(1),
      code: z.string().regex(/^[a-z]{2}$/),
      keywords: z.array(z.string().min(1)).min(1),
    }),
  ),
});

const table = loadData('countries.json', countryTableSchema);

// "uk" must not match "Milwaukee", nor "us" match "Austin"
const US_MARKERS = table.usMarkers.map((marker) => keywordPattern(marker));
const US_STATE_CODES = new Set(table.usStateCodes);
const CODE_SUFFIX = /,\s*([a-z]{2})\b/g;
const COUNTRY_RULES = table.countries.map(({ country, code, keywords }) => ({
  country,
  code,
  patterns: keywords.map((keyword) => keywordPattern(keyword)),
}));

export const DEFAULT_COUNTRY = table.defaultCountry;

function suffixCodes(location: string): string[] {
  return Array.from(location.matchAll(CODE_SUFFIX), (match) => match[1] ?? '');
}

function matchCountryTable(location: string) {
  return COUNTRY_RULES.find(({ patterns }) => patterns.some((pattern) => pattern.test(location)));
}

/**
 * Best-effort country for a free-text location. Explicit US markers win.
 * A `, XX` suffix is read as a US state unless it is the ISO code of the
 * country a city in the text belongs to ("Munich, DE" against "Dover, DE").
 * Anything unrecognized is the default.
 */
export function inferCountry(location: string): string {
  const lowered = location.toLowerCase();
  if (!lowered.trim()) {
    return DEFAULT_COUNTRY;
  }

  if (US_MARKERS.some((pattern) => pattern.test(lowered))) {
    return 'USA';
  }

  const codes = suffixCodes(lowered);
  const matched = matchCountryTable(lowered);
  if (matched && codes.includes(matched.code)) {
    return matched.country;
  }

  if (codes.some((code) => US_STATE_CODES.has(code))) {
    return 'USA';
  }

  return matched?.country ?? DEFAULT_COUNTRY;
}
