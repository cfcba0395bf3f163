import { FLAG_TOKEN, linkMarker } from './markers.js';

const FLAG_IMAGE_ALTS = new Set(['fire', '🔥']);

/**
 * Trim whitespace and collapse multiple spaces.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Decode a small set of common HTML entities, plus numeric references.
 */
export function decodeHtmlEntities(text: string): string {
  return text
    .replace(/&#(\d+);/g, (full, code: string) => fromCodePoint(Number(code)) ?? full)
    .replace(/&#x([0-9a-f]+);/gi, (full, code: string) => fromCodePoint(Number.parseInt(code, 16)) ?? full)
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&');
}

function fromCodePoint(code: number): string | undefined {
  if (!Number.isInteger(code) || code < 0 || code > 0x10ffff) {
    return undefined;
  }
  return String.fromCodePoint(code);
}

function readAttribute(attributes: string, name: string): string | undefined {
  const pattern = new RegExp(`\\b${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)'|([^\\s>]+))`, 'i');
  const match = attributes.match(pattern);
  if (!match) {
    return undefined;
  }
  return decodeHtmlEntities(match[1] ?? match[2] ?? match[3] ?? '').trim();
}

/**
 * Text an image contributes to a cell: its alt text, with the "fire" alt
 * rewritten to the flagged-employer token.
 */
export function imageAltText(alt: string | undefined): string {
  const text = (alt ?? '').trim();
  if (FLAG_IMAGE_ALTS.has(text.toLowerCase())) {
    return FLAG_TOKEN;
  }
  return text;
}

/**
 * Reduce an inline HTML fragment (as found inside table cells) to plain text.
 * Anchors keep their text followed by a link marker, images become their alt
 * text, `<br>` separates values with "; ".
 */
export function inlineHtmlToText(fragment: string): string {
  let text = fragment;

  text = text.replace(/<!--[\s\S]*?-->/g, '');
  text = text.replace(/<img\b([^>]*)>/gi, (_full, attrs: string) => ` ${imageAltText(readAttribute(attrs, 'alt'))} `);
  text = text.replace(/<a\b([^>]*)>([\s\S]*?)<\/a>/gi, (_full, attrs: string, inner: string) => {
    const href = readAttribute(attrs, 'href');
    return href ? `${inner} ${linkMarker(href)}` : inner;
  });
  text = text.replace(/<br\s*\/?>|<\/br>/gi, '; ');
  text = text.replace(/<\/?[a-z][^>]*>/gi, ' ');
  text = decodeHtmlEntities(text);

  return normalizeWhitespace(text)
    .replace(/\s+;/g, ';')
    .replace(/^;\s*|;\s*$/g, '')
    .trim();
}
