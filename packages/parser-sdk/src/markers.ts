const LINK_MARKER_PATTERN = /\[\[LINK:([^\]]+)\]\]/g;

/** Token that marks a flagged (notably prominent) employer in cell text. */
export const FLAG_TOKEN = ':fire:';
export const FLAG_GLYPH = '🔥';

/**
 * Encode a URL as an inline marker so later stages can recover it while the
 * visible cell text stays readable.
 */
export function linkMarker(url: string): string {
  return `[[LINK:${url.trim()}]]`;
}

/**
 * All marker URLs in a cell, in order of appearance.
 */
export function extractLinks(cell: string): string[] {
  const links: string[] = [];
  for (const match of cell.matchAll(LINK_MARKER_PATTERN)) {
    const url = match[1]?.trim();
    if (url) {
      links.push(url);
    }
  }
  return links;
}

/**
 * Display text of a cell: markers removed, whitespace collapsed.
 */
export function stripLinkMarkers(cell: string): string {
  return cell.replace(LINK_MARKER_PATTERN, ' ').replace(/\s+/g, ' ').trim();
}
