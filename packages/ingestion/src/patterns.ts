export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Keyword matcher over lower-cased text. Short keywords (three characters or
 * fewer) only match as whole words.
 */
export function keywordPattern(keyword: string, options: { wordStart?: boolean } = {}): RegExp {
  const escaped = escapeRegExp(keyword.toLowerCase());
  const short = keyword.length <= 3;
  const head = short || options.wordStart ? '(?<![a-z0-9])' : '';
  const tail = short ? '(?![a-z0-9])' : '';
  return new RegExp(`${head}${escaped}${tail}`);
}
