import type { TableParser } from './types.js';

/**
 * Typed helper for parser definitions.
 * Keeps parser declarations consistent without runtime overhead.
 */
export function defineParser<T extends TableParser>(parser: T): T {
  return parser;
}
