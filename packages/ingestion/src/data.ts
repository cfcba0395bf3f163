import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { z } from 'zod';

/**
 * Load and validate one of the lookup tables under `data/`.
 */
export function loadData<T extends z.ZodTypeAny>(fileName: string, schema: T): z.output<T> {
  const path = fileURLToPath(new URL(`../data/${fileName}`, import.meta.url));
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return schema.parse(raw);
}
