import { z } from 'zod';

const nonBlank = z.string().trim().min(1);

export const tableFormatSchema = z.enum(['html', 'markdown', 'mixed', 'unknown']);

export const parsedTableSchema = z.object({
  headers: z.array(z.string()),
  rows: z.array(z.array(z.string())),
  format: tableFormatSchema,
  category: z.string(),
});

export const canonicalJobPostingSchema = z.object({
  employer: nonBlank,
  role: nonBlank,
  location: z.string(),
  country: nonBlank,
  category: nonBlank,
  companyLink: nonBlank.optional(),
  aggregatorLink: nonBlank.optional(),
  aggregatorName: nonBlank.optional(),
  datePosted: nonBlank.optional(),
  notes: nonBlank.optional(),
  isFlaggedEmployer: z.boolean(),
  isInternship: z.boolean(),
});

export type ValidatedJobPosting = z.infer<typeof canonicalJobPostingSchema>;

export interface ValidatePostingsOptions {
  onInvalid?: (issues: z.ZodIssue[], posting: unknown) => void;
}

/**
 * Keep postings that satisfy the canonical schema. The input objects are
 * returned as-is (not the parsed copies) so frozen records stay frozen.
 */
export function validatePostings<T>(postings: readonly T[], options?: ValidatePostingsOptions): T[] {
  const valid: T[] = [];

  for (const posting of postings) {
    const result = canonicalJobPostingSchema.safeParse(posting);
    if (result.success) {
      valid.push(posting);
    } else {
      options?.onInvalid?.(result.error.issues, posting);
    }
  }

  return valid;
}
