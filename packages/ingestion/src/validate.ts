import type { CanonicalJobPosting, ValidatePostingsOptions } from '@boardsift/parser-sdk';
import { validatePostings } from '@boardsift/parser-sdk';

export interface ValidationResult<T> {
  valid: T[];
  invalidCount: number;
}

/**
 * Validate harmonized postings using the parser-sdk Zod schema.
 * Returns valid postings and a count of dropped ones.
 */
export function validate<T extends CanonicalJobPosting>(
  jobs: readonly T[],
  options?: ValidatePostingsOptions,
): ValidationResult<T> {
  const valid = validatePostings(jobs, options);
  return {
    valid,
    invalidCount: jobs.length - valid.length,
  };
}
