import { createHash } from 'node:crypto';

/** Fields that make a posting distinct. */
export interface IdentityFields {
  readonly employer: string;
  readonly role: string;
  readonly location: string;
  readonly companyLink?: string;
  readonly datePosted?: string;
}

/**
 * The identity tuple joined into one string; equal strings mean the same posting.
 */
export function jobIdentity(job: IdentityFields): string {
  return [job.employer, job.role, job.location, job.companyLink ?? '', job.datePosted ?? ''].join('|');
}

/**
 * SHA-256 of {@link jobIdentity}, for callers that need a fixed-length key.
 */
export function computeIdentity(job: IdentityFields): string {
  return createHash('sha256').update(jobIdentity(job)).digest('hex');
}
