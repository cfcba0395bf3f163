import type { CanonicalJobPosting } from '@boardsift/parser-sdk';
import type { Database, NewJobPostingRow } from '@boardsift/db';
import { jobPostings, jobSources } from '@boardsift/db';
import { eq, sql } from 'drizzle-orm';

export interface SaveJobsResult {
  savedCount: number;
  updatedCount: number;
  skippedCount: number;
}

/**
 * The link a posting is stored under: its company link, else its aggregator link.
 */
export function uniqueLinkOf(posting: Pick<CanonicalJobPosting, 'companyLink' | 'aggregatorLink'>): string | undefined {
  const link = posting.companyLink?.trim() || posting.aggregatorLink?.trim();
  return link || undefined;
}

/**
 * Upsert postings keyed by their unique link.
 * Postings without a link, and repeats of a link already in the batch, are skipped.
 * Stored aggregator details, dates and notes survive an update that lacks them.
 */
export async function saveJobs(
  postings: readonly CanonicalJobPosting[],
  sourceId: number,
  db: Database,
): Promise<SaveJobsResult> {
  const rows: NewJobPostingRow[] = [];
  const seenLinks = new Set<string>();
  let skippedCount = 0;

  for (const posting of postings) {
    const uniqueLink = uniqueLinkOf(posting);
    if (!uniqueLink || seenLinks.has(uniqueLink)) {
      skippedCount++;
      continue;
    }
    seenLinks.add(uniqueLink);

    rows.push({
      sourceId,
      employer: posting.employer,
      role: posting.role,
      location: posting.location,
      country: posting.country,
      category: posting.category,
      companyLink: posting.companyLink ?? null,
      aggregatorLink: posting.aggregatorLink ?? null,
      aggregatorName: posting.aggregatorName ?? null,
      uniqueLink,
      datePosted: posting.datePosted ?? null,
      notes: posting.notes ?? null,
      isFlaggedEmployer: posting.isFlaggedEmployer,
      isInternship: posting.isInternship,
      analysisStatus: 'pending',
    });
  }

  if (rows.length === 0) {
    return { savedCount: 0, updatedCount: 0, skippedCount };
  }

  const written = await db
    .insert(jobPostings)
    .values(rows)
    .onConflictDoUpdate({
      target: jobPostings.uniqueLink,
      set: {
        sourceId: sql.raw(`excluded.source_id`),
        employer: sql.raw(`excluded.employer`),
        role: sql.raw(`excluded.role`),
        location: sql.raw(`excluded.location`),
        country: sql.raw(`excluded.country`),
        category: sql.raw(`excluded.category`),
        companyLink: sql.raw(`excluded.company_link`),
        aggregatorLink: sql`coalesce(excluded.aggregator_link, ${jobPostings.aggregatorLink})`,
        aggregatorName: sql`coalesce(excluded.aggregator_name, ${jobPostings.aggregatorName})`,
        datePosted: sql`coalesce(excluded.date_posted, ${jobPostings.datePosted})`,
        notes: sql`coalesce(excluded.notes, ${jobPostings.notes})`,
        isFlaggedEmployer: sql.raw(`excluded.is_flagged_employer`),
        isInternship: sql.raw(`excluded.is_internship`),
        updatedAt: sql`now()`,
      },
    })
    // xmax is 0 only on rows this statement inserted
    .returning({ id: jobPostings.id, inserted: sql<boolean>`(xmax = 0)` });

  const savedCount = written.filter((row) => row.inserted).length;
  return {
    savedCount,
    updatedCount: written.length - savedCount,
    skippedCount,
  };
}

/**
 * Id of the source registered for `url`, registering it first when new.
 */
export async function getOrCreateSource(url: string, name: string, db: Database): Promise<number> {
  const [row] = await db
    .insert(jobSources)
    .values({ url, name })
    .onConflictDoUpdate({
      target: jobSources.url,
      set: { name: sql.raw(`excluded.name`) },
    })
    .returning({ id: jobSources.id });

  if (!row) {
    throw new Error(`Failed to register job source ${url}`);
  }
  return row.id;
}

export async function markSourceFetched(sourceId: number, db: Database, fetchedAt: Date = new Date()): Promise<void> {
  await db.update(jobSources).set({ lastFetchedAt: fetchedAt }).where(eq(jobSources.id, sourceId));
}
