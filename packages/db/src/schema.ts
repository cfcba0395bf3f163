import { boolean, index, integer, pgTable, serial, text, timestamp, uniqueIndex, varchar } from 'drizzle-orm/pg-core';

export const jobSources = pgTable(
  'job_sources',
  {
    id: serial().primaryKey(),
    url: text().notNull(),
    name: varchar({ length: 255 }).notNull(),
    lastFetchedAt: timestamp('last_fetched_at'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (t) => [uniqueIndex('uq_job_sources_url').on(t.url)],
);

export const jobPostings = pgTable(
  'job_postings',
  {
    id: serial().primaryKey(),
    sourceId: integer('source_id')
      .notNull()
      .references(() => jobSources.id, { onDelete: 'cascade' }),
    employer: varchar({ length: 255 }).notNull(),
    role: text().notNull(),
    location: text().notNull().default(''),
    country: varchar({ length: 100 }).notNull().default('USA'),
    category: varchar({ length: 100 }).notNull(),
    companyLink: text('company_link'),
    aggregatorLink: text('aggregator_link'),
    aggregatorName: varchar('aggregator_name', { length: 100 }),
    /** `companyLink ?? aggregatorLink`: the identity postings are upserted on. */
    uniqueLink: text('unique_link').notNull(),
    datePosted: varchar('date_posted', { length: 64 }),
    notes: text(),
    isFlaggedEmployer: boolean('is_flagged_employer').default(false).notNull(),
    isInternship: boolean('is_internship').default(false).notNull(),
    analysisStatus: varchar('analysis_status', { length: 20 }).default('pending').notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (t) => [
    uniqueIndex('uq_job_postings_unique_link').on(t.uniqueLink),
    index('idx_job_postings_source').on(t.sourceId),
    index('idx_job_postings_analysis_status').on(t.analysisStatus),
    index('idx_job_postings_category').on(t.category),
  ],
);

export type JobSourceRow = typeof jobSources.$inferSelect;
export type JobPostingRow = typeof jobPostings.$inferSelect;
export type NewJobPostingRow = typeof jobPostings.$inferInsert;
