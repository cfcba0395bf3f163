export { createDatabase, closeDatabase } from './client.js';
export type { Database } from './client.js';
export { jobSources, jobPostings } from './schema.js';
export type { JobSourceRow, JobPostingRow, NewJobPostingRow } from './schema.js';
