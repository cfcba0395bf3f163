import { readFile } from 'node:fs/promises';
import { text } from 'node:stream/consumers';
import { closeDatabase, createDatabase, type Database } from '@boardsift/db';
import {
  getOrCreateSource,
  markSourceFetched,
  processDocument,
  saveJobs,
  type DocumentStats,
  type SaveJobsResult,
} from '@boardsift/ingestion';
import type { CanonicalJobPosting, TableFormat } from '@boardsift/parser-sdk';
import type { Logger } from 'pino';
import type { CliConfig, StoreConfig } from './config.js';
import { createIngestionLogger } from './observability/ingestion-logger.js';

export interface RunOutput {
  format: TableFormat;
  /** Number of tables found in the document. */
  tables: number;
  stats: DocumentStats;
  warnings: string[];
  jobs: CanonicalJobPosting[];
}

export interface RunDependencies {
  logger: Logger;
  readInput?: (path: string | undefined) => Promise<string>;
  writeOutput?: (chunk: string) => void;
  openDatabase?: (url: string) => Database;
}

export async function readInput(path: string | undefined): Promise<string> {
  if (path === undefined) {
    return text(process.stdin);
  }
  return readFile(path, 'utf-8');
}

function writeStdout(chunk: string): void {
  process.stdout.write(chunk);
}

async function storeJobs(
  jobs: readonly CanonicalJobPosting[],
  store: StoreConfig,
  db: Database,
): Promise<SaveJobsResult & { sourceId: number }> {
  const sourceId = await getOrCreateSource(store.sourceUrl, store.sourceName, db);
  const result = await saveJobs(jobs, sourceId, db);
  await markSourceFetched(sourceId, db);
  return { sourceId, ...result };
}

/**
 * Harmonize one document and print the result as JSON. With a store
 * configuration the jobs are also upserted under their source.
 */
export async function run(config: CliConfig, deps: RunDependencies): Promise<RunOutput> {
  const { logger } = deps;
  const read = deps.readInput ?? readInput;
  const write = deps.writeOutput ?? writeStdout;
  const startedAt = Date.now();

  const content = await read(config.input);
  logger.info(
    { event: 'document_read', input: config.input ?? 'stdin', bytes: Buffer.byteLength(content) },
    'Document read',
  );

  const result = processDocument(
    content,
    {
      ...(config.title !== undefined ? { title: config.title } : {}),
      ...(config.url !== undefined ? { url: config.url } : {}),
    },
    {
      logger: createIngestionLogger(logger),
      includeLinkless: config.includeLinkless,
      ...(config.referenceDate !== undefined ? { referenceDate: config.referenceDate } : {}),
    },
  );

  const output: RunOutput = {
    format: result.format,
    tables: result.tables.length,
    stats: result.stats,
    warnings: result.warnings,
    jobs: result.jobs,
  };

  logger.info(
    {
      event: 'document_harmonized',
      format: result.format,
      tables: output.tables,
      jobs: result.jobs.length,
      warnings: result.warnings.length,
      durationMs: Date.now() - startedAt,
    },
    'Document harmonized',
  );

  const { store } = config;
  if (store) {
    const db = (deps.openDatabase ?? createDatabase)(store.databaseUrl);
    try {
      const saved = await storeJobs(result.jobs, store, db);
      logger.info({ event: 'jobs_saved', sourceUrl: store.sourceUrl, ...saved }, 'Jobs saved');
    } finally {
      await closeDatabase(db);
    }
  }

  write(`${JSON.stringify(output, null, 2)}\n`);
  return output;
}
