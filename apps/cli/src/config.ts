import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import { config as loadDotenv } from 'dotenv';
import { DateNormalizer } from '@boardsift/ingestion';
import { z } from 'zod';

const currentDir = dirname(fileURLToPath(import.meta.url));
const repoRoot = resolve(currentDir, '../../../');

export const USAGE =
  'Usage: boardsift-harmonize [file|-] [--title T] [--url U] [--reference-date yyyy-MM-dd] ' +
  '[--include-linkless] [--store] [--source-name N]';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface StoreConfig {
  databaseUrl: string;
  sourceUrl: string;
  sourceName: string;
}

export interface CliConfig {
  /** Path of the document; `undefined` reads stdin. */
  input?: string;
  title?: string;
  url?: string;
  referenceDate?: string;
  includeLinkless: boolean;
  /** Present only when `--store` was given. */
  store?: StoreConfig;
}

const urlSchema = z.string().trim().url();
const REFERENCE_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Load `.env` then `.env.local` from the repository root; later files win.
 */
export function loadEnvFiles(root: string = repoRoot): void {
  const envPath = resolve(root, '.env');
  const envLocalPath = resolve(root, '.env.local');

  if (existsSync(envPath)) {
    loadDotenv({ path: envPath });
  }

  if (existsSync(envLocalPath)) {
    loadDotenv({ path: envLocalPath, override: true });
  }
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        title: { type: 'string' },
        url: { type: 'string' },
        'reference-date': { type: 'string' },
        'include-linkless': { type: 'boolean', default: false },
        store: { type: 'boolean', default: false },
        'source-name': { type: 'string' },
      },
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`${reason}\n${USAGE}`);
  }
}

function readReferenceDate(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  if (!REFERENCE_DATE_PATTERN.test(trimmed)) {
    throw new ConfigError(`--reference-date must be yyyy-MM-dd, got "${value}"`);
  }

  try {
    return new DateNormalizer(trimmed).referenceDay;
  } catch (error) {
    if (error instanceof RangeError) {
      throw new ConfigError(`--reference-date is not a calendar date: "${value}"`);
    }
    throw error;
  }
}

function readUrl(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = urlSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`--url must be an absolute URL, got "${value}"`);
  }
  return parsed.data;
}

function readStoreConfig(
  url: string | undefined,
  sourceName: string | undefined,
  env: NodeJS.ProcessEnv,
): StoreConfig {
  if (url === undefined) {
    throw new ConfigError('--store requires --url to identify the job source');
  }

  const databaseUrl = env.DATABASE_URL?.trim();
  if (!databaseUrl) {
    throw new ConfigError('DATABASE_URL environment variable is required with --store');
  }

  return {
    databaseUrl,
    sourceUrl: url,
    sourceName: sourceName?.trim() || new URL(url).hostname,
  };
}

/**
 * Build the run configuration from command-line arguments (without the
 * node and script entries) and the environment.
 */
export function parseCliConfig(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): CliConfig {
  const { values, positionals } = readArgs(argv);

  if (positionals.length > 1) {
    throw new ConfigError(`Expected at most one input file, got ${positionals.length}\n${USAGE}`);
  }

  const [file] = positionals;
  const title = values.title?.trim();
  const url = readUrl(values.url);
  const referenceDate = readReferenceDate(values['reference-date']);

  return {
    ...(file !== undefined && file !== '-' ? { input: file } : {}),
    ...(title ? { title } : {}),
    ...(url !== undefined ? { url } : {}),
    ...(referenceDate !== undefined ? { referenceDate } : {}),
    includeLinkless: values['include-linkless'] ?? false,
    ...(values.store ? { store: readStoreConfig(url, values['source-name'], env) } : {}),
  };
}
