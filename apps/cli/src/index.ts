#!/usr/bin/env tsx
import { ConfigError, loadEnvFiles, parseCliConfig, USAGE } from './config.js';
import { serializeError } from './observability/errors.js';
import { createCliLogger } from './observability/logger.js';
import { run } from './run.js';

async function main(): Promise<void> {
  loadEnvFiles();
  const logger = createCliLogger();

  try {
    const config = parseCliConfig(process.argv.slice(2));
    await run(config, { logger });
  } catch (error) {
    logger.error(
      {
        event: error instanceof ConfigError ? 'cli_config_error' : 'cli_failed',
        error: serializeError(error),
      },
      error instanceof ConfigError ? 'Invalid configuration' : 'Harmonize failed',
    );
    if (error instanceof ConfigError) {
      process.stderr.write(`${error.message}\n`);
    }
    process.exitCode = 1;
  }
}

if (process.argv.includes('--help') || process.argv.includes('-h')) {
  process.stdout.write(`${USAGE}\n`);
} else {
  main().catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
}
