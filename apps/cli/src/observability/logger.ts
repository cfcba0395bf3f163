import pino, { type LevelWithSilent, type Logger } from 'pino';

const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';
const DEFAULT_SERVICE_NAME = 'boardsift-cli';
const VALID_LOG_LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LevelWithSilent {
  return VALID_LOG_LEVELS.some((level) => level === value);
}

export function readLogLevel(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw || !isLogLevel(raw)) {
    return DEFAULT_LOG_LEVEL;
  }

  return raw;
}

export function readServiceName(env: NodeJS.ProcessEnv = process.env): string {
  return env.LOG_SERVICE_NAME?.trim() || DEFAULT_SERVICE_NAME;
}

/**
 * JSON logger on stderr; stdout is reserved for the harmonized output.
 */
export function createCliLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  return pino(
    {
      level: readLogLevel(env),
      base: { service: readServiceName(env) },
      timestamp: () => `,"ts":"${new Date().toISOString()}"`,
      formatters: {
        level: (label) => ({ level: label }),
      },
      messageKey: 'message',
    },
    pino.destination(2),
  );
}
