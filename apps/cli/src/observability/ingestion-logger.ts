import type { IngestionLogger } from '@boardsift/ingestion';
import type { Logger } from 'pino';

const STAGE_PREFIX = /^\[([\w-]+)\]\s*/;

interface StageRecord {
  stage?: string;
  message: string;
}

/**
 * Split a `[stage] message` line from the pipeline into its stage and text.
 */
export function splitStage(line: string): StageRecord {
  const match = STAGE_PREFIX.exec(line);
  if (!match?.[1]) {
    return { message: line };
  }

  return { stage: match[1], message: line.slice(match[0].length) };
}

function stageFields(stage: string | undefined): Record<string, string> {
  return { event: 'ingestion_stage', ...(stage !== undefined ? { stage } : {}) };
}

export function createIngestionLogger(logger: Logger): IngestionLogger {
  return {
    info: (line) => {
      const { stage, message } = splitStage(line);
      logger.debug(stageFields(stage), message);
    },
    warn: (line) => {
      const { stage, message } = splitStage(line);
      logger.warn(stageFields(stage), message);
    },
    error: (line) => {
      const { stage, message } = splitStage(line);
      logger.error(stageFields(stage), message);
    },
  };
}
