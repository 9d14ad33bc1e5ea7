import pino from 'pino';
import type { Logger } from '../../src/logger.js';

export type LogLine = {
  level: number;
  msg: string;
  [key: string]: unknown;
};

export type CapturedLogger = {
  logger: Logger;
  lines: LogLine[];
  messages: (level?: number) => string[];
};

/** A real pino logger that keeps its output in memory. */
export function createCapturedLogger(level = 'debug'): CapturedLogger {
  const lines: LogLine[] = [];
  const logger = pino(
    { level },
    {
      write(chunk: string) {
        lines.push(JSON.parse(chunk));
      }
    }
  );
  return {
    logger,
    lines,
    messages: filterLevel => lines.filter(line => filterLevel === undefined || line.level === filterLevel).map(line => line.msg)
  };
}

export const LEVEL = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60
} as const;
