/**
 * Pino logger shared by the CLI, scheduler and pipeline
 */

import { existsSync, statSync, truncateSync } from 'fs';
import pino, { type Logger } from 'pino';
import { env } from '../config/env.js';

/**
 * Empty the log file once it grows past the configured size
 */
function truncateOversizedLog(file: string, maxBytes: number): void {
  if (existsSync(file) && statSync(file).size > maxBytes) {
    truncateSync(file, 0);
  }
}

function createLogger(): Logger {
  if (env.NODE_ENV === 'test') {
    return pino({ level: 'silent' });
  }

  truncateOversizedLog(env.LOG_FILE, env.LOG_MAX_BYTES);

  return pino(
    {
      level: env.LOG_LEVEL,
      base: { app: 'newswire-digest' },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream([
      { level: env.LOG_LEVEL, stream: process.stdout },
      { level: env.LOG_LEVEL, stream: pino.destination({ dest: env.LOG_FILE, mkdir: true, sync: true }) },
    ])
  );
}

export const logger = createLogger();

export type { Logger };
