/**
 * Logger construction shared by the CLI and library defaults.
 */

import { type Logger, pino } from 'pino';

import type { JobIntelConfig } from '../schemas/config.js';

/** Build the process logger from the log section of the config. */
export function createLogger(log: JobIntelConfig['log']): Logger {
  return pino({
    level: log.level,
    ...(log.file
      ? {
          transport: {
            target: 'pino/file',
            options: { destination: log.file, mkdir: true },
          },
        }
      : {}),
  });
}

/** Logger that discards everything; the default when callers pass none. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
