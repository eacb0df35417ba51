import pino, { type Logger } from 'pino';
import type { LogLevel } from './config.js';

/**
 * Diagnostics logger. Writes JSON lines to stderr so stdout stays free for
 * the progress report.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  return pino(
    {
      name: 'studio-import',
      level,
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: {
        paths: ['password', '*.password'],
        censor: '[REDACTED]',
      },
    },
    pino.destination(2)
  );
}
