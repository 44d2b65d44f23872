import { pino } from 'pino';
import type { Logger } from 'pino';

const LOG_LEVEL = process.env.FAULTPAGE_LOG_LEVEL ?? process.env.LOG_LEVEL ?? 'info';

/** The slice of a pino logger the error pipeline writes to. */
export type ErrorLogger = Pick<Logger, 'warn' | 'error'>;

/**
 * Structured logger using pino
 *
 * Configuration:
 * - FAULTPAGE_LOG_LEVEL (or LOG_LEVEL) controls verbosity (trace, debug, info, warn, error, fatal, silent)
 * - ISO timestamps for consistent time formatting
 * - JSON format for structured logging
 */
export function createLogger(level: string = LOG_LEVEL): Logger {
  return pino({
    name: 'faultpage',
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Redact credentials if a request header ever gets logged wholesale
    redact: {
      paths: ['*.authorization', '*.cookie', '*.password', '*.token', '*.secret'],
      censor: '[REDACTED]',
    },
  });
}
