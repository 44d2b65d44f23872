/**
 * Error event logging
 *
 * One structured record per rendered error: request line, status code and
 * the original failure under `err` so pino's error serializer picks it up.
 */

import type { ErrorInfo, ErrorRequest, Severity } from '../handler/types.js';
import type { ErrorLogger } from './logger.js';

export class ErrorEventLogger {
  constructor(private readonly sink: ErrorLogger) {}

  log(severity: Severity, request: ErrorRequest, info: ErrorInfo): void {
    const userAgent = request.headers['user-agent'];
    const record: Record<string, unknown> = {
      req: {
        method: request.method,
        url: request.url,
        userAgent: Array.isArray(userAgent) ? userAgent.join(', ') : userAgent,
      },
      code: info.code,
    };
    if (info.cause !== undefined) record.err = info.cause;

    if (severity === 'warn') {
      this.sink.warn(record, info.message);
    } else {
      this.sink.error(record, info.message);
    }
  }

  /** WARN for client errors, ERROR for everything else. */
  static severityFor(code: number): Severity {
    return code >= 400 && code <= 499 ? 'warn' : 'error';
  }
}
