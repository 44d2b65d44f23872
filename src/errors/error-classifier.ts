/**
 * Error classification
 *
 * Maps a raw failure and the ambient status code from the hosting framework
 * into a renderable ErrorInfo plus the HTTP reason phrase. Total over every
 * (failure, statusCode) pair: nothing thrown here ever escapes.
 */

import {
  BadRequestError,
  IllegalStateError,
  ServiceUnavailableError,
} from './faultpage-error.js';
import type { ErrorInfo } from '../handler/types.js';
import type { ErrorLogger } from '../logging/logger.js';

export const INTERNAL_SERVER_ERROR = 'Internal Server Error';
export const NOT_FOUND = 'Not Found';

export type Failure =
  | { kind: 'bad-request'; error: BadRequestError }
  | { kind: 'service-unavailable'; error: ServiceUnavailableError }
  | { kind: 'illegal-state'; error: IllegalStateError }
  | { kind: 'generic'; error: unknown };

export interface Classification {
  statusPhrase: string;
  info: ErrorInfo;
}

export interface ClassifyOptions {
  displayExceptionDetails: boolean;
  logger: ErrorLogger;
}

/** Tag a raw failure with the variant that decides how it renders. */
export function toFailure(failure: unknown): Failure {
  if (failure instanceof BadRequestError) return { kind: 'bad-request', error: failure };
  if (failure instanceof ServiceUnavailableError) return { kind: 'service-unavailable', error: failure };
  if (failure instanceof IllegalStateError) return { kind: 'illegal-state', error: failure };
  return { kind: 'generic', error: failure };
}

export function classifyFailure(
  failure: unknown,
  statusCode: number,
  options: ClassifyOptions
): Classification {
  const cause = failure ?? undefined;

  if (statusCode === 404 && cause === undefined) {
    return { statusPhrase: NOT_FOUND, info: { code: 404, message: NOT_FOUND } };
  }

  const tagged = toFailure(cause);
  switch (tagged.kind) {
    case 'bad-request':
      return {
        statusPhrase: 'Bad Request',
        info: withHtml({ cause, code: 400, message: tagged.error.message }, tagged.error.messageHtml),
      };

    case 'service-unavailable':
      return {
        statusPhrase: 'Service Unavailable',
        info: withHtml({ cause, code: 503, message: tagged.error.message }, tagged.error.messageHtml),
      };

    case 'illegal-state':
      return {
        statusPhrase: INTERNAL_SERVER_ERROR,
        info: { cause, code: 500, message: tagged.error.message || INTERNAL_SERVER_ERROR },
      };

    case 'generic': {
      let code = statusCode;
      if (!Number.isInteger(code) || code < 400 || code > 599) {
        options.logger.warn(
          { statusCode },
          `Unexpected error code ${statusCode}: must be within 400 and 599, falling back to 500`
        );
        code = 500;
      }
      const message = options.displayExceptionDetails
        ? messageOf(tagged.error) ?? INTERNAL_SERVER_ERROR
        : INTERNAL_SERVER_ERROR;
      return { statusPhrase: INTERNAL_SERVER_ERROR, info: { cause, code, message } };
    }

    default:
      return assertNever(tagged);
  }
}

/** Stack frame strings (the text after `at `) of an Error cause. */
export function stackFrames(cause: unknown): string[] {
  if (!(cause instanceof Error) || !cause.stack) return [];
  const frames: string[] = [];
  for (const line of cause.stack.split('\n')) {
    const match = /^\s+at (.+)$/.exec(line);
    if (match) frames.push(match[1]);
  }
  return frames;
}

function messageOf(failure: unknown): string | undefined {
  if (failure instanceof Error) return failure.message || undefined;
  if (typeof failure === 'string') return failure || undefined;
  return undefined;
}

function withHtml(info: ErrorInfo, htmlMessage: string | undefined): ErrorInfo {
  return htmlMessage === undefined ? info : { ...info, htmlMessage };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled failure variant: ${JSON.stringify(value)}`);
}
