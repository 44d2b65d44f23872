/**
 * Express adapter
 *
 * Typed against the structural request/response shapes so the same
 * functions serve express, plain node http and in-memory responses.
 */

import type { ErrorHandler } from '../handler/error-handler.js';
import type { ErrorRequest, ErrorResponse } from '../handler/types.js';

export interface AdapterResponse extends ErrorResponse {
  readonly headersSent: boolean;
}

export type Next = (err?: unknown) => void;

/**
 * Status the framework associates with a failure: the error's own numeric
 * `status`/`statusCode` when it has one, otherwise the response's status if
 * it already signals an error, otherwise 500.
 */
export function ambientStatus(err: unknown, res: AdapterResponse): number {
  if (typeof err === 'object' && err !== null) {
    const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
    if (typeof status === 'number') return status;
  }
  return res.statusCode >= 400 ? res.statusCode : 500;
}

export function errorMiddleware(handler: ErrorHandler) {
  return (err: unknown, req: ErrorRequest, res: AdapterResponse, next: Next): void => {
    // Too late to change status or body; let the framework close the socket
    if (res.headersSent) {
      next(err);
      return;
    }
    handler.handle(err, ambientStatus(err, res), req, res);
  };
}

export function notFoundMiddleware(handler: ErrorHandler) {
  return (req: ErrorRequest, res: AdapterResponse): void => {
    handler.handle(null, 404, req, res);
  };
}
