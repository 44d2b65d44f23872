/**
 * Shared handler types
 *
 * The request and response shapes are structural so that node's
 * IncomingMessage/ServerResponse and express Request/Response fit
 * without adapters.
 */

import type { AcceptedMime } from '../negotiation/accept.js';

/** Normalized description of a failure, ready to render. */
export interface ErrorInfo {
  /** Original failure, when there was one. */
  cause?: unknown;
  /** Always within [400, 599] once classified. */
  code: number;
  message: string;
  /** Dedicated HTML-safe message supplied by the failure type. */
  htmlMessage?: string;
}

export interface ErrorRequest {
  method?: string;
  url?: string;
  headers: Record<string, string | string[] | undefined>;
}

export interface ErrorResponse {
  statusCode: number;
  statusMessage: string;
  getHeader(name: string): number | string | string[] | undefined;
  setHeader(name: string, value: string): unknown;
  end(body: string | Buffer): unknown;
}

/** Per-request bundle, built once and discarded after the response is sent. */
export interface ErrorContext {
  request: ErrorRequest;
  response: ErrorResponse;
  statusPhrase: string;
  info: ErrorInfo;
  acceptableMimes: readonly AcceptedMime[];
}

export interface RenderOutcome {
  rendered: boolean;
}

export type Severity = 'warn' | 'error';
