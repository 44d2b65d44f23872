/**
 * Express adapter tests
 *
 * The middleware is driven directly with MemoryResponse; no server is started.
 */

import { describe, it, expect, vi } from 'vitest';

vi.mock('@napi-rs/canvas', () => ({
  createCanvas: vi.fn(() => {
    throw new Error('canvas unavailable in tests');
  }),
}));

import { ambientStatus, errorMiddleware, notFoundMiddleware } from './middleware.js';
import { createDemoApp, DEMO_ROUTES } from './app.js';
import { ErrorHandler } from '../handler/error-handler.js';
import { MemoryResponse } from '../handler/memory-response.js';
import { ErrorTemplate } from '../render/error-template.js';
import {
  BadRequestError,
  IllegalStateError,
  ServiceUnavailableError,
} from '../errors/faultpage-error.js';

function makeHandler() {
  const logger = { warn: vi.fn(), error: vi.fn() };
  const handler = new ErrorHandler({
    displayExceptionDetails: false,
    template: ErrorTemplate.fromSource('<p>{errorCode} {errorMessage}</p>'),
    logger,
  });
  return { handler, logger };
}

const req = { method: 'GET', url: '/missing', headers: { accept: 'text/plain' } };

// ─── ambientStatus ────────────────────────────────────────────────────────────

describe('ambientStatus', () => {
  it('prefers the numeric status carried by the error', () => {
    const res = new MemoryResponse();
    expect(ambientStatus(Object.assign(new Error('x'), { status: 422 }), res)).toBe(422);
    expect(ambientStatus(Object.assign(new Error('x'), { statusCode: 409 }), res)).toBe(409);
  });

  it('ignores non-numeric status fields', () => {
    expect(ambientStatus({ status: '418' }, new MemoryResponse())).toBe(500);
  });

  it('falls back to an error status already on the response, then 500', () => {
    const res = new MemoryResponse();
    expect(ambientStatus(new Error('x'), res)).toBe(500);
    res.statusCode = 502;
    expect(ambientStatus(new Error('x'), res)).toBe(502);
  });
});

// ─── errorMiddleware ──────────────────────────────────────────────────────────

describe('errorMiddleware', () => {
  it('renders the failure with the status carried by the error', () => {
    const { handler } = makeHandler();
    const res = new MemoryResponse();
    const next = vi.fn();

    errorMiddleware(handler)(Object.assign(new Error('x'), { status: 422 }), req, res, next);

    expect(res.statusCode).toBe(422);
    expect(res.body).toBe('Error 422: Internal Server Error');
    expect(next).not.toHaveBeenCalled();
  });

  it('uses 500 for plain errors without logging a status warning', () => {
    const { handler, logger } = makeHandler();
    const res = new MemoryResponse();

    errorMiddleware(handler)(new Error('x'), req, res, vi.fn());

    expect(res.statusCode).toBe(500);
    expect(logger.warn).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('defers to next when the response is already on its way', () => {
    const { handler } = makeHandler();
    const res = new MemoryResponse();
    res.end('partial');
    const next = vi.fn();
    const err = new Error('late');

    errorMiddleware(handler)(err, req, res, next);

    expect(next).toHaveBeenCalledWith(err);
    expect(res.body).toBe('partial');
  });
});

// ─── notFoundMiddleware ──────────────────────────────────────────────────────

describe('notFoundMiddleware', () => {
  it('answers unmatched routes with 404', () => {
    const { handler } = makeHandler();
    const res = new MemoryResponse();

    notFoundMiddleware(handler)(req, res);

    expect(res.statusCode).toBe(404);
    expect(res.statusMessage).toBe('Not Found');
    expect(res.body).toBe('Error 404: Not Found');
  });
});

// ─── demo app ─────────────────────────────────────────────────────────────────

describe('createDemoApp', () => {
  it('builds an express app without listening', () => {
    const app = createDemoApp(makeHandler().handler);
    expect(typeof app.listen).toBe('function');
  });

  it('raises one failure of each kind', () => {
    expect(DEMO_ROUTES['/errors/bad-request']()).toBeInstanceOf(BadRequestError);
    expect(DEMO_ROUTES['/errors/unavailable']()).toBeInstanceOf(ServiceUnavailableError);
    expect(DEMO_ROUTES['/errors/illegal-state']()).toBeInstanceOf(IllegalStateError);
    expect(DEMO_ROUTES['/errors/crash']()).toBeInstanceOf(Error);
  });
});
