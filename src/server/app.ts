/**
 * Demo application
 *
 * A small express app whose routes raise each kind of failure, wired to the
 * error handler. Backs `faultpage serve`.
 */

import express from 'express';
import type { ErrorRequestHandler, Express, RequestHandler } from 'express';
import {
  BadRequestError,
  IllegalStateError,
  ServiceUnavailableError,
} from '../errors/faultpage-error.js';
import type { ErrorHandler } from '../handler/error-handler.js';
import { errorMiddleware, notFoundMiddleware } from './middleware.js';

export const DEMO_ROUTES = {
  '/errors/bad-request': () =>
    new BadRequestError(
      'Missing required parameter "source"',
      'Missing required parameter <code>source</code>'
    ),
  '/errors/unavailable': () =>
    new ServiceUnavailableError('Renderer backend is not reachable, try again later'),
  '/errors/illegal-state': () => new IllegalStateError('Cache entry vanished between lookup and read'),
  '/errors/crash': () => new Error('Unexpected failure while rendering'),
} as const;

export function createDemoApp(handler: ErrorHandler): Express {
  const app = express();

  app.get('/', (_req, res) => {
    res.type('text/plain').send(
      ['faultpage demo. Try:', ...Object.keys(DEMO_ROUTES).map((route) => `  GET ${route}`)].join('\n')
    );
  });

  for (const [route, makeError] of Object.entries(DEMO_ROUTES)) {
    app.get(route, (_req, _res, next) => {
      next(makeError());
    });
  }

  const notFound = notFoundMiddleware(handler);
  const onNotFound: RequestHandler = (req, res) => {
    notFound(req, res);
  };
  const failed = errorMiddleware(handler);
  const onError: ErrorRequestHandler = (err, req, res, next) => {
    failed(err, req, res, next);
  };

  app.use(onNotFound);
  app.use(onError);
  return app;
}
