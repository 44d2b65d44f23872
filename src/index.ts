/**
 * faultpage - content-negotiated HTTP error responses
 *
 * Main entry point for the library.
 * Exports all public APIs and utilities.
 */

// Errors
export * from './errors/index.js';

// Handler
export { ErrorHandler } from './handler/error-handler.js';
export type { ErrorHandlerOptions } from './handler/error-handler.js';
export { MemoryResponse } from './handler/memory-response.js';
export type {
  ErrorInfo,
  ErrorRequest,
  ErrorResponse,
  ErrorContext,
  RenderOutcome,
  Severity,
} from './handler/types.js';

// Negotiation
export { parseAccept } from './negotiation/accept.js';
export type { AcceptedMime } from './negotiation/accept.js';
export { ContentNegotiator, FALLBACK_MIME } from './negotiation/content-negotiator.js';
export type { RenderAttempt } from './negotiation/content-negotiator.js';

// Rendering
export { FormatRenderer, PAGE_TITLE, composeErrorMessage } from './render/format-renderer.js';
export type { RenderStrategy, FormatRendererOptions } from './render/format-renderer.js';
export { ErrorTemplate, TEMPLATE_FILES } from './render/error-template.js';
export type { TemplateValues, TemplateAssets } from './render/error-template.js';
export { createHtmlSanitizer } from './sanitize/html-sanitizer.js';
export type { Sanitizer } from './sanitize/html-sanitizer.js';

// Images
export {
  buildSvgImage,
  buildPngImage,
  layoutText,
  defaultImageBuilder,
  MAX_LINES,
  MAX_COLUMNS,
} from './image/error-image.js';
export type { ErrorImageBuilder, SvgImage, TextLayout } from './image/error-image.js';

// Logging
export { createLogger } from './logging/logger.js';
export type { ErrorLogger } from './logging/logger.js';
export { ErrorEventLogger } from './logging/error-event-logger.js';

// Express
export { errorMiddleware, notFoundMiddleware, ambientStatus } from './server/middleware.js';
export type { AdapterResponse, Next } from './server/middleware.js';
export { createDemoApp, DEMO_ROUTES } from './server/app.js';

// Config
export * from './config/index.js';

/**
 * Library version
 */
export const VERSION = '0.1.0';
