/**
 * HTTP error handler
 *
 * Entry point for the hosting framework: classify the failure, set the
 * status line, log the event, then negotiate and render the body.
 */

import type { Logger } from 'pino';
import { classifyFailure } from '../errors/error-classifier.js';
import { defaultImageBuilder, type ErrorImageBuilder } from '../image/error-image.js';
import { ErrorEventLogger } from '../logging/error-event-logger.js';
import { createLogger, type ErrorLogger } from '../logging/logger.js';
import { parseAccept } from '../negotiation/accept.js';
import { ContentNegotiator } from '../negotiation/content-negotiator.js';
import { ErrorTemplate } from '../render/error-template.js';
import { FormatRenderer } from '../render/format-renderer.js';
import { createHtmlSanitizer, type Sanitizer } from '../sanitize/html-sanitizer.js';
import type { FaultpageConfig } from '../config/config.js';
import type { ErrorContext, ErrorRequest, ErrorResponse } from './types.js';

export interface ErrorHandlerOptions {
  displayExceptionDetails: boolean;
  template: ErrorTemplate;
  logger?: ErrorLogger;
  sanitizer?: Sanitizer;
  imageBuilder?: ErrorImageBuilder;
  negotiator?: ContentNegotiator;
}

export class ErrorHandler {
  private readonly displayExceptionDetails: boolean;
  private readonly logger: ErrorLogger;
  private readonly events: ErrorEventLogger;
  private readonly negotiator: ContentNegotiator;
  private readonly renderer: FormatRenderer;

  constructor(options: ErrorHandlerOptions) {
    this.displayExceptionDetails = options.displayExceptionDetails;
    this.logger = options.logger ?? createLogger();
    this.events = new ErrorEventLogger(this.logger);
    this.negotiator = options.negotiator ?? new ContentNegotiator();
    this.renderer = new FormatRenderer({
      displayExceptionDetails: options.displayExceptionDetails,
      template: options.template,
      sanitizer: options.sanitizer ?? createHtmlSanitizer(),
      imageBuilder: options.imageBuilder ?? defaultImageBuilder,
      logger: this.logger,
    });
  }

  /** Build a handler from loaded configuration; reads the page assets once. */
  static fromConfig(config: Readonly<FaultpageConfig>, logger?: Logger): ErrorHandler {
    return new ErrorHandler({
      displayExceptionDetails: config.displayExceptionDetails,
      template: ErrorTemplate.load(config.assetsDir),
      logger: logger ?? createLogger(config.logLevel),
    });
  }

  /**
   * Respond to a failed request.
   *
   * @param failure - the thrown value, or null/undefined when there is none
   * @param statusCode - the status the framework associated with the failure
   */
  handle(failure: unknown, statusCode: number, request: ErrorRequest, response: ErrorResponse): void {
    const { statusPhrase, info } = classifyFailure(failure, statusCode, {
      displayExceptionDetails: this.displayExceptionDetails,
      logger: this.logger,
    });

    this.handleError({
      request,
      response,
      statusPhrase,
      info,
      acceptableMimes: parseAccept(request.headers.accept),
    });
  }

  handleError(context: ErrorContext): void {
    const { request, response, info } = context;

    response.statusMessage = context.statusPhrase;
    this.events.log(ErrorEventLogger.severityFor(info.code), request, info);
    response.statusCode = info.code;

    this.negotiator.negotiate(
      presetContentType(response),
      context.acceptableMimes,
      (mime) => this.renderer.render(mime, info, response).rendered
    );
  }
}

function presetContentType(response: ErrorResponse): string | undefined {
  const value = response.getHeader('Content-Type');
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value[0] : String(value);
}
