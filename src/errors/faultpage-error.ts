/**
 * Typed failure hierarchy
 *
 * Structured error classes with machine-readable codes and optional context.
 * The HTTP-facing variants carry an optional HTML-safe message that the HTML
 * renderer prefers over the plain one.
 */

export class FaultpageError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FaultpageError';
    // Maintain proper prototype chain for instanceof checks in transpiled JS
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The client sent something we cannot process. Always rendered as 400. */
export class BadRequestError extends FaultpageError {
  constructor(
    message: string,
    public readonly messageHtml?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'BAD_REQUEST', context);
    this.name = 'BadRequestError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A backing service is down or overloaded. Always rendered as 503. */
export class ServiceUnavailableError extends FaultpageError {
  constructor(
    message: string,
    public readonly messageHtml?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'SERVICE_UNAVAILABLE', context);
    this.name = 'ServiceUnavailableError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class IllegalStateError extends FaultpageError {
  constructor(message = '', context?: Record<string, unknown>) {
    super(message, 'ILLEGAL_STATE', context);
    this.name = 'IllegalStateError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The image engine could not lay out, build or encode an error image.
 * Never reaches the client: the renderer turns it into a decline.
 */
export class ImageGenerationError extends FaultpageError {
  constructor(message: string, cause?: unknown) {
    super(message, 'IMAGE_GENERATION_FAILED', undefined, { cause });
    this.name = 'ImageGenerationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends FaultpageError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
