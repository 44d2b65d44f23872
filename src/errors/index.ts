/**
 * faultpage errors
 *
 * Barrel export for the typed failure hierarchy and the classifier.
 */

export {
  FaultpageError,
  BadRequestError,
  ServiceUnavailableError,
  IllegalStateError,
  ImageGenerationError,
  ConfigurationError,
} from './faultpage-error.js';

export {
  classifyFailure,
  toFailure,
  stackFrames,
  INTERNAL_SERVER_ERROR,
  NOT_FOUND,
} from './error-classifier.js';
export type { Failure, Classification, ClassifyOptions } from './error-classifier.js';
