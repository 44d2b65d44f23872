import type { AcceptedMime } from './accept.js';

export const FALLBACK_MIME = 'text/plain';

/** Render with the given MIME type; `false` means the strategy declined. */
export type RenderAttempt = (mime: string) => boolean;

/**
 * Picks the representation of an error response.
 *
 * Order of attempts: a Content-Type already set on the response, then the
 * client's Accept entries in the order the client listed them, then a forced
 * plain-text render. Stops at the first attempt that renders.
 */
export class ContentNegotiator {
  negotiate(
    presetContentType: string | undefined,
    acceptableMimes: readonly AcceptedMime[],
    attempt: RenderAttempt
  ): string {
    if (presetContentType && attempt(presetContentType)) {
      return presetContentType;
    }

    for (const accepted of acceptableMimes) {
      if (attempt(accepted.value)) {
        return accepted.value;
      }
    }

    attempt(FALLBACK_MIME);
    return FALLBACK_MIME;
  }
}
