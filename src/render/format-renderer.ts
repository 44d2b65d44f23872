/**
 * Per-MIME rendering strategies
 *
 * An ordered table of (predicate, render) pairs. For each negotiation
 * candidate the first strategy whose predicate matches either writes the
 * whole response and reports `rendered: true`, or declines without touching
 * the response.
 */

import { ImageGenerationError } from '../errors/faultpage-error.js';
import { stackFrames } from '../errors/error-classifier.js';
import type { ErrorImageBuilder } from '../image/error-image.js';
import type { ErrorLogger } from '../logging/logger.js';
import type { Sanitizer } from '../sanitize/html-sanitizer.js';
import type { ErrorTemplate } from './error-template.js';
import type { ErrorInfo, ErrorResponse, RenderOutcome } from '../handler/types.js';

export const PAGE_TITLE = '\uD83E\uDD16 bip... bip... something wrong happened!';

const RENDERED: RenderOutcome = { rendered: true };
const DECLINED: RenderOutcome = { rendered: false };

export interface RenderStrategy {
  readonly name: string;
  matches(mime: string): boolean;
  render(info: ErrorInfo, response: ErrorResponse): RenderOutcome;
}

export interface FormatRendererOptions {
  displayExceptionDetails: boolean;
  template: ErrorTemplate;
  sanitizer: Sanitizer;
  imageBuilder: ErrorImageBuilder;
  logger: ErrorLogger;
}

/** `Error <code>: <message>` followed directly by `\tat <frame>\n` per frame when details are shown. */
export function composeErrorMessage(info: ErrorInfo, displayExceptionDetails: boolean): string {
  let text = `Error ${info.code}: ${info.message}`;
  const frames = detailFrames(info, displayExceptionDetails);
  if (frames.length > 0) {
    text += frames.map((frame) => `\tat ${frame}\n`).join('');
  }
  return text;
}

function detailFrames(info: ErrorInfo, displayExceptionDetails: boolean): string[] {
  return displayExceptionDetails && info.cause !== undefined ? stackFrames(info.cause) : [];
}

function prefixed(...prefixes: string[]): (mime: string) => boolean {
  return (mime) => {
    const type = mime.trim().toLowerCase();
    return prefixes.some((prefix) => type.startsWith(prefix));
  };
}

function send(response: ErrorResponse, contentType: string, body: string | Buffer): RenderOutcome {
  response.setHeader('Content-Type', contentType);
  response.end(body);
  return RENDERED;
}

export class FormatRenderer {
  readonly strategies: readonly RenderStrategy[];

  constructor(private readonly options: FormatRendererOptions) {
    this.strategies = [
      { name: 'html', matches: prefixed('text/html'), render: (info, res) => this.renderHtml(info, res) },
      { name: 'json', matches: prefixed('application/json'), render: (info, res) => this.renderJson(info, res) },
      { name: 'text', matches: prefixed('text/plain'), render: (info, res) => this.renderText(info, res) },
      { name: 'svg', matches: prefixed('image/svg+xml'), render: (info, res) => this.renderSvg(info, res) },
      { name: 'png', matches: prefixed('image/png', 'image/*'), render: (info, res) => this.renderPng(info, res) },
    ];
  }

  /** Render `info` as `mime`. Unknown MIME types decline. */
  render(mime: string, info: ErrorInfo, response: ErrorResponse): RenderOutcome {
    const strategy = this.strategies.find((s) => s.matches(mime));
    return strategy ? strategy.render(info, response) : DECLINED;
  }

  // ─── Strategies ─────────────────────────────────────────────────────────────

  private renderHtml(info: ErrorInfo, response: ErrorResponse): RenderOutcome {
    const { sanitizer, template, displayExceptionDetails } = this.options;
    const stackTrace = detailFrames(info, displayExceptionDetails)
      .map((frame) => `<li>${sanitizer(frame)}</li>`)
      .join('');

    return send(
      response,
      'text/html',
      template.render({
        title: PAGE_TITLE,
        errorCode: String(info.code),
        errorMessage: sanitizer(info.htmlMessage ?? info.message),
        stackTrace,
      })
    );
  }

  private renderJson(info: ErrorInfo, response: ErrorResponse): RenderOutcome {
    const body: { error: { code: number; message: string }; stack?: string[] } = {
      error: { code: info.code, message: info.message },
    };
    if (info.cause !== undefined && this.options.displayExceptionDetails) {
      body.stack = stackFrames(info.cause);
    }
    return send(response, 'application/json', JSON.stringify(body));
  }

  private renderText(info: ErrorInfo, response: ErrorResponse): RenderOutcome {
    return send(response, 'text/plain', composeErrorMessage(info, this.options.displayExceptionDetails));
  }

  private renderSvg(info: ErrorInfo, response: ErrorResponse): RenderOutcome {
    const text = composeErrorMessage(info, this.options.displayExceptionDetails);
    const image = this.buildImage(() => this.options.imageBuilder.buildSvgImage(text));
    return image === undefined ? DECLINED : send(response, 'image/svg+xml', image.source);
  }

  private renderPng(info: ErrorInfo, response: ErrorResponse): RenderOutcome {
    const text = composeErrorMessage(info, this.options.displayExceptionDetails);
    const png = this.buildImage(() => this.options.imageBuilder.buildPngImage(text));
    return png === undefined ? DECLINED : send(response, 'image/png', png);
  }

  /** Run an image build; any failure is logged and turns into a decline. */
  private buildImage<T>(build: () => T): T | undefined {
    try {
      return build();
    } catch (err) {
      const failure = err instanceof ImageGenerationError
        ? err
        : new ImageGenerationError('Image engine failed', err);
      this.options.logger.warn({ err: failure }, 'Unable to generate error image');
      return undefined;
    }
  }
}
