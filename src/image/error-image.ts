/**
 * Error image synthesis
 *
 * Lays out a block of error text on a monospace grid and renders it either as
 * a self-contained SVG document or as a PNG drawn with @napi-rs/canvas. Both
 * outputs share one layout, so they show the same picture.
 */

import { createCanvas } from '@napi-rs/canvas';
import { ImageGenerationError } from '../errors/faultpage-error.js';

// ─── Constants ────────────────────────────────────────────────────────────────

const FONT_SIZE = 14;
const CHAR_WIDTH = 9;    // advance of one monospace glyph at FONT_SIZE, rounded up
const LINE_HEIGHT = 20;
const PADDING = 16;
const TAB = '    ';

export const MAX_LINES = 200;
export const MAX_COLUMNS = 400;

const BACKGROUND = '#fff5f5';
const FOREGROUND = '#9b1c1c';
const FONT_FAMILY = 'monospace';

// XML 1.0 forbids these even when escaped; under `u` the surrogate range only
// matches halves that are not part of a pair
const XML_ILLEGAL = /[\x00-\x08\x0B\x0C\x0E-\x1F\uD800-\uDFFF\uFFFE\uFFFF]/u;

// ─── Types ────────────────────────────────────────────────────────────────────

export interface TextLayout {
  lines: string[];
  width: number;
  height: number;
}

export interface SvgImage {
  source: string;
  width: number;
  height: number;
}

export interface ErrorImageBuilder {
  buildSvgImage(text: string): SvgImage;
  buildPngImage(text: string): Buffer;
}

// ─── Layout ───────────────────────────────────────────────────────────────────

export function layoutText(text: string): TextLayout {
  if (XML_ILLEGAL.test(text)) {
    throw new ImageGenerationError('Error text contains characters that cannot be drawn');
  }

  const lines = text.replace(/\r\n?/g, '\n').split('\n').map((line) => line.replace(/\t/g, TAB));
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  if (lines.length > MAX_LINES) {
    throw new ImageGenerationError(`Error text has ${lines.length} lines (max ${MAX_LINES})`);
  }
  const columns = Math.max(...lines.map((line) => line.length));
  if (columns > MAX_COLUMNS) {
    throw new ImageGenerationError(`Error text is ${columns} columns wide (max ${MAX_COLUMNS})`);
  }

  return {
    lines,
    width: columns * CHAR_WIDTH + 2 * PADDING,
    height: lines.length * LINE_HEIGHT + 2 * PADDING,
  };
}

/** Baseline of the line at `index`. */
function baseline(index: number): number {
  return PADDING + index * LINE_HEIGHT + FONT_SIZE;
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

// ─── Builders ─────────────────────────────────────────────────────────────────

export function buildSvgImage(text: string): SvgImage {
  const { lines, width, height } = layoutText(text);

  const spans = lines
    .map((line, i) => `<tspan x="${PADDING}" y="${baseline(i)}">${escapeXml(line)}</tspan>`)
    .join('');

  const source =
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">` +
    `<rect width="100%" height="100%" fill="${BACKGROUND}"/>` +
    `<text font-family="${FONT_FAMILY}" font-size="${FONT_SIZE}" fill="${FOREGROUND}" xml:space="preserve">` +
    spans +
    `</text></svg>`;

  return { source, width, height };
}

export function buildPngImage(text: string): Buffer {
  const { lines, width, height } = layoutText(text);

  try {
    const canvas = createCanvas(width, height);
    const ctx = canvas.getContext('2d');

    ctx.fillStyle = BACKGROUND;
    ctx.fillRect(0, 0, width, height);

    ctx.fillStyle = FOREGROUND;
    ctx.font = `${FONT_SIZE}px ${FONT_FAMILY}`;
    lines.forEach((line, i) => {
      ctx.fillText(line, PADDING, baseline(i));
    });

    return canvas.toBuffer('image/png');
  } catch (err) {
    throw new ImageGenerationError(
      `Unable to rasterize error image: ${err instanceof Error ? err.message : String(err)}`,
      err
    );
  }
}

export const defaultImageBuilder: ErrorImageBuilder = { buildSvgImage, buildPngImage };
