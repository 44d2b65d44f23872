/**
 * Error image tests
 *
 * Canvas is mocked; no native rendering happens here.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';

// ─── Hoisted mock definitions ─────────────────────────────────────────────────

const { mockCtx, mockCanvas, mockPngBuffer } = vi.hoisted(() => {
  const mockPngBuffer = Buffer.from('PNG_MOCK_DATA');

  const mockCtx = {
    fillStyle: '',
    font: '',
    fillRect: vi.fn(),
    fillText: vi.fn(),
  };

  const mockCanvas = {
    getContext: vi.fn(() => mockCtx),
    toBuffer: vi.fn(() => mockPngBuffer),
  };

  return { mockCtx, mockCanvas, mockPngBuffer };
});

vi.mock('@napi-rs/canvas', () => ({
  createCanvas: vi.fn(() => mockCanvas),
}));

// ─── Imports (after mocks) ────────────────────────────────────────────────────

import { createCanvas } from '@napi-rs/canvas';
import { buildPngImage, buildSvgImage, layoutText, MAX_COLUMNS, MAX_LINES } from './error-image.js';
import { ImageGenerationError } from '../errors/faultpage-error.js';

beforeEach(() => {
  vi.clearAllMocks();
});

// ─── layoutText ───────────────────────────────────────────────────────────────

describe('layoutText', () => {
  it('sizes a single line on the monospace grid', () => {
    expect(layoutText('Error 404: Not Found')).toEqual({
      lines: ['Error 404: Not Found'],
      width: 212,
      height: 52,
    });
  });

  it('expands tabs and ignores the trailing newline', () => {
    expect(layoutText('Error 500: boom\n\tat f\n')).toEqual({
      lines: ['Error 500: boom', '    at f'],
      width: 15 * 9 + 32,
      height: 2 * 20 + 32,
    });
  });

  it('keeps an empty text as one empty line', () => {
    expect(layoutText('')).toEqual({ lines: [''], width: 32, height: 52 });
  });

  it('rejects text with more lines than an image holds', () => {
    expect(() => layoutText('x\n'.repeat(MAX_LINES + 1))).toThrow(ImageGenerationError);
    expect(() => layoutText('x\n'.repeat(MAX_LINES))).not.toThrow();
  });

  it('rejects lines wider than an image holds', () => {
    expect(() => layoutText('x'.repeat(MAX_COLUMNS + 1))).toThrow(/columns wide/);
    expect(() => layoutText('x'.repeat(MAX_COLUMNS))).not.toThrow();
  });

  it('rejects control characters that XML cannot carry', () => {
    expect(() => layoutText('bell\u0007')).toThrow(ImageGenerationError);
  });

  it('rejects unpaired surrogate halves', () => {
    expect(() => layoutText('a\uD800b')).toThrow(ImageGenerationError);
    expect(() => buildSvgImage('trailing \uDC00')).toThrow(ImageGenerationError);
  });

  it('accepts characters outside the basic plane', () => {
    expect(layoutText('\uD83E\uDD16 boom').lines).toEqual(['\uD83E\uDD16 boom']);
  });

  it('never throws anything but ImageGenerationError for ASCII input', () => {
    const samples = [
      Array.from({ length: 128 }, (_, i) => String.fromCharCode(i)).join(''),
      'Error 500: <&>"\'\n\tat x',
      'y'.repeat(5000),
    ];
    for (const text of samples) {
      try {
        buildSvgImage(text);
      } catch (err) {
        expect(err).toBeInstanceOf(ImageGenerationError);
      }
    }
  });
});

// ─── buildSvgImage ────────────────────────────────────────────────────────────

describe('buildSvgImage', () => {
  it('produces a self-contained SVG document', () => {
    expect(buildSvgImage('Error 404: Not Found')).toEqual({
      width: 212,
      height: 52,
      source:
        '<svg xmlns="http://www.w3.org/2000/svg" width="212" height="52" viewBox="0 0 212 52">' +
        '<rect width="100%" height="100%" fill="#fff5f5"/>' +
        '<text font-family="monospace" font-size="14" fill="#9b1c1c" xml:space="preserve">' +
        '<tspan x="16" y="30">Error 404: Not Found</tspan>' +
        '</text></svg>',
    });
  });

  it('puts each line on its own baseline', () => {
    const { source } = buildSvgImage('first\nsecond');
    expect(source).toContain('<tspan x="16" y="30">first</tspan><tspan x="16" y="50">second</tspan>');
  });

  it('escapes markup in the text', () => {
    const { source } = buildSvgImage(`a<b & "c" 'd'`);
    expect(source).toContain('<tspan x="16" y="30">a&lt;b &amp; &quot;c&quot; &apos;d&apos;</tspan>');
  });
});

// ─── buildPngImage ────────────────────────────────────────────────────────────

describe('buildPngImage', () => {
  it('draws the laid out text and encodes PNG', () => {
    const png = buildPngImage('Error 404: Not Found');

    expect(png).toBe(mockPngBuffer);
    expect(createCanvas).toHaveBeenCalledWith(212, 52);
    expect(mockCtx.fillRect).toHaveBeenCalledWith(0, 0, 212, 52);
    expect(mockCtx.font).toBe('14px monospace');
    expect(mockCtx.fillText).toHaveBeenCalledTimes(1);
    expect(mockCtx.fillText).toHaveBeenCalledWith('Error 404: Not Found', 16, 30);
    expect(mockCanvas.toBuffer).toHaveBeenCalledWith('image/png');
  });

  it('draws one fillText per line', () => {
    buildPngImage('Error 500: boom\n\tat f\n');
    expect(mockCtx.fillText).toHaveBeenNthCalledWith(1, 'Error 500: boom', 16, 30);
    expect(mockCtx.fillText).toHaveBeenNthCalledWith(2, '    at f', 16, 50);
  });

  it('wraps encoder failures in ImageGenerationError', () => {
    mockCanvas.toBuffer.mockImplementationOnce(() => {
      throw new Error('encoder exploded');
    });
    expect(() => buildPngImage('Error 500: boom')).toThrow(
      'Unable to rasterize error image: encoder exploded'
    );
  });

  it('rejects oversized text before touching the canvas', () => {
    expect(() => buildPngImage('x'.repeat(MAX_COLUMNS + 1))).toThrow(ImageGenerationError);
    expect(createCanvas).not.toHaveBeenCalled();
  });
});
