import { describe, it, expect, vi } from 'vitest';
import { ErrorEventLogger } from './error-event-logger.js';
import { createLogger } from './logger.js';

describe('ErrorEventLogger', () => {
  it('picks WARN for client errors and ERROR for the rest', () => {
    expect(ErrorEventLogger.severityFor(400)).toBe('warn');
    expect(ErrorEventLogger.severityFor(499)).toBe('warn');
    expect(ErrorEventLogger.severityFor(500)).toBe('error');
    expect(ErrorEventLogger.severityFor(503)).toBe('error');
  });

  it('writes the request line, code and cause', () => {
    const sink = { warn: vi.fn(), error: vi.fn() };
    const err = new Error('boom');

    new ErrorEventLogger(sink).log(
      'error',
      { method: 'POST', url: '/convert', headers: { 'user-agent': 'curl/8.0' } },
      { cause: err, code: 500, message: 'Internal Server Error' }
    );

    expect(sink.error).toHaveBeenCalledWith(
      { req: { method: 'POST', url: '/convert', userAgent: 'curl/8.0' }, code: 500, err },
      'Internal Server Error'
    );
    expect(sink.warn).not.toHaveBeenCalled();
  });

  it('leaves err out when there is no cause', () => {
    const sink = { warn: vi.fn(), error: vi.fn() };

    new ErrorEventLogger(sink).log('warn', { headers: {} }, { code: 404, message: 'Not Found' });

    expect(sink.warn).toHaveBeenCalledWith(
      { req: { method: undefined, url: undefined, userAgent: undefined }, code: 404 },
      'Not Found'
    );
  });
});

describe('createLogger', () => {
  it('honours the requested level', () => {
    expect(createLogger('silent').level).toBe('silent');
    expect(createLogger('debug').level).toBe('debug');
  });

  it('builds a fresh logger per call', () => {
    const first = createLogger('silent');
    const second = createLogger('warn');
    expect(first).not.toBe(second);
    expect(first.level).toBe('silent');
  });
});
