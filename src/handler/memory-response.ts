import type { ErrorResponse } from './types.js';

/**
 * In-memory response sink. Records status, headers (case-insensitive) and
 * body; used by the CLI preview and by tests.
 */
export class MemoryResponse implements ErrorResponse {
  statusCode = 200;
  statusMessage = '';
  body: string | Buffer | undefined;
  private readonly headers = new Map<string, string>();

  get headersSent(): boolean {
    return this.body !== undefined;
  }

  getHeader(name: string): string | undefined {
    return this.headers.get(name.toLowerCase());
  }

  setHeader(name: string, value: string): this {
    if (this.headersSent) {
      throw new Error(`Cannot set header ${name} after the response was sent`);
    }
    this.headers.set(name.toLowerCase(), value);
    return this;
  }

  end(body: string | Buffer): this {
    if (this.headersSent) {
      throw new Error('Response already ended');
    }
    this.body = body;
    return this;
  }

  /** Body as text; PNG bytes decode as latin1 so nothing is lost. */
  text(): string {
    if (this.body === undefined) return '';
    return typeof this.body === 'string' ? this.body : this.body.toString('latin1');
  }
}
