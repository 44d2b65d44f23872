/**
 * Accept header parsing
 *
 * Entries keep the order the client wrote them in. Quality values are parsed
 * and kept for inspection but never used to re-sort: negotiation walks the
 * list front to back.
 */

export interface AcceptedMime {
  /** The raw entry, parameters included, e.g. `text/html;level=1`. */
  value: string;
  /** Lower-cased `type/subtype` without parameters. */
  type: string;
  quality: number;
}

export function parseAccept(header: string | string[] | undefined): AcceptedMime[] {
  if (header === undefined) return [];
  const raw = Array.isArray(header) ? header.join(',') : header;

  const accepted: AcceptedMime[] = [];
  for (const part of splitUnquoted(raw, ',')) {
    const value = part.trim();
    if (!value) continue;

    const [type, ...params] = splitUnquoted(value, ';').map((p) => p.trim());
    if (!type) continue;

    const quality = parseQuality(params);
    // q=0 means "not acceptable"
    if (quality === 0) continue;

    accepted.push({ value, type: type.toLowerCase(), quality });
  }
  return accepted;
}

/** Splits on `separator` except inside double-quoted parameter values. */
function splitUnquoted(raw: string, separator: string): string[] {
  const parts: string[] = [];
  let current = '';
  let quoted = false;
  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    if (quoted && ch === '\\' && i + 1 < raw.length) {
      current += ch + raw[++i];
      continue;
    }
    if (ch === '"') quoted = !quoted;
    if (ch === separator && !quoted) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}

function parseQuality(params: string[]): number {
  for (const param of params) {
    const [name, value] = param.split('=').map((p) => p.trim());
    if (name.toLowerCase() !== 'q' || value === undefined) continue;
    const q = Number(value);
    return Number.isFinite(q) && q >= 0 && q <= 1 ? q : 1;
  }
  return 1;
}
