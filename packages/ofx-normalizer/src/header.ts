/**
 * OFX header (preamble) normalization.
 *
 * OFX 1.x files open with `KEY:VALUE` lines before the first tag. Bank exports
 * often pad them with spaces ("ENCODING: UTF - 8"), precede them with blank lines, or
 * leave them out entirely; strict parsers reject all three.
 */

export const CANONICAL_OFX_HEADER_FIELDS = [
  ['OFXHEADER', '100'],
  ['DATA', 'OFXSGML'],
  ['VERSION', '102'],
  ['SECURITY', 'NONE'],
  ['ENCODING', 'UTF-8'],
  ['CHARSET', 'NONE'],
  ['COMPRESSION', 'NONE'],
  ['OLDFILEUID', 'NONE'],
  ['NEWFILEUID', 'NONE'],
] as const;

/** Nine-line OFX 1.02 SGML header followed by the blank separator line */
export const CANONICAL_OFX_HEADER =
  CANONICAL_OFX_HEADER_FIELDS.map(([key, value]) => `${key}:${value}`).join('\n') + '\n\n';

const FORCED_HEADER_VALUES: Record<string, string> = {
  ENCODING: 'UTF-8',
  CHARSET: 'NONE',
};

export interface HeaderField {
  key: string;
  value: string;
}

export interface HeaderNormalization {
  text: string;
  /** True when the document had no preamble and the canonical one was prepended */
  headerInserted: boolean;
}

export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

/**
 * Split a `KEY:VALUE` line. The key is trimmed and the value loses every whitespace
 * character. Returns null for lines without a colon.
 */
export function parseHeaderLine(line: string): HeaderField | null {
  const colon = line.indexOf(':');
  if (colon === -1) {
    return null;
  }
  return {
    key: line.slice(0, colon).trim(),
    value: line.slice(colon + 1).replace(/\s+/g, ''),
  };
}

function rewriteHeaderLine(line: string): string {
  const field = parseHeaderLine(line);
  if (field === null) {
    return line;
  }
  const key = field.key.toUpperCase();
  const forced = FORCED_HEADER_VALUES[key];
  // forced fields are written under their upper-case key
  return forced !== undefined ? `${key}:${forced}` : `${field.key}:${field.value}`;
}

export function normalizeHeader(input: string): HeaderNormalization {
  const text = normalizeLineEndings(input).replace(/^\s+/, '');

  if (text.startsWith('<')) {
    return { text: CANONICAL_OFX_HEADER + text, headerInserted: true };
  }

  const headerEnd = text.indexOf('<');
  if (headerEnd === -1) {
    return { text, headerInserted: false };
  }

  const headerPart = text.slice(0, headerEnd);
  const body = text.slice(headerEnd);
  const header = headerPart.split('\n').map(rewriteHeaderLine).join('\n');

  return { text: header + body, headerInserted: false };
}
