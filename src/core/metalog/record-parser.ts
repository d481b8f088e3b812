import type { MetalogRecord } from '../../types/index.js';
import { MalformedLineError } from '../../utils/errors.js';

const COMMENT_OR_BLANK = /^\s*(#|$)/;
const FILENAME_AND_REST = /^(\S+)\s+(.+)$/;

/**
 * Blank lines and lines whose first non-whitespace character is `#`
 * carry no record.
 */
export function isSkippableLine(line: string): boolean {
  return COMMENT_OR_BLANK.test(line);
}

/**
 * Split a `key=value` token at its first `=`.
 * Returns null for tokens with an empty key or value.
 */
export function parseAttributeToken(token: string): [string, string] | null {
  const eq = token.indexOf('=');
  if (eq <= 0 || eq === token.length - 1) {
    return null;
  }
  return [token.slice(0, eq), token.slice(eq + 1)];
}

/**
 * Parse one non-skippable manifest line.
 *
 * Escapes such as `\040` inside the filename are kept verbatim. Tokens that are
 * not `key=value` are dropped; a line without any attribute text is malformed.
 *
 * @throws MalformedLineError when the line has no filename/attributes split
 */
export function parseRecordLine(line: string, lineNumber: number): MetalogRecord {
  const match = FILENAME_AND_REST.exec(line.trim());
  if (!match) {
    throw new MalformedLineError(lineNumber, line);
  }

  const [, filename, rest] = match;
  const attributes = new Map<string, string>();
  for (const token of rest.split(/\s+/)) {
    const pair = parseAttributeToken(token);
    if (pair) {
      attributes.set(pair[0], pair[1]);
    }
  }

  return { filename, lineNumber, attributes };
}
