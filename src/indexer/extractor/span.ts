/**
 * Source spans and content hashes.
 *
 * A symbol's hash covers exactly lines [start, end] of its file joined by
 * '\n', so whitespace or comment edits inside the span count as changes and
 * edits elsewhere in the file do not.
 */

import { createHash } from 'node:crypto';

/**
 * Split source into lines the way line numbers are counted: CRLF and LF
 * both end a line, and a trailing newline does not open an extra line.
 */
export function splitLines(source: string): string[] {
  const lines = source.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Text of the 1-based inclusive span.
 */
export function spanText(lines: readonly string[], start: number, end: number): string {
  return lines.slice(start - 1, end).join('\n');
}

export function sha256Hex(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * SHA-256 hex of the 1-based inclusive span.
 */
export function hashSpan(lines: readonly string[], start: number, end: number): string {
  return sha256Hex(spanText(lines, start, end));
}
