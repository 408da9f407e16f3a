/**
 * JSON Utilities
 *
 * Model output is JSON by convention only: it may arrive wrapped in
 * Markdown fences, or not be JSON at all.
 */

export type JsonParseResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

const FENCE_OPEN = /^```[a-zA-Z0-9_-]*[ \t]*\r?\n?/;
const FENCE_CLOSE = /\r?\n?```\s*$/;

/**
 * Remove one outer ``` or ```json fence pair and surrounding whitespace.
 * Text without a leading fence is only trimmed.
 *
 * @example
 * stripCodeFences('```json\n{"a":1}\n```') // '{"a":1}'
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }
  return trimmed.replace(FENCE_OPEN, '').replace(FENCE_CLOSE, '').trim();
}

/**
 * Parse JSON without throwing.
 */
export function tryParseJson(text: string): JsonParseResult {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Parse a model reply that should be a JSON document, tolerating fences.
 */
export function parseModelJson(raw: string): JsonParseResult {
  return tryParseJson(stripCodeFences(raw));
}
