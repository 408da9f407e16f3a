/**
 * Tests for model-output JSON helpers
 */

import { describe, it, expect } from 'vitest';
import { stripCodeFences, tryParseJson, parseModelJson } from '../json.js';

describe('stripCodeFences', () => {
  it('removes a json fence', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('removes a bare fence', () => {
    expect(stripCodeFences('```\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('removes a markdown fence around prose', () => {
    expect(stripCodeFences('```markdown\n# Title\n\nBody\n```\n')).toBe('# Title\n\nBody');
  });

  it('trims unfenced text without touching inner fences', () => {
    expect(stripCodeFences('  Use:\n```py\nx()\n```  ')).toBe('Use:\n```py\nx()\n```');
  });
});

describe('tryParseJson', () => {
  it('returns the parsed value', () => {
    expect(tryParseJson('{"name":"test","value":42}')).toEqual({
      ok: true,
      value: { name: 'test', value: 42 },
    });
  });

  it('reports malformed input', () => {
    const result = tryParseJson('{not json');

    expect(result.ok).toBe(false);
  });

  it('reports empty input', () => {
    expect(tryParseJson('').ok).toBe(false);
  });
});

describe('parseModelJson', () => {
  it('parses fenced replies', () => {
    expect(parseModelJson('```json\n{"action": "FINISH"}\n```')).toEqual({
      ok: true,
      value: { action: 'FINISH' },
    });
  });

  it('rejects prose', () => {
    expect(parseModelJson('I think the answer is 42.').ok).toBe(false);
  });
});
