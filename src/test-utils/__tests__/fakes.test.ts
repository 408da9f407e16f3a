/**
 * Test fake sanity checks
 */

import { describe, it, expect } from 'vitest';
import { HashEmbeddingProvider, ScriptedLLMProvider } from '../index.js';

describe('HashEmbeddingProvider', () => {
  it('returns unit vectors of the requested width', async () => {
    const embedder = new HashEmbeddingProvider(16);
    const [vector] = await embedder.embed(['alpha beta']);

    expect(vector).toHaveLength(16);
    const norm = Math.sqrt((vector ?? []).reduce((s, v) => s + v * v, 0));
    expect(norm).toBeCloseTo(1, 10);
  });

  it('is deterministic', async () => {
    const embedder = new HashEmbeddingProvider();

    expect(await embedder.embedQuery('same text')).toEqual(await embedder.embedQuery('same text'));
  });

  it('records embed batches', async () => {
    const embedder = new HashEmbeddingProvider();
    await embedder.embed(['a', 'b']);

    expect(embedder.calls).toEqual([['a', 'b']]);
  });
});

describe('ScriptedLLMProvider', () => {
  it('plays replies in order and then fails', async () => {
    const llm = new ScriptedLLMProvider(['one', () => 'two']);

    expect((await llm.chat([{ role: 'user', content: 'x' }])).content).toBe('one');
    expect((await llm.chat([{ role: 'user', content: 'y' }])).content).toBe('two');
    await expect(llm.chat([{ role: 'user', content: 'z' }])).rejects.toThrow(
      'ScriptedLLMProvider: no reply scripted for call 3'
    );
    expect(llm.callCount).toBe(3);
    expect(llm.lastPrompt()).toBe('z');
  });

  it('throws scripted errors', async () => {
    const llm = new ScriptedLLMProvider([new Error('boom')]);

    await expect(llm.chat([])).rejects.toThrow('boom');
  });
});
