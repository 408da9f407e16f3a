/**
 * Test Utilities - In-process fakes
 *
 * Stand-ins for the two external services (embedding and completion) so
 * tests never touch the network.
 */

import { createHash } from 'node:crypto';

import type { EmbeddingProvider } from '../indexer/embedder/types.js';
import type { ChatMessage, ChatOptions, ChatResponse, LLMProvider } from '../providers/types.js';

/**
 * Deterministic bag-of-words embedder.
 *
 * Each lowercase word is hashed into one of `dimensions` buckets and the
 * counts are L2-normalised, so texts sharing words score higher under
 * cosine similarity.
 */
export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hash';
  readonly model = 'hash-bow';
  readonly calls: string[][] = [];

  constructor(private readonly dimensions: number = 64) {}

  async embed(texts: readonly string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => this.vectorFor(text));
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.vectorFor(text);
  }

  private vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const word of text.toLowerCase().split(/[^a-z0-9_]+/)) {
      if (!word) continue;
      const bucket = createHash('md5').update(word).digest().readUInt32BE(0) % this.dimensions;
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    }
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    // All-zero input still needs a usable vector
    return norm === 0 ? vector.map((_, i) => (i === 0 ? 1 : 0)) : vector.map((v) => v / norm);
  }
}

/** A scripted reply: fixed text, a function of the request, or an error */
export type ScriptedReply = string | Error | ((messages: readonly ChatMessage[]) => string);

/**
 * Completion provider that plays back replies in order and records every
 * request. Running out of replies is an error, so tests notice extra calls.
 */
export class ScriptedLLMProvider implements LLMProvider {
  readonly name = 'scripted';
  readonly model = 'scripted-model';
  readonly requests: ChatMessage[][] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: readonly ScriptedReply[] = []) {
    this.replies = [...replies];
  }

  /** Queue more replies */
  push(...replies: ScriptedReply[]): this {
    this.replies.push(...replies);
    return this;
  }

  get callCount(): number {
    return this.requests.length;
  }

  /** Concatenated content of the last request, for assertions */
  lastPrompt(): string {
    const last = this.requests[this.requests.length - 1] ?? [];
    return last.map((m) => m.content).join('\n');
  }

  async chat(messages: readonly ChatMessage[], _options?: ChatOptions): Promise<ChatResponse> {
    this.requests.push(messages.map((m) => ({ ...m })));
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error(`ScriptedLLMProvider: no reply scripted for call ${this.requests.length}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return { content: typeof reply === 'function' ? reply(messages) : reply };
  }
}
