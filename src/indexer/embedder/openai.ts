/**
 * OpenAI-wire embedding provider.
 *
 * Serves OpenAI itself, Ollama (through its /v1 endpoint) and any
 * OpenAI-compatible server: they differ only in baseURL and key.
 */

import type { EmbeddingProvider, EmbeddingsClient } from './types.js';

export interface OpenAIEmbeddingOptions {
  client: EmbeddingsClient;
  model: string;
  /** Texts per request (embedding.batch_size) */
  batchSize: number;
  /** Label for logs: openai, ollama, openai-compatible */
  name?: string;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  private readonly client: EmbeddingsClient;
  private readonly batchSize: number;

  constructor(options: OpenAIEmbeddingOptions) {
    this.client = options.client;
    this.model = options.model;
    this.batchSize = Math.max(1, options.batchSize);
    this.name = options.name ?? 'openai';
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    const results: number[][] = [];

    // Sequential batches keep request order and stay under rate limits
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const response = await this.client.embeddings.create({ model: this.model, input: batch });

      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      if (ordered.length !== batch.length) {
        throw new Error(
          `${this.name} returned ${ordered.length} embeddings for ${batch.length} inputs`
        );
      }
      results.push(...ordered.map((item) => item.embedding));
    }

    return results;
  }

  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.embed([text]);
    if (!vector) {
      throw new Error(`${this.name} returned no embedding for the query`);
    }
    return vector;
  }
}
