/**
 * Embedder Types
 */

/**
 * Turns text into fixed-width vectors. The same provider (and model) must
 * be used for indexing and querying, since stored vectors are compared
 * against query vectors.
 */
export interface EmbeddingProvider {
  /** Provider name for logs */
  readonly name: string;
  /** Model identifier */
  readonly model: string;
  /** One vector per text, in input order */
  embed(texts: readonly string[]): Promise<number[][]>;
  /** Vector for a single query string */
  embedQuery(text: string): Promise<number[]>;
}

/**
 * The slice of the OpenAI SDK client the embedding provider uses.
 * Any OpenAI instance satisfies it; tests pass a stub.
 */
export interface EmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string[] }): Promise<{
      data: Array<{ embedding: number[]; index: number }>;
    }>;
  };
}
