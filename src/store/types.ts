/**
 * Vector Store Types
 */

import { z } from 'zod';

/**
 * Metadata stored with every point. Field names are snake_case because the
 * payload is persisted as-is and read back by other tools.
 */
export const PointPayloadSchema = z.object({
  symbol_id: z.string().min(1),
  qualname: z.string(),
  file: z.string(),
  kind: z.enum(['module', 'class', 'function', 'method']),
  hash: z.string(),
});

export type PointPayload = z.infer<typeof PointPayloadSchema>;

/**
 * A stored point without its vector (scroll results).
 */
export interface StoredPoint {
  id: string;
  payload: PointPayload;
}

/**
 * A nearest-neighbour match.
 */
export interface SearchHit extends StoredPoint {
  /** Cosine similarity, higher is closer */
  score: number;
}

/**
 * Persistence for symbol embeddings, keyed by pointIdFor(symbol_id).
 *
 * Implementations must make `upsert` overwrite an existing point with the
 * same id, and `delete` ignore ids that do not exist.
 */
export interface VectorStore {
  /** Insert or overwrite; vectors[i] belongs to metadata[i] */
  upsert(vectors: readonly number[][], metadata: readonly PointPayload[]): Promise<void>;
  /** Remove points by point id */
  delete(pointIds: readonly string[]): Promise<void>;
  /** Top-k points by similarity, best first */
  search(vector: readonly number[], k: number): Promise<SearchHit[]>;
  /** Up to `limit` stored points, without vectors */
  scrollAll(limit?: number): Promise<StoredPoint[]>;
  count(): Promise<number>;
  close(): void;
}
