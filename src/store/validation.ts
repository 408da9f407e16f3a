/**
 * Row validation for the SQLite vector store.
 *
 * better-sqlite3 returns `unknown` rows; every read goes through Zod so a
 * hand-edited or foreign vectors.db fails loudly instead of corrupting a run.
 */

import { z } from 'zod';

import { VectorStoreError } from '../errors/index.js';
import { tryParseJson } from '../utils/index.js';
import { PointPayloadSchema, type PointPayload } from './types.js';

export const PointRowSchema = z.object({
  id: z.string(),
  payload: z.string(),
});

export const VectorRowSchema = PointRowSchema.extend({
  vector: z.instanceof(Buffer),
});

export const CollectionRowSchema = z.object({
  dimensions: z.number().int().positive(),
});

export type VectorRow = z.infer<typeof VectorRowSchema>;

/**
 * Validate one row, naming the context in the error.
 */
export function validateRow<T extends z.ZodTypeAny>(schema: T, row: unknown, context: string): z.output<T> {
  const result = schema.safeParse(row);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new VectorStoreError(
      `Vector store row mismatch in ${context}${issue ? `: ${issue.path.join('.')} ${issue.message}` : ''}`
    );
  }
  return result.data;
}

/**
 * Parse and validate a stored payload column.
 */
export function parsePayload(json: string, context: string): PointPayload {
  const parsed = tryParseJson(json);
  if (!parsed.ok) {
    throw new VectorStoreError(`Corrupt payload in ${context}: ${parsed.error}`);
  }
  return validateRow(PointPayloadSchema, parsed.value, context);
}

/**
 * Serialize a vector to a BLOB (float32, little-endian host order).
 */
export function embeddingToBlob(vector: readonly number[]): Buffer {
  const floats = Float32Array.from(vector);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

/**
 * Convert Buffer from BLOB back to Float32Array.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  // Copy: a Buffer's byteOffset need not be 4-byte aligned
  const copy = new Uint8Array(blob);
  return new Float32Array(copy.buffer, 0, copy.byteLength / 4);
}
