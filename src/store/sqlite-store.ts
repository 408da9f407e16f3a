/**
 * SQLite Vector Store
 *
 * Points live in one table keyed by (collection, id). Search is an exact
 * cosine scan over the collection, which is fine for the few thousand
 * symbols a repository has.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { VectorStoreError } from '../errors/index.js';
import { pointIdFor } from './point-id.js';
import type { PointPayload, SearchHit, StoredPoint, VectorStore } from './types.js';
import {
  CollectionRowSchema,
  PointRowSchema,
  VectorRowSchema,
  blobToEmbedding,
  embeddingToBlob,
  parsePayload,
  validateRow,
} from './validation.js';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS collections (
  name TEXT PRIMARY KEY,
  dimensions INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS points (
  collection TEXT NOT NULL,
  id TEXT NOT NULL,
  symbol_id TEXT NOT NULL,
  payload TEXT NOT NULL,
  vector BLOB NOT NULL,
  PRIMARY KEY (collection, id)
);
`;

/** Default page size for scrollAll */
export const DEFAULT_SCROLL_LIMIT = 10000;

export interface SqliteVectorStoreOptions {
  /** Database file, or ':memory:' */
  path: string;
  /** Collection name (store.collection) */
  collection: string;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function cosine(query: readonly number[], queryNorm: number, candidate: Float32Array): number {
  let dot = 0;
  let norm = 0;
  for (let i = 0; i < candidate.length; i++) {
    const value = candidate[i] ?? 0;
    dot += (query[i] ?? 0) * value;
    norm += value * value;
  }
  if (queryNorm === 0 || norm === 0) {
    return 0;
  }
  return dot / (queryNorm * Math.sqrt(norm));
}

export class SqliteVectorStore implements VectorStore {
  private readonly db: Database.Database;
  private readonly collection: string;

  constructor(options: SqliteVectorStoreOptions) {
    this.collection = options.collection;

    try {
      if (options.path !== ':memory:') {
        const dir = dirname(options.path);
        if (!existsSync(dir)) {
          mkdirSync(dir, { recursive: true });
        }
      }
      this.db = new Database(options.path);
      if (options.path !== ':memory:') {
        this.db.pragma('journal_mode = WAL');
      }
      this.db.exec(SCHEMA);
    } catch (error) {
      throw new VectorStoreError(`Cannot open vector store at ${options.path}`, toError(error));
    }
  }

  /**
   * Dimensions fixed by the first upsert into this collection, if any.
   */
  dimensions(): number | null {
    const row: unknown = this.db
      .prepare('SELECT dimensions FROM collections WHERE name = ?')
      .get(this.collection);
    return row === undefined ? null : validateRow(CollectionRowSchema, row, 'collections').dimensions;
  }

  async upsert(vectors: readonly number[][], metadata: readonly PointPayload[]): Promise<void> {
    if (vectors.length !== metadata.length) {
      throw new VectorStoreError(
        `upsert got ${vectors.length} vectors for ${metadata.length} payloads`
      );
    }
    if (vectors.length === 0) {
      return;
    }

    const width = vectors[0]?.length ?? 0;
    const expected = this.dimensions() ?? width;
    const bad = vectors.findIndex((vector) => vector.length !== expected || vector.length === 0);
    if (bad !== -1) {
      throw new VectorStoreError(
        `Vector ${bad} has ${vectors[bad]?.length ?? 0} dimensions; collection "${this.collection}" uses ${expected}`
      );
    }

    const insertCollection = this.db.prepare(
      'INSERT OR IGNORE INTO collections (name, dimensions) VALUES (?, ?)'
    );
    const upsertPoint = this.db.prepare(`
      INSERT INTO points (collection, id, symbol_id, payload, vector)
      VALUES (@collection, @id, @symbolId, @payload, @vector)
      ON CONFLICT (collection, id) DO UPDATE SET
        symbol_id = excluded.symbol_id,
        payload = excluded.payload,
        vector = excluded.vector
    `);

    const writeAll = this.db.transaction(() => {
      insertCollection.run(this.collection, expected);
      metadata.forEach((payload, i) => {
        upsertPoint.run({
          collection: this.collection,
          id: pointIdFor(payload.symbol_id),
          symbolId: payload.symbol_id,
          payload: JSON.stringify(payload),
          vector: embeddingToBlob(vectors[i] ?? []),
        });
      });
    });

    try {
      writeAll();
    } catch (error) {
      throw new VectorStoreError(`Failed to upsert ${vectors.length} points`, toError(error));
    }
  }

  async delete(pointIds: readonly string[]): Promise<void> {
    if (pointIds.length === 0) {
      return;
    }
    const remove = this.db.prepare('DELETE FROM points WHERE collection = ? AND id = ?');
    const removeAll = this.db.transaction((ids: readonly string[]) => {
      for (const id of ids) {
        remove.run(this.collection, id);
      }
    });

    try {
      removeAll(pointIds);
    } catch (error) {
      throw new VectorStoreError(`Failed to delete ${pointIds.length} points`, toError(error));
    }
  }

  async search(vector: readonly number[], k: number): Promise<SearchHit[]> {
    if (k <= 0) {
      return [];
    }

    const rows: unknown[] = this.db
      .prepare('SELECT id, payload, vector FROM points WHERE collection = ?')
      .all(this.collection);

    const queryNorm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));

    return rows
      .map((row, i) => {
        const valid = validateRow(VectorRowSchema, row, `points[${i}]`);
        return {
          id: valid.id,
          payload: parsePayload(valid.payload, `points[${valid.id}]`),
          score: cosine(vector, queryNorm, blobToEmbedding(valid.vector)),
        };
      })
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  async scrollAll(limit: number = DEFAULT_SCROLL_LIMIT): Promise<StoredPoint[]> {
    const rows: unknown[] = this.db
      .prepare('SELECT id, payload FROM points WHERE collection = ? ORDER BY rowid LIMIT ?')
      .all(this.collection, limit);

    return rows.map((row, i) => {
      const valid = validateRow(PointRowSchema, row, `points[${i}]`);
      return { id: valid.id, payload: parsePayload(valid.payload, `points[${valid.id}]`) };
    });
  }

  async count(): Promise<number> {
    const row: unknown = this.db
      .prepare('SELECT COUNT(*) AS n FROM points WHERE collection = ?')
      .get(this.collection);
    return validateRow(z.object({ n: z.number().int() }), row, 'count').n;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
