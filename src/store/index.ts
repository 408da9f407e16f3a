export { SqliteVectorStore, DEFAULT_SCROLL_LIMIT, type SqliteVectorStoreOptions } from './sqlite-store.js';
export { pointIdFor } from './point-id.js';
export { embeddingToBlob, blobToEmbedding } from './validation.js';
export {
  PointPayloadSchema,
  type PointPayload,
  type StoredPoint,
  type SearchHit,
  type VectorStore,
} from './types.js';
