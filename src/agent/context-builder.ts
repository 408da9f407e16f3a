/**
 * Retrieval Context Builder
 *
 * Nearest neighbours of a symbol in the vector store, rendered as a short
 * list for prompts.
 */

import type { EmbeddingProvider } from '../indexer/embedder/types.js';
import type { SearchHit, VectorStore } from '../store/index.js';

export const NO_RELATED_CONTEXT = 'No related context found.';

export interface RetrievalContextOptions {
  qualname: string;
  embedder: EmbeddingProvider;
  store: VectorStore;
  /** Neighbours to fetch (agent.context_top_k) */
  k: number;
}

/**
 * Neighbours of `qualname`, excluding the symbol itself.
 */
export async function findRelatedSymbols(options: RetrievalContextOptions): Promise<SearchHit[]> {
  const { qualname, embedder, store, k } = options;
  const vector = await embedder.embedQuery(qualname);
  const hits = await store.search(vector, k);
  return hits.filter((hit) => hit.payload.qualname !== qualname);
}

export function renderRetrievalContext(hits: readonly SearchHit[]): string {
  if (hits.length === 0) {
    return NO_RELATED_CONTEXT;
  }
  return hits.map(({ payload }) => `- ${payload.qualname} (${payload.kind}) from ${payload.file}`).join('\n');
}

/**
 * @example
 * await buildRetrievalContext({ qualname: 'pkg.Foo.bar', embedder, store, k: 5 })
 * // '- pkg.Foo (class) from src/pkg/Foo.py\n- pkg.util.helper (function) from src/pkg/util.py'
 */
export async function buildRetrievalContext(options: RetrievalContextOptions): Promise<string> {
  return renderRetrievalContext(await findRelatedSymbols(options));
}
