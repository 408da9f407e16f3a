export { createEmbeddingProvider } from './provider.js';
export { OpenAIEmbeddingProvider, type OpenAIEmbeddingOptions } from './openai.js';
export type { EmbeddingProvider, EmbeddingsClient } from './types.js';
