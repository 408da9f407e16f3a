/**
 * Embedding Provider Factory
 *
 * Creates the embedding provider named in the [embedding] section of
 * config.toml. All three providers speak the OpenAI embeddings API, so one
 * SDK client class covers them; only baseURL and credentials differ.
 */

import OpenAI from 'openai';

import type { Config } from '../../config/index.js';
import { getOllamaHost, getOpenAICompatibleConfig, getEnv } from '../../config/index.js';
import { assertProviderReady } from '../../providers/validation.js';
import { OpenAIEmbeddingProvider } from './openai.js';
import type { EmbeddingProvider } from './types.js';

/**
 * Create an embedding provider from configuration.
 *
 * @throws APIKeyError when the provider's credentials are missing
 */
export function createEmbeddingProvider(config: Config): EmbeddingProvider {
  const { provider, model, batch_size } = config.embedding;
  assertProviderReady(provider);

  const clientOptions = { timeout: config.llm.timeout_ms, maxRetries: config.llm.max_retries };
  let client: OpenAI;

  switch (provider) {
    case 'openai':
      client = new OpenAI({ ...clientOptions, apiKey: getEnv('OPENAI_API_KEY') });
      break;
    case 'ollama':
      // Ollama ignores the key but the SDK requires one
      client = new OpenAI({
        ...clientOptions,
        apiKey: 'ollama',
        baseURL: `${getOllamaHost().replace(/\/+$/, '')}/v1`,
      });
      break;
    case 'openai-compatible': {
      const compatible = getOpenAICompatibleConfig();
      client = new OpenAI({
        ...clientOptions,
        apiKey: compatible.apiKey ?? 'none',
        baseURL: compatible.baseUrl,
      });
      break;
    }
  }

  return new OpenAIEmbeddingProvider({ client, model, batchSize: batch_size, name: provider });
}
