/**
 * LLM Provider Factory
 *
 * Central entry point for creating the completion provider named in the
 * [llm] section of config.toml.
 *
 * USAGE:
 * ```typescript
 * import { loadConfig } from '../config';
 * import { createLLMProvider } from '../providers';
 *
 * const config = loadConfig(repoRoot);
 * const llm = createLLMProvider(config);
 *
 * const response = await llm.chat([
 *   { role: 'user', content: 'Hello!' }
 * ]);
 * ```
 */

import type { Config, LLMProviderType } from '../config/schema.js';
import { getEnv, getOllamaHost, getOpenAICompatibleConfig } from '../config/env.js';

import { AnthropicLLMProvider } from './anthropic.js';
import { OpenAILLMProvider } from './openai.js';
import type { LLMProvider } from './types.js';
import { assertProviderReady } from './validation.js';

// ============================================================================
// TYPES
// ============================================================================

export type ProviderType = LLMProviderType;

export interface LLMProviderOptions {
  /**
   * Override the model from config.
   * Takes precedence over llm.model.
   */
  model?: string;
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Create an LLM provider based on configuration.
 *
 * Credentials are checked up front so a missing key fails before any
 * indexing work starts.
 *
 * @throws APIKeyError if the provider's key (or base URL) is missing
 * @throws ConfigError if an endpoint URL is malformed
 */
export function createLLMProvider(config: Config, options: LLMProviderOptions = {}): LLMProvider {
  const { provider, temperature, timeout_ms, max_retries } = config.llm;
  const model = options.model ?? config.llm.model;
  assertProviderReady(provider);

  const common = { model, temperature, timeout: timeout_ms, maxRetries: max_retries };

  switch (provider) {
    case 'anthropic':
      return new AnthropicLLMProvider({ ...common, apiKey: getEnv('ANTHROPIC_API_KEY') ?? '' });

    case 'openai':
      return new OpenAILLMProvider({ ...common, name: provider, apiKey: getEnv('OPENAI_API_KEY') ?? '' });

    case 'ollama':
      // Ollama ignores the key but the SDK requires one
      return new OpenAILLMProvider({
        ...common,
        name: provider,
        apiKey: 'ollama',
        baseURL: `${getOllamaHost().replace(/\/+$/, '')}/v1`,
      });

    case 'openai-compatible': {
      const compatible = getOpenAICompatibleConfig();
      return new OpenAILLMProvider({
        ...common,
        model: options.model ?? compatible.model ?? config.llm.model,
        name: provider,
        apiKey: compatible.apiKey ?? 'none',
        baseURL: compatible.baseUrl,
      });
    }

    default: {
      // TypeScript exhaustiveness check
      const _exhaustiveCheck: never = provider;
      throw new Error(`Unknown provider type: ${String(_exhaustiveCheck)}`);
    }
  }
}
