/**
 * Providers Module
 *
 * Completion providers and credential validation.
 *
 * MAIN ENTRY POINT:
 * ```typescript
 * import { createLLMProvider } from './providers';
 * const llm = createLLMProvider(config);
 * ```
 */

export {
  validateProviderCredentials,
  assertProviderReady,
  EndpointUrlSchema,
  type ValidationResult,
} from './validation.js';

export { createLLMProvider, type LLMProviderOptions, type ProviderType } from './llm.js';

export { AnthropicLLMProvider, type AnthropicProviderOptions } from './anthropic.js';
export { OpenAILLMProvider, type OpenAIProviderOptions } from './openai.js';

export {
  DEFAULT_MAX_TOKENS,
  type ChatMessage,
  type ChatOptions,
  type ChatResponse,
  type ChatRole,
  type LLMProvider,
} from './types.js';
