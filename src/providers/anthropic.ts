/**
 * Anthropic Claude LLM Provider
 *
 * SECURITY: API key is read only after validation passes.
 * Never logs or exposes the key in error messages.
 */

import Anthropic from '@anthropic-ai/sdk';

import { DEFAULT_MAX_TOKENS, type ChatMessage, type ChatOptions, type ChatResponse, type LLMProvider } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface AnthropicProviderOptions {
  apiKey: string;
  model: string;
  /** Default sampling temperature */
  temperature: number;
  /** Request timeout in milliseconds */
  timeout: number;
  /** Retries for failed requests */
  maxRetries: number;
}

// ============================================================================
// PROVIDER
// ============================================================================

/**
 * Messages-API provider. System messages are joined into the top-level
 * `system` field; the API takes only user and assistant turns.
 */
export class AnthropicLLMProvider implements LLMProvider {
  readonly name = 'anthropic';
  readonly model: string;
  private readonly client: Anthropic;
  private readonly temperature: number;

  constructor(options: AnthropicProviderOptions) {
    this.model = options.model;
    this.temperature = options.temperature;
    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeout,
      maxRetries: options.maxRetries,
    });
  }

  async chat(messages: readonly ChatMessage[], options: ChatOptions = {}): Promise<ChatResponse> {
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');

    const turns: Anthropic.MessageParam[] = [];
    for (const message of messages) {
      if (message.role === 'system') continue;
      const last = turns[turns.length - 1];
      // Consecutive same-role turns are merged (required by the API)
      if (last && last.role === message.role && typeof last.content === 'string') {
        last.content = `${last.content}\n\n${message.content}`;
      } else {
        turns.push({ role: message.role, content: message.content });
      }
    }

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: options.temperature ?? this.temperature,
        ...(system ? { system } : {}),
        messages: turns,
      },
      { signal: options.signal }
    );

    const content = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');

    return { content };
  }
}
