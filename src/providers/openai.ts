/**
 * OpenAI-wire LLM Provider
 *
 * Chat Completions client used for OpenAI, Ollama (via its /v1 endpoint)
 * and OpenAI-compatible servers.
 */

import OpenAI from 'openai';

import { DEFAULT_MAX_TOKENS, type ChatMessage, type ChatOptions, type ChatResponse, type LLMProvider } from './types.js';

export interface OpenAIProviderOptions {
  /** openai | ollama | openai-compatible, for logs */
  name: string;
  apiKey: string;
  /** Omit for api.openai.com */
  baseURL?: string;
  model: string;
  temperature: number;
  timeout: number;
  maxRetries: number;
}

export class OpenAILLMProvider implements LLMProvider {
  readonly name: string;
  readonly model: string;
  private readonly client: OpenAI;
  private readonly temperature: number;

  constructor(options: OpenAIProviderOptions) {
    this.name = options.name;
    this.model = options.model;
    this.temperature = options.temperature;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeout,
      maxRetries: options.maxRetries,
    });
  }

  async chat(messages: readonly ChatMessage[], options: ChatOptions = {}): Promise<ChatResponse> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: options.temperature ?? this.temperature,
        messages: messages.map((m) => ({ role: m.role, content: m.content })),
      },
      { signal: options.signal }
    );

    return { content: completion.choices[0]?.message.content ?? '' };
  }
}
