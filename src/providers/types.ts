/**
 * Completion service types.
 *
 * The pipeline needs exactly one operation from a model: given an ordered
 * list of messages, return the reply text.
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatOptions {
  /** Overrides llm.temperature for one call */
  temperature?: number;
  /** Reply budget (default 4096) */
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface ChatResponse {
  content: string;
}

export interface LLMProvider {
  /** Provider name for logs */
  readonly name: string;
  readonly model: string;
  /**
   * @throws whatever the underlying SDK throws (network, auth, timeout);
   *   loop callers turn these into history notes
   */
  chat(messages: readonly ChatMessage[], options?: ChatOptions): Promise<ChatResponse>;
}

/** Default reply budget */
export const DEFAULT_MAX_TOKENS = 4096;
