/**
 * LLM adapter interface types.
 *
 * These types define the contract for text-generation providers.
 */

/**
 * Message in a chat conversation.
 */
export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Options for text completion.
 */
export interface LLMCompletionOptions {
  model?: string;           // Override default model
  temperature?: number;     // 0.0 - 2.0 (lower = more deterministic)
  maxTokens?: number;       // Max response tokens
  stopSequences?: string[]; // Stop generation sequences
}

/**
 * Response from text completion.
 */
export interface LLMCompletionResponse {
  content: string;
  finishReason: FinishReason;
  usage: TokenUsage;
}

/**
 * Reason for completion stopping.
 */
export type FinishReason = 'stop' | 'length' | 'content_filter' | null;

/**
 * Token usage statistics.
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Core LLM adapter interface.
 */
export interface LLMAdapter {
  /** Provider name (e.g., 'openai') */
  readonly provider: string;

  /**
   * Generate a text completion.
   *
   * @throws GenerationError when the backend errors or times out
   */
  complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse>;
}

/**
 * Configuration for creating an adapter.
 */
export interface LLMAdapterConfig {
  apiKey: string;
  baseUrl?: string;
  defaultModel?: string;
  defaultTemperature?: number;
  defaultMaxTokens?: number;
  timeoutMs?: number;
}

/**
 * Supported generation providers. DeepSeek and other OpenAI-compatible
 * services use 'openai' with a custom base URL.
 */
export type LLMProvider = 'openai';
