/**
 * Base LLM adapter class.
 *
 * Provides the interface that all text-generation adapters implement,
 * plus the defaults they share.
 */

import type {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  FinishReason,
} from '@/types/llm';
import {
  DEFAULT_LLM_MODEL,
  DEFAULT_RAG_TEMPERATURE,
  DEFAULT_RAG_MAX_TOKENS,
  DEFAULT_LLM_TIMEOUT_MS,
} from '@/lib/rag/config';

/**
 * Abstract base class for LLM adapters.
 *
 * Subclasses must implement complete().
 */
export abstract class BaseLLMAdapter implements LLMAdapter {
  abstract readonly provider: string;

  protected apiKey: string;
  protected defaultModel: string;
  protected defaultTemperature: number;
  protected defaultMaxTokens: number;
  protected timeoutMs: number;
  protected baseUrl?: string;

  constructor(config: LLMAdapterConfig) {
    this.apiKey = config.apiKey;
    this.defaultModel = config.defaultModel ?? DEFAULT_LLM_MODEL;
    this.defaultTemperature = config.defaultTemperature ?? DEFAULT_RAG_TEMPERATURE;
    this.defaultMaxTokens = config.defaultMaxTokens ?? DEFAULT_RAG_MAX_TOKENS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_LLM_TIMEOUT_MS;
    this.baseUrl = config.baseUrl;
  }

  /**
   * Generate a text completion.
   */
  abstract complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse>;

  getDefaultModel(): string {
    return this.defaultModel;
  }
}

// Re-export types for convenience
export type {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  FinishReason,
};
