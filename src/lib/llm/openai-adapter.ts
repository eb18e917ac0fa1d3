/**
 * OpenAI-compatible adapter implementation.
 *
 * Works against OpenAI itself and compatible chat APIs
 * (DeepSeek by default) through a custom base URL.
 */

import OpenAI from 'openai';
import { GenerationError } from '@/lib/errors';
import { createLayerLogger, logExternalCall, sanitizeString } from '@/lib/logger';
import {
  BaseLLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  FinishReason,
} from './adapter';

const log = createLayerLogger('external').child({ service: 'OpenAIAdapter' });

export class OpenAIAdapter extends BaseLLMAdapter {
  readonly provider = 'openai';
  private client: OpenAI;

  constructor(config: LLMAdapterConfig) {
    super(config);

    this.client = new OpenAI({
      apiKey: this.apiKey,
      baseURL: this.baseUrl,
      timeout: this.timeoutMs,
      maxRetries: 1,
    });
  }

  /**
   * Generate a text completion using the Chat Completions API.
   *
   * @throws GenerationError on any backend failure, with `timedOut` set on timeouts
   */
  async complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse> {
    const model = options?.model ?? this.defaultModel;
    const start = Date.now();

    let response: OpenAI.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model,
        messages: messages.map(m => ({
          role: m.role,
          content: m.content,
        })),
        temperature: options?.temperature ?? this.defaultTemperature,
        max_tokens: options?.maxTokens ?? this.defaultMaxTokens,
        stop: options?.stopSequences,
      });
    } catch (error) {
      const timedOut = error instanceof OpenAI.APIConnectionTimeoutError;
      const message = error instanceof Error ? sanitizeString(error.message) : String(error);
      logExternalCall(log, 'openai', 'chat.completions', {
        duration_ms: Date.now() - start,
        status: error instanceof OpenAI.APIError ? error.status : undefined,
        error: message,
        model,
      });
      throw new GenerationError(
        timedOut ? `Generation timed out after ${this.timeoutMs}ms` : `Generation failed: ${message}`,
        { cause: error, timedOut }
      );
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new GenerationError('Generation returned no choices');
    }

    logExternalCall(log, 'openai', 'chat.completions', {
      duration_ms: Date.now() - start,
      tokens: response.usage?.total_tokens,
      model,
    });

    return {
      content: choice.message.content ?? '',
      finishReason: this.mapFinishReason(choice.finish_reason),
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
    };
  }

  /**
   * Map OpenAI finish reason to our standard type.
   */
  private mapFinishReason(
    reason: string | null | undefined
  ): FinishReason {
    switch (reason) {
      case 'stop':
        return 'stop';
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return null;
    }
  }
}
