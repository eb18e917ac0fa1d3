/**
 * LLM module exports.
 */

export { BaseLLMAdapter } from './adapter';
export type {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
} from './adapter';

export { OpenAIAdapter } from './openai-adapter';

export {
  createLLMAdapter,
  createLLMAdapterFromSettings,
  getSupportedProviders,
} from './factory';

export {
  buildRAGSystemPrompt,
  buildRAGUserPrompt,
  escapeBoundaries,
} from './prompts';
