/**
 * LLM Adapter Factory.
 *
 * Creates LLM adapters based on provider configuration.
 */

import type { LLMAdapter, LLMAdapterConfig, LLMProvider } from '@/types/llm';
import { ConfigError } from '@/lib/errors';
import type { Settings } from '@/lib/settings';
import { OpenAIAdapter } from './openai-adapter';

// =============================================================================
// Adapter Registry
// =============================================================================

type AdapterConstructor = new (config: LLMAdapterConfig) => LLMAdapter;

const adapterRegistry = new Map<LLMProvider, AdapterConstructor>([
  ['openai', OpenAIAdapter],
]);

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create an LLM adapter for a specific provider.
 *
 * @throws Error if provider is not supported
 *
 * @example
 * const adapter = createLLMAdapter('openai', {
 *   apiKey: 'test-key',
 *   baseUrl: 'https://api.deepseek.com/v1',
 *   defaultModel: 'deepseek-chat',
 * });
 */
export function createLLMAdapter(
  provider: LLMProvider,
  config: LLMAdapterConfig
): LLMAdapter {
  const AdapterClass = adapterRegistry.get(provider);

  if (!AdapterClass) {
    throw new Error(
      `Unsupported LLM provider: ${provider}. ` +
      `Supported providers: ${getSupportedProviders().join(', ')}`
    );
  }

  return new AdapterClass(config);
}

/**
 * Create the generation adapter from runtime settings.
 *
 * @throws ConfigError if no API key is configured
 */
export function createLLMAdapterFromSettings(
  llmSettings: Settings['llm'],
  provider: LLMProvider = 'openai'
): LLMAdapter {
  if (!llmSettings.apiKey) {
    throw new ConfigError(['OPENAI_API_KEY: required for answer generation']);
  }

  return createLLMAdapter(provider, {
    apiKey: llmSettings.apiKey,
    baseUrl: llmSettings.baseUrl,
    defaultModel: llmSettings.model,
    defaultTemperature: llmSettings.temperature,
    defaultMaxTokens: llmSettings.maxTokens,
    timeoutMs: llmSettings.timeoutMs,
  });
}

// =============================================================================
// Registry Management
// =============================================================================

/**
 * Get list of supported LLM providers.
 */
export function getSupportedProviders(): LLMProvider[] {
  return Array.from(adapterRegistry.keys());
}
