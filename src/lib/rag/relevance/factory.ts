/**
 * Relevance Model Factory
 *
 * Creates cross-encoder clients by provider name.
 */

import type { RerankProviderName, Settings } from '@/lib/settings';
import { ModelCache } from '../model-cache';
import { TeiRelevanceModel, CohereRelevanceModel, JinaRelevanceModel } from './http-rerank';
import type { RelevanceModel, RelevanceModelConfig } from './types';

// =============================================================================
// Provider Registry
// =============================================================================

type RelevanceModelConstructor = new (config: RelevanceModelConfig) => RelevanceModel;

const providers = new Map<RerankProviderName, RelevanceModelConstructor>([
  ['tei', TeiRelevanceModel],
  ['cohere', CohereRelevanceModel],
  ['jina', JinaRelevanceModel],
]);

const HOSTED_PROVIDERS: ReadonlySet<RerankProviderName> = new Set(['cohere', 'jina']);

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a relevance model client.
 *
 * @throws Error for an unknown provider or a hosted provider without an API key
 */
export function createRelevanceModel(
  provider: RerankProviderName,
  config: RelevanceModelConfig
): RelevanceModel {
  const Constructor = providers.get(provider);

  if (!Constructor) {
    throw new Error(
      `Unsupported rerank provider: ${provider}. Supported: ${getSupportedRerankProviders().join(', ')}`
    );
  }

  if (HOSTED_PROVIDERS.has(provider) && !config.apiKey) {
    throw new Error(`RERANK_API_KEY is required for the ${provider} provider`);
  }

  return new Constructor(config);
}

/**
 * Cache holding one relevance model client per model id.
 * Load failures surface as ModelUnavailableError.
 */
export function createRelevanceCache(rerankSettings: Settings['rerank']): ModelCache<RelevanceModel> {
  return new ModelCache('relevance', (modelId) =>
    createRelevanceModel(rerankSettings.provider, {
      modelId,
      baseUrl: rerankSettings.baseUrl,
      apiKey: rerankSettings.apiKey,
      timeoutMs: rerankSettings.timeoutMs,
    })
  );
}

export function getSupportedRerankProviders(): RerankProviderName[] {
  return Array.from(providers.keys());
}
