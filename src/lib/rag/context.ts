/**
 * RAG Context
 *
 * Process-wide collaborators shared by every query: settings, the serving
 * index store, the model caches and the generation adapter. Built once at
 * startup and injected, so tests can substitute fakes.
 */

import { createLLMAdapterFromSettings } from '@/lib/llm';
import type { LLMAdapter } from '@/lib/llm';
import type { Settings } from '@/lib/settings';
import { createEmbeddingCache } from './embeddings';
import type { EmbeddingProvider } from './embeddings';
import type { ModelCache } from './model-cache';
import { createRelevanceCache } from './relevance';
import type { RelevanceModel } from './relevance';
import { VectorStore } from './vector-store';

export interface RAGContext {
  settings: Settings;
  store: VectorStore;
  embeddingModels: ModelCache<EmbeddingProvider>;
  relevanceModels: ModelCache<RelevanceModel>;
  llm: LLMAdapter;
}

/**
 * Build the shared context, loading the persisted index for the configured
 * embedding model. A missing or unusable index leaves the store empty.
 *
 * @throws ConfigError when generation is not configured and no adapter is supplied
 */
export async function createRAGContext(
  settings: Settings,
  overrides: Partial<Omit<RAGContext, 'settings'>> = {}
): Promise<RAGContext> {
  const store =
    overrides.store ??
    (await VectorStore.open(settings.index.dir, settings.index.name, {
      embeddingModel: settings.embedding.model,
      dimensions: settings.embedding.dimensions,
    }));

  return {
    settings,
    store,
    embeddingModels: overrides.embeddingModels ?? createEmbeddingCache(settings.embedding),
    relevanceModels: overrides.relevanceModels ?? createRelevanceCache(settings.rerank),
    llm: overrides.llm ?? createLLMAdapterFromSettings(settings.llm),
  };
}
