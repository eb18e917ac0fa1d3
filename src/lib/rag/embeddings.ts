/**
 * Embedding Provider
 *
 * Generates vector embeddings through an OpenAI-compatible embeddings API.
 * Documents and queries share the same preprocessing so query vectors land
 * in the same space as the indexed ones.
 */

import OpenAI from 'openai';
import { ModelUnavailableError } from '@/lib/errors';
import { createLayerLogger, logExternalCall, sanitizeString } from '@/lib/logger';
import type { Settings } from '@/lib/settings';
import {
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_EMBEDDING_DIMENSIONS,
  DEFAULT_EMBEDDING_TIMEOUT_MS,
  EMBEDDING_BATCH_SIZE,
} from './config';
import { ModelCache } from './model-cache';

const log = createLayerLogger('external').child({ service: 'Embeddings' });

// =============================================================================
// Types
// =============================================================================

export interface EmbeddingProvider {
  readonly modelId: string;
  readonly dimensions: number;
  /** One vector per text, in input order */
  embedDocuments(texts: string[]): Promise<number[][]>;
  embedQuery(text: string): Promise<number[]>;
}

export interface EmbeddingConfig {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  dimensions: number;
  batchSize: number;
  timeoutMs: number;
}

// =============================================================================
// Preprocessing
// =============================================================================

/**
 * Normalise text before embedding. Applied to documents and queries alike.
 */
export function prepareEmbeddingText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

// =============================================================================
// OpenAI Embedding Provider
// =============================================================================

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly modelId: string;
  readonly dimensions: number;
  private client: OpenAI;
  private batchSize: number;

  /**
   * @throws ModelUnavailableError when no API key is configured
   */
  constructor(config: Partial<EmbeddingConfig> = {}) {
    this.modelId = config.model ?? DEFAULT_EMBEDDING_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_EMBEDDING_DIMENSIONS;
    this.batchSize = Math.min(config.batchSize ?? EMBEDDING_BATCH_SIZE, EMBEDDING_BATCH_SIZE);

    if (!config.apiKey) {
      throw new ModelUnavailableError(this.modelId, 'no embedding API key configured');
    }

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs ?? DEFAULT_EMBEDDING_TIMEOUT_MS,
      maxRetries: 2,
    });
  }

  async embedQuery(text: string): Promise<number[]> {
    const [embedding] = await this.embedDocuments([text]);
    return embedding;
  }

  /**
   * Embed texts in batches.
   *
   * @throws ModelUnavailableError on empty input text, backend failure or
   * a vector of the wrong length
   */
  async embedDocuments(texts: string[]): Promise<number[][]> {
    const prepared = texts.map(prepareEmbeddingText);
    if (prepared.some((t) => !t)) {
      throw new ModelUnavailableError(this.modelId, 'cannot embed empty text');
    }

    const allEmbeddings: number[][] = [];

    for (let i = 0; i < prepared.length; i += this.batchSize) {
      const batch = prepared.slice(i, i + this.batchSize);
      allEmbeddings.push(...(await this.embedBatch(batch)));
    }

    return allEmbeddings;
  }

  private async embedBatch(batch: string[]): Promise<number[][]> {
    const start = Date.now();
    let response: OpenAI.CreateEmbeddingResponse;

    try {
      response = await this.client.embeddings.create({
        model: this.modelId,
        input: batch,
        // Only text-embedding-3 models accept a reduced dimension count
        ...(this.modelId.startsWith('text-embedding-3') ? { dimensions: this.dimensions } : {}),
      });
    } catch (error) {
      const message = error instanceof Error ? sanitizeString(error.message) : String(error);
      logExternalCall(log, 'openai', 'embeddings', {
        duration_ms: Date.now() - start,
        error: message,
        model: this.modelId,
      });
      throw new ModelUnavailableError(this.modelId, message, error);
    }

    logExternalCall(log, 'openai', 'embeddings', {
      duration_ms: Date.now() - start,
      tokens: response.usage?.total_tokens,
      model: this.modelId,
    });

    // Ensure embeddings are in the same order as input
    const sorted = [...response.data].sort((a, b) => a.index - b.index);
    if (sorted.length !== batch.length) {
      throw new ModelUnavailableError(
        this.modelId,
        `expected ${batch.length} embeddings, received ${sorted.length}`
      );
    }

    return sorted.map((item) => {
      if (item.embedding.length !== this.dimensions) {
        throw new ModelUnavailableError(
          this.modelId,
          `expected ${this.dimensions}-dimensional vectors, received ${item.embedding.length}`
        );
      }
      return item.embedding;
    });
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create an embedding provider from runtime settings.
 */
export function createEmbeddingProvider(
  embeddingSettings: Settings['embedding'],
  modelId: string = embeddingSettings.model
): EmbeddingProvider {
  return new OpenAIEmbeddingProvider({
    apiKey: embeddingSettings.apiKey,
    baseUrl: embeddingSettings.baseUrl,
    model: modelId,
    dimensions: embeddingSettings.dimensions,
    timeoutMs: embeddingSettings.timeoutMs,
  });
}

/**
 * Cache holding one embedding provider per model id.
 */
export function createEmbeddingCache(
  embeddingSettings: Settings['embedding']
): ModelCache<EmbeddingProvider> {
  return new ModelCache('embedding', (modelId) =>
    createEmbeddingProvider(embeddingSettings, modelId)
  );
}
