/**
 * Reranker
 *
 * Second retrieval stage: scores (query, passage) pairs with a cross-encoder
 * and keeps the top K by relevance. The result is the set that feeds both the
 * generation context and the citation list.
 */

import { ModelUnavailableError } from '@/lib/errors';
import { createLayerLogger, logRagStep } from '@/lib/logger';
import type { Candidate, RankedChunk } from '@/types/rag';
import type { ModelCache } from './model-cache';
import type { RelevanceModel } from './relevance';
import { RERANK_MAX_CHARS } from './config';

const log = createLayerLogger('rag').child({ service: 'Reranker' });

export interface RerankerOptions {
  /** Characters of chunk content scored per pair */
  maxChars: number;
}

export class Reranker {
  private options: RerankerOptions;

  constructor(
    private readonly models: ModelCache<RelevanceModel>,
    private readonly modelId: string,
    options: Partial<RerankerOptions> = {}
  ) {
    this.options = { maxChars: RERANK_MAX_CHARS, ...options };
  }

  /**
   * Reorder candidates by cross-encoder relevance and keep the top K.
   * Equal scores keep candidate order.
   *
   * @throws ModelUnavailableError when the model cannot be loaded, scoring fails,
   *   or the scores are not one finite number per passage
   */
  async rerank(query: string, candidates: Candidate[], topK: number): Promise<RankedChunk[]> {
    if (candidates.length === 0 || topK <= 0) {
      return [];
    }

    const start = Date.now();
    const model = await this.models.get(this.modelId);

    // Truncation bounds model latency only; every candidate is still scored
    const passages = candidates.map((c) => c.chunk.content.slice(0, this.options.maxChars));
    const scores = await model.score(query, passages);

    if (scores.length !== passages.length) {
      throw new ModelUnavailableError(
        this.modelId,
        `expected ${passages.length} scores, received ${scores.length}`
      );
    }
    const invalid = scores.findIndex((score) => !Number.isFinite(score));
    if (invalid !== -1) {
      throw new ModelUnavailableError(this.modelId, `non-finite score for passage ${invalid}`);
    }

    const ranked = candidates
      .map((candidate, i) => ({ chunk: candidate.chunk, relevance: scores[i] }))
      .sort((a, b) => b.relevance - a.relevance)
      .slice(0, topK);

    logRagStep(log, 'reranking', {
      duration_ms: Date.now() - start,
      chunks: ranked.length,
      model: this.modelId,
    });

    return ranked;
  }
}
