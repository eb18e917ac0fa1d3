/**
 * Retriever
 *
 * First retrieval stage: embeds the query and searches a fixed index
 * snapshot. Candidate scores are cosine similarity in [-1, 1]
 * (higher = more similar).
 */

import { createLayerLogger, logRagStep, truncateText } from '@/lib/logger';
import type { SearchType } from '@/lib/settings';
import type { Candidate } from '@/types/rag';
import type { EmbeddingProvider } from './embeddings';
import type { VectorIndex } from './vector-index';
import {
  INITIAL_RETRIEVAL_K,
  DEFAULT_SEARCH_TYPE,
  MMR_FETCH_MULTIPLIER,
  MMR_LAMBDA,
} from './config';

const log = createLayerLogger('rag').child({ service: 'Retriever' });

// =============================================================================
// Types
// =============================================================================

export interface RetrieverOptions {
  k: number;
  searchType: SearchType;
  /** MMR pool size as a multiple of k */
  fetchMultiplier: number;
  lambda: number;
}

const DEFAULT_RETRIEVER_OPTIONS: RetrieverOptions = {
  k: INITIAL_RETRIEVAL_K,
  searchType: DEFAULT_SEARCH_TYPE,
  fetchMultiplier: MMR_FETCH_MULTIPLIER,
  lambda: MMR_LAMBDA,
};

// =============================================================================
// Retriever
// =============================================================================

export class Retriever {
  private options: RetrieverOptions;

  constructor(
    private readonly index: VectorIndex,
    private readonly embeddings: EmbeddingProvider,
    options: Partial<RetrieverOptions> = {}
  ) {
    this.options = { ...DEFAULT_RETRIEVER_OPTIONS, ...options };
  }

  /**
   * Return up to k candidates for a query (fewer only when the index is smaller).
   *
   * @throws ModelUnavailableError when the query cannot be embedded
   */
  async retrieve(query: string): Promise<Candidate[]> {
    const start = Date.now();
    const { k, searchType, fetchMultiplier, lambda } = this.options;

    const queryVector = await this.embeddings.embedQuery(query);

    const candidates =
      searchType === 'mmr'
        ? this.index.searchMMR(queryVector, k, {
            fetchK: Math.ceil(k * fetchMultiplier),
            lambda,
          })
        : this.index.search(queryVector, k);

    log.debug(
      { query: truncateText(query, 100), searchType, k, found: candidates.length },
      'Retrieved candidates'
    );
    logRagStep(log, 'retrieval', { duration_ms: Date.now() - start, chunks: candidates.length });

    return candidates;
  }
}
