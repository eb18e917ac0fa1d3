/**
 * RAG Configuration Constants
 *
 * Centralized defaults for the retrieval pipeline.
 * Environment overrides are parsed in src/lib/settings.ts.
 */

// =============================================================================
// Retrieval Configuration
// =============================================================================

/**
 * Number of candidates fetched by vector search before reranking.
 */
export const INITIAL_RETRIEVAL_K = 15;

/**
 * Number of chunks kept after cross-encoder reranking.
 * These chunks form both the generation context and the citation list.
 */
export const FINAL_RETRIEVAL_K = 8;

/**
 * Default search mode. Similarity keeps results reproducible.
 */
export const DEFAULT_SEARCH_TYPE = 'similarity' as const;

/**
 * MMR candidate pool size as a multiple of k.
 */
export const MMR_FETCH_MULTIPLIER = 2;

/**
 * MMR trade-off: 1 = pure relevance, 0 = pure diversity.
 */
export const MMR_LAMBDA = 0.5;

// =============================================================================
// Reranking Configuration
// =============================================================================

/**
 * Characters of chunk content sent to the cross-encoder per pair.
 * Bounds model latency only; every candidate is still scored.
 */
export const RERANK_MAX_CHARS = 500;

export const DEFAULT_RERANK_MODEL = 'cross-encoder/ms-marco-MiniLM-L-6-v2';

export const DEFAULT_RERANK_BASE_URL = 'http://localhost:8080';

export const DEFAULT_RERANK_TIMEOUT_MS = 30_000;

// =============================================================================
// Citation Configuration
// =============================================================================

export const SNIPPET_MAX_CHARS = 200;

export const SNIPPET_MARKER = '...';

export const CONTEXT_SEPARATOR = '\n\n';

export const FALLBACK_TITLE = 'Unknown Title';

/**
 * Empty URL means "no link".
 */
export const FALLBACK_URL = '';

// =============================================================================
// Chunking Configuration
// =============================================================================

export const DEFAULT_CHUNK_SIZE = 500;

export const DEFAULT_CHUNK_OVERLAP = 100;

/**
 * Pages with less cleaned text than this are skipped during ingestion.
 */
export const MIN_DOCUMENT_LENGTH = 100;

// =============================================================================
// Embedding Configuration
// =============================================================================

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

export const DEFAULT_EMBEDDING_DIMENSIONS = 1536;

export const EMBEDDING_BATCH_SIZE = 100;

export const DEFAULT_EMBEDDING_TIMEOUT_MS = 60_000;

// =============================================================================
// LLM Configuration
// =============================================================================

export const DEFAULT_LLM_BASE_URL = 'https://api.deepseek.com/v1';

export const DEFAULT_LLM_MODEL = 'deepseek-chat';

/**
 * Low temperature keeps answers close to the retrieved context.
 */
export const DEFAULT_RAG_TEMPERATURE = 0.3;

export const DEFAULT_RAG_MAX_TOKENS = 2000;

export const DEFAULT_LLM_TIMEOUT_MS = 60_000;

// =============================================================================
// Index Persistence
// =============================================================================

export const DEFAULT_INDEX_DIR = './data/index';

export const DEFAULT_INDEX_NAME = 'rental_regulations';

// =============================================================================
// Answers
// =============================================================================

export const NOT_COVERED_ANSWER =
  'The knowledge base does not cover this question. Please consult official agencies (HDB, CEA, or URA).';

export const MODEL_UNAVAILABLE_ANSWER =
  'The search service is temporarily unavailable, so I could not look this up. Please try again shortly.';

export const GENERATION_FAILURE_ANSWER =
  'I found relevant sources but could not generate an answer right now. Please review the sources below or try again shortly.';

export const INVALID_QUESTION_ANSWER =
  'Please enter a question about renting in Singapore.';

export const INTERNAL_FAILURE_ANSWER =
  'Something went wrong while answering your question. Please try again.';

// =============================================================================
// Ingestion
// =============================================================================

/**
 * Hosts allowed for ingestion. A URL matches on the exact host or any sub-domain.
 */
export const ALLOWED_DOMAINS = ['gov.sg', 'hdb.gov.sg', 'cea.gov.sg', 'ura.gov.sg'] as const;

export const FETCH_TIMEOUT_MS = 30_000;

export const FETCH_MAX_RETRIES = 3;
