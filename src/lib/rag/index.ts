/**
 * RAG Module Exports
 *
 * - Document chunking
 * - Embeddings and relevance models
 * - Vector index, persistence and retrieval
 * - Reranking and citations
 * - Query service
 */

// Chunker
export { chunkText, chunkDocument } from './chunker';
export type { TextChunk, ChunkOptions } from './chunker';

// Models
export { ModelCache } from './model-cache';
export type { ModelLoader } from './model-cache';
export {
  OpenAIEmbeddingProvider,
  createEmbeddingProvider,
  createEmbeddingCache,
  prepareEmbeddingText,
} from './embeddings';
export type { EmbeddingProvider, EmbeddingConfig } from './embeddings';
export {
  TeiRelevanceModel,
  CohereRelevanceModel,
  JinaRelevanceModel,
  createRelevanceModel,
  createRelevanceCache,
  getSupportedRerankProviders,
} from './relevance';
export type { RelevanceModel, RelevanceModelConfig } from './relevance';

// Index
export { VectorIndex, cosineSimilarity } from './vector-index';
export type { IndexEntry, IndexIdentity, MMROptions } from './vector-index';
export {
  VectorStore,
  getIndexPaths,
  readIndex,
  loadIndex,
  saveIndex,
  createIndexFromChunks,
  addChunksToIndex,
} from './vector-store';
export type { IndexPaths, LoadIndexOptions } from './vector-store';

// Retrieval
export { Retriever } from './retriever';
export type { RetrieverOptions } from './retriever';
export { Reranker } from './reranker';
export type { RerankerOptions } from './reranker';

// Citations
export {
  buildSnippet,
  buildCitation,
  buildCitations,
  assembleContext,
  formatSourcesSection,
} from './citations';

// RAG Service
export { createRAGContext } from './context';
export type { RAGContext } from './context';
export { RAGService, createRAGService, applyIdentity } from './service';
export type {
  RAGRequest,
  RAGResponse,
  RAGOutcome,
  RAGStatus,
  RAGCallbacks,
  NotCoveredReason,
  FailureKind,
} from './service';
