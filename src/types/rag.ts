/**
 * Core RAG data types shared by ingestion, retrieval and the orchestrator.
 */

/**
 * Metadata carried by every chunk of a source page.
 */
export interface ChunkMetadata {
  title: string;
  /** Empty string means "no link" */
  url: string;
  category: string;
  /** Host name of the source page */
  source?: string;
  /** ISO timestamp of the fetch */
  fetchedAt?: string;
}

/**
 * Unit of retrieval: a bounded slice of one source document.
 */
export interface DocumentChunk {
  content: string;
  metadata: ChunkMetadata;
}

/**
 * Cleaned source document handed over by ingestion, before chunking.
 */
export interface SourceDocument {
  content: string;
  metadata: ChunkMetadata;
}

/**
 * First-stage retrieval hit.
 * `score` is cosine similarity in [-1, 1]; higher means more similar.
 */
export interface Candidate {
  chunk: DocumentChunk;
  score: number;
}

/**
 * Second-stage hit, ordered by cross-encoder relevance (higher = more relevant).
 */
export interface RankedChunk {
  chunk: DocumentChunk;
  relevance: number;
}

/**
 * Display projection of a chunk.
 */
export interface Citation {
  title: string;
  url: string;
  snippet: string;
}
