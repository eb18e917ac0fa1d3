/**
 * Ingestion Pipeline
 *
 * Fetch -> clean -> chunk -> embed -> add to the index -> save.
 * A failing URL is recorded and skipped; the rest of the batch continues.
 */

import { createLayerLogger, describeError } from '@/lib/logger';
import { chunkDocument } from '@/lib/rag/chunker';
import type { ChunkOptions } from '@/lib/rag/chunker';
import { MIN_DOCUMENT_LENGTH } from '@/lib/rag/config';
import type { EmbeddingProvider } from '@/lib/rag/embeddings';
import type { VectorStore } from '@/lib/rag/vector-store';
import type { DocumentChunk, SourceDocument } from '@/types/rag';
import { checkDomainAllowed } from './domain';
import type { SourceEntry } from './sources';
import { cleanText } from './text-cleaner';
import type { PageLoader } from './web-loader';

const log = createLayerLogger('ingest').child({ service: 'IngestionPipeline' });

// =============================================================================
// Types
// =============================================================================

export interface IngestionDeps {
  loader: PageLoader;
  store: VectorStore;
  embeddings: EmbeddingProvider;
}

export interface IngestionOptions extends ChunkOptions {
  /** Discard the current index instead of appending to it */
  rebuild: boolean;
}

export interface FailedSource {
  url: string;
  reason: string;
}

export interface IngestionReport {
  /** Pages fetched, cleaned and chunked */
  processed: number;
  chunks: number;
  failed: FailedSource[];
  /** Chunks in the index after the run (0 when nothing was written) */
  indexSize: number;
}

// =============================================================================
// Pipeline
// =============================================================================

async function loadSource(
  entry: SourceEntry,
  loader: PageLoader
): Promise<SourceDocument | FailedSource> {
  if (!checkDomainAllowed(entry.url)) {
    log.warn({ event: 'domain_rejected', url: entry.url }, 'URL is not on the domain allow-list');
    return { url: entry.url, reason: 'domain not allowed' };
  }

  let page: SourceDocument;
  try {
    page = await loader.load(entry.url);
  } catch (error) {
    log.error({ event: 'page_failed', url: entry.url, ...describeError(error) }, 'Failed to load page');
    return { url: entry.url, reason: error instanceof Error ? error.message : String(error) };
  }

  const content = cleanText(page.content);
  if (content.length < MIN_DOCUMENT_LENGTH) {
    log.warn(
      { event: 'page_too_short', url: entry.url, chars: content.length },
      'Extracted content too short, skipping'
    );
    return { url: entry.url, reason: 'content too short' };
  }

  log.info({ event: 'page_loaded', url: entry.url, chars: content.length }, 'Loaded page');

  return {
    content,
    metadata: {
      ...page.metadata,
      title: entry.title || page.metadata.title,
      category: entry.category,
    },
  };
}

function isFailure(result: SourceDocument | FailedSource): result is FailedSource {
  return 'reason' in result;
}

/**
 * Ingest a list of sources into the store and persist it.
 *
 * @throws ModelUnavailableError when embedding fails
 */
export async function ingestDocuments(
  sources: SourceEntry[],
  deps: IngestionDeps,
  options: IngestionOptions
): Promise<IngestionReport> {
  const { loader, store, embeddings } = deps;
  const failed: FailedSource[] = [];
  const documents: SourceDocument[] = [];

  log.info({ event: 'ingest_start', sources: sources.length }, 'Starting ingestion');

  for (const entry of sources) {
    const result = await loadSource(entry, loader);
    if (isFailure(result)) {
      failed.push(result);
    } else {
      documents.push(result);
    }
  }

  if (documents.length === 0) {
    log.warn({ event: 'ingest_empty', failed: failed.length }, 'No documents extracted');
    return { processed: 0, chunks: 0, failed, indexSize: store.current()?.size ?? 0 };
  }

  const chunks: DocumentChunk[] = documents.flatMap((doc) =>
    chunkDocument(doc, { chunkSize: options.chunkSize, chunkOverlap: options.chunkOverlap })
  );

  if (options.rebuild) {
    await store.replace(null);
  }
  const index = await store.addChunks(chunks, embeddings);
  await store.save();

  log.info(
    {
      event: 'ingest_complete',
      processed: documents.length,
      chunks: chunks.length,
      failed: failed.length,
      indexSize: index.size,
    },
    'Ingestion complete'
  );

  return { processed: documents.length, chunks: chunks.length, failed, indexSize: index.size };
}
