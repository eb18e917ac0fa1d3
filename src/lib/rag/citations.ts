/**
 * Citation Service
 *
 * Projects the reranked set into the generation context and the citation
 * list. Both come from the same chunks in the same order.
 */

import type { Citation, DocumentChunk, RankedChunk } from '@/types/rag';
import {
  SNIPPET_MAX_CHARS,
  SNIPPET_MARKER,
  CONTEXT_SEPARATOR,
  FALLBACK_TITLE,
  FALLBACK_URL,
} from './config';

// =============================================================================
// Citation Building
// =============================================================================

/**
 * First 200 characters of the content, marked when cut.
 */
export function buildSnippet(content: string, maxChars = SNIPPET_MAX_CHARS): string {
  if (content.length <= maxChars) {
    return content;
  }
  return `${content.slice(0, maxChars)}${SNIPPET_MARKER}`;
}

export function buildCitation(chunk: DocumentChunk): Citation {
  return {
    title: chunk.metadata.title || FALLBACK_TITLE,
    url: chunk.metadata.url || FALLBACK_URL,
    snippet: buildSnippet(chunk.content),
  };
}

/**
 * One citation per reranked chunk, in rank order.
 * Chunks from the same page each keep their own entry.
 */
export function buildCitations(ranked: RankedChunk[]): Citation[] {
  return ranked.map((r) => buildCitation(r.chunk));
}

// =============================================================================
// Context Assembly
// =============================================================================

/**
 * Concatenate reranked chunk contents for the generation prompt.
 */
export function assembleContext(ranked: RankedChunk[]): string {
  return ranked.map((r) => r.chunk.content).join(CONTEXT_SEPARATOR);
}

// =============================================================================
// Display
// =============================================================================

/**
 * Generate a sources section for terminal output.
 */
export function formatSourcesSection(citations: Citation[]): string {
  if (citations.length === 0) {
    return '';
  }

  const lines = ['Sources:'];

  citations.forEach((citation, i) => {
    const link = citation.url ? ` (${citation.url})` : '';
    lines.push(`${i + 1}. ${citation.title}${link}`);
    lines.push(`   ${citation.snippet.replace(/\s+/g, ' ')}`);
  });

  return lines.join('\n');
}
