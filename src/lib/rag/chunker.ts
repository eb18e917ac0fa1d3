/**
 * Document Chunker
 *
 * Splits cleaned page text into overlapping chunks for retrieval.
 * Cuts prefer a paragraph break, then a sentence end, then a clause break,
 * then any whitespace.
 */

import type { DocumentChunk, SourceDocument } from '@/types/rag';
import { DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP } from './config';

// =============================================================================
// Types
// =============================================================================

export interface TextChunk {
  content: string;
  chunkIndex: number;
  startOffset: number;
  endOffset: number;
}

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

// =============================================================================
// Default Options
// =============================================================================

const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  chunkSize: DEFAULT_CHUNK_SIZE,
  chunkOverlap: DEFAULT_CHUNK_OVERLAP,
};

/**
 * Break patterns in order of preference. Each match ends where the next
 * chunk may start.
 */
const BREAK_PATTERNS: RegExp[] = [
  /\n\s*\n/g, // paragraph
  /[.!?。！？]["')\]]?\s+/g, // sentence
  /[,;:，；：]\s+|\n/g, // clause or line
  /\s+/g, // word
];

// =============================================================================
// Chunking Functions
// =============================================================================

/**
 * Split text into overlapping chunks of at most `chunkSize` characters.
 *
 * @throws RangeError when overlap is not smaller than chunk size
 */
export function chunkText(text: string, options: Partial<ChunkOptions> = {}): TextChunk[] {
  const { chunkSize, chunkOverlap } = { ...DEFAULT_CHUNK_OPTIONS, ...options };

  if (chunkOverlap >= chunkSize) {
    throw new RangeError(`Chunk overlap (${chunkOverlap}) must be smaller than chunk size (${chunkSize})`);
  }

  const normalizedText = text.trim();
  if (!normalizedText) {
    return [];
  }

  if (normalizedText.length <= chunkSize) {
    return [
      {
        content: normalizedText,
        chunkIndex: 0,
        startOffset: 0,
        endOffset: normalizedText.length,
      },
    ];
  }

  const chunks: TextChunk[] = [];
  let currentPosition = 0;

  while (currentPosition < normalizedText.length) {
    let endPosition = Math.min(currentPosition + chunkSize, normalizedText.length);

    if (endPosition < normalizedText.length) {
      endPosition = findBreak(normalizedText, currentPosition, endPosition, chunkSize);
    }

    const chunkContent = normalizedText.slice(currentPosition, endPosition).trim();
    if (chunkContent) {
      chunks.push({
        content: chunkContent,
        chunkIndex: chunks.length,
        startOffset: currentPosition,
        endOffset: endPosition,
      });
    }

    if (endPosition >= normalizedText.length) break;

    currentPosition = nextStart(normalizedText, currentPosition, endPosition, chunkOverlap);
  }

  return chunks;
}

/**
 * Find the best cut in (start + size/2, target]. Falls back to a hard cut.
 */
function findBreak(text: string, start: number, target: number, chunkSize: number): number {
  const searchStart = start + Math.floor(chunkSize / 2);
  const region = text.slice(searchStart, target);

  for (const pattern of BREAK_PATTERNS) {
    let lastEnd = -1;
    for (const match of region.matchAll(pattern)) {
      lastEnd = (match.index ?? 0) + match[0].length;
    }
    if (lastEnd > 0) {
      return searchStart + lastEnd;
    }
  }

  return target;
}

/**
 * Start the next chunk `overlap` characters before the cut, moved forward to
 * a word start so the overlap does not begin mid-word.
 */
function nextStart(text: string, start: number, end: number, overlap: number): number {
  let next = Math.max(start + 1, end - overlap);

  if (next < end && /\S/.test(text[next - 1] ?? ' ')) {
    const space = text.slice(next, end).search(/\s/);
    next = space === -1 ? end : next + space;
  }

  while (next < end && /\s/.test(text[next])) {
    next++;
  }

  return next;
}

/**
 * Chunk a source document, copying its metadata onto every chunk.
 */
export function chunkDocument(
  document: SourceDocument,
  options: Partial<ChunkOptions> = {}
): DocumentChunk[] {
  return chunkText(document.content, options).map((chunk) => ({
    content: chunk.content,
    metadata: { ...document.metadata },
  }));
}
