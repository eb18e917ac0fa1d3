/**
 * Tests for Document Chunker
 */

import { describe, it, expect } from 'vitest';
import { chunkText, chunkDocument } from '../chunker';

// =============================================================================
// chunkText
// =============================================================================

describe('chunkText', () => {
  it('should return empty array for empty text', () => {
    expect(chunkText('')).toEqual([]);
    expect(chunkText('   \n  ')).toEqual([]);
  });

  it('should return single chunk for short text', () => {
    const chunks = chunkText('  Tenants must register.  ');

    expect(chunks).toEqual([
      { content: 'Tenants must register.', chunkIndex: 0, startOffset: 0, endOffset: 22 },
    ]);
  });

  it('should keep paragraph breaks inside a chunk', () => {
    const chunks = chunkText('First paragraph.\n\nSecond paragraph.');

    expect(chunks[0].content).toBe('First paragraph.\n\nSecond paragraph.');
  });

  it('should prefer cutting at a paragraph break', () => {
    const text = 'A'.repeat(300) + '\n\n' + 'B'.repeat(300);

    const chunks = chunkText(text, { chunkSize: 500, chunkOverlap: 100 });

    expect(chunks.map((c) => c.content)).toEqual(['A'.repeat(300), 'B'.repeat(300)]);
  });

  it('should cut at a sentence end when there is no paragraph break', () => {
    const text = 'x'.repeat(280) + '. ' + 'y'.repeat(280);

    const chunks = chunkText(text, { chunkSize: 500, chunkOverlap: 50 });

    expect(chunks.map((c) => c.content)).toEqual(['x'.repeat(280) + '.', 'y'.repeat(280)]);
  });

  it('should hard-cut text without any break', () => {
    const chunks = chunkText('z'.repeat(1200), { chunkSize: 500, chunkOverlap: 100 });

    expect(chunks.map((c) => c.content.length)).toEqual([500, 500, 200]);
  });

  it('should overlap consecutive chunks on whole words', () => {
    const words = Array.from({ length: 300 }, (_, i) => `w${i}`);

    const chunks = chunkText(words.join(' '), { chunkSize: 200, chunkOverlap: 50 });

    expect(chunks.length).toBeGreaterThan(1);
    for (let i = 0; i < chunks.length - 1; i++) {
      const firstWord = chunks[i + 1].content.split(' ')[0];
      expect(chunks[i].content.split(' ')).toContain(firstWord);
    }
  });

  it('should keep every chunk within the size limit and cover all words', () => {
    const words = Array.from({ length: 300 }, (_, i) => `w${i}`);

    const chunks = chunkText(words.join(' '), { chunkSize: 200, chunkOverlap: 50 });

    expect(chunks.every((c) => c.content.length <= 200)).toBe(true);
    const seen = new Set(chunks.flatMap((c) => c.content.split(' ')));
    expect(words.every((w) => seen.has(w))).toBe(true);
  });

  it('should number chunks sequentially', () => {
    const chunks = chunkText('z'.repeat(1200), { chunkSize: 500, chunkOverlap: 100 });

    expect(chunks.map((c) => c.chunkIndex)).toEqual([0, 1, 2]);
  });

  it('should reject an overlap as large as the chunk size', () => {
    expect(() => chunkText('text', { chunkSize: 100, chunkOverlap: 100 })).toThrow(RangeError);
  });
});

// =============================================================================
// chunkDocument
// =============================================================================

describe('chunkDocument', () => {
  it('should copy document metadata onto every chunk', () => {
    const metadata = {
      title: 'Renting Out a Flat',
      url: 'https://www.hdb.gov.sg/renting',
      category: 'hdb',
      source: 'www.hdb.gov.sg',
    };

    const chunks = chunkDocument(
      { content: 'z'.repeat(1200), metadata },
      { chunkSize: 500, chunkOverlap: 100 }
    );

    expect(chunks).toHaveLength(3);
    for (const chunk of chunks) {
      expect(chunk.metadata).toEqual(metadata);
      expect(chunk.metadata).not.toBe(metadata);
    }
  });
});
