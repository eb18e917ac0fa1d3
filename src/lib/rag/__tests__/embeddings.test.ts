/**
 * Tests for Embedding Provider
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

// Store mock references for tests
const mockEmbeddingsCreate = vi.fn();
const mockConstructorCalls: Array<Record<string, unknown>> = [];

// Mock OpenAI before importing - use actual class definition
vi.mock('openai', () => {
  return {
    default: class MockOpenAI {
      embeddings = { create: mockEmbeddingsCreate };
      constructor(config: Record<string, unknown>) {
        mockConstructorCalls.push(config);
      }
    },
  };
});

import {
  OpenAIEmbeddingProvider,
  createEmbeddingProvider,
  createEmbeddingCache,
  prepareEmbeddingText,
} from '../embeddings';
import { ModelUnavailableError } from '@/lib/errors';
import { loadSettings } from '@/lib/settings';

// =============================================================================
// Test Setup
// =============================================================================

function vector(dims: number, fill = 0.1): number[] {
  return new Array<number>(dims).fill(fill);
}

function embeddingResponse(vectors: number[][], shuffled = false) {
  const data = vectors.map((embedding, index) => ({ embedding, index, object: 'embedding' }));
  return {
    data: shuffled ? [...data].reverse() : data,
    usage: { prompt_tokens: 5, total_tokens: 5 },
  };
}

beforeEach(() => {
  mockEmbeddingsCreate.mockReset();
  mockConstructorCalls.length = 0;
});

// =============================================================================
// Preprocessing
// =============================================================================

describe('prepareEmbeddingText', () => {
  it('should collapse whitespace and trim', () => {
    expect(prepareEmbeddingText('  lease\n\tterm   rules ')).toBe('lease term rules');
  });
});

// =============================================================================
// OpenAIEmbeddingProvider
// =============================================================================

describe('OpenAIEmbeddingProvider', () => {
  describe('constructor', () => {
    it('should use defaults', () => {
      const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-key' });

      expect(provider.modelId).toBe('text-embedding-3-small');
      expect(provider.dimensions).toBe(1536);
      expect(mockConstructorCalls[0]).toMatchObject({ apiKey: 'test-key', timeout: 60000 });
    });

    it('should throw ModelUnavailableError without an API key', () => {
      expect(() => new OpenAIEmbeddingProvider({})).toThrow(ModelUnavailableError);
    });
  });

  describe('embedQuery', () => {
    it('should return a single vector', async () => {
      mockEmbeddingsCreate.mockResolvedValueOnce(embeddingResponse([vector(4, 0.5)]));
      const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-key', dimensions: 4 });

      const result = await provider.embedQuery('minimum lease');

      expect(result).toEqual([0.5, 0.5, 0.5, 0.5]);
      expect(mockEmbeddingsCreate).toHaveBeenCalledWith({
        model: 'text-embedding-3-small',
        input: ['minimum lease'],
        dimensions: 4,
      });
    });

    it('should apply the same preprocessing as documents', async () => {
      mockEmbeddingsCreate.mockResolvedValueOnce(embeddingResponse([vector(4)]));
      const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-key', dimensions: 4 });

      await provider.embedQuery('  minimum\n lease ');

      expect(mockEmbeddingsCreate.mock.calls[0][0].input).toEqual(['minimum lease']);
    });
  });

  describe('embedDocuments', () => {
    it('should restore input order from response indices', async () => {
      mockEmbeddingsCreate.mockResolvedValueOnce(
        embeddingResponse([vector(2, 0.1), vector(2, 0.2)], true)
      );
      const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-key', dimensions: 2 });

      const result = await provider.embedDocuments(['a', 'b']);

      expect(result).toEqual([
        [0.1, 0.1],
        [0.2, 0.2],
      ]);
    });

    it('should split input into batches of 100', async () => {
      mockEmbeddingsCreate.mockImplementation(async ({ input }: { input: string[] }) =>
        embeddingResponse(input.map(() => vector(2)))
      );
      const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-key', dimensions: 2 });
      const texts = Array.from({ length: 150 }, (_, i) => `text ${i}`);

      const result = await provider.embedDocuments(texts);

      expect(result).toHaveLength(150);
      expect(mockEmbeddingsCreate).toHaveBeenCalledTimes(2);
      expect(mockEmbeddingsCreate.mock.calls[0][0].input).toHaveLength(100);
      expect(mockEmbeddingsCreate.mock.calls[1][0].input).toHaveLength(50);
    });

    it('should omit dimensions for models that do not accept it', async () => {
      mockEmbeddingsCreate.mockResolvedValueOnce(embeddingResponse([vector(3)]));
      const provider = new OpenAIEmbeddingProvider({
        apiKey: 'test-key',
        model: 'bge-small-en',
        dimensions: 3,
      });

      await provider.embedDocuments(['text']);

      expect(mockEmbeddingsCreate).toHaveBeenCalledWith({ model: 'bge-small-en', input: ['text'] });
    });

    it('should reject empty text', async () => {
      const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-key' });

      await expect(provider.embedDocuments(['ok', '   '])).rejects.toThrow(ModelUnavailableError);
      expect(mockEmbeddingsCreate).not.toHaveBeenCalled();
    });

    it('should wrap backend errors in ModelUnavailableError', async () => {
      mockEmbeddingsCreate.mockRejectedValueOnce(new Error('connection refused'));
      const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-key' });

      await expect(provider.embedDocuments(['text'])).rejects.toThrow(
        'Model text-embedding-3-small unavailable: connection refused'
      );
    });

    it('should reject vectors of the wrong length', async () => {
      mockEmbeddingsCreate.mockResolvedValueOnce(embeddingResponse([vector(3)]));
      const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-key', dimensions: 4 });

      await expect(provider.embedDocuments(['text'])).rejects.toThrow(
        'expected 4-dimensional vectors, received 3'
      );
    });

    it('should reject a response with missing embeddings', async () => {
      mockEmbeddingsCreate.mockResolvedValueOnce(embeddingResponse([vector(2)]));
      const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-key', dimensions: 2 });

      await expect(provider.embedDocuments(['a', 'b'])).rejects.toThrow(
        'expected 2 embeddings, received 1'
      );
    });
  });
});

// =============================================================================
// Factory Functions
// =============================================================================

describe('createEmbeddingProvider', () => {
  it('should build a provider from settings', () => {
    const settings = loadSettings({
      OPENAI_API_KEY: 'test-key',
      EMBEDDING_BASE_URL: 'http://localhost:9000/v1',
      EMBEDDING_DIMENSIONS: '8',
    });

    const provider = createEmbeddingProvider(settings.embedding);

    expect(provider.dimensions).toBe(8);
    expect(mockConstructorCalls[0]).toMatchObject({
      apiKey: 'test-key',
      baseURL: 'http://localhost:9000/v1',
    });
  });
});

describe('createEmbeddingCache', () => {
  it('should share one provider per model id', async () => {
    const settings = loadSettings({ OPENAI_API_KEY: 'test-key' });
    const cache = createEmbeddingCache(settings.embedding);

    const [a, b] = await Promise.all([
      cache.get('text-embedding-3-small'),
      cache.get('text-embedding-3-small'),
    ]);

    expect(a).toBe(b);
    expect(mockConstructorCalls).toHaveLength(1);
  });

  it('should surface a missing key as ModelUnavailableError', async () => {
    const settings = loadSettings({});
    const cache = createEmbeddingCache(settings.embedding);

    await expect(cache.get('text-embedding-3-small')).rejects.toThrow(ModelUnavailableError);
    expect(cache.has('text-embedding-3-small')).toBe(false);
  });
});
