/**
 * Tests for HTTP relevance models and their factory
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  TeiRelevanceModel,
  CohereRelevanceModel,
  JinaRelevanceModel,
  createRelevanceModel,
  createRelevanceCache,
  getSupportedRerankProviders,
} from '../relevance';
import { ModelUnavailableError } from '@/lib/errors';
import { loadSettings } from '@/lib/settings';

// =============================================================================
// Test Setup
// =============================================================================

const mockFetch = vi.fn();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const config = {
  modelId: 'cross-encoder/test',
  baseUrl: 'http://rerank.local/',
  timeoutMs: 1000,
};

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

// =============================================================================
// TEI
// =============================================================================

describe('TeiRelevanceModel', () => {
  it('should post query and texts and return scores in input order', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse([
        { index: 1, score: 0.9 },
        { index: 0, score: 0.2 },
      ])
    );
    const model = new TeiRelevanceModel(config);

    const scores = await model.score('lease term', ['a', 'b']);

    expect(scores).toEqual([0.2, 0.9]);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('http://rerank.local/rerank');
    expect(JSON.parse(init.body)).toEqual({ query: 'lease term', texts: ['a', 'b'], raw_scores: false });
  });

  it('should not call the backend for zero passages', async () => {
    const model = new TeiRelevanceModel(config);

    expect(await model.score('q', [])).toEqual([]);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should raise ModelUnavailableError on HTTP errors', async () => {
    mockFetch.mockResolvedValueOnce(new Response('overloaded', { status: 503 }));
    const model = new TeiRelevanceModel(config);

    await expect(model.score('q', ['a'])).rejects.toThrow(
      'Model cross-encoder/test unavailable: HTTP 503: overloaded'
    );
  });

  it('should raise ModelUnavailableError on network errors', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));
    const model = new TeiRelevanceModel(config);

    await expect(model.score('q', ['a'])).rejects.toBeInstanceOf(ModelUnavailableError);
  });

  it('should reject a missing score', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse([{ index: 0, score: 0.5 }]));
    const model = new TeiRelevanceModel(config);

    await expect(model.score('q', ['a', 'b'])).rejects.toThrow('missing score for passage 1');
  });

  it('should reject a malformed response', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ scores: [0.1] }));
    const model = new TeiRelevanceModel(config);

    await expect(model.score('q', ['a'])).rejects.toThrow(ModelUnavailableError);
  });

  it('should reject an out-of-range index', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse([{ index: 3, score: 0.5 }]));
    const model = new TeiRelevanceModel(config);

    await expect(model.score('q', ['a'])).rejects.toThrow('score for unknown passage 3');
  });
});

// =============================================================================
// Hosted APIs
// =============================================================================

describe('CohereRelevanceModel', () => {
  it('should send the model id and bearer key', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ results: [{ index: 0, relevance_score: 0.7 }] })
    );
    const model = new CohereRelevanceModel({ ...config, apiKey: 'test-key' });

    const scores = await model.score('q', ['a']);

    expect(scores).toEqual([0.7]);
    const init = mockFetch.mock.calls[0][1];
    expect(init.headers.Authorization).toBe('Bearer test-key');
    expect(JSON.parse(init.body)).toEqual({
      model: 'cross-encoder/test',
      query: 'q',
      documents: ['a'],
      top_n: 1,
    });
  });
});

describe('JinaRelevanceModel', () => {
  it('should report its provider name', () => {
    expect(new JinaRelevanceModel({ ...config, apiKey: 'test-key' }).provider).toBe('jina');
  });
});

// =============================================================================
// Factory
// =============================================================================

describe('createRelevanceModel', () => {
  it('should list supported providers', () => {
    expect(getSupportedRerankProviders()).toEqual(['tei', 'cohere', 'jina']);
  });

  it('should create a TEI model without a key', () => {
    expect(createRelevanceModel('tei', config)).toBeInstanceOf(TeiRelevanceModel);
  });

  it('should require a key for hosted providers', () => {
    expect(() => createRelevanceModel('cohere', config)).toThrow(
      'RERANK_API_KEY is required for the cohere provider'
    );
  });
});

describe('createRelevanceCache', () => {
  it('should surface configuration failures as ModelUnavailableError', async () => {
    const settings = loadSettings({ RERANK_PROVIDER: 'jina' });
    const cache = createRelevanceCache(settings.rerank);

    await expect(cache.get('jina-reranker-v2')).rejects.toBeInstanceOf(ModelUnavailableError);
  });

  it('should build models with the configured base URL', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse([{ index: 0, score: 1 }]));
    const settings = loadSettings({ RERANK_BASE_URL: 'http://tei.local' });
    const model = await createRelevanceCache(settings.rerank).get(settings.rerank.model);

    await model.score('q', ['a']);

    expect(mockFetch.mock.calls[0][0]).toBe('http://tei.local/rerank');
  });
});
