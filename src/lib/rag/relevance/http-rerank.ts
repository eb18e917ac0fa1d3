/**
 * HTTP cross-encoder backends.
 *
 * - TEI: Hugging Face text-embeddings-inference serving a cross-encoder
 *   (POST /rerank { query, texts } -> [{ index, score }])
 * - Cohere / Jina: hosted rerank APIs
 *   (POST /rerank { model, query, documents, top_n } -> { results: [{ index, relevance_score }] })
 */

import { z } from 'zod';
import { ModelUnavailableError } from '@/lib/errors';
import { createLayerLogger, logExternalCall, sanitizeString } from '@/lib/logger';
import type { RelevanceModel, RelevanceModelConfig } from './types';

const log = createLayerLogger('external').child({ service: 'RelevanceModel' });

// =============================================================================
// Response Schemas
// =============================================================================

const teiResponseSchema = z.array(
  z.object({
    index: z.number().int().nonnegative(),
    score: z.number(),
  })
);

const hostedResponseSchema = z.object({
  results: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      relevance_score: z.number(),
    })
  ),
});

interface IndexedScore {
  index: number;
  score: number;
}

// =============================================================================
// Base
// =============================================================================

abstract class HttpRelevanceModel implements RelevanceModel {
  abstract readonly provider: string;
  readonly modelId: string;
  protected readonly baseUrl: string;
  protected readonly apiKey?: string;
  protected readonly timeoutMs: number;

  constructor(config: RelevanceModelConfig) {
    this.modelId = config.modelId;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs;
  }

  protected abstract buildBody(query: string, passages: string[]): Record<string, unknown>;

  protected abstract parseScores(payload: unknown): IndexedScore[];

  async score(query: string, passages: string[]): Promise<number[]> {
    if (passages.length === 0) {
      return [];
    }

    const start = Date.now();
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    let payload: unknown;
    try {
      const response = await fetch(`${this.baseUrl}/rerank`, {
        method: 'POST',
        headers,
        body: JSON.stringify(this.buildBody(query, passages)),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        const text = await response.text();
        throw new Error(`HTTP ${response.status}: ${text.slice(0, 200)}`);
      }

      payload = await response.json();
    } catch (error) {
      const message = error instanceof Error ? sanitizeString(error.message) : String(error);
      logExternalCall(log, 'rerank', this.provider, {
        duration_ms: Date.now() - start,
        error: message,
        model: this.modelId,
      });
      throw new ModelUnavailableError(this.modelId, message, error);
    }

    logExternalCall(log, 'rerank', this.provider, {
      duration_ms: Date.now() - start,
      status: 200,
      model: this.modelId,
    });

    return this.alignScores(this.parseScores(payload), passages.length);
  }

  /**
   * Map index-tagged scores back to input order, requiring exactly one
   * finite score per passage.
   */
  private alignScores(results: IndexedScore[], expected: number): number[] {
    const scores = new Array<number | undefined>(expected).fill(undefined);

    for (const { index, score } of results) {
      if (index >= expected) {
        throw new ModelUnavailableError(this.modelId, `score for unknown passage ${index}`);
      }
      if (!Number.isFinite(score)) {
        throw new ModelUnavailableError(this.modelId, `non-finite score for passage ${index}`);
      }
      scores[index] = score;
    }

    return scores.map((score, index) => {
      if (score === undefined) {
        throw new ModelUnavailableError(this.modelId, `missing score for passage ${index}`);
      }
      return score;
    });
  }

  protected invalidResponse(error: z.ZodError): never {
    throw new ModelUnavailableError(
      this.modelId,
      `unexpected response shape: ${error.issues.map((i) => i.message).join(', ')}`,
      error
    );
  }
}

// =============================================================================
// TEI
// =============================================================================

/**
 * Self-hosted cross-encoder served by text-embeddings-inference.
 * The served model is fixed by the server, so the id is informational.
 */
export class TeiRelevanceModel extends HttpRelevanceModel {
  readonly provider = 'tei';

  protected buildBody(query: string, passages: string[]): Record<string, unknown> {
    return { query, texts: passages, raw_scores: false };
  }

  protected parseScores(payload: unknown): IndexedScore[] {
    const parsed = teiResponseSchema.safeParse(payload);
    if (!parsed.success) {
      return this.invalidResponse(parsed.error);
    }
    return parsed.data;
  }
}

// =============================================================================
// Cohere / Jina
// =============================================================================

export class CohereRelevanceModel extends HttpRelevanceModel {
  readonly provider: string = 'cohere';

  protected buildBody(query: string, passages: string[]): Record<string, unknown> {
    return {
      model: this.modelId,
      query,
      documents: passages,
      top_n: passages.length,
    };
  }

  protected parseScores(payload: unknown): IndexedScore[] {
    const parsed = hostedResponseSchema.safeParse(payload);
    if (!parsed.success) {
      return this.invalidResponse(parsed.error);
    }
    return parsed.data.results.map((r) => ({ index: r.index, score: r.relevance_score }));
  }
}

/**
 * Jina's rerank API shares Cohere's request and response shape.
 */
export class JinaRelevanceModel extends CohereRelevanceModel {
  readonly provider: string = 'jina';
}
