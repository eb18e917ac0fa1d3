/**
 * Runtime Settings
 *
 * Reads and validates environment configuration with zod.
 * Defaults come from src/lib/rag/config.ts.
 */

import { z } from 'zod';
import { ConfigError } from '@/lib/errors';
import {
  INITIAL_RETRIEVAL_K,
  FINAL_RETRIEVAL_K,
  DEFAULT_SEARCH_TYPE,
  MMR_FETCH_MULTIPLIER,
  MMR_LAMBDA,
  DEFAULT_RERANK_MODEL,
  DEFAULT_RERANK_BASE_URL,
  DEFAULT_RERANK_TIMEOUT_MS,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_EMBEDDING_DIMENSIONS,
  DEFAULT_EMBEDDING_TIMEOUT_MS,
  DEFAULT_LLM_BASE_URL,
  DEFAULT_LLM_MODEL,
  DEFAULT_RAG_TEMPERATURE,
  DEFAULT_RAG_MAX_TOKENS,
  DEFAULT_LLM_TIMEOUT_MS,
  DEFAULT_INDEX_DIR,
  DEFAULT_INDEX_NAME,
} from '@/lib/rag/config';

// =============================================================================
// Schema
// =============================================================================

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.string().url().default(DEFAULT_LLM_BASE_URL),
  MODEL_NAME: z.string().min(1).default(DEFAULT_LLM_MODEL),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(DEFAULT_RAG_TEMPERATURE),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(DEFAULT_RAG_MAX_TOKENS),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_LLM_TIMEOUT_MS),

  EMBEDDING_API_KEY: optionalString,
  EMBEDDING_BASE_URL: optionalString.pipe(z.string().url().optional()),
  EMBEDDING_MODEL: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(DEFAULT_EMBEDDING_DIMENSIONS),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_EMBEDDING_TIMEOUT_MS),

  RERANK_PROVIDER: z.enum(['tei', 'cohere', 'jina']).default('tei'),
  RERANK_BASE_URL: z.string().url().default(DEFAULT_RERANK_BASE_URL),
  RERANK_MODEL: z.string().min(1).default(DEFAULT_RERANK_MODEL),
  RERANK_API_KEY: optionalString,
  RERANK_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_RERANK_TIMEOUT_MS),

  INITIAL_RETRIEVAL_K: z.coerce.number().int().positive().default(INITIAL_RETRIEVAL_K),
  FINAL_RETRIEVAL_K: z.coerce.number().int().positive().default(FINAL_RETRIEVAL_K),
  SEARCH_TYPE: z.enum(['similarity', 'mmr']).default(DEFAULT_SEARCH_TYPE),
  MMR_FETCH_MULTIPLIER: z.coerce.number().positive().default(MMR_FETCH_MULTIPLIER),
  MMR_LAMBDA: z.coerce.number().min(0).max(1).default(MMR_LAMBDA),

  CHUNK_SIZE: z.coerce.number().int().positive().default(DEFAULT_CHUNK_SIZE),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(DEFAULT_CHUNK_OVERLAP),

  INDEX_DIR: z.string().min(1).default(DEFAULT_INDEX_DIR),
  INDEX_NAME: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, 'must contain only letters, digits, "_" or "-"')
    .default(DEFAULT_INDEX_NAME),
});

// =============================================================================
// Types
// =============================================================================

export type RerankProviderName = 'tei' | 'cohere' | 'jina';
export type SearchType = 'similarity' | 'mmr';

export interface Settings {
  llm: {
    apiKey?: string;
    baseUrl: string;
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
  };
  embedding: {
    apiKey?: string;
    baseUrl?: string;
    model: string;
    dimensions: number;
    timeoutMs: number;
  };
  rerank: {
    provider: RerankProviderName;
    baseUrl: string;
    model: string;
    apiKey?: string;
    timeoutMs: number;
  };
  retrieval: {
    initialK: number;
    finalK: number;
    searchType: SearchType;
    fetchMultiplier: number;
    lambda: number;
  };
  chunking: {
    chunkSize: number;
    chunkOverlap: number;
  };
  index: {
    dir: string;
    name: string;
  };
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Parse settings from an environment map.
 *
 * @throws ConfigError listing every invalid key
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const e = parsed.data;

  if (e.FINAL_RETRIEVAL_K > e.INITIAL_RETRIEVAL_K) {
    throw new ConfigError([
      `FINAL_RETRIEVAL_K (${e.FINAL_RETRIEVAL_K}) must not exceed INITIAL_RETRIEVAL_K (${e.INITIAL_RETRIEVAL_K})`,
    ]);
  }
  if (e.CHUNK_OVERLAP >= e.CHUNK_SIZE) {
    throw new ConfigError([
      `CHUNK_OVERLAP (${e.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${e.CHUNK_SIZE})`,
    ]);
  }

  return {
    llm: {
      apiKey: e.OPENAI_API_KEY,
      baseUrl: e.OPENAI_BASE_URL,
      model: e.MODEL_NAME,
      temperature: e.LLM_TEMPERATURE,
      maxTokens: e.LLM_MAX_TOKENS,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    embedding: {
      // Embeddings fall back to the generation key when no dedicated key is set
      apiKey: e.EMBEDDING_API_KEY ?? e.OPENAI_API_KEY,
      baseUrl: e.EMBEDDING_BASE_URL,
      model: e.EMBEDDING_MODEL,
      dimensions: e.EMBEDDING_DIMENSIONS,
      timeoutMs: e.EMBEDDING_TIMEOUT_MS,
    },
    rerank: {
      provider: e.RERANK_PROVIDER,
      baseUrl: e.RERANK_BASE_URL,
      model: e.RERANK_MODEL,
      apiKey: e.RERANK_API_KEY,
      timeoutMs: e.RERANK_TIMEOUT_MS,
    },
    retrieval: {
      initialK: e.INITIAL_RETRIEVAL_K,
      finalK: e.FINAL_RETRIEVAL_K,
      searchType: e.SEARCH_TYPE,
      fetchMultiplier: e.MMR_FETCH_MULTIPLIER,
      lambda: e.MMR_LAMBDA,
    },
    chunking: {
      chunkSize: e.CHUNK_SIZE,
      chunkOverlap: e.CHUNK_OVERLAP,
    },
    index: {
      dir: e.INDEX_DIR,
      name: e.INDEX_NAME,
    },
  };
}
