/**
 * Error types for the RAG pipeline.
 *
 * Each class maps to one failure domain so the orchestrator can tell
 * "the knowledge base does not cover this" apart from "a backend is down".
 */

// =============================================================================
// Base Error
// =============================================================================

export class RAGError extends Error {
  public readonly cause: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'RAGError';
    this.cause = cause;
  }
}

// =============================================================================
// Model Errors
// =============================================================================

/**
 * Embedding or relevance model could not be initialised or failed to score.
 */
export class ModelUnavailableError extends RAGError {
  public readonly modelId: string;

  constructor(modelId: string, message: string, cause?: unknown) {
    super(`Model ${modelId} unavailable: ${message}`, cause);
    this.name = 'ModelUnavailableError';
    this.modelId = modelId;
  }
}

/**
 * Text-generation backend errored or timed out.
 */
export class GenerationError extends RAGError {
  public readonly timedOut: boolean;

  constructor(message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super(message, options.cause);
    this.name = 'GenerationError';
    this.timedOut = options.timedOut ?? false;
  }
}

// =============================================================================
// Index Errors
// =============================================================================

/**
 * Persisted index artifacts exist but are unreadable or disagree.
 */
export class MalformedIndexError extends RAGError {
  public readonly reason: 'corrupt' | 'inconsistent';

  constructor(reason: 'corrupt' | 'inconsistent', message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'MalformedIndexError';
    this.reason = reason;
  }
}

/**
 * A vector does not fit the index (wrong dimensions).
 */
export class IndexMismatchError extends RAGError {
  constructor(expected: number, actual: number) {
    super(`Vector has ${actual} dimensions, index expects ${expected}`);
    this.name = 'IndexMismatchError';
  }
}

// =============================================================================
// Configuration / Ingestion Errors
// =============================================================================

export class ConfigError extends RAGError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class IngestionError extends RAGError {
  public readonly url: string;

  constructor(url: string, message: string, cause?: unknown) {
    super(`Failed to load ${url}: ${message}`, cause);
    this.name = 'IngestionError';
    this.url = url;
  }
}
