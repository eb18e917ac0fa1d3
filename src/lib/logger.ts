/**
 * Structured Logging System
 *
 * Pino-based logging with:
 * - Query tracing via traceId
 * - Environment-based configuration
 * - Secret redaction
 * - Layer-specific child loggers
 * - Stage timing
 */

import pino, { Logger, LoggerOptions } from 'pino';
import { randomUUID } from 'crypto';

// =============================================================================
// Configuration
// =============================================================================

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_PRODUCTION = process.env.NODE_ENV === 'production';
const IS_TEST = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

/**
 * Pino configuration options.
 * JSON in production, pretty print in development, plain JSON under test
 * (no worker-thread transport).
 */
const pinoOptions: LoggerOptions = {
  level: LOG_LEVEL,
  ...(IS_PRODUCTION || IS_TEST
    ? {
        formatters: {
          level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      }
    : {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      }),
};

// =============================================================================
// Main Logger Instance
// =============================================================================

/**
 * Root logger instance.
 * Use child loggers for specific contexts.
 */
export const logger: Logger = pino(pinoOptions);

// =============================================================================
// Query Context
// =============================================================================

/**
 * Per-query context for tracing
 */
export interface QueryContext {
  traceId: string;
  identity?: string;
  startTime: number;
}

/**
 * Generate a new query context with unique traceId
 */
export function createQueryContext(options?: { identity?: string }): QueryContext {
  return {
    traceId: randomUUID(),
    identity: options?.identity,
    startTime: Date.now(),
  };
}

// =============================================================================
// Layer-Specific Loggers
// =============================================================================

export type LogLayer = 'rag' | 'index' | 'ingest' | 'external' | 'eval' | 'cli';

/**
 * Create a child logger for a specific layer, optionally bound to a query
 */
export function createLayerLogger(layer: LogLayer, ctx?: QueryContext): Logger {
  const base = ctx ? logger.child({ traceId: ctx.traceId }) : logger;
  return base.child({ layer });
}

// =============================================================================
// Sanitization Utilities
// =============================================================================

const MAX_TEXT_LENGTH = 200;

/**
 * Patterns for detecting secrets
 */
const SENSITIVE_PATTERNS = [
  /sk-[a-zA-Z0-9_-]{16,}/g, // OpenAI-style API keys
  /Bearer [a-zA-Z0-9._-]+/g, // Bearer tokens
  /api[_-]?key[=:]\s*["']?[^"'\s]+/gi, // API key values
];

/**
 * Redact secrets from a string
 */
export function sanitizeString(value: string): string {
  let sanitized = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }
  return sanitized;
}

/**
 * Truncate text content for logging
 */
export function truncateText(text: string, maxLength = MAX_TEXT_LENGTH): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength)}... (${text.length} chars total)`;
}

/**
 * Normalise an unknown thrown value into loggable fields
 */
export function describeError(error: unknown): { error: string; stack?: string } {
  if (error instanceof Error) {
    return { error: sanitizeString(error.message), stack: error.stack };
  }
  return { error: sanitizeString(String(error)) };
}

// =============================================================================
// Timing Utilities
// =============================================================================

/**
 * Stage timings attached to query results
 */
export interface TimingInfo {
  traceId: string;
  retrieval_ms?: number;
  rerank_ms?: number;
  llm_ms?: number;
  total_ms: number;
}

/**
 * Timer class for tracking operation durations
 */
export class Timer {
  private startTime: number;
  private marks: Map<string, number> = new Map();
  private durations: Map<string, number> = new Map();

  constructor() {
    this.startTime = Date.now();
  }

  /**
   * Mark the start of an operation
   */
  mark(name: string): void {
    this.marks.set(name, Date.now());
  }

  /**
   * Record the duration since a mark
   */
  measure(name: string): number {
    const markTime = this.marks.get(name);
    if (markTime === undefined) {
      return 0;
    }
    const duration = Date.now() - markTime;
    this.durations.set(name, duration);
    return duration;
  }

  getDuration(name: string): number | undefined {
    return this.durations.get(name);
  }

  elapsed(): number {
    return Date.now() - this.startTime;
  }

  getAllDurations(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const [key, value] of this.durations) {
      result[`${key}_ms`] = value;
    }
    return result;
  }

  toTimingInfo(traceId: string): TimingInfo {
    return {
      traceId,
      ...this.getAllDurations(),
      total_ms: this.elapsed(),
    };
  }
}

// =============================================================================
// Logging Helpers
// =============================================================================

/**
 * Log an external service call
 */
export function logExternalCall(
  log: Logger,
  service: 'openai' | 'rerank' | 'http',
  operation: string,
  details: {
    duration_ms?: number;
    status?: number | string;
    error?: string;
    tokens?: number;
    model?: string;
  }
): void {
  const baseLog = {
    event: 'external_call',
    service,
    operation,
    ...details,
  };

  if (details.error) {
    log.error(baseLog, `${service} ${operation} failed: ${details.error}`);
  } else {
    log.debug(baseLog, `${service} ${operation} completed`);
  }
}

/**
 * Log RAG pipeline step
 */
export function logRagStep(
  log: Logger,
  step: 'retrieval' | 'reranking' | 'generation' | 'citation',
  details: {
    duration_ms?: number;
    chunks?: number;
    tokens?: number;
    model?: string;
    error?: string;
  }
): void {
  const baseLog = {
    event: `rag_${step}`,
    ...details,
  };

  if (details.error) {
    log.error(baseLog, `RAG ${step} failed: ${details.error}`);
  } else {
    log.debug(baseLog, `RAG ${step} completed`);
  }
}

// =============================================================================
// Export Types
// =============================================================================

export type { Logger } from 'pino';
