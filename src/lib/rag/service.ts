/**
 * RAG Service
 *
 * Orchestrates the query pipeline:
 * 1. Retrieve candidates from the current index snapshot
 * 2. Rerank with the cross-encoder
 * 3. Assemble context and citations from the same reranked set
 * 4. Generate the answer
 *
 * Retrieval and reranking run once per query. Citations are never derived
 * from anything but the chunks handed to the generator.
 */

import { GenerationError, IndexMismatchError, ModelUnavailableError } from '@/lib/errors';
import { buildRAGSystemPrompt, buildRAGUserPrompt } from '@/lib/llm';
import type { LLMMessage } from '@/lib/llm';
import {
  Timer,
  createLayerLogger,
  createQueryContext,
  describeError,
  logRagStep,
  truncateText,
} from '@/lib/logger';
import type { Logger, TimingInfo } from '@/lib/logger';
import type { Citation, RankedChunk } from '@/types/rag';
import { assembleContext, buildCitations } from './citations';
import type { RAGContext } from './context';
import { Reranker } from './reranker';
import { Retriever } from './retriever';
import {
  NOT_COVERED_ANSWER,
  MODEL_UNAVAILABLE_ANSWER,
  GENERATION_FAILURE_ANSWER,
  INVALID_QUESTION_ANSWER,
  INTERNAL_FAILURE_ANSWER,
} from './config';

// =============================================================================
// Types
// =============================================================================

export interface RAGRequest {
  question: string;
  /** Optional self-description, e.g. "Student"; steers retrieval and the answer */
  identity?: string;
}

export type RAGStatus =
  | 'received'
  | 'retrieving'
  | 'reranking'
  | 'context_assembled'
  | 'generating'
  | 'answered'
  | 'not_covered'
  | 'failed';

export interface RAGCallbacks {
  onStatus?: (status: RAGStatus) => void;
}

export type NotCoveredReason = 'index_absent' | 'no_candidates' | 'index_error';

export type FailureKind =
  | 'invalid_question'
  | 'model_unavailable'
  | 'generation_failure'
  | 'internal';

export type RAGOutcome =
  | { status: 'answered'; answer: string; citations: Citation[] }
  | { status: 'not_covered'; reason: NotCoveredReason; answer: string; citations: Citation[] }
  | { status: 'failed'; kind: FailureKind; answer: string; citations: Citation[]; error: string };

export type RAGResponse = RAGOutcome & { timing: TimingInfo };

const FAILURE_ANSWERS: Record<FailureKind, string> = {
  invalid_question: INVALID_QUESTION_ANSWER,
  model_unavailable: MODEL_UNAVAILABLE_ANSWER,
  generation_failure: GENERATION_FAILURE_ANSWER,
  internal: INTERNAL_FAILURE_ANSWER,
};

/**
 * Prefix the identity annotation to the question, if any.
 */
export function applyIdentity(question: string, identity?: string): string {
  const trimmed = identity?.trim();
  return trimmed ? `(User identity: ${trimmed}) ${question}` : question;
}

// =============================================================================
// RAG Service Class
// =============================================================================

export class RAGService {
  constructor(private readonly ctx: RAGContext) {}

  /**
   * Answer a question. Never throws: every failure becomes a typed outcome
   * with a readable answer.
   */
  async query(request: RAGRequest, callbacks: RAGCallbacks = {}): Promise<RAGResponse> {
    const queryCtx = createQueryContext({ identity: request.identity });
    const log = createLayerLogger('rag', queryCtx).child({ service: 'RAGService' });
    const timer = new Timer();

    const emit = (status: RAGStatus) => callbacks.onStatus?.(status);
    const finish = (outcome: RAGOutcome): RAGResponse => {
      emit(outcome.status);
      const timing = timer.toTimingInfo(queryCtx.traceId);
      log.info(
        {
          event: 'query_complete',
          status: outcome.status,
          citations: outcome.citations.length,
          ...timing,
        },
        `Query ${outcome.status}`
      );
      return { ...outcome, timing };
    };

    emit('received');
    log.info(
      { event: 'query_received', question: truncateText(request.question, 100) },
      'Query received'
    );

    // A blank question never reaches the models
    if (!request.question.trim()) {
      log.warn({ event: 'invalid_question' }, 'Query rejected: question is empty');
      return finish({
        status: 'failed',
        kind: 'invalid_question',
        answer: FAILURE_ANSWERS.invalid_question,
        citations: [],
        error: 'question is empty',
      });
    }

    // 1. Index snapshot (absent or empty -> not covered, nothing else runs)
    const index = this.ctx.store.current();
    if (!index) {
      log.warn({ event: 'index_absent' }, 'No index available, skipping retrieval');
      return finish(this.notCovered('index_absent'));
    }

    const { settings } = this.ctx;
    const question = applyIdentity(request.question, request.identity);

    // 2. Retrieve
    emit('retrieving');
    timer.mark('retrieval');
    let ranked: RankedChunk[];
    try {
      const embeddings = await this.ctx.embeddingModels.get(settings.embedding.model);
      const retriever = new Retriever(index, embeddings, {
        k: settings.retrieval.initialK,
        searchType: settings.retrieval.searchType,
        fetchMultiplier: settings.retrieval.fetchMultiplier,
        lambda: settings.retrieval.lambda,
      });
      const candidates = await retriever.retrieve(question);
      timer.measure('retrieval');

      // 3. Rerank
      emit('reranking');
      timer.mark('rerank');
      const reranker = new Reranker(this.ctx.relevanceModels, settings.rerank.model);
      ranked = await reranker.rerank(question, candidates, settings.retrieval.finalK);
      timer.measure('rerank');
    } catch (error) {
      if (error instanceof IndexMismatchError) {
        log.error({ event: 'index_error', ...describeError(error) }, 'Index rejected the query');
        return finish(this.notCovered('index_error'));
      }
      return finish(this.failed(log, error, []));
    }

    if (ranked.length === 0) {
      return finish(this.notCovered('no_candidates'));
    }

    // 4. Context and citations from the same reranked set
    const context = assembleContext(ranked);
    const citations = buildCitations(ranked);
    emit('context_assembled');
    logRagStep(log, 'citation', { chunks: citations.length });

    // 5. Generate
    emit('generating');
    timer.mark('llm');
    try {
      const messages: LLMMessage[] = [
        { role: 'system', content: buildRAGSystemPrompt() },
        { role: 'user', content: buildRAGUserPrompt(question, context) },
      ];
      const response = await this.ctx.llm.complete(messages);
      const duration = timer.measure('llm');

      const answer = response.content.trim();
      if (!answer) {
        throw new GenerationError('Generation returned an empty answer');
      }

      logRagStep(log, 'generation', {
        duration_ms: duration,
        tokens: response.usage.totalTokens,
      });

      return finish({ status: 'answered', answer, citations });
    } catch (error) {
      timer.measure('llm');
      // Retrieval succeeded, so the citations stay accurate
      return finish(this.failed(log, error, citations));
    }
  }

  private notCovered(reason: NotCoveredReason): RAGOutcome {
    return { status: 'not_covered', reason, answer: NOT_COVERED_ANSWER, citations: [] };
  }

  private failed(log: Logger, error: unknown, citations: Citation[]): RAGOutcome {
    const kind: FailureKind =
      error instanceof ModelUnavailableError
        ? 'model_unavailable'
        : error instanceof GenerationError
          ? 'generation_failure'
          : 'internal';

    log.error({ event: 'query_failed', kind, ...describeError(error) }, `Query failed: ${kind}`);

    return {
      status: 'failed',
      kind,
      answer: FAILURE_ANSWERS[kind],
      citations: kind === 'generation_failure' ? citations : [],
      error: describeError(error).error,
    };
  }
}

/**
 * Create a RAG service over a shared context.
 */
export function createRAGService(ctx: RAGContext): RAGService {
  return new RAGService(ctx);
}
