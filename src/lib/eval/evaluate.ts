/**
 * Evaluation
 *
 * Runs a fixed question set through the RAG service and summarises how
 * often it answers with citations.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { ConfigError } from '@/lib/errors';
import { createLayerLogger } from '@/lib/logger';
import type { RAGService } from '@/lib/rag/service';
import type { Citation } from '@/types/rag';

const log = createLayerLogger('eval').child({ service: 'Evaluation' });

// =============================================================================
// Types
// =============================================================================

const questionSchema = z.object({
  question: z.string().min(1),
  category: z.string().default('unknown'),
});

export type EvaluationQuestion = z.infer<typeof questionSchema>;

export interface QuestionResult {
  question: string;
  category: string;
  status: 'answered' | 'not_covered' | 'failed';
  answer: string;
  citations: Citation[];
  hasCitations: boolean;
  /** Answered, with at least one citation and a non-empty answer */
  isSuccess: boolean;
  error?: string;
}

export interface EvaluationResult {
  total: number;
  successCount: number;
  /** Percentage, 0-100 */
  successRate: number;
  citationCount: number;
  citationRate: number;
  failedSamples: QuestionResult[];
  results: QuestionResult[];
}

// =============================================================================
// Loading
// =============================================================================

export async function loadEvaluationQuestions(filePath: string): Promise<EvaluationQuestion[]> {
  const raw = await fs.readFile(filePath, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`${filePath}: ${message}`]);
  }

  const parsed = z.array(questionSchema).safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${filePath}[${issue.path.join('.')}]: ${issue.message}`)
    );
  }
  return parsed.data;
}

// =============================================================================
// Evaluation
// =============================================================================

function percentage(count: number, total: number): number {
  return total === 0 ? 0 : (count / total) * 100;
}

/**
 * Run every question sequentially and compute success and citation rates.
 */
export async function evaluateQuestions(
  questions: EvaluationQuestion[],
  service: Pick<RAGService, 'query'>
): Promise<EvaluationResult> {
  const results: QuestionResult[] = [];

  for (const [i, { question, category }] of questions.entries()) {
    const response = await service.query({ question });
    const hasCitations = response.citations.length > 0;
    const isSuccess =
      response.status === 'answered' && hasCitations && response.answer.trim().length > 0;

    results.push({
      question,
      category,
      status: response.status,
      answer: response.answer,
      citations: response.citations,
      hasCitations,
      isSuccess,
      ...(response.status === 'failed' ? { error: response.error } : {}),
    });

    log.info(
      {
        event: 'question_evaluated',
        index: i + 1,
        total: questions.length,
        status: response.status,
        citations: response.citations.length,
      },
      `[${i + 1}/${questions.length}] ${isSuccess ? 'success' : 'failure'}`
    );
  }

  const successCount = results.filter((r) => r.isSuccess).length;
  const citationCount = results.filter((r) => r.hasCitations).length;

  return {
    total: questions.length,
    successCount,
    successRate: percentage(successCount, questions.length),
    citationCount,
    citationRate: percentage(citationCount, questions.length),
    failedSamples: results.filter((r) => !r.isSuccess),
    results,
  };
}

// =============================================================================
// Report
// =============================================================================

const QUESTION_COLUMN_CHARS = 50;
const ANSWER_PREVIEW_CHARS = 200;

function shorten(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function tableCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\s+/g, ' ');
}

/**
 * Render an evaluation result as a Markdown report.
 */
export function renderEvaluationReport(result: EvaluationResult, generatedAt: Date): string {
  const lines = [
    '# RAG Evaluation Report',
    '',
    `**Generated**: ${generatedAt.toISOString()}`,
    '',
    '## Summary',
    '',
    `- **Total questions**: ${result.total}`,
    `- **Successful answers**: ${result.successCount} (${result.successRate.toFixed(1)}%)`,
    `- **With citations**: ${result.citationCount} (${result.citationRate.toFixed(1)}%)`,
    `- **Without citations**: ${result.total - result.citationCount}`,
    '',
    '## Failed Samples',
    '',
  ];

  if (result.failedSamples.length === 0) {
    lines.push('No failed samples.', '');
  }

  result.failedSamples.forEach((sample, i) => {
    lines.push(
      `### Failed sample ${i + 1}`,
      '',
      `**Question**: ${sample.question}`,
      `**Category**: ${sample.category}`,
      `**Status**: ${sample.status}`,
      `**Has citations**: ${sample.hasCitations ? 'yes' : 'no'}`,
      ''
    );
    if (sample.error) {
      lines.push(`**Error**: ${sample.error}`);
    } else {
      lines.push(
        `**Answer**: ${sample.answer ? shorten(sample.answer, ANSWER_PREVIEW_CHARS) : '(empty)'}`
      );
    }
    lines.push('');
  });

  lines.push(
    '## Results',
    '',
    '| # | Question | Category | Citations | Success |',
    '|---|----------|----------|-----------|---------|'
  );

  result.results.forEach((r, i) => {
    const question = tableCell(shorten(r.question, QUESTION_COLUMN_CHARS));
    lines.push(
      `| ${i + 1} | ${question} | ${tableCell(r.category)} | ${r.hasCitations ? 'yes' : 'no'} | ${r.isSuccess ? 'yes' : 'no'} |`
    );
  });

  return lines.join('\n');
}
