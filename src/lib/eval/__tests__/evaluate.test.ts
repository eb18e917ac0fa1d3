/**
 * Tests for evaluation
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  evaluateQuestions,
  renderEvaluationReport,
  loadEvaluationQuestions,
} from '../evaluate';
import type { EvaluationResult } from '../evaluate';
import type { RAGOutcome, RAGResponse } from '@/lib/rag/service';
import { ConfigError } from '@/lib/errors';

// =============================================================================
// Test Setup
// =============================================================================

const CITATION = { title: 'HDB Lease', url: 'https://www.hdb.gov.sg/lease', snippet: 'Six months.' };

function respond(outcome: RAGOutcome): RAGResponse {
  return { ...outcome, timing: { traceId: 'trace', total_ms: 1 } };
}

function fakeService(...outcomes: RAGOutcome[]) {
  const query = vi.fn(async () => respond({ status: 'answered', answer: 'ok', citations: [CITATION] }));
  for (const outcome of outcomes) {
    query.mockResolvedValueOnce(respond(outcome));
  }
  return { query };
}

// =============================================================================
// evaluateQuestions
// =============================================================================

describe('evaluateQuestions', () => {
  it('should compute success and citation rates', async () => {
    const service = fakeService(
      { status: 'answered', answer: 'Six months.', citations: [CITATION] },
      { status: 'not_covered', reason: 'no_candidates', answer: 'Not covered.', citations: [] },
      {
        status: 'failed',
        kind: 'generation_failure',
        answer: 'Could not answer.',
        citations: [CITATION],
        error: 'Generation timed out after 60000ms',
      },
      { status: 'answered', answer: 'Yes.', citations: [CITATION] }
    );

    const result = await evaluateQuestions(
      [
        { question: 'q1', category: 'hdb' },
        { question: 'q2', category: 'hdb' },
        { question: 'q3', category: 'ura' },
        { question: 'q4', category: 'cea' },
      ],
      service
    );

    expect(result.total).toBe(4);
    expect(result.successCount).toBe(2);
    expect(result.successRate).toBe(50);
    expect(result.citationCount).toBe(3);
    expect(result.citationRate).toBe(75);
    expect(result.failedSamples.map((r) => r.question)).toEqual(['q2', 'q3']);
    expect(result.results[2].error).toBe('Generation timed out after 60000ms');
    expect(service.query).toHaveBeenCalledWith({ question: 'q1' });
  });

  it('should count a blank answer as a failure', async () => {
    const service = fakeService({ status: 'answered', answer: '  ', citations: [CITATION] });

    const result = await evaluateQuestions([{ question: 'q1', category: 'x' }], service);

    expect(result.successCount).toBe(0);
  });

  it('should report zero rates for no questions', async () => {
    const result = await evaluateQuestions([], fakeService());

    expect(result).toMatchObject({ total: 0, successRate: 0, citationRate: 0 });
  });
});

// =============================================================================
// renderEvaluationReport
// =============================================================================

describe('renderEvaluationReport', () => {
  const base: EvaluationResult = {
    total: 2,
    successCount: 1,
    successRate: 50,
    citationCount: 1,
    citationRate: 50,
    failedSamples: [],
    results: [],
  };

  const success = {
    question: 'What is the minimum lease term for renting out a whole HDB flat today?',
    category: 'hdb',
    status: 'answered' as const,
    answer: 'Six months.',
    citations: [CITATION],
    hasCitations: true,
    isSuccess: true,
  };

  const failure = {
    question: 'Can | I sublet?',
    category: 'ura',
    status: 'not_covered' as const,
    answer: '',
    citations: [],
    hasCitations: false,
    isSuccess: false,
  };

  it('should include the summary', () => {
    const report = renderEvaluationReport(
      { ...base, results: [success, failure], failedSamples: [failure] },
      new Date('2026-01-02T03:04:05.000Z')
    );

    expect(report).toContain('**Generated**: 2026-01-02T03:04:05.000Z');
    expect(report).toContain('- **Successful answers**: 1 (50.0%)');
    expect(report).toContain('- **Without citations**: 1');
  });

  it('should list failed samples with an empty-answer marker', () => {
    const report = renderEvaluationReport(
      { ...base, results: [failure], failedSamples: [failure] },
      new Date(0)
    );

    expect(report).toContain('### Failed sample 1\n\n**Question**: Can | I sublet?\n**Category**: ura');
    expect(report).toContain('**Answer**: (empty)');
  });

  it('should show the error for failed queries', () => {
    const failed = { ...failure, status: 'failed' as const, error: 'Model x unavailable: down' };

    const report = renderEvaluationReport(
      { ...base, results: [failed], failedSamples: [failed] },
      new Date(0)
    );

    expect(report).toContain('**Error**: Model x unavailable: down');
  });

  it('should say when nothing failed', () => {
    const report = renderEvaluationReport({ ...base, results: [success] }, new Date(0));

    expect(report).toContain('## Failed Samples\n\nNo failed samples.');
  });

  it('should truncate long questions and escape pipes in the table', () => {
    const report = renderEvaluationReport(
      { ...base, results: [success, failure], failedSamples: [failure] },
      new Date(0)
    );

    expect(report).toContain(
      '| 1 | What is the minimum lease term for renting out a w... | hdb | yes | yes |'
    );
    expect(report).toContain('| 2 | Can \\| I sublet? | ura | no | no |');
  });
});

// =============================================================================
// loadEvaluationQuestions
// =============================================================================

describe('loadEvaluationQuestions', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await fs.rm(dir, { recursive: true, force: true });
  });

  it('should default the category', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'eval-'));
    const file = path.join(dir, 'questions.json');
    await fs.writeFile(file, JSON.stringify([{ question: 'How long?' }]));

    expect(await loadEvaluationQuestions(file)).toEqual([{ question: 'How long?', category: 'unknown' }]);
  });

  it('should reject entries without a question', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'eval-'));
    const file = path.join(dir, 'questions.json');
    await fs.writeFile(file, JSON.stringify([{ category: 'hdb' }]));

    await expect(loadEvaluationQuestions(file)).rejects.toBeInstanceOf(ConfigError);
  });
});
