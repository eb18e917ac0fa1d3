/**
 * Run the evaluation question set and write a Markdown report.
 *
 * Usage: npm run evaluate -- [--questions=./data/evaluation_questions.json]
 *        [--output=./evaluation_report.md]
 *
 * Environment:
 *   OPENAI_API_KEY - For generation (and embeddings unless EMBEDDING_API_KEY is set)
 *   RERANK_BASE_URL - Cross-encoder rerank endpoint
 */

import { promises as fs } from 'fs';
import { getFlag } from '@/lib/cli-args';
import { evaluateQuestions, loadEvaluationQuestions, renderEvaluationReport } from '@/lib/eval/evaluate';
import { createRAGContext, createRAGService } from '@/lib/rag';
import { loadSettings } from '@/lib/settings';

async function main() {
  const args = process.argv.slice(2);
  const questionsPath = getFlag(args, 'questions') ?? './data/evaluation_questions.json';
  const outputPath = getFlag(args, 'output') ?? './evaluation_report.md';

  const settings = loadSettings();
  const questions = await loadEvaluationQuestions(questionsPath);
  console.log(`Loaded ${questions.length} evaluation questions`);

  const ctx = await createRAGContext(settings);
  if (!ctx.store.current()) {
    throw new Error('No vector index found. Run `npm run ingest` first.');
  }

  const result = await evaluateQuestions(questions, createRAGService(ctx));
  await fs.writeFile(outputPath, renderEvaluationReport(result, new Date()), 'utf-8');

  console.log('\nEvaluation complete:');
  console.log(`  - Success rate:  ${result.successRate.toFixed(1)}%`);
  console.log(`  - Citation rate: ${result.citationRate.toFixed(1)}%`);
  console.log(`  - Failed:        ${result.failedSamples.length}`);
  console.log(`  - Report:        ${outputPath}`);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
