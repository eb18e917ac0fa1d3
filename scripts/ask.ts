/**
 * Ask one question from the command line.
 *
 * Usage: npm run ask -- "What is the minimum lease term?" [--identity=Student]
 *
 * Environment:
 *   OPENAI_API_KEY - For generation (and embeddings unless EMBEDDING_API_KEY is set)
 *   RERANK_BASE_URL - Cross-encoder rerank endpoint
 */

import { getFlag, getPositionals } from '@/lib/cli-args';
import { createRAGContext, createRAGService, formatSourcesSection } from '@/lib/rag';
import { loadSettings } from '@/lib/settings';

async function main() {
  const args = process.argv.slice(2);
  const question = getPositionals(args).join(' ').trim();
  const identity = getFlag(args, 'identity');

  if (!question) {
    throw new Error('Usage: npm run ask -- "your question" [--identity=Student]');
  }

  const ctx = await createRAGContext(loadSettings());
  const service = createRAGService(ctx);

  const result = await service.query(
    { question, identity },
    { onStatus: (status) => console.error(`[${status}]`) }
  );

  console.log(`\n${result.answer}\n`);
  const sources = formatSourcesSection(result.citations);
  if (sources) {
    console.log(sources);
  }

  if (result.status === 'failed') {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
