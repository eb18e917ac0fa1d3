/**
 * Fetch the configured pages and build or extend the vector index.
 *
 * Usage: npm run ingest -- [--urls=./data/urls.json] [--chunk-size=500]
 *        [--chunk-overlap=100] [--index-dir=./data/index] [--rebuild]
 *
 * Environment:
 *   EMBEDDING_API_KEY or OPENAI_API_KEY - For generating embeddings
 *   INDEX_DIR, INDEX_NAME - Where the index is written
 */

import { getFlag, getIntFlag, hasFlag } from '@/lib/cli-args';
import { ingestDocuments, loadSources, WebPageLoader } from '@/lib/ingest';
import { VectorStore, createEmbeddingProvider } from '@/lib/rag';
import { loadSettings } from '@/lib/settings';

async function main() {
  const args = process.argv.slice(2);
  const settings = loadSettings();

  const urlsPath = getFlag(args, 'urls') ?? './data/urls.json';
  const chunkSize = getIntFlag(args, 'chunk-size') ?? settings.chunking.chunkSize;
  const chunkOverlap = getIntFlag(args, 'chunk-overlap') ?? settings.chunking.chunkOverlap;
  const indexDir = getFlag(args, 'index-dir') ?? settings.index.dir;
  const rebuild = hasFlag(args, 'rebuild');

  if (chunkOverlap >= chunkSize) {
    throw new Error(`--chunk-overlap (${chunkOverlap}) must be smaller than --chunk-size (${chunkSize})`);
  }

  const sources = await loadSources(urlsPath);
  console.log(`Loaded ${sources.length} URLs from ${urlsPath}`);

  const embeddings = createEmbeddingProvider(settings.embedding);
  const store = await VectorStore.open(indexDir, settings.index.name, {
    embeddingModel: embeddings.modelId,
    dimensions: embeddings.dimensions,
  });

  const report = await ingestDocuments(
    sources,
    { loader: new WebPageLoader(), store, embeddings },
    { chunkSize, chunkOverlap, rebuild }
  );

  console.log('\nIngestion summary:');
  console.log(`  - Processed: ${report.processed} documents`);
  console.log(`  - Chunks:    ${report.chunks}`);
  console.log(`  - Index:     ${report.indexSize} chunks in ${indexDir}/${settings.index.name}`);
  console.log(`  - Failed:    ${report.failed.length} URLs`);

  for (const item of report.failed) {
    console.log(`      ${item.url}: ${item.reason}`);
  }

  if (report.processed === 0) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
