/**
 * Tests for Retriever
 */

import { describe, it, expect } from 'vitest';
import { Retriever } from '../retriever';
import { createIndexFromChunks } from '../vector-store';
import { FakeEmbeddingProvider, makeChunk } from './fakes';

const chunks = [
  makeChunk('Minimum lease term for HDB flats is six months.'),
  makeChunk('Minimum lease term for private homes is three months.'),
  makeChunk('Occupancy caps limit the number of tenants per flat.'),
  makeChunk('Estate agents must be licensed.'),
];

async function setup() {
  const embeddings = new FakeEmbeddingProvider();
  const index = await createIndexFromChunks(chunks, embeddings);
  return { embeddings, index };
}

describe('Retriever', () => {
  it('should return at most k candidates', async () => {
    const { embeddings, index } = await setup();
    const retriever = new Retriever(index, embeddings, { k: 2 });

    const results = await retriever.retrieve('minimum lease term');

    expect(results).toHaveLength(2);
  });

  it('should return every chunk when k exceeds the index size', async () => {
    const { embeddings, index } = await setup();
    const retriever = new Retriever(index, embeddings, { k: 15 });

    expect(await retriever.retrieve('lease')).toHaveLength(4);
  });

  it('should order candidates by descending similarity', async () => {
    const { embeddings, index } = await setup();
    const retriever = new Retriever(index, embeddings, { k: 4 });

    const results = await retriever.retrieve('Estate agents must be licensed.');

    expect(results[0].chunk.content).toBe('Estate agents must be licensed.');
    const scores = results.map((r) => r.score);
    expect(scores).toEqual([...scores].sort((a, b) => b - a));
  });

  it('should be deterministic for similarity and MMR search', async () => {
    const { embeddings, index } = await setup();
    const similarity = new Retriever(index, embeddings, { k: 3 });
    const mmr = new Retriever(index, embeddings, { k: 3, searchType: 'mmr' });

    expect(await similarity.retrieve('lease term')).toEqual(await similarity.retrieve('lease term'));
    expect(await mmr.retrieve('lease term')).toEqual(await mmr.retrieve('lease term'));
  });

  it('should embed the query through the provider', async () => {
    const { embeddings, index } = await setup();
    const retriever = new Retriever(index, embeddings);

    await retriever.retrieve('occupancy cap');

    expect(embeddings.embedQuery).toHaveBeenCalledWith('occupancy cap');
  });
});
