/**
 * Vector Index
 *
 * Immutable, exact (flat) cosine-similarity index over document chunks.
 * Adding entries returns a new index, so readers holding a snapshot never
 * observe a partial write.
 */

import { IndexMismatchError } from '@/lib/errors';
import type { Candidate, DocumentChunk } from '@/types/rag';

// =============================================================================
// Types
// =============================================================================

export interface IndexEntry {
  chunk: DocumentChunk;
  vector: number[];
}

export interface IndexIdentity {
  dimensions: number;
  /** Id of the embedding model that produced the vectors */
  embeddingModel: string;
}

export interface MMROptions {
  /** Size of the similarity-ranked pool MMR selects from */
  fetchK: number;
  /** 1 = pure relevance, 0 = pure diversity */
  lambda: number;
}

// =============================================================================
// Vector Math
// =============================================================================

function norm(vector: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < vector.length; i++) {
    sum += vector[i] * vector[i];
  }
  return Math.sqrt(sum);
}

/**
 * Unit-normalise a vector. Zero vectors stay zero.
 */
function normalize(vector: ArrayLike<number>): Float32Array {
  const result = new Float32Array(vector.length);
  const n = norm(vector);
  if (n === 0) {
    return result;
  }
  for (let i = 0; i < vector.length; i++) {
    result[i] = vector[i] / n;
  }
  return result;
}

function dot(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Cosine similarity of two raw vectors of equal length.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  return dot(normalize(a), normalize(b));
}

// =============================================================================
// VectorIndex
// =============================================================================

export class VectorIndex {
  readonly dimensions: number;
  readonly embeddingModel: string;
  private readonly chunks: readonly DocumentChunk[];
  /** Raw vectors as stored (persisted verbatim) */
  private readonly raw: readonly Float32Array[];
  /** Unit vectors used for scoring */
  private readonly unit: readonly Float32Array[];

  private constructor(
    identity: IndexIdentity,
    chunks: readonly DocumentChunk[],
    raw: readonly Float32Array[],
    unit: readonly Float32Array[]
  ) {
    this.dimensions = identity.dimensions;
    this.embeddingModel = identity.embeddingModel;
    this.chunks = chunks;
    this.raw = raw;
    this.unit = unit;
  }

  static empty(identity: IndexIdentity): VectorIndex {
    if (!Number.isInteger(identity.dimensions) || identity.dimensions <= 0) {
      throw new RangeError(
        `Index dimensions must be a positive integer, got ${identity.dimensions}`
      );
    }
    return new VectorIndex(identity, [], [], []);
  }

  /**
   * Build an index from chunk/vector pairs.
   *
   * @throws IndexMismatchError when a vector has the wrong length
   */
  static fromEntries(identity: IndexIdentity, entries: IndexEntry[]): VectorIndex {
    return VectorIndex.empty(identity).withEntries(entries);
  }

  get size(): number {
    return this.chunks.length;
  }

  getChunk(position: number): DocumentChunk | undefined {
    return this.chunks[position];
  }

  getChunks(): readonly DocumentChunk[] {
    return this.chunks;
  }

  /** Stored vector at a position, as persisted */
  getVector(position: number): Float32Array | undefined {
    return this.raw[position];
  }

  /**
   * Return a new index with the entries appended in order.
   * The receiver is left untouched.
   *
   * @throws IndexMismatchError when a vector has the wrong length
   */
  withEntries(entries: IndexEntry[]): VectorIndex {
    if (entries.length === 0) {
      return this;
    }

    const raw: Float32Array[] = [];
    const unit: Float32Array[] = [];

    for (const entry of entries) {
      this.assertDimensions(entry.vector.length);
      const stored = Float32Array.from(entry.vector);
      raw.push(stored);
      unit.push(normalize(stored));
    }

    return new VectorIndex(
      { dimensions: this.dimensions, embeddingModel: this.embeddingModel },
      [...this.chunks, ...entries.map((e) => e.chunk)],
      [...this.raw, ...raw],
      [...this.unit, ...unit]
    );
  }

  /**
   * Top-k chunks by cosine similarity, highest first.
   * Equal scores keep insertion order.
   *
   * @throws IndexMismatchError when the query vector has the wrong length
   */
  search(query: number[], k: number): Candidate[] {
    this.assertDimensions(query.length);
    if (k <= 0 || this.size === 0) {
      return [];
    }

    return this.rank(normalize(query))
      .slice(0, k)
      .map(({ position, score }) => ({ chunk: this.chunks[position], score }));
  }

  /**
   * Maximal marginal relevance search.
   *
   * Takes the `fetchK` most similar chunks, then greedily picks the one
   * maximising `lambda * sim(query) - (1 - lambda) * max sim(selected)`.
   * Ties go to the more similar candidate. Returned scores are query
   * similarities, in selection order.
   *
   * @throws IndexMismatchError when the query vector has the wrong length
   */
  searchMMR(query: number[], k: number, options: MMROptions): Candidate[] {
    this.assertDimensions(query.length);
    const { lambda } = options;
    if (k <= 0 || this.size === 0) {
      return [];
    }

    const pool = this.rank(normalize(query)).slice(0, Math.max(options.fetchK, k));
    const selected: Array<{ position: number; score: number }> = [];
    const remaining = [...pool];
    // Highest similarity of each remaining candidate to anything selected so far
    const redundancy = new Array<number>(remaining.length).fill(-Infinity);

    while (selected.length < k && remaining.length > 0) {
      let bestIndex = 0;
      let bestValue = -Infinity;

      for (let i = 0; i < remaining.length; i++) {
        const penalty = selected.length === 0 ? 0 : redundancy[i];
        const value = lambda * remaining[i].score - (1 - lambda) * penalty;
        if (value > bestValue) {
          bestValue = value;
          bestIndex = i;
        }
      }

      const [picked] = remaining.splice(bestIndex, 1);
      redundancy.splice(bestIndex, 1);
      selected.push(picked);

      const pickedUnit = this.unit[picked.position];
      for (let i = 0; i < remaining.length; i++) {
        const sim = dot(this.unit[remaining[i].position], pickedUnit);
        if (sim > redundancy[i]) {
          redundancy[i] = sim;
        }
      }
    }

    return selected.map(({ position, score }) => ({ chunk: this.chunks[position], score }));
  }

  private rank(queryUnit: Float32Array): Array<{ position: number; score: number }> {
    const scored = this.unit.map((vector, position) => ({
      position,
      score: dot(vector, queryUnit),
    }));
    // Array.prototype.sort is stable: ties stay in insertion order
    return scored.sort((a, b) => b.score - a.score);
  }

  private assertDimensions(actual: number): void {
    if (actual !== this.dimensions) {
      throw new IndexMismatchError(this.dimensions, actual);
    }
  }
}
