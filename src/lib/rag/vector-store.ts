/**
 * Vector Index Store
 *
 * Builds, extends and persists VectorIndex snapshots.
 *
 * On-disk layout (both files in one directory):
 * - `{name}.vectors`: 16-byte header (magic "RVEC", uint32 version,
 *   uint32 dimensions, uint32 count), then count x dimensions float32 LE
 * - `{name}.json`: sidecar with identity, the SHA-256 of the vectors file
 *   and the chunk list
 *
 * The sidecar is written last and pins the vectors file by checksum, so a
 * torn pair never loads.
 */

import { createHash, randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError, MalformedIndexError } from '@/lib/errors';
import { createLayerLogger, describeError } from '@/lib/logger';
import type { DocumentChunk } from '@/types/rag';
import type { EmbeddingProvider } from './embeddings';
import { VectorIndex } from './vector-index';

const log = createLayerLogger('index').child({ service: 'VectorStore' });

// =============================================================================
// Format
// =============================================================================

const MAGIC = 'RVEC';
const FORMAT_NAME = 'rental-rag-index';
const FORMAT_VERSION = 1;
const HEADER_BYTES = 16;

const chunkSchema = z.object({
  content: z.string(),
  metadata: z.object({
    title: z.string(),
    url: z.string(),
    category: z.string(),
    source: z.string().optional(),
    fetchedAt: z.string().optional(),
  }),
});

const sidecarSchema = z.object({
  format: z.literal(FORMAT_NAME),
  version: z.literal(FORMAT_VERSION),
  dimensions: z.number().int().positive(),
  count: z.number().int().nonnegative(),
  embeddingModel: z.string().min(1),
  checksum: z.string().regex(/^[0-9a-f]{64}$/),
  createdAt: z.string(),
  chunks: z.array(chunkSchema),
});

type Sidecar = z.infer<typeof sidecarSchema>;

export interface IndexPaths {
  vectors: string;
  sidecar: string;
}

export function getIndexPaths(dir: string, indexName: string): IndexPaths {
  return {
    vectors: path.join(dir, `${indexName}.vectors`),
    sidecar: path.join(dir, `${indexName}.json`),
  };
}

function sha256(data: Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

function encodeVectors(index: VectorIndex): Buffer {
  const { dimensions, size } = index;
  const buffer = Buffer.alloc(HEADER_BYTES + size * dimensions * 4);

  buffer.write(MAGIC, 0, 'ascii');
  buffer.writeUInt32LE(FORMAT_VERSION, 4);
  buffer.writeUInt32LE(dimensions, 8);
  buffer.writeUInt32LE(size, 12);

  let offset = HEADER_BYTES;
  for (let row = 0; row < size; row++) {
    const vector = index.getVector(row);
    if (!vector) {
      throw new Error(`Index is missing vector ${row}`);
    }
    for (let i = 0; i < dimensions; i++) {
      buffer.writeFloatLE(vector[i], offset);
      offset += 4;
    }
  }

  return buffer;
}

function decodeVectors(buffer: Buffer): { dimensions: number; vectors: number[][] } {
  if (buffer.length < HEADER_BYTES || buffer.toString('ascii', 0, 4) !== MAGIC) {
    throw new MalformedIndexError('corrupt', 'Vectors file has no valid header');
  }

  const version = buffer.readUInt32LE(4);
  if (version !== FORMAT_VERSION) {
    throw new MalformedIndexError('corrupt', `Unsupported vectors file version ${version}`);
  }

  const dimensions = buffer.readUInt32LE(8);
  const count = buffer.readUInt32LE(12);
  const expectedBytes = HEADER_BYTES + dimensions * count * 4;
  if (buffer.length !== expectedBytes) {
    throw new MalformedIndexError(
      'corrupt',
      `Vectors file is ${buffer.length} bytes, header implies ${expectedBytes}`
    );
  }

  const vectors: number[][] = [];
  let offset = HEADER_BYTES;
  for (let row = 0; row < count; row++) {
    const vector = new Array<number>(dimensions);
    for (let i = 0; i < dimensions; i++) {
      vector[i] = buffer.readFloatLE(offset);
      offset += 4;
    }
    vectors.push(vector);
  }

  return { dimensions, vectors };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// =============================================================================
// Load
// =============================================================================

export interface LoadIndexOptions {
  /** Refuse an index built with a different embedding model */
  embeddingModel?: string;
  /** Refuse an index of a different dimensionality */
  dimensions?: number;
}

/**
 * Read and validate a persisted index.
 *
 * @returns null when either file is missing
 * @throws MalformedIndexError when the files are unreadable or disagree
 */
export async function readIndex(dir: string, indexName: string): Promise<VectorIndex | null> {
  const paths = getIndexPaths(dir, indexName);

  let sidecarText: string;
  let vectorBytes: Buffer;
  try {
    [sidecarText, vectorBytes] = await Promise.all([
      fs.readFile(paths.sidecar, 'utf-8'),
      fs.readFile(paths.vectors),
    ]);
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw new MalformedIndexError('corrupt', 'Index files could not be read', error);
  }

  let sidecar: Sidecar;
  try {
    sidecar = sidecarSchema.parse(JSON.parse(sidecarText));
  } catch (error) {
    throw new MalformedIndexError('corrupt', 'Index sidecar is not valid', error);
  }

  if (sha256(vectorBytes) !== sidecar.checksum) {
    throw new MalformedIndexError('inconsistent', 'Vectors file does not match sidecar checksum');
  }

  const { dimensions, vectors } = decodeVectors(vectorBytes);

  if (dimensions !== sidecar.dimensions) {
    throw new MalformedIndexError(
      'inconsistent',
      `Vectors file has ${dimensions} dimensions, sidecar records ${sidecar.dimensions}`
    );
  }
  if (vectors.length !== sidecar.count || sidecar.chunks.length !== sidecar.count) {
    throw new MalformedIndexError(
      'inconsistent',
      `Counts disagree: ${vectors.length} vectors, ${sidecar.chunks.length} chunks, sidecar count ${sidecar.count}`
    );
  }

  return VectorIndex.fromEntries(
    { dimensions, embeddingModel: sidecar.embeddingModel },
    sidecar.chunks.map((chunk, i) => ({ chunk, vector: vectors[i] }))
  );
}

/**
 * Load a persisted index for serving.
 *
 * Returns null, and logs the reason, when the index is missing, malformed,
 * built for another embedding model, or empty. Callers treat all of these
 * as "no index".
 */
export async function loadIndex(
  dir: string,
  indexName: string,
  options: LoadIndexOptions = {}
): Promise<VectorIndex | null> {
  const logContext = { dir, indexName };
  let index: VectorIndex | null;

  try {
    index = await readIndex(dir, indexName);
  } catch (error) {
    if (error instanceof MalformedIndexError) {
      log.error(
        { event: `index_${error.reason}`, ...logContext, ...describeError(error) },
        'Persisted index is malformed'
      );
      return null;
    }
    throw error;
  }

  if (!index) {
    log.warn({ event: 'index_missing', ...logContext }, 'No persisted index found');
    return null;
  }

  if (
    (options.embeddingModel !== undefined && options.embeddingModel !== index.embeddingModel) ||
    (options.dimensions !== undefined && options.dimensions !== index.dimensions)
  ) {
    log.error(
      {
        event: 'index_model_mismatch',
        ...logContext,
        indexModel: index.embeddingModel,
        indexDimensions: index.dimensions,
        expectedModel: options.embeddingModel,
        expectedDimensions: options.dimensions,
      },
      'Persisted index was built with a different embedding model'
    );
    return null;
  }

  if (index.size === 0) {
    log.warn({ event: 'index_empty', ...logContext }, 'Persisted index holds no vectors');
    return null;
  }

  log.info(
    { event: 'index_loaded', ...logContext, count: index.size, dimensions: index.dimensions },
    'Loaded vector index'
  );
  return index;
}

// =============================================================================
// Build
// =============================================================================

/**
 * Embed chunk contents and build a fresh index.
 *
 * @throws ModelUnavailableError when embedding fails
 */
export async function createIndexFromChunks(
  chunks: DocumentChunk[],
  embeddings: EmbeddingProvider
): Promise<VectorIndex> {
  const empty = VectorIndex.empty({
    dimensions: embeddings.dimensions,
    embeddingModel: embeddings.modelId,
  });
  return addChunksToIndex(empty, chunks, embeddings);
}

/**
 * Embed chunks and return a new snapshot with them appended.
 * Duplicate content is not detected.
 *
 * @throws ConfigError when the provider is not the model the index was built with
 * @throws ModelUnavailableError when embedding fails
 */
export async function addChunksToIndex(
  index: VectorIndex,
  chunks: DocumentChunk[],
  embeddings: EmbeddingProvider
): Promise<VectorIndex> {
  if (embeddings.modelId !== index.embeddingModel) {
    throw new ConfigError([
      `EMBEDDING_MODEL: index was built with ${index.embeddingModel}, provider uses ${embeddings.modelId}`,
    ]);
  }
  if (chunks.length === 0) {
    return index;
  }

  const start = Date.now();
  const vectors = await embeddings.embedDocuments(chunks.map((c) => c.content));
  const next = index.withEntries(chunks.map((chunk, i) => ({ chunk, vector: vectors[i] })));

  log.info(
    { event: 'index_extended', added: chunks.length, total: next.size, duration_ms: Date.now() - start },
    'Added chunks to index'
  );
  return next;
}

// =============================================================================
// Save
// =============================================================================

async function writeAtomic(target: string, data: Buffer | string): Promise<void> {
  const temp = `${target}.${randomUUID()}.tmp`;
  try {
    await fs.writeFile(temp, data);
    await fs.rename(temp, target);
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw error;
  }
}

/**
 * Persist an index. Each file is written under a temporary name and renamed
 * into place; the sidecar goes last.
 */
export async function saveIndex(index: VectorIndex, dir: string, indexName: string): Promise<void> {
  const paths = getIndexPaths(dir, indexName);
  await fs.mkdir(dir, { recursive: true });

  const vectorBytes = encodeVectors(index);
  const sidecar: Sidecar = {
    format: FORMAT_NAME,
    version: FORMAT_VERSION,
    dimensions: index.dimensions,
    count: index.size,
    embeddingModel: index.embeddingModel,
    checksum: sha256(vectorBytes),
    createdAt: new Date().toISOString(),
    chunks: [...index.getChunks()],
  };

  await writeAtomic(paths.vectors, vectorBytes);
  await writeAtomic(paths.sidecar, JSON.stringify(sidecar));

  log.info(
    { event: 'index_saved', dir, indexName, count: index.size, dimensions: index.dimensions },
    'Saved vector index'
  );
}

// =============================================================================
// VectorStore
// =============================================================================

/**
 * Serving holder for the current index snapshot.
 *
 * Reads return whatever snapshot is current. Writes run one at a time and
 * swap in a new snapshot when they complete.
 */
export class VectorStore {
  private snapshot: VectorIndex | null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly dir: string,
    private readonly indexName: string,
    initial: VectorIndex | null = null
  ) {
    this.snapshot = initial;
  }

  /**
   * Open the store, loading any valid persisted index for the given model.
   */
  static async open(
    dir: string,
    indexName: string,
    options: LoadIndexOptions = {}
  ): Promise<VectorStore> {
    return new VectorStore(dir, indexName, await loadIndex(dir, indexName, options));
  }

  /**
   * Current snapshot, or null when there is none or it holds no vectors.
   */
  current(): VectorIndex | null {
    return this.snapshot && this.snapshot.size > 0 ? this.snapshot : null;
  }

  /**
   * Embed and append chunks, creating the index when none exists.
   */
  addChunks(chunks: DocumentChunk[], embeddings: EmbeddingProvider): Promise<VectorIndex> {
    return this.enqueue(async () => {
      const next = this.snapshot
        ? await addChunksToIndex(this.snapshot, chunks, embeddings)
        : await createIndexFromChunks(chunks, embeddings);
      this.snapshot = next;
      return next;
    });
  }

  replace(index: VectorIndex | null): Promise<void> {
    return this.enqueue(async () => {
      this.snapshot = index;
    });
  }

  /**
   * Persist the current snapshot. A store with no snapshot writes nothing.
   */
  save(): Promise<void> {
    return this.enqueue(async () => {
      if (this.snapshot) {
        await saveIndex(this.snapshot, this.dir, this.indexName);
      }
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // Keep the queue alive after a failed write; the caller still sees the rejection
    this.queue = run.catch(() => undefined);
    return run;
  }
}
