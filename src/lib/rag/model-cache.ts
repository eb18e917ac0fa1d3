/**
 * Model Cache
 *
 * Process-lifetime cache of expensive model handles, one per model id.
 * Construction is lazy; concurrent first requests share one in-flight load,
 * and a failed load is evicted so the next request retries.
 */

import { ModelUnavailableError } from '@/lib/errors';
import { createLayerLogger, describeError } from '@/lib/logger';

const log = createLayerLogger('rag').child({ service: 'ModelCache' });

export type ModelLoader<T> = (modelId: string) => T | Promise<T>;

export class ModelCache<T> {
  private readonly instances = new Map<string, Promise<T>>();

  constructor(
    private readonly kind: string,
    private readonly loader: ModelLoader<T>
  ) {}

  /**
   * Get the cached instance for a model id, loading it on first use.
   *
   * @throws ModelUnavailableError when the loader fails
   */
  get(modelId: string): Promise<T> {
    const existing = this.instances.get(modelId);
    if (existing) {
      return existing;
    }

    const pending = this.load(modelId);
    this.instances.set(modelId, pending);

    // Evict after the map entry is in place, so a synchronous loader failure is not cached
    void pending.catch(() => {
      if (this.instances.get(modelId) === pending) {
        this.instances.delete(modelId);
      }
    });

    return pending;
  }

  has(modelId: string): boolean {
    return this.instances.has(modelId);
  }

  get size(): number {
    return this.instances.size;
  }

  clear(): void {
    this.instances.clear();
  }

  private async load(modelId: string): Promise<T> {
    const start = Date.now();
    try {
      const instance = await this.loader(modelId);
      log.info(
        { event: 'model_loaded', kind: this.kind, model: modelId, duration_ms: Date.now() - start },
        `Loaded ${this.kind} model`
      );
      return instance;
    } catch (error) {
      log.error(
        { event: 'model_load_failed', kind: this.kind, model: modelId, ...describeError(error) },
        `Failed to load ${this.kind} model`
      );
      if (error instanceof ModelUnavailableError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ModelUnavailableError(modelId, message, error);
    }
  }
}
