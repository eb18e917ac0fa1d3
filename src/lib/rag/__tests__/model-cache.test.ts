/**
 * Tests for ModelCache
 */

import { describe, it, expect, vi } from 'vitest';
import { ModelCache } from '../model-cache';
import { ModelUnavailableError } from '@/lib/errors';

describe('ModelCache', () => {
  it('should construct each model once', async () => {
    const loader = vi.fn((id: string) => ({ id }));
    const cache = new ModelCache('test', loader);

    const first = await cache.get('model-a');
    const second = await cache.get('model-a');

    expect(first).toBe(second);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('should share an in-flight load between concurrent callers', async () => {
    let resolve: (value: { id: string }) => void = () => undefined;
    const loader = vi.fn(
      () =>
        new Promise<{ id: string }>((r) => {
          resolve = r;
        })
    );
    const cache = new ModelCache('test', loader);

    const a = cache.get('model-a');
    const b = cache.get('model-a');
    resolve({ id: 'model-a' });

    expect(await a).toBe(await b);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('should keep separate instances per model id', async () => {
    const cache = new ModelCache('test', (id: string) => ({ id }));

    const a = await cache.get('model-a');
    const b = await cache.get('model-b');

    expect(a).not.toBe(b);
    expect(cache.size).toBe(2);
  });

  it('should wrap loader failures and not cache them', async () => {
    const loader = vi
      .fn<(id: string) => { id: string }>()
      .mockImplementationOnce(() => {
        throw new Error('weights not found');
      })
      .mockImplementationOnce((id) => ({ id }));
    const cache = new ModelCache('test', loader);

    await expect(cache.get('model-a')).rejects.toThrow(
      'Model model-a unavailable: weights not found'
    );
    expect(cache.has('model-a')).toBe(false);

    await expect(cache.get('model-a')).resolves.toEqual({ id: 'model-a' });
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it('should pass ModelUnavailableError through unchanged', async () => {
    const original = new ModelUnavailableError('model-a', 'no key');
    const cache = new ModelCache('test', () => Promise.reject(original));

    await expect(cache.get('model-a')).rejects.toBe(original);
  });

  it('should drop all instances on clear', async () => {
    const cache = new ModelCache('test', (id: string) => ({ id }));
    await cache.get('model-a');

    cache.clear();

    expect(cache.size).toBe(0);
  });
});
