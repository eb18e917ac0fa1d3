/**
 * Tests for source list loading
 */

import { describe, it, expect, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { loadSources, parseSources } from '../sources';
import { ConfigError } from '@/lib/errors';

describe('parseSources', () => {
  it('should default missing title and category to empty strings', () => {
    expect(parseSources([{ url: 'https://www.hdb.gov.sg/a' }])).toEqual([
      { url: 'https://www.hdb.gov.sg/a', title: '', category: '' },
    ]);
  });

  it('should name invalid entries', () => {
    expect(() => parseSources([{ url: 'not a url' }], 'urls.json')).toThrow(
      'Invalid configuration: urls.json[0.url]: Invalid url'
    );
  });

  it('should reject a non-array document', () => {
    expect(() => parseSources({ url: 'https://www.hdb.gov.sg/a' })).toThrow(ConfigError);
  });
});

describe('loadSources', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await fs.rm(dir, { recursive: true, force: true });
  });

  it('should read a JSON file', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sources-'));
    const file = path.join(dir, 'urls.json');
    await fs.writeFile(
      file,
      JSON.stringify([{ url: 'https://www.ura.gov.sg/b', title: 'URA', category: 'private' }])
    );

    expect(await loadSources(file)).toEqual([
      { url: 'https://www.ura.gov.sg/b', title: 'URA', category: 'private' },
    ]);
  });

  it('should report malformed JSON as a configuration error', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sources-'));
    const file = path.join(dir, 'urls.json');
    await fs.writeFile(file, '[{');

    await expect(loadSources(file)).rejects.toBeInstanceOf(ConfigError);
  });
});
