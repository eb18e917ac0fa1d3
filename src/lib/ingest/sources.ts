/**
 * Source list loading (data/urls.json).
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { ConfigError } from '@/lib/errors';

const sourceEntrySchema = z.object({
  url: z.string().url(),
  title: z.string().default(''),
  category: z.string().default(''),
});

const sourceListSchema = z.array(sourceEntrySchema);

export type SourceEntry = z.infer<typeof sourceEntrySchema>;

/**
 * Parse a source list.
 *
 * @throws ConfigError naming each invalid entry
 */
export function parseSources(data: unknown, origin = 'sources'): SourceEntry[] {
  const parsed = sourceListSchema.safeParse(data);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${origin}[${issue.path.join('.')}]: ${issue.message}`)
    );
  }

  return parsed.data;
}

/**
 * Read and validate a JSON source list from disk.
 */
export async function loadSources(filePath: string): Promise<SourceEntry[]> {
  const raw = await fs.readFile(filePath, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`${filePath}: ${message}`]);
  }

  return parseSources(data, filePath);
}
