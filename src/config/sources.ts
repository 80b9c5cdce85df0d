import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { SourceConfig } from '../types/adapter';

const SourceSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1).default('rss'),
  urls: z.array(z.string().url()).default([])
});

const SourcesFileSchema = z.object({
  sources: z.array(SourceSchema).default([])
});

/**
 * Parse the `{ "sources": [...] }` document; order is preserved
 */
export function parseSourcesConfig(raw: unknown): SourceConfig[] {
  const parsed = SourcesFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid sources config: ${details}`);
  }
  return parsed.data.sources;
}

/**
 * Read and validate the source list. Failures here are fatal to the process.
 */
export async function loadSourcesConfig(path: string): Promise<SourceConfig[]> {
  const text = await readFile(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(`Sources config ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseSourcesConfig(raw);
}
