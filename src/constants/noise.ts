import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

/**
 * Static noise lists (stopwords, buzzwords, page chrome, garbage patterns and
 * publisher name fragments). The bundled copy lives in data/noise-filter.json;
 * deployments may point NOISE_LISTS_PATH at their own file.
 */

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// src/constants (or dist/constants after build) -> project root
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const DEFAULT_NOISE_LISTS_PATH = path.join(PROJECT_ROOT, 'data', 'noise-filter.json');

export const NoiseListsSchema = z.object({
  stopwords: z.array(z.string()).default([]),
  buzzwords: z.array(z.string()).default([]),
  uiArtifacts: z.array(z.string()).default([]),
  garbagePatterns: z.array(z.string()).default([]),
  publisherFragments: z.array(z.string()).default([]),
});

export type NoiseLists = Readonly<z.infer<typeof NoiseListsSchema>>;

export const EMPTY_NOISE_LISTS: NoiseLists = Object.freeze({
  stopwords: [],
  buzzwords: [],
  uiArtifacts: [],
  garbagePatterns: [],
  publisherFragments: [],
});

export function loadNoiseLists(filePath: string = DEFAULT_NOISE_LISTS_PATH): NoiseLists {
  const raw = readFileSync(filePath, 'utf-8');
  return Object.freeze(NoiseListsSchema.parse(JSON.parse(raw)));
}
