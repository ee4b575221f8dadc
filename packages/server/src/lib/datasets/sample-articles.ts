/**
 * Bundled sample articles, served when no remote dataset can be loaded.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Article } from '@digestbench/core';
import { SAMPLE_DATASET_KEY } from './catalog.js';

const SAMPLE_FILE = fileURLToPath(new URL('../../../data/sample-articles.json', import.meta.url));

const sampleArticleSchema = z.array(
  z.object({
    id: z.number().int(),
    articleText: z.string(),
    referenceSummary: z.string(),
  }),
);

let cached: Article[] | null = null;

export function loadSampleArticles(): Article[] {
  if (!cached) {
    const parsed = sampleArticleSchema.parse(JSON.parse(readFileSync(SAMPLE_FILE, 'utf-8')));
    cached = parsed.map((a) => ({ ...a, datasetTag: SAMPLE_DATASET_KEY }));
  }
  return cached.map((a) => ({ ...a }));
}

export function sampleArticles(maxCount: number): Article[] {
  return loadSampleArticles().slice(0, Math.max(0, maxCount));
}
