/**
 * Dataset loader
 *
 * Pulls test-split rows from the Hugging Face datasets-server rows API and
 * turns them into articles. Loading never throws: unknown keys, network
 * failures and malformed pages all end in the bundled sample articles.
 */

import { z } from 'zod';
import { getErrorMessage } from '@digestbench/core';
import type { Article, DatasetInfo } from '@digestbench/core';
import { createLogger } from '../logger.js';
import { SAMPLE_DATASET_KEY, getDatasetInfo } from './catalog.js';
import { sampleArticles } from './sample-articles.js';

const log = createLogger('DatasetLoader');

/** The rows API serves at most this many rows per page */
const PAGE_SIZE = 100;

/** Pages scanned before giving up on finding enough short articles */
const MAX_PAGES = 10;

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

export interface ArticleSource {
  load(datasetKey: string, maxCount: number): Promise<Article[]>;
}

export interface DatasetLoaderOptions {
  rowsUrl: string;
  maxArticleLength: number;
  /** Bound on each rows request, body included (default: 30000) */
  fetchTimeoutMs?: number;
  fetch?: typeof globalThis.fetch;
}

const rowsPageSchema = z.object({
  rows: z.array(
    z.object({
      row_idx: z.number().int(),
      row: z.record(z.unknown()),
    }),
  ),
  num_rows_total: z.number().int().optional(),
});

/**
 * Text of a row field. List-valued fields are joined with spaces;
 * anything else that is not a string is treated as missing.
 */
export function fieldText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
    return value.join(' ');
  }
  return null;
}

export class DatasetLoader implements ArticleSource {
  private readonly rowsUrl: string;
  private readonly maxArticleLength: number;
  private readonly fetchTimeoutMs: number;
  private readonly fetchFn: typeof globalThis.fetch;

  constructor(options: DatasetLoaderOptions) {
    this.rowsUrl = options.rowsUrl;
    this.maxArticleLength = options.maxArticleLength;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? globalThis.fetch;
  }

  async load(datasetKey: string, maxCount: number): Promise<Article[]> {
    const info = getDatasetInfo(datasetKey);
    if (!info) {
      log.warn(`Unknown dataset ${datasetKey}, falling back to sample articles`);
      return sampleArticles(maxCount);
    }
    if (info.key === SAMPLE_DATASET_KEY) return sampleArticles(maxCount);

    try {
      const articles = await this.fetchArticles(info, maxCount);
      if (articles.length === 0) {
        log.warn(`No usable articles in ${info.displayName}, falling back to sample articles`);
        return sampleArticles(maxCount);
      }
      log.info(`Loaded ${articles.length} articles from ${info.displayName}`);
      return articles;
    } catch (err) {
      log.error(`Error loading dataset ${datasetKey}: ${getErrorMessage(err)}`);
      return sampleArticles(maxCount);
    }
  }

  private async fetchArticles(info: DatasetInfo, maxCount: number): Promise<Article[]> {
    const articles: Article[] = [];

    for (let page = 0; page < MAX_PAGES && articles.length < maxCount; page++) {
      const rows = await this.fetchPage(info, page * PAGE_SIZE);
      for (const { row_idx, row } of rows) {
        if (articles.length >= maxCount) break;
        const articleText = fieldText(row[info.articleField]);
        const referenceSummary = fieldText(row[info.summaryField]);
        if (articleText === null || referenceSummary === null) continue;
        if (articleText.length >= this.maxArticleLength) continue;
        articles.push({ id: row_idx, articleText, referenceSummary, datasetTag: info.key });
      }
      if (rows.length < PAGE_SIZE) break;
    }

    return articles;
  }

  private async fetchPage(info: DatasetInfo, offset: number) {
    const url = new URL(this.rowsUrl);
    url.searchParams.set('dataset', info.sourceIdentifier);
    url.searchParams.set('config', info.version ?? 'default');
    url.searchParams.set('split', info.split ?? 'test');
    url.searchParams.set('offset', String(offset));
    url.searchParams.set('length', String(PAGE_SIZE));

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.fetchTimeoutMs);
    const timedOut = rejectOnAbort(controller.signal, `Rows request timed out after ${this.fetchTimeoutMs}ms`);

    try {
      const res = await Promise.race([
        this.fetchFn(url.toString(), { headers: { Accept: 'application/json' }, signal: controller.signal }),
        timedOut,
      ]);
      if (!res.ok) {
        throw new Error(`Rows request failed with HTTP ${res.status}`);
      }
      const body: unknown = await Promise.race([res.json(), timedOut]);
      return rowsPageSchema.parse(body).rows;
    } finally {
      clearTimeout(timeout);
    }
  }
}

/** Rejects with `message` once `signal` aborts; never settles otherwise */
function rejectOnAbort(signal: AbortSignal, message: string): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error(message)), { once: true });
  });
}
