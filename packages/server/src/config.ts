/**
 * Server configuration: reads from environment variables with sensible defaults.
 */

import {
  DEFAULT_DATASET,
  DEFAULT_MAX_ARTICLES,
  MAX_ALLOWED_ARTICLES,
  MAX_ARTICLE_LENGTH,
} from '@digestbench/core';
import { createLogger } from './lib/logger.js';

const log = createLogger('Config');

export interface ServerConfig {
  /** Port to listen on (default: 5000) */
  port: number;
  /** CORS allowed origin for /api/* */
  corsOrigin: string;
  /** Directory CSV exports are written to (default: 'results') */
  resultsDir: string;
  /** Dataset used when a start request names none */
  defaultDataset: string;
  defaultMaxArticles: number;
  maxAllowedArticles: number;
  /** Articles at or above this many characters are skipped */
  maxArticleLength: number;

  // ─── Dispatch Policy ────────────────────────────────────
  /** Per-attempt wait for a worker reply in ms (default: 240000) */
  summarizerTimeoutMs: number;
  /** Retries after the initial attempt (default: 1) */
  summarizerMaxRetries: number;
  /** Pause before each retry in ms (default: 2000) */
  summarizerRetryDelayMs: number;

  /** Pause between articles in ms (default: 1000) */
  articleIntervalMs: number;
  /** Run log lines kept per run (default: 1000) */
  logMaxEntries: number;
  /** Porter-stem tokens when scoring (default: true) */
  useStemmer: boolean;
  /** Hugging Face datasets-server rows endpoint */
  datasetRowsUrl: string;
  /** Per-page bound on rows requests in ms (default: 30000) */
  datasetFetchTimeoutMs: number;
}

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? String(fallback), 10);
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Read configuration from environment variables.
 */
export function getConfig(): ServerConfig {
  return {
    port: intFromEnv('PORT', 5000),
    corsOrigin: process.env['CORS_ORIGIN'] ?? 'http://localhost:5000',
    resultsDir: process.env['RESULTS_DIR'] || 'results',
    defaultDataset: process.env['DEFAULT_DATASET'] || DEFAULT_DATASET,
    defaultMaxArticles: intFromEnv('DEFAULT_MAX_ARTICLES', DEFAULT_MAX_ARTICLES),
    maxAllowedArticles: intFromEnv('MAX_ALLOWED_ARTICLES', MAX_ALLOWED_ARTICLES),
    maxArticleLength: intFromEnv('MAX_ARTICLE_LENGTH', MAX_ARTICLE_LENGTH),

    summarizerTimeoutMs: intFromEnv('SUMMARIZER_TIMEOUT_MS', 240_000),
    summarizerMaxRetries: intFromEnv('SUMMARIZER_MAX_RETRIES', 1),
    summarizerRetryDelayMs: intFromEnv('SUMMARIZER_RETRY_DELAY_MS', 2_000),

    articleIntervalMs: intFromEnv('ARTICLE_INTERVAL_MS', 1_000),
    logMaxEntries: intFromEnv('LOG_MAX_ENTRIES', 1_000),
    useStemmer: process.env['USE_STEMMER'] !== 'false',
    datasetRowsUrl: process.env['DATASET_ROWS_URL'] || 'https://datasets-server.huggingface.co/rows',
    datasetFetchTimeoutMs: intFromEnv('DATASET_FETCH_TIMEOUT_MS', 30_000),
  };
}

/**
 * Validate config at startup. Logs warnings and throws on fatal misconfigurations.
 */
export function validateConfig(config: ServerConfig): void {
  if (config.maxAllowedArticles < 1) {
    throw new Error(`FATAL: MAX_ALLOWED_ARTICLES must be at least 1 (got ${config.maxAllowedArticles}).`);
  }
  if (config.summarizerTimeoutMs <= 0) {
    throw new Error(`FATAL: SUMMARIZER_TIMEOUT_MS must be positive (got ${config.summarizerTimeoutMs}).`);
  }
  if (config.summarizerMaxRetries < 0 || config.summarizerRetryDelayMs < 0) {
    throw new Error('FATAL: SUMMARIZER_MAX_RETRIES and SUMMARIZER_RETRY_DELAY_MS must not be negative.');
  }
  if (config.datasetFetchTimeoutMs <= 0) {
    throw new Error(`FATAL: DATASET_FETCH_TIMEOUT_MS must be positive (got ${config.datasetFetchTimeoutMs}).`);
  }
  if (config.logMaxEntries < 1) {
    throw new Error(`FATAL: LOG_MAX_ENTRIES must be at least 1 (got ${config.logMaxEntries}).`);
  }
  try {
    new URL(config.datasetRowsUrl);
  } catch {
    throw new Error(`FATAL: DATASET_ROWS_URL is not a valid URL: ${config.datasetRowsUrl}`);
  }

  if (config.corsOrigin === '*') {
    log.warn('⚠️  CORS_ORIGIN=* lets any page drive evaluation runs. Set a specific origin outside development.');
  }
  if (config.defaultMaxArticles > config.maxAllowedArticles) {
    log.warn(
      `⚠️  DEFAULT_MAX_ARTICLES (${config.defaultMaxArticles}) exceeds MAX_ALLOWED_ARTICLES (${config.maxAllowedArticles}); runs will be clamped.`,
    );
  }
}
