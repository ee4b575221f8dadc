import type { MetricName } from './types.js';

/**
 * @digestbench/core: Shared Constants
 */

/** Dataset used when a start request names none */
export const DEFAULT_DATASET = 'cnn_dailymail';

/** Default number of articles per run */
export const DEFAULT_MAX_ARTICLES = 20;

/** Hard ceiling for articles per run */
export const MAX_ALLOWED_ARTICLES = 50;

/** Articles at or above this many characters are skipped when loading */
export const MAX_ARTICLE_LENGTH = 4000;

/** Metrics produced by the scorer, in reporting order */
export const METRIC_NAMES: readonly MetricName[] = ['rouge1', 'rouge2', 'rougeL'];

/** Run identity used when a client does not scope its requests */
export const DEFAULT_RUN_ID = 'default';
