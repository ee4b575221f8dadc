/**
 * Dataset catalog: the datasets a run may name.
 */

import type { DatasetInfo } from '@digestbench/core';

export const SAMPLE_DATASET_KEY = 'sample';

export const DATASET_CATALOG: readonly DatasetInfo[] = [
  {
    key: 'cnn_dailymail',
    displayName: 'CNN/DailyMail',
    sourceIdentifier: 'cnn_dailymail',
    version: '3.0.0',
    split: 'test',
    articleField: 'article',
    summaryField: 'highlights',
    description: 'News articles with human-written summaries',
  },
  {
    key: 'xsum',
    displayName: 'XSum (BBC)',
    sourceIdentifier: 'xsum',
    version: null,
    split: 'test',
    articleField: 'document',
    summaryField: 'summary',
    description: 'BBC articles with single-sentence summaries',
  },
  {
    key: 'reddit_tifu',
    displayName: 'Reddit TIFU',
    sourceIdentifier: 'reddit_tifu',
    version: 'long',
    split: 'test',
    articleField: 'documents',
    summaryField: 'tldr',
    description: 'Reddit posts with TL;DR summaries',
  },
  {
    key: 'multi_news',
    displayName: 'Multi-News',
    sourceIdentifier: 'multi_news',
    version: null,
    split: 'test',
    articleField: 'document',
    summaryField: 'summary',
    description: 'Multi-document news summarization',
  },
  {
    key: SAMPLE_DATASET_KEY,
    displayName: 'Sample Articles',
    sourceIdentifier: SAMPLE_DATASET_KEY,
    version: null,
    split: null,
    articleField: 'article',
    summaryField: 'reference_summary',
    description: 'Built-in sample articles for testing',
  },
];

export function getDatasetInfo(key: string): DatasetInfo | null {
  return DATASET_CATALOG.find((d) => d.key === key) ?? null;
}

export function isKnownDataset(key: string): boolean {
  return getDatasetInfo(key) !== null;
}
