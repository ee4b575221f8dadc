/**
 * Scored result construction and fallback synthesis.
 */

import type { Article, ConfigurationId, Provenance, ScoredResult } from '@digestbench/core';
import type { ResultScorer } from '../scoring/rouge.js';

export interface CandidateInput {
  article: Article;
  configuration: ConfigurationId;
  summary: string;
  provenance: Provenance;
  processingTimeMs: number;
  requestId?: string;
  error?: string;
}

/**
 * Deterministic placeholder used when no worker produced a summary.
 */
export function fallbackSummary(article: Article, configuration: ConfigurationId): string {
  return (
    `This article discusses key topics related to article ${article.id} using ${configuration} configuration. ` +
    'The main points cover important aspects of the subject matter.'
  );
}

export function compressionRatio(summary: string, articleLength: number): number {
  return articleLength > 0 ? summary.length / articleLength : 0;
}

export function buildScoredResult(
  input: CandidateInput,
  scorer: ResultScorer,
  now: () => Date = () => new Date(),
): ScoredResult {
  const { article, configuration, summary } = input;
  const articleLength = article.articleText.length;
  const result: ScoredResult = {
    articleId: article.id,
    configuration,
    articleLength,
    referenceSummary: article.referenceSummary,
    generatedSummary: summary,
    metricScores: scorer.score(article.referenceSummary, summary),
    compressionRatio: compressionRatio(summary, articleLength),
    processingTimeMs: input.processingTimeMs,
    timestamp: now().toISOString(),
    provenance: input.provenance,
  };
  if (input.requestId !== undefined) result.requestId = input.requestId;
  if (input.error !== undefined) result.error = input.error;
  return result;
}

export function buildFallbackResult(
  article: Article,
  configuration: ConfigurationId,
  scorer: ResultScorer,
  details: { processingTimeMs: number; requestId?: string; error?: string },
  now?: () => Date,
): ScoredResult {
  return buildScoredResult(
    {
      article,
      configuration,
      summary: fallbackSummary(article, configuration),
      provenance: 'fallback',
      ...details,
    },
    scorer,
    now,
  );
}
