/**
 * Result summary: per-configuration metric averages and the best configuration.
 */

import { METRIC_NAMES } from '@digestbench/core';
import type {
  ConfigurationId,
  ConfigurationSummary,
  MetricScores,
  ResultSummary,
  ScoredResult,
} from '@digestbench/core';

function zeroScores(): MetricScores {
  return { rouge1: 0, rouge2: 0, rougeL: 0 };
}

function average(results: ScoredResult[]): MetricScores {
  const sums = zeroScores();
  if (results.length === 0) return sums;
  for (const result of results) {
    for (const metric of METRIC_NAMES) sums[metric] += result.metricScores[metric];
  }
  for (const metric of METRIC_NAMES) sums[metric] /= results.length;
  return sums;
}

function meanOfMetrics(scores: MetricScores): number {
  return METRIC_NAMES.reduce((sum, metric) => sum + scores[metric], 0) / METRIC_NAMES.length;
}

export function summarizeResults(results: ScoredResult[]): ResultSummary {
  const groups = new Map<ConfigurationId, ScoredResult[]>();
  for (const result of results) {
    const group = groups.get(result.configuration) ?? [];
    group.push(result);
    groups.set(result.configuration, group);
  }

  const byConfiguration: ConfigurationSummary[] = [];
  for (const [configuration, group] of groups) {
    byConfiguration.push({ configuration, count: group.length, averages: average(group) });
  }

  let bestConfiguration: ConfigurationId | null = null;
  let bestScore = -1;
  for (const entry of byConfiguration) {
    const score = meanOfMetrics(entry.averages);
    if (score > bestScore) {
      bestScore = score;
      bestConfiguration = entry.configuration;
    }
  }

  return {
    totalResults: results.length,
    uniqueArticles: new Set(results.map((r) => r.articleId)).size,
    uniqueConfigurations: groups.size,
    remoteCount: results.filter((r) => r.provenance === 'remote').length,
    fallbackCount: results.filter((r) => r.provenance === 'fallback').length,
    averages: average(results),
    byConfiguration,
    bestConfiguration,
  };
}
