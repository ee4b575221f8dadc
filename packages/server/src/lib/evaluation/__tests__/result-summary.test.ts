import { describe, it, expect } from 'vitest';
import { summarizeResults } from '../result-summary.js';
import { makeResult } from '../../../__tests__/test-helpers.js';

describe('summarizeResults', () => {
  it('averages per configuration and picks the best', () => {
    const summary = summarizeResults([
      makeResult({ articleId: 1, configuration: 'tldr_short_plain-text', metricScores: { rouge1: 0.2, rouge2: 0.1, rougeL: 0.3 } }),
      makeResult({ articleId: 2, configuration: 'tldr_short_plain-text', metricScores: { rouge1: 0.4, rouge2: 0.3, rougeL: 0.5 } }),
      makeResult({
        articleId: 1,
        configuration: 'headline_long_markdown',
        metricScores: { rouge1: 0.5, rouge2: 0.5, rougeL: 0.5 },
        provenance: 'fallback',
      }),
    ]);

    expect(summary.totalResults).toBe(3);
    expect(summary.uniqueArticles).toBe(2);
    expect(summary.uniqueConfigurations).toBe(2);
    expect(summary.remoteCount).toBe(2);
    expect(summary.fallbackCount).toBe(1);
    expect(summary.bestConfiguration).toBe('headline_long_markdown');

    const tldr = summary.byConfiguration.find((c) => c.configuration === 'tldr_short_plain-text');
    expect(tldr?.count).toBe(2);
    expect(tldr?.averages.rouge1).toBeCloseTo(0.3, 10);
    expect(tldr?.averages.rouge2).toBeCloseTo(0.2, 10);
    expect(tldr?.averages.rougeL).toBeCloseTo(0.4, 10);
  });

  it('reports zeros and no best configuration for an empty run', () => {
    expect(summarizeResults([])).toEqual({
      totalResults: 0,
      uniqueArticles: 0,
      uniqueConfigurations: 0,
      remoteCount: 0,
      fallbackCount: 0,
      averages: { rouge1: 0, rouge2: 0, rougeL: 0 },
      byConfiguration: [],
      bestConfiguration: null,
    });
  });
});
