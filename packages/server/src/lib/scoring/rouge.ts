/**
 * ROUGE scorer
 *
 * F-measures of ROUGE-1, ROUGE-2 and ROUGE-L between a reference summary and
 * a candidate. Text is lowercased and split on anything that is not [a-z0-9];
 * with stemming on, tokens longer than three characters are Porter-stemmed.
 */

import type { MetricScores } from '@digestbench/core';
import { stem } from './porter-stemmer.js';

export interface ResultScorer {
  score(reference: string, candidate: string): MetricScores;
}

export interface RougeScorerOptions {
  useStemmer?: boolean;
}

export function tokenize(text: string, useStemmer: boolean): string[] {
  const tokens = text.toLowerCase().replace(/[^a-z0-9]+/g, ' ').split(' ').filter(Boolean);
  return useStemmer ? tokens.map((t) => (t.length > 3 ? stem(t) : t)) : tokens;
}

function ngramCounts(tokens: string[], n: number): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = 0; i + n <= tokens.length; i++) {
    const gram = tokens.slice(i, i + n).join(' ');
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

function total(counts: Map<string, number>): number {
  let sum = 0;
  for (const c of counts.values()) sum += c;
  return sum;
}

function fmeasure(overlap: number, candidateTotal: number, referenceTotal: number): number {
  const precision = overlap / Math.max(candidateTotal, 1);
  const recall = overlap / Math.max(referenceTotal, 1);
  return precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;
}

export function rougeN(reference: string[], candidate: string[], n: number): number {
  const refCounts = ngramCounts(reference, n);
  const candCounts = ngramCounts(candidate, n);
  let overlap = 0;
  for (const [gram, count] of candCounts) {
    overlap += Math.min(count, refCounts.get(gram) ?? 0);
  }
  return fmeasure(overlap, total(candCounts), total(refCounts));
}

export function lcsLength(a: string[], b: string[]): number {
  // Single rolling row of the DP table
  const row = new Array<number>(b.length + 1).fill(0);
  for (const tokenA of a) {
    let diagonal = 0;
    for (let j = 1; j <= b.length; j++) {
      const above = row[j] ?? 0;
      row[j] = tokenA === b[j - 1] ? diagonal + 1 : Math.max(above, row[j - 1] ?? 0);
      diagonal = above;
    }
  }
  return row[b.length] ?? 0;
}

export function rougeL(reference: string[], candidate: string[]): number {
  return fmeasure(lcsLength(reference, candidate), candidate.length, reference.length);
}

export class RougeScorer implements ResultScorer {
  private readonly useStemmer: boolean;

  constructor(options: RougeScorerOptions = {}) {
    this.useStemmer = options.useStemmer ?? true;
  }

  score(reference: string, candidate: string): MetricScores {
    const ref = tokenize(reference, this.useStemmer);
    const cand = tokenize(candidate, this.useStemmer);
    return {
      rouge1: rougeN(ref, cand, 1),
      rouge2: rougeN(ref, cand, 2),
      rougeL: rougeL(ref, cand),
    };
  }
}
