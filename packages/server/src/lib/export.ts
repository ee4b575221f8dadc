/**
 * CSV export of a run's scored results.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { getErrorMessage } from '@digestbench/core';
import type { ScoredResult } from '@digestbench/core';
import { ExportError, NoResultsError } from './errors.js';

// ─── CSV Escaping (RFC 4180) ────────────────────────────────

export function escapeCsvField(value: string | number | null | undefined): string {
  if (value == null) return '';
  const str = String(value);
  if (str.includes('"') || str.includes(',') || str.includes('\n') || str.includes('\r')) {
    return '"' + str.replace(/"/g, '""') + '"';
  }
  return str;
}

export const RESULT_CSV_HEADERS = [
  'article_id', 'configuration', 'article_length', 'reference_summary', 'generated_summary',
  'rouge1', 'rouge2', 'rougeL', 'compression_ratio', 'processing_time_ms',
  'timestamp', 'provenance', 'request_id', 'error',
];

export function resultToCsvRow(result: ScoredResult): string {
  return [
    result.articleId,
    result.configuration,
    result.articleLength,
    result.referenceSummary,
    result.generatedSummary,
    result.metricScores.rouge1,
    result.metricScores.rouge2,
    result.metricScores.rougeL,
    result.compressionRatio,
    result.processingTimeMs,
    result.timestamp,
    result.provenance,
    result.requestId,
    result.error,
  ].map(escapeCsvField).join(',');
}

export function resultsToCsv(results: ScoredResult[]): string {
  return [RESULT_CSV_HEADERS.join(','), ...results.map(resultToCsvRow)].join('\n') + '\n';
}

/** `yyyyMMdd_HHmmss` in local time */
export function exportTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function exportFilename(runId: string, date: Date): string {
  return `summarization_results_${exportTimestamp(date)}_${runId}.csv`;
}

export interface ExportOutcome {
  /** Path of the written file, under the results directory */
  filename: string;
  rows: number;
}

/**
 * Write results to `<resultsDir>/summarization_results_<timestamp>_<runId>.csv`.
 * Throws NoResultsError for an empty run and ExportError when the write fails.
 */
export async function exportResults(
  runId: string,
  results: ScoredResult[],
  resultsDir: string,
  now: Date = new Date(),
): Promise<ExportOutcome> {
  if (results.length === 0) throw new NoResultsError(runId);

  const filename = join(resultsDir, exportFilename(runId, now));
  try {
    await mkdir(resultsDir, { recursive: true });
    await writeFile(filename, resultsToCsv(results), 'utf-8');
  } catch (err) {
    throw new ExportError(`Failed to write ${filename}: ${getErrorMessage(err)}`, { cause: err });
  }
  return { filename, rows: results.length };
}
