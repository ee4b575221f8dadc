/**
 * digestbench results | summary | export: inspect and persist scored results
 */
import { parseArgs } from 'node:util';
import { DEFAULT_RUN_ID } from '@digestbench/core';
import { createClientFromConfig } from '../lib/client.js';
import { formatScore, printJson, printTable, truncate } from '../lib/output.js';

const COMMON_OPTIONS = {
  run: { type: 'string', short: 'r' },
  format: { type: 'string', short: 'f' },
  url: { type: 'string' },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

const COMMON_HELP = `  -r, --run <id>        Run id (default: ${DEFAULT_RUN_ID})
  --format <fmt>        Output format: table (default) or json
  --url <url>           Server URL (overrides DIGESTBENCH_URL)
  -h, --help            Show help`;

export async function runResultsCommand(argv: string[]): Promise<void> {
  const { values } = parseArgs({ args: argv, options: COMMON_OPTIONS, allowPositionals: false });

  if (values.help) {
    console.log(`Usage: digestbench results [options]\n\nList the scored results of a run.\n\nOptions:\n${COMMON_HELP}`);
    return;
  }

  const client = createClientFromConfig(values.url);
  const { results } = await client.getResults(values.run ?? DEFAULT_RUN_ID);

  if (values.format === 'json') {
    printJson(results);
    return;
  }
  if (results.length === 0) {
    console.log('No results yet.');
    return;
  }

  printTable(
    ['Article', 'Configuration', 'Source', 'ROUGE-1', 'ROUGE-2', 'ROUGE-L', 'Time', 'Summary'],
    results.map((r) => [
      String(r.articleId),
      r.configuration,
      r.provenance,
      formatScore(r.metricScores.rouge1),
      formatScore(r.metricScores.rouge2),
      formatScore(r.metricScores.rougeL),
      `${Math.round(r.processingTimeMs)}ms`,
      truncate(r.generatedSummary, 40),
    ]),
  );
}

export async function runSummaryCommand(argv: string[]): Promise<void> {
  const { values } = parseArgs({ args: argv, options: COMMON_OPTIONS, allowPositionals: false });

  if (values.help) {
    console.log(`Usage: digestbench summary [options]\n\nAverage metric scores per configuration.\n\nOptions:\n${COMMON_HELP}`);
    return;
  }

  const client = createClientFromConfig(values.url);
  const summary = await client.getSummary(values.run ?? DEFAULT_RUN_ID);

  if (values.format === 'json') {
    printJson(summary);
    return;
  }
  if (summary.totalResults === 0) {
    console.log('No results yet.');
    return;
  }

  console.log(`\nRun ${summary.runId}\n`);
  console.log(`  Results:         ${summary.totalResults} (${summary.remoteCount} remote, ${summary.fallbackCount} fallback)`);
  console.log(`  Articles:        ${summary.uniqueArticles}`);
  console.log(`  Configurations:  ${summary.uniqueConfigurations}`);
  console.log(`  Best:            ${summary.bestConfiguration ?? '-'}`);
  console.log('');

  printTable(
    ['Configuration', 'Count', 'ROUGE-1', 'ROUGE-2', 'ROUGE-L'],
    summary.byConfiguration.map((entry) => [
      entry.configuration,
      String(entry.count),
      formatScore(entry.averages.rouge1),
      formatScore(entry.averages.rouge2),
      formatScore(entry.averages.rougeL),
    ]),
  );
}

export async function runExportCommand(argv: string[]): Promise<void> {
  const { values } = parseArgs({ args: argv, options: COMMON_OPTIONS, allowPositionals: false });

  if (values.help) {
    console.log(`Usage: digestbench export [options]\n\nWrite the results of a run to a CSV file on the server.\n\nOptions:\n${COMMON_HELP}`);
    return;
  }

  const client = createClientFromConfig(values.url);
  const exported = await client.exportResults(values.run ?? DEFAULT_RUN_ID);

  if (values.format === 'json') {
    printJson(exported);
    return;
  }
  console.log(`${exported.message} (${exported.rows} rows)`);
}
