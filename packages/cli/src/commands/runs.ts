/**
 * digestbench start | stop | status: run control
 */
import { parseArgs } from 'node:util';
import { DEFAULT_RUN_ID, type EvaluationMode, type RunState } from '@digestbench/core';
import { createClientFromConfig, type StartRunOptions } from '../lib/client.js';
import { formatDuration, printJson, printTable } from '../lib/output.js';

const START_HELP = `Usage: digestbench start [options]

Start an evaluation run on the server.

Options:
  -r, --run <id>              Run id (default: ${DEFAULT_RUN_ID})
  -d, --dataset <key>         Dataset key (see: digestbench datasets)
  -n, --max <count>           Maximum number of articles
  -m, --mode <mode>           single (default) or sweep
  -c, --configuration <id>    Configuration for single mode, e.g. tldr_short_plain-text
  --format <fmt>              Output format: text (default) or json
  --url <url>                 Server URL (overrides DIGESTBENCH_URL)
  -h, --help                  Show help`;

const STOP_HELP = `Usage: digestbench stop [options]

Stop a run after the article in progress.

Options:
  -r, --run <id>        Run id (default: ${DEFAULT_RUN_ID})
  --format <fmt>        Output format: text (default) or json
  --url <url>           Server URL (overrides DIGESTBENCH_URL)
  -h, --help            Show help`;

const STATUS_HELP = `Usage: digestbench status [options]

Show the state of a run, or of every run with --all.

Options:
  -r, --run <id>        Run id (default: ${DEFAULT_RUN_ID})
  -a, --all             List every run the server knows
  --logs <n>            Number of log lines to show (default: 10)
  --format <fmt>        Output format: text (default) or json
  --url <url>           Server URL (overrides DIGESTBENCH_URL)
  -h, --help            Show help`;

function parseMode(value: string | undefined): EvaluationMode | undefined {
  if (value === undefined) return undefined;
  if (value === 'single' || value === 'sweep') return value;
  throw new Error(`Invalid mode "${value}". Use "single" or "sweep".`);
}

function parseCount(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const count = Number(value);
  if (!Number.isInteger(count)) throw new Error(`${flag} must be an integer, got "${value}"`);
  return count;
}

export async function runStartCommand(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      run: { type: 'string', short: 'r' },
      dataset: { type: 'string', short: 'd' },
      max: { type: 'string', short: 'n' },
      mode: { type: 'string', short: 'm' },
      configuration: { type: 'string', short: 'c' },
      format: { type: 'string', short: 'f' },
      url: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    console.log(START_HELP);
    return;
  }

  const options: StartRunOptions = {
    dataset: values.dataset,
    maxArticles: parseCount(values.max, '--max'),
    mode: parseMode(values.mode),
    configuration: values.configuration,
  };

  const client = createClientFromConfig(values.url);
  const started = await client.startRun(values.run ?? DEFAULT_RUN_ID, options);

  if (values.format === 'json') {
    printJson(started);
    return;
  }

  const target = started.mode === 'sweep' ? 'all configurations' : started.configuration ?? 'default configuration';
  console.log(`Started run ${started.runId}: up to ${started.maxArticles} articles from ${started.dataset} (${target})`);
}

export async function runStopCommand(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      run: { type: 'string', short: 'r' },
      format: { type: 'string', short: 'f' },
      url: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    console.log(STOP_HELP);
    return;
  }

  const client = createClientFromConfig(values.url);
  const outcome = await client.stopRun(values.run ?? DEFAULT_RUN_ID);

  if (values.format === 'json') {
    printJson(outcome);
    return;
  }
  console.log(`${outcome.message} (run ${outcome.runId}, status ${outcome.status})`);
}

function printRunState(state: RunState, logLines: number): void {
  console.log(`\nRun ${state.runId}: ${state.status}\n`);
  console.log(`  Dataset:    ${state.dataset} (${state.mode} mode)`);
  if (state.mode === 'single') console.log(`  Config:     ${state.selectedConfiguration}`);
  console.log(`  Progress:   ${state.currentArticle}/${state.totalArticles} articles`);
  console.log(`  Results:    ${state.results.length}`);
  console.log(`  Duration:   ${formatDuration(state.startedAt, state.completedAt)}`);

  const logs = logLines > 0 ? state.logs.slice(-logLines) : [];
  if (logs.length > 0) {
    console.log('\nRecent log:');
    for (const line of logs) console.log(`  ${line}`);
  }
}

export async function runStatusCommand(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      run: { type: 'string', short: 'r' },
      all: { type: 'boolean', short: 'a', default: false },
      logs: { type: 'string' },
      format: { type: 'string', short: 'f' },
      url: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    console.log(STATUS_HELP);
    return;
  }

  const client = createClientFromConfig(values.url);
  const isJson = values.format === 'json';

  if (values.all) {
    const { runs } = await client.listRuns();
    if (isJson) {
      printJson(runs);
      return;
    }
    if (runs.length === 0) {
      console.log('No runs found.');
      return;
    }
    printTable(
      ['Run', 'Status', 'Dataset', 'Mode', 'Progress', 'Results'],
      runs.map((r) => [
        r.runId,
        r.status,
        r.dataset,
        r.mode,
        `${r.currentArticle}/${r.totalArticles}`,
        String(r.totalResults),
      ]),
    );
    return;
  }

  const state = await client.getRun(values.run ?? DEFAULT_RUN_ID);
  if (isJson) {
    printJson(state);
    return;
  }
  printRunState(state, parseCount(values.logs, '--logs') ?? 10);
}
