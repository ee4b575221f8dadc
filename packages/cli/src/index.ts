/**
 * digestbench: command-line client for evaluation runs
 *
 * Uses node:util parseArgs for lightweight argument parsing.
 */

import { getErrorMessage } from '@digestbench/core';
import { runDatasetsCommand } from './commands/datasets.js';
import { runExportCommand, runResultsCommand, runSummaryCommand } from './commands/results.js';
import { runStartCommand, runStatusCommand, runStopCommand } from './commands/runs.js';
import { runServeCommand } from './commands/serve.js';
import { runWatchCommand } from './commands/watch.js';
import { ApiError, ConnectionError } from './lib/errors.js';

export const CLI_VERSION = '0.1.0';

const HELP = `digestbench: browser-in-the-loop summarization evaluation

Usage: digestbench <command> [options]

Commands:
  serve               Start the evaluation server
  start               Start an evaluation run
  stop                Stop a run after the current article
  status              Show run state (--all lists every run)
  watch               Stream a run's progress (SSE)
  results             List scored results
  summary             Average scores per configuration
  export              Write results to CSV on the server
  datasets            List available datasets

Run "digestbench <command> --help" for command-specific help.

The server URL comes from --url or DIGESTBENCH_URL (default http://localhost:5000).
`;

const COMMANDS: Record<string, (argv: string[]) => Promise<void>> = {
  serve: runServeCommand,
  start: runStartCommand,
  stop: runStopCommand,
  status: runStatusCommand,
  watch: runWatchCommand,
  results: runResultsCommand,
  summary: runSummaryCommand,
  export: runExportCommand,
  datasets: runDatasetsCommand,
};

/**
 * Dispatch one command line. Returns the process exit code.
 */
export async function main(args: string[]): Promise<number> {
  const command = args[0];
  const rest = args.slice(1);

  switch (command) {
    case '--help':
    case '-h':
    case undefined:
      console.log(HELP);
      return 0;

    case '--version':
    case '-v':
      console.log(CLI_VERSION);
      return 0;
  }

  const run = COMMANDS[command];
  if (!run) {
    console.error(`Unknown command: ${command}`);
    console.log(HELP);
    return 1;
  }

  try {
    await run(rest);
    return 0;
  } catch (err) {
    reportError(err);
    return 1;
  }
}

export function reportError(err: unknown): void {
  if (err instanceof ConnectionError) {
    console.error('Error: Cannot connect to the digestbench server.');
    console.error(`  ${err.message}`);
    console.error('\nStart it with "digestbench serve" or point --url / DIGESTBENCH_URL at a running server.');
  } else if (err instanceof ApiError) {
    console.error(`Error (${err.status}): ${err.message}`);
    if (Array.isArray(err.details)) {
      for (const detail of err.details) console.error(`  ${JSON.stringify(detail)}`);
    }
  } else {
    console.error(`Error: ${getErrorMessage(err)}`);
  }
}
