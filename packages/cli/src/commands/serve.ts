/**
 * digestbench serve: run the HTTP server in this process
 */
import { parseArgs } from 'node:util';
import { startServer, type ServerConfig } from '@digestbench/server';

const HELP = `Usage: digestbench serve [options]

Start the evaluation server. Other settings come from the environment
(SUMMARIZER_TIMEOUT_MS, RESULTS_DIR, ...).

Options:
  -p, --port <port>     Listen port (default: PORT or 5000)
  --cors <origin>       CORS origin for /api/* (default: CORS_ORIGIN)
  --results <dir>       Export directory (default: RESULTS_DIR or results)
  -h, --help            Show help`;

export async function runServeCommand(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      port: { type: 'string', short: 'p' },
      cors: { type: 'string' },
      results: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    console.log(HELP);
    return;
  }

  const overrides: Partial<ServerConfig> = {};
  if (values.port !== undefined) {
    const port = Number(values.port);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new Error(`--port must be a port number, got "${values.port}"`);
    }
    overrides.port = port;
  }
  if (values.cors !== undefined) overrides.corsOrigin = values.cors;
  if (values.results !== undefined) overrides.resultsDir = values.results;

  await startServer(overrides);
}
