/**
 * digestbench datasets: list the dataset catalog
 */
import { parseArgs } from 'node:util';
import { createClientFromConfig } from '../lib/client.js';
import { printJson, printTable, truncate } from '../lib/output.js';

const HELP = `Usage: digestbench datasets [options]

List the datasets the server can load articles from.

Options:
  --format <fmt>        Output format: table (default) or json
  --url <url>           Server URL (overrides DIGESTBENCH_URL)
  -h, --help            Show help`;

export async function runDatasetsCommand(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      format: { type: 'string', short: 'f' },
      url: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    console.log(HELP);
    return;
  }

  const client = createClientFromConfig(values.url);
  const catalog = await client.listDatasets();

  if (values.format === 'json') {
    printJson(catalog);
    return;
  }

  printTable(
    ['Key', 'Name', 'Source', 'Description'],
    catalog.datasets.map((d) => [
      d.key === catalog.default ? `${d.key} *` : d.key,
      d.displayName,
      d.sourceIdentifier,
      truncate(d.description, 50),
    ]),
  );
  console.log(`\n* default dataset`);
}
