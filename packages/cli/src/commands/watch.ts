/**
 * digestbench watch: follow a run's notifications via SSE
 *
 * Connects to /api/runs/:runId/stream and prints progress and log lines
 * until the run completes or stops (or Ctrl+C with --follow).
 */
import { parseArgs } from 'node:util';
import { DEFAULT_RUN_ID } from '@digestbench/core';
import { createClientFromConfig } from '../lib/client.js';
import { formatScore } from '../lib/output.js';

const HELP = `Usage: digestbench watch [options]

Stream a run's progress as it happens.

Options:
  -r, --run <id>        Run id (default: ${DEFAULT_RUN_ID})
  --follow              Keep streaming after the run finishes
  -j, --json            Output raw JSON per event
  --url <url>           Server URL (overrides DIGESTBENCH_URL)
  -h, --help            Show help

Press Ctrl+C to stop.`;

const FINAL_EVENTS = new Set(['run_completed', 'run_stopped']);

export interface ParsedMessage {
  event: string;
  data: string;
}

export function parseSSEMessage(raw: string): ParsedMessage {
  let event = 'message';
  let data = '';
  for (const line of raw.split('\n')) {
    if (line.startsWith('event:')) event = line.slice(6).trim();
    else if (line.startsWith('data:')) data += line.slice(5).trim();
  }
  return { event, data };
}

function field(payload: unknown, key: string): unknown {
  if (typeof payload === 'object' && payload !== null && key in payload) {
    return Object.getOwnPropertyDescriptor(payload, key)?.value;
  }
  return undefined;
}

/**
 * One display line for a notification, or null for events that print nothing.
 */
export function describeEvent(event: string, payload: unknown): string | null {
  switch (event) {
    case 'status':
      return `Run ${String(field(payload, 'runId'))} is ${String(field(payload, 'status'))}`;
    case 'log_update':
      return String(field(payload, 'message'));
    case 'article_completed': {
      const scores = field(payload, 'metricScores');
      const rouge1 = field(scores, 'rouge1');
      const score = typeof rouge1 === 'number' ? formatScore(rouge1) : '-';
      return `  article ${String(field(payload, 'articleId'))} ${String(field(payload, 'configuration'))} ` +
        `${String(field(payload, 'provenance'))} rouge1=${score}`;
    }
    case 'run_completed':
      return `Run completed with ${String(field(payload, 'totalResults'))} results`;
    case 'run_stopped':
      return `Run stopped with ${String(field(payload, 'totalResults'))} results`;
    default:
      return null;
  }
}

function parsePayload(data: string): unknown {
  try {
    const payload: unknown = JSON.parse(data);
    return payload;
  } catch {
    return data;
  }
}

/** Whether the stream should end after this message */
function isFinal(message: ParsedMessage, payload: unknown): boolean {
  if (FINAL_EVENTS.has(message.event)) return true;
  return message.event === 'status' && field(payload, 'isRunning') === false;
}

export async function runWatchCommand(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      run: { type: 'string', short: 'r' },
      follow: { type: 'boolean', default: false },
      json: { type: 'boolean', short: 'j', default: false },
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
  const interrupt = abortOnSigint();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    const body = await client.openRunStream(values.run ?? DEFAULT_RUN_ID, interrupt.signal);
    const reader = body.getReader();

    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });

      // Process complete SSE messages (double newline separated)
      const messages = buffer.split('\n\n');
      buffer = messages.pop() ?? '';

      for (const raw of messages) {
        const message = parseSSEMessage(raw);
        if (message.event === 'heartbeat' || !message.data) continue;
        const payload = parsePayload(message.data);

        if (values.json) console.log(message.data);
        else {
          const line = describeEvent(message.event, payload);
          if (line !== null) console.log(line);
        }

        if (!values.follow && isFinal(message, payload)) {
          await reader.cancel();
          return;
        }
      }
    }
  } catch (err) {
    if (!(err instanceof Error && err.name === 'AbortError')) throw err;
    console.log('\nDisconnected.');
  } finally {
    interrupt.dispose();
  }
}

/**
 * AbortSignal that triggers on SIGINT (Ctrl+C).
 */
function abortOnSigint(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const handler = () => controller.abort();
  process.once('SIGINT', handler);
  return {
    signal: controller.signal,
    dispose: () => {
      process.removeListener('SIGINT', handler);
    },
  };
}
