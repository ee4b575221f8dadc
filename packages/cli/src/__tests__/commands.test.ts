/**
 * CLI commands against an in-process server
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { main } from '../index.js';
import { describeEvent, parseSSEMessage } from '../commands/watch.js';
import { captureConsole, startTestServer, type TestServer } from './test-server.js';

let output: ReturnType<typeof captureConsole>;
let server: TestServer;
let resultsDir: string;

beforeEach(() => {
  resultsDir = mkdtempSync(join(tmpdir(), 'digestbench-cli-'));
  server = startTestServer({ resultsDir });
  output = captureConsole();
});

afterEach(() => {
  output.restore();
  vi.unstubAllGlobals();
  rmSync(resultsDir, { recursive: true, force: true });
});

async function completedRun(runId: string): Promise<void> {
  expect(await main(['start', '--run', runId, '--dataset', 'sample'])).toBe(0);
  await server.services.controller.waitForRun(runId);
  output.lines.length = 0;
}

describe('digestbench', () => {
  it('prints help without a command', async () => {
    expect(await main([])).toBe(0);
    expect(output.lines[0]).toContain('Usage: digestbench <command> [options]');
  });

  it('prints the version', async () => {
    expect(await main(['--version'])).toBe(0);
    expect(output.lines).toEqual(['0.1.0']);
  });

  it('rejects unknown commands', async () => {
    expect(await main(['frobnicate'])).toBe(1);
    expect(output.lines[0]).toBe('Unknown command: frobnicate');
  });

  it('reports an unreachable server', async () => {
    vi.stubGlobal('fetch', async () => {
      throw new TypeError('fetch failed');
    });
    expect(await main(['status'])).toBe(1);
    expect(output.lines[0]).toBe('Error: Cannot connect to the digestbench server.');
    expect(output.lines[1]).toBe('  Cannot reach http://localhost:5000/api/runs/default: fetch failed');
  });
});

describe('start / stop / status', () => {
  it('starts a run with the default article count', async () => {
    expect(await main(['start', '--run', 'r1', '--dataset', 'sample'])).toBe(0);
    expect(output.lines).toEqual(['Started run r1: up to 20 articles from sample (tldr_short_plain-text)']);
    await server.services.controller.waitForRun('r1');
  });

  it('names sweep runs by their scope', async () => {
    expect(await main(['start', '-r', 'sw', '-d', 'sample', '-n', '1', '--mode', 'sweep'])).toBe(0);
    expect(output.lines).toEqual(['Started run sw: up to 1 articles from sample (all configurations)']);
    await server.services.controller.waitForRun('sw');
  });

  it('surfaces server-side rejections', async () => {
    expect(await main(['start', '--dataset', 'imaginary'])).toBe(1);
    expect(output.lines).toEqual(['Error (400): Unknown dataset: imaginary']);
  });

  it('validates the mode locally', async () => {
    expect(await main(['start', '--mode', 'bogus'])).toBe(1);
    expect(output.lines).toEqual(['Error: Invalid mode "bogus". Use "single" or "sweep".']);
  });

  it('reports a stop on an idle run', async () => {
    expect(await main(['stop', '--run', 'idle'])).toBe(0);
    expect(output.lines).toEqual(['Evaluation was not running (run idle, status idle)']);
  });

  it('shows the state of a finished run', async () => {
    await completedRun('r1');

    expect(await main(['status', '--run', 'r1', '--logs', '0'])).toBe(0);
    expect(output.lines).toContain('\nRun r1: completed\n');
    expect(output.lines).toContain('  Progress:   2/2 articles');
    expect(output.lines).toContain('  Results:    2');
    expect(output.lines).not.toContain('\nRecent log:');
  });

  it('lists every run with --all', async () => {
    await completedRun('r1');

    expect(await main(['status', '--all', '--format', 'json'])).toBe(0);
    const runs = JSON.parse(output.lines[0] ?? '[]');
    expect(runs).toHaveLength(1);
    expect(runs[0]).toMatchObject({ runId: 'r1', status: 'completed', totalResults: 2 });
  });
});

describe('results / summary / export', () => {
  it('tabulates results', async () => {
    await completedRun('r1');

    expect(await main(['results', '--run', 'r1'])).toBe(0);
    expect(output.lines[0]?.startsWith(' Article │ Configuration')).toBe(true);
    expect(output.lines).toHaveLength(4);
    expect(output.lines[2]).toContain('fallback');
  });

  it('summarizes results per configuration', async () => {
    await completedRun('r1');

    expect(await main(['summary', '--run', 'r1'])).toBe(0);
    expect(output.lines).toContain('  Results:         2 (0 remote, 2 fallback)');
    expect(output.lines).toContain('  Best:            tldr_short_plain-text');
  });

  it('exports results to the server results directory', async () => {
    await completedRun('r1');

    expect(await main(['export', '--run', 'r1', '--format', 'json'])).toBe(0);
    const exported = JSON.parse(output.lines[0] ?? '{}');
    expect(exported.rows).toBe(2);
    expect(exported.filename.startsWith(resultsDir)).toBe(true);
  });

  it('fails the export of an empty run', async () => {
    expect(await main(['export', '--run', 'none'])).toBe(1);
    expect(output.lines).toEqual(['Error (404): No results to export for run none']);
  });

  it('says so when there are no results yet', async () => {
    expect(await main(['results', '--run', 'fresh'])).toBe(0);
    expect(output.lines).toEqual(['No results yet.']);
  });
});

describe('datasets', () => {
  it('lists the catalog as JSON', async () => {
    expect(await main(['datasets', '--format', 'json'])).toBe(0);
    const catalog = JSON.parse(output.lines[0] ?? '{}');
    expect(catalog.default).toBe('cnn_dailymail');
    expect(catalog.datasets).toHaveLength(5);
  });

  it('marks the default dataset in the table', async () => {
    expect(await main(['datasets'])).toBe(0);
    expect(output.lines.some((line) => line.startsWith(' cnn_dailymail * '))).toBe(true);
  });
});

describe('watch', () => {
  it('reports a run that is not running and exits', async () => {
    await completedRun('r1');

    expect(await main(['watch', '--run', 'r1'])).toBe(0);
    expect(output.lines).toEqual(['Run r1 is completed']);
  });

  it('follows a live run until it completes', async () => {
    output.restore();
    vi.unstubAllGlobals();
    server = startTestServer({ resultsDir, summarizerTimeoutMs: 150 });
    output = captureConsole();
    // A worker that never answers: every attempt waits out its timeout
    server.services.channel.connect();

    expect(await main(['start', '--run', 'live', '--dataset', 'sample'])).toBe(0);
    expect(await main(['watch', '--run', 'live'])).toBe(0);

    expect(output.lines).toContain('Run live is running');
    expect(output.lines.some((l) => l.startsWith('  article 2 tldr_short_plain-text fallback rouge1='))).toBe(true);
    expect(output.lines.at(-1)).toBe('Run completed with 2 results');
  });

  it('parses SSE frames and describes notifications', () => {
    expect(parseSSEMessage('event: log_update\ndata: {"message":"[10:00:00] hi"}')).toEqual({
      event: 'log_update',
      data: '{"message":"[10:00:00] hi"}',
    });
    expect(describeEvent('log_update', { message: '[10:00:00] hi' })).toBe('[10:00:00] hi');
    expect(
      describeEvent('article_completed', {
        articleId: 3,
        configuration: 'teaser_long_markdown',
        provenance: 'remote',
        metricScores: { rouge1: 0.5, rouge2: 0.25, rougeL: 0.5 },
      }),
    ).toBe('  article 3 teaser_long_markdown remote rouge1=0.5000');
    expect(describeEvent('progress_update', { current: 1 })).toBeNull();
  });
});
