import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { getConfig, validateConfig } from '../config.js';

const ENV_KEYS = [
  'PORT',
  'CORS_ORIGIN',
  'RESULTS_DIR',
  'SUMMARIZER_TIMEOUT_MS',
  'SUMMARIZER_MAX_RETRIES',
  'USE_STEMMER',
  'MAX_ALLOWED_ARTICLES',
  'DATASET_ROWS_URL',
  'DATASET_FETCH_TIMEOUT_MS',
];

describe('getConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of ENV_KEYS) delete process.env[key];
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('uses the documented defaults', () => {
    const config = getConfig();
    expect(config).toMatchObject({
      port: 5000,
      corsOrigin: 'http://localhost:5000',
      resultsDir: 'results',
      defaultDataset: 'cnn_dailymail',
      defaultMaxArticles: 20,
      maxAllowedArticles: 50,
      maxArticleLength: 4000,
      summarizerTimeoutMs: 240_000,
      summarizerMaxRetries: 1,
      summarizerRetryDelayMs: 2_000,
      articleIntervalMs: 1_000,
      logMaxEntries: 1_000,
      useStemmer: true,
      datasetRowsUrl: 'https://datasets-server.huggingface.co/rows',
      datasetFetchTimeoutMs: 30_000,
    });
  });

  it('respects explicit env vars', () => {
    process.env['PORT'] = '8080';
    process.env['SUMMARIZER_TIMEOUT_MS'] = '5000';
    process.env['USE_STEMMER'] = 'false';
    process.env['RESULTS_DIR'] = '/tmp/out';

    const config = getConfig();
    expect(config.port).toBe(8080);
    expect(config.summarizerTimeoutMs).toBe(5000);
    expect(config.useStemmer).toBe(false);
    expect(config.resultsDir).toBe('/tmp/out');
  });

  it('ignores numbers it cannot parse', () => {
    process.env['SUMMARIZER_MAX_RETRIES'] = 'many';
    expect(getConfig().summarizerMaxRetries).toBe(1);
  });
});

function captureStdout() {
  return vi.spyOn(process.stdout, 'write').mockReturnValue(true);
}

describe('validateConfig', () => {
  let stdoutSpy: ReturnType<typeof captureStdout>;
  const origLevel = process.env['LOG_LEVEL'];

  beforeEach(() => {
    process.env['LOG_LEVEL'] = 'warn';
    stdoutSpy = captureStdout();
  });

  afterEach(() => {
    stdoutSpy.mockRestore();
    if (origLevel === undefined) delete process.env['LOG_LEVEL'];
    else process.env['LOG_LEVEL'] = origLevel;
  });

  it('accepts the defaults silently', () => {
    expect(() => validateConfig({ ...getConfig(), corsOrigin: 'http://localhost:5000', defaultMaxArticles: 20 })).not.toThrow();
    expect(stdoutSpy).not.toHaveBeenCalled();
  });

  it('throws on a non-positive timeout', () => {
    expect(() => validateConfig({ ...getConfig(), summarizerTimeoutMs: 0 })).toThrow(/SUMMARIZER_TIMEOUT_MS must be positive/);
  });

  it('throws on a negative retry budget', () => {
    expect(() => validateConfig({ ...getConfig(), summarizerMaxRetries: -1 })).toThrow(/must not be negative/);
  });

  it('throws on a non-positive rows request timeout', () => {
    expect(() => validateConfig({ ...getConfig(), datasetFetchTimeoutMs: 0 })).toThrow(/DATASET_FETCH_TIMEOUT_MS must be positive/);
  });

  it('throws on an unparseable rows URL', () => {
    expect(() => validateConfig({ ...getConfig(), datasetRowsUrl: 'not a url' })).toThrow(/DATASET_ROWS_URL/);
  });

  it('warns when CORS is open to every origin', () => {
    validateConfig({ ...getConfig(), corsOrigin: '*' });
    expect(stdoutSpy).toHaveBeenCalledWith(expect.stringContaining('CORS_ORIGIN=*'));
  });
});
