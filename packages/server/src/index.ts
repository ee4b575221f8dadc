/**
 * @digestbench/server: Hono HTTP API for browser-in-the-loop summarization runs
 *
 * Exports:
 * - createServices(config): wires registry, dispatcher and controller
 * - createApp(services, config?): factory that returns a configured Hono app
 * - startServer(): standalone entry point that starts listening
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { serve } from '@hono/node-server';
import { DEFAULT_CONFIGURATION } from '@digestbench/core';
import { getConfig, validateConfig, type ServerConfig } from './config.js';
import { EventBus } from './lib/event-bus.js';
import { createLogger } from './lib/logger.js';
import { DigestbenchError } from './lib/errors.js';
import { SseWorkerChannel } from './lib/worker-channel.js';
import { RougeScorer, type ResultScorer } from './lib/scoring/rouge.js';
import { DatasetLoader, type ArticleSource } from './lib/datasets/loader.js';
import { SummaryDispatcher } from './lib/evaluation/dispatcher.js';
import { RunRegistry } from './lib/evaluation/run-registry.js';
import { RunController } from './lib/evaluation/run-controller.js';
import { createBodyLimit } from './middleware/body-limit.js';
import { runsRoutes } from './routes/runs.js';
import { workerRoutes } from './routes/worker.js';
import { datasetsRoutes } from './routes/datasets.js';

// Re-export everything consumers may need
export { getConfig, validateConfig } from './config.js';
export type { ServerConfig } from './config.js';
export { EventBus } from './lib/event-bus.js';
export type { BusEvent } from './lib/event-bus.js';
export { createLogger } from './lib/logger.js';
export type { Logger } from './lib/logger.js';
export { SseWorkerChannel } from './lib/worker-channel.js';
export type { WorkerChannel } from './lib/worker-channel.js';
export { RougeScorer } from './lib/scoring/rouge.js';
export type { ResultScorer } from './lib/scoring/rouge.js';
export { DatasetLoader } from './lib/datasets/loader.js';
export type { ArticleSource } from './lib/datasets/loader.js';
export { DATASET_CATALOG, getDatasetInfo } from './lib/datasets/catalog.js';
export { PendingRequestTable } from './lib/evaluation/pending-request-table.js';
export { SummaryDispatcher } from './lib/evaluation/dispatcher.js';
export { RunRegistry } from './lib/evaluation/run-registry.js';
export { RunController } from './lib/evaluation/run-controller.js';
export { summarizeResults } from './lib/evaluation/result-summary.js';
export { exportResults } from './lib/export.js';
export * from './lib/errors.js';

const log = createLogger('Server');
const httpLog = createLogger('HTTP');

export const SERVER_VERSION = '0.1.0';

export interface AppServices {
  bus: EventBus;
  channel: SseWorkerChannel;
  registry: RunRegistry;
  controller: RunController;
}

export interface ServiceOverrides {
  loader?: ArticleSource;
  scorer?: ResultScorer;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Build the in-process services a server needs from configuration.
 * Tests pass overrides for the loader and timing.
 */
export function createServices(config: ServerConfig, overrides: ServiceOverrides = {}): AppServices {
  const bus = new EventBus();
  const channel = new SseWorkerChannel(bus);
  const scorer = overrides.scorer ?? new RougeScorer({ useStemmer: config.useStemmer });
  const registry = new RunRegistry({
    dataset: config.defaultDataset,
    maxArticles: config.defaultMaxArticles,
    mode: 'single',
    configuration: DEFAULT_CONFIGURATION,
  });
  const dispatcher = new SummaryDispatcher({
    channel,
    scorer,
    policy: {
      timeoutMs: config.summarizerTimeoutMs,
      maxRetries: config.summarizerMaxRetries,
      retryDelayMs: config.summarizerRetryDelayMs,
    },
    clock: overrides.clock,
    sleep: overrides.sleep,
  });
  const controller = new RunController({
    registry,
    bus,
    loader: overrides.loader ?? new DatasetLoader({
      rowsUrl: config.datasetRowsUrl,
      maxArticleLength: config.maxArticleLength,
      fetchTimeoutMs: config.datasetFetchTimeoutMs,
    }),
    dispatcher,
    scorer,
    config: {
      defaultDataset: config.defaultDataset,
      defaultMaxArticles: config.defaultMaxArticles,
      maxAllowedArticles: config.maxAllowedArticles,
      articleIntervalMs: config.articleIntervalMs,
      logMaxEntries: config.logMaxEntries,
    },
    clock: overrides.clock,
    sleep: overrides.sleep,
  });
  return { bus, channel, registry, controller };
}

/**
 * Create a configured Hono app with all routes and middleware.
 *
 * @param services - Services from createServices()
 * @param config - Optional partial config override (defaults from env)
 */
export function createApp(
  services: AppServices,
  config?: Partial<ServerConfig> & { heartbeatMs?: number },
) {
  const resolvedConfig = { ...getConfig(), ...config };
  const { bus, channel, registry, controller } = services;

  const app = new Hono();

  // ─── Global error handler ──────────────────────────────
  app.onError((err, c) => {
    if (err instanceof DigestbenchError) {
      return c.json({ error: err.message, status: err.status }, err.status);
    }
    log.error('Unhandled error', { error: err.message, stack: err.stack });
    return c.json({ error: err.message || 'Internal server error', status: 500 }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: 'Not found', status: 404 }, 404);
  });

  // ─── Middleware on /api/* ──────────────────────────────
  app.use('/api/*', cors({ origin: resolvedConfig.corsOrigin }));
  app.use('/api/*', logger((message) => httpLog.info(message)));
  app.use('/api/*', createBodyLimit());

  app.get('/api/health', (c) => {
    return c.json({
      status: 'ok',
      version: SERVER_VERSION,
      connectedWorkers: channel.connectedWorkers,
      activeRuns: registry.list().filter((s) => s.isRunning).length,
    });
  });

  // ─── Routes ────────────────────────────────────────────
  app.route('/api/datasets', datasetsRoutes(resolvedConfig.defaultDataset));
  app.route('/api/worker', workerRoutes({ controller, channel, bus, heartbeatMs: config?.heartbeatMs }));
  app.route('/api/runs', runsRoutes({
    controller,
    registry,
    bus,
    resultsDir: resolvedConfig.resultsDir,
    heartbeatMs: config?.heartbeatMs,
  }));

  return app;
}

/**
 * Start the server as a standalone process.
 */
export async function startServer(overrides: Partial<ServerConfig> = {}) {
  const config = { ...getConfig(), ...overrides };
  validateConfig(config);

  const services = createServices(config);
  const app = createApp(services, config);

  log.info(`digestbench server starting on port ${config.port}`, {
    corsOrigin: config.corsOrigin,
    resultsDir: config.resultsDir,
    timeoutMs: config.summarizerTimeoutMs,
    maxRetries: config.summarizerMaxRetries,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.port,
  }, (info) => {
    log.info(`digestbench server listening on http://localhost:${info.port}`);
  });

  return { app, server, services };
}
