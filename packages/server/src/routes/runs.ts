/**
 * Run control routes
 *
 * POST /api/runs                    Create (or claim) a run identity
 * GET  /api/runs                    List known runs
 * POST /api/runs/:runId/start       Start a run (202)
 * POST /api/runs/:runId/stop        Stop at the next article boundary
 * GET  /api/runs/:runId             Run state
 * GET  /api/runs/:runId/results     Scored results
 * GET  /api/runs/:runId/summary     Per-configuration averages
 * POST /api/runs/:runId/export      Write results to CSV
 * GET  /api/runs/:runId/stream      SSE run notifications
 */

import { Hono } from 'hono';
import { createMiddleware } from 'hono/factory';
import { ulid } from 'ulid';
import { createRunSchema, runIdSchema, startRunSchema } from '@digestbench/core';
import type { RunState } from '@digestbench/core';
import type { EventBus } from '../lib/event-bus.js';
import { isRunNotification } from '../lib/event-bus.js';
import type { RunController } from '../lib/evaluation/run-controller.js';
import type { RunRegistry } from '../lib/evaluation/run-registry.js';
import { summarizeResults } from '../lib/evaluation/result-summary.js';
import { InvalidConfigurationError, InvalidDatasetError, RunConflictError } from '../lib/errors.js';
import { exportResults } from '../lib/export.js';
import { createSSEStream, SSE_HEADERS } from '../lib/sse.js';
import { validateBody } from '../middleware/validation.js';

export interface RunRoutesDeps {
  controller: RunController;
  registry: RunRegistry;
  bus: EventBus;
  resultsDir: string;
  heartbeatMs?: number;
}

function runOverview(state: RunState) {
  return {
    runId: state.runId,
    status: state.status,
    isRunning: state.isRunning,
    currentArticle: state.currentArticle,
    totalArticles: state.totalArticles,
    totalResults: state.results.length,
    dataset: state.dataset,
    mode: state.mode,
    startedAt: state.startedAt,
    completedAt: state.completedAt,
  };
}

export function runsRoutes(deps: RunRoutesDeps) {
  const { controller, registry, bus } = deps;
  const app = new Hono();

  app.post('/', validateBody(createRunSchema), (c) => {
    const runId = c.get('validatedBody').runId ?? ulid();
    const created = !registry.has(runId);
    const { state } = registry.get(runId);
    return c.json({ runId, created, status: state.status }, created ? 201 : 200);
  });

  app.get('/', (c) => {
    const runs = registry.list().map(runOverview);
    return c.json({ runs, total: runs.length });
  });

  // Every per-run route shares the run id format of POST /api/runs
  const checkRunId = createMiddleware(async (c, next) => {
    if (!runIdSchema.safeParse(c.req.param('runId')).success) {
      return c.json({ error: 'Invalid run id', status: 400 }, 400);
    }
    await next();
  });
  app.use('/:runId', checkRunId);
  app.use('/:runId/*', checkRunId);

  app.post('/:runId/start', validateBody(startRunSchema), (c) => {
    const outcome = controller.startRun(c.req.param('runId'), c.get('validatedBody'));
    switch (outcome.status) {
      case 'accepted':
        return c.json({ message: 'Evaluation started', ...outcome }, 202);
      case 'conflict':
        throw new RunConflictError(outcome.runId);
      case 'invalid_dataset':
        throw new InvalidDatasetError(outcome.dataset);
      case 'invalid_configuration':
        throw new InvalidConfigurationError(outcome.configuration);
    }
  });

  app.post('/:runId/stop', (c) => {
    const runId = c.req.param('runId');
    const stopped = controller.stopRun(runId);
    return c.json({
      runId,
      stopped,
      status: controller.getState(runId).status,
      message: stopped ? 'Evaluation stopped' : 'Evaluation was not running',
    });
  });

  app.get('/:runId', (c) => {
    return c.json(controller.getState(c.req.param('runId')));
  });

  app.get('/:runId/results', (c) => {
    const runId = c.req.param('runId');
    const results = controller.getResults(runId);
    return c.json({ runId, results, total: results.length });
  });

  app.get('/:runId/summary', (c) => {
    const runId = c.req.param('runId');
    return c.json({ runId, ...summarizeResults(controller.getResults(runId)) });
  });

  app.post('/:runId/export', async (c) => {
    const runId = c.req.param('runId');
    const { filename, rows } = await exportResults(runId, controller.getResults(runId), deps.resultsDir);
    return c.json({ message: `Results exported to ${filename}`, filename, rows });
  });

  app.get('/:runId/stream', (c) => {
    const runId = c.req.param('runId');
    const stream = createSSEStream(
      bus,
      {
        initial: [{ event: 'status', data: controller.getState(runId) }],
        select: (event) =>
          isRunNotification(event) && event.runId === runId ? { event: event.type, data: event.data } : null,
        heartbeatMs: deps.heartbeatMs,
      },
      c.req.raw.signal,
    );
    return new Response(stream, { headers: SSE_HEADERS });
  });

  return app;
}
