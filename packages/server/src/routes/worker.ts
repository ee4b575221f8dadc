/**
 * Worker routes: the browser side of the summarization protocol
 *
 * GET  /api/worker/stream    SSE feed of summarize_request events
 * POST /api/worker/replies   Deliver a summary (or an error) for a request
 * GET  /api/worker/status    Number of connected workers
 */

import { Hono } from 'hono';
import { summarizationReplySchema } from '@digestbench/core';
import type { EventBus } from '../lib/event-bus.js';
import type { RunController } from '../lib/evaluation/run-controller.js';
import type { SseWorkerChannel } from '../lib/worker-channel.js';
import { createLogger } from '../lib/logger.js';
import { createSSEStream, SSE_HEADERS } from '../lib/sse.js';
import { validateBody } from '../middleware/validation.js';

const log = createLogger('WorkerRoutes');

export interface WorkerRoutesDeps {
  controller: RunController;
  channel: SseWorkerChannel;
  bus: EventBus;
  heartbeatMs?: number;
}

export function workerRoutes(deps: WorkerRoutesDeps) {
  const { controller, channel, bus } = deps;
  const app = new Hono();

  app.get('/stream', (c) => {
    const disconnect = channel.connect();
    log.info('Worker connected', { connectedWorkers: channel.connectedWorkers });

    const stream = createSSEStream(
      bus,
      {
        select: (event) => (event.type === 'summarize_request' ? { event: event.type, data: event.data } : null),
        heartbeatMs: deps.heartbeatMs,
        onClose: () => {
          disconnect();
          log.info('Worker disconnected', { connectedWorkers: channel.connectedWorkers });
        },
      },
      c.req.raw.signal,
    );
    return new Response(stream, { headers: SSE_HEADERS });
  });

  app.post('/replies', validateBody(summarizationReplySchema), async (c) => {
    const ack = await controller.deliverReply(c.get('validatedBody'));
    return c.json(ack);
  });

  app.get('/status', (c) => {
    return c.json({ connectedWorkers: channel.connectedWorkers });
  });

  return app;
}
