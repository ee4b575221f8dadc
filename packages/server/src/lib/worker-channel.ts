/**
 * Worker Channel
 *
 * Out-of-band path from the server to the browser workers. Workers hold an
 * SSE connection on /api/worker/stream; publishing a request emits it on the
 * bus, which every open worker stream forwards.
 */

import type { SummarizeRequestMessage } from '@digestbench/core';
import type { EventBus } from './event-bus.js';

export interface WorkerChannel {
  /**
   * Fire-and-forget delivery to every connected worker.
   * Returns how many workers the message could reach.
   */
  publish(message: SummarizeRequestMessage): number;
  readonly connectedWorkers: number;
}

export class SseWorkerChannel implements WorkerChannel {
  private connections = 0;

  constructor(private readonly bus: EventBus) {}

  get connectedWorkers(): number {
    return this.connections;
  }

  /**
   * Track a worker connection. The returned function releases it and is
   * safe to call more than once.
   */
  connect(): () => void {
    this.connections++;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.connections--;
    };
  }

  publish(message: SummarizeRequestMessage): number {
    if (this.connections === 0) return 0;
    this.bus.emit({
      type: 'summarize_request',
      runId: message.runId,
      data: message,
      timestamp: new Date().toISOString(),
    });
    return this.connections;
  }
}
