/**
 * SSE Connection Manager
 *
 * Creates a ReadableStream that:
 *  - Subscribes to an EventBus and forwards the events a selector picks
 *  - Sends heartbeat every 30s
 *  - Cleans up on client disconnect
 */

import type { BusEvent, EventBus } from './event-bus.js';

export interface SSEMessage {
  event: string;
  data: unknown;
}

export interface SSEStreamOptions {
  /** Map a bus event to an SSE message, or null to skip it */
  select: (event: BusEvent) => SSEMessage | null;
  /** Messages sent right after the opening heartbeat */
  initial?: SSEMessage[];
  /** Heartbeat interval in ms (default 30s) */
  heartbeatMs?: number;
  /** Called once when the client goes away */
  onClose?: () => void;
}

/** Default heartbeat interval in ms */
const HEARTBEAT_INTERVAL_MS = 30_000;

/**
 * Format an SSE message (event: type\ndata: json\n\n)
 */
export function formatSSE(eventName: string, data: unknown): string {
  return `event: ${eventName}\ndata: ${JSON.stringify(data)}\n\n`;
}

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no', // Disable nginx buffering
} as const;

/**
 * Create a ReadableStream for SSE that subscribes to the EventBus.
 *
 * @param signal - AbortSignal from the request for disconnect cleanup
 */
export function createSSEStream(
  bus: EventBus,
  options: SSEStreamOptions,
  signal: AbortSignal,
): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  let cleanup: (closeStream: boolean) => void = () => undefined;

  return new ReadableStream({
    start(controller) {
      let closed = false;

      const send = (eventName: string, data: unknown) => {
        if (closed) return;
        try {
          controller.enqueue(encoder.encode(formatSSE(eventName, data)));
        } catch {
          // Controller is gone once the client disconnected
          cleanup(false);
        }
      };

      // Send initial heartbeat so client knows connection is alive
      send('heartbeat', { time: new Date().toISOString() });
      for (const message of options.initial ?? []) send(message.event, message.data);

      const heartbeatTimer = setInterval(() => {
        send('heartbeat', { time: new Date().toISOString() });
      }, options.heartbeatMs ?? HEARTBEAT_INTERVAL_MS);

      const handler = (busEvent: BusEvent) => {
        const message = options.select(busEvent);
        if (message) send(message.event, message.data);
      };

      bus.on('*', handler);

      cleanup = (closeStream) => {
        if (closed) return;
        closed = true;
        clearInterval(heartbeatTimer);
        bus.off('*', handler);
        options.onClose?.();
        if (closeStream) controller.close();
      };

      if (signal.aborted) cleanup(true);
      else signal.addEventListener('abort', () => cleanup(true), { once: true });
    },
    cancel() {
      // Reader side already closed the stream
      cleanup(false);
    },
  });
}
