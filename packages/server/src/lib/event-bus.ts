/**
 * In-process EventBus for run notifications and worker traffic.
 *
 * Typed EventEmitter shared by the run controller (producer) and the SSE
 * endpoints (consumers). Observers may come and go; nothing is replayed.
 */

import { EventEmitter } from 'node:events';
import type {
  ProgressNotification,
  RunCompletedNotification,
  RunStartedNotification,
  RunStoppedNotification,
  ScoredResult,
  SummarizationAck,
  SummarizeRequestMessage,
} from '@digestbench/core';

// ─── Bus Event Types ─────────────────────────────────────────────

export interface RunStartedEvent {
  type: 'run_started';
  runId: string;
  data: RunStartedNotification;
  timestamp: string;
}

export interface ProgressUpdateEvent {
  type: 'progress_update';
  runId: string;
  data: ProgressNotification;
  timestamp: string;
}

export interface ArticleCompletedEvent {
  type: 'article_completed';
  runId: string;
  data: ScoredResult;
  timestamp: string;
}

export interface LogUpdateEvent {
  type: 'log_update';
  runId: string;
  data: { message: string };
  timestamp: string;
}

export interface RunCompletedEvent {
  type: 'run_completed';
  runId: string;
  data: RunCompletedNotification;
  timestamp: string;
}

export interface RunStoppedEvent {
  type: 'run_stopped';
  runId: string;
  data: RunStoppedNotification;
  timestamp: string;
}

/** Outbound request for remote workers */
export interface SummarizeRequestEvent {
  type: 'summarize_request';
  runId: string;
  data: SummarizeRequestMessage;
  timestamp: string;
}

export interface SummarizationAcknowledgedEvent {
  type: 'summarization_acknowledged';
  runId: string | null;
  data: SummarizationAck;
  timestamp: string;
}

export type RunNotificationEvent =
  | RunStartedEvent
  | ProgressUpdateEvent
  | ArticleCompletedEvent
  | LogUpdateEvent
  | RunCompletedEvent
  | RunStoppedEvent;

export type WorkerEvent = SummarizeRequestEvent | SummarizationAcknowledgedEvent;

export type BusEvent = RunNotificationEvent | WorkerEvent;

export type BusEventType = BusEvent['type'];

const RUN_NOTIFICATION_TYPES: ReadonlySet<BusEventType> = new Set([
  'run_started',
  'progress_update',
  'article_completed',
  'log_update',
  'run_completed',
  'run_stopped',
]);

export function isRunNotification(event: BusEvent): event is RunNotificationEvent {
  return RUN_NOTIFICATION_TYPES.has(event.type);
}

/**
 * Typed event bus for internal server communication.
 * Wraps Node.js EventEmitter with type safety.
 */
export class EventBus {
  private emitter = new EventEmitter();

  constructor() {
    // Allow many SSE clients
    this.emitter.setMaxListeners(1000);
  }

  emit(event: BusEvent): void {
    this.emitter.emit(event.type, event);
    this.emitter.emit('*', event); // wildcard for "all events"
  }

  on(type: BusEventType | '*', listener: (event: BusEvent) => void): void {
    this.emitter.on(type, listener);
  }

  off(type: BusEventType | '*', listener: (event: BusEvent) => void): void {
    this.emitter.off(type, listener);
  }

  listenerCount(type: BusEventType | '*'): number {
    return this.emitter.listenerCount(type);
  }
}
