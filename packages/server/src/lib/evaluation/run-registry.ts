/**
 * RunRegistry: process-wide table of runs keyed by run identity.
 *
 * Each identity owns its state and its pending request table, created on
 * first access. Runs under different identities never share either.
 */

import type { ConfigurationId, EvaluationMode, RunState } from '@digestbench/core';
import { PendingRequestTable } from './pending-request-table.js';

export interface RunContext {
  state: RunState;
  table: PendingRequestTable;
  /** Background task driving the run loop, while one exists */
  task: Promise<void> | null;
  /** Bumped on every start; a loop whose generation is stale stops touching state */
  generation: number;
}

export interface RunDefaults {
  dataset: string;
  maxArticles: number;
  mode: EvaluationMode;
  configuration: ConfigurationId;
}

export function createInitialState(runId: string, defaults: RunDefaults): RunState {
  return {
    runId,
    status: 'idle',
    isRunning: false,
    currentArticle: 0,
    totalArticles: 0,
    results: [],
    logs: [],
    mode: defaults.mode,
    selectedConfiguration: defaults.configuration,
    dataset: defaults.dataset,
    maxArticles: defaults.maxArticles,
  };
}

export class RunRegistry {
  private readonly runs = new Map<string, RunContext>();

  constructor(private readonly defaults: RunDefaults) {}

  /** Context for a run identity, created idle when first seen */
  get(runId: string): RunContext {
    let ctx = this.runs.get(runId);
    if (!ctx) {
      ctx = {
        state: createInitialState(runId, this.defaults),
        table: new PendingRequestTable(),
        task: null,
        generation: 0,
      };
      this.runs.set(runId, ctx);
    }
    return ctx;
  }

  has(runId: string): boolean {
    return this.runs.has(runId);
  }

  list(): RunState[] {
    return [...this.runs.values()].map((ctx) => ctx.state);
  }

  /**
   * Run whose table holds the given request id, if any.
   */
  async findByRequestId(requestId: string): Promise<RunContext | null> {
    for (const ctx of this.runs.values()) {
      if (await ctx.table.get(requestId)) return ctx;
    }
    return null;
  }
}
