/**
 * RunController: evaluation run lifecycle (idle → running → completed | stopped)
 *
 * Starts runs as background tasks, walks their articles through the
 * dispatcher, records results and run logs, and routes worker replies back
 * into the pending request table of the run that issued them.
 */

import {
  configurationsForMode,
  getErrorMessage,
  isConfigurationId,
} from '@digestbench/core';
import type {
  ConfigurationId,
  EvaluationMode,
  RunState,
  ScoredResult,
  StartRunBody,
  StartRunOutcome,
  SummarizationAck,
  SummarizationReplyBody,
} from '@digestbench/core';
import type { EventBus } from '../event-bus.js';
import { createLogger, type Logger } from '../logger.js';
import type { ResultScorer } from '../scoring/rouge.js';
import type { ArticleSource } from '../datasets/loader.js';
import { isKnownDataset } from '../datasets/catalog.js';
import type { SummaryDispatcher } from './dispatcher.js';
import type { RunContext, RunRegistry } from './run-registry.js';
import { buildFallbackResult, buildScoredResult } from './results.js';

export interface RunControllerConfig {
  defaultDataset: string;
  defaultMaxArticles: number;
  maxAllowedArticles: number;
  /** Pause between articles in ms */
  articleIntervalMs: number;
  /** Run log lines kept per run */
  logMaxEntries: number;
}

export interface RunControllerDeps {
  registry: RunRegistry;
  bus: EventBus;
  loader: ArticleSource;
  dispatcher: SummaryDispatcher;
  scorer: ResultScorer;
  config: RunControllerConfig;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

interface RunSettings {
  dataset: string;
  maxArticles: number;
  mode: EvaluationMode;
  configuration: ConfigurationId;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function formatClock(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export class RunController {
  private readonly registry: RunRegistry;
  private readonly bus: EventBus;
  private readonly loader: ArticleSource;
  private readonly dispatcher: SummaryDispatcher;
  private readonly scorer: ResultScorer;
  private readonly config: RunControllerConfig;
  private readonly clock: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger = createLogger('RunController');

  constructor(deps: RunControllerDeps) {
    this.registry = deps.registry;
    this.bus = deps.bus;
    this.loader = deps.loader;
    this.dispatcher = deps.dispatcher;
    this.scorer = deps.scorer;
    this.config = deps.config;
    this.clock = deps.clock ?? (() => new Date());
    this.sleep = deps.sleep ?? sleep;
  }

  // ─── Control ──────────────────────────────────────────────

  /**
   * Validate and start a run. Rejections leave the run's state untouched.
   * On acceptance the run is marked running before this returns; the loop
   * itself continues in the background.
   */
  startRun(runId: string, body: StartRunBody): StartRunOutcome {
    const ctx = this.registry.get(runId);
    const { state } = ctx;

    if (state.isRunning) return { status: 'conflict', runId };

    const dataset = body.dataset ?? this.config.defaultDataset;
    if (!isKnownDataset(dataset)) return { status: 'invalid_dataset', runId, dataset };

    let configuration = state.selectedConfiguration;
    if (body.configuration !== undefined) {
      if (!isConfigurationId(body.configuration)) {
        return { status: 'invalid_configuration', runId, configuration: body.configuration };
      }
      configuration = body.configuration;
    }

    const settings: RunSettings = {
      dataset,
      maxArticles: clamp(body.maxArticles ?? this.config.defaultMaxArticles, 1, this.config.maxAllowedArticles),
      mode: body.mode,
      configuration,
    };

    state.status = 'running';
    state.isRunning = true;
    state.currentArticle = 0;
    state.totalArticles = 0;
    state.results = [];
    state.logs = [];
    state.mode = settings.mode;
    state.selectedConfiguration = settings.configuration;
    state.dataset = settings.dataset;
    state.maxArticles = settings.maxArticles;
    state.startedAt = this.clock().toISOString();
    delete state.completedAt;
    const generation = ++ctx.generation;

    ctx.task = this.execute(ctx, settings, generation).catch((err: unknown) => {
      this.logger.error('Run task failed', { runId, error: getErrorMessage(err) });
      if (ctx.generation === generation && state.isRunning) {
        this.appendLog(ctx, `Evaluation failed: ${getErrorMessage(err)}`);
        this.finish(ctx, 'stopped');
      }
    });

    return {
      status: 'accepted',
      runId,
      dataset: settings.dataset,
      maxArticles: settings.maxArticles,
      mode: settings.mode,
      configuration: settings.mode === 'single' ? settings.configuration : null,
    };
  }

  /**
   * Ask a running run to stop at the next article boundary.
   * Returns false when nothing was running.
   */
  stopRun(runId: string): boolean {
    const ctx = this.registry.get(runId);
    if (!ctx.state.isRunning) return false;

    this.finish(ctx, 'stopped');
    this.appendLog(ctx, 'Evaluation stopped');
    this.bus.emit({
      type: 'run_stopped',
      runId,
      data: {
        runId,
        currentArticle: ctx.state.currentArticle,
        totalResults: ctx.state.results.length,
      },
      timestamp: this.clock().toISOString(),
    });
    return true;
  }

  getState(runId: string): RunState {
    return this.registry.get(runId).state;
  }

  getResults(runId: string): ScoredResult[] {
    return [...this.registry.get(runId).state.results];
  }

  /** Resolves once the run's background task (if any) has ended */
  async waitForRun(runId: string): Promise<void> {
    await this.registry.get(runId).task;
  }

  // ─── Reply Delivery ───────────────────────────────────────

  /**
   * Correlate a worker reply with its pending request. Unknown or already
   * completed ids are acknowledged as duplicates and change nothing.
   */
  async deliverReply(reply: SummarizationReplyBody): Promise<SummarizationAck> {
    const ctx = await this.findRun(reply.runId, reply.requestId);
    const entry = ctx ? await ctx.table.get(reply.requestId) : null;

    if (!ctx || !entry || entry.completed) {
      const message = `Ignoring duplicate or stale reply for article ${reply.articleId} (request: ${reply.requestId})`;
      if (ctx) this.appendLog(ctx, message);
      else this.logger.warn(message);
      return this.acknowledge(ctx, { requestId: reply.requestId, articleId: reply.articleId, outcome: 'duplicate' });
    }

    this.appendLog(ctx, `Received summarization for article ${reply.articleId} (request: ${reply.requestId})`);
    const processingTimeMs = this.clock().getTime() - entry.issuedAt;

    let result: ScoredResult;
    if (reply.error !== undefined) {
      this.appendLog(ctx, `Error in browser summarization: ${reply.error}`);
      result = buildFallbackResult(
        entry.article,
        entry.configuration,
        this.scorer,
        { processingTimeMs, requestId: entry.id, error: reply.error },
        this.clock,
      );
    } else {
      result = buildScoredResult(
        {
          article: entry.article,
          configuration: entry.configuration,
          summary: reply.summary,
          provenance: 'remote',
          processingTimeMs,
          requestId: entry.id,
        },
        this.scorer,
        this.clock,
      );
    }

    const completed = await ctx.table.complete(entry.id, result);
    const outcome = !completed ? 'duplicate' : reply.error !== undefined ? 'fallback' : 'accepted';
    return this.acknowledge(ctx, { requestId: reply.requestId, articleId: reply.articleId, outcome });
  }

  private async findRun(runId: string | undefined, requestId: string): Promise<RunContext | null> {
    if (runId !== undefined) return this.registry.has(runId) ? this.registry.get(runId) : null;
    return this.registry.findByRequestId(requestId);
  }

  private acknowledge(ctx: RunContext | null, ack: SummarizationAck): SummarizationAck {
    this.bus.emit({
      type: 'summarization_acknowledged',
      runId: ctx?.state.runId ?? null,
      data: ack,
      timestamp: this.clock().toISOString(),
    });
    return ack;
  }

  // ─── Run Loop ─────────────────────────────────────────────

  private async execute(ctx: RunContext, settings: RunSettings, generation: number): Promise<void> {
    const { state } = ctx;
    const runId = state.runId;
    const active = () => state.isRunning && ctx.generation === generation;

    try {
      const articles = await this.loader.load(settings.dataset, settings.maxArticles);
      if (!active()) return;
      state.totalArticles = articles.length;

      this.appendLog(ctx, `Starting evaluation of ${articles.length} articles from ${settings.dataset} (${settings.mode} mode)`);
      this.bus.emit({
        type: 'run_started',
        runId,
        data: { runId, totalArticles: articles.length, dataset: settings.dataset, mode: settings.mode },
        timestamp: this.clock().toISOString(),
      });

      const configurations = configurationsForMode(settings.mode, settings.configuration);
      const dispatchContext = {
        runId,
        table: ctx.table,
        log: (message: string) => this.appendLog(ctx, message),
      };

      for (const [index, article] of articles.entries()) {
        if (!active()) break;

        state.currentArticle = index + 1;
        this.appendLog(ctx, `Processing article ${index + 1}/${articles.length}`);
        this.bus.emit({
          type: 'progress_update',
          runId,
          data: { runId, current: index + 1, total: articles.length, articleId: article.id },
          timestamp: this.clock().toISOString(),
        });

        // An article contributes either all of its results or none
        const articleResults: ScoredResult[] = [];
        try {
          for (const configuration of configurations) {
            articleResults.push(await this.dispatcher.obtain(dispatchContext, article, configuration));
          }
        } catch (err) {
          this.appendLog(ctx, `Error processing article ${article.id}: ${getErrorMessage(err)}`);
          articleResults.length = 0;
        }

        // Stopped and restarted while this article was in flight
        if (ctx.generation !== generation) break;

        for (const result of articleResults) {
          state.results.push(result);
          this.bus.emit({
            type: 'article_completed',
            runId,
            data: result,
            timestamp: this.clock().toISOString(),
          });
        }

        if (active() && index < articles.length - 1) {
          await this.sleep(this.config.articleIntervalMs);
        }
      }

      if (active()) {
        this.finish(ctx, 'completed');
        this.appendLog(ctx, 'Evaluation completed!');
        this.bus.emit({
          type: 'run_completed',
          runId,
          data: { runId, totalResults: state.results.length, totalArticles: state.totalArticles },
          timestamp: this.clock().toISOString(),
        });
      }
    } finally {
      if (ctx.generation === generation) {
        const purged = await ctx.table.purgeCompleted();
        if (purged > 0) this.logger.debug('Purged completed requests', { runId, purged });
      }
    }
  }

  private finish(ctx: RunContext, status: 'completed' | 'stopped'): void {
    ctx.state.isRunning = false;
    ctx.state.status = status;
    ctx.state.completedAt = this.clock().toISOString();
  }

  // ─── Run Log ──────────────────────────────────────────────

  private appendLog(ctx: RunContext, message: string): void {
    const { state } = ctx;
    const entry = `[${formatClock(this.clock())}] ${message}`;
    state.logs.push(entry);
    if (state.logs.length > this.config.logMaxEntries) {
      state.logs.splice(0, state.logs.length - this.config.logMaxEntries);
    }
    this.logger.with({ runId: state.runId }).info(message);
    this.bus.emit({
      type: 'log_update',
      runId: state.runId,
      data: { message: entry },
      timestamp: this.clock().toISOString(),
    });
  }
}
