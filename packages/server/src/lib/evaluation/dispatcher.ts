/**
 * SummaryDispatcher: request/wait protocol for one (article, configuration)
 *
 * Registers a pending request, publishes it to the connected workers and
 * waits for the correlated reply. Each attempt gets its own request id; when
 * the timeout and retry budget is spent a fallback result is synthesized so
 * the run always has a record for the pair.
 */

import { ulid } from 'ulid';
import { toSummarizerOptions } from '@digestbench/core';
import type { Article, ConfigurationId, ScoredResult } from '@digestbench/core';
import type { WorkerChannel } from '../worker-channel.js';
import type { ResultScorer } from '../scoring/rouge.js';
import type { PendingRequestTable } from './pending-request-table.js';
import { buildFallbackResult } from './results.js';

export interface DispatchPolicy {
  /** Per-attempt wait in ms */
  timeoutMs: number;
  /** Retries after the initial attempt */
  maxRetries: number;
  /** Pause before each retry in ms */
  retryDelayMs: number;
}

export interface DispatcherDeps {
  channel: WorkerChannel;
  scorer: ResultScorer;
  policy: DispatchPolicy;
  createId?: () => string;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

/** Run-scoped pieces an attempt works against */
export interface DispatchContext {
  runId: string;
  table: PendingRequestTable;
  log: (message: string) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function buildRequestId(articleId: number, configuration: ConfigurationId, discriminator: string): string {
  return `req_${articleId}_${configuration}_${discriminator}`;
}

export class SummaryDispatcher {
  private readonly channel: WorkerChannel;
  private readonly scorer: ResultScorer;
  private readonly policy: DispatchPolicy;
  private readonly createId: () => string;
  private readonly clock: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(deps: DispatcherDeps) {
    this.channel = deps.channel;
    this.scorer = deps.scorer;
    this.policy = deps.policy;
    this.createId = deps.createId ?? (() => ulid());
    this.clock = deps.clock ?? (() => new Date());
    this.sleep = deps.sleep ?? sleep;
  }

  /**
   * Obtain a scored candidate for the pair. Never rejects because of worker
   * silence; the worst case is a fallback result.
   */
  async obtain(ctx: DispatchContext, article: Article, configuration: ConfigurationId): Promise<ScoredResult> {
    const { maxRetries, timeoutMs, retryDelayMs } = this.policy;
    const firstIssuedAt = this.clock().getTime();

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        ctx.log(`Retrying article ${article.id} (${configuration}), attempt ${attempt + 1}/${maxRetries + 1}`);
        await this.sleep(retryDelayMs);
      }

      const result = await this.attempt(ctx, article, configuration, attempt);
      if (result) return result;
    }

    ctx.log(`Using fallback summary for article ${article.id} (${configuration})`);
    return buildFallbackResult(
      article,
      configuration,
      this.scorer,
      { processingTimeMs: this.clock().getTime() - firstIssuedAt },
      this.clock,
    );
  }

  private async attempt(
    ctx: DispatchContext,
    article: Article,
    configuration: ConfigurationId,
    retryAttempt: number,
  ): Promise<ScoredResult | null> {
    const { table } = ctx;
    const requestId = buildRequestId(article.id, configuration, this.createId());
    await table.register({
      id: requestId,
      runId: ctx.runId,
      article,
      configuration,
      issuedAt: this.clock().getTime(),
      retryAttempt,
    });

    ctx.log(`Requesting ${configuration} summarization for article ${article.id}`);
    const reached = this.channel.publish({
      runId: ctx.runId,
      requestId,
      articleId: article.id,
      text: article.articleText,
      configuration,
      options: toSummarizerOptions(configuration),
      retryAttempt,
    });

    if (reached === 0) {
      ctx.log(`No summarization worker connected for article ${article.id} (${configuration})`);
      return table.abandon(requestId);
    }

    if (await table.waitForCompletion(requestId, this.policy.timeoutMs)) {
      const result = await table.take(requestId);
      if (result) return result;
    }

    // A reply may have landed between the timeout and this point
    const late = await table.abandon(requestId);
    if (!late) {
      ctx.log(`Timeout waiting for worker response for article ${article.id}, config: ${configuration}`);
    }
    return late;
  }
}
