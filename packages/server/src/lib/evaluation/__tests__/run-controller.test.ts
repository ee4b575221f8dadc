import { describe, it, expect } from 'vitest';
import { ALL_CONFIGURATIONS, DEFAULT_CONFIGURATION } from '@digestbench/core';
import type { Article, MetricScores } from '@digestbench/core';
import { EventBus, type BusEvent } from '../../event-bus.js';
import { RougeScorer, type ResultScorer } from '../../scoring/rouge.js';
import type { ArticleSource } from '../../datasets/loader.js';
import { SummaryDispatcher } from '../dispatcher.js';
import { RunRegistry } from '../run-registry.js';
import { RunController, type RunControllerConfig } from '../run-controller.js';
import { FakeWorkerChannel, StubLoader, makeArticle, noSleep } from '../../../__tests__/test-helpers.js';

const CONFIG: RunControllerConfig = {
  defaultDataset: 'sample',
  defaultMaxArticles: 20,
  maxAllowedArticles: 50,
  articleIntervalMs: 0,
  logMaxEntries: 1000,
};

function setup(opts: {
  loader?: ArticleSource;
  scorer?: ResultScorer;
  config?: Partial<RunControllerConfig>;
  timeoutMs?: number;
  maxRetries?: number;
} = {}) {
  const bus = new EventBus();
  const events: BusEvent[] = [];
  bus.on('*', (e) => events.push(e));
  const channel = new FakeWorkerChannel();
  const scorer = opts.scorer ?? new RougeScorer();
  const registry = new RunRegistry({
    dataset: 'sample',
    maxArticles: 20,
    mode: 'single',
    configuration: DEFAULT_CONFIGURATION,
  });
  const dispatcher = new SummaryDispatcher({
    channel,
    scorer,
    policy: { timeoutMs: opts.timeoutMs ?? 50, maxRetries: opts.maxRetries ?? 0, retryDelayMs: 0 },
    sleep: noSleep,
  });
  const loader = opts.loader ?? new StubLoader([makeArticle({ id: 1 }), makeArticle({ id: 2 })]);
  const controller = new RunController({
    registry,
    bus,
    loader,
    dispatcher,
    scorer,
    config: { ...CONFIG, ...opts.config },
    sleep: noSleep,
  });
  return { bus, events, channel, registry, controller, loader };
}

/** Worker that answers every request with the article's reference summary */
function echoReferenceWorker(ctx: ReturnType<typeof setup>, articles: Article[]) {
  ctx.channel.onPublish = (message) => {
    const article = articles.find((a) => a.id === message.articleId);
    void ctx.controller.deliverReply({
      requestId: message.requestId,
      articleId: message.articleId,
      summary: article?.referenceSummary ?? '',
    });
  };
}

/** Loader that holds the run in `running` until released */
class GatedLoader implements ArticleSource {
  private release: (articles: Article[]) => void = () => undefined;
  readonly calls: string[] = [];

  load(datasetKey: string): Promise<Article[]> {
    this.calls.push(datasetKey);
    return new Promise((resolve) => {
      this.release = resolve;
    });
  }

  open(articles: Article[] = []): void {
    this.release(articles);
  }
}

const PERFECT: MetricScores = { rouge1: 1, rouge2: 1, rougeL: 1 };

describe('RunController', () => {
  it('runs two articles in single mode end to end', async () => {
    const articles = [
      makeArticle({ id: 1, referenceSummary: 'Council approves winter ferry schedule.' }),
      makeArticle({ id: 2, referenceSummary: 'Library extends weekend opening hours.' }),
    ];
    const ctx = setup({ loader: new StubLoader(articles) });
    echoReferenceWorker(ctx, articles);

    const outcome = ctx.controller.startRun('default', { dataset: 'sample', maxArticles: 2, mode: 'single' });
    expect(outcome).toEqual({
      status: 'accepted',
      runId: 'default',
      dataset: 'sample',
      maxArticles: 2,
      mode: 'single',
      configuration: 'tldr_short_plain-text',
    });
    await ctx.controller.waitForRun('default');

    const state = ctx.controller.getState('default');
    expect(state.status).toBe('completed');
    expect(state.isRunning).toBe(false);
    expect(state.currentArticle).toBe(2);
    expect(state.results.map((r) => [r.articleId, r.configuration, r.provenance])).toEqual([
      [1, 'tldr_short_plain-text', 'remote'],
      [2, 'tldr_short_plain-text', 'remote'],
    ]);
    expect(state.results[0]?.metricScores).toEqual(PERFECT);

    const runEvents = ctx.events.filter((e) => e.type !== 'log_update' && e.type !== 'summarization_acknowledged');
    expect(runEvents.map((e) => e.type)).toEqual([
      'run_started',
      'progress_update',
      'article_completed',
      'progress_update',
      'article_completed',
      'run_completed',
    ]);
    expect(runEvents.at(-1)?.data).toEqual({ runId: 'default', totalResults: 2, totalArticles: 2 });
    expect(ctx.registry.get('default').table.size).toBe(0);
  });

  it('produces one result per article and configuration in sweep mode', async () => {
    const articles = [makeArticle({ id: 9 })];
    const ctx = setup({ loader: new StubLoader(articles) });
    echoReferenceWorker(ctx, articles);

    const outcome = ctx.controller.startRun('sweep-run', { dataset: 'sample', mode: 'sweep' });
    expect(outcome).toMatchObject({ status: 'accepted', configuration: null });
    await ctx.controller.waitForRun('sweep-run');

    const results = ctx.controller.getResults('sweep-run');
    expect(results).toHaveLength(24);
    expect(results.map((r) => r.configuration)).toEqual([...ALL_CONFIGURATIONS]);
  });

  it('falls back for every pair when no worker is connected', async () => {
    const ctx = setup({ timeoutMs: 60_000 });
    ctx.channel.connectedWorkers = 0;

    ctx.controller.startRun('offline', { dataset: 'sample', mode: 'single' });
    await ctx.controller.waitForRun('offline');

    const results = ctx.controller.getResults('offline');
    expect(results).toHaveLength(2);
    expect(results.every((r) => r.provenance === 'fallback')).toBe(true);
  });

  it('rejects a second start while running and keeps the existing state', async () => {
    const loader = new GatedLoader();
    const ctx = setup({ loader });

    ctx.controller.startRun('busy', { dataset: 'sample', maxArticles: 3, mode: 'single' });
    const before = { ...ctx.controller.getState('busy') };

    const outcome = ctx.controller.startRun('busy', { dataset: 'xsum', maxArticles: 9, mode: 'sweep' });

    expect(outcome).toEqual({ status: 'conflict', runId: 'busy' });
    const after = ctx.controller.getState('busy');
    expect(after.dataset).toBe('sample');
    expect(after.maxArticles).toBe(3);
    expect(after.mode).toBe('single');
    expect(after.startedAt).toBe(before.startedAt);
    expect(loader.calls).toEqual(['sample']);

    loader.open();
    await ctx.controller.waitForRun('busy');
  });

  it('rejects an unknown dataset without touching state', () => {
    const loader = new StubLoader([makeArticle()]);
    const ctx = setup({ loader });

    const outcome = ctx.controller.startRun('r1', { dataset: 'imaginary', mode: 'single' });

    expect(outcome).toEqual({ status: 'invalid_dataset', runId: 'r1', dataset: 'imaginary' });
    expect(ctx.controller.getState('r1').status).toBe('idle');
    expect(loader.calls).toHaveLength(0);
    expect(ctx.events).toHaveLength(0);
  });

  it('rejects a malformed configuration', () => {
    const ctx = setup();
    const outcome = ctx.controller.startRun('r1', { dataset: 'sample', mode: 'single', configuration: 'tldr_huge' });
    expect(outcome).toEqual({ status: 'invalid_configuration', runId: 'r1', configuration: 'tldr_huge' });
    expect(ctx.controller.getState('r1').isRunning).toBe(false);
  });

  it('clamps the article count into [1, maxAllowedArticles]', async () => {
    const loader = new StubLoader([]);
    const ctx = setup({ loader });

    const high = ctx.controller.startRun('high', { dataset: 'sample', maxArticles: 500, mode: 'single' });
    await ctx.controller.waitForRun('high');
    const low = ctx.controller.startRun('low', { dataset: 'sample', maxArticles: 0, mode: 'single' });
    await ctx.controller.waitForRun('low');

    expect(high).toMatchObject({ status: 'accepted', maxArticles: 50 });
    expect(low).toMatchObject({ status: 'accepted', maxArticles: 1 });
    expect(loader.calls.map((c) => c.maxCount)).toEqual([50, 1]);
  });

  it('stops at the next article boundary and keeps earlier results', async () => {
    const articles = [makeArticle({ id: 1 }), makeArticle({ id: 2 }), makeArticle({ id: 3 })];
    const ctx = setup({ loader: new StubLoader(articles) });
    ctx.channel.onPublish = (message) => {
      if (message.articleId === 1) ctx.controller.stopRun('stoppable');
      void ctx.controller.deliverReply({ requestId: message.requestId, articleId: message.articleId, summary: 'ok' });
    };

    ctx.controller.startRun('stoppable', { dataset: 'sample', mode: 'single' });
    await ctx.controller.waitForRun('stoppable');

    const state = ctx.controller.getState('stoppable');
    expect(state.status).toBe('stopped');
    expect(state.results.map((r) => r.articleId)).toEqual([1]);
    expect(ctx.events.filter((e) => e.type === 'run_stopped')).toHaveLength(1);
    expect(ctx.events.some((e) => e.type === 'run_completed')).toBe(false);
  });

  it('keeps a loop stopped mid-article from touching the restarted run', async () => {
    const ctx = setup({ timeoutMs: 5_000 });
    let staleTask: Promise<void> | null = null;
    ctx.channel.onPublish = (message) => {
      if (staleTask === null) {
        // Stop and restart while article 1 of the first loop is waiting for its reply
        ctx.controller.stopRun('restart');
        staleTask = ctx.registry.get('restart').task;
        ctx.controller.startRun('restart', { dataset: 'sample', mode: 'single' });
        return;
      }
      void ctx.controller.deliverReply({ requestId: message.requestId, articleId: message.articleId, summary: 'fresh' });
    };

    ctx.controller.startRun('restart', { dataset: 'sample', mode: 'single' });
    await ctx.controller.waitForRun('restart');

    const stale = ctx.channel.published[0];
    expect(stale?.articleId).toBe(1);
    const ack = await ctx.controller.deliverReply({ requestId: stale?.requestId ?? '', articleId: 1, summary: 'stale' });
    expect(ack.outcome).toBe('accepted');
    await staleTask;

    const state = ctx.controller.getState('restart');
    expect(state.status).toBe('completed');
    expect(state.results.map((r) => r.articleId)).toEqual([1, 2]);
    expect(state.results.map((r) => r.generatedSummary)).toEqual(['fresh', 'fresh']);
    expect(state.results.map((r) => r.requestId)).toEqual(ctx.channel.published.slice(1).map((m) => m.requestId));
    expect(ctx.events.filter((e) => e.type === 'run_completed')).toHaveLength(1);
    expect(ctx.events.filter((e) => e.type === 'article_completed')).toHaveLength(2);
    expect(ctx.registry.get('restart').table.size).toBe(0);
  });

  it('reports whether stop found a running run', () => {
    const ctx = setup();
    expect(ctx.controller.stopRun('never-started')).toBe(false);
  });

  it('drops the results of an article whose processing faults', async () => {
    const articles = [
      makeArticle({ id: 1 }),
      makeArticle({ id: 2, referenceSummary: 'explode' }),
      makeArticle({ id: 3 }),
    ];
    const scorer: ResultScorer = {
      score(reference: string) {
        if (reference === 'explode') throw new Error('boom');
        return { rouge1: 0, rouge2: 0, rougeL: 0 };
      },
    };
    const ctx = setup({ loader: new StubLoader(articles), scorer });
    ctx.channel.connectedWorkers = 0;

    ctx.controller.startRun('faulty', { dataset: 'sample', mode: 'single' });
    await ctx.controller.waitForRun('faulty');

    const state = ctx.controller.getState('faulty');
    expect(state.status).toBe('completed');
    expect(state.results.map((r) => r.articleId)).toEqual([1, 3]);
    expect(state.logs.some((l) => l.endsWith('Error processing article 2: boom'))).toBe(true);
  });

  it('keeps runs under different identities apart', async () => {
    const ctx = setup({ loader: new StubLoader([makeArticle({ id: 1 })]) });
    echoReferenceWorker(ctx, [makeArticle({ id: 1 })]);

    ctx.controller.startRun('left', { dataset: 'sample', mode: 'single' });
    ctx.controller.startRun('right', { dataset: 'sample', mode: 'single', configuration: 'headline_long_markdown' });
    await Promise.all([ctx.controller.waitForRun('left'), ctx.controller.waitForRun('right')]);

    expect(ctx.controller.getResults('left').map((r) => r.configuration)).toEqual(['tldr_short_plain-text']);
    expect(ctx.controller.getResults('right').map((r) => r.configuration)).toEqual(['headline_long_markdown']);
  });

  it('bounds the run log and stamps each line', async () => {
    const ctx = setup({ config: { logMaxEntries: 3 } });
    ctx.channel.connectedWorkers = 0;

    ctx.controller.startRun('logged', { dataset: 'sample', mode: 'single' });
    await ctx.controller.waitForRun('logged');

    const { logs } = ctx.controller.getState('logged');
    expect(logs).toHaveLength(3);
    expect(logs.at(-1)).toMatch(/^\[\d{2}:\d{2}:\d{2}\] Evaluation completed!$/);
  });
});

describe('RunController.deliverReply', () => {
  it('acknowledges unknown request ids as duplicates', async () => {
    const ctx = setup();
    const ack = await ctx.controller.deliverReply({ requestId: 'req_404', articleId: 1, summary: 'x' });
    expect(ack).toEqual({ requestId: 'req_404', articleId: 1, outcome: 'duplicate' });
    expect(ctx.events.map((e) => e.type)).toEqual(['summarization_acknowledged']);
  });

  it('consumes a reply once and reports repeats as duplicates', async () => {
    const ctx = setup({ timeoutMs: 5_000 });
    const acks: string[] = [];
    const deliveries: Promise<void>[] = [];
    ctx.channel.onPublish = (message) => {
      const reply = { requestId: message.requestId, articleId: message.articleId, summary: 'same', runId: message.runId };
      deliveries.push(
        ctx.controller.deliverReply(reply).then(async (first) => {
          acks.push(first.outcome);
          acks.push((await ctx.controller.deliverReply(reply)).outcome);
        }),
      );
    };

    ctx.controller.startRun('dup', { dataset: 'sample', maxArticles: 1, mode: 'single' });
    await ctx.controller.waitForRun('dup');
    await Promise.all(deliveries);

    expect(acks).toEqual(['accepted', 'duplicate']);
    expect(ctx.controller.getResults('dup')).toHaveLength(1);
  });

  it('turns a worker error into a fallback result carrying the error', async () => {
    const ctx = setup({ timeoutMs: 5_000 });
    const acks: string[] = [];
    const deliveries: Promise<void>[] = [];
    ctx.channel.onPublish = (message) => {
      deliveries.push(
        ctx.controller
          .deliverReply({ requestId: message.requestId, articleId: message.articleId, summary: '', error: 'Summarizer unavailable' })
          .then((ack) => {
            acks.push(ack.outcome);
          }),
      );
    };

    ctx.controller.startRun('err', { dataset: 'sample', maxArticles: 1, mode: 'single' });
    await ctx.controller.waitForRun('err');
    await Promise.all(deliveries);

    const [result] = ctx.controller.getResults('err');
    expect(acks).toEqual(['fallback']);
    expect(result?.provenance).toBe('fallback');
    expect(result?.error).toBe('Summarizer unavailable');
    expect(result?.requestId).toMatch(/^req_1_tldr_short_plain-text_/);
  });
});
