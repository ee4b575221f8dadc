/**
 * Pending Request Table
 *
 * Correlates outstanding summarization requests of one run with the replies
 * workers send back. An entry moves from incomplete to complete at most once;
 * later replies for the same id are rejected.
 *
 * Every operation runs under the table's own mutex, so the run loop and the
 * reply handlers see a consistent table while other runs are never blocked.
 */

import type { Article, ConfigurationId, ScoredResult } from '@digestbench/core';
import { Mutex } from '../mutex.js';

export interface PendingRequest {
  id: string;
  runId: string;
  article: Article;
  configuration: ConfigurationId;
  result: ScoredResult | null;
  completed: boolean;
  /** Epoch ms at which the request was issued */
  issuedAt: number;
  retryAttempt: number;
  /** Issuance order within the table; larger is more recent */
  sequence: number;
}

export type NewPendingRequest = Omit<PendingRequest, 'result' | 'completed' | 'sequence'>;

export class PendingRequestTable {
  private readonly entries = new Map<string, PendingRequest>();
  private readonly waiters = new Map<string, Set<() => void>>();
  private readonly mutex = new Mutex();
  private nextSequence = 1;

  /** Number of entries currently held (completed or not) */
  get size(): number {
    return this.entries.size;
  }

  async register(request: NewPendingRequest): Promise<PendingRequest> {
    return this.mutex.runExclusive(() => {
      if (this.entries.has(request.id)) {
        throw new Error(`Request ${request.id} is already registered`);
      }
      const entry: PendingRequest = {
        ...request,
        result: null,
        completed: false,
        sequence: this.nextSequence++,
      };
      this.entries.set(entry.id, entry);
      return { ...entry };
    });
  }

  /**
   * Most recently issued request for an (article, configuration) pair.
   */
  async lookupLatest(articleId: number, configuration: ConfigurationId): Promise<string | null> {
    return this.mutex.runExclusive(() => {
      let latest: PendingRequest | null = null;
      for (const entry of this.entries.values()) {
        if (entry.article.id !== articleId || entry.configuration !== configuration) continue;
        if (!latest || entry.sequence > latest.sequence) latest = entry;
      }
      return latest?.id ?? null;
    });
  }

  async get(id: string): Promise<PendingRequest | null> {
    return this.mutex.runExclusive(() => {
      const entry = this.entries.get(id);
      return entry ? { ...entry } : null;
    });
  }

  /**
   * Attach a result and flip the entry to completed.
   * Returns false, changing nothing, when the id is unknown or already completed.
   */
  async complete(id: string, result: ScoredResult): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const entry = this.entries.get(id);
      if (!entry || entry.completed) return false;
      entry.result = result;
      entry.completed = true;
      const pending = this.waiters.get(id);
      if (pending) {
        for (const notify of pending) notify();
      }
      return true;
    });
  }

  /**
   * Consume a completed entry: remove it and hand back its result.
   * Incomplete or unknown entries are left alone and yield null.
   */
  async take(id: string): Promise<ScoredResult | null> {
    return this.mutex.runExclusive(() => {
      const entry = this.entries.get(id);
      if (!entry || !entry.completed) return null;
      this.entries.delete(id);
      return entry.result;
    });
  }

  /**
   * Drop an entry whose wait has ended. If a reply completed it in the
   * meantime its result is returned so it is consumed rather than lost.
   */
  async abandon(id: string): Promise<ScoredResult | null> {
    return this.mutex.runExclusive(() => {
      const entry = this.entries.get(id);
      if (!entry) return null;
      this.entries.delete(id);
      return entry.completed ? entry.result : null;
    });
  }

  async purgeCompleted(): Promise<number> {
    return this.mutex.runExclusive(() => {
      let purged = 0;
      for (const [id, entry] of this.entries) {
        if (entry.completed) {
          this.entries.delete(id);
          purged++;
        }
      }
      return purged;
    });
  }

  /**
   * Resolve true as soon as the entry completes, or false once `timeoutMs`
   * has passed (or straight away when the id is unknown).
   */
  async waitForCompletion(id: string, timeoutMs: number): Promise<boolean> {
    let notify: () => void = () => undefined;
    const completion = new Promise<boolean>((resolve) => {
      notify = () => resolve(true);
    });

    const settled = await this.mutex.runExclusive(() => {
      const entry = this.entries.get(id);
      if (!entry) return false;
      if (entry.completed) return true;
      this.addWaiter(id, notify);
      return null;
    });
    if (settled !== null) return settled;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([completion, timeout]);
    } finally {
      clearTimeout(timer);
      this.removeWaiter(id, notify);
    }
  }

  private addWaiter(id: string, notify: () => void): void {
    const set = this.waiters.get(id) ?? new Set<() => void>();
    set.add(notify);
    this.waiters.set(id, set);
  }

  private removeWaiter(id: string, notify: () => void): void {
    const set = this.waiters.get(id);
    if (!set) return;
    set.delete(notify);
    if (set.size === 0) this.waiters.delete(id);
  }
}
