/**
 * HTTP client for the digestbench server API.
 */
import type {
  DatasetInfo,
  EvaluationMode,
  ResultSummary,
  RunState,
  RunStatus,
  ScoredResult,
  StartRunOutcome,
} from '@digestbench/core';
import { ApiError, ConnectionError } from './errors.js';
import { loadConfig } from './config.js';

type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface ClientOptions {
  url: string;
  /** Defaults to the global fetch, resolved per request */
  fetch?: FetchFn;
}

export interface RunOverview {
  runId: string;
  status: RunStatus;
  isRunning: boolean;
  currentArticle: number;
  totalArticles: number;
  totalResults: number;
  dataset: string;
  mode: EvaluationMode;
  startedAt?: string;
  completedAt?: string;
}

export interface StartRunOptions {
  dataset?: string;
  maxArticles?: number;
  mode?: EvaluationMode;
  configuration?: string;
}

export type AcceptedRun = Extract<StartRunOutcome, { status: 'accepted' }> & { message: string };

export interface StopRunResponse {
  runId: string;
  stopped: boolean;
  status: RunStatus;
  message: string;
}

export interface HealthResponse {
  status: string;
  version: string;
  connectedWorkers: number;
  activeRuns: number;
}

function errorMessage(body: unknown, status: number): string {
  if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }
  return `Request failed with status ${status}`;
}

function parseJson(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return null;
  }
}

function errorDetails(body: unknown): unknown {
  if (typeof body === 'object' && body !== null && 'details' in body) return body.details;
  return undefined;
}

export class DigestbenchClient {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;

  constructor(options: ClientOptions) {
    this.baseUrl = options.url.replace(/\/+$/, '');
    this.fetchFn = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
  }

  createRun(runId?: string): Promise<{ runId: string; created: boolean; status: RunStatus }> {
    return this.request('/api/runs', { method: 'POST', body: runId ? { runId } : {} });
  }

  listRuns(): Promise<{ runs: RunOverview[]; total: number }> {
    return this.request('/api/runs');
  }

  startRun(runId: string, options: StartRunOptions = {}): Promise<AcceptedRun> {
    return this.request(`/api/runs/${encodeURIComponent(runId)}/start`, { method: 'POST', body: options });
  }

  stopRun(runId: string): Promise<StopRunResponse> {
    return this.request(`/api/runs/${encodeURIComponent(runId)}/stop`, { method: 'POST' });
  }

  getRun(runId: string): Promise<RunState> {
    return this.request(`/api/runs/${encodeURIComponent(runId)}`);
  }

  getResults(runId: string): Promise<{ runId: string; results: ScoredResult[]; total: number }> {
    return this.request(`/api/runs/${encodeURIComponent(runId)}/results`);
  }

  getSummary(runId: string): Promise<ResultSummary & { runId: string }> {
    return this.request(`/api/runs/${encodeURIComponent(runId)}/summary`);
  }

  exportResults(runId: string): Promise<{ message: string; filename: string; rows: number }> {
    return this.request(`/api/runs/${encodeURIComponent(runId)}/export`, { method: 'POST' });
  }

  listDatasets(): Promise<{ datasets: DatasetInfo[]; default: string }> {
    return this.request('/api/datasets');
  }

  health(): Promise<HealthResponse> {
    return this.request('/api/health');
  }

  /**
   * Open the run notification stream. The caller reads and cancels the body.
   */
  async openRunStream(runId: string, signal?: AbortSignal): Promise<ReadableStream<Uint8Array>> {
    const response = await this.send(`/api/runs/${encodeURIComponent(runId)}/stream`, {
      headers: { Accept: 'text/event-stream' },
      signal,
    });
    if (!response.ok) {
      const body = parseJson(await response.text());
      throw new ApiError(errorMessage(body, response.status), response.status, errorDetails(body));
    }
    if (!response.body) throw new ConnectionError('No response body (streaming not supported)');
    return response.body;
  }

  private async request<T>(path: string, options: { method?: string; body?: unknown } = {}): Promise<T> {
    const { method = 'GET', body } = options;
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    const response = await this.send(path, {
      method,
      headers,
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    const text = await response.text();
    if (!response.ok) {
      const payload = parseJson(text);
      throw new ApiError(errorMessage(payload, response.status), response.status, errorDetails(payload));
    }
    try {
      const data: T = JSON.parse(text);
      return data;
    } catch (err) {
      throw new ApiError(`Invalid JSON in response from ${path}`, response.status, err);
    }
  }

  private async send(path: string, init: RequestInit): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    try {
      return await this.fetchFn(url, init);
    } catch (err) {
      throw new ConnectionError(`Cannot reach ${url}: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }
  }
}

/**
 * Create a client for the configured server.
 *
 * @param urlOverride - Optional URL that takes precedence over DIGESTBENCH_URL.
 */
export function createClientFromConfig(urlOverride?: string): DigestbenchClient {
  return new DigestbenchClient({ url: loadConfig(urlOverride).url });
}
