/**
 * @digestbench/core: Core Type Definitions
 *
 * Records shared by the server, the CLI and remote summarization workers.
 */

// ─── Summary Configuration ──────────────────────────────────────────

/** Summary style requested from the browser Summarizer */
export type SummaryType = 'tldr' | 'key-points' | 'teaser' | 'headline';

/** Summary length class */
export type SummaryLength = 'short' | 'medium' | 'long';

/** Output format of the summary */
export type SummaryFormat = 'plain-text' | 'markdown';

export interface SummaryConfiguration {
  type: SummaryType;
  length: SummaryLength;
  format: SummaryFormat;
}

/** Opaque configuration identifier, e.g. `tldr_short_plain-text` */
export type ConfigurationId = `${SummaryType}_${SummaryLength}_${SummaryFormat}`;

/**
 * Options handed to the browser `Summarizer.create()` call.
 * Note the browser spells the tl;dr type with a semicolon.
 */
export interface SummarizerOptions {
  type: 'tl;dr' | 'key-points' | 'teaser' | 'headline';
  length: SummaryLength;
  format: SummaryFormat;
  sharedContext: string;
}

/** `single` applies one configuration; `sweep` applies all of them */
export type EvaluationMode = 'single' | 'sweep';

// ─── Articles & Datasets ────────────────────────────────────────────

export interface Article {
  id: number;
  articleText: string;
  referenceSummary: string;
  /** Catalog key of the dataset the article came from */
  datasetTag: string;
}

export interface DatasetInfo {
  key: string;
  displayName: string;
  /** Upstream dataset name (Hugging Face id), or `sample` for the bundled set */
  sourceIdentifier: string;
  version: string | null;
  split: string | null;
  articleField: string;
  summaryField: string;
  description: string;
}

// ─── Scoring ────────────────────────────────────────────────────────

export type MetricName = 'rouge1' | 'rouge2' | 'rougeL';

export type MetricScores = Record<MetricName, number>;

/** Where a candidate summary came from */
export type Provenance = 'remote' | 'fallback';

export interface ScoredResult {
  articleId: number;
  configuration: ConfigurationId;
  articleLength: number;
  referenceSummary: string;
  generatedSummary: string;
  metricScores: MetricScores;
  /** generatedSummary.length / articleLength */
  compressionRatio: number;
  processingTimeMs: number;
  /** ISO 8601 */
  timestamp: string;
  provenance: Provenance;
  /** Request that produced the candidate (absent for synthesized fallbacks) */
  requestId?: string;
  /** Error reported by the worker, when the fallback replaced a failed reply */
  error?: string;
}

// ─── Run State ──────────────────────────────────────────────────────

export type RunStatus = 'idle' | 'running' | 'completed' | 'stopped';

export interface RunState {
  runId: string;
  status: RunStatus;
  isRunning: boolean;
  /** 1-based index of the article being processed (0 before the first) */
  currentArticle: number;
  totalArticles: number;
  results: ScoredResult[];
  logs: string[];
  mode: EvaluationMode;
  selectedConfiguration: ConfigurationId;
  dataset: string;
  maxArticles: number;
  startedAt?: string;
  completedAt?: string;
}

export interface StartRunRequest {
  dataset: string;
  maxArticles: number;
  mode: EvaluationMode;
  configuration: ConfigurationId;
}

export type StartRunOutcome =
  | { status: 'accepted'; runId: string; dataset: string; maxArticles: number; mode: EvaluationMode; configuration: ConfigurationId | null }
  | { status: 'conflict'; runId: string }
  | { status: 'invalid_dataset'; runId: string; dataset: string }
  | { status: 'invalid_configuration'; runId: string; configuration: string };

// ─── Result Summary ─────────────────────────────────────────────────

export interface ConfigurationSummary {
  configuration: ConfigurationId;
  count: number;
  averages: MetricScores;
}

export interface ResultSummary {
  totalResults: number;
  uniqueArticles: number;
  uniqueConfigurations: number;
  remoteCount: number;
  fallbackCount: number;
  averages: MetricScores;
  byConfiguration: ConfigurationSummary[];
  bestConfiguration: ConfigurationId | null;
}

// ─── Worker Wire Messages ───────────────────────────────────────────

/** Published to every connected worker when a request is issued */
export interface SummarizeRequestMessage {
  runId: string;
  requestId: string;
  articleId: number;
  text: string;
  configuration: ConfigurationId;
  options: SummarizerOptions;
  retryAttempt: number;
}

/** Sent back by a worker once it has a summary (or gave up) */
export interface SummarizationReply {
  requestId: string;
  articleId: number;
  summary: string;
  error?: string;
  runId?: string;
}

export type ReplyOutcome = 'accepted' | 'duplicate' | 'fallback';

export interface SummarizationAck {
  requestId: string;
  articleId: number;
  outcome: ReplyOutcome;
}

// ─── Notifications ──────────────────────────────────────────────────

export interface RunStartedNotification {
  runId: string;
  totalArticles: number;
  dataset: string;
  mode: EvaluationMode;
}

export interface ProgressNotification {
  runId: string;
  current: number;
  total: number;
  articleId: number;
}

export interface RunCompletedNotification {
  runId: string;
  totalResults: number;
  totalArticles: number;
}

export interface RunStoppedNotification {
  runId: string;
  currentArticle: number;
  totalResults: number;
}
