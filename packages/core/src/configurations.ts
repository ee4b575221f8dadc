/**
 * Summary configuration catalog.
 *
 * A configuration id is `<type>_<length>_<format>`. Sweep mode walks the full
 * cross-product in type-major order.
 */

import type {
  ConfigurationId,
  EvaluationMode,
  SummarizerOptions,
  SummaryConfiguration,
  SummaryFormat,
  SummaryLength,
  SummaryType,
} from './types.js';

export const SUMMARY_TYPES = ['tldr', 'key-points', 'teaser', 'headline'] as const satisfies readonly SummaryType[];

export const SUMMARY_LENGTHS = ['short', 'medium', 'long'] as const satisfies readonly SummaryLength[];

export const SUMMARY_FORMATS = ['plain-text', 'markdown'] as const satisfies readonly SummaryFormat[];

export const DEFAULT_CONFIGURATION: ConfigurationId = 'tldr_short_plain-text';

/** Shared context string passed to the browser summarizer */
export const SUMMARIZER_SHARED_CONTEXT =
  'Summarize news articles for quality evaluation, focusing on key facts and main points';

export function toConfigurationId(config: SummaryConfiguration): ConfigurationId {
  return `${config.type}_${config.length}_${config.format}`;
}

/** All 24 configurations, types outermost, formats innermost */
export const ALL_CONFIGURATIONS: readonly ConfigurationId[] = SUMMARY_TYPES.flatMap((type) =>
  SUMMARY_LENGTHS.flatMap((length) =>
    SUMMARY_FORMATS.map((format) => toConfigurationId({ type, length, format })),
  ),
);

function isMember<T extends string>(list: readonly T[], value: string): value is T {
  return list.some((member) => member === value);
}

/**
 * Parse a configuration id. Returns null for anything outside the catalog.
 */
export function parseConfigurationId(value: string): SummaryConfiguration | null {
  // key-points and plain-text carry hyphens, so split on underscores only
  const parts = value.split('_');
  if (parts.length !== 3) return null;
  const [type, length, format] = parts;
  if (type === undefined || length === undefined || format === undefined) return null;
  if (!isMember(SUMMARY_TYPES, type)) return null;
  if (!isMember(SUMMARY_LENGTHS, length)) return null;
  if (!isMember(SUMMARY_FORMATS, format)) return null;
  return { type, length, format };
}

export function isConfigurationId(value: string): value is ConfigurationId {
  return parseConfigurationId(value) !== null;
}

/**
 * Configurations a run applies to each article.
 */
export function configurationsForMode(
  mode: EvaluationMode,
  selected: ConfigurationId,
): ConfigurationId[] {
  return mode === 'single' ? [selected] : [...ALL_CONFIGURATIONS];
}

/**
 * Browser Summarizer options for a configuration id.
 */
export function toSummarizerOptions(id: ConfigurationId): SummarizerOptions {
  const parsed = parseConfigurationId(id);
  if (!parsed) throw new Error(`Unknown configuration: ${id}`);
  return {
    type: parsed.type === 'tldr' ? 'tl;dr' : parsed.type,
    length: parsed.length,
    format: parsed.format,
    sharedContext: SUMMARIZER_SHARED_CONTEXT,
  };
}
