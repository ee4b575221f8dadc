/**
 * @digestbench/core: Zod Validation Schemas
 *
 * Runtime validation for control-surface and worker payloads.
 */
import { z } from 'zod';
import { isConfigurationId } from './configurations.js';
import type { ConfigurationId } from './types.js';

export const evaluationModeSchema = z.enum(['single', 'sweep']);

export const configurationIdSchema = z.custom<ConfigurationId>(
  (value) => typeof value === 'string' && isConfigurationId(value),
  { message: 'configuration must look like <type>_<length>_<format>' },
);

/**
 * Body of POST /api/runs/:runId/start.
 * Dataset and configuration are checked against the catalogs by the run
 * controller so that it can answer with a specific outcome.
 */
export const startRunSchema = z.object({
  dataset: z.string().min(1).optional(),
  maxArticles: z.number().int().optional(),
  mode: evaluationModeSchema.default('single'),
  configuration: z.string().min(1).optional(),
});

/** Body of POST /api/worker/replies */
export const summarizationReplySchema = z.object({
  requestId: z.string().min(1, 'requestId is required'),
  articleId: z.number().int(),
  summary: z.string().default(''),
  error: z.string().min(1).optional(),
  runId: z.string().min(1).optional(),
});

export const runIdSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9_-]+$/, 'runId must be alphanumeric, dash or underscore');

export const createRunSchema = z.object({
  runId: runIdSchema.optional(),
});

export type StartRunBody = z.infer<typeof startRunSchema>;
export type SummarizationReplyBody = z.infer<typeof summarizationReplySchema>;
export type CreateRunBody = z.infer<typeof createRunSchema>;
