/**
 * Validation middleware + body limit
 */
import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { z } from 'zod';
import { startRunSchema, summarizationReplySchema } from '@digestbench/core';
import { validateBody, formatZodErrors } from '../validation.js';
import { API_BODY_LIMIT_BYTES, createBodyLimit, describeSize } from '../body-limit.js';
import { jsonRequest } from '../../__tests__/test-helpers.js';

function createTestApp(maxBytes?: number) {
  const app = new Hono();
  app.use('/api/*', createBodyLimit(maxBytes));

  app.post('/api/start', validateBody(startRunSchema), (c) => {
    const body = c.get('validatedBody');
    return c.json({ mode: body.mode, dataset: body.dataset ?? null });
  });

  app.post('/api/reply', validateBody(summarizationReplySchema), (c) => {
    const body = c.get('validatedBody');
    return c.json({ summary: body.summary, length: body.summary.length });
  });

  return app;
}

describe('validateBody middleware', () => {
  const app = createTestApp();

  it('passes parsed input through with defaults applied', async () => {
    const res = await app.request('/api/start', jsonRequest('POST', { dataset: 'xsum' }));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ mode: 'single', dataset: 'xsum' });
  });

  it('fills an omitted summary with the empty string', async () => {
    const res = await app.request('/api/reply', jsonRequest('POST', { requestId: 'req_1', articleId: 1 }));
    expect(await res.json()).toEqual({ summary: '', length: 0 });
  });

  it('returns 400 with one detail per issue', async () => {
    const res = await app.request('/api/reply', jsonRequest('POST', { requestId: '', articleId: 1.5 }));
    const json = await res.json();

    expect(res.status).toBe(400);
    expect(json.error).toBe('Validation failed');
    expect(json.status).toBe(400);
    expect(json.details.map((d: { path: string }) => d.path)).toEqual(['requestId', 'articleId']);
    expect(json.details[0].message).toBe('requestId is required');
  });

  it('returns 400 for invalid JSON', async () => {
    const res = await app.request('/api/start', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: 'not json at all',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid JSON body', status: 400 });
  });
});

describe('createBodyLimit', () => {
  const app = createTestApp();

  it('allows ordinary replies', async () => {
    const res = await app.request('/api/reply', jsonRequest('POST', { requestId: 'r', articleId: 1, summary: 'ok' }));
    expect(res.status).toBe(200);
  });

  it('rejects payloads over 1MB with 413', async () => {
    const summary = 'x'.repeat(API_BODY_LIMIT_BYTES);
    const res = await app.request('/api/reply', jsonRequest('POST', { requestId: 'r', articleId: 1, summary }));
    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: 'Request body too large', status: 413, maxSize: '1MB' });
  });

  it('honors a smaller ceiling', async () => {
    const small = createTestApp(256);
    const summary = 'x'.repeat(300);
    const res = await small.request('/api/reply', jsonRequest('POST', { requestId: 'r', articleId: 1, summary }));
    expect(res.status).toBe(413);
    expect((await res.json()).maxSize).toBe('1KB');
  });

  it('describes sizes in MB or KB', () => {
    expect(describeSize(API_BODY_LIMIT_BYTES)).toBe('1MB');
    expect(describeSize(10 * 1024 * 1024)).toBe('10MB');
    expect(describeSize(1500)).toBe('2KB');
  });
});

describe('formatZodErrors', () => {
  it('joins nested paths with dots', () => {
    const schema = z.object({ options: z.object({ length: z.enum(['short', 'medium', 'long']) }) });
    const result = schema.safeParse({ options: { length: 'epic' } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)[0]?.path).toBe('options.length');
    }
  });
});
