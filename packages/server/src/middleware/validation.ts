/**
 * Request body validation.
 *
 * `validateBody(schema)` parses the JSON body with a zod schema and exposes
 * the parsed value as `c.get('validatedBody')`. Bad JSON and schema failures
 * both answer 400.
 */

import type { Context } from 'hono';
import { createMiddleware } from 'hono/factory';
import type { ZodError, ZodTypeAny, output } from 'zod';

export interface ValidationIssue {
  /** Dotted path into the body, '' for the body itself */
  path: string;
  message: string;
}

export function formatZodErrors(error: ZodError): ValidationIssue[] {
  return error.issues.map(({ path, message }) => ({ path: path.join('.'), message }));
}

const NO_BODY = Symbol('no-body');

async function readJson(c: Context): Promise<unknown> {
  return c.req.json().catch(() => NO_BODY);
}

export function validateBody<S extends ZodTypeAny>(schema: S) {
  return createMiddleware<{ Variables: { validatedBody: output<S> } }>(async (c, next) => {
    const raw = await readJson(c);
    if (raw === NO_BODY || raw === null) {
      return c.json({ error: 'Invalid JSON body', status: 400 }, 400);
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      return c.json({ error: 'Validation failed', status: 400, details: formatZodErrors(parsed.error) }, 400);
    }

    c.set('validatedBody', parsed.data);
    await next();
  });
}
