/**
 * Request body ceiling for /api/*.
 *
 * A worker reply carries one summary; a control call a handful of fields.
 */

import { bodyLimit } from 'hono/body-limit';

export const API_BODY_LIMIT_BYTES = 1024 * 1024;

/** 1048576 -> "1MB", 256 -> "1KB" */
export function describeSize(bytes: number): string {
  const mb = 1024 * 1024;
  if (bytes % mb === 0) return `${bytes / mb}MB`;
  return `${Math.ceil(bytes / 1024)}KB`;
}

export function createBodyLimit(maxBytes: number = API_BODY_LIMIT_BYTES) {
  const maxSize = describeSize(maxBytes);
  return bodyLimit({
    maxSize: maxBytes,
    onError: (c) => c.json({ error: 'Request body too large', status: 413, maxSize }, 413),
  });
}
