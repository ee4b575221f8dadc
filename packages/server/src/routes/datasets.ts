/**
 * GET /api/datasets: dataset catalog and the default selection
 */

import { Hono } from 'hono';
import { DATASET_CATALOG } from '../lib/datasets/catalog.js';

export function datasetsRoutes(defaultDataset: string) {
  const app = new Hono();

  app.get('/', (c) => {
    return c.json({ datasets: DATASET_CATALOG, default: defaultDataset });
  });

  return app;
}
