/**
 * Cache Routes
 *
 * - GET /api/cache/stats - Hit, miss and invalidation counters per namespace
 *
 * @module apps/api/routes/cache
 */

import { Hono } from 'hono';
import type { RAGPipeline } from '@groundwork/rag';
import type { CacheStatsResponse } from '@groundwork/types';
import type { AppEnv } from '../middleware/request-logger';

export interface CacheRouteDeps {
  pipeline: Pick<RAGPipeline, 'getCacheStats'>;
}

export function createCacheRoutes({ pipeline }: CacheRouteDeps) {
  const cache = new Hono<AppEnv>();

  cache.get('/stats', (c) => {
    const stats = pipeline.getCacheStats();
    const response: CacheStatsResponse = stats ? { enabled: true, ...stats } : { enabled: false };
    return c.json(response);
  });

  return cache;
}
