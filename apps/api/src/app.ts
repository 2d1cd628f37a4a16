/**
 * Groundwork API application
 *
 * Builds the Hono app around an already-wired pipeline so the server entry
 * point and the tests share one routing table.
 *
 * @module apps/api/app
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { RAGPipeline } from '@groundwork/rag';
import type { HealthStatus, QueryLog } from '@groundwork/database';
import type { ErrorResponse, ModelHealthResponse } from '@groundwork/types';
import { requestLogger, type AppEnv } from './middleware/request-logger';
import { RequestThrottle } from './middleware/throttle';
import { createQueryRoutes } from './routes/query';
import { createDocumentRoutes } from './routes/documents';
import { createCacheRoutes } from './routes/cache';
import { createHealthRoutes } from './routes/health';

export const API_VERSION = '1.0.0';

export interface AppDeps {
  pipeline: Pick<RAGPipeline, 'query' | 'invalidate' | 'getCacheStats'>;
  checkHealth: () => Promise<HealthStatus>;
  checkModels?: () => Promise<ModelHealthResponse['components']>;
  queryLog?: QueryLog | null;
  /** Admission control for query routes; a default throttle when omitted */
  throttle?: RequestThrottle;
}

export function createApp(deps: AppDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const throttle = deps.throttle ?? new RequestThrottle();

  // Global middleware
  app.use('*', cors());
  app.use('*', requestLogger);

  // Mount routes
  app.route(
    '/api/health',
    createHealthRoutes({ checkHealth: deps.checkHealth, checkModels: deps.checkModels })
  );
  app.route(
    '/api/query',
    createQueryRoutes({ pipeline: deps.pipeline, throttle, queryLog: deps.queryLog })
  );
  app.route('/api/documents', createDocumentRoutes({ pipeline: deps.pipeline }));
  app.route('/api/cache', createCacheRoutes({ pipeline: deps.pipeline }));

  app.get('/', (c) =>
    c.json({
      name: 'Groundwork API',
      version: API_VERSION,
      status: 'running',
      endpoints: {
        health: '/api/health',
        query: '/api/query',
        documents: '/api/documents/:id/invalidate',
        cache: '/api/cache/stats',
      },
    })
  );

  app.notFound((c) => {
    const errorResponse: ErrorResponse = {
      error: 'NOT_FOUND',
      message: `Route ${c.req.method} ${c.req.path} not found`,
    };
    return c.json(errorResponse, 404);
  });

  app.onError((err, c) => {
    console.error(`[${c.get('requestId')}] Unhandled error:`, err);
    const errorResponse: ErrorResponse = {
      error: 'INTERNAL_SERVER_ERROR',
      message: err.message || 'An unexpected error occurred',
    };
    return c.json(errorResponse, 500);
  });

  return app;
}
