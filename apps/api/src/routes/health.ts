/**
 * Health Check Routes
 *
 * - GET /api/health - Milvus, Neo4j, Postgres and Redis reachability
 * - GET /api/health/models - Check the chat, embedding and reranker services
 * - GET /api/health/live - Liveness check
 *
 * @module apps/api/routes/health
 */

import { Hono } from 'hono';
import type { HealthStatus } from '@groundwork/database';
import type { HealthResponse, ModelHealthResponse } from '@groundwork/types';
import type { AppEnv } from '../middleware/request-logger';

export interface HealthRouteDeps {
  checkHealth: () => Promise<HealthStatus>;
  /** Model checks cost a request each, so they sit on their own route */
  checkModels?: () => Promise<ModelHealthResponse['components']>;
}

export function createHealthRoutes({ checkHealth, checkModels }: HealthRouteDeps) {
  const health = new Hono<AppEnv>();

  /**
   * GET /api/health
   */
  health.get('/', async (c) => {
    const status = await checkHealth();

    const response: HealthResponse = {
      healthy: status.healthy,
      components: {
        milvus: status.milvus,
        neo4j: status.neo4j,
        postgres: status.postgres,
        redis: status.redis,
      },
      timestamp: new Date().toISOString(),
    };

    return c.json(response, response.healthy ? 200 : 503);
  });

  /**
   * GET /api/health/models
   */
  if (checkModels) {
    health.get('/models', async (c) => {
      const components = await checkModels();

      const response: ModelHealthResponse = {
        healthy: Object.values(components).every((component) => component.healthy),
        components,
        timestamp: new Date().toISOString(),
      };

      return c.json(response, response.healthy ? 200 : 503);
    });
  }

  /**
   * GET /api/health/live
   */
  health.get('/live', (c) => c.json({ alive: true }, 200));

  return health;
}
