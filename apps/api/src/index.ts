/**
 * Groundwork API Server
 *
 * Hono app served on Node for the hybrid retrieval pipeline.
 *
 * @module apps/api
 */

import { serve } from '@hono/node-server';
import { getDatabaseManager } from '@groundwork/database';
import { loadRagConfig } from '@groundwork/rag';
import { createApp } from './app';
import { loadApiConfig } from './config';
import { RequestThrottle } from './middleware/throttle';
import { createServices } from './services';

async function main(): Promise<void> {
  const apiConfig = loadApiConfig();
  const ragConfig = loadRagConfig();

  const services = await createServices(ragConfig, getDatabaseManager(), {
    queryLog: apiConfig.API_QUERY_LOG,
  });

  const app = createApp({
    pipeline: services.pipeline,
    checkHealth: services.checkHealth,
    checkModels: services.checkModels,
    queryLog: services.queryLog,
    throttle: new RequestThrottle({
      maxConcurrent: apiConfig.API_MAX_CONCURRENT,
      maxQueueSize: apiConfig.API_MAX_QUEUE_SIZE,
      queueTimeoutMs: apiConfig.API_QUEUE_TIMEOUT_MS,
    }),
  });

  const server = serve({ fetch: app.fetch, port: apiConfig.PORT }, (info) => {
    console.log(`Groundwork API listening on port ${info.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down...`);
    server.close();
    services
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  console.error('Failed to start API server:', error);
  process.exit(1);
});
