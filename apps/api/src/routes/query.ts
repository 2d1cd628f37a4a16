/**
 * Query Routes
 *
 * - POST /api/query - Run a question through the retrieval pipeline
 * - GET /api/query/status - Throttle capacity and counters
 *
 * @module apps/api/routes/query
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { RetrievalFailedError, type RAGPipeline } from '@groundwork/rag';
import type { QueryLog, QueryLogEntry } from '@groundwork/database';
import type { ErrorResponse, QueryResponse, QueryStatusResponse } from '@groundwork/types';
import { createThrottleMiddleware, type RequestThrottle } from '../middleware/throttle';
import type { AppEnv } from '../middleware/request-logger';

// ============================================================================
// Validation Schemas
// ============================================================================

/** Metadata keys reach index filter expressions, so only identifiers pass */
export const FILTER_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const querySchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'Query cannot be empty')
    .max(2000, 'Query exceeds maximum length of 2000 characters'),
  topK: z.number().int().min(1).max(50).optional(),
  filters: z
    .record(z.string().regex(FILTER_KEY_PATTERN, 'Filter keys must be identifiers'), scalarSchema)
    .optional(),
});

// ============================================================================
// Routes
// ============================================================================

export interface QueryRouteDeps {
  pipeline: Pick<RAGPipeline, 'query'>;
  throttle: RequestThrottle;
  queryLog?: QueryLog | null;
}

export function createQueryRoutes({ pipeline, throttle, queryLog = null }: QueryRouteDeps) {
  const query = new Hono<AppEnv>();

  const logQuery = (entry: QueryLogEntry): void => {
    if (!queryLog) return;
    queryLog.record(entry).catch((error: unknown) => {
      console.error(
        'Failed to log query:',
        error instanceof Error ? error.message : String(error)
      );
    });
  };

  /**
   * POST /api/query
   */
  query.post(
    '/',
    createThrottleMiddleware(throttle, 'query'),
    zValidator('json', querySchema, (result, c) => {
      if (!result.success) {
        const errorResponse: ErrorResponse = {
          error: 'VALIDATION_ERROR',
          message: 'Invalid query request',
          details: result.error.flatten().fieldErrors,
        };
        return c.json(errorResponse, 400);
      }
    }),
    async (c) => {
      const body = c.req.valid('json');
      const requestId = c.get('requestId');

      try {
        const response: QueryResponse = await pipeline.query({
          query: body.query,
          topK: body.topK,
          filters: body.filters,
          signal: c.req.raw.signal,
        });

        logQuery({
          queryId: response.queryId,
          query: body.query,
          status: response.status,
          cacheLevel: response.cache,
          degradedStages: response.degradedStages,
          resultCount: response.results.length,
          latencyMs: response.latencyMs,
          retrieval: response.retrieval,
        });

        return c.json(response, 200);
      } catch (error) {
        logQuery({
          queryId: requestId,
          query: body.query,
          status: 'failed',
          cacheLevel: null,
          degradedStages: [],
          resultCount: 0,
          latencyMs: Date.now() - c.get('startTime'),
          retrieval: null,
        });

        if (error instanceof RetrievalFailedError) {
          console.warn(`[${requestId}] ${error.message}`);
          const errorResponse: ErrorResponse = {
            error: 'RETRIEVAL_FAILED',
            message: error.message,
            details: { failures: error.failures },
          };
          return c.json(errorResponse, 503);
        }

        if (error instanceof RangeError) {
          const errorResponse: ErrorResponse = {
            error: 'VALIDATION_ERROR',
            message: error.message,
          };
          return c.json(errorResponse, 400);
        }

        console.error(`[${requestId}] Query processing error:`, error);
        const errorResponse: ErrorResponse = {
          error: 'QUERY_PROCESSING_ERROR',
          message: error instanceof Error ? error.message : 'Failed to process query',
        };
        return c.json(errorResponse, 500);
      }
    }
  );

  /**
   * GET /api/query/status
   */
  query.get('/status', (c) => {
    const status = throttle.getStatus();
    const metrics = throttle.getMetrics();

    const response: QueryStatusResponse = {
      status: status.queued > 0 ? 'degraded' : 'operational',
      capacity: {
        maxConcurrent: throttle.maxConcurrent,
        active: status.active,
        available: status.available,
        queued: status.queued,
        queueCapacity: status.queueCapacity,
      },
      metrics: {
        totalRequests: metrics.totalRequests,
        totalQueued: metrics.totalQueued,
        totalRejected: metrics.totalRejected,
        totalTimedOut: metrics.totalTimedOut,
        avgQueueWaitMs: Math.round(metrics.avgQueueWaitMs),
        peakConcurrent: metrics.peakConcurrent,
        peakQueueSize: metrics.peakQueueSize,
      },
    };

    return c.json(response);
  });

  return query;
}
