/**
 * Document Routes
 *
 * - POST /api/documents/:id/invalidate - Drop cache entries built from a
 *   superseded document version
 *
 * @module apps/api/routes/documents
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { CacheUnavailableError, type RAGPipeline } from '@groundwork/rag';
import type { ErrorResponse, InvalidateResponse } from '@groundwork/types';
import type { AppEnv } from '../middleware/request-logger';

const invalidateSchema = z.object({
  oldVersion: z.number().int().positive(),
});

export interface DocumentRouteDeps {
  pipeline: Pick<RAGPipeline, 'invalidate'>;
}

export function createDocumentRoutes({ pipeline }: DocumentRouteDeps) {
  const documents = new Hono<AppEnv>();

  documents.post(
    '/:id/invalidate',
    zValidator('json', invalidateSchema, (result, c) => {
      if (!result.success) {
        const errorResponse: ErrorResponse = {
          error: 'VALIDATION_ERROR',
          message: 'Invalid invalidation request',
          details: result.error.flatten().fieldErrors,
        };
        return c.json(errorResponse, 400);
      }
    }),
    async (c) => {
      const docId = c.req.param('id');
      const { oldVersion } = c.req.valid('json');

      let invalidated: number;
      try {
        invalidated = await pipeline.invalidate(docId, oldVersion);
      } catch (error) {
        if (error instanceof CacheUnavailableError) {
          console.warn(`[${c.get('requestId')}] ${error.message}`);
          const errorResponse: ErrorResponse = {
            error: 'CACHE_UNAVAILABLE',
            message: error.message,
            details: { docId, oldVersion },
          };
          return c.json(errorResponse, 503);
        }
        throw error;
      }

      console.info(
        `[${c.get('requestId')}] Invalidated ${invalidated} cache entries for ${docId}@${oldVersion}`
      );

      const response: InvalidateResponse = { docId, oldVersion, invalidated };
      return c.json(response);
    }
  );

  return documents;
}
