/**
 * Zod schemas for cached values, checked on every read
 * @module @groundwork/rag/cache/schemas
 */

import { z } from 'zod';

export const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const scalarMapSchema = z.record(scalarSchema);

export const docVersionSchema = z.object({
  docId: z.string(),
  version: z.number().int().positive(),
});

export const cacheEntrySchema = z.object({
  key: z.string(),
  value: z.unknown(),
  createdAt: z.number(),
  ttlSeconds: z.number().positive(),
  sourceDocVersions: z.array(docVersionSchema),
});

export const embeddingValueSchema = z.array(z.number()).min(1);

export const fusedResultSchema = z.object({
  docId: z.string(),
  fusedScore: z.number(),
  contributingRanks: z.object({
    lexical: z.number().int().nonnegative().optional(),
    vector: z.number().int().nonnegative().optional(),
  }),
});

export const retrievalValueSchema = z.array(fusedResultSchema);

export const rerankedResultSchema = z.object({
  docId: z.string(),
  content: z.string(),
  metadata: scalarMapSchema,
  crossScore: z.number(),
  position: z.number().int().positive(),
});

export const answerValueSchema = z.object({
  results: z.array(rerankedResultSchema),
  answer: z.string().nullable(),
  reranked: z.boolean(),
});
