/**
 * API Route Tests
 *
 * Requests go through the real Hono app and pipeline; indexes, models and
 * health checks are in-process fakes.
 *
 * @module apps/api/tests/integration/routes
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  CacheManager,
  CacheUnavailableError,
  InMemoryDocumentStore,
  MemoryCacheBackend,
  RAGPipeline,
  type CandidateResult,
  type RAGPipelineDeps,
} from '@groundwork/rag';
import type { HealthStatus, QueryLog } from '@groundwork/database';
import { createApp, type AppDeps } from '../../src/app';
import { RequestThrottle } from '../../src/middleware/throttle';

// ============================================================================
// Fixtures
// ============================================================================

const QUERY = 'restart a crashed pod';

const SEED = [
  { id: 'd1', content: 'kubectl delete pod restarts it', metadata: {} },
  { id: 'd2', content: 'pod lifecycle states include CrashLoopBackOff', metadata: {} },
];

const HEALTHY: HealthStatus = {
  milvus: true,
  neo4j: true,
  postgres: true,
  redis: null,
  healthy: true,
};

function fixedIndex(name: string, source: 'lexical' | 'vector', ids: string[]) {
  return {
    name,
    search: vi.fn(async (_input: string | number[], topK: number): Promise<CandidateResult[]> =>
      ids.slice(0, topK).map((docId, rank) => ({ docId, source, rank, rawScore: 1 - rank * 0.1 }))
    ),
  };
}

function createPipeline(deps: Partial<RAGPipelineDeps> = {}) {
  const store = new InMemoryDocumentStore(SEED);
  const cache = new CacheManager(new MemoryCacheBackend(), store);
  const lexical = fixedIndex('ops-lexical', 'lexical', ['d1', 'd2']);
  const vector = fixedIndex('ops-vector', 'vector', ['d2', 'd1']);

  const pipeline = new RAGPipeline(
    {
      store,
      bases: [{ name: 'ops', lexical, vector }],
      embedder: { embed: vi.fn(async () => [1, 0, 0]) },
      scorer: {
        score: vi.fn(async (_query: string, texts: string[]) =>
          texts.map((text) => (text.includes('restart') ? 0.9 : 0.3))
        ),
      },
      generator: { generate: vi.fn(async () => 'Delete the pod [1].') },
      cache,
      ...deps,
    },
    { alpha: 0.6 }
  );

  return { pipeline, lexical, vector };
}

function setup(overrides: Partial<AppDeps> = {}) {
  const { pipeline, lexical, vector } = createPipeline();
  const record = vi.fn<QueryLog['record']>().mockResolvedValue(undefined);
  const app = createApp({
    pipeline,
    checkHealth: async () => HEALTHY,
    queryLog: { record },
    ...overrides,
  });
  return { app, pipeline, record, lexical, vector };
}

function postJson(body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'info').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================================================
// POST /api/query
// ============================================================================

describe('POST /api/query', () => {
  it('should return the reranked answer and log the outcome', async () => {
    const { app, record } = setup();
    const res = await app.request('/api/query', postJson({ query: `  ${QUERY}  ` }));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      query: QUERY,
      status: 'complete',
      cache: 'miss',
      reranked: true,
      answer: 'Delete the pod [1].',
      degradedStages: [],
      results: [
        { docId: 'd1', crossScore: 0.9, position: 1 },
        { docId: 'd2', crossScore: 0.3, position: 2 },
      ],
    });
    expect(record).toHaveBeenCalledWith({
      queryId: expect.any(String),
      query: QUERY,
      status: 'complete',
      cacheLevel: 'miss',
      degradedStages: [],
      resultCount: 2,
      latencyMs: expect.any(Number),
      retrieval: {
        variantCount: 1,
        lexicalSearchMs: expect.any(Number),
        lexicalResultCount: 2,
        vectorSearchMs: expect.any(Number),
        vectorResultCount: 2,
        embeddingMs: expect.any(Number),
        overlapCount: 2,
        rrfTopScore: expect.closeTo(0.4 / 61 + 0.6 / 60, 10),
        deadlineHit: false,
      },
    });
  });

  it('should log no retrieval metrics for an answer cache hit', async () => {
    const { app, record } = setup();

    await app.request('/api/query', postJson({ query: QUERY }));
    const res = await app.request('/api/query', postJson({ query: QUERY }));

    expect(await res.json()).toMatchObject({ cache: 'answer', retrieval: null });
    expect(record).toHaveBeenLastCalledWith(
      expect.objectContaining({ cacheLevel: 'answer', retrieval: null })
    );
  });

  it('should pass topK and filters to the pipeline', async () => {
    const { app, vector } = setup();
    const res = await app.request(
      '/api/query',
      postJson({ query: QUERY, topK: 1, filters: { team: 'ops', archived: null } })
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ results: [{ docId: 'd1', position: 1 }] });
    expect(vector.search).toHaveBeenCalledWith(
      [1, 0, 0],
      20,
      expect.objectContaining({ filters: { team: 'ops', archived: null } })
    );
  });

  it('should answer a repeat query from the cache', async () => {
    const { app } = setup();

    await app.request('/api/query', postJson({ query: QUERY }));
    const res = await app.request('/api/query', postJson({ query: QUERY }));

    expect(await res.json()).toMatchObject({ cache: 'answer', answer: 'Delete the pod [1].' });
  });

  it('should reject a blank query', async () => {
    const { app, record } = setup();

    const res = await app.request('/api/query', postJson({ query: '   ' }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'VALIDATION_ERROR',
      message: 'Invalid query request',
      details: { query: ['Query cannot be empty'] },
    });
    expect(record).not.toHaveBeenCalled();
  });

  it('should reject filter keys that are not identifiers', async () => {
    const { app } = setup();

    const res = await app.request(
      '/api/query',
      postJson({ query: QUERY, filters: { 'team name': 'ops' } })
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: 'VALIDATION_ERROR',
      details: { filters: ['Filter keys must be identifiers'] },
    });
  });

  it('should reject a topK outside 1..50', async () => {
    const { app } = setup();

    const res = await app.request('/api/query', postJson({ query: QUERY, topK: 0 }));

    expect(res.status).toBe(400);
  });

  it('should respond 503 when every retrieval path fails', async () => {
    const { pipeline } = createPipeline({
      bases: [
        {
          name: 'ops',
          lexical: {
            name: 'ops-lexical',
            search: async (): Promise<CandidateResult[]> => {
              throw new Error('neo4j down');
            },
          },
          vector: fixedIndex('ops-vector', 'vector', ['d1']),
        },
      ],
      embedder: { embed: async (): Promise<number[]> => Promise.reject(new Error('embedder down')) },
      cache: null,
    });
    const { app, record } = setup({ pipeline });

    const res = await app.request(
      '/api/query',
      postJson({ query: QUERY }, { 'X-Request-ID': 'req-test' })
    );

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({
      error: 'RETRIEVAL_FAILED',
      message: 'All retrieval paths failed (2 attempted)',
      details: {
        failures: [
          expect.objectContaining({ source: 'lexical', message: 'neo4j down' }),
          expect.objectContaining({ source: 'vector', message: 'embedder down' }),
        ],
      },
    });
    expect(record).toHaveBeenCalledWith(
      expect.objectContaining({ queryId: 'req-test', status: 'failed', resultCount: 0, retrieval: null })
    );
  });

  it('should respond 500 on unexpected pipeline errors', async () => {
    const query = vi.fn<RAGPipeline['query']>().mockRejectedValue(new Error('boom'));
    const app = createApp({
      pipeline: { query, invalidate: vi.fn<RAGPipeline['invalidate']>(), getCacheStats: () => null },
      checkHealth: async () => HEALTHY,
    });

    const res = await app.request('/api/query', postJson({ query: QUERY }));

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'QUERY_PROCESSING_ERROR', message: 'boom' });
  });

  it('should keep serving when the query log fails', async () => {
    const record = vi.fn<QueryLog['record']>().mockRejectedValue(new Error('postgres down'));
    const { app } = setup({ queryLog: { record } });

    const res = await app.request('/api/query', postJson({ query: QUERY }));
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(res.status).toBe(200);
    expect(console.error).toHaveBeenCalledWith('Failed to log query:', 'postgres down');
  });

  it('should reject requests once the throttle queue is full', async () => {
    const throttle = new RequestThrottle({ maxConcurrent: 1, maxQueueSize: 0 });
    await throttle.acquire();
    const { app } = setup({ throttle });

    const res = await app.request('/api/query', postJson({ query: QUERY }));

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ error: 'QUEUE_FULL' });
  });
});

describe('GET /api/query/status', () => {
  it('should report throttle capacity', async () => {
    const { app } = setup({ throttle: new RequestThrottle({ maxConcurrent: 3, maxQueueSize: 7 }) });

    const res = await app.request('/api/query/status');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'operational',
      capacity: { maxConcurrent: 3, active: 0, available: 3, queued: 0, queueCapacity: 7 },
      metrics: {
        totalRequests: 0,
        totalQueued: 0,
        totalRejected: 0,
        totalTimedOut: 0,
        avgQueueWaitMs: 0,
        peakConcurrent: 0,
        peakQueueSize: 0,
      },
    });
  });
});

// ============================================================================
// Documents and cache
// ============================================================================

describe('POST /api/documents/:id/invalidate', () => {
  it('should drop cache entries built from the old version', async () => {
    const { app } = setup();
    await app.request('/api/query', postJson({ query: QUERY }));

    const res = await app.request(
      '/api/documents/d2/invalidate',
      postJson({ oldVersion: 1 })
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ docId: 'd2', oldVersion: 1, invalidated: 2 });

    const again = await app.request('/api/query', postJson({ query: QUERY }));
    expect(await again.json()).toMatchObject({ cache: 'miss' });
  });

  it('should reject a missing or non-positive version', async () => {
    const { app } = setup();

    const res = await app.request(
      '/api/documents/d2/invalidate',
      postJson({ oldVersion: 0 })
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'VALIDATION_ERROR' });
  });

  it('should respond 503 when the cache backend is unreachable', async () => {
    const invalidate = vi
      .fn<RAGPipeline['invalidate']>()
      .mockRejectedValue(new CacheUnavailableError('connection refused'));
    const app = createApp({
      pipeline: { query: vi.fn<RAGPipeline['query']>(), invalidate, getCacheStats: () => null },
      checkHealth: async () => HEALTHY,
    });

    const res = await app.request('/api/documents/d2/invalidate', postJson({ oldVersion: 1 }));

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: 'CACHE_UNAVAILABLE',
      message: 'Cache backend unavailable: connection refused',
      details: { docId: 'd2', oldVersion: 1 },
    });
    expect(invalidate).toHaveBeenCalledWith('d2', 1);
  });
});

describe('GET /api/cache/stats', () => {
  it('should report per-namespace counters', async () => {
    const { app } = setup();
    await app.request('/api/query', postJson({ query: QUERY }));
    await app.request('/api/query', postJson({ query: QUERY }));

    const res = await app.request('/api/cache/stats');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      enabled: true,
      backend: 'memory',
      answer: { hits: 1, misses: 1, writes: 1, hitRate: 0.5 },
    });
  });

  it('should report a disabled cache', async () => {
    const { pipeline } = createPipeline({ cache: null });
    const { app } = setup({ pipeline });

    const res = await app.request('/api/cache/stats');

    expect(await res.json()).toEqual({ enabled: false });
  });
});

// ============================================================================
// Health and fallbacks
// ============================================================================

describe('GET /api/health', () => {
  it('should report healthy components with 200', async () => {
    const { app } = setup();

    const res = await app.request('/api/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      healthy: true,
      components: { milvus: true, neo4j: true, postgres: true, redis: null },
      timestamp: expect.any(String),
    });
  });

  it('should respond 503 when a component is down', async () => {
    const { app } = setup({
      checkHealth: async () => ({ ...HEALTHY, redis: false, healthy: false }),
    });

    const res = await app.request('/api/health');

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({
      healthy: false,
      components: { redis: false },
    });
  });

  it('should check model services when configured', async () => {
    const { app } = setup({
      checkModels: async () => ({
        llm: { healthy: true, latencyMs: 12 },
        embedding: { healthy: true, latencyMs: 3 },
        reranker: { healthy: false, latencyMs: 5, message: 'Reranker unavailable: fetch failed' },
      }),
    });

    const res = await app.request('/api/health/models');

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({
      healthy: false,
      components: { reranker: { healthy: false, message: 'Reranker unavailable: fetch failed' } },
    });
  });

  it('should not expose model checks without a checker', async () => {
    const { app } = setup();

    const res = await app.request('/api/health/models');

    expect(res.status).toBe(404);
  });

  it('should answer the liveness check', async () => {
    const { app } = setup();

    const res = await app.request('/api/health/live');

    expect(await res.json()).toEqual({ alive: true });
  });
});

describe('request handling', () => {
  it('should echo the request id and timing headers', async () => {
    const { app } = setup();

    const res = await app.request('/api/health/live', { headers: { 'X-Request-ID': 'req-test' } });

    expect(res.headers.get('X-Request-ID')).toBe('req-test');
    expect(res.headers.get('X-Response-Time')).toMatch(/^\d+ms$/);
  });

  it('should return a JSON 404 for unknown routes', async () => {
    const { app } = setup();

    const res = await app.request('/api/nothing');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: 'NOT_FOUND',
      message: 'Route GET /api/nothing not found',
    });
  });
});
