// ============================================================================
// HTTP API Types
// Wire shapes shared by the API server and its clients
// ============================================================================

export type Scalar = string | number | boolean | null;

/**
 * POST /api/query body
 */
export interface QueryRequestBody {
  query: string;
  topK?: number;
  /** Metadata equality filters; a null value means no constraint */
  filters?: Record<string, Scalar>;
}

export type QueryStatus = 'complete' | 'partial' | 'no_results';

export type CacheLevel = 'answer' | 'retrieval' | 'miss';

export type PipelineStageName =
  | 'route'
  | 'cache_check'
  | 'expand'
  | 'retrieve'
  | 'fuse'
  | 'rerank'
  | 'respond';

export type DegradedStage =
  | 'route'
  | 'cache'
  | 'expansion'
  | 'embedding'
  | 'lexical'
  | 'vector'
  | 'rerank'
  | 'generation';

export interface RankedDocument {
  docId: string;
  content: string;
  metadata: Record<string, Scalar>;
  /** Cross-encoder score, or the fused score when not reranked */
  crossScore: number;
  /** One-based */
  position: number;
}

export interface RouteInfo {
  needsRetrieval: boolean;
  targetBases: string[];
  reasoning: string;
  confidence: number;
  fallback: boolean;
}

export interface RetrievalInfo {
  variantCount: number;
  lexicalSearchMs: number;
  lexicalResultCount: number;
  vectorSearchMs: number;
  vectorResultCount: number;
  embeddingMs: number;
  overlapCount: number;
  rrfTopScore: number | null;
  deadlineHit: boolean;
}

/**
 * POST /api/query response
 */
export interface QueryResponse {
  queryId: string;
  query: string;
  status: QueryStatus;
  route: RouteInfo;
  cache: CacheLevel;
  results: RankedDocument[];
  answer: string | null;
  reranked: boolean;
  degradedStages: DegradedStage[];
  skippedStages: PipelineStageName[];
  trace: Array<{
    stage: PipelineStageName;
    outcome: 'completed' | 'degraded' | 'skipped' | 'cache_hit';
    durationMs: number;
  }>;
  retrieval: RetrievalInfo | null;
  latencyMs: number;
}

/**
 * POST /api/documents/:id/invalidate body
 */
export interface InvalidateRequestBody {
  oldVersion: number;
}

export interface InvalidateResponse {
  docId: string;
  oldVersion: number;
  /** Cache entries deleted */
  invalidated: number;
}

export interface NamespaceCacheStats {
  hits: number;
  misses: number;
  writes: number;
  staleEvictions: number;
  invalidations: number;
  hitRate: number;
}

/**
 * GET /api/cache/stats response
 */
export type CacheStatsResponse =
  | { enabled: false }
  | {
      enabled: true;
      backend: string;
      embedding: NamespaceCacheStats;
      retrieval: NamespaceCacheStats;
      answer: NamespaceCacheStats;
    };

/**
 * GET /api/health response
 */
export interface HealthResponse {
  healthy: boolean;
  components: {
    milvus: boolean;
    neo4j: boolean;
    postgres: boolean;
    /** null when no Redis cache is configured */
    redis: boolean | null;
  };
  timestamp: string;
}

export interface ComponentHealth {
  healthy: boolean;
  latencyMs?: number;
  message?: string;
}

/**
 * GET /api/health/models response
 */
export interface ModelHealthResponse {
  healthy: boolean;
  components: {
    llm: ComponentHealth;
    embedding: ComponentHealth;
    reranker: ComponentHealth;
  };
  timestamp: string;
}

/**
 * API error response
 */
export interface ErrorResponse {
  error: string;
  message: string;
  details?: unknown;
}

/**
 * Query status response (throttle metrics)
 */
export interface QueryStatusResponse {
  status: 'operational' | 'degraded';
  capacity: {
    maxConcurrent: number;
    active: number;
    available: number;
    queued: number;
    queueCapacity: number;
  };
  metrics: {
    totalRequests: number;
    totalQueued: number;
    totalRejected: number;
    totalTimedOut: number;
    avgQueueWaitMs: number;
    peakConcurrent: number;
    peakQueueSize: number;
  };
}
