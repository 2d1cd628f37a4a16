/**
 * Core types for the retrieval pipeline
 * @module @groundwork/rag/types
 */

// ============================================================================
// Documents and Queries
// ============================================================================

/**
 * Metadata values are flat scalars so they can be used as index filters
 */
export type Scalar = string | number | boolean | null;

export type ScalarMap = Record<string, Scalar>;

/**
 * A versioned document record. A new version is a new record; content is
 * never edited in place.
 */
export interface Document {
  id: string;
  content: string;
  metadata: ScalarMap;
  version: number;
}

/**
 * A single incoming request
 */
export interface Query {
  text: string;
  requestedTopK: number;
  filters: ScalarMap;
}

// ============================================================================
// Retrieval Types
// ============================================================================

export type CandidateSource = 'lexical' | 'vector';

/**
 * One hit from a lexical or vector index. `rank` is the zero-based position
 * in that index's own ordering.
 */
export interface CandidateResult {
  docId: string;
  source: CandidateSource;
  rank: number;
  rawScore: number;
}

/**
 * Result after Reciprocal Rank Fusion
 */
export interface FusedResult {
  docId: string;
  fusedScore: number;
  /** Best zero-based rank contributed by each source */
  contributingRanks: Partial<Record<CandidateSource, number>>;
}

/**
 * Final result after cross-encoder scoring (or the fused fallback)
 */
export interface RerankedResult {
  docId: string;
  content: string;
  metadata: ScalarMap;
  crossScore: number;
  /** One-based position in the final ordering */
  position: number;
}

/**
 * Timings and counts of one retrieval pass
 */
export interface RetrievalMetrics {
  lexicalSearchMs: number;
  lexicalResultCount: number;
  vectorSearchMs: number;
  vectorResultCount: number;
  embeddingMs: number;
  /** Fused results that both sources contributed */
  overlapCount: number;
  rrfTopScore: number | null;
}

/**
 * Retrieval metrics of a whole request: counts summed and timings maxed over
 * variants, overlap and top score taken from the merged ranking
 */
export interface RetrievalSummary extends RetrievalMetrics {
  variantCount: number;
  deadlineHit: boolean;
}

/**
 * Options passed to every index search
 */
export interface SearchOptions {
  filters?: ScalarMap;
  signal?: AbortSignal;
}

// ============================================================================
// Cache Types
// ============================================================================

/**
 * Invalidation tag: the exact document version a cached value was built from
 */
export interface DocVersion {
  docId: string;
  version: number;
}

export type CacheNamespace = 'embedding' | 'retrieval' | 'answer';

export interface CacheEntry<T = unknown> {
  key: string;
  value: T;
  /** Epoch milliseconds */
  createdAt: number;
  ttlSeconds: number;
  sourceDocVersions: DocVersion[];
}

/**
 * Payload stored in the answer cache and returned to callers
 */
export interface AnswerPayload {
  results: RerankedResult[];
  answer: string | null;
  reranked: boolean;
}

// ============================================================================
// Routing Types
// ============================================================================

export interface RouteDecision {
  needsRetrieval: boolean;
  targetBases: string[];
  reasoning: string;
  /** Classifier confidence in [0, 1]; 0 when the decision is a fallback */
  confidence: number;
  /** True when the safe default was applied instead of the classifier output */
  fallback: boolean;
}

// ============================================================================
// Pipeline Types
// ============================================================================

export type PipelineStage =
  | 'route'
  | 'cache_check'
  | 'expand'
  | 'retrieve'
  | 'fuse'
  | 'rerank'
  | 'respond';

export type StageOutcome = 'completed' | 'degraded' | 'skipped' | 'cache_hit';

export interface StageRecord {
  stage: PipelineStage;
  outcome: StageOutcome;
  durationMs: number;
}

/**
 * Components that can fall back and be listed in `degradedStages`
 */
export type DegradableComponent =
  | 'route'
  | 'cache'
  | 'expansion'
  | 'embedding'
  | 'lexical'
  | 'vector'
  | 'rerank'
  | 'generation';

export type PipelineStatus = 'complete' | 'partial' | 'no_results';

export type CacheLevel = 'answer' | 'retrieval' | 'miss';

export interface PipelineResponse extends AnswerPayload {
  queryId: string;
  query: string;
  status: PipelineStatus;
  route: RouteDecision;
  cache: CacheLevel;
  degradedStages: DegradableComponent[];
  /** Stages not reached because the request deadline expired */
  skippedStages: PipelineStage[];
  trace: StageRecord[];
  /** Null when the request did not reach retrieval */
  retrieval: RetrievalSummary | null;
  latencyMs: number;
}

// ============================================================================
// Health Types
// ============================================================================

export interface ComponentHealth {
  healthy: boolean;
  latencyMs?: number;
  message?: string;
}
