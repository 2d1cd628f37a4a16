/**
 * @groundwork/rag - Hybrid Retrieval, Reranking and Caching Pipeline
 *
 * Combines Neo4j full-text search with Milvus vector search through
 * weighted Reciprocal Rank Fusion, re-scores the fused list with a
 * cross-encoder and caches embeddings, rankings and answers with
 * version-tagged invalidation.
 *
 * @module @groundwork/rag
 */

// ============================================================================
// Core Types and Errors
// ============================================================================

export * from './types';

export {
  RagServiceError,
  IndexUnavailableError,
  EmbeddingUnavailableError,
  CacheUnavailableError,
  GenerationUnavailableError,
  ExpansionUnavailableError,
  ClassifierUnavailableError,
  RerankerUnavailableError,
  StageTimeoutError,
  RetrievalFailedError,
  errorMessage,
  isDeadlineError,
} from './errors';
export type { ErrorCategory, ServiceName, SourceFailure } from './errors';

export { loadRagConfig } from './config';
export type { RagEnv } from './config';

// ============================================================================
// RAG Pipeline
// ============================================================================

export { RAGPipeline, createRAGPipeline, summarizeRetrieval } from './pipeline';
export type { RAGPipelineConfig, RAGPipelineDeps, QueryRequest, StageTimeouts } from './pipeline';

export { RequestDeadline, withTimeout } from './runtime/deadline';
export type { TimeoutOptions } from './runtime/deadline';
export { ConcurrencyLimiter } from './runtime/limiter';
export type { LimiterStatus } from './runtime/limiter';

// ============================================================================
// Documents
// ============================================================================

export { InMemoryDocumentStore, VersionBumpEmitter } from './documents/store';
export type { DocumentStore, VersionBumpListener } from './documents/store';
export { PostgresDocumentStore, createPostgresDocumentStore } from './documents/postgres';

// ============================================================================
// Retrieval Components
// ============================================================================

export {
  Neo4jLexicalIndex,
  createLexicalIndex,
  escapeLuceneQuery,
} from './retrieval/lexical';
export type { LexicalIndex, Neo4jLexicalIndexConfig, Neo4jSessionFactory } from './retrieval/lexical';

export { MilvusVectorIndex, createVectorIndex } from './retrieval/vector';
export type { VectorIndex, MilvusVectorIndexConfig, MilvusSearchClient } from './retrieval/vector';

export { activeFilters, toMilvusFilter } from './retrieval/filters';

export { HybridRetriever, createHybridRetriever } from './retrieval/hybrid';
export type {
  KnowledgeBase,
  EmbedFn,
  HybridRetrieverConfig,
  VariantRetrievalResult,
} from './retrieval/hybrid';

export {
  DEFAULT_RRF_K,
  reciprocalRankFusion,
  fuseHybrid,
  fuseVariants,
  variantWeights,
  compareFused,
} from './fusion/rrf';
export type { RankedList, HybridFusionOptions, WeightedVariant } from './fusion/rrf';

// ============================================================================
// Query Understanding
// ============================================================================

export {
  QueryExpander,
  LLMQueryExpansion,
  createQueryExpander,
  dedupeVariants,
  normalizeQueryText,
  mergeVariantResults,
} from './expansion/expander';
export type {
  QueryExpansionStrategy,
  QueryVariant,
  ExpansionResult,
  QueryExpanderConfig,
} from './expansion/expander';

export {
  QueryRouter,
  KeywordQueryClassifier,
  LLMQueryClassifier,
  createQueryRouter,
} from './routing/router';
export type {
  QueryClassifier,
  ClassifierOutput,
  QueryRouterConfig,
  RouteResult,
  KeywordQueryClassifierConfig,
} from './routing/router';

// ============================================================================
// LLM Components
// ============================================================================

export { HttpEmbedder, createEmbedder } from './generation/embedder';
export type { Embedder, HttpEmbedderConfig } from './generation/embedder';

export {
  ChatLLM,
  createLLM,
  LLMServiceError,
  classifyLLMError,
  calculateBackoffDelay,
} from './generation/llm';
export type {
  ChatLLMConfig,
  ChatMessage,
  ChatBackend,
  LLMErrorType,
  RetryConfig,
} from './generation/llm';

export { LLMAnswerGenerator, createAnswerGenerator } from './generation/generator';
export type { AnswerGenerator } from './generation/generator';

export {
  formatContext,
  createGroundedPrompt,
  GROUNDED_ANSWER_SYSTEM_PROMPT,
  DIRECT_ANSWER_SYSTEM_PROMPT,
} from './generation/prompts';
export type { ContextDocument } from './generation/prompts';

// ============================================================================
// Reranking
// ============================================================================

export {
  Reranker,
  HttpCrossEncoder,
  createCrossEncoder,
  createReranker,
  fusedOrder,
  toRerankCandidates,
} from './reranking/reranker';
export type {
  CrossEncoderScorer,
  RerankCandidate,
  RerankerConfig,
  HttpCrossEncoderConfig,
} from './reranking/reranker';

// ============================================================================
// Caching
// ============================================================================

export {
  CacheManager,
  createCacheManager,
  DEFAULT_CACHE_CONFIG,
  embeddingKey,
  requestKey,
  versionTag,
} from './cache/manager';
export type { CacheManagerConfig, CacheKeyInput, CacheStats, NamespaceStats } from './cache/manager';

export { MemoryCacheBackend } from './cache/backend';
export type { CacheBackend, Clock, MemoryCacheBackendConfig } from './cache/backend';

export { RedisCacheBackend, createRedisCacheBackend } from './cache/redis';
export type { RedisClient, RedisCacheBackendConfig } from './cache/redis';

// ============================================================================
// Evaluation
// ============================================================================

export {
  evaluateRetrieval,
  rankingMetrics,
  precisionAtK,
  recallAtK,
  reciprocalRank,
  ndcgAtK,
} from './evaluation/metrics';
export type {
  EvaluationCase,
  EvaluationReport,
  CaseEvaluation,
  RankingMetrics,
} from './evaluation/metrics';
