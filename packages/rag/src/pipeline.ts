/**
 * RAG Pipeline
 *
 * Per-request state machine:
 * ROUTE -> CACHE_CHECK -> EXPAND -> RETRIEVE -> FUSE -> RERANK -> RESPOND_AND_CACHE
 *
 * Every collaborator call runs under its stage timeout and the request
 * deadline. Enhancement stages fall back locally; retrieval paths degrade
 * one by one and only fail the request when all of them fail. When the
 * deadline expires the caller gets a `partial` response listing the
 * stages that never ran; retrieval lists that arrived before it are still
 * returned in fused order.
 *
 * @module @groundwork/rag/pipeline
 */

import type {
  AnswerPayload,
  CacheLevel,
  DegradableComponent,
  DocVersion,
  Document,
  FusedResult,
  PipelineResponse,
  PipelineStage,
  PipelineStatus,
  Query,
  RerankedResult,
  RetrievalSummary,
  RouteDecision,
  ScalarMap,
  StageOutcome,
} from './types';
import type { DocumentStore } from './documents/store';
import type { Embedder } from './generation/embedder';
import type { AnswerGenerator } from './generation/generator';
import type { CacheKeyInput, CacheManager, CacheStats } from './cache/manager';
import {
  HybridRetriever,
  type EmbedFn,
  type HybridRetrieverConfig,
  type KnowledgeBase,
  type VariantRetrievalResult,
} from './retrieval/hybrid';
import {
  QueryExpander,
  mergeVariantResults,
  type ExpansionResult,
  type QueryExpansionStrategy,
  type QueryVariant,
} from './expansion/expander';
import {
  Reranker,
  fusedOrder,
  toRerankCandidates,
  type CrossEncoderScorer,
} from './reranking/reranker';
import { QueryRouter, type QueryClassifier } from './routing/router';
import { RequestDeadline, withTimeout } from './runtime/deadline';
import { ConcurrencyLimiter } from './runtime/limiter';
import { DEFAULT_RRF_K, assertValidAlpha, assertValidK } from './fusion/rrf';
import {
  EmbeddingUnavailableError,
  RetrievalFailedError,
  errorMessage,
} from './errors';

// ============================================================================
// Configuration
// ============================================================================

export interface StageTimeouts {
  route: number;
  cache: number;
  expand: number;
  /** Budget of each individual index or embedding call */
  retrieve: number;
  rerank: number;
  generate: number;
}

export interface RAGPipelineConfig {
  /** Vector weight in hybrid fusion */
  alpha: number;
  rrfK: number;
  /** Candidates requested from each index */
  retrievalTopK: number;
  /** Results returned when the request does not say */
  rerankTopK: number;
  rerankMaxCandidates: number;
  numVariations: number;
  variantDecay: number;
  /** Upper bound on variants retrieved at once */
  maxConcurrency: number;
  minRouteConfidence: number;
  timeouts: StageTimeouts;
  /** Overall request budget */
  deadlineMs: number;
  /** Document fetch budget for a partial response once the deadline has passed */
  partialGraceMs: number;
}

const DEFAULT_CONFIG: RAGPipelineConfig = {
  alpha: 0.5,
  rrfK: DEFAULT_RRF_K,
  retrievalTopK: 20,
  rerankTopK: 5,
  rerankMaxCandidates: 50,
  numVariations: 3,
  variantDecay: 0.7,
  maxConcurrency: 5,
  minRouteConfidence: 0.5,
  timeouts: {
    route: 2000,
    cache: 500,
    expand: 5000,
    retrieve: 10000,
    rerank: 10000,
    generate: 90000,
  },
  deadlineMs: 120000,
  partialGraceMs: 250,
};

/**
 * Collaborators; everything but the store and bases is optional
 */
export interface RAGPipelineDeps {
  store: DocumentStore;
  bases: KnowledgeBase[];
  /** Required when any base has a vector index */
  embedder?: Embedder | null;
  scorer?: CrossEncoderScorer | null;
  generator?: AnswerGenerator | null;
  classifier?: QueryClassifier | null;
  expansion?: QueryExpansionStrategy | null;
  cache?: CacheManager | null;
}

export interface QueryRequest {
  query: string;
  topK?: number;
  filters?: ScalarMap;
  /** Caller cancellation; treated like the request deadline */
  signal?: AbortSignal;
}

const STAGES: readonly PipelineStage[] = [
  'route',
  'cache_check',
  'expand',
  'retrieve',
  'fuse',
  'rerank',
  'respond',
];

const DEGRADABLE_ORDER: readonly DegradableComponent[] = [
  'route',
  'cache',
  'expansion',
  'embedding',
  'lexical',
  'vector',
  'rerank',
  'generation',
];

/** Degradations that make a fused ranking unfit for the retrieval cache */
const RETRIEVAL_DEGRADATIONS: readonly DegradableComponent[] = [
  'expansion',
  'embedding',
  'lexical',
  'vector',
];

// ============================================================================
// Per-request state
// ============================================================================

class RequestRun {
  readonly queryId = crypto.randomUUID();
  readonly startTime = Date.now();
  readonly trace: PipelineResponse['trace'] = [];
  readonly degraded = new Set<DegradableComponent>();
  retrieval: RetrievalSummary | null = null;

  constructor(
    readonly query: Query,
    readonly deadline: RequestDeadline
  ) {}

  record(stage: PipelineStage, outcome: StageOutcome, startedAt: number): void {
    this.trace.push({ stage, outcome, durationMs: Date.now() - startedAt });
  }

  degrade(component: DegradableComponent): void {
    this.degraded.add(component);
  }

  degradedStages(): DegradableComponent[] {
    return DEGRADABLE_ORDER.filter((component) => this.degraded.has(component));
  }

  anyDegraded(components: readonly DegradableComponent[]): boolean {
    return components.some((component) => this.degraded.has(component));
  }
}

// ============================================================================
// Pipeline
// ============================================================================

export class RAGPipeline {
  private store: DocumentStore;
  private bases: KnowledgeBase[];
  private embedder: Embedder | null;
  private reranker: Reranker | null;
  private generator: AnswerGenerator | null;
  private router: QueryRouter;
  private expander: QueryExpander;
  private cache: CacheManager | null;
  private config: RAGPipelineConfig;

  constructor(deps: RAGPipelineDeps, config: Partial<RAGPipelineConfig> = {}) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      timeouts: { ...DEFAULT_CONFIG.timeouts, ...config.timeouts },
    };

    if (deps.bases.length === 0) {
      throw new RangeError('RAGPipeline needs at least one knowledge base');
    }
    const names = new Set(deps.bases.map((base) => base.name));
    if (names.size !== deps.bases.length) {
      throw new RangeError('Knowledge base names must be unique');
    }

    this.store = deps.store;
    this.bases = deps.bases;
    this.embedder = deps.embedder ?? null;
    this.generator = deps.generator ?? null;
    this.cache = deps.cache ?? null;
    this.reranker = deps.scorer
      ? new Reranker(deps.scorer, { maxCandidates: this.config.rerankMaxCandidates })
      : null;
    this.router = new QueryRouter(deps.classifier ?? null, {
      bases: Array.from(names),
      minConfidence: this.config.minRouteConfidence,
      timeoutMs: this.config.timeouts.route,
    });
    this.expander = new QueryExpander(deps.expansion ?? null, {
      numVariations: this.config.numVariations,
      decay: this.config.variantDecay,
    });

    assertValidAlpha(this.config.alpha);
    assertValidK(this.config.rrfK);
  }

  /**
   * Answer one query.
   *
   * @throws RetrievalFailedError when every retrieval path failed
   */
  async query(request: QueryRequest): Promise<PipelineResponse> {
    const query = this.toQuery(request);
    const deadline = new RequestDeadline(this.config.deadlineMs, request.signal);
    const run = new RequestRun(query, deadline);

    try {
      return await this.execute(run);
    } finally {
      deadline.dispose();
    }
  }

  /**
   * Delete every cached value built from `(docId, oldVersion)`
   */
  async invalidate(docId: string, oldVersion: number): Promise<number> {
    return this.cache ? this.cache.invalidate(docId, oldVersion) : 0;
  }

  getCacheStats(): CacheStats | null {
    return this.cache ? this.cache.getStats() : null;
  }

  get knowledgeBases(): readonly string[] {
    return this.router.bases;
  }

  // --------------------------------------------------------------------------
  // State machine
  // --------------------------------------------------------------------------

  private async execute(run: RequestRun): Promise<PipelineResponse> {
    const { query, deadline } = run;

    // ROUTE
    let startedAt = Date.now();
    const { decision, error: routeError } = await this.router.route(query.text, deadline);
    if (deadline.expired) return this.partial(run, decision, 'route');
    if (routeError) run.degrade('route');
    run.record('route', routeError ? 'degraded' : 'completed', startedAt);

    if (!decision.needsRetrieval) {
      return this.respondDirect(run, decision);
    }

    // CACHE_CHECK
    startedAt = Date.now();
    const keyInput: CacheKeyInput = {
      query: query.text,
      topK: query.requestedTopK,
      filters: query.filters,
      bases: decision.targetBases,
    };

    const cachedAnswer = await this.cacheOp(run, 'answer lookup', (c) => c.getAnswer(keyInput));
    if (deadline.expired) return this.partial(run, decision, 'cache_check');
    if (cachedAnswer) {
      run.record('cache_check', 'cache_hit', startedAt);
      return this.respondFromAnswerCache(run, decision, cachedAnswer);
    }

    const cachedFused = await this.cacheOp(run, 'retrieval lookup', (c) => c.getRetrieval(keyInput));
    if (deadline.expired) return this.partial(run, decision, 'cache_check');
    run.record(
      'cache_check',
      cachedFused ? 'cache_hit' : run.degraded.has('cache') ? 'degraded' : 'completed',
      startedAt
    );

    let fused: FusedResult[];
    let cacheLevel: CacheLevel = 'miss';

    if (cachedFused) {
      fused = cachedFused;
      cacheLevel = 'retrieval';
    } else {
      // EXPAND
      startedAt = Date.now();
      const expansion = await this.expand(run);
      if (deadline.expired) return this.partial(run, decision, 'expand');
      run.record('expand', expansion.degraded ? 'degraded' : 'completed', startedAt);

      // RETRIEVE
      startedAt = Date.now();
      const bases = this.bases.filter((base) => decision.targetBases.includes(base.name));
      const retrieved = await this.retrieveVariants(run, expansion.variants, bases);
      fused = mergeVariantResults(
        retrieved.map(({ variant, result }) => ({ variant, fused: result.fused })),
        this.config.rrfK
      );
      run.retrieval = summarizeRetrieval(retrieved, fused, deadline.expired);
      for (const { result } of retrieved) {
        result.degraded.forEach((component) => run.degrade(component));
      }

      if (deadline.expired) {
        return this.partialFromRetrieval(run, decision, fused, startedAt);
      }

      const attempted = retrieved.reduce((sum, r) => sum + r.result.attempted, 0);
      const failures = retrieved.flatMap((r) => r.result.failures);
      if (attempted === 0 || failures.length >= attempted) {
        throw new RetrievalFailedError(failures);
      }
      run.record('retrieve', failures.length > 0 ? 'degraded' : 'completed', startedAt);
    }

    // FUSE: attach current documents; ids the store no longer has are dropped
    startedAt = Date.now();
    const documents = await this.fetchDocuments(run, fused);
    if (!documents) return this.partial(run, decision, 'fuse');

    const present: FusedResult[] = [];
    const sources: DocVersion[] = [];
    for (const result of fused) {
      const doc = documents.get(result.docId);
      if (!doc) continue;
      present.push(result);
      sources.push({ docId: doc.id, version: doc.version });
    }
    run.record('fuse', 'completed', startedAt);

    if (present.length === 0) {
      startedAt = Date.now();
      run.record('respond', 'completed', startedAt);
      return this.respond(run, decision, { results: [], answer: null, reranked: false }, 'no_results', cacheLevel);
    }

    // RERANK
    startedAt = Date.now();
    const candidates = toRerankCandidates(present, documents);
    let results: RerankedResult[];
    let reranked = false;

    const reranker = this.reranker;
    if (reranker) {
      try {
        results = await withTimeout(
          (signal) => reranker.rerank(query.text, candidates, query.requestedTopK, signal),
          { label: 'reranking', timeoutMs: this.config.timeouts.rerank, deadline }
        );
        reranked = true;
      } catch (error) {
        if (deadline.expired) {
          return this.partial(run, decision, 'rerank', fusedOrder(candidates, query.requestedTopK));
        }
        console.warn(`Reranking skipped, using fused order: ${errorMessage(error)}`);
        run.degrade('rerank');
        results = fusedOrder(candidates, query.requestedTopK);
      }
    } else {
      results = fusedOrder(candidates, query.requestedTopK);
    }
    run.record('rerank', run.degraded.has('rerank') ? 'degraded' : 'completed', startedAt);

    // RESPOND_AND_CACHE
    startedAt = Date.now();
    const answer = await this.generate(run, results);
    if (deadline.expired) return this.partial(run, decision, 'respond', results, reranked);

    const payload: AnswerPayload = { results, answer, reranked };

    // Degraded output is never cached
    if (!cachedFused && !run.anyDegraded(RETRIEVAL_DEGRADATIONS)) {
      await this.cacheOp(run, 'retrieval write', (c) => c.setRetrieval(keyInput, present, sources));
    }
    if (run.degradedStages().every((component) => component === 'cache')) {
      await this.cacheOp(run, 'answer write', (c) => c.setAnswer(keyInput, payload, sources));
    }

    run.record('respond', run.degraded.has('generation') ? 'degraded' : 'completed', startedAt);
    return this.respond(run, decision, payload, 'complete', cacheLevel);
  }

  /**
   * No retrieval needed: answer from the generator alone
   */
  private async respondDirect(run: RequestRun, decision: RouteDecision): Promise<PipelineResponse> {
    const startedAt = Date.now();
    const answer = await this.generate(run, []);
    if (run.deadline.expired) return this.partial(run, decision, 'respond');
    run.record('respond', run.degraded.has('generation') ? 'degraded' : 'completed', startedAt);
    return this.respond(run, decision, { results: [], answer, reranked: false }, 'complete', 'miss');
  }

  private respondFromAnswerCache(
    run: RequestRun,
    decision: RouteDecision,
    payload: AnswerPayload
  ): PipelineResponse {
    run.record('respond', 'completed', Date.now());
    return this.respond(run, decision, payload, 'complete', 'answer');
  }

  private respond(
    run: RequestRun,
    decision: RouteDecision,
    payload: AnswerPayload,
    status: PipelineStatus,
    cache: CacheLevel
  ): PipelineResponse {
    return {
      queryId: run.queryId,
      query: run.query.text,
      status,
      route: decision,
      cache,
      results: payload.results,
      answer: payload.answer,
      reranked: payload.reranked,
      degradedStages: run.degradedStages(),
      skippedStages: [],
      trace: run.trace,
      retrieval: run.retrieval,
      latencyMs: Date.now() - run.startTime,
    };
  }

  /**
   * Deadline expired during RETRIEVE. Whatever the finished variants fused is
   * returned in fused order; documents are fetched under a short grace budget.
   */
  private async partialFromRetrieval(
    run: RequestRun,
    decision: RouteDecision,
    fused: FusedResult[],
    startedAt: number
  ): Promise<PipelineResponse> {
    if (fused.length === 0) return this.partial(run, decision, 'retrieve');
    run.record('retrieve', 'degraded', startedAt);

    const fetchStart = Date.now();
    let documents: Map<string, Document>;
    try {
      documents = await withTimeout(
        () => this.store.getMany(fused.map((result) => result.docId)),
        { label: 'document fetch', timeoutMs: this.config.partialGraceMs }
      );
    } catch (error) {
      console.warn(`Dropping partial results, document fetch failed: ${errorMessage(error)}`);
      return this.partial(run, decision, 'fuse');
    }
    run.record('fuse', 'completed', fetchStart);

    const candidates = toRerankCandidates(fused, documents);
    return this.partial(run, decision, 'rerank', fusedOrder(candidates, run.query.requestedTopK));
  }

  /**
   * Deadline expired during `from`: that stage and every later one are skipped
   */
  private partial(
    run: RequestRun,
    decision: RouteDecision,
    from: PipelineStage,
    results: RerankedResult[] = [],
    reranked = false
  ): PipelineResponse {
    const skippedStages = STAGES.slice(STAGES.indexOf(from));
    for (const stage of skippedStages) {
      run.trace.push({ stage, outcome: 'skipped', durationMs: 0 });
    }
    console.warn(`Request ${run.queryId} hit its deadline; skipped ${skippedStages.join(', ')}`);

    return {
      queryId: run.queryId,
      query: run.query.text,
      status: 'partial',
      route: decision,
      cache: 'miss',
      results,
      answer: null,
      reranked,
      degradedStages: run.degradedStages(),
      skippedStages,
      trace: run.trace,
      retrieval: run.retrieval,
      latencyMs: Date.now() - run.startTime,
    };
  }

  // --------------------------------------------------------------------------
  // Stages
  // --------------------------------------------------------------------------

  private async expand(run: RequestRun): Promise<ExpansionResult> {
    let expansion: ExpansionResult;
    try {
      expansion = await withTimeout(
        (signal) => this.expander.expand(run.query.text, signal),
        { label: 'query expansion', timeoutMs: this.config.timeouts.expand, deadline: run.deadline }
      );
    } catch (error) {
      if (!run.deadline.expired) {
        console.warn(`Query expansion failed, using original query only: ${errorMessage(error)}`);
      }
      expansion = {
        variants: [{ text: run.query.text, weight: 1, original: true }],
        degraded: true,
      };
    }

    if (expansion.degraded) run.degrade('expansion');
    return expansion;
  }

  private async retrieveVariants(
    run: RequestRun,
    variants: QueryVariant[],
    bases: KnowledgeBase[]
  ): Promise<Array<{ variant: QueryVariant; result: VariantRetrievalResult }>> {
    const { deadline, query } = run;
    const limiter = new ConcurrencyLimiter(
      Math.max(1, Math.min(variants.length, this.config.maxConcurrency))
    );
    const retriever = new HybridRetriever(this.embedFn(run), this.hybridConfig());

    const settled = await Promise.all(
      variants.map(async (variant) => {
        try {
          const result = await limiter.run(
            () => retriever.retrieve(variant.text, { bases, filters: query.filters, deadline }),
            deadline.signal
          );
          return { variant, result };
        } catch (error) {
          // Only a variant still queued when the deadline fired lands here
          if (!deadline.expired) throw error;
          return null;
        }
      })
    );

    return settled.filter(
      (entry): entry is { variant: QueryVariant; result: VariantRetrievalResult } => entry !== null
    );
  }

  /**
   * Cache-backed query embedding shared by every vector index of a variant
   */
  private embedFn(run: RequestRun): EmbedFn {
    return async (text, signal) => {
      const embedder = this.embedder;
      if (!embedder) {
        throw new EmbeddingUnavailableError('no embedder configured');
      }

      const cached = await this.cacheOp(run, 'embedding lookup', (c) => c.getEmbedding(text));
      if (cached) return cached;

      const vector = await embedder.embed(text, signal);
      await this.cacheOp(run, 'embedding write', (c) => c.setEmbedding(text, vector));
      return vector;
    };
  }

  private async fetchDocuments(
    run: RequestRun,
    fused: FusedResult[]
  ): Promise<Map<string, Document> | null> {
    try {
      return await withTimeout(
        () => this.store.getMany(fused.map((result) => result.docId)),
        { label: 'document fetch', timeoutMs: this.config.timeouts.retrieve, deadline: run.deadline }
      );
    } catch (error) {
      if (run.deadline.expired) return null;
      throw error;
    }
  }

  private async generate(run: RequestRun, results: RerankedResult[]): Promise<string | null> {
    const generator = this.generator;
    if (!generator) return null;

    try {
      return await withTimeout(
        (signal) =>
          generator.generate(
            run.query.text,
            results.map((r) => ({ docId: r.docId, content: r.content })),
            signal
          ),
        { label: 'answer generation', timeoutMs: this.config.timeouts.generate, deadline: run.deadline }
      );
    } catch (error) {
      if (!run.deadline.expired) {
        console.warn(`Answer generation failed: ${errorMessage(error)}`);
        run.degrade('generation');
      }
      return null;
    }
  }

  /**
   * Run a cache operation; a failing cache is flagged and treated as a miss
   */
  private async cacheOp<T>(
    run: RequestRun,
    label: string,
    operation: (cache: CacheManager) => Promise<T>
  ): Promise<T | null> {
    const cache = this.cache;
    if (!cache) return null;

    try {
      return await withTimeout(() => operation(cache), {
        label: `cache ${label}`,
        timeoutMs: this.config.timeouts.cache,
        deadline: run.deadline,
      });
    } catch (error) {
      if (!run.deadline.expired) {
        console.warn(`Cache ${label} failed, continuing uncached: ${errorMessage(error)}`);
        run.degrade('cache');
      }
      return null;
    }
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private hybridConfig(): HybridRetrieverConfig {
    return {
      alpha: this.config.alpha,
      rrfK: this.config.rrfK,
      topK: this.config.retrievalTopK,
      timeoutMs: this.config.timeouts.retrieve,
    };
  }

  private toQuery(request: QueryRequest): Query {
    const text = request.query.trim();
    if (text.length === 0) {
      throw new RangeError('Query text must not be empty');
    }

    const topK = request.topK ?? this.config.rerankTopK;
    if (!Number.isInteger(topK) || topK < 1) {
      throw new RangeError(`topK must be a positive integer, got ${topK}`);
    }

    return { text, requestedTopK: topK, filters: { ...request.filters } };
  }
}

/**
 * Fold per-variant metrics into one request-level summary
 */
export function summarizeRetrieval(
  retrieved: ReadonlyArray<{ result: VariantRetrievalResult }>,
  merged: readonly FusedResult[],
  deadlineExpired: boolean
): RetrievalSummary {
  const summary: RetrievalSummary = {
    variantCount: retrieved.length,
    lexicalSearchMs: 0,
    lexicalResultCount: 0,
    vectorSearchMs: 0,
    vectorResultCount: 0,
    embeddingMs: 0,
    overlapCount: merged.filter(
      (r) => r.contributingRanks.lexical !== undefined && r.contributingRanks.vector !== undefined
    ).length,
    rrfTopScore: merged.length > 0 ? merged[0].fusedScore : null,
    deadlineHit: deadlineExpired,
  };

  for (const { result } of retrieved) {
    const { metrics } = result;
    summary.lexicalSearchMs = Math.max(summary.lexicalSearchMs, metrics.lexicalSearchMs);
    summary.vectorSearchMs = Math.max(summary.vectorSearchMs, metrics.vectorSearchMs);
    summary.embeddingMs = Math.max(summary.embeddingMs, metrics.embeddingMs);
    summary.lexicalResultCount += metrics.lexicalResultCount;
    summary.vectorResultCount += metrics.vectorResultCount;
    summary.deadlineHit = summary.deadlineHit || result.deadlineHit;
  }

  return summary;
}

export function createRAGPipeline(
  deps: RAGPipelineDeps,
  config?: Partial<RAGPipelineConfig>
): RAGPipeline {
  return new RAGPipeline(deps, config);
}
