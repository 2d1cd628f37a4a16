/**
 * Hybrid Retriever
 *
 * Runs lexical and vector search for one query variant across every target
 * knowledge base in parallel, then merges the lists with weighted RRF.
 * A failing path is recorded and dropped; the remaining lists still fuse.
 *
 * @module @groundwork/rag/retrieval/hybrid
 */

import type {
  CandidateResult,
  CandidateSource,
  DegradableComponent,
  FusedResult,
  RetrievalMetrics,
  ScalarMap,
} from '../types';
import {
  errorMessage,
  isDeadlineError,
  type SourceFailure,
} from '../errors';
import { withTimeout, type RequestDeadline } from '../runtime/deadline';
import { DEFAULT_RRF_K, assertValidAlpha, assertValidK, fuseHybrid } from '../fusion/rrf';
import type { LexicalIndex } from './lexical';
import type { VectorIndex } from './vector';

/**
 * A named corpus reachable through one or both index kinds
 */
export interface KnowledgeBase {
  name: string;
  lexical?: LexicalIndex;
  vector?: VectorIndex;
}

/**
 * Query embedding function; the pipeline supplies a cache-backed one
 */
export type EmbedFn = (text: string, signal: AbortSignal) => Promise<number[]>;

export interface HybridRetrieverConfig {
  /** Vector weight; lexical lists get 1 - alpha */
  alpha: number;
  rrfK: number;
  /** Candidates requested from each index */
  topK: number;
  /** Budget of each individual index call */
  timeoutMs: number;
}

const DEFAULT_CONFIG: HybridRetrieverConfig = {
  alpha: 0.5,
  rrfK: DEFAULT_RRF_K,
  topK: 20,
  timeoutMs: 10000,
};

export interface VariantRetrievalOptions {
  bases: readonly KnowledgeBase[];
  filters?: ScalarMap;
  deadline?: RequestDeadline;
}

export interface VariantRetrievalResult {
  variant: string;
  fused: FusedResult[];
  /** Index calls issued, one per base and source */
  attempted: number;
  failures: SourceFailure[];
  degraded: DegradableComponent[];
  /** True when the request deadline cut this variant short */
  deadlineHit: boolean;
  metrics: RetrievalMetrics;
}

interface PathOutcome {
  source: CandidateSource;
  base: string;
  candidates: CandidateResult[] | null;
  durationMs: number;
  failure?: SourceFailure;
  component?: DegradableComponent;
  deadlineHit: boolean;
}

export class HybridRetriever {
  private config: HybridRetrieverConfig;
  private embed: EmbedFn;

  constructor(embed: EmbedFn, config: Partial<HybridRetrieverConfig> = {}) {
    this.embed = embed;
    this.config = { ...DEFAULT_CONFIG, ...config };
    assertValidAlpha(this.config.alpha);
    assertValidK(this.config.rrfK);
  }

  /**
   * Retrieve and fuse one query variant
   */
  async retrieve(
    variant: string,
    options: VariantRetrievalOptions
  ): Promise<VariantRetrievalResult> {
    const { bases, filters, deadline } = options;
    const paths: Promise<PathOutcome>[] = [];

    for (const base of bases) {
      const lexical = base.lexical;
      if (lexical) {
        paths.push(
          this.runPath('lexical', base.name, variant, (signal) =>
            lexical.search(variant, this.config.topK, { filters, signal }), deadline)
        );
      }
    }

    const vectorBases = bases.filter((base) => base.vector !== undefined);
    const embeddingStart = Date.now();
    let embeddingMs = 0;

    if (vectorBases.length > 0) {
      // One embedding per variant, shared by every vector index
      const embedding = withTimeout((signal) => this.embed(variant, signal), {
        label: 'query embedding',
        timeoutMs: this.config.timeoutMs,
        deadline,
      }).finally(() => {
        embeddingMs = Date.now() - embeddingStart;
      });

      for (const base of vectorBases) {
        const vector = base.vector;
        if (!vector) continue;
        paths.push(
          embedding.then(
            (queryVector) =>
              this.runPath('vector', base.name, variant, (signal) =>
                vector.search(queryVector, this.config.topK, { filters, signal }), deadline),
            (error: unknown) => embeddingFailure(base.name, variant, error)
          )
        );
      }
    }

    const outcomes = await Promise.all(paths);

    const lexicalLists: CandidateResult[][] = [];
    const vectorLists: CandidateResult[][] = [];
    const failures: SourceFailure[] = [];
    const degraded = new Set<DegradableComponent>();
    let deadlineHit = false;

    const metrics: RetrievalMetrics = {
      lexicalSearchMs: 0,
      lexicalResultCount: 0,
      vectorSearchMs: 0,
      vectorResultCount: 0,
      embeddingMs,
      overlapCount: 0,
      rrfTopScore: null,
    };

    for (const outcome of outcomes) {
      deadlineHit = deadlineHit || outcome.deadlineHit;
      if (outcome.failure) failures.push(outcome.failure);
      if (outcome.component) degraded.add(outcome.component);
      if (!outcome.candidates) continue;

      if (outcome.source === 'lexical') {
        lexicalLists.push(outcome.candidates);
        metrics.lexicalSearchMs = Math.max(metrics.lexicalSearchMs, outcome.durationMs);
        metrics.lexicalResultCount += outcome.candidates.length;
      } else {
        vectorLists.push(outcome.candidates);
        metrics.vectorSearchMs = Math.max(metrics.vectorSearchMs, outcome.durationMs);
        metrics.vectorResultCount += outcome.candidates.length;
      }
    }

    if (lexicalLists.length === 0 && vectorLists.length > 0 && failures.length > 0) {
      console.info(`Graceful degradation: vector-only results for "${variant}"`);
    } else if (vectorLists.length === 0 && lexicalLists.length > 0 && failures.length > 0) {
      console.info(`Graceful degradation: lexical-only results for "${variant}"`);
    }

    // A missing source hands its weight to the surviving one
    const alpha =
      vectorLists.length === 0 ? 0 : lexicalLists.length === 0 ? 1 : this.config.alpha;

    const fused = fuseHybrid(lexicalLists, vectorLists, {
      alpha,
      k: this.config.rrfK,
    });

    metrics.overlapCount = fused.filter(
      (r) => r.contributingRanks.lexical !== undefined && r.contributingRanks.vector !== undefined
    ).length;
    metrics.rrfTopScore = fused.length > 0 ? fused[0].fusedScore : null;

    return {
      variant,
      fused,
      attempted: outcomes.length,
      failures,
      degraded: Array.from(degraded),
      deadlineHit,
      metrics,
    };
  }

  /**
   * Run one index call with its timeout; failures become outcomes, never throws
   */
  private async runPath(
    source: CandidateSource,
    base: string,
    variant: string,
    search: (signal: AbortSignal) => Promise<CandidateResult[]>,
    deadline?: RequestDeadline
  ): Promise<PathOutcome> {
    const start = Date.now();
    try {
      const candidates = await withTimeout(search, {
        label: `${source} search on ${base}`,
        timeoutMs: this.config.timeoutMs,
        deadline,
      });
      return { source, base, candidates, durationMs: Date.now() - start, deadlineHit: false };
    } catch (error) {
      const message = errorMessage(error);
      const hitDeadline = isDeadlineError(error);
      if (!hitDeadline) {
        console.warn(`${source} search on ${base} failed (graceful degradation): ${message}`);
      }
      return {
        source,
        base,
        candidates: null,
        durationMs: Date.now() - start,
        failure: { base, source, variant, message },
        component: hitDeadline ? undefined : source,
        deadlineHit: hitDeadline,
      };
    }
  }

  get alpha(): number {
    return this.config.alpha;
  }
}

function embeddingFailure(base: string, variant: string, error: unknown): PathOutcome {
  const hitDeadline = isDeadlineError(error);
  const message = errorMessage(error);
  if (!hitDeadline) {
    console.warn(`Query embedding failed, skipping vector search on ${base}: ${message}`);
  }
  return {
    source: 'vector',
    base,
    candidates: null,
    durationMs: 0,
    failure: { base, source: 'vector', variant, message },
    component: hitDeadline ? undefined : 'embedding',
    deadlineHit: hitDeadline,
  };
}

export function createHybridRetriever(
  embed: EmbedFn,
  config?: Partial<HybridRetrieverConfig>
): HybridRetriever {
  return new HybridRetriever(embed, config);
}
