/**
 * Cross-Encoder Reranking
 *
 * Scores a bounded shortlist of fused candidates against the original query
 * and produces the final ordering. When the scorer is unavailable the fused
 * order is kept and the response is marked as not reranked.
 *
 * @module @groundwork/rag/reranking/reranker
 */

import { z } from 'zod';
import type { ComponentHealth, FusedResult, RerankedResult, ScalarMap } from '../types';
import { RerankerUnavailableError, errorMessage } from '../errors';

/**
 * Pairwise relevance scorer: one score per text, in input order
 */
export interface CrossEncoderScorer {
  score(query: string, texts: string[], signal?: AbortSignal): Promise<number[]>;
}

/**
 * A fused candidate with the document content the scorer needs
 */
export interface RerankCandidate {
  docId: string;
  content: string;
  metadata: ScalarMap;
  fusedScore: number;
}

// ============================================================================
// HTTP scorer
// ============================================================================

export interface HttpCrossEncoderConfig {
  /** Base URL for the reranker service */
  baseUrl: string;
  /** API key (optional for local deployments) */
  apiKey?: string;
  model: string;
  /** Request timeout in milliseconds */
  timeout: number;
}

const DEFAULT_SCORER_CONFIG: HttpCrossEncoderConfig = {
  baseUrl: 'http://localhost:8002/v1',
  model: 'bge-reranker-v2-m3',
  timeout: 30000,
};

const rerankResponseSchema = z.object({
  results: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      relevance_score: z.number(),
    })
  ),
});

/**
 * Scorer backed by an OpenAI-compatible `/rerank` endpoint
 */
export class HttpCrossEncoder implements CrossEncoderScorer {
  private config: HttpCrossEncoderConfig;

  constructor(config: Partial<HttpCrossEncoderConfig> = {}) {
    this.config = {
      ...DEFAULT_SCORER_CONFIG,
      ...config,
    };
  }

  async score(query: string, texts: string[], signal?: AbortSignal): Promise<number[]> {
    if (texts.length === 0) {
      return [];
    }

    const timeoutSignal = AbortSignal.timeout(this.config.timeout);
    const requestSignal = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

    let payload: unknown;
    try {
      const response = await fetch(`${this.config.baseUrl}/rerank`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.config.apiKey && {
            Authorization: `Bearer ${this.config.apiKey}`,
          }),
        },
        body: JSON.stringify({
          model: this.config.model,
          query,
          documents: texts,
          top_n: texts.length,
        }),
        signal: requestSignal,
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`Reranker API error: ${response.status} - ${body}`);
      }

      payload = await response.json();
    } catch (error) {
      throw new RerankerUnavailableError(errorMessage(error), error);
    }

    const parsed = rerankResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new RerankerUnavailableError(`malformed response: ${parsed.error.message}`);
    }

    // The service returns results sorted by score; map them back to input order
    const scores = new Array<number | undefined>(texts.length).fill(undefined);
    for (const result of parsed.data.results) {
      if (result.index < texts.length) {
        scores[result.index] = result.relevance_score;
      }
    }

    const complete = scores.filter((score): score is number => score !== undefined);
    if (complete.length !== texts.length) {
      throw new RerankerUnavailableError(
        `expected ${texts.length} scores, got ${complete.length}`
      );
    }

    return complete;
  }

  async healthCheck(): Promise<ComponentHealth> {
    const start = Date.now();

    try {
      await this.score('test query', ['test document']);
      return {
        healthy: true,
        latencyMs: Date.now() - start,
      };
    } catch (error) {
      return {
        healthy: false,
        latencyMs: Date.now() - start,
        message: errorMessage(error),
      };
    }
  }
}

// ============================================================================
// Reranker
// ============================================================================

export interface RerankerConfig {
  /** Upper bound on candidates sent to the scorer */
  maxCandidates: number;
}

const DEFAULT_RERANKER_CONFIG: RerankerConfig = {
  maxCandidates: 50,
};

/**
 * Total order: cross score descending, then document id ascending
 */
export function compareReranked(
  a: { docId: string; crossScore: number },
  b: { docId: string; crossScore: number }
): number {
  if (b.crossScore !== a.crossScore) {
    return b.crossScore - a.crossScore;
  }
  if (a.docId < b.docId) return -1;
  if (a.docId > b.docId) return 1;
  return 0;
}

function withPositions(
  scored: Array<Omit<RerankedResult, 'position'>>
): RerankedResult[] {
  return scored.map((result, i) => ({ ...result, position: i + 1 }));
}

export class Reranker {
  private scorer: CrossEncoderScorer;
  private config: RerankerConfig;

  constructor(scorer: CrossEncoderScorer, config: Partial<RerankerConfig> = {}) {
    this.scorer = scorer;
    this.config = { ...DEFAULT_RERANKER_CONFIG, ...config };
    if (!Number.isInteger(this.config.maxCandidates) || this.config.maxCandidates < 1) {
      throw new RangeError(
        `maxCandidates must be a positive integer, got ${this.config.maxCandidates}`
      );
    }
  }

  /**
   * Score the top `maxCandidates` candidates and return the best `topK`.
   * Candidates must already be in fused order.
   */
  async rerank(
    query: string,
    candidates: readonly RerankCandidate[],
    topK: number,
    signal?: AbortSignal
  ): Promise<RerankedResult[]> {
    const shortlist = candidates.slice(0, this.config.maxCandidates);
    if (shortlist.length === 0) {
      return [];
    }

    let scores: number[];
    try {
      scores = await this.scorer.score(
        query,
        shortlist.map((c) => c.content),
        signal
      );
    } catch (error) {
      if (error instanceof RerankerUnavailableError) throw error;
      throw new RerankerUnavailableError(errorMessage(error), error);
    }

    if (scores.length !== shortlist.length) {
      throw new RerankerUnavailableError(
        `expected ${shortlist.length} scores, got ${scores.length}`
      );
    }
    if (!scores.every(Number.isFinite)) {
      throw new RerankerUnavailableError('scorer returned a non-finite score');
    }

    const scored = shortlist.map((candidate, i) => ({
      docId: candidate.docId,
      content: candidate.content,
      metadata: candidate.metadata,
      crossScore: scores[i],
    }));

    return withPositions(scored.sort(compareReranked).slice(0, topK));
  }

  get maxCandidates(): number {
    return this.config.maxCandidates;
  }
}

/**
 * Top-K of the fused order unchanged; crossScore carries the fused score
 */
export function fusedOrder(
  candidates: readonly RerankCandidate[],
  topK: number
): RerankedResult[] {
  return withPositions(
    candidates.slice(0, topK).map((candidate) => ({
      docId: candidate.docId,
      content: candidate.content,
      metadata: candidate.metadata,
      crossScore: candidate.fusedScore,
    }))
  );
}

/**
 * Attach document content to fused results, dropping ids the store no longer has
 */
export function toRerankCandidates(
  fused: readonly FusedResult[],
  documents: ReadonlyMap<string, { content: string; metadata: ScalarMap }>
): RerankCandidate[] {
  const candidates: RerankCandidate[] = [];
  for (const result of fused) {
    const doc = documents.get(result.docId);
    if (!doc) continue;
    candidates.push({
      docId: result.docId,
      content: doc.content,
      metadata: doc.metadata,
      fusedScore: result.fusedScore,
    });
  }
  return candidates;
}

export function createCrossEncoder(
  config: Partial<HttpCrossEncoderConfig> = {}
): HttpCrossEncoder {
  return new HttpCrossEncoder(config);
}

export function createReranker(
  scorer: CrossEncoderScorer,
  config?: Partial<RerankerConfig>
): Reranker {
  return new Reranker(scorer, config);
}
