/**
 * Retrieval Evaluation
 *
 * Binary-relevance ranking metrics over the document ids a query returned,
 * and a runner that scores a pipeline against a set of labelled queries.
 *
 * @module @groundwork/rag/evaluation/metrics
 */

import type { ScalarMap } from '../types';
import type { RAGPipeline } from '../pipeline';
import { errorMessage } from '../errors';

// ============================================================================
// Types
// ============================================================================

/**
 * A labelled query: the ids a good retrieval returns
 */
export interface EvaluationCase {
  query: string;
  relevant: readonly string[];
  filters?: ScalarMap;
}

/**
 * Ranking quality at cutoff k
 */
export interface RankingMetrics {
  /** 1 when any relevant id is in the top k */
  hitRate: number;
  precision: number;
  recall: number;
  /** Reciprocal rank of the first relevant id, 0 when none is returned */
  mrr: number;
  ndcg: number;
}

export interface CaseEvaluation {
  query: string;
  retrieved: string[];
  metrics: RankingMetrics;
  /** Set when the pipeline threw; the case then scores zero */
  error?: string;
  partial: boolean;
}

export interface EvaluationReport {
  k: number;
  cases: CaseEvaluation[];
  mean: RankingMetrics;
  failedCount: number;
  partialCount: number;
}

const ZERO_METRICS: RankingMetrics = { hitRate: 0, precision: 0, recall: 0, mrr: 0, ndcg: 0 };

// ============================================================================
// Metric Functions
// ============================================================================

function assertValidCutoff(k: number): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new RangeError(`k must be a positive integer, got ${k}`);
  }
}

/** First k distinct ids */
function topDistinct(retrieved: readonly string[], k: number): string[] {
  return Array.from(new Set(retrieved)).slice(0, k);
}

export function precisionAtK(retrieved: readonly string[], relevant: readonly string[], k: number): number {
  assertValidCutoff(k);
  const wanted = new Set(relevant);
  return topDistinct(retrieved, k).filter((id) => wanted.has(id)).length / k;
}

export function recallAtK(retrieved: readonly string[], relevant: readonly string[], k: number): number {
  assertValidCutoff(k);
  const wanted = new Set(relevant);
  if (wanted.size === 0) return 0;
  return topDistinct(retrieved, k).filter((id) => wanted.has(id)).length / wanted.size;
}

export function reciprocalRank(retrieved: readonly string[], relevant: readonly string[], k: number): number {
  assertValidCutoff(k);
  const wanted = new Set(relevant);
  const index = topDistinct(retrieved, k).findIndex((id) => wanted.has(id));
  return index === -1 ? 0 : 1 / (index + 1);
}

/**
 * Normalized discounted cumulative gain with binary gains
 */
export function ndcgAtK(retrieved: readonly string[], relevant: readonly string[], k: number): number {
  assertValidCutoff(k);
  const wanted = new Set(relevant);
  if (wanted.size === 0) return 0;

  const dcg = topDistinct(retrieved, k).reduce(
    (sum, id, i) => (wanted.has(id) ? sum + 1 / Math.log2(i + 2) : sum),
    0
  );

  let idcg = 0;
  for (let i = 0; i < Math.min(k, wanted.size); i++) {
    idcg += 1 / Math.log2(i + 2);
  }

  return dcg / idcg;
}

export function rankingMetrics(
  retrieved: readonly string[],
  relevant: readonly string[],
  k: number
): RankingMetrics {
  const rr = reciprocalRank(retrieved, relevant, k);
  return {
    hitRate: rr > 0 ? 1 : 0,
    precision: precisionAtK(retrieved, relevant, k),
    recall: recallAtK(retrieved, relevant, k),
    mrr: rr,
    ndcg: ndcgAtK(retrieved, relevant, k),
  };
}

// ============================================================================
// Runner
// ============================================================================

/**
 * Run every case through the pipeline, one at a time, and average the metrics.
 * A case whose query throws is kept in the report and counts as a miss.
 */
export async function evaluateRetrieval(
  pipeline: Pick<RAGPipeline, 'query'>,
  cases: readonly EvaluationCase[],
  k: number = 5
): Promise<EvaluationReport> {
  assertValidCutoff(k);
  if (cases.length === 0) {
    throw new RangeError('Evaluation needs at least one case');
  }
  for (const evaluationCase of cases) {
    if (evaluationCase.relevant.length === 0) {
      throw new RangeError(`Case "${evaluationCase.query}" lists no relevant documents`);
    }
  }

  const results: CaseEvaluation[] = [];
  for (const evaluationCase of cases) {
    try {
      const response = await pipeline.query({
        query: evaluationCase.query,
        topK: k,
        filters: evaluationCase.filters,
      });
      const retrieved = response.results.map((result) => result.docId);
      results.push({
        query: evaluationCase.query,
        retrieved,
        metrics: rankingMetrics(retrieved, evaluationCase.relevant, k),
        partial: response.status === 'partial',
      });
    } catch (error) {
      console.warn(`Evaluation query "${evaluationCase.query}" failed: ${errorMessage(error)}`);
      results.push({
        query: evaluationCase.query,
        retrieved: [],
        metrics: { ...ZERO_METRICS },
        error: errorMessage(error),
        partial: false,
      });
    }
  }

  const mean = (pick: (metrics: RankingMetrics) => number) =>
    results.reduce((sum, result) => sum + pick(result.metrics), 0) / results.length;

  return {
    k,
    cases: results,
    mean: {
      hitRate: mean((m) => m.hitRate),
      precision: mean((m) => m.precision),
      recall: mean((m) => m.recall),
      mrr: mean((m) => m.mrr),
      ndcg: mean((m) => m.ndcg),
    },
    failedCount: results.filter((result) => result.error !== undefined).length,
    partialCount: results.filter((result) => result.partial).length,
  };
}
