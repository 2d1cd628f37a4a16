/**
 * Reciprocal Rank Fusion
 *
 * Rank-based merging of ranked candidate lists. Raw scores are ignored:
 * lexical and vector scores live on incomparable scales, ranks do not.
 *
 * score(doc) = Σ weight_list / (k + rank_in_list), rank zero-based.
 *
 * @module @groundwork/rag/fusion/rrf
 */

import type { CandidateResult, CandidateSource, FusedResult } from '../types';

export const DEFAULT_RRF_K = 60;

/**
 * One ranked input to fusion
 */
export interface RankedList {
  source: CandidateSource;
  weight: number;
  /** Already sorted; each candidate carries its own zero-based rank */
  candidates: readonly CandidateResult[];
}

export interface HybridFusionOptions {
  /** Weight of vector lists; lexical lists get 1 - alpha */
  alpha: number;
  k?: number;
}

/**
 * Variant-level fused ranking with its merge weight
 */
export interface WeightedVariant {
  weight: number;
  results: readonly FusedResult[];
}

export function assertValidK(k: number): void {
  if (!Number.isFinite(k) || k <= 0) {
    throw new RangeError(`RRF constant k must be a positive number, got ${k}`);
  }
}

export function assertValidAlpha(alpha: number): void {
  if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
    throw new RangeError(`alpha must be within [0, 1], got ${alpha}`);
  }
}

/**
 * Total order: fused score descending, then document id ascending
 */
export function compareFused(a: FusedResult, b: FusedResult): number {
  if (b.fusedScore !== a.fusedScore) {
    return b.fusedScore - a.fusedScore;
  }
  if (a.docId < b.docId) return -1;
  if (a.docId > b.docId) return 1;
  return 0;
}

function mergeRank(
  ranks: Partial<Record<CandidateSource, number>>,
  source: CandidateSource,
  rank: number
): void {
  const current = ranks[source];
  if (current === undefined || rank < current) {
    ranks[source] = rank;
  }
}

/**
 * Fuse N ranked lists with per-list weights
 */
export function reciprocalRankFusion(
  lists: readonly RankedList[],
  k: number = DEFAULT_RRF_K
): FusedResult[] {
  assertValidK(k);

  const fused = new Map<string, FusedResult>();

  for (const list of lists) {
    const seen = new Set<string>();

    for (const candidate of list.candidates) {
      // A document counts once per list, at its best rank
      if (seen.has(candidate.docId)) continue;
      seen.add(candidate.docId);

      const contribution = list.weight / (k + candidate.rank);
      const existing = fused.get(candidate.docId);

      if (existing) {
        existing.fusedScore += contribution;
        mergeRank(existing.contributingRanks, list.source, candidate.rank);
      } else {
        fused.set(candidate.docId, {
          docId: candidate.docId,
          fusedScore: contribution,
          contributingRanks: { [list.source]: candidate.rank },
        });
      }
    }
  }

  return Array.from(fused.values()).sort(compareFused);
}

/**
 * Two-source fusion: vector lists weighted alpha, lexical lists 1 - alpha.
 * Several lists per source are allowed (one per knowledge base).
 */
export function fuseHybrid(
  lexical: readonly (readonly CandidateResult[])[],
  vector: readonly (readonly CandidateResult[])[],
  options: HybridFusionOptions
): FusedResult[] {
  assertValidAlpha(options.alpha);

  const lists: RankedList[] = [
    ...lexical.map((candidates) => ({
      source: 'lexical' as const,
      weight: 1 - options.alpha,
      candidates,
    })),
    ...vector.map((candidates) => ({
      source: 'vector' as const,
      weight: options.alpha,
      candidates,
    })),
  ];

  return reciprocalRankFusion(lists, options.k);
}

/**
 * Merge per-variant fused rankings. A variant's position in its own fused
 * list is its rank; contributions of the same document are summed.
 */
export function fuseVariants(
  variants: readonly WeightedVariant[],
  k: number = DEFAULT_RRF_K
): FusedResult[] {
  assertValidK(k);

  const merged = new Map<string, FusedResult>();

  for (const variant of variants) {
    const seen = new Set<string>();

    variant.results.forEach((result, position) => {
      if (seen.has(result.docId)) return;
      seen.add(result.docId);

      const contribution = variant.weight / (k + position);
      const existing = merged.get(result.docId);

      if (existing) {
        existing.fusedScore += contribution;
        for (const [source, rank] of Object.entries(result.contributingRanks)) {
          if (rank !== undefined && isCandidateSource(source)) {
            mergeRank(existing.contributingRanks, source, rank);
          }
        }
      } else {
        merged.set(result.docId, {
          docId: result.docId,
          fusedScore: contribution,
          contributingRanks: { ...result.contributingRanks },
        });
      }
    });
  }

  return Array.from(merged.values()).sort(compareFused);
}

/**
 * Geometric variant weights: the original query gets 1.0, variant i gets decay^i
 */
export function variantWeights(count: number, decay: number): number[] {
  if (!Number.isFinite(decay) || decay < 0 || decay > 1) {
    throw new RangeError(`variant decay must be within [0, 1], got ${decay}`);
  }
  return Array.from({ length: count }, (_, i) => Math.pow(decay, i));
}

function isCandidateSource(value: string): value is CandidateSource {
  return value === 'lexical' || value === 'vector';
}
