/**
 * Reranker Tests
 *
 * @module @groundwork/rag/tests/unit/reranker
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  Reranker,
  HttpCrossEncoder,
  fusedOrder,
  toRerankCandidates,
  type CrossEncoderScorer,
  type RerankCandidate,
} from '../../src/reranking/reranker';
import { RerankerUnavailableError } from '../../src/errors';

// ============================================================================
// Test Data Factories
// ============================================================================

function candidates(count: number): RerankCandidate[] {
  return Array.from({ length: count }, (_, i) => ({
    docId: `doc-${i}`,
    content: `content ${i}`,
    metadata: {},
    fusedScore: 1 / (60 + i),
  }));
}

function scorerFrom(scores: Record<string, number>): CrossEncoderScorer {
  return {
    score: vi.fn(async (_query: string, texts: string[]) => texts.map((text) => scores[text] ?? 0)),
  };
}

// ============================================================================
// Reranker
// ============================================================================

describe('Reranker', () => {
  it('should order by cross score and assign one-based positions', async () => {
    const reranker = new Reranker(
      scorerFrom({ 'content 0': 0.2, 'content 1': 0.9, 'content 2': 0.5 })
    );

    const results = await reranker.rerank('query', candidates(3), 2);

    expect(results.map((r) => [r.docId, r.crossScore, r.position])).toEqual([
      ['doc-1', 0.9, 1],
      ['doc-2', 0.5, 2],
    ]);
  });

  it('should break equal cross scores by document id', async () => {
    const reranker = new Reranker(scorerFrom({}));

    const results = await reranker.rerank('query', candidates(3).reverse(), 3);

    expect(results.map((r) => r.docId)).toEqual(['doc-0', 'doc-1', 'doc-2']);
  });

  it('should score at most maxCandidates candidates', async () => {
    const scorer = scorerFrom({});
    const reranker = new Reranker(scorer, { maxCandidates: 2 });

    const results = await reranker.rerank('query', candidates(5), 10);

    expect(scorer.score).toHaveBeenCalledWith('query', ['content 0', 'content 1'], undefined);
    expect(results).toHaveLength(2);
  });

  it('should return nothing for an empty candidate list without calling the scorer', async () => {
    const scorer = scorerFrom({});
    const reranker = new Reranker(scorer);

    expect(await reranker.rerank('query', [], 5)).toEqual([]);
    expect(scorer.score).not.toHaveBeenCalled();
  });

  it('should wrap scorer failures in RerankerUnavailableError', async () => {
    const reranker = new Reranker({ score: vi.fn().mockRejectedValue(new Error('GPU busy')) });

    await expect(reranker.rerank('query', candidates(2), 2)).rejects.toThrow(
      'Reranker unavailable: GPU busy'
    );
  });

  it('should reject a score count that does not match the candidates', async () => {
    const reranker = new Reranker({ score: vi.fn().mockResolvedValue([0.5]) });

    await expect(reranker.rerank('query', candidates(2), 2)).rejects.toBeInstanceOf(
      RerankerUnavailableError
    );
  });

  it('should reject non-finite scores', async () => {
    const reranker = new Reranker({ score: vi.fn().mockResolvedValue([0.5, Number.NaN]) });

    await expect(reranker.rerank('query', candidates(2), 2)).rejects.toThrow(
      'Reranker unavailable: scorer returned a non-finite score'
    );
  });

  it('should reject an invalid maxCandidates', () => {
    expect(() => new Reranker(scorerFrom({}), { maxCandidates: 0 })).toThrow(RangeError);
  });
});

describe('fusedOrder', () => {
  it('should keep the fused order and carry the fused score', () => {
    const results = fusedOrder(candidates(3), 2);

    expect(results.map((r) => [r.docId, r.position])).toEqual([
      ['doc-0', 1],
      ['doc-1', 2],
    ]);
    expect(results[0].crossScore).toBeCloseTo(1 / 60, 10);
  });
});

describe('toRerankCandidates', () => {
  it('should drop ids the store does not have', () => {
    const documents = new Map([['a', { content: 'alpha', metadata: { kind: 'doc' } }]]);

    const result = toRerankCandidates(
      [
        { docId: 'a', fusedScore: 0.3, contributingRanks: { lexical: 0 } },
        { docId: 'gone', fusedScore: 0.2, contributingRanks: { vector: 0 } },
      ],
      documents
    );

    expect(result).toEqual([
      { docId: 'a', content: 'alpha', metadata: { kind: 'doc' }, fusedScore: 0.3 },
    ]);
  });
});

// ============================================================================
// HTTP scorer
// ============================================================================

describe('HttpCrossEncoder', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should map service results back to input order', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(
        JSON.stringify({
          results: [
            { index: 1, relevance_score: 0.8 },
            { index: 0, relevance_score: 0.1 },
          ],
        }),
        { status: 200 }
      )
    );
    vi.stubGlobal('fetch', fetchMock);

    const scorer = new HttpCrossEncoder({ baseUrl: 'http://reranker.test/v1', apiKey: 'test-secret' });
    const scores = await scorer.score('query', ['first', 'second']);

    expect(scores).toEqual([0.1, 0.8]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://reranker.test/v1/rerank');
    expect(init.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(JSON.parse(init.body)).toEqual({
      model: 'bge-reranker-v2-m3',
      query: 'query',
      documents: ['first', 'second'],
      top_n: 2,
    });
  });

  it('should report HTTP errors as RerankerUnavailableError', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('overloaded', { status: 503 })));

    const scorer = new HttpCrossEncoder();

    await expect(scorer.score('query', ['text'])).rejects.toThrow(
      'Reranker unavailable: Reranker API error: 503 - overloaded'
    );
  });

  it('should fail when the service omits a score', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(
        new Response(JSON.stringify({ results: [{ index: 0, relevance_score: 0.4 }] }))
      )
    );

    const scorer = new HttpCrossEncoder();

    await expect(scorer.score('query', ['a', 'b'])).rejects.toThrow(
      'Reranker unavailable: expected 2 scores, got 1'
    );
  });

  it('should report an unreachable service as unhealthy', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('fetch failed')));

    const health = await new HttpCrossEncoder().healthCheck();

    expect(health.healthy).toBe(false);
    expect(health.message).toBe('Reranker unavailable: fetch failed');
  });
});
