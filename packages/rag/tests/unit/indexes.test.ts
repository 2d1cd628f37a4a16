/**
 * Index Adapter Tests
 *
 * Runs the Neo4j and Milvus adapters against hand-built client fakes.
 *
 * @module @groundwork/rag/tests/unit/indexes
 */

import { describe, it, expect, vi } from 'vitest';
import { ErrorCode } from '@zilliz/milvus2-sdk-node';
import { Neo4jLexicalIndex, escapeLuceneQuery } from '../../src/retrieval/lexical';
import { MilvusVectorIndex } from '../../src/retrieval/vector';
import { activeFilters, toMilvusFilter } from '../../src/retrieval/filters';
import { IndexUnavailableError } from '../../src/errors';

// ============================================================================
// Fakes
// ============================================================================

function record(values: Record<string, unknown>) {
  return { get: (key: string) => values[key] };
}

function fakeNeo4j(run: ReturnType<typeof vi.fn>) {
  const session = { run, close: vi.fn().mockResolvedValue(undefined) };
  return { driver: { session: vi.fn().mockReturnValue(session) }, session };
}

function milvusResponse(results: unknown[], errorCode: string = ErrorCode.SUCCESS, reason = '') {
  return { status: { error_code: errorCode, reason }, results };
}

// ============================================================================
// Filters
// ============================================================================

describe('activeFilters', () => {
  it('should drop null values and sort by key', () => {
    expect(activeFilters({ b: 1, a: 'x', c: null })).toEqual([
      ['a', 'x'],
      ['b', 1],
    ]);
  });

  it('should reject keys that cannot be used as field names', () => {
    expect(() => activeFilters({ 'bad-key': 'x' })).toThrow('Invalid filter key: bad-key');
  });
});

describe('toMilvusFilter', () => {
  it('should join equality clauses over the metadata field', () => {
    expect(toMilvusFilter({ team: 'ops', tier: 2, live: true })).toBe(
      'metadata["live"] == true and metadata["team"] == "ops" and metadata["tier"] == 2'
    );
  });

  it('should return an empty expression without filters', () => {
    expect(toMilvusFilter()).toBe('');
    expect(toMilvusFilter({ team: null })).toBe('');
  });
});

// ============================================================================
// Neo4j lexical index
// ============================================================================

describe('escapeLuceneQuery', () => {
  it('should escape Lucene operators', () => {
    expect(escapeLuceneQuery('kubectl -n ops')).toBe('kubectl \\-n ops');
    expect(escapeLuceneQuery('a:b (c)')).toBe('a\\:b \\(c\\)');
  });
});

describe('Neo4jLexicalIndex', () => {
  it('should map records to zero-based lexical ranks', async () => {
    const run = vi.fn().mockResolvedValue({
      records: [record({ docId: 'd2', score: 3.5 }), record({ docId: 'd1', score: 1.25 })],
    });
    const { driver, session } = fakeNeo4j(run);
    const index = new Neo4jLexicalIndex(driver, { name: 'ops-lexical' });

    const hits = await index.search('kubectl -n ops', 5, { filters: { team: 'ops', tier: null } });

    expect(hits).toEqual([
      { docId: 'd2', source: 'lexical', rank: 0, rawScore: 3.5 },
      { docId: 'd1', source: 'lexical', rank: 1, rawScore: 1.25 },
    ]);
    expect(run).toHaveBeenCalledWith(
      expect.stringContaining('db.index.fulltext.queryNodes'),
      expect.objectContaining({
        indexName: 'documentContentIndex',
        query: 'kubectl \\-n ops',
        filters: { team: 'ops' },
      })
    );
    expect(run.mock.calls[0][1].topK.toNumber()).toBe(5);
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it('should open the session on the configured database', async () => {
    const { driver } = fakeNeo4j(vi.fn().mockResolvedValue({ records: [] }));
    const index = new Neo4jLexicalIndex(driver, { database: 'docs' });

    await index.search('pods', 3);

    expect(driver.session).toHaveBeenCalledWith({ database: 'docs' });
  });

  it('should skip the query for blank text', async () => {
    const run = vi.fn();
    const { driver } = fakeNeo4j(run);
    const index = new Neo4jLexicalIndex(driver);

    expect(await index.search('   ', 5)).toEqual([]);
    expect(run).not.toHaveBeenCalled();
  });

  it('should wrap driver failures and still close the session', async () => {
    const { driver, session } = fakeNeo4j(vi.fn().mockRejectedValue(new Error('ServiceUnavailable')));
    const index = new Neo4jLexicalIndex(driver);

    const error = await index.search('pods', 5).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IndexUnavailableError);
    expect(error).toMatchObject({
      message: 'Index "neo4j-fulltext" unavailable: ServiceUnavailable',
      service: 'lexical_index',
      category: 'hard_unavailable',
    });
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it('should close an aborted session only once', async () => {
    const controller = new AbortController();
    const run = vi.fn(
      () =>
        new Promise((_resolve, reject) => {
          controller.signal.addEventListener('abort', () => reject(new Error('session closed')));
        })
    );
    const { driver, session } = fakeNeo4j(run);
    const index = new Neo4jLexicalIndex(driver);

    const pending = index.search('pods', 5, { signal: controller.signal }).catch((e: unknown) => e);
    controller.abort();

    expect(await pending).toBeInstanceOf(IndexUnavailableError);
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it('should reject a non-positive topK', async () => {
    const { driver } = fakeNeo4j(vi.fn());
    const index = new Neo4jLexicalIndex(driver);

    await expect(index.search('pods', 0)).rejects.toThrow('topK must be a positive integer, got 0');
  });
});

// ============================================================================
// Milvus vector index
// ============================================================================

describe('MilvusVectorIndex', () => {
  it('should order hits by score then id and pass the filter expression', async () => {
    const search = vi.fn().mockResolvedValue(
      milvusResponse([
        { doc_id: 'b', score: 0.9 },
        { id: 'a', score: 0.9 },
        { doc_id: 'c', score: 0.5 },
      ])
    );
    const index = new MilvusVectorIndex({ search });

    const hits = await index.search([0.1, 0.2], 3, { filters: { team: 'ops' } });

    expect(hits).toEqual([
      { docId: 'a', source: 'vector', rank: 0, rawScore: 0.9 },
      { docId: 'b', source: 'vector', rank: 1, rawScore: 0.9 },
      { docId: 'c', source: 'vector', rank: 2, rawScore: 0.5 },
    ]);
    expect(search).toHaveBeenCalledWith({
      collection_name: 'document_vectors',
      data: [0.1, 0.2],
      limit: 3,
      output_fields: ['doc_id'],
      params: { ef: 64 },
      filter: 'metadata["team"] == "ops"',
    });
  });

  it('should raise ef to topK and omit an empty filter', async () => {
    const search = vi.fn().mockResolvedValue(milvusResponse([]));
    const index = new MilvusVectorIndex({ search }, { searchParams: { ef: 16 } });

    await index.search([1], 100);

    expect(search.mock.calls[0][0]).toEqual({
      collection_name: 'document_vectors',
      data: [1],
      limit: 100,
      output_fields: ['doc_id'],
      params: { ef: 100 },
    });
  });

  it('should convert numeric primary keys to strings', async () => {
    const search = vi.fn().mockResolvedValue(milvusResponse([{ doc_id: 42, score: 0.7 }]));
    const index = new MilvusVectorIndex({ search });

    const hits = await index.search([1], 1);

    expect(hits[0].docId).toBe('42');
  });

  it('should surface a non-success status as unavailable', async () => {
    const search = vi
      .fn()
      .mockResolvedValue(milvusResponse([], ErrorCode.UnexpectedError, 'collection not loaded'));
    const index = new MilvusVectorIndex({ search }, { name: 'ops-vector' });

    await expect(index.search([1], 5)).rejects.toThrow(
      'Index "ops-vector" unavailable: collection not loaded'
    );
  });

  it('should reject malformed hits', async () => {
    const search = vi.fn().mockResolvedValue(milvusResponse([{ doc_id: 'x' }]));
    const index = new MilvusVectorIndex({ search });

    await expect(index.search([1], 5)).rejects.toThrow(/malformed search hit/);
  });

  it('should not call Milvus once the signal has aborted', async () => {
    const search = vi.fn();
    const index = new MilvusVectorIndex({ search });
    const controller = new AbortController();
    controller.abort();

    await expect(index.search([1], 5, { signal: controller.signal })).rejects.toThrow(
      'Index "milvus" unavailable: search aborted'
    );
    expect(search).not.toHaveBeenCalled();
  });

  it('should reject an empty query vector', async () => {
    const index = new MilvusVectorIndex({ search: vi.fn() });

    await expect(index.search([], 5)).rejects.toThrow('Query vector must not be empty');
  });
});
