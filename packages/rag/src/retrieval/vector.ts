/**
 * Milvus Vector Index
 *
 * Nearest-neighbour search over the `document_vectors` collection using
 * cosine similarity on a precomputed query embedding.
 *
 * @module @groundwork/rag/retrieval/vector
 */

import { ErrorCode, type MilvusClient } from '@zilliz/milvus2-sdk-node';
import { z } from 'zod';
import type { CandidateResult, SearchOptions } from '../types';
import { IndexUnavailableError, errorMessage } from '../errors';
import { assertValidTopK } from './lexical';
import { toMilvusFilter } from './filters';

/**
 * Embedding-similarity index contract
 */
export interface VectorIndex {
  readonly name: string;
  search(vector: number[], topK: number, options?: SearchOptions): Promise<CandidateResult[]>;
}

export interface MilvusVectorIndexConfig {
  /** Name reported in errors and traces */
  name: string;
  collectionName: string;
  /** Primary key field holding the document id */
  idField: string;
  /** Search parameters for the HNSW index */
  searchParams: {
    ef: number;
  };
}

const DEFAULT_CONFIG: MilvusVectorIndexConfig = {
  name: 'milvus',
  collectionName: 'document_vectors',
  idField: 'doc_id',
  searchParams: {
    ef: 64, // should be >= topK
  },
};

const hitSchema = z.object({
  doc_id: z.union([z.string(), z.number()]).transform(String),
  score: z.number(),
});

/**
 * The slice of MilvusClient this index calls
 */
export type MilvusSearchClient = Pick<MilvusClient, 'search'>;

export class MilvusVectorIndex implements VectorIndex {
  private client: MilvusSearchClient;
  private config: MilvusVectorIndexConfig;

  constructor(client: MilvusSearchClient, config: Partial<MilvusVectorIndexConfig> = {}) {
    this.client = client;
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      searchParams: { ...DEFAULT_CONFIG.searchParams, ...config.searchParams },
    };
  }

  get name(): string {
    return this.config.name;
  }

  async search(
    vector: number[],
    topK: number,
    options: SearchOptions = {}
  ): Promise<CandidateResult[]> {
    assertValidTopK(topK);
    if (vector.length === 0) {
      throw new RangeError('Query vector must not be empty');
    }

    const filter = toMilvusFilter(options.filters);
    if (options.signal?.aborted) {
      throw new IndexUnavailableError(this.config.name, 'vector_index', 'search aborted');
    }

    let hits: unknown[];
    try {
      const searchResult = await this.client.search({
        collection_name: this.config.collectionName,
        data: vector,
        limit: topK,
        output_fields: [this.config.idField],
        params: { ef: Math.max(this.config.searchParams.ef, topK) },
        ...(filter ? { filter } : {}),
      });

      if (searchResult.status.error_code !== ErrorCode.SUCCESS) {
        throw new Error(searchResult.status.reason || String(searchResult.status.error_code));
      }

      const raw: unknown[] = searchResult.results;
      hits = raw.flat();
    } catch (error) {
      throw new IndexUnavailableError(this.config.name, 'vector_index', errorMessage(error), error);
    }

    const parsed = hits.map((hit) => {
      const result = hitSchema.safeParse(normalizeHit(hit, this.config.idField));
      if (!result.success) {
        throw new IndexUnavailableError(
          this.config.name,
          'vector_index',
          `malformed search hit: ${result.error.message}`
        );
      }
      return result.data;
    });

    // Milvus orders by similarity; equal scores are ordered by id for determinism
    parsed.sort((a, b) => b.score - a.score || (a.doc_id < b.doc_id ? -1 : a.doc_id > b.doc_id ? 1 : 0));

    return parsed.map((hit, rank) => ({
      docId: hit.doc_id,
      source: 'vector' as const,
      rank,
      rawScore: hit.score,
    }));
  }
}

/**
 * Milvus returns the primary key as `id` and output fields by name
 */
function normalizeHit(hit: unknown, idField: string): unknown {
  if (typeof hit !== 'object' || hit === null) return hit;
  const fields = new Map(Object.entries(hit));
  return {
    doc_id: fields.get(idField) ?? fields.get('id'),
    score: fields.get('score'),
  };
}

export function createVectorIndex(
  client: MilvusSearchClient,
  config?: Partial<MilvusVectorIndexConfig>
): MilvusVectorIndex {
  return new MilvusVectorIndex(client, config);
}
