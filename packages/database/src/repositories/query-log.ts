import { createHash } from 'node:crypto';
import {
  ragQueries,
  retrievalMetrics,
  type NewRagQuery,
  type NewRetrievalMetrics,
} from '../schema/postgres';
import type { PostgresDb } from '../clients/postgres';

/**
 * Retrieval figures of one query, summed or maxed over its variants
 */
export interface RetrievalMetricsEntry {
  variantCount: number;
  lexicalSearchMs: number;
  lexicalResultCount: number;
  embeddingMs: number;
  vectorSearchMs: number;
  vectorResultCount: number;
  overlapCount: number;
  rrfTopScore: number | null;
  deadlineHit: boolean;
}

export interface QueryLogEntry {
  queryId: string;
  query: string;
  status: 'complete' | 'partial' | 'no_results' | 'failed';
  cacheLevel: string | null;
  degradedStages: string[];
  resultCount: number;
  latencyMs: number;
  /** Null when the query never reached retrieval (cache hit, direct answer, failure) */
  retrieval: RetrievalMetricsEntry | null;
}

export interface QueryLog {
  record(entry: QueryLogEntry): Promise<void>;
}

/**
 * Query text is stored only as a hash
 */
export const hashQuery = (query: string): string =>
  createHash('sha256').update(query.trim().toLowerCase()).digest('hex');

export const toQueryRow = (entry: QueryLogEntry): NewRagQuery => ({
  id: entry.queryId,
  queryHash: hashQuery(entry.query),
  status: entry.status,
  cacheLevel: entry.cacheLevel,
  degradedStages: entry.degradedStages,
  resultCount: entry.resultCount,
  latencyMs: Math.round(entry.latencyMs),
});

export const toRetrievalMetricsRow = (
  queryId: string,
  metrics: RetrievalMetricsEntry
): NewRetrievalMetrics => ({
  queryId,
  variantCount: metrics.variantCount,
  lexicalSearchMs: Math.round(metrics.lexicalSearchMs),
  lexicalResultCount: metrics.lexicalResultCount,
  embeddingMs: Math.round(metrics.embeddingMs),
  vectorSearchMs: Math.round(metrics.vectorSearchMs),
  vectorResultCount: metrics.vectorResultCount,
  overlapCount: metrics.overlapCount,
  rrfTopScore: metrics.rrfTopScore,
  deadlineHit: metrics.deadlineHit,
});

export class PostgresQueryLog implements QueryLog {
  constructor(private db: PostgresDb) {}

  async record(entry: QueryLogEntry): Promise<void> {
    const metrics = entry.retrieval;
    await this.db.transaction(async (tx) => {
      await tx.insert(ragQueries).values(toQueryRow(entry));
      if (metrics) {
        await tx.insert(retrievalMetrics).values(toRetrievalMetricsRow(entry.queryId, metrics));
      }
    });
  }
}
