import {
  pgTable,
  text,
  integer,
  timestamp,
  uuid,
  jsonb,
  index,
  real,
  boolean,
} from 'drizzle-orm/pg-core';

export type DocumentMetadata = Record<string, string | number | boolean | null>;

// ============================================================================
// Document Registry
// ============================================================================

/**
 * Source of truth for document content. `version` grows by one on every
 * edit; cached values are tagged with the version they were built from.
 */
export const documents = pgTable('documents', {
  id: text('id').primaryKey(),
  content: text('content').notNull(),
  metadata: jsonb('metadata').$type<DocumentMetadata>().notNull().default({}),
  version: integer('version').notNull().default(1),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

// ============================================================================
// Query Log
// ============================================================================

export const ragQueries = pgTable(
  'rag_queries',
  {
    id: uuid('id').primaryKey(),
    timestamp: timestamp('timestamp').defaultNow().notNull(),
    queryHash: text('query_hash').notNull(), // Anonymized
    status: text('status').notNull(), // 'complete', 'partial', 'no_results', 'failed'
    cacheLevel: text('cache_level'), // 'answer', 'retrieval', 'miss'
    degradedStages: jsonb('degraded_stages').$type<string[]>().notNull().default([]),
    resultCount: integer('result_count').notNull().default(0),
    latencyMs: integer('latency_ms').notNull(),
  },
  (table) => ({
    timestampIdx: index('rag_queries_timestamp_idx').on(table.timestamp),
  })
);

// ============================================================================
// Retrieval Metrics
// ============================================================================

/**
 * Per-query retrieval figures, one row per query that reached retrieval
 */
export const retrievalMetrics = pgTable('retrieval_metrics', {
  id: uuid('id').defaultRandom().primaryKey(),
  queryId: uuid('query_id')
    .notNull()
    .references(() => ragQueries.id),

  variantCount: integer('variant_count').notNull(),

  // Lexical index (Neo4j full-text)
  lexicalSearchMs: integer('lexical_search_ms').notNull(),
  lexicalResultCount: integer('lexical_result_count').notNull(),

  // Vector index (Milvus)
  embeddingMs: integer('embedding_ms').notNull(),
  vectorSearchMs: integer('vector_search_ms').notNull(),
  vectorResultCount: integer('vector_result_count').notNull(),

  // Fusion
  overlapCount: integer('overlap_count').notNull(), // Results found by both sources
  rrfTopScore: real('rrf_top_score'),

  deadlineHit: boolean('deadline_hit').notNull().default(false),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});

export type DocumentRow = typeof documents.$inferSelect;
export type NewRagQuery = typeof ragQueries.$inferInsert;
export type NewRetrievalMetrics = typeof retrievalMetrics.$inferInsert;
