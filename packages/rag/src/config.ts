/**
 * Pipeline configuration from the environment
 * @module @groundwork/rag/config
 */

import { z } from 'zod';

const intFromEnv = (fallback: number) => z.coerce.number().int().default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  // Chat LLM (generation, expansion, routing)
  LLM_BASE_URL: z.string().url().default('http://localhost:8000/v1'),
  LLM_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().default('gpt-4o-mini'),

  // Embeddings
  EMBEDDING_BASE_URL: z.string().url().default('http://localhost:8001/v1'),
  EMBEDDING_API_KEY: z.string().optional(),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().optional(),

  // Cross-encoder
  RERANKER_BASE_URL: z.string().url().default('http://localhost:8002/v1'),
  RERANKER_API_KEY: z.string().optional(),
  RERANKER_MODEL: z.string().default('bge-reranker-v2-m3'),

  // Cache backend; in-process memory when unset
  REDIS_URL: z.string().url().optional(),

  // Knowledge bases, comma separated
  RAG_KNOWLEDGE_BASES: z
    .string()
    .default('default')
    .transform((value) =>
      value
        .split(',')
        .map((base) => base.trim())
        .filter((base) => base.length > 0)
    )
    .pipe(z.array(z.string()).min(1, 'RAG_KNOWLEDGE_BASES must name at least one base')),

  // Fusion and ranking
  RAG_RRF_K: z.coerce.number().positive().default(60),
  RAG_ALPHA: z.coerce.number().min(0).max(1).default(0.5),
  RAG_RETRIEVAL_TOP_K: positiveInt(20),
  RAG_RERANK_TOP_K: positiveInt(5),
  RAG_RERANK_MAX_CANDIDATES: positiveInt(50),

  // Expansion and routing
  RAG_EXPANSION_VARIANTS: intFromEnv(3).pipe(z.number().int().min(0)),
  RAG_VARIANT_DECAY: z.coerce.number().min(0).max(1).default(0.7),
  RAG_MAX_CONCURRENCY: positiveInt(5),
  RAG_ROUTER_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.5),
  // llm: chat model classifies; keyword: local keyword rules; none: always retrieve
  RAG_CLASSIFIER: z.enum(['llm', 'keyword', 'none']).default('llm'),

  // Timeouts (ms)
  RAG_ROUTE_TIMEOUT_MS: positiveInt(2000),
  RAG_CACHE_TIMEOUT_MS: positiveInt(500),
  RAG_EXPAND_TIMEOUT_MS: positiveInt(5000),
  RAG_RETRIEVE_TIMEOUT_MS: positiveInt(10000),
  RAG_RERANK_TIMEOUT_MS: positiveInt(10000),
  RAG_GENERATE_TIMEOUT_MS: positiveInt(90000),
  RAG_DEADLINE_MS: positiveInt(120000),

  // Cache TTLs (seconds)
  RAG_CACHE_EMBEDDING_TTL_SECONDS: positiveInt(7 * 24 * 60 * 60),
  RAG_CACHE_RETRIEVAL_TTL_SECONDS: positiveInt(6 * 60 * 60),
  RAG_CACHE_ANSWER_TTL_SECONDS: intFromEnv(15 * 60).pipe(z.number().int().min(0)),
  /** Entry cap of the in-process cache used without Redis */
  RAG_CACHE_MEMORY_MAX_ENTRIES: positiveInt(10000),
});

export type RagEnv = z.infer<typeof envSchema>;

/**
 * Parse and validate pipeline settings, reporting every issue at once
 */
export function loadRagConfig(env: NodeJS.ProcessEnv = process.env): RagEnv {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => {
        const path = issue.path.join('.') || 'ROOT';
        return `  - ${path}: ${issue.message}`;
      })
      .join('\n');

    throw new Error(`Invalid pipeline configuration:\n${issues}`);
  }

  return parsed.data;
}
