/**
 * Production wiring: database clients, indexes, model services and cache
 * assembled into one pipeline from environment settings.
 *
 * @module apps/api/services
 */

import {
  KeywordQueryClassifier,
  LLMQueryClassifier,
  LLMQueryExpansion,
  MemoryCacheBackend,
  createAnswerGenerator,
  createCacheManager,
  createCrossEncoder,
  createEmbedder,
  createLexicalIndex,
  createLLM,
  createPostgresDocumentStore,
  createRAGPipeline,
  createRedisCacheBackend,
  createVectorIndex,
  type CacheBackend,
  type ChatLLM,
  type KnowledgeBase,
  type QueryClassifier,
  type RAGPipeline,
  type RagEnv,
  type RedisCacheBackend,
} from '@groundwork/rag';
import {
  COLLECTION_NAME,
  FULLTEXT_INDEX_NAME,
  PostgresQueryLog,
  type DatabaseManager,
  type HealthStatus,
  type QueryLog,
} from '@groundwork/database';
import type { ModelHealthResponse } from '@groundwork/types';

export interface Services {
  pipeline: RAGPipeline;
  queryLog: QueryLog | null;
  checkHealth: () => Promise<HealthStatus>;
  checkModels: () => Promise<ModelHealthResponse['components']>;
  close: () => Promise<void>;
}

/**
 * Index names for a knowledge base; the `default` base uses the schema's own
 * index and collection, every other base a suffixed pair.
 */
export function baseIndexNames(base: string): { fulltextIndex: string; collectionName: string } {
  if (base === 'default') {
    return { fulltextIndex: FULLTEXT_INDEX_NAME, collectionName: COLLECTION_NAME };
  }
  return {
    fulltextIndex: `${FULLTEXT_INDEX_NAME}_${base}`,
    collectionName: `${COLLECTION_NAME}_${base}`,
  };
}

function createClassifier(env: RagEnv, llm: ChatLLM): QueryClassifier | null {
  switch (env.RAG_CLASSIFIER) {
    case 'llm':
      return new LLMQueryClassifier(llm);
    case 'keyword':
      return new KeywordQueryClassifier();
    case 'none':
      return null;
  }
}

export async function createServices(
  env: RagEnv,
  db: DatabaseManager,
  options: { queryLog: boolean }
): Promise<Services> {
  await db.connect();

  const bases: KnowledgeBase[] = env.RAG_KNOWLEDGE_BASES.map((name) => {
    const names = baseIndexNames(name);
    return {
      name,
      lexical: createLexicalIndex(db.neo4j, {
        name: `${name}:lexical`,
        fulltextIndex: names.fulltextIndex,
      }),
      vector: createVectorIndex(db.milvus, {
        name: `${name}:vector`,
        collectionName: names.collectionName,
      }),
    };
  });

  const store = createPostgresDocumentStore(db.postgres);

  let redis: RedisCacheBackend | null = null;
  let backend: CacheBackend;
  if (env.REDIS_URL) {
    redis = await createRedisCacheBackend(env.REDIS_URL);
    backend = redis;
  } else {
    console.info('REDIS_URL not set, caching in process memory');
    backend = new MemoryCacheBackend({ maxEntries: env.RAG_CACHE_MEMORY_MAX_ENTRIES });
  }

  const cache = createCacheManager(backend, store, {
    embeddingTtlSeconds: env.RAG_CACHE_EMBEDDING_TTL_SECONDS,
    retrievalTtlSeconds: env.RAG_CACHE_RETRIEVAL_TTL_SECONDS,
    answerTtlSeconds: env.RAG_CACHE_ANSWER_TTL_SECONDS,
  });

  const llm = createLLM({
    baseUrl: env.LLM_BASE_URL,
    apiKey: env.LLM_API_KEY,
    model: env.LLM_MODEL,
  });

  const embedder = createEmbedder({
    baseUrl: env.EMBEDDING_BASE_URL,
    apiKey: env.EMBEDDING_API_KEY,
    model: env.EMBEDDING_MODEL,
    dimensions: env.EMBEDDING_DIMENSIONS,
  });
  const scorer = createCrossEncoder({
    baseUrl: env.RERANKER_BASE_URL,
    apiKey: env.RERANKER_API_KEY,
    model: env.RERANKER_MODEL,
  });

  const pipeline = createRAGPipeline(
    {
      store,
      bases,
      embedder,
      scorer,
      generator: createAnswerGenerator(llm),
      classifier: createClassifier(env, llm),
      expansion: env.RAG_EXPANSION_VARIANTS > 0 ? new LLMQueryExpansion(llm) : null,
      cache,
    },
    {
      alpha: env.RAG_ALPHA,
      rrfK: env.RAG_RRF_K,
      retrievalTopK: env.RAG_RETRIEVAL_TOP_K,
      rerankTopK: env.RAG_RERANK_TOP_K,
      rerankMaxCandidates: env.RAG_RERANK_MAX_CANDIDATES,
      numVariations: env.RAG_EXPANSION_VARIANTS,
      variantDecay: env.RAG_VARIANT_DECAY,
      maxConcurrency: env.RAG_MAX_CONCURRENCY,
      minRouteConfidence: env.RAG_ROUTER_MIN_CONFIDENCE,
      timeouts: {
        route: env.RAG_ROUTE_TIMEOUT_MS,
        cache: env.RAG_CACHE_TIMEOUT_MS,
        expand: env.RAG_EXPAND_TIMEOUT_MS,
        retrieve: env.RAG_RETRIEVE_TIMEOUT_MS,
        rerank: env.RAG_RERANK_TIMEOUT_MS,
        generate: env.RAG_GENERATE_TIMEOUT_MS,
      },
      deadlineMs: env.RAG_DEADLINE_MS,
    }
  );

  console.info(
    `Pipeline ready: bases [${pipeline.knowledgeBases.join(', ')}], cache ${backend.name}`
  );

  return {
    pipeline,
    queryLog: options.queryLog ? new PostgresQueryLog(db.postgres) : null,
    checkHealth: () => db.healthCheck(redis),
    checkModels: async () => {
      const [llmHealth, embedding, reranker] = await Promise.all([
        llm.healthCheck(),
        embedder.healthCheck(),
        scorer.healthCheck(),
      ]);
      return { llm: llmHealth, embedding, reranker };
    },
    close: async () => {
      await db.disconnect();
      if (redis) {
        await redis.close();
      }
    },
  };
}
