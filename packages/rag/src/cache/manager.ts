/**
 * Cache Manager
 *
 * Three independent namespaces over one backend:
 * - embedding: normalized text -> vector, untagged, long TTL
 * - retrieval: (query, topK, filters, bases) -> fused ranking, tagged
 * - answer:    (query, topK, filters, bases) -> answer payload, tagged, TTL per content class
 *
 * Tagged entries carry the `(docId, version)` pairs they were built from.
 * They are removed proactively when the document store reports a version
 * bump, and lazily when a read finds a tag that is no longer current.
 *
 * @module @groundwork/rag/cache/manager
 */

import { createHash } from 'node:crypto';
import type { z } from 'zod';
import type {
  AnswerPayload,
  CacheEntry,
  CacheNamespace,
  DocVersion,
  FusedResult,
  ScalarMap,
} from '../types';
import type { DocumentStore } from '../documents/store';
import type { CacheBackend, Clock } from './backend';
import { CacheUnavailableError, errorMessage } from '../errors';
import { normalizeQueryText } from '../expansion/expander';
import {
  answerValueSchema,
  cacheEntrySchema,
  embeddingValueSchema,
  retrievalValueSchema,
} from './schemas';

// ============================================================================
// Configuration
// ============================================================================

export interface CacheManagerConfig {
  embeddingTtlSeconds: number;
  retrievalTtlSeconds: number;
  /** Answer TTL for documents without a known content class */
  answerTtlSeconds: number;
  /** Answer TTL per `content_class` metadata value; 0 disables answer caching */
  answerTtlByContentClass: Record<string, number>;
  /** Metadata key naming a document's content class */
  contentClassKey: string;
}

export const DEFAULT_CACHE_CONFIG: CacheManagerConfig = {
  embeddingTtlSeconds: 7 * 24 * 60 * 60,
  retrievalTtlSeconds: 6 * 60 * 60,
  answerTtlSeconds: 15 * 60,
  answerTtlByContentClass: {
    static: 24 * 60 * 60,
    procedure: 12 * 60 * 60,
    runbook: 60,
  },
  contentClassKey: 'content_class',
};

/**
 * Inputs that identify a retrieval or answer
 */
export interface CacheKeyInput {
  query: string;
  topK: number;
  filters: ScalarMap;
  bases: readonly string[];
}

export interface NamespaceStats {
  hits: number;
  misses: number;
  writes: number;
  staleEvictions: number;
  invalidations: number;
  hitRate: number;
}

export type CacheStats = Record<CacheNamespace, NamespaceStats> & {
  backend: string;
};

const NAMESPACES: readonly CacheNamespace[] = ['embedding', 'retrieval', 'answer'];

// ============================================================================
// Keys and tags
// ============================================================================

function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

function sortedEntries(map: ScalarMap): Array<[string, ScalarMap[string]]> {
  return Object.keys(map)
    .sort()
    .map((key) => [key, map[key]]);
}

export function embeddingKey(text: string): string {
  return `embedding:${sha256(normalizeQueryText(text))}`;
}

export function requestKey(namespace: 'retrieval' | 'answer', input: CacheKeyInput): string {
  const canonical = JSON.stringify([
    normalizeQueryText(input.query),
    input.topK,
    sortedEntries(input.filters),
    [...input.bases].sort(),
  ]);
  return `${namespace}:${sha256(canonical)}`;
}

export function versionTag(docId: string, version: number): string {
  return `${docId}@${version}`;
}

function namespaceOf(key: string): CacheNamespace | null {
  const prefix = key.slice(0, key.indexOf(':'));
  return NAMESPACES.find((ns) => ns === prefix) ?? null;
}

// ============================================================================
// Manager
// ============================================================================

export class CacheManager {
  private backend: CacheBackend;
  private store: DocumentStore;
  private config: CacheManagerConfig;
  private now: Clock;
  private counters: Record<CacheNamespace, Omit<NamespaceStats, 'hitRate'>>;
  private unsubscribe: (() => void) | null;

  constructor(
    backend: CacheBackend,
    store: DocumentStore,
    config: Partial<CacheManagerConfig> = {},
    clock: Clock = Date.now
  ) {
    this.backend = backend;
    this.store = store;
    this.config = {
      ...DEFAULT_CACHE_CONFIG,
      ...config,
      answerTtlByContentClass: {
        ...DEFAULT_CACHE_CONFIG.answerTtlByContentClass,
        ...config.answerTtlByContentClass,
      },
    };
    this.now = clock;
    this.counters = {
      embedding: emptyCounters(),
      retrieval: emptyCounters(),
      answer: emptyCounters(),
    };

    this.unsubscribe = store.onVersionBump((docId, oldVersion) =>
      this.invalidate(docId, oldVersion).then(() => undefined)
    );
  }

  // --------------------------------------------------------------------------
  // Embedding cache
  // --------------------------------------------------------------------------

  async getEmbedding(text: string): Promise<number[] | null> {
    return this.read('embedding', embeddingKey(text), embeddingValueSchema);
  }

  async setEmbedding(text: string, vector: number[]): Promise<void> {
    await this.write('embedding', embeddingKey(text), vector, this.config.embeddingTtlSeconds, []);
  }

  // --------------------------------------------------------------------------
  // Retrieval cache
  // --------------------------------------------------------------------------

  async getRetrieval(input: CacheKeyInput): Promise<FusedResult[] | null> {
    return this.read('retrieval', requestKey('retrieval', input), retrievalValueSchema);
  }

  async setRetrieval(
    input: CacheKeyInput,
    fused: FusedResult[],
    sources: readonly DocVersion[]
  ): Promise<void> {
    await this.write(
      'retrieval',
      requestKey('retrieval', input),
      fused,
      this.config.retrievalTtlSeconds,
      sources
    );
  }

  // --------------------------------------------------------------------------
  // Answer cache
  // --------------------------------------------------------------------------

  async getAnswer(input: CacheKeyInput): Promise<AnswerPayload | null> {
    return this.read('answer', requestKey('answer', input), answerValueSchema);
  }

  /**
   * Store an answer; skipped when its TTL works out to zero
   * @returns whether the entry was written
   */
  async setAnswer(
    input: CacheKeyInput,
    payload: AnswerPayload,
    sources: readonly DocVersion[],
    ttlSeconds: number = this.answerTtlFor(payload.results.map((r) => r.metadata))
  ): Promise<boolean> {
    if (ttlSeconds <= 0) {
      return false;
    }
    await this.write('answer', requestKey('answer', input), payload, ttlSeconds, sources);
    return true;
  }

  /**
   * Shortest TTL among the content classes of the given documents
   */
  answerTtlFor(metadata: readonly ScalarMap[]): number {
    if (metadata.length === 0) {
      return this.config.answerTtlSeconds;
    }

    return Math.min(
      ...metadata.map((meta) => {
        const contentClass = meta[this.config.contentClassKey];
        if (typeof contentClass === 'string') {
          const ttl = this.config.answerTtlByContentClass[contentClass];
          if (ttl !== undefined) return ttl;
        }
        return this.config.answerTtlSeconds;
      })
    );
  }

  // --------------------------------------------------------------------------
  // Invalidation
  // --------------------------------------------------------------------------

  /**
   * Delete every entry, in any namespace, built from `(docId, oldVersion)`
   * @returns number of entries deleted
   */
  async invalidate(docId: string, oldVersion: number): Promise<number> {
    const tag = versionTag(docId, oldVersion);

    try {
      const keys = await this.backend.keysForTag(tag);
      let deleted = 0;

      for (const key of keys) {
        if (await this.backend.delete(key)) {
          deleted++;
          const namespace = namespaceOf(key);
          if (namespace) this.counters[namespace].invalidations++;
        }
      }

      await this.backend.deleteTag(tag);

      if (deleted > 0) {
        console.info(`Cache invalidated ${deleted} entries for ${tag}`);
      }
      return deleted;
    } catch (error) {
      throw new CacheUnavailableError(errorMessage(error), error);
    }
  }

  async clear(): Promise<void> {
    try {
      await this.backend.clear();
    } catch (error) {
      throw new CacheUnavailableError(errorMessage(error), error);
    }
  }

  getStats(): CacheStats {
    const stats = (namespace: CacheNamespace): NamespaceStats => {
      const c = this.counters[namespace];
      const lookups = c.hits + c.misses;
      return { ...c, hitRate: lookups === 0 ? 0 : c.hits / lookups };
    };

    return {
      backend: this.backend.name,
      embedding: stats('embedding'),
      retrieval: stats('retrieval'),
      answer: stats('answer'),
    };
  }

  /**
   * Stop listening for version bumps
   */
  close(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private async read<T>(
    namespace: CacheNamespace,
    key: string,
    schema: z.ZodType<T>
  ): Promise<T | null> {
    const counters = this.counters[namespace];
    let raw: string | null;

    try {
      raw = await this.backend.get(key);
    } catch (error) {
      counters.misses++;
      throw new CacheUnavailableError(errorMessage(error), error);
    }

    if (raw === null) {
      counters.misses++;
      return null;
    }

    const entry = parseEntry(raw, schema);
    if (!entry) {
      console.warn(`Discarding malformed ${namespace} cache entry ${key}`);
      counters.misses++;
      await this.discard(key);
      return null;
    }

    if (!(await this.isCurrent(entry.sourceDocVersions))) {
      counters.misses++;
      counters.staleEvictions++;
      await this.discard(key);
      return null;
    }

    counters.hits++;
    return entry.value;
  }

  private async write(
    namespace: CacheNamespace,
    key: string,
    value: unknown,
    ttlSeconds: number,
    sources: readonly DocVersion[]
  ): Promise<void> {
    const entry: CacheEntry = {
      key,
      value,
      createdAt: this.now(),
      ttlSeconds,
      sourceDocVersions: dedupeVersions(sources),
    };

    try {
      await this.backend.set(
        key,
        JSON.stringify(entry),
        ttlSeconds,
        entry.sourceDocVersions.map((v) => versionTag(v.docId, v.version))
      );
    } catch (error) {
      throw new CacheUnavailableError(errorMessage(error), error);
    }

    this.counters[namespace].writes++;
  }

  /**
   * Lazy invalidation: every tagged version must still be current
   */
  private async isCurrent(sources: readonly DocVersion[]): Promise<boolean> {
    if (sources.length === 0) return true;

    try {
      const current = await Promise.all(sources.map((s) => this.store.currentVersion(s.docId)));
      return sources.every((s, i) => current[i] === s.version);
    } catch (error) {
      throw new CacheUnavailableError(
        `version check failed: ${errorMessage(error)}`,
        error
      );
    }
  }

  private async discard(key: string): Promise<void> {
    try {
      await this.backend.delete(key);
    } catch (error) {
      throw new CacheUnavailableError(errorMessage(error), error);
    }
  }
}

function emptyCounters(): Omit<NamespaceStats, 'hitRate'> {
  return { hits: 0, misses: 0, writes: 0, staleEvictions: 0, invalidations: 0 };
}

function dedupeVersions(sources: readonly DocVersion[]): DocVersion[] {
  const byTag = new Map<string, DocVersion>();
  for (const source of sources) {
    byTag.set(versionTag(source.docId, source.version), {
      docId: source.docId,
      version: source.version,
    });
  }
  return Array.from(byTag.values());
}

function parseEntry<T>(raw: string, schema: z.ZodType<T>): CacheEntry<T> | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const entry = cacheEntrySchema.safeParse(json);
  if (!entry.success) return null;

  const value = schema.safeParse(entry.data.value);
  if (!value.success) return null;

  return { ...entry.data, value: value.data };
}

export function createCacheManager(
  backend: CacheBackend,
  store: DocumentStore,
  config?: Partial<CacheManagerConfig>,
  clock?: Clock
): CacheManager {
  return new CacheManager(backend, store, config, clock);
}
