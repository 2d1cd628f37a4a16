/**
 * Cache Backends
 *
 * Key/value storage with per-key TTL and tag sets. A tag set lists the keys
 * built from one `(docId, version)`; invalidation walks it key by key.
 *
 * @module @groundwork/rag/cache/backend
 */

export interface CacheBackend {
  readonly name: string;
  get(key: string): Promise<string | null>;
  /** Store a payload; replaces any previous entry under the key */
  set(key: string, payload: string, ttlSeconds: number, tags: readonly string[]): Promise<void>;
  delete(key: string): Promise<boolean>;
  keysForTag(tag: string): Promise<string[]>;
  /** Drop a tag set once its keys have been deleted */
  deleteTag(tag: string): Promise<void>;
  clear(): Promise<void>;
}

export type Clock = () => number;

interface MemoryEntry {
  payload: string;
  expiresAt: number;
  tags: readonly string[];
}

export interface MemoryCacheBackendConfig {
  /** Oldest writes are evicted beyond this many entries */
  maxEntries: number;
  /** Minimum clock time between expiry sweeps triggered by writes */
  sweepIntervalMs: number;
}

const DEFAULT_MEMORY_CONFIG: MemoryCacheBackendConfig = {
  maxEntries: 10000,
  sweepIntervalMs: 60000,
};

/**
 * Process-local backend. Expired entries are dropped on read and by a sweep
 * that runs on write at most once per `sweepIntervalMs`.
 */
export class MemoryCacheBackend implements CacheBackend {
  readonly name = 'memory';
  private entries = new Map<string, MemoryEntry>();
  private tagIndex = new Map<string, Set<string>>();
  private config: MemoryCacheBackendConfig;
  private now: Clock;
  private lastSweep: number;

  constructor(config: Partial<MemoryCacheBackendConfig> = {}, clock: Clock = Date.now) {
    this.config = { ...DEFAULT_MEMORY_CONFIG, ...config };
    if (!Number.isInteger(this.config.maxEntries) || this.config.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${this.config.maxEntries}`);
    }
    this.now = clock;
    this.lastSweep = clock();
  }

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (this.now() >= entry.expiresAt) {
      this.remove(key, entry);
      return null;
    }

    return entry.payload;
  }

  async set(
    key: string,
    payload: string,
    ttlSeconds: number,
    tags: readonly string[]
  ): Promise<void> {
    const now = this.now();
    if (now - this.lastSweep >= this.config.sweepIntervalMs) {
      this.prune();
    }

    const previous = this.entries.get(key);
    if (previous) this.remove(key, previous);

    this.entries.set(key, {
      payload,
      expiresAt: now + ttlSeconds * 1000,
      tags: [...tags],
    });

    for (const tag of tags) {
      let keys = this.tagIndex.get(tag);
      if (!keys) {
        keys = new Set();
        this.tagIndex.set(tag, keys);
      }
      keys.add(key);
    }

    if (this.entries.size > this.config.maxEntries) {
      this.prune();
      this.evictOldest();
    }
  }

  async delete(key: string): Promise<boolean> {
    const entry = this.entries.get(key);
    if (!entry) return false;
    this.remove(key, entry);
    return true;
  }

  async keysForTag(tag: string): Promise<string[]> {
    return Array.from(this.tagIndex.get(tag) ?? []);
  }

  async deleteTag(tag: string): Promise<void> {
    this.tagIndex.delete(tag);
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.tagIndex.clear();
  }

  /**
   * Remove every expired entry
   *
   * @returns Number of entries removed
   */
  prune(): number {
    const now = this.now();
    this.lastSweep = now;

    let pruned = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.remove(key, entry);
        pruned++;
      }
    }
    return pruned;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Map order is write order; rewriting a key moves it to the end */
  private evictOldest(): void {
    for (const [key, entry] of this.entries) {
      if (this.entries.size <= this.config.maxEntries) return;
      this.remove(key, entry);
    }
  }

  private remove(key: string, entry: MemoryEntry): void {
    this.entries.delete(key);
    for (const tag of entry.tags) {
      const keys = this.tagIndex.get(tag);
      if (!keys) continue;
      keys.delete(key);
      if (keys.size === 0) this.tagIndex.delete(tag);
    }
  }
}
