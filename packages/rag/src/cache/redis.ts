/**
 * Redis cache backend (node-redis v4)
 *
 * Entries are plain string keys with `EX` expiry. Each tag is a Redis set
 * of entry keys, kept for `tagTtlSeconds` after its last write.
 *
 * @module @groundwork/rag/cache/redis
 */

import { createClient } from 'redis';
import type { CacheBackend } from './backend';

export type RedisClient = ReturnType<typeof createClient>;

export interface RedisCacheBackendConfig {
  keyPrefix: string;
  /** Lifetime of a tag set; at least the longest entry TTL */
  tagTtlSeconds: number;
}

const DEFAULT_CONFIG: RedisCacheBackendConfig = {
  keyPrefix: 'groundwork:cache:',
  tagTtlSeconds: 7 * 24 * 60 * 60,
};

export class RedisCacheBackend implements CacheBackend {
  readonly name = 'redis';
  private client: RedisClient;
  private config: RedisCacheBackendConfig;

  constructor(client: RedisClient, config: Partial<RedisCacheBackendConfig> = {}) {
    this.client = client;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(this.entryKey(key));
  }

  async set(
    key: string,
    payload: string,
    ttlSeconds: number,
    tags: readonly string[]
  ): Promise<void> {
    const entryKey = this.entryKey(key);
    const multi = this.client.multi().set(entryKey, payload, { EX: ttlSeconds });

    for (const tag of tags) {
      const tagKey = this.tagKey(tag);
      multi.sAdd(tagKey, key);
      multi.expire(tagKey, Math.max(this.config.tagTtlSeconds, ttlSeconds));
    }

    await multi.exec();
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.client.del(this.entryKey(key));
    return removed > 0;
  }

  async keysForTag(tag: string): Promise<string[]> {
    return this.client.sMembers(this.tagKey(tag));
  }

  async deleteTag(tag: string): Promise<void> {
    await this.client.del(this.tagKey(tag));
  }

  /**
   * Remove every key under the prefix, entries and tag sets alike
   */
  async clear(): Promise<void> {
    const batch: string[] = [];
    for await (const key of this.client.scanIterator({
      MATCH: `${this.config.keyPrefix}*`,
      COUNT: 200,
    })) {
      batch.push(key);
      if (batch.length >= 200) {
        await this.client.del(batch.splice(0, batch.length));
      }
    }
    if (batch.length > 0) {
      await this.client.del(batch);
    }
  }

  async ping(): Promise<string> {
    return this.client.ping();
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private entryKey(key: string): string {
    return `${this.config.keyPrefix}entry:${key}`;
  }

  private tagKey(tag: string): string {
    return `${this.config.keyPrefix}tag:${tag}`;
  }
}

/**
 * Connect a node-redis client for the cache
 */
export async function createRedisCacheBackend(
  url: string,
  config?: Partial<RedisCacheBackendConfig>
): Promise<RedisCacheBackend> {
  const client = createClient({ url });
  client.on('error', (error: unknown) => {
    console.error('Redis client error:', error instanceof Error ? error.message : String(error));
  });
  await client.connect();
  return new RedisCacheBackend(client, config);
}
