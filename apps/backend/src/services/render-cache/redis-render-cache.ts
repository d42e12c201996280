import type { Redis as RedisClient } from 'ioredis';
import type { IRenderCache } from '@leafwiki/types';

/**
 * The subset of the ioredis client the cache relies on.
 */
export type RedisCacheClient = Pick<RedisClient, 'get' | 'set' | 'del'>;

/**
 * RedisRenderCache
 *
 * Stores rendered page output in Redis as JSON. Entries written with a TTL
 * use `EX`, so Redis expires them on its own; everything else stays until a
 * page save, move or delete removes the key.
 */
export class RedisRenderCache implements IRenderCache {
  /**
   * @param redis - Redis client, usually created by `createRedisClient()` with the namespace prefix
   */
  constructor(private readonly redis: RedisCacheClient) {}

  async get<T>(key: string): Promise<T | null> {
    const cached = await this.redis.get(key);
    if (cached === null) {
      return null;
    }
    return JSON.parse(cached) as T;
  }

  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds) {
      await this.redis.set(key, JSON.stringify(value), 'EX', ttlSeconds);
    } else {
      await this.redis.set(key, JSON.stringify(value));
    }
  }

  async del(key: string): Promise<number> {
    return await this.redis.del(key);
  }
}
