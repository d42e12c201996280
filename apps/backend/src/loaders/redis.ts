import Redis from 'ioredis';
import type { Redis as RedisClient } from 'ioredis';
import type { ILogger } from '@leafwiki/types';

let client: RedisClient | null = null;
type RedisCtor = typeof import('ioredis')['default'];

export interface RedisOptions {
  url: string;
  namespace: string;
}

export function createRedisClient(options: RedisOptions, logger: ILogger): RedisClient {
  const RedisConstructor = Redis as unknown as RedisCtor;
  const instance = new RedisConstructor(options.url, {
    keyPrefix: `${options.namespace}:`,
    lazyConnect: true,
    maxRetriesPerRequest: 3
  });

  instance.on('connect', () => logger.info('Redis connected'));
  instance.on('error', (error: Error) => logger.error({ error }, 'Redis error'));

  client = instance;
  return instance;
}

export async function disconnectRedis(): Promise<void> {
  if (client) {
    await client.quit();
    client = null;
  }
}
