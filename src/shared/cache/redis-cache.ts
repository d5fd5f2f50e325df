/**
 * src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Production Cache: holds the tenant projections (`tenant:{subdomain}`, 1 h TTL) and the
 *   fixed-window rate-limit counters of the auth endpoints.
 *
 * RULES:
 * - incr() opens the window on the first hit (value 1). A counter found without a TTL
 *   gets one on the next hit, so a lost EXPIRE never locks a caller out for good.
 * - The client type is derived from createClient(); RedisClientType drifts when several
 *   @redis/client copies are installed.
 * - Client events have no request context: they go to the global logger.
 */

import { createClient } from 'redis';
import type { Cache, CacheSetOptions } from './cache';
import { logger } from '../logger/logger';

type RedisClient = ReturnType<typeof createClient>;

const NO_EXPIRY = -1;

export class RedisCache implements Cache {
  private constructor(private readonly client: RedisClient) {}

  static async connect(redisUrl: string): Promise<RedisCache> {
    const client = createClient({ url: redisUrl });

    client.on('error', (err: Error) => {
      logger.error('cache.redis.client_error', { flow: 'cache', err });
    });
    client.on('reconnecting', () => {
      logger.warn('cache.redis.reconnecting', { flow: 'cache' });
    });

    await client.connect();
    logger.info('cache.redis.connected', { flow: 'cache' });
    return new RedisCache(client);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    if (opts?.ttlSeconds) {
      await this.client.set(key, value, { EX: opts.ttlSeconds });
    } else {
      await this.client.set(key, value);
    }
  }

  async del(key: string): Promise<void> {
    await this.client.del(key);
  }

  async incr(key: string, opts?: CacheSetOptions): Promise<number> {
    const value = await this.client.incr(key);
    if (!opts?.ttlSeconds) return value;

    if (value === 1 || (await this.client.ttl(key)) === NO_EXPIRY) {
      await this.client.expire(key, opts.ttlSeconds);
    }
    return value;
  }
}
