import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RedisCache } from '../../../../src/shared/cache/redis-cache';

const fakeRedis = vi.hoisted(() => {
  const counters = new Map<string, number>();
  const ttls = new Map<string, number>();
  const expireCalls: Array<[string, number]> = [];

  return {
    counters,
    ttls,
    expireCalls,
    client: {
      on: () => undefined,
      connect: async () => undefined,
      incr: async (key: string) => {
        const next = (counters.get(key) ?? 0) + 1;
        counters.set(key, next);
        return next;
      },
      ttl: async (key: string) => ttls.get(key) ?? -1,
      expire: async (key: string, seconds: number) => {
        expireCalls.push([key, seconds]);
        ttls.set(key, seconds);
        return true;
      },
    },
  };
});

vi.mock('redis', () => ({ createClient: () => fakeRedis.client }));

describe('RedisCache.incr', () => {
  beforeEach(() => {
    fakeRedis.counters.clear();
    fakeRedis.ttls.clear();
    fakeRedis.expireCalls.length = 0;
  });

  it('opens the window on the first hit only', async () => {
    const cache = await RedisCache.connect('redis://localhost:6379');

    expect(await cache.incr('rl:login:ip:1', { ttlSeconds: 900 })).toBe(1);
    expect(await cache.incr('rl:login:ip:1', { ttlSeconds: 900 })).toBe(2);

    expect(fakeRedis.expireCalls).toEqual([['rl:login:ip:1', 900]]);
  });

  it('repairs a counter left without a TTL', async () => {
    const cache = await RedisCache.connect('redis://localhost:6379');
    fakeRedis.counters.set('rl:stuck', 4);

    expect(await cache.incr('rl:stuck', { ttlSeconds: 60 })).toBe(5);
    expect(fakeRedis.expireCalls).toEqual([['rl:stuck', 60]]);
  });

  it('never sets an expiry without a ttl', async () => {
    const cache = await RedisCache.connect('redis://localhost:6379');

    expect(await cache.incr('counter')).toBe(1);
    expect(fakeRedis.expireCalls).toEqual([]);
  });
});
