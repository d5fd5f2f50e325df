/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Credential endpoints are the first thing attackers hammer:
 *   - login / register: 5 per 15 min per email-key, 20 per 15 min per IP
 *   - refresh: 30 per 15 min per IP
 * - Uses Redis in prod, but depends only on Cache (DIP).
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: 'rl' })
 * - await limiter.hitOrThrow({ key: 'login:ip:1.2.3.4', limit: 20, windowSeconds: 900 })
 *
 * ATOMICITY:
 * - INCR-then-check, not check-then-INCR. INCR is atomic in Redis, so two concurrent
 *   requests cannot both slip under the limit.
 *
 * DISABLING:
 * - Pass `disabled: true` to skip all checks (composition root does this for NODE_ENV=test).
 * - Never check NODE_ENV here.
 */

import type { Cache } from '../cache/cache';

export type RateLimitRule = Readonly<{ limit: number; windowSeconds: number }>;

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly windowSeconds: number,
  ) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    private readonly opts?: { prefix?: string; disabled?: boolean },
  ) {}

  private buildKey(key: string): string {
    return this.opts?.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  /**
   * Increments the counter for `key`.
   * Throws RateLimitError once the counter exceeds `limit` within the window.
   */
  async hitOrThrow(input: { key: string } & RateLimitRule): Promise<void> {
    if (this.opts?.disabled) return;

    const fullKey = this.buildKey(input.key);
    const current = await this.cache.incr(fullKey, { ttlSeconds: input.windowSeconds });

    if (current > input.limit) {
      throw new RateLimitError(fullKey, input.limit, input.windowSeconds);
    }
  }
}
