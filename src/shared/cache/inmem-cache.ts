/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests to run without Redis.
 * - Expiry is evaluated lazily against Date.now(), so fake timers move it too.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 */

import type { Cache, CacheSetOptions } from './cache';

type Entry = { value: string; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly store = new Map<string, Entry>();

  private getEntry(key: string): Entry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= Date.now()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  get(key: string): Promise<string | null> {
    const entry = this.getEntry(key);
    return Promise.resolve(entry ? entry.value : null);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    const expiresAtMs = opts?.ttlSeconds ? Date.now() + opts.ttlSeconds * 1000 : null;
    this.store.set(key, { value, expiresAtMs });
    return Promise.resolve();
  }

  del(key: string): Promise<void> {
    this.store.delete(key);
    return Promise.resolve();
  }

  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const entry = this.getEntry(key);
    const next = entry ? Number(entry.value) + 1 : 1;

    // Same as Redis INCR + EXPIRE-if-no-ttl: the window starts at the first hit.
    const expiresAtMs =
      entry?.expiresAtMs ?? (opts?.ttlSeconds ? Date.now() + opts.ttlSeconds * 1000 : null);

    this.store.set(key, { value: String(next), expiresAtMs });

    return Promise.resolve(next);
  }

  /** Test helper. */
  size(): number {
    return this.store.size;
  }
}
