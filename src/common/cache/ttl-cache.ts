import { CacheLookup, ICacheStore } from '../interfaces/cache.interface';
import { Clock, systemClock } from '../time/clock';

/**
 * Cache entry with insertion time and its own TTL
 */
interface CacheEntry<T> {
  value: T;
  createdAt: number;
  ttlMs: number;
}

const MISS = { found: false } as const;

/**
 * In-memory cache implementation using Map with per-entry TTL.
 *
 * Expired entries are evicted lazily when `get` observes them; there is no
 * background sweep and no capacity bound, so callers keep the key space small
 * (one key per feed). All operations are synchronous and run to completion on
 * the event loop, so eviction inside `get` never interleaves with a `set`.
 */
export class TtlCache<T> implements ICacheStore<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(private readonly clock: Clock = systemClock) {}

  set(key: string, value: T, ttlMs: number): void {
    this.entries.set(key, { value, createdAt: this.clock.now(), ttlMs });
  }

  get(key: string): CacheLookup<T> {
    const entry = this.entries.get(key);
    if (!entry) {
      return MISS;
    }

    // Still a hit exactly at the boundary
    if (this.clock.now() - entry.createdAt > entry.ttlMs) {
      this.entries.delete(key);
      return MISS;
    }

    return { found: true, value: entry.value };
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  /** Number of stored entries, expired-but-unread ones included. */
  get size(): number {
    return this.entries.size;
  }
}
