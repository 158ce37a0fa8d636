/**
 * Outcome of a cache lookup. Absence and expiry both collapse to `found: false`.
 */
export type CacheLookup<T> =
  | { readonly found: true; readonly value: T }
  | { readonly found: false };

/**
 * Synchronous key/value store where every entry carries its own TTL.
 */
export interface ICacheStore<T> {
  /**
   * Insert or overwrite a value, valid for `ttlMs` from now
   */
  set(key: string, value: T, ttlMs: number): void;

  /**
   * Read a value; an expired entry is removed on sight
   */
  get(key: string): CacheLookup<T>;

  /**
   * Remove a key; no-op when absent
   */
  delete(key: string): void;
}
