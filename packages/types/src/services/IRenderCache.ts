/**
 * Key-value cache used to memoize rendered page output.
 *
 * Implementations may be in-process or backed by Redis. The wiki only relies
 * on three operations: read a key, write a key, and delete a key. Keys are
 * derived from page identity so the same key can be computed when storing and
 * when invalidating after a save.
 */
export interface IRenderCache {
    /**
     * Retrieve a cached value by key.
     *
     * @param key - Cache key to retrieve
     * @returns Parsed value if found and not expired, null otherwise
     *
     * @example
     * ```typescript
     * const html = await cache.get<string>('page:html:home');
     * if (html) {
     *   return html; // Cache hit
     * }
     * ```
     */
    get<T>(key: string): Promise<T | null>;

    /**
     * Store a value in cache with an optional TTL.
     *
     * @param key - Cache key to store under
     * @param value - Value to cache (must be JSON-serializable)
     * @param ttlSeconds - Optional time-to-live in seconds
     */
    set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>;

    /**
     * Delete a specific cache entry by key.
     *
     * @param key - Cache key to delete
     * @returns Number of keys removed (0 or 1)
     */
    del(key: string): Promise<number>;
}
