export { MemoryRenderCache } from './memory-render-cache.js';
export { RedisRenderCache, type RedisCacheClient } from './redis-render-cache.js';

/**
 * Cache key prefix for rendered page HTML.
 * Full key format: "page:html:{url}"
 */
export const RENDER_CACHE_PREFIX = 'page:html:';

/**
 * Derive the render cache key for a page. Pure function of the page URL, so
 * the key computed when storing is the key used when invalidating.
 */
export function renderCacheKey(url: string): string {
  return RENDER_CACHE_PREFIX + url;
}
