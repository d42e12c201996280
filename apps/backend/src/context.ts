import fs from 'fs/promises';
import type { ILogger, IMarkupProcessor, IRenderCache } from '@leafwiki/types';
import type { EnvConfig } from './config/env.js';
import { createRedisClient } from './loaders/redis.js';
import { createMarkupProcessor } from './modules/wiki/markup/markup.registry.js';
import { WikiService } from './modules/wiki/services/wiki.service.js';
import { MemoryRenderCache, RedisRenderCache } from './services/render-cache/index.js';

/**
 * The explicit application context.
 *
 * Built once at process start and handed to whatever serves the wiki (a web
 * layer, a script, a test). Nothing in the engine reaches for a global wiki
 * instance; everything it needs arrives through this object.
 */
export interface WikiContext {
    config: EnvConfig;
    logger: ILogger;
    markup: IMarkupProcessor;
    cache: IRenderCache;
    wiki: WikiService;
}

/**
 * Collaborators that replace the ones derived from configuration.
 */
export interface WikiContextDependencies {
    logger: ILogger;
    cache?: IRenderCache;
}

/**
 * Build the wiki context from validated configuration.
 *
 * - Selects the markup processor named by `MARKUP`
 * - Uses Redis for the render cache when `REDIS_URL` is set, memory otherwise
 * - Creates the content directory if it does not exist yet
 *
 * @throws ValidationError if `MARKUP` names no registered processor
 * @throws Error if Redis is configured but cannot be reached
 */
export async function createWikiContext(config: EnvConfig, deps: WikiContextDependencies): Promise<WikiContext> {
    const { logger } = deps;
    const markup = createMarkupProcessor(config.MARKUP);

    let cache = deps.cache;
    if (!cache && config.REDIS_URL) {
        const redis = createRedisClient({ url: config.REDIS_URL, namespace: config.REDIS_NAMESPACE }, logger);
        await redis.connect();
        cache = new RedisRenderCache(redis);
    }
    cache ??= new MemoryRenderCache();

    await fs.mkdir(config.CONTENT_DIR, { recursive: true });

    const wiki = new WikiService({
        root: config.CONTENT_DIR,
        markup,
        cache,
        cacheTtl: config.RENDER_CACHE_TTL,
        logger
    });

    logger.info({ root: config.CONTENT_DIR, markup: markup.name, title: config.WIKI_TITLE }, 'Wiki context created');

    return { config, logger, markup, cache, wiki };
}
