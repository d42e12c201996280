/**
 * @fileoverview Application entry point.
 *
 * Validates configuration, builds the wiki context and walks the content tree
 * once to report what it found. A web layer would be started from here with
 * the same context.
 *
 * @module index
 */

import { env } from './config/env.js';
import { createWikiContext } from './context.js';
import { disconnectRedis } from './loaders/redis.js';
import { logger } from './lib/logger.js';
import { HOME_URL } from './modules/wiki/index.js';

/**
 * Main application entry point.
 *
 * @throws Logs error and exits with code 1 if bootstrap fails
 */
async function bootstrap(): Promise<void> {
    try {
        const ctx = await createWikiContext(env, { logger });

        const pages = await ctx.wiki.index();
        const tags = await ctx.wiki.getTags();
        const hasHome = await ctx.wiki.exists(HOME_URL);
        logger.info({ pages: pages.length, tags: tags.size, hasHome }, 'Wiki indexed');
    } catch (error) {
        logger.error({ error }, 'Failed to bootstrap application');
        process.exitCode = 1;
    } finally {
        await disconnectRedis();
    }
}

void bootstrap();
