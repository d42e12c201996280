import pino from 'pino';
import { mkdirSync } from 'fs';
import type { ILogger } from '@leafwiki/types';
import { env, type EnvConfig } from '../config/env.js';

/**
 * Logger utilities for the wiki engine.
 *
 * `createLogger()` builds the process logger: Pino writing to `.run/backend.log`
 * and to the console through `pino-pretty`. Under `NODE_ENV=test` no transport
 * is started and the level defaults to `silent`, so test runs leave no worker
 * threads behind.
 *
 * @example
 * import { logger } from './lib/logger.js';
 * logger.info({ pages: 12 }, 'Wiki indexed');
 */

function resolveLevel(config: EnvConfig): pino.LevelWithSilent {
    if (config.LOG_LEVEL) {
        return config.LOG_LEVEL;
    }
    if (config.NODE_ENV === 'test') {
        return 'silent';
    }
    return config.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Creates a Pino logger instance with the standard configuration.
 *
 * **Transport targets:**
 *
 * 1. `pino/file` - Writes to `.run/backend.log` for local file access
 * 2. `pino-pretty` - Writes to stdout with colorized, human-readable formatting
 *
 * @param config - Validated environment; defaults to the process environment
 * @returns Configured Pino logger instance
 */
export function createLogger(config: EnvConfig = env): pino.Logger {
    const level = resolveLevel(config);
    const base = { service: 'leafwiki-backend' };

    if (config.NODE_ENV === 'test') {
        return pino({ level, base });
    }

    // Ensure .run directory exists before the file transport opens it
    mkdirSync('.run', { recursive: true });

    const targets: pino.TransportTargetOptions[] = [
        {
            level,
            target: 'pino/file',
            options: { destination: '.run/backend.log' }
        },
        {
            level,
            target: 'pino-pretty',
            options: {
                colorize: true,
                singleLine: false,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        }
    ];

    return pino({ level, base }, pino.transport({ targets }));
}

/**
 * Application logger singleton.
 */
export const logger: ILogger = createLogger();
