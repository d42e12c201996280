import fs from 'fs/promises';
import path from 'path';
import type { ILogger } from '@leafwiki/types';
import { describeError, getErrorCode, IOError } from '../../../lib/errors.js';

/**
 * Check whether a path exists without throwing.
 */
export async function pathExists(target: string): Promise<boolean> {
    try {
        await fs.access(target);
        return true;
    } catch (error) {
        if (getErrorCode(error) === 'ENOENT') {
            return false;
        }
        throw toIOError(error, 'access', target);
    }
}

/**
 * Wrap a filesystem failure in an IOError carrying the errno code and path.
 */
export function toIOError(error: unknown, operation: string, target: string): IOError {
    return new IOError(`Failed to ${operation} ${target}: ${describeError(error)}`, {
        operation,
        path: target,
        errno: getErrorCode(error)
    });
}

/**
 * Replace a file's content by writing a sibling temporary file and renaming
 * it over the target. The target is either fully overwritten or left as it was.
 *
 * @throws IOError if the write or rename fails
 */
export async function writeFileAtomic(target: string, content: string, logger: ILogger): Promise<void> {
    const tempPath = path.join(
        path.dirname(target),
        `.${path.basename(target)}.${process.pid}.${Date.now()}.tmp`
    );

    try {
        await fs.writeFile(tempPath, content, 'utf-8');
        await fs.rename(tempPath, target);
    } catch (error) {
        await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
            logger.warn({ path: tempPath, error: describeError(cleanupError) }, 'Could not remove temporary page file');
        });
        throw toIOError(error, 'write', target);
    }
}
