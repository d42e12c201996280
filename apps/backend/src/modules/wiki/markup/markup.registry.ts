import type { IMarkupProcessor } from '@leafwiki/types';
import { ValidationError } from '../../../lib/errors.js';
import { MarkdownProcessor } from './markdown.processor.js';
import { TextProcessor } from './text.processor.js';

/**
 * Registered markup processors, keyed by the name used in configuration.
 */
export const MARKUP_PROCESSORS: Readonly<Record<string, () => IMarkupProcessor>> = {
    markdown: () => new MarkdownProcessor(),
    text: () => new TextProcessor()
};

/**
 * Create the processor registered under `name`.
 *
 * @throws ValidationError for an unknown name
 */
export function createMarkupProcessor(name: string): IMarkupProcessor {
    const factory = Object.prototype.hasOwnProperty.call(MARKUP_PROCESSORS, name)
        ? MARKUP_PROCESSORS[name]
        : undefined;

    if (!factory) {
        throw new ValidationError(`Unknown markup processor "${name}"`, {
            available: Object.keys(MARKUP_PROCESSORS)
        });
    }

    return factory();
}
