import type {
    IMarkupProcessor,
    IParsedPage,
    IProcessedPage,
    PageMetadata
} from '@leafwiki/types';
import { ValidationError } from '../../../lib/errors.js';

/**
 * Header key grammar: up to three leading spaces, then letters, digits,
 * underscores or hyphens, then a colon.
 */
const META_LINE = /^ {0,3}([A-Za-z0-9_-]+):\s*(.*)$/;

/**
 * Continuation of the previous key: four or more leading spaces.
 */
const META_MORE = /^ {4,}(.*)$/;

export const META_KEY = /^[a-z0-9_-]+$/;

/**
 * Check that a key and its values survive a write and a re-parse unchanged.
 *
 * The header cannot hold a key without values, a value spanning several
 * lines, an empty continuation value (a whitespace-only line ends the header)
 * or surrounding whitespace (values are trimmed on read).
 *
 * @throws ValidationError naming the offending key
 */
export function assertWritableMeta(key: string, values: readonly string[]): void {
    if (!META_KEY.test(key)) {
        throw new ValidationError(`Invalid metadata key "${key}"`, { key });
    }
    if (values.length === 0) {
        throw new ValidationError(`Metadata key "${key}" needs at least one value`, { key });
    }

    values.forEach((value, index) => {
        if (/[\r\n]/.test(value)) {
            throw new ValidationError(`Metadata value for "${key}" must be a single line`, { key, index });
        }
        if (value !== value.trim()) {
            throw new ValidationError(`Metadata value for "${key}" has surrounding whitespace`, { key, index });
        }
        if (index > 0 && value === '') {
            throw new ValidationError(`Metadata key "${key}" has an empty continuation value`, { key, index });
        }
    });
}

/**
 * Base class for markup processors sharing the `key: value` page header.
 *
 * A page file is a block of metadata lines, a blank line, then the body:
 *
 * ```
 * title: Setup guide
 * tags: intro, install
 *
 * # Setup
 * ...
 * ```
 *
 * Subclasses supply the extension and the body renderer; header parsing and
 * serialization live here so every dialect reads and writes the same way.
 */
export abstract class MarkupProcessor implements IMarkupProcessor {
    abstract readonly name: string;
    abstract readonly extension: string;

    readonly metaLineTemplate: string = '{key}: {value}';

    /**
     * Render a body (without header) to HTML.
     *
     * @param body - Body text in the processor's dialect
     * @returns Promise resolving to the HTML output
     */
    protected abstract renderBody(body: string): Promise<string>;

    /**
     * Split raw page source into metadata and body.
     *
     * Reading stops at the first blank line (consumed) or at the first line
     * that is neither a `key: value` line nor a continuation line (kept as the
     * first body line). Keys are lower-cased and values trimmed.
     *
     * @param raw - Page source as stored on disk
     * @returns Parsed metadata and the remaining body
     *
     * @example
     * const { metadata, body } = processor.parse('title: Home\n\nHello');
     * metadata.get('title'); // ['Home']
     * body; // 'Hello'
     */
    parse(raw: string): IParsedPage {
        const lines = raw.replace(/\r\n?/g, '\n').split('\n');
        const metadata: PageMetadata = new Map();
        let current: string[] | undefined;
        let index = 0;

        for (; index < lines.length; index++) {
            const line = lines[index];

            if (line.trim() === '') {
                index++;
                break;
            }

            const more = current ? META_MORE.exec(line) : null;
            if (current && more) {
                current.push(more[1].trim());
                continue;
            }

            const match = META_LINE.exec(line);
            if (!match) {
                break;
            }

            const key = match[1].toLowerCase();
            current = metadata.get(key) ?? [];
            current.push(match[2].trim());
            metadata.set(key, current);
        }

        return { metadata, body: lines.slice(index).join('\n') };
    }

    async process(raw: string): Promise<IProcessedPage> {
        const { metadata, body } = this.parse(raw);
        const html = await this.renderBody(body);
        return { html, body, metadata };
    }

    /**
     * Serialize one key: the first value fills the template, each further
     * value goes on its own line indented by four spaces.
     *
     * @example
     * processor.formatMetaLines('tags', ['a, b']); // 'tags: a, b\n'
     * processor.formatMetaLines('author', ['Ann', 'Bo']); // 'author: Ann\n    Bo\n'
     *
     * @throws ValidationError if the key or values cannot be read back unchanged
     */
    formatMetaLines(key: string, values: readonly string[]): string {
        assertWritableMeta(key, values);
        const [first, ...rest] = values;
        const head = this.metaLineTemplate.replace('{key}', () => key).replace('{value}', () => first);
        return [head, ...rest.map(value => `    ${value}`)].map(line => `${line}\n`).join('');
    }
}
