import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type {
    ILogger,
    IMarkupProcessor,
    IPage,
    IRenderCache,
    MetadataValue,
    PageMetadata
} from '@leafwiki/types';
import {
    getErrorCode,
    InvalidStateError,
    MissingMetadataError,
    NotFoundError,
} from '../../../lib/errors.js';
import { renderCacheKey } from '../../../services/render-cache/index.js';
import { assertWritableMeta } from '../markup/markup-processor.js';
import { toIOError, writeFileAtomic } from '../utils/fs.js';

/**
 * Everything a page needs to read, render, cache and write itself.
 */
export interface PageOptions {
    /**
     * Filesystem location of the backing file.
     */
    path: string;

    /**
     * Logical URL of the page.
     */
    url: string;

    markup: IMarkupProcessor;

    /**
     * Render cache used by `cachedHtml()` and invalidated on save.
     * Pages without a cache render on every `cachedHtml()` call.
     */
    cache?: IRenderCache;

    /**
     * TTL for cache entries, in seconds. Zero or omitted keeps entries until invalidated.
     */
    cacheTtl?: number;

    logger: ILogger;
}

/**
 * A single wiki document backed by one file.
 *
 * The constructor never touches the filesystem: pages for existing files are
 * loaded and rendered by the wiki, while bare pages start with empty metadata
 * and body and are only written by `save()`.
 *
 * Once the wiki moves or deletes the backing file, an existing instance is
 * stale and should be discarded.
 */
export class Page implements IPage {
    readonly path: string;
    readonly url: string;

    private readonly markup: IMarkupProcessor;
    private readonly cache?: IRenderCache;
    private readonly cacheTtl?: number;
    private readonly logger: ILogger;

    private metadata: PageMetadata = new Map();
    private rendered = false;
    private output = '';

    body = '';

    constructor(options: PageOptions) {
        this.path = options.path;
        this.url = options.url;
        this.markup = options.markup;
        this.cache = options.cache;
        this.cacheTtl = options.cacheTtl;
        this.logger = options.logger;
    }

    /**
     * Snapshot of the metadata. Changes go through `setMeta()` and
     * `deleteMeta()` so every stored value can be written back.
     */
    get meta(): ReadonlyMap<string, readonly string[]> {
        return new Map(this.metadata);
    }

    get html(): string {
        return this.output;
    }

    /**
     * Read the page source and split it into metadata and body.
     *
     * @param content - Raw source to use instead of reading the backing file
     * @throws NotFoundError if the backing file does not exist
     * @throws IOError if the file cannot be read
     */
    async load(content?: string): Promise<void> {
        const raw = content ?? (await this.readSource());
        const { metadata, body } = this.markup.parse(raw);
        this.metadata = metadata;
        this.body = body;
    }

    /**
     * Process the current metadata and body, refreshing the rendered output
     * together with the normalized body and metadata.
     */
    async render(): Promise<void> {
        const { html, body, metadata } = await this.markup.process(this.serialize('\n'));
        this.output = html;
        this.body = body;
        this.metadata = metadata;
        this.rendered = true;
    }

    /**
     * Write the page to its backing file.
     *
     * Metadata keys are written in lexicographic order, followed by a blank
     * line and the body with line endings converted to the platform's. The
     * render cache entry is dropped once the file is written.
     *
     * @param update - Reload and re-render from the written file (default true)
     * @throws IOError if the directory cannot be created or the file cannot be written
     */
    async save(update = true): Promise<void> {
        const folder = path.dirname(this.path);
        try {
            await fs.mkdir(folder, { recursive: true });
        } catch (error) {
            throw toIOError(error, 'create directory', folder);
        }

        await writeFileAtomic(this.path, this.serialize(os.EOL), this.logger);
        await this.deleteCache();
        this.logger.debug({ url: this.url, path: this.path }, 'Page saved');

        if (update) {
            await this.load();
            await this.render();
        }
    }

    async deleteCache(): Promise<void> {
        if (this.cache) {
            await this.cache.del(renderCacheKey(this.url));
        }
    }

    /**
     * Rendered output, memoized in the render cache under the page URL.
     *
     * A cached entry wins over the in-memory output until `deleteCache()` runs,
     * which `save()` does after every write.
     *
     * @throws InvalidStateError if the page has not been rendered yet
     */
    async cachedHtml(): Promise<string> {
        if (!this.rendered) {
            throw new InvalidStateError(`${this.toString()} has not been rendered`);
        }
        if (!this.cache) {
            return this.output;
        }

        const key = renderCacheKey(this.url);
        const cached = await this.cache.get<string>(key);
        if (cached !== null) {
            return cached;
        }

        await this.cache.set(key, this.output, this.cacheTtl || undefined);
        return this.output;
    }

    /**
     * Read one metadata key: the value itself when the key holds exactly one
     * value, the full list otherwise.
     *
     * @throws MissingMetadataError if the key is not set
     */
    getMeta(key: string): MetadataValue {
        const values = this.metadata.get(key.toLowerCase());
        if (!values) {
            throw new MissingMetadataError(key, { url: this.url });
        }
        return values.length === 1 ? values[0] : [...values];
    }

    /**
     * Store one metadata key. The key is lower-cased and values are trimmed,
     * matching what a reload of the saved file yields.
     *
     * @throws ValidationError if the key or a value cannot be written as header lines
     */
    setMeta(key: string, value: MetadataValue): void {
        const normalized = key.toLowerCase();
        const values = (typeof value === 'string' ? [value] : [...value]).map(item => item.trim());
        assertWritableMeta(normalized, values);
        this.metadata.set(normalized, values);
    }

    /**
     * @returns true when the key was set
     */
    deleteMeta(key: string): boolean {
        return this.metadata.delete(key.toLowerCase());
    }

    get title(): string {
        return this.getText('title');
    }

    set title(value: string) {
        this.setMeta('title', value);
    }

    get tags(): string {
        return this.getText('tags');
    }

    set tags(value: string) {
        this.setMeta('tags', value);
    }

    get tagList(): string[] {
        return this.tags
            .split(',')
            .map(tag => tag.trim())
            .filter(tag => tag !== '');
    }

    toString(): string {
        return `${this.constructor.name}(${this.path})`;
    }

    private getText(key: string): string {
        const value = this.getMeta(key);
        return typeof value === 'string' ? value : value.join(', ');
    }

    private serialize(lineEnding: string): string {
        const header = [...this.metadata.keys()]
            .sort()
            .map(key => this.markup.formatMetaLines(key, this.metadata.get(key) ?? []))
            .join('');

        return `${header}\n${this.body.replace(/\r\n/g, lineEnding)}`;
    }

    private async readSource(): Promise<string> {
        try {
            const raw = await fs.readFile(this.path, 'utf-8');
            return raw.replace(/\r\n?/g, '\n');
        } catch (error) {
            if (getErrorCode(error) === 'ENOENT') {
                throw new NotFoundError(`Page "${this.url}" does not exist`, { path: this.path });
            }
            throw toIOError(error, 'read', this.path);
        }
    }
}
