import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import type {
    ILogger,
    IMarkupProcessor,
    IProcessedPage,
    IRenderCache,
    IWiki,
    PageAttribute
} from '@leafwiki/types';
import {
    InvalidPatternError,
    IOError,
    MissingMetadataError,
    NotFoundError,
    ValidationError,
    describeError,
    getErrorCode
} from '../../../lib/errors.js';
import { renderCacheKey } from '../../../services/render-cache/index.js';
import { Page } from '../models/Page.js';
import { pathExists, toIOError } from '../utils/fs.js';

/**
 * Attributes searched when `search()` is called without an explicit list.
 */
export const DEFAULT_SEARCH_ATTRIBUTES: readonly PageAttribute[] = ['title', 'tags', 'body'];

/**
 * URL of the wiki's landing page.
 */
export const HOME_URL = 'home';

export interface WikiOptions {
    /**
     * Base directory of the content tree.
     */
    root: string;

    markup: IMarkupProcessor;

    /**
     * Render cache shared by every page the wiki creates.
     */
    cache?: IRenderCache;

    /**
     * TTL for render cache entries, in seconds.
     */
    cacheTtl?: number;

    logger: ILogger;
}

/**
 * Repository over a directory of page files.
 *
 * Resolves URLs to pages, creates, moves and deletes page files, and answers
 * listing, tag and search queries. The directory tree is the source of truth:
 * every listing walks it again and nothing is indexed between calls, which is
 * fine for wikis of thousands of pages.
 *
 * The walk visits directory entries in name order, so listings are stable
 * across runs and platforms.
 */
export class WikiService implements IWiki<Page> {
    readonly root: string;
    readonly markup: IMarkupProcessor;

    private readonly cache?: IRenderCache;
    private readonly cacheTtl?: number;
    private readonly logger: ILogger;

    constructor(options: WikiOptions) {
        this.root = options.root;
        this.markup = options.markup;
        this.cache = options.cache;
        this.cacheTtl = options.cacheTtl;
        this.logger = options.logger.child({ module: 'wiki' });
    }

    /**
     * Map a URL to its backing file: `root/url + extension`.
     *
     * @throws ValidationError if the URL is empty, absolute, contains
     *         backslashes, or has empty, "." or ".." segments
     */
    path(url: string): string {
        const segments = url.split('/');
        const invalid =
            url.includes('\\') ||
            segments.some(segment => segment === '' || segment === '.' || segment === '..');

        if (invalid) {
            throw new ValidationError(`Invalid page URL "${url}"`);
        }

        return path.join(this.root, ...segments) + this.markup.extension;
    }

    async exists(url: string): Promise<boolean> {
        return await pathExists(this.path(url));
    }

    /**
     * Load and render the page at `url`.
     *
     * @returns The page, or null when no file exists for the URL
     */
    async get(url: string): Promise<Page | null> {
        if (!(await this.exists(url))) {
            return null;
        }
        return await this.open(this.path(url), url);
    }

    /**
     * @throws NotFoundError when no page exists at `url`
     */
    async getOr404(url: string): Promise<Page> {
        const page = await this.get(url);
        if (!page) {
            throw new NotFoundError(`Page "${url}" does not exist`, { url });
        }
        return page;
    }

    /**
     * Create an unsaved page for a new URL.
     *
     * @returns A page with empty metadata and body, or `false` when a page
     *          already exists at `url` and must not be overwritten
     */
    async getBare(url: string): Promise<Page | false> {
        if (await this.exists(url)) {
            return false;
        }
        return this.createPage(this.path(url), url);
    }

    /**
     * Rename the backing file of `url` to `newUrl`.
     *
     * Page instances already loaded for `url` are not updated.
     *
     * @throws IOError if the source is missing, the destination exists, or the rename fails
     */
    async move(url: string, newUrl: string): Promise<void> {
        const source = this.path(url);
        const destination = this.path(newUrl);

        if (!(await pathExists(source))) {
            throw new IOError(`Cannot move "${url}": page does not exist`, { path: source, errno: 'ENOENT' });
        }
        if (await pathExists(destination)) {
            throw new IOError(`Cannot move "${url}" to "${newUrl}": destination exists`, {
                path: destination,
                errno: 'EEXIST'
            });
        }

        try {
            await fs.mkdir(path.dirname(destination), { recursive: true });
            await fs.rename(source, destination);
        } catch (error) {
            throw toIOError(error, 'move', source);
        }

        await this.invalidate(url);
        this.logger.debug({ url, newUrl }, 'Page moved');
    }

    /**
     * Remove the backing file of `url`.
     *
     * @returns false when no page exists at `url`, true once the file is removed
     * @throws IOError if the file exists but cannot be removed
     */
    async delete(url: string): Promise<boolean> {
        const target = this.path(url);

        try {
            await fs.unlink(target);
        } catch (error) {
            if (getErrorCode(error) === 'ENOENT') {
                return false;
            }
            throw toIOError(error, 'delete', target);
        }

        await this.invalidate(url);
        this.logger.debug({ url }, 'Page deleted');
        return true;
    }

    /**
     * List every page under the root.
     *
     * Without an attribute, pages are sorted by case-insensitive title with
     * ties broken by URL. With an attribute, pages are keyed by that
     * attribute's value in walk order; a later page with the same value
     * replaces the earlier one.
     */
    async index(): Promise<Page[]>;
    async index(attr: PageAttribute): Promise<Map<string, Page>>;
    async index(attr?: PageAttribute): Promise<Page[] | Map<string, Page>> {
        const pages = await this.walk();

        if (attr) {
            const grouped = new Map<string, Page>();
            for (const page of pages) {
                grouped.set(attributeOf(page, attr), page);
            }
            return grouped;
        }

        return sortByTitle(pages);
    }

    async getByTitle(title: string): Promise<Page | null> {
        const pages = await this.index('title');
        return pages.get(title) ?? null;
    }

    /**
     * Group pages by tag, in order of first appearance over `index()`.
     *
     * Each page's tag string is split on commas and de-duplicated before the
     * segments are trimmed, so "a, b, a" lists the page under "a" twice (the
     * raw segments "a" and " a" differ).
     */
    async getTags(): Promise<Map<string, Page[]>> {
        const pages = await this.index();
        const tags = new Map<string, Page[]>();

        for (const page of pages) {
            for (const segment of new Set(attributeOf(page, 'tags').split(','))) {
                const tag = segment.trim();
                if (tag === '') {
                    continue;
                }
                const tagged = tags.get(tag);
                if (tagged) {
                    tagged.push(page);
                } else {
                    tags.set(tag, [page]);
                }
            }
        }

        return tags;
    }

    /**
     * Pages whose raw tag string contains `tag` as a substring, sorted by title.
     */
    async indexByTag(tag: string): Promise<Page[]> {
        const pages = await this.index();
        return sortByTitle(pages.filter(page => attributeOf(page, 'tags').includes(tag)));
    }

    /**
     * Pages where at least one of `attrs` matches `term` as a regular expression.
     *
     * Each page appears once. Results keep walk order rather than title order.
     *
     * @throws InvalidPatternError if `term` is not a valid regular expression
     */
    async search(term: string, attrs: readonly PageAttribute[] = DEFAULT_SEARCH_ATTRIBUTES): Promise<Page[]> {
        let pattern: RegExp;
        try {
            pattern = new RegExp(term);
        } catch (error) {
            throw new InvalidPatternError(term, { reason: describeError(error) });
        }

        const pages = await this.walk();
        return pages.filter(page => attrs.some(attr => pattern.test(attributeOf(page, attr))));
    }

    async preview(text: string): Promise<IProcessedPage> {
        return await this.markup.process(text);
    }

    private createPage(filePath: string, url: string): Page {
        return new Page({
            path: filePath,
            url,
            markup: this.markup,
            cache: this.cache,
            cacheTtl: this.cacheTtl,
            logger: this.logger
        });
    }

    private async open(filePath: string, url: string): Promise<Page> {
        const page = this.createPage(filePath, url);
        await page.load();
        await page.render();
        return page;
    }

    private async invalidate(url: string): Promise<void> {
        if (this.cache) {
            await this.cache.del(renderCacheKey(url));
        }
    }

    /**
     * Load every page under the root, depth first, entries in name order.
     *
     * Symbolic links are followed, so every URL `exists()` accepts is listed.
     * A linked directory that leads back to one of its own ancestors is
     * skipped; dangling links are ignored.
     */
    private async walk(): Promise<Page[]> {
        const pages: Page[] = [];
        const extension = this.markup.extension;

        const visit = async (directory: string, prefix: string[], ancestors: ReadonlySet<string>): Promise<void> => {
            const entries = await fs.readdir(directory, { withFileTypes: true }).catch((error: unknown) => {
                throw toIOError(error, 'list', directory);
            });

            entries.sort((a, b) => compareText(a.name, b.name));

            for (const entry of entries) {
                const fullPath = path.join(directory, entry.name);
                const kind = entry.isSymbolicLink() ? await linkTargetKind(fullPath) : direntKind(entry);

                if (kind === 'directory') {
                    const real = await realPath(fullPath);
                    if (ancestors.has(real)) {
                        this.logger.trace({ path: fullPath }, 'Skipping directory link cycle');
                        continue;
                    }
                    await visit(fullPath, [...prefix, entry.name], new Set([...ancestors, real]));
                } else if (kind === 'file' && entry.name.endsWith(extension)) {
                    const url = [...prefix, entry.name.slice(0, -extension.length)].join('/');
                    pages.push(await this.open(fullPath, url));
                }
            }
        };

        await visit(this.root, [], new Set([await realPath(this.root)]));
        this.logger.trace({ root: this.root, pages: pages.length }, 'Content tree walked');
        return pages;
    }
}

type EntryKind = 'file' | 'directory' | 'other';

function direntKind(entry: Dirent): EntryKind {
    if (entry.isDirectory()) {
        return 'directory';
    }
    return entry.isFile() ? 'file' : 'other';
}

async function linkTargetKind(linkPath: string): Promise<EntryKind> {
    try {
        const stats = await fs.stat(linkPath);
        if (stats.isDirectory()) {
            return 'directory';
        }
        return stats.isFile() ? 'file' : 'other';
    } catch (error) {
        if (getErrorCode(error) === 'ENOENT') {
            return 'other';
        }
        throw toIOError(error, 'stat', linkPath);
    }
}

async function realPath(target: string): Promise<string> {
    try {
        return await fs.realpath(target);
    } catch (error) {
        throw toIOError(error, 'resolve', target);
    }
}

function compareText(a: string, b: string): number {
    if (a < b) {
        return -1;
    }
    return a > b ? 1 : 0;
}

/**
 * Attribute value used by listings. Pages without a title or tags count as
 * having an empty one, so a single incomplete page cannot fail a listing.
 */
function attributeOf(page: Page, attr: PageAttribute): string {
    switch (attr) {
        case 'url':
            return page.url;
        case 'body':
            return page.body;
        case 'title':
        case 'tags':
            try {
                return page[attr];
            } catch (error) {
                if (error instanceof MissingMetadataError) {
                    return '';
                }
                throw error;
            }
    }
}

function sortByTitle(pages: Page[]): Page[] {
    return [...pages].sort(
        (a, b) =>
            compareText(attributeOf(a, 'title').toLowerCase(), attributeOf(b, 'title').toLowerCase()) ||
            compareText(a.url, b.url)
    );
}
