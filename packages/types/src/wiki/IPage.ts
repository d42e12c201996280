import type { MetadataValue } from './IMarkupProcessor.js';

/**
 * A single wiki document backed by one file.
 *
 * Pages move through a small pipeline: raw file text is split into metadata
 * and body by `load()`, then `render()` derives the HTML. `save()` writes the
 * current metadata and body back and, by default, runs the pipeline again from
 * the written file so all three stay consistent.
 */
export interface IPage {
    /**
     * Slash-separated logical path, unique within the wiki (e.g. "guides/setup").
     */
    readonly url: string;

    /**
     * Filesystem location of the backing file.
     */
    readonly path: string;

    /**
     * Ordered metadata parsed from the page header, as a read-only snapshot.
     */
    readonly meta: ReadonlyMap<string, readonly string[]>;

    /**
     * Raw body text in the page's markup dialect, without the header.
     */
    body: string;

    /**
     * Rendered output. Empty until `render()` has run.
     */
    readonly html: string;

    title: string;
    tags: string;

    /**
     * Parsed view of `tags`: comma separated, trimmed, empty entries dropped.
     */
    readonly tagList: string[];

    /**
     * Read the file (or the given text) and split it into metadata and body.
     *
     * @param content - Raw page source; when omitted the backing file is read
     * @throws NotFoundError if the backing file does not exist
     */
    load(content?: string): Promise<void>;

    /**
     * Render the current source, refreshing html, body and metadata.
     */
    render(): Promise<void>;

    /**
     * Write metadata and body to the backing file.
     *
     * @param update - Reload and re-render from the written file (default true)
     */
    save(update?: boolean): Promise<void>;

    /**
     * Drop the memoized rendered output for this page.
     */
    deleteCache(): Promise<void>;

    /**
     * Rendered output served through the render cache.
     */
    cachedHtml(): Promise<string>;

    /**
     * @throws MissingMetadataError if the key is absent
     */
    getMeta(key: string): MetadataValue;

    /**
     * @throws ValidationError if the key or a value cannot be written as header lines
     */
    setMeta(key: string, value: MetadataValue): void;

    deleteMeta(key: string): boolean;
}
