import type { IPage } from './IPage.js';
import type { IProcessedPage } from './IMarkupProcessor.js';

/**
 * Page attributes that can be used for grouping and searching.
 */
export type PageAttribute = 'url' | 'title' | 'tags' | 'body';

/**
 * Repository over a directory of page files.
 *
 * The directory tree is the only source of truth: listing, tag and search
 * operations walk it on every call and keep no index between calls.
 */
export interface IWiki<TPage extends IPage = IPage> {
    /**
     * Base directory of the content tree.
     */
    readonly root: string;

    path(url: string): string;
    exists(url: string): Promise<boolean>;
    get(url: string): Promise<TPage | null>;

    /**
     * @throws NotFoundError when no page exists at `url`
     */
    getOr404(url: string): Promise<TPage>;

    /**
     * Create an unsaved page, or return `false` when one already exists at `url`.
     */
    getBare(url: string): Promise<TPage | false>;

    move(url: string, newUrl: string): Promise<void>;
    delete(url: string): Promise<boolean>;

    index(): Promise<TPage[]>;
    index(attr: PageAttribute): Promise<Map<string, TPage>>;

    getByTitle(title: string): Promise<TPage | null>;
    getTags(): Promise<Map<string, TPage[]>>;
    indexByTag(tag: string): Promise<TPage[]>;
    search(term: string, attrs?: readonly PageAttribute[]): Promise<TPage[]>;

    /**
     * Process unsaved page source with the active markup processor.
     */
    preview(text: string): Promise<IProcessedPage>;
}
