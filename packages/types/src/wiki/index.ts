/**
 * Wiki content model type definitions.
 *
 * - Markup processors that split, render and serialize page files
 * - Pages with metadata, body and rendered output
 * - The wiki repository that resolves URLs, lists, tags and searches pages
 */

export type {
    IMarkupProcessor,
    IParsedPage,
    IProcessedPage,
    MetadataValue,
    PageMetadata
} from './IMarkupProcessor.js';
export type { IPage } from './IPage.js';
export type { IWiki, PageAttribute } from './IWiki.js';
