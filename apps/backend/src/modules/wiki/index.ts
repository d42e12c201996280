/**
 * Wiki content engine.
 *
 * Pages are plain text files under a content root: a `key: value` metadata
 * header, a blank line, then the body in the active markup dialect. The wiki
 * resolves URLs to pages, walks the tree for listings, tags and search, and
 * keeps rendered output in a render cache that saves, moves and deletes
 * invalidate.
 */

export { Page, type PageOptions } from './models/Page.js';
export {
    WikiService,
    DEFAULT_SEARCH_ATTRIBUTES,
    HOME_URL,
    type WikiOptions
} from './services/wiki.service.js';
export { MarkupProcessor } from './markup/markup-processor.js';
export { MarkdownProcessor } from './markup/markdown.processor.js';
export { TextProcessor } from './markup/text.processor.js';
export { MARKUP_PROCESSORS, createMarkupProcessor } from './markup/markup.registry.js';
export { urlify } from './utils/urlify.js';
