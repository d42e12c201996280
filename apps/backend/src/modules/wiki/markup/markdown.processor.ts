import { remark } from 'remark';
import remarkGfm from 'remark-gfm';
import remarkHtml from 'remark-html';
import { rehype } from 'rehype';
import rehypeSanitize from 'rehype-sanitize';
import rehypeStringify from 'rehype-stringify';
import { describeError } from '../../../lib/errors.js';
import { MarkupProcessor } from './markup-processor.js';

/**
 * Markdown pages (`.md`).
 *
 * The remark/rehype pipeline:
 * 1. Parse markdown with GitHub Flavored Markdown support
 * 2. Convert to HTML
 * 3. Sanitize HTML to prevent XSS attacks
 * 4. Stringify to final HTML output
 */
export class MarkdownProcessor extends MarkupProcessor {
    readonly name = 'markdown';
    readonly extension = '.md';

    /**
     * Render markdown body to sanitized HTML.
     *
     * @param markdown - Markdown content to render (without the metadata header)
     * @returns Promise resolving to sanitized HTML string
     *
     * @throws Error if markdown processing fails
     *
     * @example
     * const html = await processor.renderBody("# Hello\n\nThis is **bold** text.");
     * // Contains: "<h1>Hello</h1>" and "<p>This is <strong>bold</strong> text.</p>"
     */
    protected async renderBody(markdown: string): Promise<string> {
        try {
            const htmlResult = await remark()
                .use(remarkGfm)
                .use(remarkHtml, { sanitize: false }) // sanitized below
                .process(markdown);

            const sanitizedResult = await rehype()
                .data('settings', { fragment: true })
                .use(rehypeSanitize)
                .use(rehypeStringify)
                .process(String(htmlResult));

            return String(sanitizedResult);
        } catch (error) {
            throw new Error(`Failed to render markdown: ${describeError(error)}`);
        }
    }
}
