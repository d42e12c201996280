import type { Root } from 'hast';
import { rehype } from 'rehype';
import { MarkupProcessor } from './markup-processor.js';

/**
 * Plain text pages (`.txt`), rendered verbatim inside a single `<pre>` block.
 *
 * The body is placed in a text node and serialized by rehype, which escapes
 * markup characters.
 */
export class TextProcessor extends MarkupProcessor {
    readonly name = 'text';
    readonly extension = '.txt';

    protected async renderBody(body: string): Promise<string> {
        const tree: Root = {
            type: 'root',
            children: [
                {
                    type: 'element',
                    tagName: 'pre',
                    properties: {},
                    children: [{ type: 'text', value: body }]
                }
            ]
        };

        return String(rehype().stringify(tree));
    }
}
