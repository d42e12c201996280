/**
 * Ordered page metadata.
 *
 * Every key holds one or more string values in the order they appeared in the
 * page header. Keys are lower-case.
 */
export type PageMetadata = Map<string, string[]>;

/**
 * Value returned when reading a single metadata key: the string itself when
 * the key holds exactly one value, the full list otherwise.
 */
export type MetadataValue = string | string[];

/**
 * Result of splitting raw page source into header and body.
 */
export interface IParsedPage {
    metadata: PageMetadata;
    body: string;
}

/**
 * Result of a full processing pass over raw page source.
 */
export interface IProcessedPage extends IParsedPage {
    /**
     * Rendered output (HTML) for the body.
     */
    html: string;
}

/**
 * Pluggable markup capability.
 *
 * A processor owns everything dialect-specific about a page file: the file
 * extension, how a metadata line looks, how the header is split from the body
 * and how the body is rendered. The wiki and its pages only talk to this
 * contract and never branch on which processor is active.
 */
export interface IMarkupProcessor {
    /**
     * Registry name used to select the processor from configuration
     * (e.g. "markdown").
     */
    readonly name: string;

    /**
     * File suffix including the leading dot (e.g. ".md").
     */
    readonly extension: string;

    /**
     * Template for one metadata line, with `{key}` and `{value}` placeholders.
     */
    readonly metaLineTemplate: string;

    /**
     * Split raw page source into metadata and body without rendering.
     *
     * @param raw - Page source as stored on disk
     */
    parse(raw: string): IParsedPage;

    /**
     * Split and render raw page source in one pass.
     *
     * @param raw - Page source as stored on disk
     * @returns Promise resolving to rendered HTML plus the parsed body and metadata
     */
    process(raw: string): Promise<IProcessedPage>;

    /**
     * Serialize one metadata key and its values as header text, including the
     * trailing newline.
     *
     * @param key - Metadata key
     * @param values - Values held by the key, in order
     */
    formatMetaLines(key: string, values: readonly string[]): string;
}
