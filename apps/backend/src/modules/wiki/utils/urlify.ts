/**
 * Clean a user-entered page URL.
 *
 * Collapses runs of spaces and trims, lower-cases, turns spaces into
 * underscores and backslashes into slashes, collapses repeated slashes and
 * strips leading and trailing slashes.
 *
 * @example
 * urlify('  My  Page / Sub\\Page/ '); // 'my_page_/_sub/page'
 */
export function urlify(text: string): string {
    return text
        .replace(/ {2,}/g, ' ')
        .trim()
        .toLowerCase()
        .replace(/ /g, '_')
        .replace(/\\/g, '/')
        .replace(/\/{2,}/g, '/')
        .replace(/^\/+|\/+$/g, '');
}
