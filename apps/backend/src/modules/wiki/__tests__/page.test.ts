/// <reference types="vitest" />

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Page } from '../models/Page.js';
import { MarkdownProcessor } from '../markup/markdown.processor.js';
import {
    InvalidStateError,
    MissingMetadataError,
    NotFoundError,
    ValidationError
} from '../../../lib/errors.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';
import { MockRenderCache } from '../../../tests/vitest/mocks/render-cache.js';
import {
    contentFileExists,
    createContentRoot,
    readContentFile,
    removeContentRoot,
    writeContentFile
} from '../../../tests/vitest/helpers/content-tree.js';

describe('Page', () => {
    let root: string;
    let cache: MockRenderCache;
    let logger: ReturnType<typeof createMockLogger>;

    const markup = new MarkdownProcessor();

    function createPage(url: string, relativePath = `${url}.md`): Page {
        return new Page({
            path: path.join(root, ...relativePath.split('/')),
            url,
            markup,
            cache,
            logger
        });
    }

    beforeEach(async () => {
        root = await createContentRoot();
        cache = new MockRenderCache();
        logger = createMockLogger();
    });

    afterEach(async () => {
        await removeContentRoot(root);
    });

    // ============================================================================
    // Construction and Loading Tests
    // ============================================================================

    describe('construction', () => {
        it('should start with empty metadata, body and output without touching the filesystem', async () => {
            const page = createPage('fresh');

            expect(page.meta.size).toBe(0);
            expect(page.body).toBe('');
            expect(page.html).toBe('');
            expect(await contentFileExists(root, 'fresh.md')).toBe(false);
        });

        it('should identify itself by type and path', () => {
            const page = createPage('home');

            expect(page.toString()).toBe(`Page(${path.join(root, 'home.md')})`);
        });
    });

    describe('load', () => {
        it('should read and split the backing file', async () => {
            await writeContentFile(root, 'home.md', 'title: Home\ntags: intro, start\n\nHello *world*.');
            const page = createPage('home');

            await page.load();

            expect(page.title).toBe('Home');
            expect(page.tags).toBe('intro, start');
            expect(page.body).toBe('Hello *world*.');
            expect(page.html).toBe('');
        });

        it('should parse given content instead of reading the file', async () => {
            const page = createPage('virtual');

            await page.load('title: Virtual\n\nIn memory');

            expect(page.title).toBe('Virtual');
            expect(page.body).toBe('In memory');
        });

        it('should read files with CRLF line endings', async () => {
            await writeContentFile(root, 'dos.md', 'title: Dos\r\n\r\nline1\r\nline2');
            const page = createPage('dos');

            await page.load();

            expect(page.title).toBe('Dos');
            expect(page.body).toBe('line1\nline2');
        });

        it('should throw NotFoundError when the backing file is missing', async () => {
            const page = createPage('missing');

            await expect(page.load()).rejects.toBeInstanceOf(NotFoundError);
        });
    });

    describe('render', () => {
        it('should render the loaded body', async () => {
            const page = createPage('home');
            await page.load('title: Home\n\nHello *world*.');

            await page.render();

            expect(page.html).toContain('<em>world</em>');
            expect(page.body).toBe('Hello *world*.');
            expect(page.title).toBe('Home');
        });

        it('should render changes made through the setters', async () => {
            const page = createPage('draft');
            page.title = 'Draft';
            page.body = 'Some **bold** words';

            await page.render();

            expect(page.html).toContain('<strong>bold</strong>');
            expect(page.title).toBe('Draft');
        });
    });

    // ============================================================================
    // Metadata Access Tests
    // ============================================================================

    describe('metadata', () => {
        it('should return a single value as a string', async () => {
            const page = createPage('home');
            await page.load('title: Home\n\nbody');

            expect(page.getMeta('title')).toBe('Home');
        });

        it('should return several values as a list', async () => {
            const page = createPage('team');
            await page.load('authors: Ann\n    Bo\n\nbody');

            expect(page.getMeta('authors')).toEqual(['Ann', 'Bo']);
        });

        it('should throw MissingMetadataError for an absent key', () => {
            const page = createPage('bare');

            expect(() => page.getMeta('title')).toThrow(MissingMetadataError);
            expect(() => page.title).toThrow('Metadata key "title" is not set');
            expect(() => page.tags).toThrow(MissingMetadataError);
        });

        it('should store keys in lower case', () => {
            const page = createPage('bare');

            page.setMeta('Title', 'Mixed');

            expect([...page.meta.keys()]).toEqual(['title']);
            expect(page.title).toBe('Mixed');
        });

        it('should reject keys that cannot be written as a header line', () => {
            const page = createPage('bare');

            expect(() => page.setMeta('two words', 'x')).toThrow(ValidationError);
            expect(() => page.setMeta('colon:key', 'x')).toThrow(ValidationError);
        });

        it('should join multi-valued title and tags', () => {
            const page = createPage('bare');

            page.setMeta('title', ['Part one', 'Part two']);

            expect(page.title).toBe('Part one, Part two');
        });

        it('should expose the parsed tag list', () => {
            const page = createPage('bare');

            page.tags = 'a, ,b ,';

            expect(page.tags).toBe('a, ,b ,');
            expect(page.tagList).toEqual(['a', 'b']);
        });

        it('should trim values so they match what a reload reads back', () => {
            const page = createPage('bare');

            page.tags = ' a, b ';
            page.setMeta('authors', ['  Ann', 'Bo  ']);

            expect(page.tags).toBe('a, b');
            expect(page.getMeta('authors')).toEqual(['Ann', 'Bo']);
        });

        it('should reject values spanning several lines', () => {
            const page = createPage('bare');

            expect(() => {
                page.title = 'Line one\nLine two';
            }).toThrow(ValidationError);
            expect(() => page.setMeta('authors', ['Ann', 'Bo\r\nCy'])).toThrow('Metadata value for "authors" must be a single line');
            expect(page.meta.size).toBe(0);
        });

        it('should reject empty continuation values', () => {
            const page = createPage('bare');

            expect(() => page.setMeta('authors', ['Ann', ''])).toThrow(ValidationError);
            expect(() => page.setMeta('authors', ['Ann', '   '])).toThrow(
                'Metadata key "authors" has an empty continuation value'
            );
            expect(page.meta.has('authors')).toBe(false);
        });

        it('should reject a key without values', () => {
            const page = createPage('bare');

            expect(() => page.setMeta('authors', [])).toThrow('Metadata key "authors" needs at least one value');
        });

        it('should accept an empty single value', () => {
            const page = createPage('bare');

            page.tags = '';

            expect(page.getMeta('tags')).toBe('');
        });

        it('should return a snapshot that does not change the page', () => {
            const page = createPage('bare');
            page.title = 'Home';

            const snapshot = new Map(page.meta);
            snapshot.set('Two Words', ['x']);
            snapshot.delete('title');

            expect([...page.meta.keys()]).toEqual(['title']);
            expect(page.title).toBe('Home');
        });

        it('should delete keys case-insensitively', () => {
            const page = createPage('bare');
            page.title = 'Home';

            expect(page.deleteMeta('Title')).toBe(true);
            expect(page.deleteMeta('title')).toBe(false);
            expect(page.meta.size).toBe(0);
        });
    });

    // ============================================================================
    // Persistence Tests
    // ============================================================================

    describe('save', () => {
        it('should write sorted metadata lines, a blank line and the body', async () => {
            const page = createPage('home');
            page.title = 'Home';
            page.tags = 'intro, start';
            page.body = 'Hello *world*.';

            await page.save();

            expect(await readContentFile(root, 'home.md')).toBe('tags: intro, start\ntitle: Home\n\nHello *world*.');
        });

        it('should create missing parent directories', async () => {
            const page = createPage('guides/install/linux');
            page.title = 'Linux';
            page.body = 'Steps';

            await page.save();

            expect(await readContentFile(root, 'guides/install/linux.md')).toBe('title: Linux\n\nSteps');
        });

        it('should convert body line endings to the platform convention', async () => {
            const page = createPage('dos');
            page.title = 'Dos';
            page.body = 'one\r\ntwo';

            await page.save(false);

            expect(await readContentFile(root, 'dos.md')).toBe(`title: Dos\n\none${os.EOL}two`);
        });

        it('should overwrite the previous content completely', async () => {
            await writeContentFile(root, 'home.md', 'title: Old\nobsolete: yes\n\nOld body that is longer');
            const page = createPage('home');
            await page.load();
            page.deleteMeta('obsolete');
            page.title = 'New';
            page.body = 'New';

            await page.save();

            expect(await readContentFile(root, 'home.md')).toBe('title: New\n\nNew');
        });

        it('should reload and re-render by default', async () => {
            const page = createPage('home');
            page.title = 'Home';
            page.body = 'Hello *world*.';

            await page.save();

            expect(page.html).toContain('<em>world</em>');
        });

        it('should skip the reload when update is false', async () => {
            const page = createPage('home');
            page.title = 'Home';
            page.body = 'Hello *world*.';

            await page.save(false);

            expect(page.html).toBe('');
        });

        it('should round-trip metadata and body through the file', async () => {
            const page = createPage('team');
            page.setMeta('title', 'Team');
            page.setMeta('authors', ['Ann', 'Bo']);
            page.setMeta('tags', 'people, org');
            page.body = 'First line\n\nSecond paragraph';

            await page.save();

            const reloaded = createPage('team');
            await reloaded.load();
            await reloaded.render();

            expect(Object.fromEntries(reloaded.meta)).toEqual({
                authors: ['Ann', 'Bo'],
                tags: ['people, org'],
                title: ['Team']
            });
            expect(reloaded.body).toBe('First line\n\nSecond paragraph');
            expect(reloaded.html).toBe(page.html);
        });

        it('should keep every key after a multi-valued key', async () => {
            const page = createPage('team');
            page.setMeta('authors', ['Ann', 'Bo']);
            page.title = 'Team';
            page.tags = ' people ';
            page.body = 'Body';

            await page.save();

            expect(await readContentFile(root, 'team.md')).toBe('authors: Ann\n    Bo\ntags: people\ntitle: Team\n\nBody');
            expect(Object.fromEntries(page.meta)).toEqual({
                authors: ['Ann', 'Bo'],
                tags: ['people'],
                title: ['Team']
            });
            expect(page.body).toBe('Body');
        });

        it('should round-trip a page without metadata', async () => {
            const page = createPage('plain');
            page.body = 'looks: like a header';

            await page.save();

            expect(page.meta.size).toBe(0);
            expect(page.body).toBe('looks: like a header');
        });

        it('should not leave temporary files behind', async () => {
            const page = createPage('home');
            page.title = 'Home';

            await page.save();

            expect(await fs.readdir(root)).toEqual(['home.md']);
        });
    });

    // ============================================================================
    // Render Cache Tests
    // ============================================================================

    describe('render cache', () => {
        it('should store rendered output under the page URL', async () => {
            const page = createPage('home');
            await page.load('title: Home\n\nHello');
            await page.render();

            const html = await page.cachedHtml();

            expect(html).toBe(page.html);
            expect(cache.entries.get('page:html:home')?.value).toBe(page.html);
        });

        it('should serve the cached entry until it is deleted', async () => {
            const page = createPage('home');
            await page.load('title: Home\n\nHello');
            await page.render();
            await cache.set('page:html:home', '<p>cached</p>');

            expect(await page.cachedHtml()).toBe('<p>cached</p>');

            await page.deleteCache();

            expect(await page.cachedHtml()).toBe(page.html);
        });

        it('should invalidate the cached entry on save', async () => {
            await cache.set('page:html:home', '<p>stale</p>');
            const page = createPage('home');
            page.title = 'Home';
            page.body = 'Fresh';

            await page.save();

            expect(cache.entries.has('page:html:home')).toBe(false);
            expect(await page.cachedHtml()).toContain('Fresh');
        });

        it('should pass the configured TTL to the cache', async () => {
            const page = new Page({
                path: path.join(root, 'home.md'),
                url: 'home',
                markup,
                cache,
                cacheTtl: 120,
                logger
            });
            await page.load('title: Home\n\nHello');
            await page.render();

            await page.cachedHtml();

            expect(cache.entries.get('page:html:home')?.ttl).toBe(120);
        });

        it('should render without a cache', async () => {
            const page = new Page({ path: path.join(root, 'home.md'), url: 'home', markup, logger });
            await page.load('title: Home\n\nHello');
            await page.render();

            expect(await page.cachedHtml()).toBe(page.html);
            await expect(page.deleteCache()).resolves.toBeUndefined();
        });

        it('should refuse to cache a page that has not been rendered', async () => {
            const page = createPage('home');

            await expect(page.cachedHtml()).rejects.toBeInstanceOf(InvalidStateError);
        });
    });
});
