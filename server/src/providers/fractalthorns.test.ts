import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CacheRegistry } from '../cache/registry.js';
import {
    APIError,
    ChapterNotFoundError,
    ImageNotFoundError,
    InvalidArgumentError,
    InvalidSearchTypeError,
    ItemsUngatheredError,
    PurgeCooldownError,
    RecordNotFoundError,
    SubmissionRejectedError,
} from '../errors.js';
import {
    createTestClient,
    episodicPayload,
    HOUR,
    imagePayload,
    jsonResponse,
    recordPayload,
    recordTextPayload,
} from '../test-support.js';
import { romanToInt } from './fractalthorns.js';

const T0 = new Date('2025-03-01T12:00:00Z').getTime();

async function caught(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (err) {
        return err;
    }
    throw new Error('expected a rejection');
}

describe('FractalthornsClient', () => {
    beforeEach(() => {
        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(T0);
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    describe('images', () => {
        it('serves a repeated image request from the cache', async () => {
            const { client, api } = createTestClient({ single_image: () => imagePayload('vertigo') });

            const first = await client.getSingleImage('vertigo');
            const second = await client.getSingleImage('vertigo');

            expect(first.name).toBe('vertigo');
            expect(second).toBe(first);
            expect(api.count('single_image')).toBe(1);
            expect(api.calls[0].params).toEqual({ name: 'vertigo' });
        });

        it('fetches again once the entry expired', async () => {
            const { client, api } = createTestClient({ single_image: () => imagePayload('vertigo') });

            await client.getSingleImage('vertigo');
            vi.setSystemTime(T0 + 12 * HOUR);
            await client.getSingleImage('vertigo');

            expect(api.count('single_image')).toBe(2);
        });

        it('surfaces upstream failures instead of stale data', async () => {
            let failing = false;
            const { client } = createTestClient({
                single_image: () => (failing ? new Response('down', { status: 500 }) : imagePayload('vertigo')),
            });

            await client.getSingleImage('vertigo');
            failing = true;
            vi.setSystemTime(T0 + 12 * HOUR);

            expect(await caught(client.getSingleImage('vertigo'))).toBeInstanceOf(APIError);
        });

        it('maps a 404 to ImageNotFoundError', async () => {
            const { client } = createTestClient({});
            const error = await caught(client.getSingleImage('nowhere'));

            expect(error).toBeInstanceOf(ImageNotFoundError);
            if (!(error instanceof ImageNotFoundError)) return;
            expect(error.message).toBe('image not found: nowhere');
        });

        it('resolves (latest) to the highest ordinal from the listing', async () => {
            const { client, api } = createTestClient({
                all_images: () => ({
                    images: [imagePayload('a', { ordinal: 1 }), imagePayload('c', { ordinal: 3 }), imagePayload('b', { ordinal: 2 })],
                }),
            });

            const latest = await client.getSingleImage();
            expect(latest.name).toBe('c');

            await client.getSingleImage('b');
            expect(api.count('single_image')).toBe(0);
            expect(api.count('all_images')).toBe(1);
        });

        it('evicts images and descriptions that left the listing', async () => {
            let listing = ['a', 'b'];
            const { client, cache } = createTestClient({
                all_images: () => ({ images: listing.map((name) => imagePayload(name)) }),
                image_description: () => ({ description: 'words', annotations: null }),
            });

            await client.getAllImages();
            await client.getImageDescription('a');
            await client.getImageDescription('b');
            expect(cache.store('image-descriptions').keys()).toEqual(['a', 'b']);

            listing = ['a'];
            cache.store('image-list').purge(undefined, { force: true });
            await client.getAllImages();

            expect(cache.store('images').keys()).toEqual(['a']);
            expect(cache.store('image-descriptions').keys()).toEqual(['a']);
        });

        it('blocks purging the listing right after a full fetch', async () => {
            const { client, cache } = createTestClient({ all_images: () => ({ images: [] }) });
            await client.getAllImages();

            const error = (() => {
                try {
                    cache.store('images').purge();
                } catch (err) {
                    return err;
                }
                return null;
            })();
            expect(error).toBeInstanceOf(PurgeCooldownError);
            if (!(error instanceof PurgeCooldownError)) return;
            expect(error.reason).toBe('Too soon after a request for all images');
        });

        it('answers for images without a description without asking upstream', async () => {
            const { client, api } = createTestClient({
                single_image: () => imagePayload('sketchy', { has_description: false }),
            });

            const description = await client.getImageDescription('sketchy');

            expect(description).toEqual({
                name: 'sketchy',
                title: 'sketchy title',
                description: null,
                annotations: null,
                imageLink: 'https://fractalthorns.test/image/sketchy',
            });
            expect(api.count('image_description')).toBe(0);
        });

        it('requires gathered descriptions unless asked to gather', async () => {
            const { client, api } = createTestClient({
                all_images: () => ({ images: [imagePayload('a'), imagePayload('b', { has_description: false })] }),
                image_description: () => ({ description: 'words', annotations: [{ time: 3, text: 'outline' }] }),
            });

            const error = await caught(client.getFullImageDescriptions());
            expect(error).toBeInstanceOf(ItemsUngatheredError);
            if (!(error instanceof ItemsUngatheredError)) return;
            expect(error.missing).toBe(2);

            const gathered = await client.getFullImageDescriptions({ gather: true });
            expect([...gathered.keys()]).toEqual(['a', 'b']);
            expect(gathered.get('a')?.annotations).toEqual([{ time: 3, text: 'outline' }]);
            expect(api.count('image_description')).toBe(1);

            expect((await client.getFullImageDescriptions()).size).toBe(2);
        });
    });

    describe('episodic', () => {
        const chapters = episodicPayload([
            { name: 'i', records: [recordPayload('dawn', { chapter: 'i' })] },
            { name: 'iv', records: [recordPayload('dusk', { chapter: 'iv' }), recordPayload('locked', { chapter: 'iv', solved: false })] },
            { name: 'ii', records: [recordPayload('noon', { chapter: 'ii' })] },
        ]);

        it('resolves (latest) to the highest roman numeral', async () => {
            const { client, api } = createTestClient({ full_episodic: () => chapters });

            const latest = await client.getChapter();
            expect(latest.name).toBe('iv');
            expect(latest.records.map((r) => r.name)).toEqual(['dusk', 'locked']);

            expect((await client.getChapter('II')).name).toBe('ii');
            expect(api.count('full_episodic')).toBe(1);
            expect(await caught(client.getChapter('ix'))).toBeInstanceOf(ChapterNotFoundError);
        });

        it('refuses the text of an unsolved record without asking upstream', async () => {
            const { client, api } = createTestClient({
                full_episodic: () => chapters,
                record_text: () => recordTextPayload([{ character: 'aetol', text: 'hello' }]),
            });
            await client.getFullEpisodic();

            const error = await caught(client.getRecordText('locked'));
            expect(error).toBeInstanceOf(RecordNotFoundError);
            if (!(error instanceof RecordNotFoundError)) return;
            expect(error.message).toBe('record not found: locked (not solved yet)');
            expect(api.count('record_text')).toBe(0);
            expect(api.count('single_record')).toBe(0);
        });

        it('gathers texts of solved records and blocks purging them', async () => {
            const { client, cache, api } = createTestClient({
                full_episodic: () => chapters,
                record_text: () => recordTextPayload([{ character: 'aetol', text: 'hello' }]),
            });

            const error = await caught(client.getFullRecordContents());
            expect(error).toBeInstanceOf(ItemsUngatheredError);
            if (!(error instanceof ItemsUngatheredError)) return;
            expect(error.missing).toBe(3);

            const texts = await client.getFullRecordContents({ gather: true });
            expect([...texts.keys()]).toEqual(['dawn', 'dusk', 'noon']);
            expect(texts.get('dusk')?.title).toBe('dusk title');
            expect(api.count('record_text')).toBe(3);

            expect(() => cache.store('record-texts').purge()).toThrow('Too soon after a request for all record contents');
        });

        it('drops texts of records that are no longer solved', async () => {
            let solved = true;
            const { client, cache } = createTestClient({
                full_episodic: () => episodicPayload([{ name: 'i', records: [recordPayload('dawn', { solved })] }]),
                record_text: () => recordTextPayload([{ character: 'aetol', text: 'hello' }]),
            });

            await client.getFullEpisodic();
            await client.getRecordText('dawn');
            expect(cache.store('record-texts').keys()).toEqual(['dawn']);

            solved = false;
            cache.store('chapters').purge(undefined, { force: true });
            await client.getFullEpisodic();
            expect(cache.store('record-texts').keys()).toEqual([]);
            expect(cache.store('records').get('dawn')?.solved).toBe(false);
        });

        it('evicts records that left the chapter index', async () => {
            let listing = ['dawn', 'dusk'];
            const { client, cache } = createTestClient({
                full_episodic: () => episodicPayload([{ name: 'i', records: listing.map((name) => recordPayload(name)) }]),
            });

            await client.getFullEpisodic();
            expect(cache.store('records').keys()).toEqual(['dawn', 'dusk']);

            listing = ['dawn'];
            cache.store('chapters').purge(undefined, { force: true });
            await client.getFullEpisodic();
            expect(cache.store('records').keys()).toEqual(['dawn']);
        });

        it('searches lines only after gathering', async () => {
            const { client } = createTestClient({
                full_episodic: () => chapters,
                record_text: () => recordTextPayload([{ character: 'aetol', text: 'the sun rises' }]),
            });

            expect(await caught(client.searchRecordLines({ text: 'sun' }))).toBeInstanceOf(ItemsUngatheredError);

            await client.getFullRecordContents({ gather: true });
            const results = await client.searchRecordLines({ text: 'sun' });
            expect(results.map((r) => r.key)).toEqual(['dawn', 'dusk', 'noon']);
        });
    });

    describe('domain search', () => {
        it('shares one cache slot between equivalent queries', async () => {
            const { client, api } = createTestClient({
                domain_search: () => ({
                    results: [
                        { type: 'image', image: imagePayload('a') },
                        { type: 'image', image: imagePayload('b') },
                    ],
                }),
            });

            const all = await client.domainSearch('Foo', 'image');
            const limited = await client.domainSearch(' foo ', 'image', { limit: 1 });

            expect(all).toHaveLength(2);
            expect(limited.map((r) => r.key)).toEqual(['a']);
            expect(api.count('domain_search')).toBe(1);
        });

        it('rejects unknown search types', async () => {
            const { client } = createTestClient({});
            expect(await caught(client.domainSearch('foo', 'dictionary'))).toBeInstanceOf(InvalidSearchTypeError);
        });
    });

    describe('splashes', () => {
        it('validates length before submitting', async () => {
            const { client, api } = createTestClient({});
            expect(await caught(client.submitSplash('x'.repeat(81), 'reader', '42'))).toBeInstanceOf(InvalidArgumentError);
            expect(await caught(client.submitSplash('   ', 'reader', '42'))).toBeInstanceOf(InvalidArgumentError);
            expect(api.calls).toHaveLength(0);
        });

        it('submits with the API key', async () => {
            const { client, api } = createTestClient({ submit_discord_splash: () => ({ ok: true }) }, { splashApiKey: 'test-secret' });

            await client.submitSplash('  hello world  ', 'reader', '42');

            expect(api.calls[0].method).toBe('POST');
            expect(api.calls[0].params).toEqual({ text: 'hello world', name: 'reader', user_id: '42' });
            expect(api.calls[0].headers['x-api-key']).toBe('test-secret');
        });

        it('translates a rejected submission', async () => {
            const { client } = createTestClient({ submit_discord_splash: () => jsonResponse({ reason: 'private' }, 400) });
            expect(await caught(client.submitSplash('hello', 'reader', '42'))).toBeInstanceOf(SubmissionRejectedError);
        });

        it('caches splash pages by number', async () => {
            const { client, api } = createTestClient({
                paged_splashes: () => ({ splashes: [{ text: 'first', ordinal: 9 }] }),
            });

            expect(await caught(client.getPagedSplashes(0))).toBeInstanceOf(InvalidArgumentError);
            const page = await client.getPagedSplashes(2);
            await client.getPagedSplashes(2);

            expect(page).toEqual({ page: 2, splashes: [{ text: 'first', ordinal: 9 }] });
            expect(api.count('paged_splashes')).toBe(1);
        });
    });

    describe('sketches', () => {
        it('resolves (latest) to the newest dated sketch', async () => {
            const sketch = (name: string, date: string | null) => ({ name, title: name, date, image_url: `/s/${name}.png`, thumb_url: `/s/${name}_t.png` });
            const { client } = createTestClient({
                all_sketches: () => ({ sketches: [sketch('old', '2023-01-01'), sketch('undated', null), sketch('new', '2024-06-01')] }),
            });

            expect((await client.getSingleSketch()).name).toBe('new');
            expect((await client.getSingleSketch('undated')).sketchLink).toBe('https://fractalthorns.test/sketch/undated');
        });

        it('evicts sketches that left the listing', async () => {
            let listing = ['old', 'new'];
            const { client, cache } = createTestClient({
                all_sketches: () => ({
                    sketches: listing.map((name) => ({ name, title: name, date: null, image_url: `/s/${name}.png`, thumb_url: `/s/${name}_t.png` })),
                }),
            });

            await client.getAllSketches();
            expect(cache.store('sketches').keys()).toEqual(['old', 'new']);

            listing = ['old'];
            cache.store('sketch-list').purge(undefined, { force: true });
            await client.getAllSketches();
            expect(cache.store('sketches').keys()).toEqual(['old']);
        });
    });

    it('persists touched kinds through the registry', async () => {
        const { client, repo, decoders } = createTestClient({ all_news: () => ({ items: [{ title: 'hi', items: [], date: '2025-01-01' }] }) });

        const news = await client.getAllNews();
        client.save(['news']);

        const restored = new CacheRegistry(repo, decoders, { purgeCooldownMs: HOUR });
        restored.load(['news']);
        expect(restored.store('news').get('all')).toEqual(news);
    });
});

describe('romanToInt', () => {
    it('reads roman numerals', () => {
        expect(romanToInt('iv')).toBe(4);
        expect(romanToInt('XIV')).toBe(14);
        expect(romanToInt('prologue')).toBeNull();
    });
});
