/**
 * Fractalthorns API client.
 * Every read goes through the cache first; a miss fetches, decodes, stores
 * and returns. Failures are never papered over with stale data.
 */

import type { CacheRegistry } from '../cache/registry.js';
import { ALL, type CacheKind } from '../cache/kinds.js';
import { fingerprint } from '../cache/fingerprint.js';
import {
    APIError,
    ChapterNotFoundError,
    ImageNotFoundError,
    InvalidArgumentError,
    InvalidSearchTypeError,
    ItemsUngatheredError,
    type NotFoundError,
    RecordNotFoundError,
    SketchNotFoundError,
    SplashNotFoundError,
} from '../errors.js';
import { withFields, type Decoders, type ParseResult } from '../records/parse.js';
import type {
    Chapter,
    Image,
    ImageDescription,
    MatchResult,
    NewsEntry,
    RecordEntry,
    RecordText,
    Sketch,
    Splash,
    SplashPage,
} from '../records/types.js';
import type { RequestParams, Transport } from '../transport.js';
import {
    needsDescriptions,
    needsRecordTexts,
    searchImages,
    searchRecordLines,
    searchRecords,
    type ImageSearchFilters,
    type LineSearchFilters,
    type RecordSearchFilters,
} from './search.js';

/** Sentinel name resolving to the newest image, sketch or chapter */
export const LATEST = '(latest)';

export const SEARCH_TYPES = ['image', 'episodic-item', 'episodic-line'] as const;
export type SearchType = (typeof SEARCH_TYPES)[number];

export const SPLASH_MAX_LENGTH = 80;

const ALL_IMAGES_REASON = 'Too soon after a request for all images';
const ALL_SKETCHES_REASON = 'Too soon after a request for all sketches';
const ALL_RECORDS_REASON = 'Too soon after a request for all records';
const ALL_DESCRIPTIONS_REASON = 'Too soon after a request for all image descriptions';
const ALL_RECORD_CONTENTS_REASON = 'Too soon after a request for all record contents';

export interface FractalthornsClientOptions {
    transport: Transport;
    cache: CacheRegistry;
    decoders: Decoders;
    /** How long purges stay blocked after a full listing or gather */
    purgeCooldownMs: number;
    splashApiKey?: string | null;
}

export interface GatherReport {
    imageDescriptions: number;
    recordTexts: number;
}

function decode<T>(result: ParseResult<T>): T {
    if (!result.ok) throw result.error;
    return result.value;
}

function isSearchType(type: string): type is SearchType {
    return SEARCH_TYPES.some((t) => t === type);
}

const ROMAN_VALUES: Record<string, number> = { i: 1, v: 5, x: 10, l: 50, c: 100, d: 500, m: 1000 };

/** Value of a roman numeral, or null if the label is not one */
export function romanToInt(label: string): number | null {
    const chars = label.trim().toLowerCase();
    if (!/^[ivxlcdm]+$/.test(chars)) return null;

    let total = 0;
    for (let i = 0; i < chars.length; i++) {
        const value = ROMAN_VALUES[chars[i]];
        const next = i + 1 < chars.length ? ROMAN_VALUES[chars[i + 1]] : 0;
        total += value < next ? -value : value;
    }
    return total;
}

export class FractalthornsClient {
    private readonly transport: Transport;
    private readonly cache: CacheRegistry;
    private readonly decoders: Decoders;
    private readonly purgeCooldownMs: number;
    private readonly splashApiKey: string | null;

    constructor(options: FractalthornsClientOptions) {
        this.transport = options.transport;
        this.cache = options.cache;
        this.decoders = options.decoders;
        this.purgeCooldownMs = options.purgeCooldownMs;
        this.splashApiKey = options.splashApiKey ?? null;
    }

    // ---------- helpers ----------

    /** GET that maps an upstream 404 to the given not-found error */
    private async get(endpoint: string, params: RequestParams, notFound: () => NotFoundError): Promise<unknown> {
        try {
            return await this.transport.request('GET', endpoint, params);
        } catch (err) {
            if (err instanceof APIError && err.status === 404) throw notFound();
            throw err;
        }
    }

    private blockPurges(kinds: CacheKind[], reason: string): void {
        const until = Date.now() + this.purgeCooldownMs;
        for (const kind of kinds) this.cache.store(kind).blockPurge(until, reason);
    }

    // ---------- news ----------

    async getAllNews(): Promise<NewsEntry[]> {
        const store = this.cache.store('news');
        const cached = store.get(ALL);
        if (cached) return cached;

        const payload = await this.transport.request('GET', 'all_news');
        const news = decode(this.decoders.news(payload));
        store.set(ALL, news, payload);
        return news;
    }

    // ---------- images ----------

    /**
     * Every image, newest listing from upstream when the cached one expired.
     * A fresh listing replaces each listed image and evicts images that are gone.
     */
    async getAllImages(): Promise<Image[]> {
        const store = this.cache.store('image-list');
        const cached = store.get(ALL);
        if (cached) return cached;

        const payload = await this.transport.request('GET', 'all_images');
        const entries = decode(this.decoders.imageListEntries(payload));
        const images = entries.map((entry) => entry.value);

        const listed = new Set(images.map((image) => image.name));
        const imageStore = this.cache.store('images');
        const evicted =
            imageStore.retain((name) => listed.has(name)) +
            this.cache.store('image-descriptions').retain((name) => listed.has(name));
        for (const { value, source } of entries) imageStore.set(value.name, value, source);
        if (evicted > 0) console.log(`Image list refreshed, evicted ${evicted} stale entries`);

        store.set(ALL, images, payload);
        this.blockPurges(['image-list', 'images'], ALL_IMAGES_REASON);
        return images;
    }

    async getSingleImage(name: string = LATEST): Promise<Image> {
        if (name === LATEST) {
            const images = await this.getAllImages();
            const latest = images.reduce<Image | null>((best, image) => (!best || image.ordinal > best.ordinal ? image : best), null);
            if (!latest) throw new ImageNotFoundError(LATEST);
            return this.cache.store('images').get(latest.name) ?? latest;
        }

        const store = this.cache.store('images');
        const cached = store.get(name);
        if (cached) return cached;

        const payload = await this.get('single_image', { name }, () => new ImageNotFoundError(name));
        const image = decode(this.decoders.image(payload));
        store.set(image.name, image, payload);
        return image;
    }

    /** Images without a description resolve to a null description with no request */
    async getImageDescription(name: string): Promise<ImageDescription> {
        const store = this.cache.store('image-descriptions');
        const cached = name === LATEST ? undefined : store.get(name);
        if (cached) return cached;

        const image = await this.getSingleImage(name);
        const hit = store.get(image.name);
        if (hit) return hit;

        const identity = { name: image.name, title: image.title };
        const source = image.hasDescription
            ? withFields(await this.get('image_description', { name: image.name }, () => new ImageNotFoundError(image.name)), identity)
            : identity;

        const description = decode(this.decoders.imageDescription(source));
        store.set(image.name, description, source);
        return description;
    }

    /**
     * Descriptions of every listed image. Without `gather`, only answers when
     * every description is already cached.
     */
    async getFullImageDescriptions(options: { gather?: boolean } = {}): Promise<Map<string, ImageDescription>> {
        const images = await this.getAllImages();
        const store = this.cache.store('image-descriptions');
        const result = new Map<string, ImageDescription>();
        const missing: Image[] = [];

        for (const image of images) {
            const cached = store.get(image.name);
            if (cached) result.set(image.name, cached);
            else missing.push(image);
        }

        if (missing.length === 0) return result;
        if (!options.gather) throw new ItemsUngatheredError('image-descriptions', missing.length);

        console.log(`Gathering ${missing.length} image descriptions`);
        const fetched = await Promise.all(missing.map((image) => this.getImageDescription(image.name)));
        for (const description of fetched) result.set(description.name, description);
        this.blockPurges(['image-descriptions'], ALL_DESCRIPTIONS_REASON);

        // Listing order
        return new Map(images.flatMap((image) => {
            const description = result.get(image.name);
            return description ? [[image.name, description] as const] : [];
        }));
    }

    async searchImages(filters: ImageSearchFilters): Promise<MatchResult[]> {
        const images = await this.getAllImages();
        const descriptions = needsDescriptions(filters) ? await this.getFullImageDescriptions() : undefined;
        return searchImages(images, filters, descriptions);
    }

    // ---------- sketches ----------

    async getAllSketches(): Promise<Sketch[]> {
        const store = this.cache.store('sketch-list');
        const cached = store.get(ALL);
        if (cached) return cached;

        const payload = await this.transport.request('GET', 'all_sketches');
        const entries = decode(this.decoders.sketchListEntries(payload));
        const sketches = entries.map((entry) => entry.value);

        const listed = new Set(sketches.map((sketch) => sketch.name));
        const sketchStore = this.cache.store('sketches');
        sketchStore.retain((name) => listed.has(name));
        for (const { value, source } of entries) sketchStore.set(value.name, value, source);

        store.set(ALL, sketches, payload);
        this.blockPurges(['sketch-list', 'sketches'], ALL_SKETCHES_REASON);
        return sketches;
    }

    /** Sketches have no single-item endpoint; they come from the listing */
    async getSingleSketch(name: string = LATEST): Promise<Sketch> {
        const store = this.cache.store('sketches');
        if (name !== LATEST) {
            const cached = store.get(name);
            if (cached) return cached;
        }

        const sketches = await this.getAllSketches();
        if (name === LATEST) {
            const latest = newestSketch(sketches);
            if (!latest) throw new SketchNotFoundError(LATEST);
            return latest;
        }

        const sketch = sketches.find((s) => s.name === name);
        if (!sketch) throw new SketchNotFoundError(name);
        return sketch;
    }

    // ---------- episodic ----------

    /**
     * Chapter index with every record's metadata.
     * A fresh index replaces each listed record and evicts texts of records
     * that are gone or no longer solved.
     */
    async getFullEpisodic(): Promise<Chapter[]> {
        const store = this.cache.store('chapters');
        const cached = store.get(ALL);
        if (cached) return cached;

        const payload = await this.transport.request('GET', 'full_episodic');
        const chapters = decode(this.decoders.episodic(payload));
        const entries = decode(this.decoders.episodicRecords(payload));

        const solved = new Map(entries.map(({ value }) => [value.name, value.solved]));
        const recordStore = this.cache.store('records');
        const evicted =
            recordStore.retain((name) => solved.has(name)) +
            this.cache.store('record-texts').retain((name) => solved.get(name) === true);
        for (const { value, source } of entries) recordStore.set(value.name, value, source);
        if (evicted > 0) console.log(`Chapter index refreshed, evicted ${evicted} stale entries`);

        store.set(ALL, chapters, payload);
        this.blockPurges(['chapters', 'records'], ALL_RECORDS_REASON);
        return chapters;
    }

    /** `(latest)` is the chapter with the highest roman numeral */
    async getChapter(label: string = LATEST): Promise<Chapter> {
        const chapters = await this.getFullEpisodic();

        if (label === LATEST) {
            const latest = latestChapter(chapters);
            if (!latest) throw new ChapterNotFoundError(LATEST);
            return latest;
        }

        const wanted = label.trim().toLowerCase();
        const chapter = chapters.find((c) => c.name.toLowerCase() === wanted);
        if (!chapter) throw new ChapterNotFoundError(label);
        return chapter;
    }

    async getSingleRecord(name: string): Promise<RecordEntry> {
        const store = this.cache.store('records');
        const cached = store.get(name);
        if (cached) return cached;

        const payload = await this.get('single_record', { name }, () => new RecordNotFoundError(name));
        const record = decode(this.decoders.record(payload));
        store.set(record.name, record, payload);
        return record;
    }

    /** Text of a solved record. Unsolved records have none. */
    async getRecordText(name: string): Promise<RecordText> {
        const store = this.cache.store('record-texts');
        const cached = store.get(name);
        if (cached) return cached;

        const record = await this.getSingleRecord(name);
        if (!record.solved) throw new RecordNotFoundError(name, 'not solved yet');

        const payload = await this.get('record_text', { name: record.name }, () => new RecordNotFoundError(record.name));
        const source = withFields(payload, { name: record.name, title: record.title });
        const text = decode(this.decoders.recordText(source));
        store.set(record.name, text, source);
        return text;
    }

    /**
     * Texts of every solved record. Without `gather`, only answers when every
     * text is already cached.
     */
    async getFullRecordContents(options: { gather?: boolean } = {}): Promise<Map<string, RecordText>> {
        const records = solvedRecords(await this.getFullEpisodic());
        const store = this.cache.store('record-texts');
        const missing = records.filter((record) => !store.has(record.name));

        if (missing.length > 0) {
            if (!options.gather) throw new ItemsUngatheredError('record-texts', missing.length);

            console.log(`Gathering ${missing.length} record texts`);
            const fetched = new Map((await Promise.all(missing.map((r) => this.getRecordText(r.name)))).map((t) => [t.name, t]));
            this.blockPurges(['record-texts'], ALL_RECORD_CONTENTS_REASON);
            return collect(records, (name) => store.get(name) ?? fetched.get(name));
        }

        return collect(records, (name) => store.get(name));
    }

    async searchRecords(filters: RecordSearchFilters): Promise<MatchResult[]> {
        const records = allRecords(await this.getFullEpisodic());
        const texts = needsRecordTexts(filters) ? await this.getFullRecordContents() : undefined;
        return searchRecords(records, filters, texts);
    }

    /** Needs gathered record texts */
    async searchRecordLines(filters: LineSearchFilters): Promise<MatchResult[]> {
        const records = solvedRecords(await this.getFullEpisodic());
        const texts = await this.getFullRecordContents();
        return searchRecordLines(records, texts, filters);
    }

    // ---------- domain search ----------

    /** Site search. `limit` trims the cached result list and is not part of the cache key. */
    async domainSearch(term: string, type: string, options: { limit?: number } = {}): Promise<MatchResult[]> {
        if (!isSearchType(type)) throw new InvalidSearchTypeError(type);
        const query = term.trim();
        if (!query) throw new InvalidArgumentError('Search term must not be empty');
        const { limit } = options;
        if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
            throw new InvalidArgumentError(`limit must be a positive integer, got ${limit}`);
        }

        const store = this.cache.store('search-results');
        const key = fingerprint('domain_search', { term: query, type });
        let results = store.get(key);
        if (!results) {
            const payload = await this.transport.request('GET', 'domain_search', { term: query, type });
            results = decode(this.decoders.searchResults(payload));
            store.set(key, results, payload);
        }

        return limit === undefined ? results : results.slice(0, limit);
    }

    // ---------- splashes ----------

    async getCurrentSplash(): Promise<Splash> {
        const store = this.cache.store('splash');
        const cached = store.get('current');
        if (cached) return cached;

        const payload = await this.get('current_splash', {}, () => new SplashNotFoundError('current'));
        const splash = decode(this.decoders.splash(payload));
        store.set('current', splash, payload);
        return splash;
    }

    /** Page 1 is the newest */
    async getPagedSplashes(page: number): Promise<SplashPage> {
        if (!Number.isInteger(page) || page < 1) throw new InvalidArgumentError(`page must be a positive integer, got ${page}`);

        const store = this.cache.store('splash-pages');
        const key = String(page);
        const cached = store.get(key);
        if (cached) return cached;

        const payload = await this.get('paged_splashes', { page }, () => new SplashNotFoundError(`page ${page}`));
        const source = withFields(payload, { page });
        const splashPage = decode(this.decoders.splashPage(source));
        store.set(key, splashPage, source);
        return splashPage;
    }

    /** Submit a splash on behalf of a chat user. A 400 becomes SubmissionRejectedError. */
    async submitSplash(text: string, userName: string, userId: string): Promise<void> {
        const splash = text.trim();
        if (splash.length < 1 || splash.length > SPLASH_MAX_LENGTH) {
            throw new InvalidArgumentError(`Splash text must be 1-${SPLASH_MAX_LENGTH} characters`);
        }

        const headers: Record<string, string> = {};
        if (this.splashApiKey) headers['X-Api-Key'] = this.splashApiKey;

        await this.transport.request(
            'POST',
            'submit_discord_splash',
            { text: splash, name: userName, user_id: userId },
            { headers, submission: true },
        );

        // Paging shifts once a new splash lands
        this.cache.store('splash-pages').retain(() => false);
        console.log(`Splash submitted by ${userName} (${userId})`);
    }

    // ---------- maintenance ----------

    async gatherAll(): Promise<GatherReport> {
        const [descriptions, texts] = await Promise.all([
            this.getFullImageDescriptions({ gather: true }),
            this.getFullRecordContents({ gather: true }),
        ]);
        return { imageDescriptions: descriptions.size, recordTexts: texts.size };
    }

    save(kinds?: readonly CacheKind[]): void {
        this.cache.save(kinds);
    }
}

// ---------- pure helpers ----------

function newestSketch(sketches: readonly Sketch[]): Sketch | null {
    let newest: Sketch | null = null;
    for (const sketch of sketches) {
        if (sketch.date === null) continue;
        if (!newest || (newest.date !== null && sketch.date > newest.date)) newest = sketch;
    }
    return newest ?? sketches[0] ?? null;
}

function latestChapter(chapters: readonly Chapter[]): Chapter | null {
    let latest: Chapter | null = null;
    let latestValue = 0;
    for (const chapter of chapters) {
        const value = romanToInt(chapter.name);
        if (value !== null && value > latestValue) {
            latest = chapter;
            latestValue = value;
        }
    }
    return latest ?? chapters[chapters.length - 1] ?? null;
}

function allRecords(chapters: readonly Chapter[]): RecordEntry[] {
    return chapters.flatMap((chapter) => chapter.records);
}

function solvedRecords(chapters: readonly Chapter[]): RecordEntry[] {
    return allRecords(chapters).filter((record) => record.solved);
}

function collect<T>(records: readonly RecordEntry[], lookup: (name: string) => T | undefined): Map<string, T> {
    const result = new Map<string, T>();
    for (const record of records) {
        const value = lookup(record.name);
        if (value !== undefined) result.set(record.name, value);
    }
    return result;
}
