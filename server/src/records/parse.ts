/**
 * Pure deserializers: upstream JSON → record types.
 * A missing or mistyped required field fails the whole payload; only fields
 * documented as optional fall back to null.
 */

import { DeserializeError } from '../errors.js';
import type {
    Chapter,
    Image,
    ImageDescription,
    MatchResult,
    NewsEntry,
    RecordEntry,
    RecordLine,
    RecordText,
    Sketch,
    SpeedpaintAnnotation,
    Splash,
    SplashPage,
} from './types.js';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: DeserializeError };

/** A decoded value together with the payload fragment it came from */
export interface Sourced<T> {
    value: T;
    source: unknown;
}

/** Where the site serves human-facing pages */
export interface SiteLinks {
    base: string;
    image: string;
    record: string;
    puzzle: string;
    sketch: string;
}

export function siteLinks(baseUrl: string): SiteLinks {
    const base = baseUrl.replace(/\/+$/, '');
    return {
        base,
        image: `${base}/image/`,
        record: `${base}/episodic/`,
        puzzle: `${base}/puzzle/`,
        sketch: `${base}/sketch/`,
    };
}

// ---------- field readers ----------

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Typed accessors over one JSON object; every failure names the JSON path */
class Reader {
    private constructor(private readonly obj: Record<string, unknown>, readonly path: string) {}

    static of(value: unknown, path: string): Reader {
        if (!isObject(value)) throw new DeserializeError(path, 'object');
        return new Reader(value, path);
    }

    at(key: string): string {
        return `${this.path}.${key}`;
    }

    raw(key: string): unknown {
        return this.obj[key];
    }

    has(key: string): boolean {
        return this.obj[key] !== undefined && this.obj[key] !== null;
    }

    str(key: string): string {
        const value = this.obj[key];
        if (typeof value !== 'string') throw new DeserializeError(this.at(key), 'string');
        return value;
    }

    optStr(key: string): string | null {
        return this.has(key) ? this.str(key) : null;
    }

    num(key: string): number {
        const value = this.obj[key];
        if (typeof value !== 'number' || !Number.isFinite(value)) throw new DeserializeError(this.at(key), 'number');
        return value;
    }

    optNum(key: string): number | null {
        return this.has(key) ? this.num(key) : null;
    }

    bool(key: string): boolean {
        const value = this.obj[key];
        if (typeof value !== 'boolean') throw new DeserializeError(this.at(key), 'boolean');
        return value;
    }

    list(key: string): unknown[] {
        const value = this.obj[key];
        if (!Array.isArray(value)) throw new DeserializeError(this.at(key), 'array');
        return value;
    }

    optList(key: string): unknown[] | null {
        return this.has(key) ? this.list(key) : null;
    }

    strList(key: string): string[] {
        return this.list(key).map((item, i) => {
            if (typeof item !== 'string') throw new DeserializeError(`${this.at(key)}[${i}]`, 'string');
            return item;
        });
    }

    optStrList(key: string): string[] | null {
        return this.has(key) ? this.strList(key) : null;
    }

    /** Each element of an array field as its own Reader */
    objects(key: string): Reader[] {
        return this.list(key).map((item, i) => Reader.of(item, `${this.at(key)}[${i}]`));
    }
}

/** Attach identifying fields that a payload does not carry itself */
export function withFields(payload: unknown, fields: Record<string, string | number>): Record<string, unknown> {
    if (!isObject(payload)) throw new DeserializeError('$', 'object');
    return { ...payload, ...fields };
}

function parseWith<T>(read: () => T): ParseResult<T> {
    try {
        return { ok: true, value: read() };
    } catch (err) {
        if (err instanceof DeserializeError) return { ok: false, error: err };
        throw err;
    }
}

function absoluteUrl(base: string, url: string): string {
    if (/^https?:\/\//i.test(url)) return url;
    return `${base}${url.startsWith('/') ? '' : '/'}${url}`;
}

// ---------- record text formatting ----------

// Two or more spaces, or a newline plus indentation, unless a list marker follows.
// The lookahead + backreference keeps the run atomic so it cannot backtrack into a shorter match.
const COLLAPSIBLE_WHITESPACE = /(?=( {2,}|\n *))\1(?![*-])/g;

/** Whitespace-normalized text of a spoken line. Narration (no speaker) is kept verbatim. */
export function formatLineText(text: string, character: string | null): string {
    if (character === null) return text;

    const formatted = text.replace(COLLAPSIBLE_WHITESPACE, ' ');
    if (formatted.startsWith('- ') || formatted.startsWith('* ')) return `\n${formatted}`;
    return formatted;
}

// ---------- readers per record type ----------

function readNewsEntry(r: Reader): NewsEntry {
    return {
        title: r.str('title'),
        items: r.has('items') ? r.strList('items') : [],
        date: r.str('date'),
        version: r.optStr('version'),
    };
}

function readImage(r: Reader, links: SiteLinks): Image {
    const name = r.str('name');
    return {
        name,
        title: r.str('title'),
        date: r.str('date'),
        ordinal: r.num('ordinal'),
        imageUrl: absoluteUrl(links.base, r.str('image_url')),
        thumbUrl: absoluteUrl(links.base, r.str('thumb_url')),
        canon: r.optStr('canon'),
        hasDescription: r.bool('has_description'),
        characters: r.strList('characters'),
        speedpaintVideoUrl: r.optStr('speedpaint_video_url'),
        primaryColor: r.optStr('primary_color'),
        secondaryColor: r.optStr('secondary_color'),
        imageLink: `${links.image}${name}`,
    };
}

function readAnnotation(r: Reader): SpeedpaintAnnotation {
    return { time: r.num('time'), text: r.str('text') };
}

function readSketch(r: Reader, links: SiteLinks): Sketch {
    const name = r.str('name');
    return {
        name,
        title: r.str('title'),
        date: r.optStr('date'),
        description: r.optStr('description'),
        imageUrl: absoluteUrl(links.base, r.str('image_url')),
        thumbUrl: absoluteUrl(links.base, r.str('thumb_url')),
        sketchLink: `${links.sketch}${name}`,
    };
}

function readRecord(r: Reader, links: SiteLinks): RecordEntry {
    const name = r.str('name');
    const solved = r.bool('solved');
    const linkedPuzzles = r.optStrList('linked_puzzles');

    let puzzleLinks: string[] | null = null;
    if (!solved) {
        puzzleLinks = linkedPuzzles ? linkedPuzzles.map((p) => `${links.puzzle}${p}`) : [links.puzzle];
    }

    return {
        name,
        title: r.str('title'),
        chapter: r.str('chapter'),
        solved,
        iteration: r.optStr('iteration'),
        linkedPuzzles,
        recordLink: solved ? `${links.record}${name}` : null,
        puzzleLinks,
    };
}

function readRecordLine(r: Reader, recordName: string, index: number): RecordLine {
    const character = r.optStr('character');
    const text = r.str('text');
    return {
        recordName,
        index,
        character,
        language: r.optStr('language'),
        emphasis: r.optStr('emphasis'),
        text,
        formattedText: formatLineText(text, character),
    };
}

function readSplash(r: Reader): Splash {
    return { text: r.str('text'), ordinal: r.optNum('ordinal') };
}

function readImageList(raw: unknown, links: SiteLinks): Sourced<Image>[] {
    return Reader.of(raw, '$').objects('images').map((r) => ({ value: readImage(r, links), source: sourceOf(raw, 'images', r) }));
}

function readSketchList(raw: unknown, links: SiteLinks): Sourced<Sketch>[] {
    return Reader.of(raw, '$').objects('sketches').map((r) => ({ value: readSketch(r, links), source: sourceOf(raw, 'sketches', r) }));
}

function readEpisodic(raw: unknown, links: SiteLinks): { chapters: Chapter[]; records: Sourced<RecordEntry>[] } {
    const records: Sourced<RecordEntry>[] = [];
    const chapters = Reader.of(raw, '$').objects('chapters').map((chapter) => {
        const chapterRecords = chapter.objects('records').map((r) => {
            const value = readRecord(r, links);
            records.push({ value, source: sourceOf(chapter, 'records', r) });
            return value;
        });
        return { name: chapter.str('name'), records: chapterRecords };
    });
    return { chapters, records };
}

/** Recover the raw element a child Reader was built from, using its index in the path */
function sourceOf(parent: unknown, key: string, child: Reader): unknown {
    const container = parent instanceof Reader ? parent.raw(key) : isObject(parent) ? parent[key] : undefined;
    const match = /\[(\d+)\]$/.exec(child.path);
    if (!Array.isArray(container) || !match) throw new DeserializeError(child.path, 'array element');
    return container[Number(match[1])];
}

function readSearchResult(r: Reader, links: SiteLinks): MatchResult {
    const type = r.str('type');

    if (type === 'image') {
        const image = readImage(Reader.of(r.raw('image'), r.at('image')), links);
        return { kind: 'image', key: image.name, snippet: null, image, record: null, line: null, lineIndex: null, match: null };
    }

    if (type === 'episodic-item' || type === 'episodic-line') {
        const record = readRecord(Reader.of(r.raw('record'), r.at('record')), links);
        if (type === 'episodic-item') {
            return { kind: 'record', key: record.name, snippet: null, image: null, record, line: null, lineIndex: null, match: null };
        }

        const lineIndex = r.num('record_line_index');
        const line = readRecordLine(Reader.of(r.raw('record_line'), r.at('record_line')), record.name, lineIndex);
        return {
            kind: 'record-line',
            key: record.name,
            snippet: r.optStr('record_matched_text'),
            image: null,
            record,
            line,
            lineIndex,
            match: null,
        };
    }

    throw new DeserializeError(r.at('type'), 'image, episodic-item or episodic-line');
}

// ---------- decoders ----------

export interface Decoders {
    news(raw: unknown): ParseResult<NewsEntry[]>;
    image(raw: unknown): ParseResult<Image>;
    imageList(raw: unknown): ParseResult<Image[]>;
    imageListEntries(raw: unknown): ParseResult<Sourced<Image>[]>;
    /** Expects the image_description payload merged with the image's name and title */
    imageDescription(raw: unknown): ParseResult<ImageDescription>;
    sketch(raw: unknown): ParseResult<Sketch>;
    sketchList(raw: unknown): ParseResult<Sketch[]>;
    sketchListEntries(raw: unknown): ParseResult<Sourced<Sketch>[]>;
    record(raw: unknown): ParseResult<RecordEntry>;
    episodic(raw: unknown): ParseResult<Chapter[]>;
    episodicRecords(raw: unknown): ParseResult<Sourced<RecordEntry>[]>;
    /** Expects the record_text payload merged with the record's name and title */
    recordText(raw: unknown): ParseResult<RecordText>;
    searchResults(raw: unknown): ParseResult<MatchResult[]>;
    splash(raw: unknown): ParseResult<Splash>;
    /** Expects the paged_splashes payload merged with the page number */
    splashPage(raw: unknown): ParseResult<SplashPage>;
}

export function createDecoders(links: SiteLinks): Decoders {
    return {
        news: (raw) => parseWith(() => Reader.of(raw, '$').objects('items').map(readNewsEntry)),

        image: (raw) => parseWith(() => readImage(Reader.of(raw, '$'), links)),

        imageList: (raw) => parseWith(() => readImageList(raw, links).map((e) => e.value)),

        imageListEntries: (raw) => parseWith(() => readImageList(raw, links)),

        imageDescription: (raw) =>
            parseWith(() => {
                const r = Reader.of(raw, '$');
                const name = r.str('name');
                const annotations = r.has('annotations') ? r.objects('annotations').map(readAnnotation) : null;
                return {
                    name,
                    title: r.str('title'),
                    description: r.optStr('description'),
                    annotations,
                    imageLink: `${links.image}${name}`,
                };
            }),

        sketch: (raw) => parseWith(() => readSketch(Reader.of(raw, '$'), links)),

        sketchList: (raw) => parseWith(() => readSketchList(raw, links).map((e) => e.value)),

        sketchListEntries: (raw) => parseWith(() => readSketchList(raw, links)),

        record: (raw) => parseWith(() => readRecord(Reader.of(raw, '$'), links)),

        episodic: (raw) => parseWith(() => readEpisodic(raw, links).chapters),

        episodicRecords: (raw) => parseWith(() => readEpisodic(raw, links).records),

        recordText: (raw) =>
            parseWith(() => {
                const r = Reader.of(raw, '$');
                const name = r.str('name');
                const headerLines = r.strList('header_lines');
                return {
                    name,
                    title: r.str('title'),
                    iteration: r.str('iteration'),
                    headerLines,
                    languages: r.strList('languages'),
                    characters: r.strList('characters'),
                    requested: !headerLines.some((line) => line.includes('unrequested')),
                    lines: r.objects('lines').map((line, i) => readRecordLine(line, name, i)),
                    recordLink: `${links.record}${name}`,
                };
            }),

        searchResults: (raw) => parseWith(() => Reader.of(raw, '$').objects('results').map((r) => readSearchResult(r, links))),

        splash: (raw) => parseWith(() => readSplash(Reader.of(raw, '$'))),

        splashPage: (raw) =>
            parseWith(() => {
                const r = Reader.of(raw, '$');
                return { page: r.num('page'), splashes: r.objects('splashes').map(readSplash) };
            }),
    };
}
