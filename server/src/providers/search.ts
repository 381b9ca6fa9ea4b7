/**
 * Local searches over cached images and records.
 * Every text filter is a case-insensitive regular expression.
 */

import { InvalidSearchPatternError } from '../errors.js';
import type {
    Image,
    ImageDescription,
    MatchResult,
    MatchSpan,
    RecordEntry,
    RecordLine,
    RecordText,
} from '../records/types.js';

export interface ImageSearchFilters {
    title?: string;
    name?: string;
    canon?: string;
    character?: string;
    hasDescription?: boolean;
    speedpaint?: boolean;
    /** Needs gathered image descriptions */
    description?: string;
}

export interface RecordSearchFilters {
    title?: string;
    name?: string;
    chapter?: string;
    iteration?: string;
    solved?: boolean;
    /** Needs gathered record texts */
    character?: string;
    /** Needs gathered record texts */
    language?: string;
    /** Needs gathered record texts */
    requested?: boolean;
}

export interface LineSearchFilters {
    text?: string;
    character?: string;
    language?: string;
    emphasis?: string;
    record?: string;
}

const SNIPPET_RADIUS = 40;

export function compilePattern(field: string, pattern: string): RegExp {
    try {
        return new RegExp(pattern, 'i');
    } catch (err) {
        throw new InvalidSearchPatternError(field, pattern, { cause: err });
    }
}

function compileAll<K extends string>(filters: Partial<Record<K, string | boolean>>, fields: readonly K[]): Map<K, RegExp> {
    const compiled = new Map<K, RegExp>();
    for (const field of fields) {
        const value = filters[field];
        if (typeof value === 'string') compiled.set(field, compilePattern(field, value));
    }
    return compiled;
}

function matches(pattern: RegExp | undefined, value: string | null): boolean {
    if (!pattern) return true;
    return value !== null && pattern.test(value);
}

/** Text around a match, with an ellipsis where it was cut */
export function snippetAround(text: string, span: MatchSpan, radius = SNIPPET_RADIUS): string {
    const start = Math.max(0, span.start - radius);
    const end = Math.min(text.length, span.end + radius);
    const prefix = start > 0 ? '…' : '';
    const suffix = end < text.length ? '…' : '';
    return `${prefix}${text.slice(start, end)}${suffix}`;
}

function findSpan(pattern: RegExp, text: string): MatchSpan | null {
    const found = pattern.exec(text);
    return found ? { start: found.index, end: found.index + found[0].length } : null;
}

// ---------- images ----------

/** Whether any filter needs image descriptions */
export function needsDescriptions(filters: ImageSearchFilters): boolean {
    return filters.description !== undefined;
}

export function searchImages(
    images: readonly Image[],
    filters: ImageSearchFilters,
    descriptions: ReadonlyMap<string, ImageDescription> = new Map(),
): MatchResult[] {
    const patterns = compileAll(filters, ['title', 'name', 'canon', 'character', 'description'] as const);
    const results: MatchResult[] = [];

    for (const image of images) {
        if (!matches(patterns.get('title'), image.title)) continue;
        if (!matches(patterns.get('name'), image.name)) continue;
        if (!matches(patterns.get('canon'), image.canon)) continue;
        const character = patterns.get('character');
        if (character && !image.characters.some((c) => character.test(c))) continue;
        if (filters.hasDescription !== undefined && image.hasDescription !== filters.hasDescription) continue;
        if (filters.speedpaint !== undefined && (image.speedpaintVideoUrl !== null) !== filters.speedpaint) continue;

        let snippet: string | null = null;
        let match: MatchSpan | null = null;
        const description = patterns.get('description');
        if (description) {
            const text = descriptions.get(image.name)?.description ?? null;
            match = text === null ? null : findSpan(description, text);
            if (text === null || !match) continue;
            snippet = snippetAround(text, match);
        }

        results.push({ kind: 'image', key: image.name, snippet, image, record: null, line: null, lineIndex: null, match });
    }

    return results;
}

// ---------- records ----------

export function needsRecordTexts(filters: RecordSearchFilters): boolean {
    return filters.character !== undefined || filters.language !== undefined || filters.requested !== undefined;
}

export function searchRecords(
    records: readonly RecordEntry[],
    filters: RecordSearchFilters,
    texts: ReadonlyMap<string, RecordText> = new Map(),
): MatchResult[] {
    const patterns = compileAll(filters, ['title', 'name', 'chapter', 'iteration', 'character', 'language'] as const);
    const results: MatchResult[] = [];
    const usesText = needsRecordTexts(filters);

    for (const record of records) {
        if (!matches(patterns.get('title'), record.title)) continue;
        if (!matches(patterns.get('name'), record.name)) continue;
        if (!matches(patterns.get('chapter'), record.chapter)) continue;
        if (!matches(patterns.get('iteration'), record.iteration)) continue;
        if (filters.solved !== undefined && record.solved !== filters.solved) continue;

        if (usesText) {
            // Unsolved records have no text, so they never match content filters
            const text = texts.get(record.name);
            if (!text) continue;
            const character = patterns.get('character');
            if (character && !text.characters.some((c) => character.test(c))) continue;
            const language = patterns.get('language');
            if (language && !text.languages.some((l) => language.test(l))) continue;
            if (filters.requested !== undefined && text.requested !== filters.requested) continue;
        }

        results.push({ kind: 'record', key: record.name, snippet: null, image: null, record, line: null, lineIndex: null, match: null });
    }

    return results;
}

type LineField = 'text' | 'character' | 'language' | 'emphasis' | 'record';

function lineMatches(line: RecordLine, patterns: ReadonlyMap<LineField, RegExp>): boolean {
    return (
        matches(patterns.get('character'), line.character) &&
        matches(patterns.get('language'), line.language) &&
        matches(patterns.get('emphasis'), line.emphasis)
    );
}

/**
 * Lines across gathered record texts. Results are grouped by record in the
 * order the records are given.
 */
export function searchRecordLines(
    records: readonly RecordEntry[],
    texts: ReadonlyMap<string, RecordText>,
    filters: LineSearchFilters,
): MatchResult[] {
    const patterns = compileAll<LineField>(filters, ['text', 'character', 'language', 'emphasis', 'record']);
    const textPattern = patterns.get('text');
    const results: MatchResult[] = [];

    for (const record of records) {
        if (!matches(patterns.get('record'), record.name)) continue;
        const text = texts.get(record.name);
        if (!text) continue;

        for (const line of text.lines) {
            if (!lineMatches(line, patterns)) continue;

            let match: MatchSpan | null = null;
            let snippet: string | null = null;
            if (textPattern) {
                match = findSpan(textPattern, line.formattedText);
                if (!match) continue;
                snippet = snippetAround(line.formattedText, match);
            }

            results.push({ kind: 'record-line', key: record.name, snippet, image: null, record, line, lineIndex: line.index, match });
        }
    }

    return results;
}
