import { describe, expect, it } from 'vitest';
import { InvalidSearchPatternError } from '../errors.js';
import type { Image, ImageDescription, RecordEntry, RecordText } from '../records/types.js';
import { searchImages, searchRecordLines, searchRecords, snippetAround } from './search.js';

function image(name: string, overrides: Partial<Image> = {}): Image {
    return {
        name,
        title: `${name} title`,
        date: '2024-01-01',
        ordinal: 1,
        imageUrl: `https://x.test/${name}.png`,
        thumbUrl: `https://x.test/${name}_t.png`,
        canon: null,
        hasDescription: true,
        characters: [],
        speedpaintVideoUrl: null,
        primaryColor: null,
        secondaryColor: null,
        imageLink: `https://x.test/image/${name}`,
        ...overrides,
    };
}

function record(name: string, overrides: Partial<RecordEntry> = {}): RecordEntry {
    return {
        name,
        title: `${name} title`,
        chapter: 'i',
        solved: true,
        iteration: '1',
        linkedPuzzles: null,
        recordLink: `https://x.test/episodic/${name}`,
        puzzleLinks: null,
        ...overrides,
    };
}

function text(name: string, lines: { character: string | null; text: string }[], overrides: Partial<RecordText> = {}): RecordText {
    return {
        name,
        title: `${name} title`,
        iteration: '1',
        headerLines: [],
        languages: ['common'],
        characters: ['aetol'],
        requested: true,
        lines: lines.map((line, index) => ({
            recordName: name,
            index,
            character: line.character,
            language: null,
            emphasis: null,
            text: line.text,
            formattedText: line.text,
        })),
        recordLink: `https://x.test/episodic/${name}`,
        ...overrides,
    };
}

describe('searchImages', () => {
    const images = [
        image('vertigo', { characters: ['Aetol'], canon: 'moth' }),
        image('dawn', { characters: ['velika'], hasDescription: false }),
    ];

    it('filters case-insensitively by regex', () => {
        expect(searchImages(images, { character: '^aetol$' }).map((r) => r.key)).toEqual(['vertigo']);
        expect(searchImages(images, { title: 'DAWN' }).map((r) => r.key)).toEqual(['dawn']);
        expect(searchImages(images, { hasDescription: false }).map((r) => r.key)).toEqual(['dawn']);
    });

    it('reports the description match with a snippet', () => {
        const descriptions = new Map<string, ImageDescription>([
            ['vertigo', { name: 'vertigo', title: 'vertigo title', description: 'a long fall through the clouds', annotations: null, imageLink: '' }],
        ]);
        const [result] = searchImages(images, { description: 'fall' }, descriptions);

        expect(result.kind).toBe('image');
        expect(result.match).toEqual({ start: 7, end: 11 });
        expect(result.snippet).toBe('a long fall through the clouds');
    });

    it('rejects invalid patterns', () => {
        expect(() => searchImages(images, { title: '(' })).toThrow(InvalidSearchPatternError);
    });
});

describe('searchRecords', () => {
    const records = [record('dawn'), record('dusk', { solved: false, recordLink: null }), record('noon', { chapter: 'ii' })];

    it('filters by metadata', () => {
        expect(searchRecords(records, { solved: false }).map((r) => r.key)).toEqual(['dusk']);
        expect(searchRecords(records, { chapter: 'ii' }).map((r) => r.key)).toEqual(['noon']);
    });

    it('filters by contents when texts are given', () => {
        const texts = new Map([
            ['dawn', text('dawn', [], { requested: false })],
            ['noon', text('noon', [], { characters: ['velika'] })],
        ]);
        expect(searchRecords(records, { requested: false }, texts).map((r) => r.key)).toEqual(['dawn']);
        expect(searchRecords(records, { character: 'velika' }, texts).map((r) => r.key)).toEqual(['noon']);
    });
});

describe('searchRecordLines', () => {
    it('returns matching lines grouped under their record', () => {
        const records = [record('dawn'), record('noon')];
        const texts = new Map([
            ['dawn', text('dawn', [{ character: 'aetol', text: 'the sun rises' }, { character: null, text: 'silence' }])],
            ['noon', text('noon', [{ character: 'velika', text: 'sun overhead' }])],
        ]);

        const results = searchRecordLines(records, texts, { text: 'sun' });
        expect(results.map((r) => [r.kind, r.key, r.lineIndex, r.match])).toEqual([
            ['record-line', 'dawn', 0, { start: 4, end: 7 }],
            ['record-line', 'noon', 0, { start: 0, end: 3 }],
        ]);
        expect(results[0].record?.name).toBe('dawn');

        expect(searchRecordLines(records, texts, { text: 'sun', character: 'velika' }).map((r) => r.key)).toEqual(['noon']);
    });
});

describe('snippetAround', () => {
    it('cuts long text around the match', () => {
        const long = `${'a'.repeat(50)}MATCH${'b'.repeat(50)}`;
        expect(snippetAround(long, { start: 50, end: 55 }, 3)).toBe('…aaaMATCHbbb…');
    });
});
