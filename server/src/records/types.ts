/**
 * Record types: normalized, immutable views of fractalthorns API payloads.
 * Records are replaced wholesale when refreshed, never patched.
 */

export interface NewsEntry {
    readonly title: string;
    readonly items: readonly string[];
    readonly date: string;
    readonly version: string | null;
}

export interface Image {
    /** Case-sensitive identifier */
    readonly name: string;
    readonly title: string;
    readonly date: string;
    readonly ordinal: number;
    readonly imageUrl: string;
    readonly thumbUrl: string;
    readonly canon: string | null;
    readonly hasDescription: boolean;
    readonly characters: readonly string[];
    readonly speedpaintVideoUrl: string | null;
    readonly primaryColor: string | null;
    readonly secondaryColor: string | null;
    /** Page for the image on the site */
    readonly imageLink: string;
}

export interface SpeedpaintAnnotation {
    /** Offset into the speedpaint video, in seconds */
    readonly time: number;
    readonly text: string;
}

export interface ImageDescription {
    readonly name: string;
    readonly title: string;
    readonly description: string | null;
    readonly annotations: readonly SpeedpaintAnnotation[] | null;
    readonly imageLink: string;
}

export interface Sketch {
    readonly name: string;
    readonly title: string;
    readonly date: string | null;
    readonly description: string | null;
    readonly imageUrl: string;
    readonly thumbUrl: string;
    readonly sketchLink: string;
}

export interface RecordEntry {
    readonly name: string;
    readonly title: string;
    readonly chapter: string;
    readonly solved: boolean;
    readonly iteration: string | null;
    readonly linkedPuzzles: readonly string[] | null;
    /** Only set once the record is solved */
    readonly recordLink: string | null;
    /** Only set while the record is unsolved */
    readonly puzzleLinks: readonly string[] | null;
}

export interface Chapter {
    /** Roman-numeral label, e.g. "iv" */
    readonly name: string;
    readonly records: readonly RecordEntry[];
}

export interface RecordLine {
    readonly recordName: string;
    readonly index: number;
    /** Speaker; null for narration blocks */
    readonly character: string | null;
    readonly language: string | null;
    readonly emphasis: string | null;
    readonly text: string;
    readonly formattedText: string;
}

export interface RecordText {
    readonly name: string;
    readonly title: string;
    readonly iteration: string;
    readonly headerLines: readonly string[];
    readonly languages: readonly string[];
    readonly characters: readonly string[];
    readonly requested: boolean;
    readonly lines: readonly RecordLine[];
    readonly recordLink: string;
}

export type MatchKind = 'image' | 'record' | 'record-line';

export interface MatchSpan {
    readonly start: number;
    readonly end: number;
}

export interface MatchResult {
    readonly kind: MatchKind;
    /** Name of the matched image or record */
    readonly key: string;
    readonly snippet: string | null;
    readonly image: Image | null;
    /** Parent record, for record and record-line matches */
    readonly record: RecordEntry | null;
    readonly line: RecordLine | null;
    readonly lineIndex: number | null;
    readonly match: MatchSpan | null;
}

export interface Splash {
    readonly text: string;
    readonly ordinal: number | null;
}

export interface SplashPage {
    readonly page: number;
    readonly splashes: readonly Splash[];
}
