/** Every cached entity kind, one store (and one durable container) each */
export const CACHE_KINDS = [
    'news',
    'image-list',
    'images',
    'image-descriptions',
    'sketch-list',
    'sketches',
    'chapters',
    'records',
    'record-texts',
    'search-results',
    'splash',
    'splash-pages',
] as const;

export type CacheKind = (typeof CACHE_KINDS)[number];

/** Bump when the container layout or any decoded record shape changes */
export const CACHE_SCHEMA_VERSION = 1;

/** Key for kinds that hold a single blob */
export const ALL = 'all';

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

export const CACHE_TTLS: Record<CacheKind, number> = {
    news: 24 * HOUR,
    'image-list': 12 * HOUR,
    images: 12 * HOUR,
    'image-descriptions': 12 * HOUR,
    'sketch-list': 12 * HOUR,
    sketches: 12 * HOUR,
    chapters: 12 * HOUR,
    records: 12 * HOUR,
    'record-texts': 6 * HOUR,
    'search-results': HOUR,
    splash: 5 * MINUTE,
    'splash-pages': HOUR,
};

export function isCacheKind(value: string): value is CacheKind {
    return CACHE_KINDS.some((kind) => kind === value);
}
