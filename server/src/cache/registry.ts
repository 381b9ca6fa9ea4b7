import { CacheFetchError } from '../errors.js';
import type { CacheRepository } from '../db/db.js';
import type { Decoders } from '../records/parse.js';
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
import { CACHE_KINDS, CACHE_SCHEMA_VERSION, CACHE_TTLS, type CacheKind } from './kinds.js';
import { CacheStore, parseContainer, type Decoder } from './store.js';

/** Value type held by each kind's store */
export interface CacheValues {
    news: NewsEntry[];
    'image-list': Image[];
    images: Image;
    'image-descriptions': ImageDescription;
    'sketch-list': Sketch[];
    sketches: Sketch;
    chapters: Chapter[];
    records: RecordEntry;
    'record-texts': RecordText;
    'search-results': MatchResult[];
    splash: Splash;
    'splash-pages': SplashPage;
}

export type CacheStores = { [K in CacheKind]: CacheStore<CacheValues[K]> };

export type LoadOutcome = 'loaded' | 'missing' | 'version-mismatch' | 'failed';

export interface CacheKindStats {
    kind: CacheKind;
    entries: number;
    ttlMs: number;
    /** Epoch ms when purging is allowed again, or null if allowed now */
    purgeAllowedAt: number | null;
    purgeBlockReason: string | null;
}

export interface CacheRegistryOptions {
    purgeCooldownMs: number;
    ttls?: Partial<Record<CacheKind, number>>;
}

/** All cache stores of the process, with load/save through a CacheRepository */
export class CacheRegistry {
    readonly stores: CacheStores;

    constructor(private readonly repo: CacheRepository, decoders: Decoders, options: CacheRegistryOptions) {
        const make = <K extends CacheKind>(kind: K, decode: Decoder<CacheValues[K]>): CacheStore<CacheValues[K]> =>
            new CacheStore(kind, {
                decode,
                ttlMs: options.ttls?.[kind] ?? CACHE_TTLS[kind],
                purgeCooldownMs: options.purgeCooldownMs,
            });

        this.stores = {
            news: make('news', decoders.news),
            'image-list': make('image-list', decoders.imageList),
            images: make('images', decoders.image),
            'image-descriptions': make('image-descriptions', decoders.imageDescription),
            'sketch-list': make('sketch-list', decoders.sketchList),
            sketches: make('sketches', decoders.sketch),
            chapters: make('chapters', decoders.episodic),
            records: make('records', decoders.record),
            'record-texts': make('record-texts', decoders.recordText),
            'search-results': make('search-results', decoders.searchResults),
            splash: make('splash', decoders.splash),
            'splash-pages': make('splash-pages', decoders.splashPage),
        };
    }

    store<K extends CacheKind>(kind: K): CacheStores[K] {
        return this.stores[kind];
    }

    /**
     * Replace the in-memory stores with their durable copies.
     * Never throws: unreadable or outdated containers leave an empty store.
     */
    load(kinds: readonly CacheKind[] = CACHE_KINDS): Partial<Record<CacheKind, LoadOutcome>> {
        const outcomes: Partial<Record<CacheKind, LoadOutcome>> = {};

        for (const kind of kinds) {
            const store = this.stores[kind];
            store.reset();

            try {
                const row = this.repo.getContainer(kind);
                if (!row) {
                    outcomes[kind] = 'missing';
                    continue;
                }

                const container = parseContainer(kind, row.data);
                if (row.version !== CACHE_SCHEMA_VERSION || container.version !== CACHE_SCHEMA_VERSION) {
                    console.warn(`⚠️ Cache ${kind}: stored version ${row.version} does not match ${CACHE_SCHEMA_VERSION}, starting empty`);
                    outcomes[kind] = 'version-mismatch';
                    continue;
                }

                const { restored, dropped } = store.restore(container);
                console.log(`Cache ${kind}: restored ${restored} entries (${dropped} dropped)`);
                outcomes[kind] = 'loaded';
            } catch (err) {
                const error = err instanceof CacheFetchError
                    ? err
                    : new CacheFetchError(kind, err instanceof Error ? err.message : String(err), { cause: err });
                console.warn(`⚠️ ${error.message}, starting empty`);
                store.reset();
                outcomes[kind] = 'failed';
            }
        }

        return outcomes;
    }

    /** Write the given kinds in one transaction */
    save(kinds: readonly CacheKind[] = CACHE_KINDS): void {
        const containers = kinds.map((kind) => ({
            kind,
            version: CACHE_SCHEMA_VERSION,
            data: JSON.stringify(this.stores[kind].toContainer(CACHE_SCHEMA_VERSION)),
        }));
        this.repo.saveContainers(containers);
        console.log(`Cache saved: ${kinds.join(', ')}`);
    }

    stats(): CacheKindStats[] {
        return CACHE_KINDS.map((kind) => {
            const store = this.stores[kind];
            const block = store.purgeBlock();
            return {
                kind,
                entries: store.size,
                ttlMs: store.ttlMs,
                purgeAllowedAt: block ? block.allowedAt : null,
                purgeBlockReason: block ? block.reason : null,
            };
        });
    }
}
