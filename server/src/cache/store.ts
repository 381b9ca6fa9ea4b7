import { CacheFetchError, PurgeCooldownError } from '../errors.js';
import type { ParseResult } from '../records/parse.js';
import type { CacheKind } from './kinds.js';

export type Decoder<T> = (source: unknown) => ParseResult<T>;

export interface CacheEntry<T> {
    value: T;
    /** Upstream payload the value was decoded from; this is what gets persisted */
    source: unknown;
    expiresAt: number;
}

/** Serializable form of one store */
export interface CacheContainer {
    version: number;
    purgeAllowedAt: number;
    purgeBlockReason: string | null;
    entries: { key: string; source: unknown; expiresAt: number }[];
}

export interface CacheStoreOptions<T> {
    decode: Decoder<T>;
    ttlMs: number;
    purgeCooldownMs: number;
}

export const RECENT_PURGE_REASON = 'Too soon since last cache purge';

/**
 * TTL store for one cache kind.
 * Expired entries are dropped lazily when read; purges are rate limited.
 */
export class CacheStore<T> {
    private entries = new Map<string, CacheEntry<T>>();
    private purgeAllowedAt = 0;
    private purgeBlockReason: string | null = null;

    constructor(readonly kind: CacheKind, private readonly options: CacheStoreOptions<T>) {}

    get ttlMs(): number {
        return this.options.ttlMs;
    }

    /** Cached value, or undefined if expired/missing */
    get(key: string): T | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;
        if (Date.now() >= entry.expiresAt) {
            this.entries.delete(key);
            return undefined;
        }
        return entry.value;
    }

    has(key: string): boolean {
        return this.get(key) !== undefined;
    }

    /** Insert or replace. A ttl of zero or less stores an entry that is never returned. */
    set(key: string, value: T, source: unknown, ttlMs: number = this.options.ttlMs): void {
        this.entries.set(key, { value, source, expiresAt: Date.now() + ttlMs });
    }

    delete(key: string): boolean {
        return this.entries.delete(key);
    }

    /** Keep only entries the predicate accepts. Not rate limited. Returns the number removed. */
    retain(predicate: (key: string, value: T) => boolean): number {
        let removed = 0;
        for (const [key, entry] of this.entries) {
            if (!predicate(key, entry.value)) {
                this.entries.delete(key);
                removed++;
            }
        }
        return removed;
    }

    /** Valid entries, evicting expired ones on the way */
    entriesMap(): Map<string, T> {
        const now = Date.now();
        const result = new Map<string, T>();
        for (const [key, entry] of this.entries) {
            if (now >= entry.expiresAt) this.entries.delete(key);
            else result.set(key, entry.value);
        }
        return result;
    }

    keys(): string[] {
        return [...this.entriesMap().keys()];
    }

    get size(): number {
        return this.entriesMap().size;
    }

    /** When the next purge is allowed and why it is blocked, or null if allowed now */
    purgeBlock(): { allowedAt: number; reason: string } | null {
        if (Date.now() >= this.purgeAllowedAt) return null;
        return { allowedAt: this.purgeAllowedAt, reason: this.purgeBlockReason ?? RECENT_PURGE_REASON };
    }

    /**
     * Remove one key, or every entry. Throws PurgeCooldownError inside the
     * cooldown window unless forced. Returns the number of entries removed.
     */
    purge(key?: string, options: { force?: boolean } = {}): number {
        const now = Date.now();
        const block = this.purgeBlock();
        if (block && !options.force) {
            throw new PurgeCooldownError(this.kind, block.allowedAt, now, block.reason);
        }

        let removed: number;
        if (key === undefined) {
            removed = this.entries.size;
            this.entries.clear();
        } else {
            removed = this.entries.delete(key) ? 1 : 0;
        }

        this.purgeAllowedAt = now + this.options.purgeCooldownMs;
        this.purgeBlockReason = RECENT_PURGE_REASON;
        return removed;
    }

    /** Extend the purge window. Never shortens it. */
    blockPurge(until: number, reason: string): void {
        if (until <= this.purgeAllowedAt) return;
        this.purgeAllowedAt = until;
        this.purgeBlockReason = reason;
    }

    toContainer(version: number): CacheContainer {
        const now = Date.now();
        const entries: CacheContainer['entries'] = [];
        for (const [key, entry] of this.entries) {
            if (now < entry.expiresAt) entries.push({ key, source: entry.source, expiresAt: entry.expiresAt });
        }
        return {
            version,
            purgeAllowedAt: this.purgeAllowedAt,
            purgeBlockReason: this.purgeBlockReason,
            entries,
        };
    }

    /**
     * Replace the contents with a persisted container.
     * Every source is decoded again; expired or undecodable entries are dropped.
     */
    restore(container: CacheContainer): { restored: number; dropped: number } {
        const now = Date.now();
        this.entries.clear();
        this.purgeAllowedAt = container.purgeAllowedAt;
        this.purgeBlockReason = container.purgeBlockReason;

        let dropped = 0;
        for (const { key, source, expiresAt } of container.entries) {
            const decoded = this.options.decode(source);
            if (now >= expiresAt || !decoded.ok) {
                dropped++;
                continue;
            }
            this.entries.set(key, { value: decoded.value, source, expiresAt });
        }
        return { restored: this.entries.size, dropped };
    }

    /** Drop everything, including the purge window */
    reset(): void {
        this.entries.clear();
        this.purgeAllowedAt = 0;
        this.purgeBlockReason = null;
    }
}

/** Validate the JSON text of a persisted container */
export function parseContainer(kind: CacheKind, text: string): CacheContainer {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (err) {
        throw new CacheFetchError(kind, 'invalid JSON', { cause: err });
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new CacheFetchError(kind, 'container is not an object');
    }

    const version = field(parsed, 'version');
    const purgeAllowedAt = field(parsed, 'purgeAllowedAt');
    const purgeBlockReason = field(parsed, 'purgeBlockReason');
    const rawEntries = field(parsed, 'entries');

    if (typeof version !== 'number') throw new CacheFetchError(kind, 'missing version');
    if (typeof purgeAllowedAt !== 'number') throw new CacheFetchError(kind, 'missing purge window');
    if (purgeBlockReason !== null && typeof purgeBlockReason !== 'string') {
        throw new CacheFetchError(kind, 'invalid purge reason');
    }
    if (!Array.isArray(rawEntries)) throw new CacheFetchError(kind, 'missing entries');

    const entries: CacheContainer['entries'] = rawEntries.map((item: unknown, i) => {
        if (typeof item !== 'object' || item === null) throw new CacheFetchError(kind, `entry ${i} is not an object`);
        const key = field(item, 'key');
        const expiresAt = field(item, 'expiresAt');
        if (typeof key !== 'string' || typeof expiresAt !== 'number') {
            throw new CacheFetchError(kind, `entry ${i} is malformed`);
        }
        return { key, source: field(item, 'source'), expiresAt };
    });

    return { version, purgeAllowedAt, purgeBlockReason, entries };
}

function field(obj: object, key: string): unknown {
    return key in obj ? Reflect.get(obj, key) : undefined;
}
