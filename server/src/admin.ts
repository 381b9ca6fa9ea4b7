import type { CacheRegistry } from './cache/registry.js';
import { CACHE_KINDS, type CacheKind } from './cache/kinds.js';
import type { CacheRepository } from './db/db.js';
import { GatherCooldownError, PurgeCooldownError, PurgeNotAllowedError } from './errors.js';
import type { FractalthornsClient, GatherReport } from './providers/fractalthorns.js';

export const USER_PURGE_REASON = 'Too soon since your last purge of this cache';

export interface PurgeRejection {
    kind: CacheKind;
    allowedAt: number;
    reason: string;
}

export interface PurgeReport {
    applied: CacheKind[];
    rejected: PurgeRejection[];
}

export interface PurgeControlsOptions {
    cache: CacheRegistry;
    client: FractalthornsClient;
    repo: CacheRepository;
    userPurgeCooldownMs: number;
    gatherCooldownMs: number;
    /** User ids allowed to force purges */
    forcePurgeAllowed: readonly string[];
}

const GATHER_ACTION = 'gather';

/**
 * Identity-gated cache invalidation.
 * Each user has their own cooldown per kind on top of the store's purge window.
 */
export class PurgeControls {
    private readonly usedAt = new Map<string, number>();

    constructor(private readonly options: PurgeControlsOptions) {}

    /** Restore user cooldowns from the repository */
    load(): void {
        this.usedAt.clear();
        for (const cooldown of this.options.repo.getCooldowns()) {
            this.usedAt.set(cooldownKey(cooldown.userId, cooldown.action), cooldown.usedAt);
        }
    }

    private allowedAt(userId: string, action: string, cooldownMs: number): number {
        const last = this.usedAt.get(cooldownKey(userId, action));
        return last === undefined ? 0 : last + cooldownMs;
    }

    private record(userId: string, action: string, now: number): void {
        this.usedAt.set(cooldownKey(userId, action), now);
        this.options.repo.setCooldown({ userId, action, usedAt: now });
    }

    /** Purge each kind the user may purge now; report the rest */
    purge(userId: string, kinds: readonly CacheKind[]): PurgeReport {
        const report: PurgeReport = { applied: [], rejected: [] };

        for (const kind of new Set(kinds)) {
            const now = Date.now();
            const action = `purge:${kind}`;
            const userAllowedAt = this.allowedAt(userId, action, this.options.userPurgeCooldownMs);
            if (now < userAllowedAt) {
                report.rejected.push({ kind, allowedAt: userAllowedAt, reason: USER_PURGE_REASON });
                continue;
            }

            try {
                this.options.cache.store(kind).purge();
            } catch (err) {
                if (!(err instanceof PurgeCooldownError)) throw err;
                report.rejected.push({ kind, allowedAt: err.allowedAt, reason: err.reason });
                continue;
            }

            this.record(userId, action, now);
            report.applied.push(kind);
        }

        if (report.applied.length > 0) {
            console.log(`🧹 ${userId} purged ${report.applied.join(', ')}`);
            this.options.cache.save(report.applied);
        }
        return report;
    }

    purgeAll(userId: string): PurgeReport {
        return this.purge(userId, CACHE_KINDS);
    }

    /** Purge ignoring every cooldown. Only for allow-listed users. */
    forcePurge(userId: string, kind: CacheKind): number {
        if (!this.options.forcePurgeAllowed.includes(userId)) throw new PurgeNotAllowedError(userId);

        const removed = this.options.cache.store(kind).purge(undefined, { force: true });
        console.log(`🧹 ${userId} force purged ${kind} (${removed} entries)`);
        this.options.cache.save([kind]);
        return removed;
    }

    /** Fetch every image description and record text, at most once per user per gather cooldown */
    async gather(userId: string): Promise<GatherReport> {
        const now = Date.now();
        const allowedAt = this.allowedAt(userId, GATHER_ACTION, this.options.gatherCooldownMs);
        if (now < allowedAt) throw new GatherCooldownError(allowedAt, now);

        const report = await this.options.client.gatherAll();
        this.record(userId, GATHER_ACTION, Date.now());
        console.log(`📦 ${userId} gathered ${report.imageDescriptions} descriptions and ${report.recordTexts} record texts`);
        this.options.client.save(['image-list', 'images', 'image-descriptions', 'chapters', 'records', 'record-texts']);
        return report;
    }
}

function cooldownKey(userId: string, action: string): string {
    return `${userId}\u0000${action}`;
}
