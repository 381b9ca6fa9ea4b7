import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { CacheFetchError } from '../errors.js';
import type { CacheRepository, StoredContainer, UserCooldown } from './db.js';
import { SCHEMA_SQL } from './schema.js';

interface ContainerRow {
    kind: string;
    version: number;
    data: string;
    saved_at: string;
}

interface CooldownRow {
    user_id: string;
    action: string;
    used_at: number;
}

/**
 * SQLite implementation of CacheRepository.
 * Uses better-sqlite3 for synchronous, fast, zero-config persistence.
 * Pass ':memory:' for a throwaway database.
 */
export class SQLiteCacheRepository implements CacheRepository {
    private db: Database.Database;

    constructor(dbPath: string) {
        if (dbPath !== ':memory:') {
            // Ensure data directory exists
            const dir = path.dirname(dbPath);
            if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
        }

        this.db = new Database(dbPath);
        try {
            this.db.pragma('journal_mode = WAL');
        } catch (err) {
            this.db.close();
            throw err;
        }
    }

    init(): void {
        this.db.exec(SCHEMA_SQL);
        console.log(`SQLite cache database initialized at ${this.db.name}`);
    }

    getContainer(kind: string): StoredContainer | null {
        const row = this.db
            .prepare<[string], ContainerRow>('SELECT kind, version, data, saved_at FROM cache_containers WHERE kind = ?')
            .get(kind);
        return row ? { kind: row.kind, version: row.version, data: row.data, savedAt: row.saved_at } : null;
    }

    saveContainers(containers: { kind: string; version: number; data: string }[]): void {
        const upsert = this.db.prepare<[string, number, string]>(`
      INSERT INTO cache_containers (kind, version, data, saved_at)
      VALUES (?, ?, ?, datetime('now'))
      ON CONFLICT(kind) DO UPDATE SET
        version = excluded.version,
        data = excluded.data,
        saved_at = excluded.saved_at
    `);

        const tx = this.db.transaction((items: { kind: string; version: number; data: string }[]) => {
            for (const item of items) upsert.run(item.kind, item.version, item.data);
        });
        tx(containers);
    }

    getCooldowns(): UserCooldown[] {
        const rows = this.db.prepare<[], CooldownRow>('SELECT user_id, action, used_at FROM user_cooldowns').all();
        return rows.map((row) => ({ userId: row.user_id, action: row.action, usedAt: row.used_at }));
    }

    setCooldown(cooldown: UserCooldown): void {
        this.db
            .prepare<[string, string, number]>(`
      INSERT INTO user_cooldowns (user_id, action, used_at) VALUES (?, ?, ?)
      ON CONFLICT(user_id, action) DO UPDATE SET used_at = excluded.used_at
    `)
            .run(cooldown.userId, cooldown.action, cooldown.usedAt);
    }

    close(): void {
        this.db.close();
    }
}

function openAndInit(dbPath: string): SQLiteCacheRepository {
    const repo = new SQLiteCacheRepository(dbPath);
    try {
        repo.init();
    } catch (err) {
        repo.close();
        throw err;
    }
    return repo;
}

/**
 * Open and initialize the cache database. A file SQLite cannot read is
 * moved aside to `<path>.corrupt-<epoch ms>` and replaced by an empty one.
 */
export function openCacheRepository(dbPath: string): SQLiteCacheRepository {
    try {
        return openAndInit(dbPath);
    } catch (err) {
        if (dbPath === ':memory:') throw err;

        const moved = `${dbPath}.corrupt-${Date.now()}`;
        const failure = new CacheFetchError('database', err instanceof Error ? err.message : String(err), { cause: err });
        console.warn(`⚠️ ${failure.message}, moved to ${moved}, starting empty`);
        for (const suffix of ['', '-wal', '-shm']) {
            if (fs.existsSync(dbPath + suffix)) fs.renameSync(dbPath + suffix, moved + suffix);
        }
        return openAndInit(dbPath);
    }
}
