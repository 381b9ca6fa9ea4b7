import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CacheRegistry } from '../cache/registry.js';
import { createDecoders, siteLinks } from '../records/parse.js';
import { openCacheRepository, type SQLiteCacheRepository } from './sqlite.js';

const decoders = createDecoders(siteLinks('https://fractalthorns.test'));

describe('openCacheRepository', () => {
    let dir: string;
    let dbPath: string;
    let repo: SQLiteCacheRepository | null;

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'thorns-relay-'));
        dbPath = path.join(dir, 'cache.db');
        repo = null;
    });

    afterEach(() => {
        repo?.close();
        fs.rmSync(dir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    it('keeps containers across reopening', () => {
        repo = openCacheRepository(dbPath);
        repo.saveContainers([{ kind: 'news', version: 1, data: '{}' }]);
        repo.close();

        repo = openCacheRepository(dbPath);
        expect(repo.getContainer('news')).toMatchObject({ kind: 'news', version: 1, data: '{}' });
    });

    it('moves an unreadable file aside and starts empty', () => {
        const garbage = 'not a database\n'.repeat(700);
        fs.writeFileSync(dbPath, garbage);

        repo = openCacheRepository(dbPath);
        const cache = new CacheRegistry(repo, decoders, { purgeCooldownMs: 0 });
        cache.load();

        expect(repo.getContainer('news')).toBeNull();
        expect(cache.store('news').size).toBe(0);

        const moved = fs.readdirSync(dir).filter((name) => name.startsWith('cache.db.corrupt-'));
        expect(moved).toHaveLength(1);
        expect(fs.readFileSync(path.join(dir, moved[0]), 'utf8')).toBe(garbage);
        expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('Could not read cached database'));
    });
});
