import 'dotenv/config';
import { PurgeControls } from './admin.js';
import { createApp } from './app.js';
import { CacheRegistry } from './cache/registry.js';
import { loadConfig } from './config.js';
import { openCacheRepository } from './db/sqlite.js';
import { FractalthornsClient } from './providers/fractalthorns.js';
import { createDecoders, siteLinks } from './records/parse.js';
import { Transport } from './transport.js';

const config = loadConfig();

// Initialize repository
const repo = openCacheRepository(config.cacheDbPath);

const decoders = createDecoders(siteLinks(config.baseUrl));
const cache = new CacheRegistry(repo, decoders, { purgeCooldownMs: config.purgeCooldownMs });
cache.load();

const transport = new Transport({
    baseUrl: config.baseUrl,
    apiPath: config.apiPath,
    userAgent: config.userAgent,
    maxConnectionsPerHost: config.maxConnectionsPerHost,
    timeoutMs: config.requestTimeoutMs,
});

const client = new FractalthornsClient({
    transport,
    cache,
    decoders,
    purgeCooldownMs: config.purgeCooldownMs,
    splashApiKey: config.splashApiKey,
});

const admin = new PurgeControls({
    cache,
    client,
    repo,
    userPurgeCooldownMs: config.userPurgeCooldownMs,
    gatherCooldownMs: config.gatherCooldownMs,
    forcePurgeAllowed: config.forcePurgeAllowed,
});
admin.load();

const app = createApp({ client, admin, cache });

const server = app.listen(config.port, () => {
    console.log(`Fractalthorns relay running on http://localhost:${config.port} (user agent "${config.userAgent}")`);
});

// ---------- shutdown ----------

function shutdown(signal: string): void {
    console.log(`${signal} received, saving cache`);
    server.close();
    try {
        cache.save();
    } finally {
        repo.close();
    }
    process.exit(0);
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
