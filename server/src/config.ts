import path from 'path';
import { fileURLToPath } from 'url';
import pkg from '../package.json' with { type: 'json' };

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DATA_DIR = path.join(__dirname, '..', '..', 'data');

/** Full, major.minor.patch and major.minor forms of a package version */
export function versionForms(version: string): { full: string; long: string; short: string } {
    const [core] = version.split(/[-+]/);
    const [major = '0', minor = '0', patch = '0'] = core.split('.');
    return { full: version, long: `${major}.${minor}.${patch}`, short: `${major}.${minor}` };
}

const VERSION = versionForms(pkg.version);
export const VERSION_FULL = VERSION.full;
export const VERSION_LONG = VERSION.long;
export const VERSION_SHORT = VERSION.short;

const DEFAULT_USER_AGENT = 'thorns-relay/{VERSION_SHORT}';

const HOUR = 60 * 60 * 1000;

export interface RelayConfig {
    /** Site root, e.g. https://fractalthorns.com */
    baseUrl: string;
    /** API prefix under the site root */
    apiPath: string;
    userAgent: string;
    maxConnectionsPerHost: number;
    requestTimeoutMs: number;
    splashApiKey: string | null;
    cacheDbPath: string;
    purgeCooldownMs: number;
    userPurgeCooldownMs: number;
    gatherCooldownMs: number;
    forcePurgeAllowed: string[];
    port: number;
}

/** Substitute {VERSION_FULL}, {VERSION_LONG} and {VERSION_SHORT} in a user-agent template */
export function expandUserAgent(template: string): string {
    return template
        .replaceAll('{VERSION_FULL}', VERSION_FULL)
        .replaceAll('{VERSION_LONG}', VERSION_LONG)
        .replaceAll('{VERSION_SHORT}', VERSION_SHORT);
}

/** Build the typed configuration from environment variables */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
    return {
        baseUrl: (env.FRACTALTHORNS_BASE_URL || 'https://fractalthorns.com').replace(/\/+$/, ''),
        apiPath: env.FRACTALTHORNS_API_PATH || '/api/v1/',
        userAgent: expandUserAgent(env.FRACTALTHORNS_USER_AGENT || DEFAULT_USER_AGENT),
        maxConnectionsPerHost: intFromEnv(env, 'FRACTALTHORNS_MAX_CONNECTIONS', 6, 1),
        requestTimeoutMs: intFromEnv(env, 'FRACTALTHORNS_TIMEOUT_MS', 30_000, 1),
        splashApiKey: env.SPLASH_API_KEY || null,
        cacheDbPath: env.CACHE_DB_PATH || path.join(DATA_DIR, 'cache.db'),
        purgeCooldownMs: intFromEnv(env, 'CACHE_PURGE_COOLDOWN_MS', HOUR, 0),
        userPurgeCooldownMs: intFromEnv(env, 'USER_PURGE_COOLDOWN_MS', 12 * HOUR, 0),
        gatherCooldownMs: intFromEnv(env, 'GATHER_COOLDOWN_MS', 72 * HOUR, 0),
        forcePurgeAllowed: idListFromEnv(env, 'FORCE_PURGE_ALLOWED'),
        port: intFromEnv(env, 'PORT', 3000, 0),
    };
}

function intFromEnv(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
    }
    return value;
}

/** FORCE_PURGE_ALLOWED is a JSON array of user ids, e.g. ["1234", "5678"] */
function idListFromEnv(env: NodeJS.ProcessEnv, name: string): string[] {
    const raw = env[name];
    if (!raw || raw.trim() === '') return [];

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (err) {
        throw new Error(`${name} must be a JSON array of ids`, { cause: err });
    }
    if (!Array.isArray(parsed)) throw new Error(`${name} must be a JSON array of ids`);
    return parsed.map((id) => String(id));
}
