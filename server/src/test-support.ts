/**
 * In-process stand-ins for the upstream API, shared by the test files.
 */

import { CacheRegistry } from './cache/registry.js';
import { SQLiteCacheRepository } from './db/sqlite.js';
import { FractalthornsClient } from './providers/fractalthorns.js';
import { createDecoders, siteLinks, type Decoders } from './records/parse.js';
import { Transport, type FetchLike } from './transport.js';

export const TEST_BASE_URL = 'https://fractalthorns.test';
export const HOUR = 60 * 60 * 1000;

export interface FakeCall {
    endpoint: string;
    method: string;
    params: unknown;
    headers: Record<string, string>;
}

/** A handler returns a JSON payload, or a Response for anything else */
export type FakeHandler = (params: unknown) => unknown;

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json', ...headers } });
}

function headerRecord(headers: RequestInit['headers']): Record<string, string> {
    const record: Record<string, string> = {};
    new Headers(headers).forEach((value, key) => {
        record[key] = value;
    });
    return record;
}

/** Routes requests by endpoint name; unknown endpoints answer 404 */
export function fakeApi(handlers: Record<string, FakeHandler>) {
    const calls: FakeCall[] = [];

    const fetch: FetchLike = async (url, init) => {
        const parsed = new URL(url);
        const endpoint = parsed.pathname.replace(/^\/api\/v1\//, '');
        const method = init.method ?? 'GET';
        const raw = method === 'POST' ? String(init.body) : parsed.searchParams.get('body') ?? '{}';
        const params: unknown = JSON.parse(raw);
        calls.push({ endpoint, method, params, headers: headerRecord(init.headers) });

        const handler = handlers[endpoint];
        if (!handler) return new Response('', { status: 404 });
        const reply = handler(params);
        return reply instanceof Response ? reply : jsonResponse(reply);
    };

    return {
        fetch,
        calls,
        count: (endpoint: string) => calls.filter((call) => call.endpoint === endpoint).length,
    };
}

export interface TestClient {
    client: FractalthornsClient;
    cache: CacheRegistry;
    repo: SQLiteCacheRepository;
    decoders: Decoders;
    api: ReturnType<typeof fakeApi>;
}

export function createTestClient(handlers: Record<string, FakeHandler>, options: { splashApiKey?: string } = {}): TestClient {
    const api = fakeApi(handlers);
    const repo = new SQLiteCacheRepository(':memory:');
    repo.init();
    const decoders = createDecoders(siteLinks(TEST_BASE_URL));
    const cache = new CacheRegistry(repo, decoders, { purgeCooldownMs: HOUR });
    const transport = new Transport({
        baseUrl: TEST_BASE_URL,
        apiPath: '/api/v1/',
        userAgent: 'thorns-relay/test',
        maxConnectionsPerHost: 6,
        timeoutMs: 5_000,
        fetch: api.fetch,
    });
    const client = new FractalthornsClient({
        transport,
        cache,
        decoders,
        purgeCooldownMs: HOUR,
        splashApiKey: options.splashApiKey,
    });
    return { client, cache, repo, decoders, api };
}

// ---------- payload builders ----------

export function imagePayload(name: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        name,
        title: `${name} title`,
        date: '2024-01-01',
        ordinal: 1,
        image_url: `/images/${name}.png`,
        thumb_url: `/images/${name}_thumb.png`,
        canon: null,
        has_description: true,
        characters: ['aetol'],
        speedpaint_video_url: null,
        primary_color: '#112233',
        secondary_color: '#445566',
        ...overrides,
    };
}

export function recordPayload(name: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        name,
        title: `${name} title`,
        chapter: 'i',
        solved: true,
        iteration: '1',
        linked_puzzles: null,
        ...overrides,
    };
}

export function episodicPayload(chapters: { name: string; records: Record<string, unknown>[] }[]): Record<string, unknown> {
    return { chapters };
}

export function recordTextPayload(lines: { character?: string | null; text: string; language?: string | null }[], headerLines: string[] = ['requested by a reader']): Record<string, unknown> {
    return {
        iteration: '1',
        header_lines: headerLines,
        languages: ['common'],
        characters: ['aetol', 'velika'],
        lines: lines.map((line) => ({
            character: line.character ?? null,
            language: line.language ?? null,
            emphasis: null,
            text: line.text,
        })),
    };
}
