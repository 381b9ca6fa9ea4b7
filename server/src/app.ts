import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { PurgeControls } from './admin.js';
import type { CacheRegistry } from './cache/registry.js';
import { isCacheKind, type CacheKind } from './cache/kinds.js';
import {
    APIError,
    DeserializeError,
    GatherCooldownError,
    InvalidArgumentError,
    InvalidSearchPatternError,
    InvalidSearchTypeError,
    ItemsUngatheredError,
    NotFoundError,
    PurgeCooldownError,
    PurgeNotAllowedError,
    RelayError,
    SubmissionRejectedError,
    TransportError,
} from './errors.js';
import type { FractalthornsClient } from './providers/fractalthorns.js';

export interface AppDeps {
    client: FractalthornsClient;
    admin: PurgeControls;
    cache: CacheRegistry;
}

/** Produces the JSON body of a successful response */
type Handler = (req: Request) => unknown;

// ---------- helpers ----------

function queryString(req: Request, name: string): string | undefined {
    const value = req.query[name];
    return typeof value === 'string' && value !== '' ? value : undefined;
}

function queryBoolean(req: Request, name: string): boolean | undefined {
    const value = queryString(req, name);
    if (value === undefined) return undefined;
    if (value === 'true') return true;
    if (value === 'false') return false;
    throw new InvalidArgumentError(`${name} must be true or false`);
}

function queryInt(req: Request, name: string): number | undefined {
    const value = queryString(req, name);
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) throw new InvalidArgumentError(`${name} must be an integer`);
    return parsed;
}

function bodyString(req: Request, name: string): string {
    const body: unknown = req.body;
    const value: unknown = typeof body === 'object' && body !== null ? Reflect.get(body, name) : undefined;
    if (typeof value !== 'string' || value === '') throw new InvalidArgumentError(`Missing ${name}`);
    return value;
}

function bodyKinds(req: Request): CacheKind[] | null {
    const body: unknown = req.body;
    const value: unknown = typeof body === 'object' && body !== null ? Reflect.get(body, 'kinds') : undefined;
    if (value === undefined || value === null) return null;
    if (!Array.isArray(value)) throw new InvalidArgumentError('kinds must be an array');

    return value.map((kind: unknown) => {
        if (typeof kind !== 'string' || !isCacheKind(kind)) throw new InvalidArgumentError(`Unknown cache kind: ${String(kind)}`);
        return kind;
    });
}

/** Status code for an error, plus Retry-After seconds where one applies */
export function errorStatus(err: unknown): { status: number; retryAfter: number | null } {
    if (err instanceof NotFoundError) return { status: 404, retryAfter: null };
    // Malformed JSON request bodies
    if (err instanceof SyntaxError) return { status: 400, retryAfter: null };
    if (
        err instanceof SubmissionRejectedError ||
        err instanceof InvalidArgumentError ||
        err instanceof InvalidSearchPatternError ||
        err instanceof InvalidSearchTypeError
    ) {
        return { status: 400, retryAfter: null };
    }
    if (err instanceof ItemsUngatheredError) return { status: 409, retryAfter: null };
    if (err instanceof PurgeCooldownError || err instanceof GatherCooldownError) {
        return { status: 429, retryAfter: Math.ceil(err.remainingMs / 1000) };
    }
    if (err instanceof PurgeNotAllowedError) return { status: 403, retryAfter: null };
    if (err instanceof APIError) return { status: 502, retryAfter: err.retryAfterSeconds };
    if (err instanceof TransportError || err instanceof DeserializeError) return { status: 502, retryAfter: null };
    return { status: 500, retryAfter: null };
}

// ---------- app ----------

export function createApp({ client, admin, cache }: AppDeps): express.Express {
    const app = express();
    app.use(cors());
    app.use(express.json());

    /** Run a handler, persist the kinds it may have filled, then respond */
    const route = (kinds: readonly CacheKind[], handler: Handler, status = 200) =>
        async (req: Request, res: Response, next: NextFunction): Promise<void> => {
            try {
                const body: unknown = await handler(req);
                if (kinds.length > 0) client.save(kinds);
                res.status(status).json(body);
            } catch (err) {
                next(err);
            }
        };

    // ---------- news ----------

    app.get('/api/news', route(['news'], async () => {
        return client.getAllNews();
    }));

    // ---------- images ----------

    app.get('/api/images', route(['image-list', 'images', 'image-descriptions'], async () => {
        return client.getAllImages();
    }));

    app.get('/api/images/search', route(['image-list', 'images', 'image-descriptions'], async (req) => {
        return client.searchImages({
            title: queryString(req, 'title'),
            name: queryString(req, 'name'),
            canon: queryString(req, 'canon'),
            character: queryString(req, 'character'),
            hasDescription: queryBoolean(req, 'hasDescription'),
            speedpaint: queryBoolean(req, 'speedpaint'),
            description: queryString(req, 'description'),
        });
    }));

    app.get('/api/images/:name', route(['image-list', 'images', 'image-descriptions'], async (req) => {
        return client.getSingleImage(req.params.name);
    }));

    app.get('/api/images/:name/description', route(['image-list', 'images', 'image-descriptions'], async (req) => {
        return client.getImageDescription(req.params.name);
    }));

    // ---------- sketches ----------

    app.get('/api/sketches', route(['sketch-list', 'sketches'], async () => {
        return client.getAllSketches();
    }));

    app.get('/api/sketches/:name', route(['sketch-list', 'sketches'], async (req) => {
        return client.getSingleSketch(req.params.name);
    }));

    // ---------- episodic ----------

    app.get('/api/chapters', route(['chapters', 'records', 'record-texts'], async () => {
        return client.getFullEpisodic();
    }));

    app.get('/api/chapters/:label', route(['chapters', 'records', 'record-texts'], async (req) => {
        return client.getChapter(req.params.label);
    }));

    app.get('/api/records/search', route(['chapters', 'records', 'record-texts'], async (req) => {
        return client.searchRecords({
            title: queryString(req, 'title'),
            name: queryString(req, 'name'),
            chapter: queryString(req, 'chapter'),
            iteration: queryString(req, 'iteration'),
            solved: queryBoolean(req, 'solved'),
            character: queryString(req, 'character'),
            language: queryString(req, 'language'),
            requested: queryBoolean(req, 'requested'),
        });
    }));

    app.get('/api/records/lines', route(['chapters', 'records', 'record-texts'], async (req) => {
        return client.searchRecordLines({
            text: queryString(req, 'text'),
            character: queryString(req, 'character'),
            language: queryString(req, 'language'),
            emphasis: queryString(req, 'emphasis'),
            record: queryString(req, 'record'),
        });
    }));

    app.get('/api/records/:name', route(['records'], async (req) => {
        return client.getSingleRecord(req.params.name);
    }));

    app.get('/api/records/:name/text', route(['records', 'record-texts'], async (req) => {
        return client.getRecordText(req.params.name);
    }));

    // ---------- search ----------

    app.get('/api/search', route(['search-results'], async (req) => {
        const term = queryString(req, 'term');
        const type = queryString(req, 'type');
        if (!term || !type) throw new InvalidArgumentError('term and type are required');
        return client.domainSearch(term, type, { limit: queryInt(req, 'limit') });
    }));

    // ---------- splashes ----------

    app.get('/api/splash', route(['splash'], async () => {
        return client.getCurrentSplash();
    }));

    app.get('/api/splash/pages/:page', route(['splash-pages'], async (req) => {
        return client.getPagedSplashes(Number(req.params.page));
    }));

    app.post('/api/splash', route(['splash-pages'], async (req) => {
        await client.submitSplash(bodyString(req, 'text'), bodyString(req, 'userName'), bodyString(req, 'userId'));
        return { submitted: true };
    }, 201));

    // ---------- admin ----------

    app.post('/api/admin/purge', route([], (req) => {
        const userId = bodyString(req, 'userId');
        const kinds = bodyKinds(req);
        return kinds ? admin.purge(userId, kinds) : admin.purgeAll(userId);
    }));

    app.post('/api/admin/force-purge', route([], (req) => {
        const userId = bodyString(req, 'userId');
        const kind = bodyString(req, 'kind');
        if (!isCacheKind(kind)) throw new InvalidArgumentError(`Unknown cache kind: ${kind}`);
        return { kind, removed: admin.forcePurge(userId, kind) };
    }));

    app.post('/api/admin/gather', route([], async (req) => {
        return admin.gather(bodyString(req, 'userId'));
    }));

    app.get('/api/admin/cache', route([], () => {
        return cache.stats();
    }));

    // ---------- errors ----------

    app.use((_req: Request, res: Response) => {
        res.status(404).json({ error: 'Not found', code: 'RouteNotFound' });
    });

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        const { status, retryAfter } = errorStatus(err);
        if (retryAfter !== null) res.setHeader('Retry-After', String(retryAfter));

        if (status === 500) {
            console.error('❌ Unhandled error:', err);
            res.status(500).json({ error: 'Internal server error', code: 'InternalError' });
            return;
        }

        const error = err instanceof Error ? err.message : String(err);
        const code = err instanceof RelayError ? err.name : 'Error';
        res.status(status).json({ error, code });
    });

    return app;
}
