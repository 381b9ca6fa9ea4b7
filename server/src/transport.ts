import { Semaphore } from './concurrency.js';
import { APIError, SubmissionRejectedError, TransportError, UnknownRequestTypeError } from './errors.js';

export type RequestMethod = 'GET' | 'POST';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface TransportOptions {
    baseUrl: string;
    apiPath: string;
    userAgent: string;
    maxConnectionsPerHost: number;
    timeoutMs: number;
    /** Defaults to the global fetch */
    fetch?: FetchLike;
}

export interface RequestOptions {
    headers?: Record<string, string>;
    /** A 400 answer becomes SubmissionRejectedError */
    submission?: boolean;
}

export type RequestParams = Record<string, string | number | boolean | null>;

function isRequestMethod(method: string): method is RequestMethod {
    return method === 'GET' || method === 'POST';
}

function parseRetryAfter(header: string | null): number | null {
    if (!header) return null;
    const seconds = Number(header);
    if (Number.isFinite(seconds)) return Math.max(0, seconds);
    const date = Date.parse(header);
    return Number.isNaN(date) ? null : Math.max(0, Math.ceil((date - Date.now()) / 1000));
}

/**
 * HTTP access to the fractalthorns API.
 * Caps in-flight requests per host and aborts requests that outlive the timeout.
 * Never retries.
 */
export class Transport {
    private readonly hosts = new Map<string, Semaphore>();
    private readonly fetchFn: FetchLike;

    constructor(private readonly options: TransportOptions) {
        this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    }

    /** The semaphore guarding one remote host */
    limiter(host: string): Semaphore {
        let semaphore = this.hosts.get(host);
        if (!semaphore) {
            semaphore = new Semaphore(this.options.maxConnectionsPerHost);
            this.hosts.set(host, semaphore);
        }
        return semaphore;
    }

    /**
     * GET sends the params JSON-encoded in the `body` query parameter.
     * POST sends them as a JSON body. Resolves to the decoded JSON payload (null when empty).
     */
    async request(method: string, endpoint: string, params: RequestParams = {}, options: RequestOptions = {}): Promise<unknown> {
        if (!isRequestMethod(method)) throw new UnknownRequestTypeError(method);

        const url = new URL(`${this.options.baseUrl}${this.options.apiPath}${endpoint}`);
        const headers: Record<string, string> = {
            'User-Agent': this.options.userAgent,
            Accept: 'application/json',
            ...options.headers,
        };
        const init: RequestInit = { method, headers };

        if (method === 'GET') {
            url.searchParams.set('body', JSON.stringify(params));
        } else {
            headers['Content-Type'] = 'application/json';
            init.body = JSON.stringify(params);
        }

        return this.limiter(url.host).run(() => this.send(method, url, init, options));
    }

    private async send(method: RequestMethod, url: URL, init: RequestInit, options: RequestOptions): Promise<unknown> {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
        const label = `${method} ${url.pathname}`;

        let res: Response;
        let text: string;
        try {
            res = await this.fetchFn(url.toString(), { ...init, signal: controller.signal });
            text = await res.text();
        } catch (err) {
            if (controller.signal.aborted) {
                console.error(`❌ ${label} timed out after ${this.options.timeoutMs}ms`);
                throw new TransportError(`${label} timed out after ${this.options.timeoutMs}ms`, { cause: err, timedOut: true });
            }
            console.error(`❌ ${label} failed:`, err instanceof Error ? err.message : err);
            throw new TransportError(`${label} failed`, { cause: err });
        } finally {
            clearTimeout(timer);
        }

        if (!res.ok) {
            if (res.status === 400 && options.submission) throw new SubmissionRejectedError();
            console.error(`❌ ${label} returned ${res.status}`);
            throw new APIError(
                res.status,
                `${label} returned ${res.status}`,
                text || null,
                parseRetryAfter(res.headers.get('Retry-After')),
            );
        }

        if (!text) return null;
        try {
            return JSON.parse(text);
        } catch (err) {
            throw new TransportError(`${label} returned invalid JSON`, { cause: err });
        }
    }
}
