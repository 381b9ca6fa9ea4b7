/**
 * Error taxonomy for the relay.
 * Every failure surfaced to callers is one of these classes; the HTTP layer
 * maps them to status codes in app.ts.
 */

export class RelayError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

// ---------- transport ----------

/** Network failure, timeout, or unusable response from the upstream API */
export class TransportError extends RelayError {
    readonly timedOut: boolean;

    constructor(message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
        super(message, { cause: options.cause });
        this.timedOut = options.timedOut ?? false;
    }
}

/** Upstream answered with a non-2xx status */
export class APIError extends TransportError {
    readonly status: number;
    readonly body: string | null;
    readonly retryAfterSeconds: number | null;

    constructor(status: number, message: string, body: string | null, retryAfterSeconds: number | null = null) {
        super(message);
        this.status = status;
        this.body = body;
        this.retryAfterSeconds = retryAfterSeconds;
    }
}

/**
 * A submission was refused with 400. The upstream body is dropped on purpose:
 * it may describe another user's submission.
 */
export class SubmissionRejectedError extends APIError {
    constructor() {
        super(400, 'The submission was not accepted', null);
    }
}

export class UnknownRequestTypeError extends RelayError {
    readonly method: string;

    constructor(method: string) {
        super(`Unknown request type: ${method}`);
        this.method = method;
    }
}

// ---------- lookups ----------

export class NotFoundError extends RelayError {
    readonly kind: string;
    readonly key: string;

    constructor(kind: string, key: string, detail?: string) {
        super(detail ? `${kind} not found: ${key} (${detail})` : `${kind} not found: ${key}`);
        this.kind = kind;
        this.key = key;
    }
}

export class ImageNotFoundError extends NotFoundError {
    constructor(name: string) {
        super('image', name);
    }
}

export class SketchNotFoundError extends NotFoundError {
    constructor(name: string) {
        super('sketch', name);
    }
}

export class ChapterNotFoundError extends NotFoundError {
    constructor(label: string) {
        super('chapter', label);
    }
}

export class RecordNotFoundError extends NotFoundError {
    constructor(name: string, detail?: string) {
        super('record', name, detail);
    }
}

export class SplashNotFoundError extends NotFoundError {
    constructor(key: string) {
        super('splash', key);
    }
}

/** A composed result needs items that have not been gathered into the cache yet */
export class ItemsUngatheredError extends RelayError {
    readonly kind: string;
    readonly missing: number;

    constructor(kind: string, missing: number) {
        super(`${missing} ${kind} item(s) have not been gathered yet`);
        this.kind = kind;
        this.missing = missing;
    }
}

// ---------- cache ----------

export class PurgeCooldownError extends RelayError {
    readonly kind: string;
    readonly allowedAt: number;
    readonly remainingMs: number;
    readonly reason: string;

    constructor(kind: string, allowedAt: number, now: number, reason: string) {
        const remainingMs = Math.max(0, allowedAt - now);
        super(`Cannot purge ${kind} yet: ${reason} (try again in ${Math.ceil(remainingMs / 1000)}s)`);
        this.kind = kind;
        this.allowedAt = allowedAt;
        this.remainingMs = remainingMs;
        this.reason = reason;
    }
}

export class GatherCooldownError extends RelayError {
    readonly allowedAt: number;
    readonly remainingMs: number;

    constructor(allowedAt: number, now: number) {
        const remainingMs = Math.max(0, allowedAt - now);
        super(`Gathering was used too recently (try again in ${Math.ceil(remainingMs / 1000)}s)`);
        this.allowedAt = allowedAt;
        this.remainingMs = remainingMs;
    }
}

export class PurgeNotAllowedError extends RelayError {
    readonly userId: string;

    constructor(userId: string) {
        super(`User ${userId} may not force purge`);
        this.userId = userId;
    }
}

/** The durable copy of a cache kind could not be read. Never fatal. */
export class CacheFetchError extends RelayError {
    readonly kind: string;

    constructor(kind: string, message: string, options?: { cause?: unknown }) {
        super(`Could not read cached ${kind}: ${message}`, options);
        this.kind = kind;
    }
}

// ---------- input / payloads ----------

export class DeserializeError extends RelayError {
    readonly path: string;

    constructor(path: string, expected: string) {
        super(`Invalid payload at ${path}: expected ${expected}`);
        this.path = path;
    }
}

export class InvalidSearchPatternError extends RelayError {
    readonly field: string;
    readonly pattern: string;

    constructor(field: string, pattern: string, options?: { cause?: unknown }) {
        super(`The ${field} pattern is not a valid regular expression: ${pattern}`, options);
        this.field = field;
        this.pattern = pattern;
    }
}

export class InvalidSearchTypeError extends RelayError {
    readonly type: string;

    constructor(type: string) {
        super(`Not a valid search type: ${type}`);
        this.type = type;
    }
}

export class InvalidArgumentError extends RelayError {}
