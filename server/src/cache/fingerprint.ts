/**
 * Cache keys for parameterized queries.
 * Equivalent queries (key order, case, surrounding whitespace) map to the same key.
 */

export type QueryValue = string | number | boolean | null | undefined | QueryValue[] | { [key: string]: QueryValue };
export type QueryParams = Record<string, QueryValue>;

export function fingerprint(endpoint: string, params: QueryParams = {}): string {
    const normalized = normalizeParams(params);
    const entries = Object.keys(normalized)
        .sort()
        .map((key) => `${encodeURIComponent(key)}=${encodeURIComponent(stableStringify(normalized[key]))}`);
    return entries.length ? `${endpoint}?${entries.join('&')}` : endpoint;
}

/** Drop null/undefined params */
export function normalizeParams(params: QueryParams): QueryParams {
    const normalized: QueryParams = {};
    for (const [key, value] of Object.entries(params)) {
        if (value === null || value === undefined) continue;
        normalized[key] = value;
    }
    return normalized;
}

export function normalizeText(value: string): string {
    return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function stableStringify(value: QueryValue): string {
    if (value === null || value === undefined) return '';
    if (typeof value === 'string') return normalizeText(value);
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    if (Array.isArray(value)) {
        return `[${value.map((item) => stableStringify(item)).join(',')}]`;
    }
    const props = Object.keys(value)
        .sort()
        .map((key) => `${key}:${stableStringify(value[key])}`);
    return `{${props.join(',')}}`;
}
