import { describe, expect, it } from 'vitest';
import { fingerprint, stableStringify } from './fingerprint.js';

describe('fingerprint', () => {
    it('ignores parameter order, case and surrounding whitespace', () => {
        const a = fingerprint('domain_search', { term: 'Foo', type: 'image' });
        const b = fingerprint('domain_search', { type: 'image', term: ' foo ' });
        expect(a).toBe(b);
    });

    it('drops null/undefined params and collapses inner whitespace', () => {
        const key = fingerprint('domain_search', { term: 'Foo  Bar', type: 'image', page: null, limit: undefined });
        expect(key).toBe('domain_search?term=foo%20bar&type=image');
    });

    it('is the bare endpoint without params', () => {
        expect(fingerprint('all_news')).toBe('all_news');
    });

    it('keeps different terms apart', () => {
        expect(fingerprint('domain_search', { term: 'foo' })).not.toBe(fingerprint('domain_search', { term: 'food' }));
    });
});

describe('stableStringify', () => {
    it('sorts nested object keys', () => {
        expect(stableStringify({ b: 1, a: { d: 'X', c: true } })).toBe('{a:{c:true,d:x},b:1}');
    });

    it('keeps array order', () => {
        expect(stableStringify(['B', 1, 'a'])).toBe('[b,1,a]');
    });
});
