/**
 * @file Computation Cache Tests
 *
 * @module cache
 */

import { describe, it, expect } from 'vitest';
import { ComputeCache } from './ComputeCache.js';

describe('cache/ComputeCache', () => {

    it('should store and return values, including null', () => {
        const cache = new ComputeCache({ maxEntries: 10 });
        cache.value_set('fp-a', null);
        expect(cache.value_get('fp-a')).toEqual({ hit: true, value: null });
        expect(cache.value_get('fp-b')).toEqual({ hit: false });
    });

    it('should count hits and misses', () => {
        const cache = new ComputeCache({ maxEntries: 10 });
        cache.value_set('fp', 3);
        cache.value_get('fp');
        cache.value_get('fp');
        cache.value_get('other');
        expect(cache.stats_get()).toEqual({ hits: 2, misses: 1, entries: 1, hashEntries: 0 });
    });

    it('should evict the least recently used value beyond capacity', () => {
        const cache = new ComputeCache({ maxEntries: 2 });
        cache.value_set('a', 1);
        cache.value_set('b', 2);
        cache.value_get('a');
        cache.value_set('c', 3);
        expect(cache.value_has('a')).toBe(true);
        expect(cache.value_has('b')).toBe(false);
        expect(cache.value_has('c')).toBe(true);
    });

    it('should keep hash entries separately from values', () => {
        const cache = new ComputeCache({ maxEntries: 1, maxHashEntries: 5 });
        cache.hash_set('plug:0:ctx', 'fp');
        expect(cache.hash_get('plug:0:ctx')).toBe('fp');
        expect(cache.value_has('fp')).toBe(false);
    });

    it('should reset everything on clear', () => {
        const cache = new ComputeCache();
        cache.value_set('fp', 1);
        cache.hash_set('k', 'fp');
        cache.value_get('fp');
        cache.clear();
        expect(cache.stats_get()).toEqual({ hits: 0, misses: 0, entries: 0, hashEntries: 0 });
    });

    it('should share one process-wide instance', () => {
        expect(ComputeCache.instance_get()).toBe(ComputeCache.instance_get());
    });
});
