/**
 * @file Fingerprint Hasher Tests
 *
 * @module fingerprint
 */

import { describe, it, expect } from 'vitest';
import { HashBuilder, fingerprint_compute, hashable_equals } from './hasher.js';

describe('fingerprint/hasher', () => {

    it('should produce 32 lowercase hex characters', () => {
        expect(fingerprint_compute('content')).toMatch(/^[0-9a-f]{32}$/);
    });

    it('should be deterministic', () => {
        expect(fingerprint_compute('a', 1, true)).toBe(fingerprint_compute('a', 1, true));
    });

    it('should separate concatenated strings', () => {
        expect(fingerprint_compute('ab')).not.toBe(fingerprint_compute('a', 'b'));
    });

    it('should distinguish values of different types', () => {
        expect(fingerprint_compute('1')).not.toBe(fingerprint_compute(1));
        expect(fingerprint_compute(null)).not.toBe(fingerprint_compute(undefined));
        expect(fingerprint_compute(true)).not.toBe(fingerprint_compute(1));
    });

    it('should ignore object key order', () => {
        expect(fingerprint_compute({ a: 1, b: [2, 3] })).toBe(fingerprint_compute({ b: [2, 3], a: 1 }));
    });

    it('should treat negative zero as zero', () => {
        expect(fingerprint_compute(-0)).toBe(fingerprint_compute(0));
    });

    it('should match one-shot and incremental builds', () => {
        const incremental = new HashBuilder().append('x').append(2).digest();
        expect(incremental).toBe(fingerprint_compute('x', 2));
    });

    it('should compare structured values', () => {
        expect(hashable_equals({ k: [1, 'two'] }, { k: [1, 'two'] })).toBe(true);
        expect(hashable_equals([1, 2], [2, 1])).toBe(false);
    });

    it('should keep lone surrogates apart', () => {
        expect(hashable_equals('\uD800', '\uDFFF')).toBe(false);
        expect(hashable_equals('\uD800', '\uFFFD')).toBe(false);
        expect(hashable_equals({ '\uD800': 1 }, { '\uDFFF': 1 })).toBe(false);
    });
});
