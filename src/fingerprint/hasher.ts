/**
 * @file Fingerprint Hasher
 *
 * Incremental SHA-256 accumulator producing 128-bit fingerprints. Every
 * appended value is written with a type tag and length prefix, so
 * `append('ab')` and `append('a', 'b')` never collide, and object keys
 * are sorted before hashing to guarantee order-independence.
 *
 * @module fingerprint
 */

import { createHash, type Hash } from 'crypto';
import type { Fingerprint, Hashable } from './types.js';

/** Hex characters kept from the SHA-256 digest (128 bits). */
const FINGERPRINT_HEX_LENGTH = 32;

export class HashBuilder {
    private readonly hash: Hash = createHash('sha256');

    /**
     * Absorb one or more values.
     *
     * @returns this, for chaining
     */
    append(...values: Hashable[]): this {
        for (const value of values) {
            this.value_write(value);
        }
        return this;
    }

    /** Finish and return the fingerprint. The builder cannot be reused. */
    digest(): Fingerprint {
        return this.hash.digest('hex').slice(0, FINGERPRINT_HEX_LENGTH);
    }

    private value_write(value: Hashable): void {
        if (value === null) {
            this.hash.update('z;');
            return;
        }
        if (value === undefined) {
            this.hash.update('u;');
            return;
        }
        if (typeof value === 'string') {
            // UTF-16 units, so lone surrogates stay distinct.
            const units: Buffer = Buffer.from(value, 'utf16le');
            this.hash.update(`s${units.length}:`);
            this.hash.update(units);
            return;
        }
        if (typeof value === 'number') {
            this.hash.update(`n${Object.is(value, -0) ? '0' : String(value)};`);
            return;
        }
        if (typeof value === 'boolean') {
            this.hash.update(value ? 'b1;' : 'b0;');
            return;
        }
        if (hashable_isArray(value)) {
            this.hash.update(`a${value.length}[`);
            for (const item of value) {
                this.value_write(item);
            }
            this.hash.update(']');
            return;
        }
        const keys: string[] = Object.keys(value).sort();
        this.hash.update(`o${keys.length}{`);
        for (const key of keys) {
            this.value_write(key);
            this.value_write(value[key]);
        }
        this.hash.update('}');
    }
}

/**
 * One-shot fingerprint of a list of values.
 */
export function fingerprint_compute(...values: Hashable[]): Fingerprint {
    return new HashBuilder().append(...values).digest();
}

/**
 * Structural equality via canonical serialization, consistent with
 * fingerprinting.
 */
export function hashable_equals(a: Hashable, b: Hashable): boolean {
    if (a === b) return true;
    return fingerprint_compute(a) === fingerprint_compute(b);
}

function hashable_isArray(value: Hashable): value is readonly Hashable[] {
    return Array.isArray(value);
}
