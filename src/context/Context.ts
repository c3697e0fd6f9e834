/**
 * @file Evaluation Context
 *
 * Immutable, copy-on-write parameter set scoping one evaluation request
 * (which frame, which scene path, which variables). A context is never
 * mutated: `with` and `without` return new contexts, so contexts can be
 * shared freely by reference and cached against.
 *
 * Equality and hashing are structural and independent of the order in
 * which entries were added.
 *
 * @module context
 */

import { HashBuilder } from '../fingerprint/hasher.js';
import type { Fingerprint } from '../fingerprint/types.js';

/** Scalar or path-valued context entry. */
export type ContextValue = string | number | boolean | readonly string[];

/** Well-known entry names. */
export const FRAME_NAME = 'frame';

export class Context {
    private static defaultInstance: Context | null = null;
    private readonly entries: ReadonlyMap<string, ContextValue>;
    private cachedHash: Fingerprint | null = null;

    constructor(entries: ReadonlyMap<string, ContextValue> | Record<string, ContextValue> = {}) {
        const map = new Map<string, ContextValue>();
        const source: Iterable<readonly [string, ContextValue]> = entries_isMap(entries)
            ? entries.entries()
            : Object.entries(entries);
        for (const [name, value] of source) {
            map.set(name, value_freeze(value));
        }
        this.entries = map;
    }

    /** The shared context with `frame: 1` and nothing else. */
    static default_get(): Context {
        if (!Context.defaultInstance) {
            Context.defaultInstance = new Context({ [FRAME_NAME]: 1 });
        }
        return Context.defaultInstance;
    }

    /** Raw lookup. */
    get(name: string): ContextValue | undefined {
        return this.entries.get(name);
    }

    has(name: string): boolean {
        return this.entries.has(name);
    }

    /** String entry, or `fallback` when absent. Throws on a type mismatch. */
    string_get(name: string, fallback?: string): string {
        const value: ContextValue | undefined = this.entries.get(name);
        if (value === undefined) return required(name, fallback);
        if (typeof value !== 'string') throw entry_mismatch(name, 'string', value);
        return value;
    }

    /** Numeric entry, or `fallback` when absent. Throws on a type mismatch. */
    number_get(name: string, fallback?: number): number {
        const value: ContextValue | undefined = this.entries.get(name);
        if (value === undefined) return required(name, fallback);
        if (typeof value !== 'number') throw entry_mismatch(name, 'number', value);
        return value;
    }

    /** Path entry, or `fallback` when absent. Throws on a type mismatch. */
    path_get(name: string, fallback?: readonly string[]): readonly string[] {
        const value: ContextValue | undefined = this.entries.get(name);
        if (value === undefined) return required(name, fallback);
        if (!value_isPath(value)) throw entry_mismatch(name, 'path', value);
        return value;
    }

    /** Current frame (defaults to 1). */
    get frame(): number {
        return this.number_get(FRAME_NAME, 1);
    }

    /** Entry names in insertion order. */
    names_list(): string[] {
        return Array.from(this.entries.keys());
    }

    /**
     * Copy with the given entries added or replaced.
     */
    with(overrides: Record<string, ContextValue>): Context {
        const merged = new Map<string, ContextValue>(this.entries);
        for (const [name, value] of Object.entries(overrides)) {
            merged.set(name, value);
        }
        return new Context(merged);
    }

    /** Copy with the named entries removed. */
    without(...names: string[]): Context {
        const remaining = new Map<string, ContextValue>(this.entries);
        for (const name of names) {
            remaining.delete(name);
        }
        return new Context(remaining);
    }

    /** Structural hash, memoized per instance. */
    hash(): Fingerprint {
        if (this.cachedHash === null) {
            const h = new HashBuilder().append('Context');
            for (const name of Array.from(this.entries.keys()).sort()) {
                const value: ContextValue | undefined = this.entries.get(name);
                h.append(name, value === undefined ? null : value);
            }
            this.cachedHash = h.digest();
        }
        return this.cachedHash;
    }

    /** Fingerprint of a subset of entries; absent names hash as absent. */
    entries_hash(names: readonly string[]): Fingerprint {
        const h = new HashBuilder().append('ContextEntries');
        for (const name of names) {
            const value: ContextValue | undefined = this.entries.get(name);
            h.append(name, value === undefined ? null : value);
        }
        return h.digest();
    }

    equals(other: Context): boolean {
        return this === other || this.hash() === other.hash();
    }

    /**
     * Replace `$name` and `${name}` references with entry values. Unknown
     * names substitute as the empty string; `\$` escapes a dollar sign.
     */
    string_substitute(input: string): string {
        return input.replace(SUBSTITUTION_PATTERN, (match: string, escaped: string | undefined, braced: string | undefined, bare: string | undefined): string => {
            if (escaped !== undefined) return '$';
            const name: string | undefined = braced ?? bare;
            if (name === undefined) return match;
            const value: ContextValue | undefined = this.entries.get(name);
            return value === undefined ? '' : value_toString(value);
        });
    }

    /** Names referenced by `$name` / `${name}` in a string. */
    static references_list(input: string): string[] {
        const names = new Set<string>();
        for (const match of input.matchAll(SUBSTITUTION_PATTERN)) {
            const name: string | undefined = match[2] ?? match[3];
            if (name !== undefined) names.add(name);
        }
        return Array.from(names);
    }
}

const SUBSTITUTION_PATTERN = /(\\\$)|\$\{([A-Za-z_][\w:]*)\}|\$([A-Za-z_]\w*)/g;

function entries_isMap(
    entries: ReadonlyMap<string, ContextValue> | Record<string, ContextValue>,
): entries is ReadonlyMap<string, ContextValue> {
    return entries instanceof Map;
}

function value_freeze(value: ContextValue): ContextValue {
    return value_isPath(value) ? Object.freeze([...value]) : value;
}

function value_isPath(value: ContextValue): value is readonly string[] {
    return Array.isArray(value);
}

function value_toString(value: ContextValue): string {
    if (value_isPath(value)) return '/' + value.join('/');
    return String(value);
}

function required<T>(name: string, fallback: T | undefined): T {
    if (fallback === undefined) {
        throw new Error(`Context has no entry "${name}"`);
    }
    return fallback;
}

function entry_mismatch(name: string, expected: string, value: ContextValue): Error {
    return new Error(`Context entry "${name}" is not a ${expected} (got ${JSON.stringify(value)})`);
}
