/**
 * @file Computation Cache
 *
 * Process-wide memo tables shared by every graph:
 *
 *   - values: fingerprint → computed value
 *   - hashes: (plug id, dirty generation, context hash) → fingerprint
 *
 * Entries are immutable once inserted. Nothing is ever invalidated in
 * place: a dirtied plug bumps its generation and an edited input yields
 * a new fingerprint, so stale entries become unreachable and age out of
 * the LRU.
 *
 * @module cache
 */

import { LRUCache } from 'lru-cache';
import type { Fingerprint, Hashable } from '../fingerprint/types.js';
import { SettingsService } from '../config/settings.js';

/** Boxed so primitive values (including null) can be stored. */
interface ValueEntry {
    readonly value: Hashable;
}

export interface ComputeCacheOptions {
    maxEntries?: number;
    maxHashEntries?: number;
}

export interface ComputeCacheStats {
    hits: number;
    misses: number;
    entries: number;
    hashEntries: number;
}

export class ComputeCache {
    private static singleton: ComputeCache | null = null;
    private readonly values: LRUCache<Fingerprint, ValueEntry>;
    private readonly hashes: LRUCache<string, Fingerprint>;
    private hitCount: number = 0;
    private missCount: number = 0;

    constructor(options: ComputeCacheOptions = {}) {
        const settings = SettingsService.instance_get().snapshot();
        this.values = new LRUCache<Fingerprint, ValueEntry>({
            max: options.maxEntries ?? settings.cache_maxEntries,
        });
        this.hashes = new LRUCache<string, Fingerprint>({
            max: options.maxHashEntries ?? settings.hash_maxEntries,
        });
    }

    /**
     * The process-wide instance, created on first use with the current
     * settings and never cleared wholesale.
     */
    public static instance_get(): ComputeCache {
        if (!ComputeCache.singleton) {
            ComputeCache.singleton = new ComputeCache();
        }
        return ComputeCache.singleton;
    }

    /** Look up a computed value. Counts hits and misses. */
    public value_get(fingerprint: Fingerprint): { hit: true; value: Hashable } | { hit: false } {
        const entry: ValueEntry | undefined = this.values.get(fingerprint);
        if (!entry) {
            this.missCount++;
            return { hit: false };
        }
        this.hitCount++;
        return { hit: true, value: entry.value };
    }

    /** Store a computed value. Last writer wins. */
    public value_set(fingerprint: Fingerprint, value: Hashable): void {
        this.values.set(fingerprint, { value });
    }

    public value_has(fingerprint: Fingerprint): boolean {
        return this.values.has(fingerprint);
    }

    public hash_get(key: string): Fingerprint | undefined {
        return this.hashes.get(key);
    }

    public hash_set(key: string, fingerprint: Fingerprint): void {
        this.hashes.set(key, fingerprint);
    }

    public stats_get(): ComputeCacheStats {
        return {
            hits: this.hitCount,
            misses: this.missCount,
            entries: this.values.size,
            hashEntries: this.hashes.size,
        };
    }

    /** Drop every entry. Used by tests and memory-pressure handlers. */
    public clear(): void {
        this.values.clear();
        this.hashes.clear();
        this.hitCount = 0;
        this.missCount = 0;
    }
}
