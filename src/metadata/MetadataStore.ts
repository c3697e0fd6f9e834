/**
 * @file Metadata Store
 *
 * Key/value annotations on graph components, in two layers:
 *
 *   - type registrations, shared by every component of a type name
 *   - instance entries, per component, each flagged persistent or not
 *
 * Instance lookups win over type registrations. Instance edits made via
 * `value_set` / `value_remove` are enacted, so they are undoable when the
 * target belongs to a graph. Persistent entries are the ones a graph
 * would write out when saved.
 *
 * @module metadata
 */

import { action_enact } from '../graph/enact.js';
import type { GraphComponent } from '../graph/GraphComponent.js';
import type { Hashable } from '../fingerprint/types.js';

export interface MetadataEntry {
    readonly value: Hashable;
    readonly persistent: boolean;
}

export interface MetadataKeyFilter {
    /** Only instance entries (exclude type registrations). */
    instanceOnly?: boolean;
    /** Only persistent instance entries. Implies instanceOnly. */
    persistentOnly?: boolean;
}

export class MetadataStore {
    private static singleton: MetadataStore | null = null;
    private readonly instances = new WeakMap<GraphComponent, Map<string, MetadataEntry>>();
    private readonly types = new Map<string, Map<string, Hashable>>();

    /**
     * Resolve process-global store, used by components outside a graph.
     */
    public static instance_get(): MetadataStore {
        if (!MetadataStore.singleton) {
            MetadataStore.singleton = new MetadataStore();
        }
        return MetadataStore.singleton;
    }

    /** Register a value for every component with the given type name. */
    public type_register(typeName: string, key: string, value: Hashable): void {
        let entries: Map<string, Hashable> | undefined = this.types.get(typeName);
        if (!entries) {
            entries = new Map();
            this.types.set(typeName, entries);
        }
        entries.set(key, value);
    }

    /** Instance value if present, else the type registration. */
    public value_get(target: GraphComponent, key: string): Hashable | undefined {
        const entry: MetadataEntry | undefined = this.instances.get(target)?.get(key);
        if (entry) return entry.value;
        return this.types.get(target.typeName)?.get(key);
    }

    /** Integer value, or `fallback` when absent or not an integer. */
    public int_get(target: GraphComponent, key: string, fallback: number): number {
        const value: Hashable | undefined = this.value_get(target, key);
        return typeof value === 'number' && Number.isInteger(value) ? value : fallback;
    }

    /** Instance entry only. */
    public entry_get(target: GraphComponent, key: string): MetadataEntry | null {
        return this.instances.get(target)?.get(key) ?? null;
    }

    /**
     * Set an instance value, enacted.
     */
    public value_set(target: GraphComponent, key: string, value: Hashable, persistent: boolean = true): void {
        action_enact(target, {
            kind: 'setMetadata',
            store: this,
            target,
            key,
            previous: this.entry_get(target, key),
            next: { value, persistent },
        });
    }

    /** Remove an instance value, enacted. No-op when absent. */
    public value_remove(target: GraphComponent, key: string): void {
        const previous: MetadataEntry | null = this.entry_get(target, key);
        if (!previous) return;
        action_enact(target, { kind: 'setMetadata', store: this, target, key, previous, next: null });
    }

    /**
     * Keys with a value on `target`, instance keys first.
     */
    public keys_list(target: GraphComponent, filter: MetadataKeyFilter = {}): string[] {
        const keys: string[] = [];
        for (const [key, entry] of this.instances.get(target) ?? []) {
            if (filter.persistentOnly && !entry.persistent) continue;
            keys.push(key);
        }
        if (filter.instanceOnly || filter.persistentOnly) return keys;

        for (const key of this.types.get(target.typeName)?.keys() ?? []) {
            if (!keys.includes(key)) keys.push(key);
        }
        return keys;
    }

    /**
     * Copy instance entries from one component to another, keeping each
     * entry's persistence. Enacted.
     */
    public instance_copy(from: GraphComponent, to: GraphComponent, persistentOnly: boolean = false): void {
        for (const [key, entry] of this.instances.get(from) ?? []) {
            if (persistentOnly && !entry.persistent) continue;
            this.value_set(to, key, entry.value, entry.persistent);
        }
    }

    /**
     * Raw assignment applied by `setMetadata` commands.
     *
     * @internal
     */
    public entry_assign(target: GraphComponent, key: string, entry: MetadataEntry | null): void {
        let entries: Map<string, MetadataEntry> | undefined = this.instances.get(target);
        if (!entry) {
            entries?.delete(key);
            return;
        }
        if (!entries) {
            entries = new Map();
            this.instances.set(target, entries);
        }
        entries.set(key, entry);
    }
}
