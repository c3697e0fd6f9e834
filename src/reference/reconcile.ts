/**
 * @file Reference Reconciler
 *
 * Reloads a reference's definition in place. The previous interface
 * plugs are moved aside (renamed `__tmp__<name>`), the internal nodes are
 * dropped and the definition is executed again. Then, for each previous
 * plug with a same-named successor:
 *
 *   - inputs are copied (a connection on a compound covers its
 *     descendants) or, at unconnected leaves, literal values;
 *   - outward connections are moved onto the successor;
 *   - persistent (locally authored) instance metadata is copied.
 *
 * A failure on one plug is logged as a migration warning and the reload
 * carries on. Everything runs in a disabled undo scope: the caller
 * records the reload as a single command.
 *
 * @module reference
 */

import { component_isPlug, type ChildEvent, type GraphComponent } from '../graph/GraphComponent.js';
import { MigrationWarning, error_message, loadContext_format } from '../errors.js';
import {
    INTERNAL_PREFIX,
    LEGACY_MAJOR_CUTOFF,
    MAJOR_VERSION_KEY,
    MILESTONE_VERSION_KEY,
    RELOAD_PREFIX,
} from './types.js';
import type { Plug } from '../graph/Plug.js';
import type { SubGraph } from '../graph/SubGraph.js';
import type { GraphHost } from '../graph/types.js';
import type { MetadataStore } from '../metadata/MetadataStore.js';

/**
 * Whether `plug` came from the loaded definition (as opposed to being
 * internal, or authored locally on the reference).
 */
export function referencePlug_is(reference: SubGraph, plug: Plug): boolean {
    // Ancestor directly under the reference.
    let top: Plug = plug;
    let parent: GraphComponent | null = plug.parent;
    while (parent && parent !== reference) {
        if (!component_isPlug(parent)) break;
        top = parent;
        parent = parent.parent;
    }

    if (top.name.startsWith(INTERNAL_PREFIX)) return false;
    const userPlug: Plug = reference.userPlug;
    if (plug === userPlug) return false;
    // Loaded plugs are made non-dynamic, so a dynamic user plug was added here.
    if (top === userPlug && plug.flags.dynamic) return false;
    return true;
}

/** Definitions before milestone 0, major 9 may carry values for promoted plugs. */
export function version_isLegacy(store: MetadataStore, container: GraphComponent): boolean {
    const milestone: number = store.int_get(container, MILESTONE_VERSION_KEY, 0);
    const major: number = store.int_get(container, MAJOR_VERSION_KEY, 0);
    return milestone === 0 && major < LEGACY_MAJOR_CUTOFF;
}

/**
 * Copy the input of `source` onto `target`, or the literal values of its
 * unconnected leaves. Values at their default are skipped when
 * `ignoreDefaultValues` is set.
 */
export function inputsAndValues_copy(source: Plug, target: Plug, ignoreDefaultValues: boolean): void {
    const input: Plug | null = source.input;
    if (input) {
        // Connecting cascades to every descendant.
        target.input_set(input);
        return;
    }

    if (target.plugs_list().length === 0) {
        target.input_set(null);
        if (!source.isValuePlug() || !target.isValuePlug()) return;
        if (ignoreDefaultValues && source.isSetToDefault()) return;
        target.value_setFrom(source);
        return;
    }

    // By index: arrays grow as their elements are connected.
    for (let i = 0; i < target.plugs_list().length; i++) {
        const child: Plug = target.plugs_list()[i];
        const sourceChild: Plug | undefined = source.plug_get(child.name);
        if (sourceChild) {
            inputsAndValues_copy(sourceChild, child, ignoreDefaultValues);
        }
    }
}

/** Reconnect everything fed by `source` (or its descendants) to `target`. */
export function outputs_transfer(source: Plug, target: Plug): void {
    for (const output of source.outputs_list()) {
        output.input_set(target);
    }
    for (const child of source.plugs_list()) {
        const targetChild: Plug | undefined = target.plug_get(child.name);
        if (targetChild) {
            outputs_transfer(child, targetChild);
        }
    }
}

/** Re-register every persistent instance entry of `plug` as non-persistent. */
export function metadata_convertPersistent(store: MetadataStore, plug: Plug): void {
    for (const key of store.keys_list(plug, { persistentOnly: true })) {
        const entry = store.entry_get(plug, key);
        if (entry) {
            store.value_set(plug, key, entry.value, false);
        }
    }
}

/**
 * Reload `sourceId` into `reference`. An empty identifier unloads.
 *
 * @returns true when the definition reported errors
 */
export function reference_reload(reference: SubGraph, sourceId: string, host: GraphHost): boolean {
    return host.undoLog.scope_run(`Load ${sourceId}`, (): boolean => {
        const store: MetadataStore = reference.metadata_store();
        const loadContext: string = loadContext_format(sourceId, reference.name);

        const previousPlugs: Map<string, Plug> = previousPlugs_stash(reference);

        for (const node of reference.nodes_list().reverse()) {
            reference.child_remove(node);
        }

        const added: GraphComponent[] = [];
        const collect = (event: ChildEvent): void => {
            added.push(event.child);
        };
        const unsubscribers: Array<() => void> = [
            reference.childAddedSignal.subscribe(collect),
            reference.userPlug.childAddedSignal.subscribe(collect),
        ];

        let errors: boolean = false;
        try {
            store.value_remove(reference, MILESTONE_VERSION_KEY);
            store.value_remove(reference, MAJOR_VERSION_KEY);
            if (sourceId) {
                errors = definition_run(reference, sourceId, host, loadContext);
            }
        } finally {
            for (const unsubscribe of unsubscribers) unsubscribe();
        }

        for (const component of added) {
            if (!component_isPlug(component)) continue;
            for (const plug of [component, ...component.plugDescendants_list()]) {
                plug.flags_set({ dynamic: false });
                metadata_convertPersistent(store, plug);
            }
        }

        const legacy: boolean = version_isLegacy(store, reference);
        const names: string[] = Array.from(previousPlugs.keys()).sort();
        for (const name of names) {
            const oldPlug: Plug | undefined = previousPlugs.get(name);
            if (!oldPlug) continue;
            const found: GraphComponent | undefined = reference.descendant_get(name);
            if (component_isPlug(found)) {
                try {
                    if (found.direction === 'in' && oldPlug.direction === 'in') {
                        inputsAndValues_copy(oldPlug, found, !legacy);
                    }
                    outputs_transfer(oldPlug, found);
                    store.instance_copy(oldPlug, found, true);
                } catch (err: unknown) {
                    const warning = new MigrationWarning(sourceId, reference.name, err);
                    host.logger.warn(warning.context, warning.message);
                }
            }
            oldPlug.parent?.child_remove(oldPlug);
        }

        return errors;
    }, 'disabled');
}

/**
 * Move the current interface plugs (including legacy user plugs) out of
 * the way, keyed by their name relative to the reference.
 */
function previousPlugs_stash(reference: SubGraph): Map<string, Plug> {
    const stashed = new Map<string, Plug>();
    const candidates: Plug[] = [...reference.plugs_list(), ...reference.userPlug.plugs_list()];
    for (const plug of candidates) {
        if (!referencePlug_is(reference, plug)) continue;
        stashed.set(plug.relativeName(reference), plug);
        plug.name_set(`${RELOAD_PREFIX}${plug.name}`);
    }
    return stashed;
}

function definition_run(reference: SubGraph, sourceId: string, host: GraphHost, loadContext: string): boolean {
    const source = host.definitionSource;
    if (!source) {
        host.logger.error(loadContext, 'no definition source is configured');
        return true;
    }
    try {
        return source.definition_execute(reference, sourceId);
    } catch (err: unknown) {
        host.logger.error(loadContext, error_message(err));
        return true;
    }
}
