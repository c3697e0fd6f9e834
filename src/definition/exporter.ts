/**
 * @file Definition Exporter
 *
 * Writes a container out as a definition that a reference can load:
 * its interface plugs (current values become defaults), its nodes with
 * their non-default input values and locally added plugs, the
 * connections among them, and persistent metadata.
 *
 * The `user` plug and plugs named `__*` are never exported, matching the
 * plugs a reload treats as local to the reference. Connections from
 * outside the container are dropped. Definitions have no array plug
 * type, so declaring an `ArrayPlug` is refused.
 *
 * @module definition
 */

import { RegistryError, StructuralError } from '../errors.js';
import { ArrayPlug } from '../graph/ArrayPlug.js';
import { NodeRegistry } from '../nodes/registry.js';
import { USER_PLUG_NAME, type Node } from '../graph/Node.js';
import { INTERNAL_PREFIX } from '../reference/types.js';
import type { Plug } from '../graph/Plug.js';
import type { SubGraph } from '../graph/SubGraph.js';
import type { GraphComponent } from '../graph/GraphComponent.js';
import type { Hashable } from '../fingerprint/types.js';
import type { RawConnection, RawDefinition, RawMetadata, RawNode, RawPlug } from './schemas.js';

/** Version written into exported definitions. */
export const EXPORT_VERSION = Object.freeze({ milestone: 1, major: 0 });

interface ExportState {
    readonly container: SubGraph;
    readonly plugs: RawPlug[];
    readonly metadataTargets: GraphComponent[];
}

/**
 * @throws RegistryError when a child node's type is not registered
 * @throws StructuralError when an array plug would have to be declared
 */
export function definition_export(container: SubGraph, registry: NodeRegistry = NodeRegistry.instance_get()): RawDefinition {
    const state: ExportState = { container, plugs: [], metadataTargets: [] };

    for (const plug of container.plugs_list()) {
        if (plug.name === USER_PLUG_NAME || plug.name.startsWith(INTERNAL_PREFIX)) continue;
        plugTree_export(state, plug);
    }

    const nodes: RawNode[] = [];
    for (const node of container.nodes_list()) {
        if (!registry.has(node.typeName)) {
            throw new RegistryError(`Cannot export "${node.fullName}": node type "${node.typeName}" is not registered`);
        }
        const values: Record<string, Hashable> = {};
        for (const plug of node.plugs_list()) {
            if (plug.name === USER_PLUG_NAME) continue;
            nodePlug_export(state, node, plug, values);
        }
        nodes.push({ name: node.name, type: node.typeName, values });
        state.metadataTargets.push(node);
    }

    return {
        version: { ...EXPORT_VERSION },
        plugs: state.plugs,
        nodes,
        connections: connections_export(container),
        metadata: metadata_export(state),
    };
}

/** Declare `plug` and its descendants, current values as defaults. */
function plugTree_export(state: ExportState, plug: Plug): void {
    if (plug instanceof ArrayPlug) {
        throw new StructuralError(`Cannot export "${plug.fullName}": array plugs cannot be declared in a definition`);
    }
    const entry: RawPlug = {
        name: plug.relativeName(state.container),
        type: plug.plugType,
        direction: plug.direction,
    };
    if (plug.isValuePlug()) {
        entry.default = plug.storedValue;
    }
    state.plugs.push(entry);
    state.metadataTargets.push(plug);
    for (const child of plug.plugs_list()) {
        plugTree_export(state, child);
    }
}

/** Locally added plugs are declared; built-in ones contribute values. */
function nodePlug_export(state: ExportState, node: Node, plug: Plug, values: Record<string, Hashable>): void {
    if (plug.flags.dynamic) {
        plugTree_export(state, plug);
        return;
    }
    state.metadataTargets.push(plug);
    if (plug.isValuePlug() && plug.direction === 'in' && !plug.input && !plug.isSetToDefault()) {
        values[plug.relativeName(node)] = plug.storedValue;
    }
    for (const child of plug.plugs_list()) {
        nodePlug_export(state, node, child, values);
    }
}

function connections_export(container: SubGraph): RawConnection[] {
    const members: Plug[] = [
        ...container.plugs_list().flatMap((plug: Plug): Plug[] => [plug, ...plug.plugDescendants_list()]),
        ...container.nodes_list().flatMap((node: Node): Plug[] =>
            node.plugs_list().flatMap((plug: Plug): Plug[] => [plug, ...plug.plugDescendants_list()])),
    ];

    const connections: RawConnection[] = [];
    for (const plug of members) {
        const input: Plug | null = plug.input;
        if (!input) continue;
        const inputNode: Node | null = input.node_get();
        if (inputNode !== container && inputNode?.parent !== container) continue;
        // Children of a connected compound follow their parent.
        const parentInput: Plug | null | undefined = plug.parentPlug_get()?.input;
        if (parentInput && input.parent === parentInput) continue;
        connections.push({ from: input.relativeName(container), to: plug.relativeName(container) });
    }
    return connections;
}

function metadata_export(state: ExportState): RawMetadata[] {
    const store = state.container.metadata_store();
    const entries: RawMetadata[] = [];
    for (const target of state.metadataTargets) {
        for (const key of store.keys_list(target, { persistentOnly: true })) {
            const entry = store.entry_get(target, key);
            if (entry) {
                entries.push({ target: target.relativeName(state.container), key, value: entry.value });
            }
        }
    }
    return entries;
}
