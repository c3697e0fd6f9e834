/**
 * @file SubGraph
 *
 * A node that contains other nodes. Its own plugs form the boundary:
 * internal nodes read the container's inputs and drive its outputs
 * through ordinary connections.
 *
 * @module graph
 */

import { Node } from './Node.js';
import { component_isNode, component_isPlug, type GraphComponent } from './GraphComponent.js';

export class SubGraph extends Node {
    override get typeName(): string {
        return 'SubGraph';
    }

    nodes_list(): Node[] {
        return this.children.filter(component_isNode);
    }

    /** Direct child node by name. */
    node_find(name: string): Node | undefined {
        const child: GraphComponent | undefined = this.child_get(name);
        return component_isNode(child) ? child : undefined;
    }

    protected override child_refusal(child: GraphComponent): string | null {
        if (component_isPlug(child) || component_isNode(child)) return null;
        return 'containers accept plugs and nodes only';
    }
}
