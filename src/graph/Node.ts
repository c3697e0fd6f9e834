/**
 * @file Node
 *
 * Base computation unit. A node owns its plugs (including the `user`
 * plug, a container for locally authored plugs) and answers three
 * questions for the engine:
 *
 *   - `affects(input)`  which outputs a change to `input` invalidates
 *   - `hash(output)`    the fingerprint of everything `compute` reads
 *   - `compute(output)` the value itself
 *
 * The base node affects nothing and yields each output's default value;
 * computational nodes derive from `ComputeNode`.
 *
 * @module graph
 */

import { GraphComponent, component_isPlug } from './GraphComponent.js';
import { Plug } from './Plug.js';
import { Signal } from '../signals/Signal.js';
import { HashBuilder } from '../fingerprint/hasher.js';
import { StructuralError } from '../errors.js';
import type { Context } from '../context/Context.js';
import type { Fingerprint, Hashable } from '../fingerprint/types.js';
import type { EvaluationScope, PlugValue } from './types.js';

export const USER_PLUG_NAME = 'user';

export class Node extends GraphComponent {
    readonly componentKind = 'node' as const;
    /** One notification per dirtied plug of this node, per propagation pass. */
    readonly plugDirtiedSignal = new Signal<Plug>();

    constructor(name: string) {
        super(name);
        this.child_add(new Plug(USER_PLUG_NAME));
    }

    get typeName(): string {
        return 'Node';
    }

    /** Container for user-added plugs; never part of a node's interface. */
    get userPlug(): Plug {
        const plug: Plug | undefined = this.plug_get(USER_PLUG_NAME);
        if (!plug) {
            throw new StructuralError(`Node "${this.fullName}" has no user plug`);
        }
        return plug;
    }

    plugs_list(): Plug[] {
        return this.children.filter(component_isPlug);
    }

    plug_get(name: string): Plug | undefined {
        const child: GraphComponent | undefined = this.child_get(name);
        return component_isPlug(child) ? child : undefined;
    }

    /** Resolve a dotted plug path relative to this node (`user.note`). */
    plugPath_get(path: string): Plug | undefined {
        const found: GraphComponent | undefined = this.descendant_get(path);
        return component_isPlug(found) ? found : undefined;
    }

    /** Metadata value on this node. */
    metadata_get(key: string): Hashable | undefined {
        return this.metadata_store().value_get(this, key);
    }

    /** Set instance metadata on this node, enacted. */
    metadata_set(key: string, value: Hashable, persistent: boolean = true): void {
        this.metadata_store().value_set(this, key, value, persistent);
    }

    // ─── Computation contract ───────────────────────────────────

    /** Outputs invalidated when `input` changes. */
    affects(input: Plug): Plug[] {
        void input;
        return [];
    }

    /**
     * Fingerprint for an unconnected output leaf: node type, the output's
     * name relative to this node, and the fingerprints of every input leaf
     * whose affects set contains the output or one of its ancestors.
     */
    hash(output: Plug, context: Context, scope: EvaluationScope): Fingerprint {
        const builder = new HashBuilder().append(this.typeName, output.relativeName(this));
        if (output.isValuePlug()) {
            builder.append(output.plugType, output.defaultValue);
        }
        for (const input of this.inputLeaves_list()) {
            const affected: Plug[] = this.affects(input);
            const relevant: boolean = affected.some((plug: Plug): boolean => plug === output || plug.isAncestorOf(output));
            if (relevant) {
                builder.append(input.relativeName(this), scope.hash_get(input, context));
            }
        }
        return builder.digest();
    }

    /** Value of an unconnected output leaf. */
    compute(output: Plug, context: Context, scope: EvaluationScope): PlugValue {
        void context;
        void scope;
        return output.isValuePlug() ? output.defaultValue : null;
    }

    // ─── Structure ──────────────────────────────────────────────

    protected override child_refusal(child: GraphComponent): string | null {
        return component_isPlug(child) ? null : 'nodes may only have plug children';
    }

    /** Input leaf plugs (excluding the user plug), in tree order. */
    protected inputLeaves_list(): Plug[] {
        const leaves: Plug[] = [];
        for (const plug of this.plugs_list()) {
            if (plug.direction !== 'in' || plug.name === USER_PLUG_NAME) continue;
            for (const member of [plug, ...plug.plugDescendants_list()]) {
                if (member.plugs_list().length === 0) leaves.push(member);
            }
        }
        return leaves;
    }
}
