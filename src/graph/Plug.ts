/**
 * @file Plug
 *
 * Typed endpoint of a node. A plug may hold an input (a non-owning link
 * to one upstream plug; the upstream keeps the reverse link in its output
 * set) and may own child plugs, forming a tree for structured values.
 *
 * This base class is the compound plug: it carries no value of its own,
 * only children. Leaf plugs carrying values are `ValuePlug`s.
 *
 * Connecting a compound connects its children pairwise. Connecting a
 * child individually breaks its parent's connection (the children no
 * longer mirror one upstream compound).
 *
 * @module graph
 */

import { GraphComponent, component_isNode, component_isPlug } from './GraphComponent.js';
import { action_enact, scope_run } from './enact.js';
import { dirty_collect } from '../dirty/DirtyPropagator.js';
import { StructuralError } from '../errors.js';
import { Context } from '../context/Context.js';
import { evaluator_for } from '../compute/Evaluator.js';
import { DEFAULT_PLUG_FLAGS } from './types.js';
import type { Fingerprint } from '../fingerprint/types.js';
import type { PlugDirection, PlugFlags, PlugOptions, PlugType, PlugValue } from './types.js';
import type { Node } from './Node.js';
import type { ValuePlug } from './ValuePlug.js';

let nextPlugId = 1;

export class Plug extends GraphComponent {
    readonly componentKind = 'plug' as const;
    /** Process-unique id, used in memo keys. */
    readonly id: number = nextPlugId++;
    readonly direction: PlugDirection;

    private flagsValue: PlugFlags;
    private inputRef: Plug | null = null;
    private readonly outputSet = new Set<Plug>();
    private generationValue: number = 0;

    constructor(name: string, options: PlugOptions = {}) {
        super(name);
        this.direction = options.direction ?? 'in';
        this.flagsValue = { ...DEFAULT_PLUG_FLAGS, ...options.flags };
    }

    get typeName(): string {
        return 'Plug';
    }

    get plugType(): PlugType {
        return 'compound';
    }

    get flags(): Readonly<PlugFlags> {
        return this.flagsValue;
    }

    /** Upstream plug, if connected. */
    get input(): Plug | null {
        return this.inputRef;
    }

    /** Dirty generation; bumped each time a propagation pass visits the plug. */
    get generation(): number {
        return this.generationValue;
    }

    /** Plugs this one feeds, in connection order. */
    outputs_list(): Plug[] {
        return Array.from(this.outputSet);
    }

    /** Child plugs. */
    plugs_list(): Plug[] {
        return this.children.filter(component_isPlug);
    }

    plug_get(name: string): Plug | undefined {
        const child: GraphComponent | undefined = this.child_get(name);
        return component_isPlug(child) ? child : undefined;
    }

    /** All descendant plugs, parents before children. */
    plugDescendants_list(): Plug[] {
        return this.descendants_list().filter(component_isPlug);
    }

    isValuePlug(): this is ValuePlug {
        return false;
    }

    /** Owning node, skipping intermediate compound plugs. */
    node_get(): Node | null {
        let current: GraphComponent | null = this.parent;
        while (current) {
            if (component_isNode(current)) return current;
            current = current.parent;
        }
        return null;
    }

    /** Parent, when it is itself a plug. */
    parentPlug_get(): Plug | null {
        const parent: GraphComponent | null = this.parent;
        return component_isPlug(parent) ? parent : null;
    }

    /** Follow inputs to the plug that ultimately provides the value. */
    source_get(): Plug {
        let current: Plug = this;
        while (current.inputRef) {
            current = current.inputRef;
        }
        return current;
    }

    /** Whether every leaf holds its default value and nothing is connected. */
    isSetToDefault(): boolean {
        if (this.inputRef) return false;
        return this.plugs_list().every((child: Plug): boolean => child.isSetToDefault());
    }

    /**
     * Fresh plug of the same type and shape (no connections, default
     * values), used to grow arrays and to mirror connected compounds.
     */
    clone_create(name: string = this.name, direction: PlugDirection = this.direction): Plug {
        const clone = new Plug(name, { direction, flags: { ...this.flagsValue, dynamic: true } });
        for (const child of this.plugs_list()) {
            clone.child_add(child.clone_create(child.name, direction));
        }
        return clone;
    }

    // ─── Evaluation ─────────────────────────────────────────────

    /** Evaluate in the host's evaluator (or the process default). */
    value_get(context: Context = Context.default_get()): PlugValue {
        return evaluator_for(this).value_get(this, context);
    }

    hash_get(context: Context = Context.default_get()): Fingerprint {
        return evaluator_for(this).hash_get(this, context);
    }

    // ─── Connections ────────────────────────────────────────────

    /**
     * Explain why `source` cannot be this plug's input, or return null.
     */
    acceptsInput(source: Plug): string | null {
        if (source === this) return 'a plug cannot be its own input';
        const typeRefusal: string | null = this.typeRefusal(source);
        if (typeRefusal) return typeRefusal;

        const node: Node | null = this.node_get();
        const sourceNode: Node | null = source.node_get();
        const sourceInternal: boolean = node !== null && sourceNode !== null && node.isAncestorOf(sourceNode);
        if (this.direction === 'out') {
            const internal: boolean = sourceInternal && source.direction === 'out';
            const passThrough: boolean = node !== null && sourceNode === node && source.direction === 'in';
            if (!internal && !passThrough) {
                return 'direction mismatch: output plugs only accept outputs of internal nodes or inputs of their own node';
            }
        } else if (sourceInternal && source.direction === 'in') {
            return 'direction mismatch: input plugs cannot take inputs from inputs of internal nodes';
        }
        return null;
    }

    /** Type compatibility of a prospective input. Overridden by value plugs. */
    protected typeRefusal(source: Plug): string | null {
        return source.plugType === 'compound' ? null : `type mismatch (${source.plugType} into compound)`;
    }

    /**
     * Connect (or, with null, disconnect) this plug. Compound plugs
     * cascade to their children pairwise; arrays grow to fit the source.
     *
     * @throws StructuralError when the connection is invalid; nothing is
     *   changed or recorded in that case
     */
    input_set(source: Plug | null): void {
        if (source === this.inputRef && this.childInputs_match(source)) return;
        if (source) {
            this.connection_validate(source);
        }
        scope_run(this, source ? `Connect ${source.fullName} to ${this.fullName}` : `Disconnect ${this.fullName}`, (): void => {
            this.input_cascade(source);
            const parentPlug: Plug | null = this.parentPlug_get();
            if (parentPlug) parentPlug.childInput_changed(this);
        });
    }

    /** Set flags, enacted. */
    flags_set(flags: Partial<PlugFlags>): void {
        const next: PlugFlags = { ...this.flagsValue, ...flags };
        if (next.dynamic === this.flagsValue.dynamic && next.serialisable === this.flagsValue.serialisable) return;
        action_enact(this, { kind: 'setFlags', plug: this, previous: { ...this.flagsValue }, next });
    }

    /**
     * Add a child plug. When this compound feeds other compounds, the
     * same child is mirrored onto each of them and connected, keeping
     * both sides of the connection the same shape.
     */
    override child_add<T extends GraphComponent>(child: T): T {
        return scope_run(this, `Add ${child.name} to ${this.fullName}`, (): T => {
            super.child_add(child);
            if (component_isPlug(child)) {
                for (const output of this.outputs_list()) {
                    if (output.plugType !== 'compound' || output.plug_get(child.name)) continue;
                    const mirror: Plug = output.child_add(child.clone_create(child.name, output.direction));
                    mirror.input_set(child);
                }
            }
            return child;
        });
    }

    protected override child_refusal(child: GraphComponent): string | null {
        if (!component_isPlug(child)) return 'plugs may only have plug children';
        if (child.direction !== this.direction) return 'child direction must match parent direction';
        return null;
    }

    /**
     * Hook invoked after a child's input changed through its own
     * `input_set`. Breaks this plug's connection when the children no
     * longer mirror it.
     */
    protected childInput_changed(child: Plug): void {
        const input: Plug | null = this.inputRef;
        if (!input) return;
        if (child.inputRef && child.inputRef.parent === input && child.inputRef.name === child.name) return;
        action_enact(this, { kind: 'setInput', plug: this, previous: input, next: null });
        this.parentPlug_get()?.childInput_changed(this);
    }

    // ─── Raw mutations (applied by commands) ────────────────────

    /** @internal */
    input_assign(source: Plug | null): void {
        if (this.inputRef) {
            this.inputRef.outputSet.delete(this);
        }
        this.inputRef = source;
        if (source) {
            source.outputSet.add(this);
        }
    }

    /** @internal */
    flags_assign(flags: PlugFlags): void {
        this.flagsValue = { ...flags };
    }

    /** @internal */
    generation_bump(): void {
        this.generationValue++;
    }

    // ─── Internals ──────────────────────────────────────────────

    private connection_validate(source: Plug): void {
        const refusal: string | null = this.acceptsInput(source);
        if (refusal) {
            throw new StructuralError(`Cannot connect "${source.fullName}" to "${this.fullName}": ${refusal}`);
        }
        if (dirty_collect(this).includes(source)) {
            throw new StructuralError(`Cannot connect "${source.fullName}" to "${this.fullName}": would create a cycle`);
        }

        // Children pair up by position; arrays may grow to fit.
        const mine: Plug[] = this.plugs_list();
        const theirs: Plug[] = source.plugs_list();
        if (theirs.length !== mine.length && !(this.resizable() && theirs.length > mine.length)) {
            throw new StructuralError(
                `Cannot connect "${source.fullName}" to "${this.fullName}": ${theirs.length} children into ${mine.length}`,
            );
        }
        for (let i = 0; i < mine.length; i++) {
            mine[i].connection_validate(theirs[i]);
        }
    }

    /** Whether the child count may change to match a source. */
    protected resizable(): boolean {
        return false;
    }

    /** Grow to at least `count` children. Overridden by arrays. */
    protected size_ensure(count: number): void {
        void count;
    }

    private input_cascade(source: Plug | null): void {
        if (source) this.size_ensure(source.plugs_list().length);
        if (source !== this.inputRef) {
            action_enact(this, { kind: 'setInput', plug: this, previous: this.inputRef, next: source });
        }
        const mine: Plug[] = this.plugs_list();
        const theirs: Plug[] = source ? source.plugs_list() : [];
        for (let i = 0; i < mine.length; i++) {
            mine[i].input_cascade(theirs[i] ?? null);
        }
    }

    /** Whether every descendant's input already mirrors `source`'s shape. */
    private childInputs_match(source: Plug | null): boolean {
        const mine: Plug[] = this.plugs_list();
        const theirs: Plug[] = source ? source.plugs_list() : [];
        if (source && mine.length !== theirs.length) return false;
        return mine.every((child: Plug, i: number): boolean => {
            const expected: Plug | null = theirs[i] ?? null;
            return child.inputRef === expected && child.childInputs_match(expected);
        });
    }
}
