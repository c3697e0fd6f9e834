/**
 * @file Graph Component
 *
 * Base of every plug and node: a named member of a parent-owns-child
 * tree. Parents own their children; the `parent` link is a non-owning
 * back-reference. Structural edits (add, remove, rename) are enacted
 * through the host's undo log; the `*_assign`, `child_insert` and
 * `child_detach` methods are the raw mutations those commands apply.
 *
 * @module graph
 */

import { Signal } from '../signals/Signal.js';
import { StructuralError } from '../errors.js';
import { MetadataStore } from '../metadata/MetadataStore.js';
import { action_enact, scope_run } from './enact.js';
import type { GraphHost } from './types.js';
import type { Plug } from './Plug.js';
import type { Node } from './Node.js';

/** Payload of child-added / child-removed signals. */
export interface ChildEvent {
    parent: GraphComponent;
    child: GraphComponent;
}

export abstract class GraphComponent {
    abstract readonly componentKind: 'plug' | 'node';

    private nameValue: string;
    private parentRef: GraphComponent | null = null;
    private readonly childList: GraphComponent[] = [];
    private childAdded: Signal<ChildEvent> | null = null;
    private childRemoved: Signal<ChildEvent> | null = null;

    constructor(name: string) {
        name_validate(name);
        this.nameValue = name;
    }

    /** Type name used for type-level metadata and hashing. */
    abstract get typeName(): string;

    // ─── Identity ───────────────────────────────────────────────

    get name(): string {
        return this.nameValue;
    }

    get parent(): GraphComponent | null {
        return this.parentRef;
    }

    get children(): readonly GraphComponent[] {
        return this.childList;
    }

    /** Dotted path from the root. */
    get fullName(): string {
        return this.parentRef ? `${this.parentRef.fullName}.${this.nameValue}` : this.nameValue;
    }

    /**
     * Dotted path relative to an ancestor (the ancestor's own name is
     * not included). Falls back to the full name when `ancestor` is not
     * an ancestor.
     */
    relativeName(ancestor: GraphComponent | null): string {
        const parts: string[] = [];
        let current: GraphComponent | null = this;
        while (current && current !== ancestor) {
            parts.unshift(current.nameValue);
            current = current.parentRef;
        }
        return parts.join('.');
    }

    child_get(name: string): GraphComponent | undefined {
        return this.childList.find((c: GraphComponent): boolean => c.nameValue === name);
    }

    /** Resolve a dotted relative path such as `user.note`. */
    descendant_get(path: string): GraphComponent | undefined {
        let current: GraphComponent | undefined = this;
        for (const part of path.split('.')) {
            if (!current) return undefined;
            current = current.child_get(part);
        }
        return current;
    }

    /** All descendants, depth first, parents before children. */
    descendants_list(): GraphComponent[] {
        const result: GraphComponent[] = [];
        for (const child of this.childList) {
            result.push(child, ...child.descendants_list());
        }
        return result;
    }

    isAncestorOf(other: GraphComponent): boolean {
        let current: GraphComponent | null = other.parentRef;
        while (current) {
            if (current === this) return true;
            current = current.parentRef;
        }
        return false;
    }

    /** Root of the tree this component belongs to. */
    root_get(): GraphComponent {
        return this.parentRef ? this.parentRef.root_get() : this;
    }

    /** Host services, resolved at the root. Overridden by the graph. */
    host_get(): GraphHost | null {
        return this.parentRef ? this.parentRef.host_get() : null;
    }

    /** Metadata store in effect for this component. */
    metadata_store(): MetadataStore {
        return this.host_get()?.metadata ?? MetadataStore.instance_get();
    }

    // ─── Signals ────────────────────────────────────────────────

    get childAddedSignal(): Signal<ChildEvent> {
        if (!this.childAdded) this.childAdded = new Signal<ChildEvent>();
        return this.childAdded;
    }

    get childRemovedSignal(): Signal<ChildEvent> {
        if (!this.childRemoved) this.childRemoved = new Signal<ChildEvent>();
        return this.childRemoved;
    }

    // ─── Enacted structural edits ───────────────────────────────

    /**
     * Whether `child` may be parented here. Return an explanation to
     * refuse it.
     */
    protected child_refusal(child: GraphComponent): string | null {
        void child;
        return null;
    }

    /**
     * Add a child, renaming it with a numeric suffix if its name is taken.
     *
     * @throws StructuralError when the child is refused or already parented
     */
    child_add<T extends GraphComponent>(child: T): T {
        if (child.parentRef) {
            throw new StructuralError(`"${child.fullName}" already has a parent`);
        }
        const component: GraphComponent = child;
        if (component === this || child.isAncestorOf(this)) {
            throw new StructuralError(`Cannot add "${child.name}" to its own descendant`);
        }
        const refusal: string | null = this.child_refusal(child);
        if (refusal) {
            throw new StructuralError(`"${this.fullName}" does not accept "${child.name}": ${refusal}`);
        }
        const unique: string = this.childName_unique(child.nameValue);
        if (unique !== child.nameValue) {
            child.nameValue = unique;
        }
        action_enact(this, { kind: 'addChild', parent: this, child, index: this.childList.length });
        return child;
    }

    /**
     * Remove a child. Connections between the removed subtree and the
     * rest of the graph are broken first, as separate undoable steps.
     */
    child_remove(child: GraphComponent): void {
        const index: number = this.childList.indexOf(child);
        if (index < 0) {
            throw new StructuralError(`"${child.name}" is not a child of "${this.fullName}"`);
        }
        scope_run(this, `Remove ${child.fullName}`, (): void => {
            connections_sever(child);
            action_enact(this, { kind: 'removeChild', parent: this, child, index: this.childList.indexOf(child) });
        });
    }

    /** Rename, enacted. Names must be unique among siblings. */
    name_set(name: string): void {
        name_validate(name);
        if (name === this.nameValue) return;
        if (this.parentRef?.child_get(name)) {
            throw new StructuralError(`"${this.parentRef.fullName}" already has a child named "${name}"`);
        }
        action_enact(this, { kind: 'rename', component: this, previous: this.nameValue, next: name });
    }

    // ─── Raw mutations (applied by commands) ────────────────────

    /** @internal */
    child_insert(child: GraphComponent, index: number): void {
        const at: number = Math.max(0, Math.min(index, this.childList.length));
        this.childList.splice(at, 0, child);
        child.parentRef = this;
        this.childAdded?.emit({ parent: this, child });
    }

    /** @internal */
    child_detach(child: GraphComponent): void {
        const index: number = this.childList.indexOf(child);
        if (index < 0) return;
        this.childList.splice(index, 1);
        child.parentRef = null;
        this.childRemoved?.emit({ parent: this, child });
    }

    /** @internal */
    name_assign(name: string): void {
        this.nameValue = name;
    }

    private childName_unique(name: string): string {
        if (!this.child_get(name)) return name;
        const match: RegExpMatchArray | null = name.match(/^(.*?)(\d*)$/);
        const stem: string = match?.[1] ?? name;
        let suffix: number = match?.[2] ? Number.parseInt(match[2], 10) + 1 : 1;
        while (this.child_get(`${stem}${suffix}`)) {
            suffix++;
        }
        return `${stem}${suffix}`;
    }
}

// ─── Type guards ────────────────────────────────────────────────

export function component_isPlug(component: GraphComponent | null | undefined): component is Plug {
    return component?.componentKind === 'plug';
}

export function component_isNode(component: GraphComponent | null | undefined): component is Node {
    return component?.componentKind === 'node';
}

// ─── Helpers ────────────────────────────────────────────────────

function name_validate(name: string): void {
    if (!/^[A-Za-z_][\w:]*$/.test(name)) {
        throw new StructuralError(`Invalid name "${name}"`);
    }
}

/**
 * Disconnect every connection crossing the boundary of `root`'s subtree.
 */
function connections_sever(root: GraphComponent): void {
    const members = new Set<GraphComponent>([root, ...root.descendants_list()]);
    for (const member of members) {
        if (!component_isPlug(member)) continue;
        const input: Plug | null = member.input;
        if (input && !members.has(input)) {
            action_enact(member, { kind: 'setInput', plug: member, previous: input, next: null });
        }
        for (const output of member.outputs_list()) {
            if (!members.has(output)) {
                action_enact(output, { kind: 'setInput', plug: output, previous: member, next: null });
            }
        }
    }
}
