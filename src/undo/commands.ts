/**
 * @file Graph Commands
 *
 * Every graph mutation is one of these tagged records. A command holds
 * enough data to apply the edit and to reverse it, so undo frames can be
 * inspected and tested without executing anything.
 *
 * Applying a command performs the raw mutation and then runs dirty
 * propagation from the affected plug (renamed plugs included).
 *
 * @module undo
 */

import { dirty_propagate } from '../dirty/DirtyPropagator.js';
import type { GraphComponent } from '../graph/GraphComponent.js';
import type { Plug } from '../graph/Plug.js';
import type { ValuePlug } from '../graph/ValuePlug.js';
import type { PlugFlags, PlugValue } from '../graph/types.js';
import type { MetadataEntry, MetadataStore } from '../metadata/MetadataStore.js';

/**
 * Something that can (re)load a definition by identifier. Implemented by
 * references; kept structural so this module never imports them.
 */
export interface SourceLoader {
    readonly fullName: string;
    source_apply(sourceId: string): void;
}

export type GraphCommand =
    | { kind: 'setInput'; plug: Plug; previous: Plug | null; next: Plug | null }
    | { kind: 'setValue'; plug: ValuePlug; previous: PlugValue; next: PlugValue }
    | { kind: 'addChild'; parent: GraphComponent; child: GraphComponent; index: number }
    | { kind: 'removeChild'; parent: GraphComponent; child: GraphComponent; index: number }
    | { kind: 'rename'; component: GraphComponent; previous: string; next: string }
    | { kind: 'setFlags'; plug: Plug; previous: PlugFlags; next: PlugFlags }
    | {
        kind: 'setMetadata';
        store: MetadataStore;
        target: GraphComponent;
        key: string;
        previous: MetadataEntry | null;
        next: MetadataEntry | null;
    }
    | { kind: 'loadReference'; reference: SourceLoader; previous: string; next: string };

export type CommandDirection = 'forward' | 'inverse';

/**
 * Apply a command in either direction.
 */
export function command_apply(command: GraphCommand, direction: CommandDirection): void {
    const forward: boolean = direction === 'forward';
    switch (command.kind) {
        case 'setInput':
            command.plug.input_assign(forward ? command.next : command.previous);
            dirty_propagate(command.plug);
            return;
        case 'setValue':
            command.plug.value_assign(forward ? command.next : command.previous);
            dirty_propagate(command.plug);
            return;
        case 'addChild':
            if (forward) {
                command.parent.child_insert(command.child, command.index);
            } else {
                command.parent.child_detach(command.child);
            }
            parent_dirty(command.parent);
            return;
        case 'removeChild':
            if (forward) {
                command.parent.child_detach(command.child);
            } else {
                command.parent.child_insert(command.child, command.index);
            }
            parent_dirty(command.parent);
            return;
        case 'rename':
            command.component.name_assign(forward ? command.next : command.previous);
            // Nodes look plugs up by name, so a renamed plug reads differently.
            if (plug_is(command.component)) {
                dirty_propagate(command.component);
            }
            return;
        case 'setFlags':
            command.plug.flags_assign(forward ? command.next : command.previous);
            return;
        case 'setMetadata':
            command.store.entry_assign(command.target, command.key, forward ? command.next : command.previous);
            return;
        case 'loadReference':
            command.reference.source_apply(forward ? command.next : command.previous);
            return;
    }
}

/** One-line human description, used as the label of implicit frames. */
export function command_describe(command: GraphCommand): string {
    switch (command.kind) {
        case 'setInput':
            return command.next
                ? `Connect ${command.next.fullName} to ${command.plug.fullName}`
                : `Disconnect ${command.plug.fullName}`;
        case 'setValue':
            return `Set ${command.plug.fullName}`;
        case 'addChild':
            return `Add ${command.child.name} to ${command.parent.fullName}`;
        case 'removeChild':
            return `Remove ${command.child.name} from ${command.parent.fullName}`;
        case 'rename':
            return `Rename ${command.previous} to ${command.next}`;
        case 'setFlags':
            return `Set flags on ${command.plug.fullName}`;
        case 'setMetadata':
            return `Set metadata "${command.key}" on ${command.target.fullName}`;
        case 'loadReference':
            return `Load "${command.next}" into ${command.reference.fullName}`;
    }
}

/** A compound plug's fingerprint covers its children. */
function parent_dirty(parent: GraphComponent): void {
    if (plug_is(parent)) {
        dirty_propagate(parent);
    }
}

function plug_is(component: GraphComponent): component is Plug {
    return component.componentKind === 'plug';
}
