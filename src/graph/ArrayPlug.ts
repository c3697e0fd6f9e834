/**
 * @file Array Plug
 *
 * Compound plug whose children are copies of one element plug, named
 * `<element><index>` (`in0`, `in1`, ...). Connecting the last element
 * appends a fresh one, up to `maxSize`, so there is always a free slot
 * to connect into. Connecting a larger array grows this one to match.
 *
 * @module graph
 */

import { Plug } from './Plug.js';
import { StructuralError } from '../errors.js';
import type { PlugDirection, PlugOptions } from './types.js';

export interface ArrayPlugOptions extends PlugOptions {
    minSize?: number;
    maxSize?: number;
}

export class ArrayPlug extends Plug {
    readonly element: Plug;
    readonly minSize: number;
    readonly maxSize: number;

    constructor(name: string, element: Plug, options: ArrayPlugOptions = {}) {
        super(name, options);
        this.minSize = Math.max(1, options.minSize ?? 1);
        this.maxSize = Math.max(this.minSize, options.maxSize ?? Number.MAX_SAFE_INTEGER);
        if (element.parent) {
            throw new StructuralError(`Array element "${element.fullName}" already has a parent`);
        }
        this.element = element;
        this.size_ensure(this.minSize);
    }

    override get typeName(): string {
        return 'ArrayPlug';
    }

    get size(): number {
        return this.plugs_list().length;
    }

    /** The element at `index`, if present. */
    at(index: number): Plug | undefined {
        return this.plugs_list()[index];
    }

    override clone_create(name: string = this.name, direction: PlugDirection = this.direction): ArrayPlug {
        return new ArrayPlug(name, this.element.clone_create(this.element.name, direction), {
            direction,
            minSize: this.minSize,
            maxSize: this.maxSize,
            flags: { ...this.flags, dynamic: true },
        });
    }

    protected override resizable(): boolean {
        return true;
    }

    protected override size_ensure(count: number): void {
        const target: number = Math.min(count, this.maxSize);
        for (let index = this.size; index < target; index++) {
            const slot: Plug = this.element.clone_create(`${this.element.name}${index}`, this.direction);
            // Slots belong to the array, not to whoever connected them.
            slot.flags_set({ dynamic: false });
            this.child_add(slot);
        }
    }

    protected override childInput_changed(child: Plug): void {
        super.childInput_changed(child);
        const elements: Plug[] = this.plugs_list();
        if (child.input && elements[elements.length - 1] === child) {
            this.size_ensure(elements.length + 1);
        }
    }
}
