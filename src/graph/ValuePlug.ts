/**
 * @file Value Plugs
 *
 * Leaf plugs carrying a typed value. An unconnected input holds a
 * literal value (initially its default); a connected plug takes its
 * value from upstream; an unconnected output is computed by its node.
 *
 * Numeric types interconvert across connections (int ← float rounds);
 * every other type only connects to its own kind.
 *
 * @module graph
 */

import { Plug } from './Plug.js';
import { action_enact } from './enact.js';
import { StructuralError } from '../errors.js';
import { hashable_equals } from '../fingerprint/hasher.js';
import type { PlugDirection, PlugOptions, PlugType, PlugValue, ValuePlugOptions } from './types.js';

export type ValuePlugType = Exclude<PlugType, 'compound'>;

const NUMERIC: ReadonlySet<PlugType> = new Set<PlugType>(['float', 'int']);

export abstract class ValuePlug extends Plug {
    readonly defaultValue: PlugValue;
    private currentValue: PlugValue;

    protected constructor(name: string, defaultValue: PlugValue, options: PlugOptions = {}) {
        super(name, options);
        this.value_check(defaultValue);
        this.defaultValue = defaultValue;
        this.currentValue = defaultValue;
    }

    abstract override get plugType(): ValuePlugType;

    override isValuePlug(): this is ValuePlug {
        return true;
    }

    /** The literal value held by this plug (ignores connections). */
    get storedValue(): PlugValue {
        return this.currentValue;
    }

    /**
     * Set the literal value, enacted.
     *
     * @throws StructuralError on a type mismatch, a connected plug or an
     *   output plug
     */
    value_set(value: PlugValue): void {
        if (this.direction === 'out') {
            throw new StructuralError(`Cannot set a value on output plug "${this.fullName}"`);
        }
        if (this.input) {
            throw new StructuralError(`Cannot set a value on connected plug "${this.fullName}"`);
        }
        this.value_check(value);
        if (hashable_equals(value, this.currentValue)) return;
        action_enact(this, { kind: 'setValue', plug: this, previous: this.currentValue, next: value });
    }

    /** Copy the literal value of another value plug. */
    value_setFrom(source: ValuePlug): void {
        const refusal: string | null = this.typeRefusal(source);
        if (refusal) {
            throw new StructuralError(`Cannot copy "${source.fullName}" to "${this.fullName}": ${refusal}`);
        }
        this.value_set(this.value_coerce(source.storedValue));
    }

    override isSetToDefault(): boolean {
        return this.input === null && hashable_equals(this.currentValue, this.defaultValue);
    }

    /** Convert a value arriving from a connected plug of another type. */
    value_coerce(value: PlugValue): PlugValue {
        if (this.plugType === 'int' && typeof value === 'number') return Math.round(value);
        return value;
    }

    /** Throw unless `value` is valid for this plug type. */
    value_check(value: PlugValue): void {
        const problem: string | null = this.valueProblem(value);
        if (problem) {
            throw new StructuralError(`Invalid value for ${this.plugType} plug "${this.fullName}": ${problem}`);
        }
    }

    /** Explain why `value` is invalid, or return null. */
    protected abstract valueProblem(value: PlugValue): string | null;

    protected override typeRefusal(source: Plug): string | null {
        if (source.plugType === this.plugType) return null;
        if (NUMERIC.has(source.plugType) && NUMERIC.has(this.plugType)) return null;
        return `type mismatch (${source.plugType} into ${this.plugType})`;
    }

    /** @internal */
    value_assign(value: PlugValue): void {
        this.currentValue = value;
    }
}

// ─── Concrete types ─────────────────────────────────────────────

export class FloatPlug extends ValuePlug {
    constructor(name: string, options: ValuePlugOptions<number> = {}) {
        super(name, options.defaultValue ?? 0, options);
    }

    override get typeName(): string { return 'FloatPlug'; }
    get plugType(): ValuePlugType { return 'float'; }

    protected valueProblem(value: PlugValue): string | null {
        return typeof value === 'number' && Number.isFinite(value) ? null : 'expected a finite number';
    }

    override clone_create(name: string = this.name, direction: PlugDirection = this.direction): FloatPlug {
        return new FloatPlug(name, { direction, defaultValue: number_default(this), flags: { ...this.flags, dynamic: true } });
    }
}

export class IntPlug extends ValuePlug {
    constructor(name: string, options: ValuePlugOptions<number> = {}) {
        super(name, options.defaultValue ?? 0, options);
    }

    override get typeName(): string { return 'IntPlug'; }
    get plugType(): ValuePlugType { return 'int'; }

    protected valueProblem(value: PlugValue): string | null {
        return typeof value === 'number' && Number.isInteger(value) ? null : 'expected an integer';
    }

    override clone_create(name: string = this.name, direction: PlugDirection = this.direction): IntPlug {
        return new IntPlug(name, { direction, defaultValue: number_default(this), flags: { ...this.flags, dynamic: true } });
    }
}

export class StringPlug extends ValuePlug {
    constructor(name: string, options: ValuePlugOptions<string> = {}) {
        super(name, options.defaultValue ?? '', options);
    }

    override get typeName(): string { return 'StringPlug'; }
    get plugType(): ValuePlugType { return 'string'; }

    protected valueProblem(value: PlugValue): string | null {
        return typeof value === 'string' ? null : 'expected a string';
    }

    override clone_create(name: string = this.name, direction: PlugDirection = this.direction): StringPlug {
        const defaultValue: PlugValue = this.defaultValue;
        return new StringPlug(name, {
            direction,
            defaultValue: typeof defaultValue === 'string' ? defaultValue : '',
            flags: { ...this.flags, dynamic: true },
        });
    }
}

export class BoolPlug extends ValuePlug {
    constructor(name: string, options: ValuePlugOptions<boolean> = {}) {
        super(name, options.defaultValue ?? false, options);
    }

    override get typeName(): string { return 'BoolPlug'; }
    get plugType(): ValuePlugType { return 'bool'; }

    protected valueProblem(value: PlugValue): string | null {
        return typeof value === 'boolean' ? null : 'expected a boolean';
    }

    override clone_create(name: string = this.name, direction: PlugDirection = this.direction): BoolPlug {
        return new BoolPlug(name, { direction, defaultValue: this.defaultValue === true, flags: { ...this.flags, dynamic: true } });
    }
}

/**
 * Arbitrary immutable structured value (records, arrays, null).
 */
export class ObjectPlug extends ValuePlug {
    constructor(name: string, options: ValuePlugOptions<PlugValue> = {}) {
        super(name, options.defaultValue ?? null, options);
    }

    override get typeName(): string { return 'ObjectPlug'; }
    get plugType(): ValuePlugType { return 'object'; }

    protected valueProblem(value: PlugValue): string | null {
        return value === undefined ? 'undefined is not a value' : null;
    }

    override clone_create(name: string = this.name, direction: PlugDirection = this.direction): ObjectPlug {
        return new ObjectPlug(name, { direction, defaultValue: this.defaultValue, flags: { ...this.flags, dynamic: true } });
    }
}

function number_default(plug: ValuePlug): number {
    return typeof plug.defaultValue === 'number' ? plug.defaultValue : 0;
}
