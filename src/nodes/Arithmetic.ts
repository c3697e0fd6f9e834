/**
 * @file Arithmetic Node
 *
 * `product = op1 <operation> op2` over floats.
 *
 * @module nodes
 */

import { ComputeNode } from '../graph/ComputeNode.js';
import { FloatPlug, StringPlug } from '../graph/ValuePlug.js';
import type { Plug } from '../graph/Plug.js';
import type { Context } from '../context/Context.js';
import type { EvaluationScope, PlugValue } from '../graph/types.js';

export const ARITHMETIC_OPERATIONS = ['add', 'subtract', 'multiply', 'divide'] as const;
export type ArithmeticOperation = typeof ARITHMETIC_OPERATIONS[number];

export class Arithmetic extends ComputeNode {
    readonly op1: FloatPlug;
    readonly op2: FloatPlug;
    readonly operation: StringPlug;
    readonly product: FloatPlug;

    constructor(name: string = 'Arithmetic') {
        super(name);
        this.op1 = this.child_add(new FloatPlug('op1'));
        this.op2 = this.child_add(new FloatPlug('op2'));
        this.operation = this.child_add(new StringPlug('operation', { defaultValue: 'add' }));
        this.product = this.child_add(new FloatPlug('product', { direction: 'out' }));

        for (const input of [this.op1, this.op2, this.operation]) {
            this.affects_declare(input, this.product);
        }
    }

    override get typeName(): string {
        return 'Arithmetic';
    }

    override compute(output: Plug, context: Context, scope: EvaluationScope): PlugValue {
        if (output !== this.product) {
            return super.compute(output, context, scope);
        }
        const a: number = this.number_read(scope, this.op1, context);
        const b: number = this.number_read(scope, this.op2, context);
        const operation: string = this.string_read(scope, this.operation, context);
        if (!operation_is(operation)) {
            throw new Error(`Unknown operation "${operation}"`);
        }
        return operation_apply(operation, a, b);
    }
}

function operation_is(value: string): value is ArithmeticOperation {
    return ARITHMETIC_OPERATIONS.some((operation: ArithmeticOperation): boolean => operation === value);
}

function operation_apply(operation: ArithmeticOperation, a: number, b: number): number {
    switch (operation) {
        case 'add':      return a + b;
        case 'subtract': return a - b;
        case 'multiply': return a * b;
        case 'divide':
            if (b === 0) throw new RangeError('Division by zero');
            return a / b;
    }
}
