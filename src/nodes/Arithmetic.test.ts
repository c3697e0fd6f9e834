/**
 * @file Arithmetic Node Tests
 *
 * @module nodes
 */

import { describe, it, expect } from 'vitest';
import { Arithmetic } from './Arithmetic.js';
import { Graph } from '../graph/Graph.js';
import { ComputeCache } from '../cache/ComputeCache.js';
import { MetadataStore } from '../metadata/MetadataStore.js';
import { silentLogger } from '../log/logger.js';

function arithmetic_create(op1: number, op2: number, operation: string): Arithmetic {
    const graph = new Graph('root', { cache: new ComputeCache(), metadata: new MetadataStore(), logger: silentLogger });
    const node = graph.child_add(new Arithmetic('a'));
    node.op1.value_set(op1);
    node.op2.value_set(op2);
    node.operation.value_set(operation);
    return node;
}

describe('nodes/Arithmetic', () => {

    const cases: Array<{ operation: string; op1: number; op2: number; expected: number }> = [
        { operation: 'add', op1: 6, op2: 3, expected: 9 },
        { operation: 'subtract', op1: 6, op2: 3, expected: 3 },
        { operation: 'multiply', op1: 6, op2: 3, expected: 18 },
        { operation: 'divide', op1: 6, op2: 3, expected: 2 },
    ];
    for (const { operation, op1, op2, expected } of cases) {
        it(`should ${operation}`, () => {
            expect(arithmetic_create(op1, op2, operation).product.value_get()).toBe(expected);
        });
    }

    it('should default to adding', () => {
        expect(new Arithmetic().operation.defaultValue).toBe('add');
    });

    it('should fail on an unknown operation', () => {
        expect(() => arithmetic_create(1, 2, 'modulo').product.value_get())
            .toThrow('Error computing "root.a.product": Unknown operation "modulo"');
    });

    it('should declare its product as affected by every input', () => {
        const node = new Arithmetic('a');
        for (const input of [node.op1, node.op2, node.operation]) {
            expect(node.affects(input)).toEqual([node.product]);
        }
        expect(node.affects(node.userPlug)).toEqual([]);
    });
});
