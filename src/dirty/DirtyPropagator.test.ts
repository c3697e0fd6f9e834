/**
 * @file Dirty Propagator Tests
 *
 * @module dirty
 */

import { describe, it, expect } from 'vitest';
import { dirty_collect } from './DirtyPropagator.js';
import { Graph } from '../graph/Graph.js';
import { Arithmetic } from '../nodes/Arithmetic.js';
import { HierarchySource } from '../scene/HierarchySource.js';
import { SceneProcessor } from '../scene/SceneProcessor.js';
import { ComputeCache } from '../cache/ComputeCache.js';
import { MetadataStore } from '../metadata/MetadataStore.js';
import { silentLogger } from '../log/logger.js';
import type { Node } from '../graph/Node.js';
import type { Plug } from '../graph/Plug.js';

function graph_create(): Graph {
    return new Graph('root', { cache: new ComputeCache(), metadata: new MetadataStore(), logger: silentLogger });
}

/** Names of the plugs of `node` reported dirty, in notification order. */
function dirtied_record(node: Node): string[] {
    const names: string[] = [];
    node.plugDirtiedSignal.subscribe((plug: Plug): void => {
        names.push(plug.relativeName(node));
    });
    return names;
}

describe('dirty/DirtyPropagator', () => {

    it('should follow affects declarations and connections', () => {
        const graph = graph_create();
        const a = graph.child_add(new Arithmetic('a'));
        const b = graph.child_add(new Arithmetic('b'));
        b.op1.input_set(a.product);

        expect(dirty_collect(a.op1).map((plug) => plug.fullName)).toEqual([
            'root.a.op1',
            'root.a.product',
            'root.b.op1',
            'root.b.product',
        ]);
    });

    it('should notify each node once per dirtied plug', () => {
        const graph = graph_create();
        const a = graph.child_add(new Arithmetic('a'));
        const b = graph.child_add(new Arithmetic('b'));
        b.op1.input_set(a.product);
        const seenA: string[] = dirtied_record(a);
        const seenB: string[] = dirtied_record(b);

        a.op1.value_set(1);
        expect(seenA).toEqual(['op1', 'product']);
        expect(seenB).toEqual(['op1', 'product']);
    });

    it('should visit a diamond join once', () => {
        const graph = graph_create();
        const a = graph.child_add(new Arithmetic('a'));
        const b = graph.child_add(new Arithmetic('b'));
        b.op1.input_set(a.product);
        b.op2.input_set(a.product);
        const seenB: string[] = dirtied_record(b);

        a.op2.value_set(5);
        expect(seenB).toEqual(['op1', 'op2', 'product']);
    });

    it('should change downstream fingerprints and leave unrelated ones alone', () => {
        const graph = graph_create();
        const a = graph.child_add(new Arithmetic('a'));
        const b = graph.child_add(new Arithmetic('b'));
        const c = graph.child_add(new Arithmetic('c'));
        b.op1.input_set(a.product);

        const before = { b: b.product.hash_get(), c: c.product.hash_get() };
        a.op1.value_set(7);
        expect(b.product.hash_get()).not.toBe(before.b);
        expect(c.product.hash_get()).toBe(before.c);
    });

    it('should bump the generation of every visited plug', () => {
        const graph = graph_create();
        const a = graph.child_add(new Arithmetic('a'));
        const before: number = a.product.generation;
        a.op2.value_set(3);
        expect(a.product.generation).toBe(before + 1);
    });

    it('should notify each plug once when a compound is connected', () => {
        const graph = graph_create();
        const source = graph.child_add(new HierarchySource('source'));
        const processor = graph.child_add(new SceneProcessor('processor'));
        const seen: string[] = dirtied_record(processor);

        processor.in.input_set(source.out);

        expect([...seen].sort()).toEqual([
            'in',
            'in.attributes',
            'in.childNames',
            'in.globals',
            'in.object',
            'in.transform',
            'out',
            'out.attributes',
            'out.childNames',
            'out.globals',
            'out.object',
            'out.transform',
        ]);
    });

    it('should notify each plug once when a compound connection is undone', () => {
        const graph = graph_create();
        const source = graph.child_add(new HierarchySource('source'));
        const processor = graph.child_add(new SceneProcessor('processor'));
        processor.in.input_set(source.out);
        const seen: string[] = dirtied_record(processor);

        graph.undoLog.undo();

        expect(processor.in.input).toBeNull();
        expect(seen).toHaveLength(new Set(seen).size);
        expect(seen).toContain('out.childNames');
    });
});
