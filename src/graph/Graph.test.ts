/**
 * @file Graph Host Tests
 *
 * @module graph
 */

import { describe, it, expect } from 'vitest';
import { Graph } from './Graph.js';
import { Node } from './Node.js';
import { SubGraph } from './SubGraph.js';
import { Arithmetic } from '../nodes/Arithmetic.js';
import { ComputeCache } from '../cache/ComputeCache.js';
import { MetadataStore } from '../metadata/MetadataStore.js';
import { StructuralError } from '../errors.js';
import { silentLogger } from '../log/logger.js';
import type { Plug } from './Plug.js';

function graph_create(): Graph {
    return new Graph('root', { cache: new ComputeCache(), metadata: new MetadataStore(), logger: silentLogger });
}

describe('graph/Graph', () => {

    it('should host its descendants and nothing outside it', () => {
        const graph = graph_create();
        const node = graph.child_add(new SubGraph('box')).child_add(new Node('inner'));
        expect(node.host_get()).toBe(graph);
        expect(new Node('loose').host_get()).toBeNull();
    });

    it('should hand out its own metadata store', () => {
        const metadata = new MetadataStore();
        const graph = new Graph('root', { metadata, logger: silentLogger });
        const node = graph.child_add(new Node('n'));
        node.metadata_set('note', 'hello');
        expect(metadata.value_get(node, 'note')).toBe('hello');
        expect(node.metadata_get('note')).toBe('hello');
    });

    it('should only accept plugs and nodes under a node', () => {
        const node = new Node('n');
        expect(() => node.child_add(new Node('child'))).toThrow(StructuralError);
    });

    it('should defer dirtied notifications inside a disabled scope', () => {
        const graph = graph_create();
        const a = graph.child_add(new Arithmetic('a'));
        const seen: string[] = [];
        a.plugDirtiedSignal.subscribe((plug: Plug): void => { seen.push(plug.name); });

        graph.undoLog.scope_run('quiet', () => {
            a.op1.value_set(1);
            a.op1.value_set(2);
            expect(seen).toEqual([]);
        }, 'disabled');

        expect(seen).toEqual(['op1', 'product']);
    });

    it('should still invalidate fingerprints while notifications are deferred', () => {
        const graph = graph_create();
        const a = graph.child_add(new Arithmetic('a'));
        const before: string = a.product.hash_get();
        graph.undoLog.scope_run('quiet', () => {
            a.op1.value_set(4);
            expect(a.product.hash_get()).not.toBe(before);
        }, 'disabled');
    });

    it('should drop deferred notifications for plugs that left the graph', () => {
        const graph = graph_create();
        const a = graph.child_add(new Arithmetic('a'));
        const seen: string[] = [];
        a.plugDirtiedSignal.subscribe((plug: Plug): void => { seen.push(plug.name); });

        graph.undoLog.scope_run('quiet', () => {
            a.op1.value_set(1);
            graph.child_remove(a);
        }, 'disabled');

        expect(seen).toEqual([]);
    });
});
