/**
 * @file Value Plug Tests
 *
 * @module graph
 */

import { describe, it, expect } from 'vitest';
import { BoolPlug, FloatPlug, IntPlug, ObjectPlug, StringPlug } from './ValuePlug.js';
import { Graph } from './Graph.js';
import { Node } from './Node.js';
import { ComputeCache } from '../cache/ComputeCache.js';
import { MetadataStore } from '../metadata/MetadataStore.js';
import { StructuralError } from '../errors.js';
import { silentLogger } from '../log/logger.js';

function graph_create(): Graph {
    return new Graph('root', { cache: new ComputeCache(), metadata: new MetadataStore(), logger: silentLogger });
}

describe('graph/ValuePlug', () => {

    it('should start at its default value', () => {
        const plug = new FloatPlug('x', { defaultValue: 1.5 });
        expect(plug.storedValue).toBe(1.5);
        expect(plug.isSetToDefault()).toBe(true);
    });

    it('should fall back to a zero value per type', () => {
        expect(new FloatPlug('f').defaultValue).toBe(0);
        expect(new IntPlug('i').defaultValue).toBe(0);
        expect(new StringPlug('s').defaultValue).toBe('');
        expect(new BoolPlug('b').defaultValue).toBe(false);
        expect(new ObjectPlug('o').defaultValue).toBeNull();
    });

    it('should reject an invalid default', () => {
        expect(() => new IntPlug('n', { defaultValue: 1.5 }))
            .toThrow('Invalid value for int plug "n": expected an integer');
    });

    it('should reject values of the wrong type', () => {
        const plug = new StringPlug('s');
        expect(() => plug.value_set(3)).toThrow('Invalid value for string plug "s": expected a string');
        expect(() => new FloatPlug('f').value_set(Number.NaN)).toThrow(StructuralError);
        expect(() => new ObjectPlug('o').value_set(undefined)).toThrow('undefined is not a value');
    });

    it('should refuse values on output plugs', () => {
        const plug = new FloatPlug('o', { direction: 'out' });
        expect(() => plug.value_set(1)).toThrow('Cannot set a value on output plug "o"');
    });

    it('should refuse values on connected plugs', () => {
        const graph = graph_create();
        const a = graph.child_add(new Node('a'));
        const b = graph.child_add(new Node('b'));
        const source = a.child_add(new FloatPlug('x'));
        const target = b.child_add(new FloatPlug('x'));
        target.input_set(source);
        expect(() => target.value_set(2)).toThrow('Cannot set a value on connected plug "root.b.x"');
    });

    it('should record value edits for undo', () => {
        const graph = graph_create();
        const plug = graph.child_add(new Node('n')).child_add(new FloatPlug('x'));
        plug.value_set(2);
        expect(plug.isSetToDefault()).toBe(false);
        expect(graph.undoLog.frames_list().at(-1)?.label).toBe('Set root.n.x');
        graph.undoLog.undo();
        expect(plug.storedValue).toBe(0);
    });

    it('should not record setting an equal value', () => {
        const graph = graph_create();
        const plug = graph.child_add(new Node('n')).child_add(new ObjectPlug('o', { defaultValue: { a: [1] } }));
        const before: number = graph.undoLog.frames_list().length;
        plug.value_set({ a: [1] });
        expect(graph.undoLog.frames_list()).toHaveLength(before);
    });

    it('should record an edit between different lone surrogates', () => {
        const graph = graph_create();
        const plug = graph.child_add(new Node('n')).child_add(new StringPlug('s', { defaultValue: '\uD800' }));
        plug.value_set('\uDFFF');
        expect(plug.storedValue).toBe('\uDFFF');
        expect(graph.undoLog.frames_list().at(-1)?.label).toBe('Set root.n.s');
    });

    it('should round when copying a float into an int', () => {
        const source = new FloatPlug('f', { defaultValue: 2.6 });
        const target = new IntPlug('i');
        target.value_setFrom(source);
        expect(target.storedValue).toBe(3);
    });

    it('should refuse to copy across unrelated types', () => {
        expect(() => new StringPlug('s').value_setFrom(new FloatPlug('f')))
            .toThrow('Cannot copy "f" to "s": type mismatch (float into string)');
    });

    it('should coerce values arriving over a connection', () => {
        const graph = graph_create();
        const source = graph.child_add(new Node('a')).child_add(new FloatPlug('x', { defaultValue: 2.6 }));
        const target = graph.child_add(new Node('b')).child_add(new IntPlug('i'));
        target.input_set(source);
        expect(target.value_get()).toBe(3);
        expect(target.hash_get()).not.toBe(source.hash_get());
    });

    it('should make clones dynamic with the same default', () => {
        const clone = new FloatPlug('x', { defaultValue: 4 }).clone_create('y', 'out');
        expect(clone.name).toBe('y');
        expect(clone.direction).toBe('out');
        expect(clone.defaultValue).toBe(4);
        expect(clone.flags.dynamic).toBe(true);
    });
});
