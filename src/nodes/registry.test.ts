/**
 * @file Node Registry Tests
 *
 * @module nodes
 */

import { describe, it, expect } from 'vitest';
import { NodeRegistry, builtins_register } from './registry.js';
import { Arithmetic } from './Arithmetic.js';
import { Node } from '../graph/Node.js';
import { RegistryError } from '../errors.js';

describe('nodes/registry', () => {

    it('should come with the built-in node types', () => {
        expect(NodeRegistry.instance_get().typeNames_list()).toEqual([
            'Arithmetic',
            'ContextVariables',
            'HierarchySource',
            'Node',
            'Reference',
            'SceneProcessor',
            'StringSubstitute',
            'SubGraph',
            'SubTree',
        ]);
    });

    it('should create named nodes of the requested type', () => {
        const node: Node = NodeRegistry.instance_get().create('Arithmetic', 'mult');
        expect(node).toBeInstanceOf(Arithmetic);
        expect(node.name).toBe('mult');
        expect(node.typeName).toBe('Arithmetic');
    });

    it('should refuse unknown types', () => {
        expect(() => new NodeRegistry().create('Teapot', 't')).toThrow('Unknown node type "Teapot"');
    });

    it('should refuse duplicate registrations', () => {
        const registry = new NodeRegistry();
        builtins_register(registry);
        expect(() => registry.register('Node', (name: string): Node => new Node(name))).toThrow(RegistryError);
    });

    it('should accept custom types', () => {
        const registry = new NodeRegistry();
        registry.register('Marker', (name: string): Node => new Node(name));
        expect(registry.has('Marker')).toBe(true);
        expect(registry.create('Marker', 'm').name).toBe('m');
    });
});
