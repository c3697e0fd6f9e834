/**
 * @file Node Registry
 *
 * Maps node type names to factories, so definitions can name the nodes
 * they create. The process-wide registry comes with the built-in types.
 *
 * @module nodes
 */

import { RegistryError } from '../errors.js';
import { Node } from '../graph/Node.js';
import { SubGraph } from '../graph/SubGraph.js';
import { Reference } from '../reference/Reference.js';
import { Arithmetic } from './Arithmetic.js';
import { ContextVariables } from './ContextVariables.js';
import { StringSubstitute } from './StringSubstitute.js';
import { HierarchySource } from '../scene/HierarchySource.js';
import { SceneProcessor } from '../scene/SceneProcessor.js';
import { SubTree } from '../scene/SubTree.js';

export type NodeFactory = (name: string) => Node;

export class NodeRegistry {
    private static singleton: NodeRegistry | null = null;
    private readonly factories = new Map<string, NodeFactory>();

    /** Process-wide registry, populated with the built-in node types. */
    public static instance_get(): NodeRegistry {
        if (!NodeRegistry.singleton) {
            NodeRegistry.singleton = new NodeRegistry();
            builtins_register(NodeRegistry.singleton);
        }
        return NodeRegistry.singleton;
    }

    /**
     * @throws RegistryError when `typeName` is already registered
     */
    public register(typeName: string, factory: NodeFactory): void {
        if (this.factories.has(typeName)) {
            throw new RegistryError(`Node type "${typeName}" is already registered`);
        }
        this.factories.set(typeName, factory);
    }

    public has(typeName: string): boolean {
        return this.factories.has(typeName);
    }

    public typeNames_list(): string[] {
        return Array.from(this.factories.keys()).sort();
    }

    /**
     * @throws RegistryError when `typeName` is unknown
     */
    public create(typeName: string, name: string): Node {
        const factory: NodeFactory | undefined = this.factories.get(typeName);
        if (!factory) {
            throw new RegistryError(`Unknown node type "${typeName}"`);
        }
        return factory(name);
    }
}

/** Register every built-in node type on `registry`. */
export function builtins_register(registry: NodeRegistry): void {
    registry.register('Node', (name: string): Node => new Node(name));
    registry.register('SubGraph', (name: string): Node => new SubGraph(name));
    registry.register('Reference', (name: string): Node => new Reference(name));
    registry.register('Arithmetic', (name: string): Node => new Arithmetic(name));
    registry.register('ContextVariables', (name: string): Node => new ContextVariables(name));
    registry.register('StringSubstitute', (name: string): Node => new StringSubstitute(name));
    registry.register('HierarchySource', (name: string): Node => new HierarchySource(name));
    registry.register('SceneProcessor', (name: string): Node => new SceneProcessor(name));
    registry.register('SubTree', (name: string): Node => new SubTree(name));
}
