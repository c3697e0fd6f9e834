/**
 * @file YAML Definition Source
 *
 * Executes YAML definitions from a `DefinitionLibrary` into a container.
 * Sections run in dependency order: version, nodes, plugs (which may be
 * declared on those nodes), node values, connections, metadata. A
 * failing statement is logged and skipped; the rest still run, and the
 * source reports that errors occurred.
 *
 * @module definition
 */

import { DefinitionLibrary } from './DefinitionLibrary.js';
import { definition_parse } from './parser.js';
import { NodeRegistry } from '../nodes/registry.js';
import { Plug } from '../graph/Plug.js';
import { BoolPlug, FloatPlug, IntPlug, ObjectPlug, StringPlug } from '../graph/ValuePlug.js';
import { component_isPlug, type GraphComponent } from '../graph/GraphComponent.js';
import { StructuralError, error_message, loadContext_format } from '../errors.js';
import { silentLogger, type Logger } from '../log/logger.js';
import { MAJOR_VERSION_KEY, MILESTONE_VERSION_KEY, type DefinitionSource } from '../reference/types.js';
import type { Node } from '../graph/Node.js';
import type { SubGraph } from '../graph/SubGraph.js';
import type { Hashable } from '../fingerprint/types.js';
import type { RawConnection, RawDefinition, RawMetadata, RawNode, RawPlug } from './schemas.js';

export interface YamlDefinitionSourceOptions {
    registry?: NodeRegistry;
    /** Overrides the container's graph logger. */
    logger?: Logger;
}

export class YamlDefinitionSource implements DefinitionSource {
    private readonly registry: NodeRegistry;

    constructor(
        readonly library: DefinitionLibrary,
        private readonly options: YamlDefinitionSourceOptions = {},
    ) {
        this.registry = options.registry ?? NodeRegistry.instance_get();
    }

    definition_execute(container: SubGraph, sourceId: string): boolean {
        const logger: Logger = this.options.logger ?? container.host_get()?.logger ?? silentLogger;
        const context: string = loadContext_format(sourceId, container.name);

        let definition: RawDefinition;
        try {
            const text: string | null = this.library.document_get(sourceId);
            if (text === null) {
                logger.error(context, `Definition "${sourceId}" not found`);
                return true;
            }
            definition = definition_parse(text, sourceId);
        } catch (err: unknown) {
            logger.error(context, error_message(err));
            return true;
        }

        let errors: boolean = false;
        const statement_run = (label: string, fn: () => void): void => {
            try {
                fn();
            } catch (err: unknown) {
                errors = true;
                logger.error(context, `${label}: ${error_message(err)}`);
            }
        };

        const version = definition.version;
        if (version) {
            statement_run('version', (): void => {
                const store = container.metadata_store();
                store.value_set(container, MILESTONE_VERSION_KEY, version.milestone, false);
                store.value_set(container, MAJOR_VERSION_KEY, version.major, false);
            });
        }
        const created: Array<[Node, RawNode]> = [];
        for (const raw of definition.nodes) {
            statement_run(`node "${raw.name}"`, (): void => {
                created.push([container.child_add(this.registry.create(raw.type, raw.name)), raw]);
            });
        }
        for (const raw of definition.plugs) {
            statement_run(`plug "${raw.name}"`, (): void => plug_declare(container, raw));
        }
        for (const [node, raw] of created) {
            for (const [plugPath, value] of Object.entries(raw.values)) {
                statement_run(`value "${raw.name}.${plugPath}"`, (): void => value_apply(node, plugPath, value));
            }
        }
        for (const raw of definition.connections) {
            statement_run(`connection "${raw.from}" -> "${raw.to}"`, (): void => connection_make(container, raw));
        }
        for (const raw of definition.metadata) {
            statement_run(`metadata "${raw.target}"`, (): void => metadata_apply(container, raw));
        }

        return errors;
    }
}

// ─── Statements ─────────────────────────────────────────────────────────────

/**
 * Create a plug. A dotted name creates it under a plug or node of the
 * container (`user.note`, `vars.in`).
 */
function plug_declare(container: SubGraph, raw: RawPlug): void {
    const segments: string[] = raw.name.split('.');
    const leafName: string = segments[segments.length - 1];
    const parentPath: string = segments.slice(0, -1).join('.');

    const parent: GraphComponent | undefined = parentPath ? container.descendant_get(parentPath) : container;
    if (!parent) {
        throw new StructuralError(`"${container.fullName}" has no member "${parentPath}"`);
    }
    parent.child_add(plug_create(leafName, raw));
}

function plug_create(name: string, raw: RawPlug): Plug {
    const base = { direction: raw.direction, flags: { dynamic: true } };
    const initial: Hashable | undefined = raw.default;
    switch (raw.type) {
        case 'float':
            return new FloatPlug(name, { ...base, defaultValue: number_expect(initial, raw.name) });
        case 'int':
            return new IntPlug(name, { ...base, defaultValue: number_expect(initial, raw.name) });
        case 'string':
            return new StringPlug(name, { ...base, defaultValue: string_expect(initial, raw.name) });
        case 'bool':
            return new BoolPlug(name, { ...base, defaultValue: bool_expect(initial, raw.name) });
        case 'object':
            return new ObjectPlug(name, { ...base, defaultValue: initial });
        case 'compound':
            if (initial !== undefined) {
                throw new StructuralError(`compound plug "${raw.name}" cannot have a default`);
            }
            return new Plug(name, base);
    }
}

function value_apply(node: Node, plugPath: string, value: Hashable): void {
    const plug: Plug | undefined = node.plugPath_get(plugPath);
    if (!plug) {
        throw new StructuralError(`"${node.fullName}" has no plug "${plugPath}"`);
    }
    if (!plug.isValuePlug()) {
        throw new StructuralError(`"${plug.fullName}" does not hold a value`);
    }
    plug.value_set(value);
}

function connection_make(container: SubGraph, raw: RawConnection): void {
    const source: Plug = plug_resolve(container, raw.from);
    const destination: Plug = plug_resolve(container, raw.to);
    destination.input_set(source);
}

function metadata_apply(container: SubGraph, raw: RawMetadata): void {
    const target: GraphComponent | undefined = container.descendant_get(raw.target);
    if (!target) {
        throw new StructuralError(`"${container.fullName}" has no member "${raw.target}"`);
    }
    container.metadata_store().value_set(target, raw.key, raw.value, true);
}

function plug_resolve(container: SubGraph, plugPath: string): Plug {
    const found: GraphComponent | undefined = container.descendant_get(plugPath);
    if (!component_isPlug(found)) {
        throw new StructuralError(`"${container.fullName}" has no plug "${plugPath}"`);
    }
    return found;
}

// ─── Defaults ───────────────────────────────────────────────────────────────

function number_expect(value: Hashable | undefined, name: string): number | undefined {
    if (value === undefined || typeof value === 'number') return value;
    throw new StructuralError(`default of "${name}" must be a number`);
}

function string_expect(value: Hashable | undefined, name: string): string | undefined {
    if (value === undefined || typeof value === 'string') return value;
    throw new StructuralError(`default of "${name}" must be a string`);
}

function bool_expect(value: Hashable | undefined, name: string): boolean | undefined {
    if (value === undefined || typeof value === 'boolean') return value;
    throw new StructuralError(`default of "${name}" must be a boolean`);
}
