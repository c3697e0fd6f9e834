/**
 * @file Definition Parser
 *
 * Parses definition YAML into a validated `RawDefinition`. The document
 * is checked against `DefinitionSchema` (Zod) before any field is read.
 *
 * @module definition
 */

import yaml from 'js-yaml';
import { DefinitionSyntaxError, error_message } from '../errors.js';
import { DefinitionSchema, type RawDefinition } from './schemas.js';

/**
 * Parse a definition document.
 *
 * @param sourceId - Identifier used in error messages
 * @throws DefinitionSyntaxError on malformed YAML or schema violations
 */
export function definition_parse(text: string, sourceId: string): RawDefinition {
    let raw: unknown;
    try {
        raw = yaml.load(text);
    } catch (err: unknown) {
        throw new DefinitionSyntaxError(sourceId, error_message(err));
    }

    // An empty document defines an empty container.
    const result = DefinitionSchema.safeParse(raw ?? {});
    if (!result.success) {
        const issues: string = result.error.issues
            .map((issue) => `[${issue.path.join('.')}] ${issue.message}`)
            .join('; ');
        throw new DefinitionSyntaxError(sourceId, issues);
    }
    return result.data;
}

/** Serialize a definition back to YAML, omitting empty sections. */
export function definition_stringify(definition: RawDefinition): string {
    const document: Record<string, unknown> = {};
    if (definition.version) document.version = definition.version;
    if (definition.plugs.length > 0) document.plugs = definition.plugs;
    if (definition.nodes.length > 0) document.nodes = definition.nodes;
    if (definition.connections.length > 0) document.connections = definition.connections;
    if (definition.metadata.length > 0) document.metadata = definition.metadata;
    return yaml.dump(document);
}
