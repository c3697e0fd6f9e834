/**
 * @file Definition Schemas
 *
 * Zod runtime schemas for YAML definition documents. Each schema maps to
 * one section of a document; optional sections default to empty so a
 * definition only declares what it uses.
 *
 * @module definition
 */

import { z } from 'zod';
import type { Hashable } from '../fingerprint/types.js';

// ─── Values ───────────────────────────────────────────────────────────────────

/** Any YAML value a plug can hold: scalars, lists and maps, nested. */
export const ValueSchema: z.ZodType<Hashable> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(ValueSchema),
        z.record(z.string(), ValueSchema),
    ]),
);

/** Dotted relative path: `scale`, `user.note`, `mult.op1`. */
const PathSchema = z
    .string()
    .regex(/^[A-Za-z_][\w:]*(\.[A-Za-z_][\w:]*)*$/, 'must be a dotted name such as "mult.op1"');

// ─── Sections ─────────────────────────────────────────────────────────────────

export const VersionSchema = z.object({
    milestone: z.number().int().nonnegative().default(0),
    major:     z.number().int().nonnegative().default(0),
});

export const PlugSchema = z.object({
    name:      PathSchema,
    type:      z.enum(['float', 'int', 'string', 'bool', 'object', 'compound']),
    direction: z.enum(['in', 'out']).default('in'),
    default:   ValueSchema.optional(),
});

export const NodeSchema = z.object({
    name:   z.string().regex(/^[A-Za-z_][\w:]*$/, 'node name must be an identifier'),
    type:   z.string().min(1, 'node type is required'),
    values: z.record(z.string(), ValueSchema).default({}),
});

export const ConnectionSchema = z.object({
    from: PathSchema,
    to:   PathSchema,
});

export const MetadataSchema = z.object({
    target: PathSchema,
    key:    z.string().min(1, 'metadata key is required'),
    value:  ValueSchema,
});

// ─── Document ─────────────────────────────────────────────────────────────────

export const DefinitionSchema = z.object({
    version:     VersionSchema.optional(),
    plugs:       z.array(PlugSchema).default([]),
    nodes:       z.array(NodeSchema).default([]),
    connections: z.array(ConnectionSchema).default([]),
    metadata:    z.array(MetadataSchema).default([]),
});

export type RawDefinition = z.infer<typeof DefinitionSchema>;
export type RawPlug       = z.infer<typeof PlugSchema>;
export type RawNode       = z.infer<typeof NodeSchema>;
export type RawConnection = z.infer<typeof ConnectionSchema>;
export type RawMetadata   = z.infer<typeof MetadataSchema>;
