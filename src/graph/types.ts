/**
 * @file Graph Type Definitions
 *
 * Core types shared by plugs, nodes and the graph host. The graph layer
 * owns topology (parents, children, connections); evaluation and undo
 * are reached through the `GraphHost` interface so that components never
 * import the modules that operate on them.
 *
 * @module graph
 */

import type { Hashable, Fingerprint } from '../fingerprint/types.js';
import type { Context } from '../context/Context.js';
import type { ComputeCache } from '../cache/ComputeCache.js';
import type { Logger } from '../log/logger.js';
import type { MetadataStore } from '../metadata/MetadataStore.js';
import type { UndoLog } from '../undo/UndoLog.js';
import type { DefinitionSource } from '../reference/types.js';
import type { Plug } from './Plug.js';

// ─── Plugs ──────────────────────────────────────────────────────

export type PlugDirection = 'in' | 'out';

/**
 * Value type carried by a plug. `compound` plugs carry only children.
 */
export type PlugType = 'float' | 'int' | 'string' | 'bool' | 'object' | 'compound';

/** Values held by leaf plugs and produced by computation. Immutable. */
export type PlugValue = Hashable;

/**
 * @property dynamic - Added locally (by a user or a script) rather than
 *   created by a node or loaded from a reference
 * @property serialisable - Included when the owning graph is saved
 */
export interface PlugFlags {
    dynamic: boolean;
    serialisable: boolean;
}

export const DEFAULT_PLUG_FLAGS: Readonly<PlugFlags> = Object.freeze({
    dynamic: false,
    serialisable: true,
});

export interface PlugOptions {
    direction?: PlugDirection;
    flags?: Partial<PlugFlags>;
}

export interface ValuePlugOptions<T extends PlugValue> extends PlugOptions {
    defaultValue?: T;
}

// ─── Evaluation ─────────────────────────────────────────────────

/**
 * What a node sees while hashing or computing: pull fingerprints and
 * values of other plugs, in the same or an overridden context.
 */
export interface EvaluationScope {
    hash_get(plug: Plug, context: Context): Fingerprint;
    value_get(plug: Plug, context: Context): PlugValue;
}

// ─── Host ───────────────────────────────────────────────────────

/**
 * Services owned by the root of a graph. Components resolve their host
 * by walking up to the root; detached components have none and fall
 * back to process-wide defaults.
 */
export interface GraphHost {
    readonly undoLog: UndoLog;
    readonly cache: ComputeCache;
    readonly metadata: MetadataStore;
    readonly logger: Logger;
    readonly definitionSource: DefinitionSource | null;
    readonly scope: EvaluationScope;
    /** Deliver (or defer) dirtied notifications for one propagation pass. */
    dirtied_notify(plugs: readonly Plug[]): void;
}
