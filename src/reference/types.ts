/**
 * @file Reference Type Definitions
 *
 * @module reference
 */

import type { SubGraph } from '../graph/SubGraph.js';

/**
 * Executes a stored definition into a container: creates its plugs,
 * nodes, connections and metadata, and tags the container with the
 * definition's version (`serialiser:milestoneVersion`,
 * `serialiser:majorVersion`).
 *
 * Execution continues past failing statements.
 */
export interface DefinitionSource {
    /**
     * @returns true when any statement failed (or the definition could
     *   not be read at all)
     */
    definition_execute(container: SubGraph, sourceId: string): boolean;
}

export const MILESTONE_VERSION_KEY = 'serialiser:milestoneVersion';
export const MAJOR_VERSION_KEY = 'serialiser:majorVersion';

/** Definitions older than this (milestone 0) may set promoted values. */
export const LEGACY_MAJOR_CUTOFF = 9;

/** Prefix marking plugs for internal use; never part of an interface. */
export const INTERNAL_PREFIX = '__';

/** Prefix given to previous interface plugs while a reload is in progress. */
export const RELOAD_PREFIX = '__tmp__';
