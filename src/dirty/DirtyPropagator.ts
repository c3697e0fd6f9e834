/**
 * @file Dirty Propagator
 *
 * Walks downstream from an edited plug:
 *
 *   - every plug it feeds by connection,
 *   - every ancestor plug (a compound's fingerprint covers its children),
 *   - for input plugs, every output the owning node declares in its
 *     affects map, together with that output's descendants.
 *
 * Each plug is visited once per pass, so diamonds terminate. Visited
 * plugs bump their dirty generation, which makes every memoized
 * fingerprint for them unreachable; no cache entry is deleted.
 *
 * @module dirty
 */

import type { Plug } from '../graph/Plug.js';
import type { GraphHost } from '../graph/types.js';

/**
 * Collect the plugs downstream of `start` (inclusive), in visit order.
 * Pure: no generations are bumped and nothing is emitted.
 */
export function dirty_collect(start: Plug): Plug[] {
    const visited = new Set<Plug>();
    const order: Plug[] = [];
    const queue: Plug[] = [start];

    for (let i = 0; i < queue.length; i++) {
        const plug: Plug = queue[i];
        if (visited.has(plug)) continue;
        visited.add(plug);
        order.push(plug);

        queue.push(...plug.outputs_list());

        const parentPlug: Plug | null = plug.parentPlug_get();
        if (parentPlug) queue.push(parentPlug);

        if (plug.direction === 'in') {
            const node = plug.node_get();
            if (node) {
                for (const affected of node.affects(plug)) {
                    queue.push(affected, ...affected.plugDescendants_list());
                }
            }
        }
    }

    return order;
}

/**
 * Dirty everything downstream of `start` and notify observers once per
 * visited plug.
 *
 * @returns The dirtied plugs, in visit order.
 */
export function dirty_propagate(start: Plug): Plug[] {
    const dirtied: Plug[] = dirty_collect(start);
    for (const plug of dirtied) {
        plug.generation_bump();
    }

    const host: GraphHost | null = start.host_get();
    if (host) {
        host.dirtied_notify(dirtied);
    } else {
        dirtied_emit(dirtied);
    }
    return dirtied;
}

/** Deliver dirtied notifications to each plug's node. */
export function dirtied_emit(plugs: Iterable<Plug>): void {
    for (const plug of plugs) {
        plug.node_get()?.plugDirtiedSignal.emit(plug);
    }
}
