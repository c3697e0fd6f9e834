/**
 * @file Undo Log Property Tests
 *
 * Any sequence of recorded edits, fully undone, restores the starting
 * state; fully redone, it restores the final state.
 *
 * @module undo
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { UndoLog } from './UndoLog.js';
import { MetadataStore } from '../metadata/MetadataStore.js';
import { Node } from '../graph/Node.js';
import type { Hashable } from '../fingerprint/types.js';

const editArb = fc.array(
    fc.tuple(fc.constantFrom('a', 'b', 'c'), fc.integer({ min: 0, max: 9 })),
    { minLength: 1, maxLength: 20 },
);

function state_read(store: MetadataStore, target: Node): Record<string, Hashable> {
    const state: Record<string, Hashable> = {};
    for (const key of store.keys_list(target, { instanceOnly: true })) {
        state[key] = store.value_get(target, key);
    }
    return state;
}

describe('undo/UndoLog properties', () => {

    it('should round-trip any edit sequence through undo and redo', () => {
        fc.assert(fc.property(editArb, (edits): void => {
            const store = new MetadataStore();
            const target = new Node('target');
            const log = new UndoLog();

            for (const [key, value] of edits) {
                log.enact({
                    kind: 'setMetadata',
                    store,
                    target,
                    key,
                    previous: store.entry_get(target, key),
                    next: { value, persistent: true },
                });
            }
            const final = state_read(store, target);

            while (log.undo());
            expect(state_read(store, target)).toEqual({});

            while (log.redo());
            expect(state_read(store, target)).toEqual(final);
        }));
    });
});
