/**
 * @file Reconciler Helper Tests
 *
 * @module reference
 */

import { describe, it, expect } from 'vitest';
import { inputsAndValues_copy, outputs_transfer, referencePlug_is, version_isLegacy } from './reconcile.js';
import { MAJOR_VERSION_KEY, MILESTONE_VERSION_KEY } from './types.js';
import { SubGraph } from '../graph/SubGraph.js';
import { Plug } from '../graph/Plug.js';
import { FloatPlug } from '../graph/ValuePlug.js';
import { MetadataStore } from '../metadata/MetadataStore.js';

describe('reference/reconcile', () => {

    describe('referencePlug_is', () => {
        const box = new SubGraph('box');
        const scale = box.child_add(new FloatPlug('scale'));
        const internal = box.child_add(new Plug('__internal'));
        const nested = internal.child_add(new FloatPlug('x'));
        const local = box.userPlug.child_add(new FloatPlug('note', { flags: { dynamic: true } }));
        const loaded = box.userPlug.child_add(new FloatPlug('loaded'));

        it('should treat ordinary plugs as loaded', () => {
            expect(referencePlug_is(box, scale)).toBe(true);
        });

        it('should exclude internal plugs and their children', () => {
            expect(referencePlug_is(box, internal)).toBe(false);
            expect(referencePlug_is(box, nested)).toBe(false);
        });

        it('should exclude the user plug and locally added user plugs', () => {
            expect(referencePlug_is(box, box.userPlug)).toBe(false);
            expect(referencePlug_is(box, local)).toBe(false);
        });

        it('should include user plugs that came from a definition', () => {
            expect(referencePlug_is(box, loaded)).toBe(true);
        });
    });

    describe('version_isLegacy', () => {
        const cases: Array<[string, number | null, number | null, boolean]> = [
            ['untagged', null, null, true],
            ['0.8', 0, 8, true],
            ['0.9', 0, 9, false],
            ['1.0', 1, 0, false],
        ];

        for (const [label, milestone, major, expected] of cases) {
            it(`should classify ${label} as ${expected ? 'legacy' : 'current'}`, () => {
                const store = new MetadataStore();
                const box = new SubGraph('box');
                if (milestone !== null) store.value_set(box, MILESTONE_VERSION_KEY, milestone);
                if (major !== null) store.value_set(box, MAJOR_VERSION_KEY, major);
                expect(version_isLegacy(store, box)).toBe(expected);
            });
        }
    });

    describe('inputsAndValues_copy', () => {

        it('should copy a non-default value', () => {
            const box = new SubGraph('box');
            const from = box.child_add(new FloatPlug('from'));
            const to = box.child_add(new FloatPlug('to'));
            from.value_set(5);
            inputsAndValues_copy(from, to, true);
            expect(to.storedValue).toBe(5);
        });

        it('should skip default values only when asked to', () => {
            const box = new SubGraph('box');
            const from = box.child_add(new FloatPlug('from'));
            const to = box.child_add(new FloatPlug('to'));
            to.value_set(7);

            inputsAndValues_copy(from, to, true);
            expect(to.storedValue).toBe(7);

            inputsAndValues_copy(from, to, false);
            expect(to.storedValue).toBe(0);
        });

        it('should copy the input instead of the value', () => {
            const box = new SubGraph('box');
            const upstream = box.child_add(new FloatPlug('upstream'));
            const from = box.child_add(new FloatPlug('from'));
            const to = box.child_add(new FloatPlug('to'));
            from.input_set(upstream);
            inputsAndValues_copy(from, to, true);
            expect(to.input).toBe(upstream);
        });

        it('should match compound children by name', () => {
            const box = new SubGraph('box');
            const from = box.child_add(new Plug('from'));
            const fromX = from.child_add(new FloatPlug('x'));
            from.child_add(new FloatPlug('y'));
            const to = box.child_add(new Plug('to'));
            const toX = to.child_add(new FloatPlug('x'));
            const toZ = to.child_add(new FloatPlug('z'));
            fromX.value_set(4);
            toZ.value_set(2);

            inputsAndValues_copy(from, to, true);

            expect(toX.storedValue).toBe(4);
            expect(toZ.storedValue).toBe(2);
        });
    });

    describe('outputs_transfer', () => {

        it('should move every downstream connection to the target', () => {
            const box = new SubGraph('box');
            const from = box.child_add(new FloatPlug('from'));
            const to = box.child_add(new FloatPlug('to'));
            const first = box.child_add(new FloatPlug('first'));
            const second = box.child_add(new FloatPlug('second'));
            first.input_set(from);
            second.input_set(from);

            outputs_transfer(from, to);

            expect(first.input).toBe(to);
            expect(second.input).toBe(to);
            expect(from.outputs_list()).toEqual([]);
        });
    });
});
