/**
 * @file Evaluation Context Property Tests
 *
 * @module context
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { Context, type ContextValue } from './Context.js';

const entryArb: fc.Arbitrary<[string, ContextValue]> = fc.tuple(
    fc.stringMatching(/^[a-z]{1,6}$/),
    fc.oneof(fc.integer(), fc.string(), fc.boolean()),
);

describe('context/Context properties', () => {

    it('should hash independently of the order entries are added', () => {
        fc.assert(
            fc.property(fc.uniqueArray(entryArb, { selector: (entry) => entry[0] }), (entries) => {
                const forward = entries.reduce((ctx: Context, [k, v]) => ctx.with({ [k]: v }), new Context());
                const backward = [...entries].reverse().reduce((ctx: Context, [k, v]) => ctx.with({ [k]: v }), new Context());
                expect(forward.hash()).toBe(backward.hash());
            }),
        );
    });

    it('should restore the original hash after adding and removing an entry', () => {
        fc.assert(
            fc.property(fc.integer(), (value) => {
                const base = new Context({ frame: 1 });
                expect(base.with({ extra: value }).without('extra').hash()).toBe(base.hash());
            }),
        );
    });
});
