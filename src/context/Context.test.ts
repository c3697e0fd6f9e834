/**
 * @file Evaluation Context Tests
 *
 * @module context
 */

import { describe, it, expect } from 'vitest';
import { Context, FRAME_NAME } from './Context.js';

describe('context/Context', () => {

    it('should default to frame 1', () => {
        const context = Context.default_get();
        expect(context.frame).toBe(1);
        expect(context.names_list()).toEqual([FRAME_NAME]);
    });

    it('should leave the original untouched when adding entries', () => {
        const base = new Context({ frame: 1 });
        const derived = base.with({ frame: 2, shot: 'sh010' });
        expect(base.frame).toBe(1);
        expect(base.has('shot')).toBe(false);
        expect(derived.frame).toBe(2);
        expect(derived.string_get('shot')).toBe('sh010');
    });

    it('should remove entries with without', () => {
        const context = new Context({ a: 1, b: 2 }).without('a');
        expect(context.names_list()).toEqual(['b']);
    });

    it('should hash equal contents equally regardless of insertion order', () => {
        const a = new Context({ x: 1, y: 'two' });
        const b = new Context({ y: 'two', x: 1 });
        expect(a.hash()).toBe(b.hash());
        expect(a.equals(b)).toBe(true);
    });

    it('should hash different contents differently', () => {
        expect(new Context({ x: 1 }).hash()).not.toBe(new Context({ x: 2 }).hash());
    });

    it('should hash only the named entries in entries_hash', () => {
        const a = new Context({ shot: 'sh010', frame: 1 });
        const b = new Context({ shot: 'sh010', frame: 99 });
        expect(a.entries_hash(['shot'])).toBe(b.entries_hash(['shot']));
        expect(a.entries_hash(['frame'])).not.toBe(b.entries_hash(['frame']));
    });

    it('should use fallbacks only for absent entries', () => {
        const context = new Context({ name: 'x' });
        expect(context.string_get('missing', 'fallback')).toBe('fallback');
        expect(() => context.string_get('missing')).toThrow('Context has no entry "missing"');
        expect(() => context.number_get('name')).toThrow('Context entry "name" is not a number (got "x")');
    });

    it('should freeze path entries', () => {
        const path: string[] = ['a', 'b'];
        const context = new Context({ 'scene:path': path });
        path.push('c');
        expect(context.path_get('scene:path')).toEqual(['a', 'b']);
    });

    describe('string_substitute', () => {

        const context = new Context({ shot: 'sh010', frame: 12, 'scene:path': ['a', 'b'] });

        it('should replace bare and braced references', () => {
            expect(context.string_substitute('$shot/${frame}.exr')).toBe('sh010/12.exr');
        });

        it('should substitute unknown names as empty', () => {
            expect(context.string_substitute('[$missing]')).toBe('[]');
        });

        it('should keep escaped dollars', () => {
            expect(context.string_substitute('cost \\$5')).toBe('cost $5');
        });

        it('should render paths with a leading slash', () => {
            expect(context.string_substitute('${scene:path}')).toBe('/a/b');
        });

        it('should list referenced names once each', () => {
            expect(Context.references_list('$a ${b} $a \\$c')).toEqual(['a', 'b']);
        });
    });
});
