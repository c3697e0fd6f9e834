/**
 * @file Definition Parser Tests
 *
 * @module definition
 */

import { describe, it, expect } from 'vitest';
import { definition_parse, definition_stringify } from './parser.js';
import { DefinitionSyntaxError } from '../errors.js';

describe('definition/parser', () => {

    it('should parse a complete definition', () => {
        const definition = definition_parse([
            'version: { milestone: 0, major: 9 }',
            'plugs:',
            '  - { name: scale, type: float, default: 1.5 }',
            '  - { name: result, type: float, direction: out }',
            'nodes:',
            '  - { name: mult, type: Arithmetic, values: { operation: multiply } }',
            'connections:',
            '  - { from: scale, to: mult.op1 }',
            'metadata:',
            '  - { target: scale, key: description, value: Multiplier }',
        ].join('\n'), 'rig');

        expect(definition.version).toEqual({ milestone: 0, major: 9 });
        expect(definition.plugs).toEqual([
            { name: 'scale', type: 'float', direction: 'in', default: 1.5 },
            { name: 'result', type: 'float', direction: 'out' },
        ]);
        expect(definition.nodes).toEqual([{ name: 'mult', type: 'Arithmetic', values: { operation: 'multiply' } }]);
        expect(definition.connections).toEqual([{ from: 'scale', to: 'mult.op1' }]);
        expect(definition.metadata).toEqual([{ target: 'scale', key: 'description', value: 'Multiplier' }]);
    });

    it('should treat an empty document as an empty definition', () => {
        expect(definition_parse('', 'empty')).toEqual({ plugs: [], nodes: [], connections: [], metadata: [] });
    });

    it('should report malformed YAML', () => {
        expect(() => definition_parse('plugs: [', 'broken')).toThrow(DefinitionSyntaxError);
    });

    it('should report schema violations with their path', () => {
        expect(() => definition_parse('plugs:\n  - { name: scale, type: vector }', 'bad'))
            .toThrow(/^Invalid definition "bad": \[plugs\.0\.type\]/);
    });

    it('should reject names that are not dotted identifiers', () => {
        expect(() => definition_parse('connections:\n  - { from: "a..b", to: c }', 'bad'))
            .toThrow('[connections.0.from] must be a dotted name such as "mult.op1"');
    });

    it('should write only the sections in use', () => {
        const text: string = definition_stringify({
            plugs: [{ name: 'scale', type: 'float', direction: 'in', default: 2 }],
            nodes: [],
            connections: [],
            metadata: [],
        });
        expect(text).toBe('plugs:\n  - name: scale\n    type: float\n    direction: in\n    default: 2\n');
        expect(definition_parse(text, 'round').plugs).toEqual([{ name: 'scale', type: 'float', direction: 'in', default: 2 }]);
    });
});
