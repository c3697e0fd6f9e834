/**
 * @file Hierarchy Source
 *
 * Scene generated from a nested description held on the `hierarchy`
 * plug. Each key of `hierarchy` names a child of the root; each value
 * describes that location:
 *
 *   { children?: { <name>: <location>, ... },
 *     object?: <any>, attributes?: { ... }, transform?: number[16] }
 *
 * `globals` is passed through to the output.
 *
 * @module scene
 */

import { ObjectPlug } from '../graph/ValuePlug.js';
import { list_is, record_is, type PlugRecord } from '../graph/values.js';
import { SceneNode } from './SceneNode.js';
import { IDENTITY_TRANSFORM, type SceneChildName, type ScenePath } from './ScenePlug.js';
import type { Context } from '../context/Context.js';
import type { EvaluationScope, PlugValue } from '../graph/types.js';

export class HierarchySource extends SceneNode {
    readonly hierarchy: ObjectPlug;
    readonly globals: ObjectPlug;

    constructor(name: string = 'HierarchySource') {
        super(name);
        this.hierarchy = this.child_add(new ObjectPlug('hierarchy', { defaultValue: {} }));
        this.globals = this.child_add(new ObjectPlug('globals', { defaultValue: {} }));

        this.affects_declare(this.hierarchy, this.out.childNames, this.out.object, this.out.attributes, this.out.transform);
        this.affects_declare(this.globals, this.out.globals);
    }

    override get typeName(): string {
        return 'HierarchySource';
    }

    protected member_compute(member: SceneChildName, path: ScenePath, context: Context, scope: EvaluationScope): PlugValue {
        if (member === 'globals') {
            return scope.value_get(this.globals, context);
        }

        const location: PlugRecord | null = location_find(scope.value_get(this.hierarchy, context), path);
        switch (member) {
            case 'childNames': {
                const children: PlugValue = location?.children;
                return record_is(children) ? Object.keys(children) : [];
            }
            case 'object':
                return location?.object ?? null;
            case 'attributes': {
                const attributes: PlugValue = location?.attributes;
                return record_is(attributes) ? attributes : {};
            }
            case 'transform': {
                const transform: PlugValue = location?.transform;
                return transform_is(transform) ? transform : IDENTITY_TRANSFORM;
            }
        }
    }
}

/**
 * Description of the location at `path`; the root is `{ children:
 * hierarchy }`. Null when the path does not exist.
 */
function location_find(hierarchy: PlugValue, path: ScenePath): PlugRecord | null {
    let location: PlugRecord | null = record_is(hierarchy) ? { children: hierarchy } : null;
    for (const name of path) {
        const children: PlugValue = location?.children;
        const next: PlugValue = record_is(children) ? children[name] : undefined;
        location = record_is(next) ? next : null;
    }
    return location;
}

function transform_is(value: PlugValue): value is readonly number[] {
    return list_is(value) && value.length === 16 && value.every((item: PlugValue): boolean => typeof item === 'number');
}
