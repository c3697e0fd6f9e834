/**
 * @file Scene Plug
 *
 * Compound plug describing a scene hierarchy. Every child except
 * `globals` is evaluated per location: the location is addressed by the
 * `scene:path` context entry (a path such as `['a', 'b']`, the root
 * being `[]`).
 *
 *   childNames  names of the children of the location
 *   object      the object at the location, or null
 *   attributes  record of attributes
 *   transform   local 4x4 matrix, row-major, 16 numbers
 *   globals     scene-wide record (not path dependent)
 *
 * @module scene
 */

import { Plug } from '../graph/Plug.js';
import { ObjectPlug } from '../graph/ValuePlug.js';
import { Context } from '../context/Context.js';
import { StructuralError } from '../errors.js';
import type { Fingerprint } from '../fingerprint/types.js';
import type { PlugDirection, PlugOptions, PlugValue } from '../graph/types.js';

export const SCENE_PATH_NAME = 'scene:path';

export type ScenePath = readonly string[];

export const IDENTITY_TRANSFORM: readonly number[] = Object.freeze([
    1, 0, 0, 0,
    0, 1, 0, 0,
    0, 0, 1, 0,
    0, 0, 0, 1,
]);

export const SCENE_CHILD_NAMES = ['childNames', 'object', 'attributes', 'transform', 'globals'] as const;
export type SceneChildName = typeof SCENE_CHILD_NAMES[number];

export class ScenePlug extends Plug {
    readonly childNames: ObjectPlug;
    readonly object: ObjectPlug;
    readonly attributes: ObjectPlug;
    readonly transform: ObjectPlug;
    readonly globals: ObjectPlug;

    constructor(name: string, options: PlugOptions = {}) {
        super(name, options);
        const direction: PlugDirection = this.direction;
        this.childNames = this.child_add(new ObjectPlug('childNames', { direction, defaultValue: [] }));
        this.object = this.child_add(new ObjectPlug('object', { direction, defaultValue: null }));
        this.attributes = this.child_add(new ObjectPlug('attributes', { direction, defaultValue: {} }));
        this.transform = this.child_add(new ObjectPlug('transform', { direction, defaultValue: IDENTITY_TRANSFORM }));
        this.globals = this.child_add(new ObjectPlug('globals', { direction, defaultValue: {} }));
    }

    override get typeName(): string {
        return 'ScenePlug';
    }

    override clone_create(name: string = this.name, direction: PlugDirection = this.direction): ScenePlug {
        return new ScenePlug(name, { direction, flags: { ...this.flags, dynamic: true } });
    }

    member_get(name: SceneChildName): ObjectPlug {
        switch (name) {
            case 'childNames': return this.childNames;
            case 'object':     return this.object;
            case 'attributes': return this.attributes;
            case 'transform':  return this.transform;
            case 'globals':    return this.globals;
        }
    }

    // ─── Per-location queries ───────────────────────────────────

    childNames_get(path: ScenePath, context: Context = Context.default_get()): string[] {
        const value: PlugValue = this.childNames.value_get(scenePath_context(context, path));
        if (!Array.isArray(value)) {
            throw new StructuralError(`"${this.childNames.fullName}" did not evaluate to a list of names`);
        }
        return value.filter((item: unknown): item is string => typeof item === 'string');
    }

    object_get(path: ScenePath, context: Context = Context.default_get()): PlugValue {
        return this.object.value_get(scenePath_context(context, path));
    }

    attributes_get(path: ScenePath, context: Context = Context.default_get()): PlugValue {
        return this.attributes.value_get(scenePath_context(context, path));
    }

    transform_get(path: ScenePath, context: Context = Context.default_get()): PlugValue {
        return this.transform.value_get(scenePath_context(context, path));
    }

    globals_get(context: Context = Context.default_get()): PlugValue {
        return this.globals.value_get(context.without(SCENE_PATH_NAME));
    }

    childNamesHash_get(path: ScenePath, context: Context = Context.default_get()): Fingerprint {
        return this.childNames.hash_get(scenePath_context(context, path));
    }
}

// ─── Paths ──────────────────────────────────────────────────────

/** Parse `/a/b` into `['a', 'b']`; empty segments are dropped. */
export function scenePath_parse(text: string): string[] {
    return text.split('/').filter((segment: string): boolean => segment.length > 0);
}

export function scenePath_format(path: ScenePath): string {
    return `/${path.join('/')}`;
}

export function scenePath_context(context: Context, path: ScenePath): Context {
    return context.with({ [SCENE_PATH_NAME]: path });
}

/** The location addressed by `context`; the root when absent. */
export function scenePath_get(context: Context): ScenePath {
    return context.path_get(SCENE_PATH_NAME, []);
}
