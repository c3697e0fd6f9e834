/**
 * @file SubTree
 *
 * Re-roots a scene: location `/x` of the output is location
 * `<root>/x` of the input. The output root itself has no object,
 * attributes or transform of its own, whatever the input holds at
 * `<root>`. Forward declarations in the globals are re-keyed under the
 * new root; declarations outside it are dropped.
 *
 * @module scene
 */

import { StringPlug } from '../graph/ValuePlug.js';
import { HashBuilder } from '../fingerprint/hasher.js';
import { record_is } from '../graph/values.js';
import { SceneProcessor } from './SceneProcessor.js';
import {
    IDENTITY_TRANSFORM,
    SCENE_CHILD_NAMES,
    scenePath_context,
    scenePath_format,
    scenePath_parse,
    type SceneChildName,
    type ScenePath,
} from './ScenePlug.js';
import type { Context } from '../context/Context.js';
import type { Fingerprint } from '../fingerprint/types.js';
import type { EvaluationScope, PlugValue } from '../graph/types.js';

/** Globals entry mapping location paths (`/a/b`) to declarations. */
export const FORWARD_DECLARATIONS_KEY = 'scene:forwardDeclarations';

export class SubTree extends SceneProcessor {
    readonly root: StringPlug;

    constructor(name: string = 'SubTree') {
        super(name);
        this.root = this.child_add(new StringPlug('root'));
        this.affects_declare(this.root, ...SCENE_CHILD_NAMES.map((member: SceneChildName) => this.out.member_get(member)));
    }

    override get typeName(): string {
        return 'SubTree';
    }

    protected override member_hash(member: SceneChildName, path: ScenePath, context: Context, scope: EvaluationScope): Fingerprint {
        if (member === 'globals') {
            return new HashBuilder()
                .append(this.typeName, member)
                .append(scope.hash_get(this.in.globals, context), scope.hash_get(this.root, context))
                .digest();
        }
        if (path.length === 0 && member !== 'childNames') {
            return new HashBuilder().append(this.typeName, member).digest();
        }
        const source: ScenePath = this.sourcePath_get(path, context, scope);
        return scope.hash_get(this.in.member_get(member), scenePath_context(context, source));
    }

    protected override member_compute(member: SceneChildName, path: ScenePath, context: Context, scope: EvaluationScope): PlugValue {
        if (member === 'globals') {
            return this.globals_compute(context, scope);
        }
        if (path.length === 0) {
            switch (member) {
                case 'object':     return null;
                case 'attributes': return {};
                case 'transform':  return IDENTITY_TRANSFORM;
                case 'childNames': break;
            }
        }
        const source: ScenePath = this.sourcePath_get(path, context, scope);
        return scope.value_get(this.in.member_get(member), scenePath_context(context, source));
    }

    /** Input location for an output location. */
    sourcePath_get(path: ScenePath, context: Context, scope: EvaluationScope): ScenePath {
        return [...scenePath_parse(this.string_read(scope, this.root, context)), ...path];
    }

    private globals_compute(context: Context, scope: EvaluationScope): PlugValue {
        const globals: PlugValue = scope.value_get(this.in.globals, context);
        if (!record_is(globals)) return globals;
        const declarations: PlugValue = globals[FORWARD_DECLARATIONS_KEY];
        if (!record_is(declarations)) return globals;

        const root: string[] = scenePath_parse(this.string_read(scope, this.root, context));
        const rekeyed: Record<string, PlugValue> = {};
        for (const [key, declaration] of Object.entries(declarations)) {
            const path: string[] = scenePath_parse(key);
            const inside: boolean = root.every((segment: string, i: number): boolean => path[i] === segment);
            if (inside) {
                rekeyed[scenePath_format(path.slice(root.length))] = declaration;
            }
        }
        return { ...globals, [FORWARD_DECLARATIONS_KEY]: rekeyed };
    }
}
