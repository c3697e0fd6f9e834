/**
 * @file Scene Processor
 *
 * Scene node with a scene input. Each member of `in` affects the same
 * member of `out`, and by default passes straight through (same
 * fingerprint, same cached value).
 *
 * @module scene
 */

import { SceneNode } from './SceneNode.js';
import { ScenePlug, SCENE_CHILD_NAMES, type SceneChildName, type ScenePath } from './ScenePlug.js';
import type { Context } from '../context/Context.js';
import type { Fingerprint } from '../fingerprint/types.js';
import type { EvaluationScope, PlugValue } from '../graph/types.js';

export class SceneProcessor extends SceneNode {
    readonly in: ScenePlug;

    constructor(name: string = 'SceneProcessor') {
        super(name);
        this.in = this.child_add(new ScenePlug('in'));
        for (const member of SCENE_CHILD_NAMES) {
            this.affects_declare(this.in.member_get(member), this.out.member_get(member));
        }
    }

    override get typeName(): string {
        return 'SceneProcessor';
    }

    protected override member_hash(member: SceneChildName, path: ScenePath, context: Context, scope: EvaluationScope): Fingerprint {
        void path;
        return scope.hash_get(this.in.member_get(member), context);
    }

    protected member_compute(member: SceneChildName, path: ScenePath, context: Context, scope: EvaluationScope): PlugValue {
        void path;
        return scope.value_get(this.in.member_get(member), context);
    }
}
