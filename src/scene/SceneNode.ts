/**
 * @file Scene Node
 *
 * Base of nodes producing a scene on `out`. Subclasses implement the
 * per-member hash and compute hooks; this class dispatches by member and
 * resolves the location from the context.
 *
 * @module scene
 */

import { ComputeNode } from '../graph/ComputeNode.js';
import { HashBuilder } from '../fingerprint/hasher.js';
import { ScenePlug, SCENE_CHILD_NAMES, scenePath_get, type SceneChildName, type ScenePath } from './ScenePlug.js';
import type { Plug } from '../graph/Plug.js';
import type { Context } from '../context/Context.js';
import type { Fingerprint } from '../fingerprint/types.js';
import type { EvaluationScope, PlugValue } from '../graph/types.js';

export abstract class SceneNode extends ComputeNode {
    readonly out: ScenePlug;

    constructor(name: string) {
        super(name);
        this.out = this.child_add(new ScenePlug('out', { direction: 'out' }));
    }

    override hash(output: Plug, context: Context, scope: EvaluationScope): Fingerprint {
        const member: SceneChildName | null = this.outMember_get(output);
        if (!member) {
            return super.hash(output, context, scope);
        }
        return this.member_hash(member, scenePath_get(context), context, scope);
    }

    override compute(output: Plug, context: Context, scope: EvaluationScope): PlugValue {
        const member: SceneChildName | null = this.outMember_get(output);
        if (!member) {
            return super.compute(output, context, scope);
        }
        return this.member_compute(member, scenePath_get(context), context, scope);
    }

    /**
     * Fingerprint of one member of `out` at `path`. The default covers the
     * node type, the member and the declared inputs (see `Node.hash`),
     * plus the path for per-location members.
     */
    protected member_hash(member: SceneChildName, path: ScenePath, context: Context, scope: EvaluationScope): Fingerprint {
        const builder = new HashBuilder().append(super.hash(this.out.member_get(member), context, scope));
        if (member !== 'globals') {
            builder.append(path);
        }
        return builder.digest();
    }

    protected abstract member_compute(
        member: SceneChildName,
        path: ScenePath,
        context: Context,
        scope: EvaluationScope,
    ): PlugValue;

    private outMember_get(output: Plug): SceneChildName | null {
        if (output.parent !== this.out) return null;
        return SCENE_CHILD_NAMES.find((name: SceneChildName): boolean => name === output.name) ?? null;
    }
}
