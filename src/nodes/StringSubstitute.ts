/**
 * @file String Substitute Node
 *
 * `out` is `in` with `$name` / `${name}` replaced by context entries.
 * The fingerprint covers only the entries the string references, so
 * unrelated context changes still hit the cache.
 *
 * @module nodes
 */

import { ComputeNode } from '../graph/ComputeNode.js';
import { StringPlug } from '../graph/ValuePlug.js';
import { HashBuilder } from '../fingerprint/hasher.js';
import { Context } from '../context/Context.js';
import type { Plug } from '../graph/Plug.js';
import type { Fingerprint } from '../fingerprint/types.js';
import type { EvaluationScope, PlugValue } from '../graph/types.js';

export class StringSubstitute extends ComputeNode {
    readonly in: StringPlug;
    readonly out: StringPlug;

    constructor(name: string = 'StringSubstitute') {
        super(name);
        this.in = this.child_add(new StringPlug('in'));
        this.out = this.child_add(new StringPlug('out', { direction: 'out' }));
        this.affects_declare(this.in, this.out);
    }

    override get typeName(): string {
        return 'StringSubstitute';
    }

    override hash(output: Plug, context: Context, scope: EvaluationScope): Fingerprint {
        if (output !== this.out) {
            return super.hash(output, context, scope);
        }
        const template: string = this.string_read(scope, this.in, context);
        return new HashBuilder()
            .append(super.hash(output, context, scope))
            .append(context.entries_hash(Context.references_list(template)))
            .digest();
    }

    override compute(output: Plug, context: Context, scope: EvaluationScope): PlugValue {
        if (output !== this.out) {
            return super.compute(output, context, scope);
        }
        return context.string_substitute(this.string_read(scope, this.in, context));
    }
}
