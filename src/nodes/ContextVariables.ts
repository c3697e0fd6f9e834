/**
 * @file Context Variables Node
 *
 * Evaluates its `in` plug under an extended context and passes the
 * result to `out`. Variables come from two places:
 *
 *   - `variables`, a compound of members, each holding a `name` and a
 *     `value` plug (added with `variable_add`)
 *   - `extraVariables`, a record; its entries win over members of the
 *     same name
 *
 * `in` and `out` are supplied by the caller (any matching pair of
 * plugs, leaf or compound); children of `out` read the same-named
 * children of `in`.
 *
 * @module nodes
 */

import { ComputeNode } from '../graph/ComputeNode.js';
import { Plug } from '../graph/Plug.js';
import { component_isPlug } from '../graph/GraphComponent.js';
import { BoolPlug, FloatPlug, ObjectPlug, StringPlug, type ValuePlug } from '../graph/ValuePlug.js';
import { HashBuilder } from '../fingerprint/hasher.js';
import { record_is, stringList_is } from '../graph/values.js';
import type { Context, ContextValue } from '../context/Context.js';
import type { Fingerprint } from '../fingerprint/types.js';
import type { EvaluationScope, PlugValue } from '../graph/types.js';

export const IN_PLUG_NAME = 'in';
export const OUT_PLUG_NAME = 'out';

export class ContextVariables extends ComputeNode {
    readonly variables: Plug;
    readonly extraVariables: ObjectPlug;

    constructor(name: string = 'ContextVariables') {
        super(name);
        this.variables = this.child_add(new Plug('variables'));
        this.extraVariables = this.child_add(new ObjectPlug('extraVariables', { defaultValue: {} }));
    }

    override get typeName(): string {
        return 'ContextVariables';
    }

    /**
     * Add a member `memberN` to `variables`, typed after `value`.
     *
     * @returns the member compound
     */
    variable_add(name: string, value: string | number | boolean): Plug {
        const member = new Plug('member1', { flags: { dynamic: true } });
        member.child_add(new StringPlug('name', { defaultValue: name, flags: { dynamic: true } }));
        member.child_add(memberValue_create(value));
        return this.variables.child_add(member);
    }

    override affects(input: Plug): Plug[] {
        const out: Plug | undefined = this.plug_get(OUT_PLUG_NAME);
        if (!out || out.direction !== 'out') return [];
        const top: Plug = topPlug_get(input);
        if (top.name === IN_PLUG_NAME || top === this.variables || top === this.extraVariables) {
            return [out];
        }
        return [];
    }

    override hash(output: Plug, context: Context, scope: EvaluationScope): Fingerprint {
        const source: Plug | undefined = this.source_find(output);
        if (!source) {
            return super.hash(output, context, scope);
        }
        return new HashBuilder()
            .append(this.typeName, output.plugType)
            .append(scope.hash_get(source, this.context_extend(context, scope)))
            .digest();
    }

    override compute(output: Plug, context: Context, scope: EvaluationScope): PlugValue {
        const source: Plug | undefined = this.source_find(output);
        if (!source) {
            return super.compute(output, context, scope);
        }
        return scope.value_get(source, this.context_extend(context, scope));
    }

    /** The context `in` is evaluated in. */
    context_extend(context: Context, scope: EvaluationScope): Context {
        const additions: Record<string, ContextValue> = {};

        for (const member of this.variables.plugs_list()) {
            const namePlug: Plug | undefined = member.plug_get('name');
            const valuePlug: Plug | undefined = member.plug_get('value');
            if (!namePlug || !valuePlug) continue;
            const name: PlugValue = scope.value_get(namePlug, context);
            const value: PlugValue = scope.value_get(valuePlug, context);
            if (typeof name === 'string' && name !== '' && contextValue_is(value)) {
                additions[name] = value;
            }
        }

        const extra: PlugValue = scope.value_get(this.extraVariables, context);
        if (record_is(extra)) {
            for (const [name, value] of Object.entries(extra)) {
                if (contextValue_is(value)) additions[name] = value;
            }
        }

        return context.with(additions);
    }

    /** The `in` plug (or descendant) feeding an `out` plug (or descendant). */
    private source_find(output: Plug): Plug | undefined {
        const out: Plug | undefined = this.plug_get(OUT_PLUG_NAME);
        if (!out || (output !== out && !out.isAncestorOf(output))) return undefined;
        const inPlug: Plug | undefined = this.plug_get(IN_PLUG_NAME);
        if (!inPlug) return undefined;
        if (output === out) return inPlug;
        const found = inPlug.descendant_get(output.relativeName(out));
        return component_isPlug(found) ? found : undefined;
    }
}

function memberValue_create(value: string | number | boolean): ValuePlug {
    const flags = { dynamic: true };
    if (typeof value === 'string') return new StringPlug('value', { defaultValue: value, flags });
    if (typeof value === 'number') return new FloatPlug('value', { defaultValue: value, flags });
    return new BoolPlug('value', { defaultValue: value, flags });
}

function topPlug_get(plug: Plug): Plug {
    let top: Plug = plug;
    let parent: Plug | null = plug.parentPlug_get();
    while (parent) {
        top = parent;
        parent = parent.parentPlug_get();
    }
    return top;
}

function contextValue_is(value: PlugValue): value is ContextValue {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return true;
    return stringList_is(value);
}
