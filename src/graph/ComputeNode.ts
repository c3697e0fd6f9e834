/**
 * @file Compute Node
 *
 * Base for nodes that compute their outputs. Subclasses declare their
 * fan-out once at construction with `affects_declare` and override
 * `compute`; the default hash from `Node` then covers exactly the
 * declared inputs. Nodes whose result also depends on the context (or
 * on values pulled in another context) override `hash` as well.
 *
 * @module graph
 */

import { Node } from './Node.js';
import type { Plug } from './Plug.js';
import type { Context } from '../context/Context.js';
import type { EvaluationScope, PlugValue } from './types.js';

export abstract class ComputeNode extends Node {
    private readonly affectsMap = new Map<Plug, Plug[]>();

    override get typeName(): string {
        return 'ComputeNode';
    }

    /**
     * Outputs declared for `input` or for any of its ancestor plugs,
     * without duplicates.
     */
    override affects(input: Plug): Plug[] {
        const result: Plug[] = [];
        let current: Plug | null = input;
        while (current) {
            for (const output of this.affectsMap.get(current) ?? []) {
                if (!result.includes(output)) result.push(output);
            }
            current = current.parentPlug_get();
        }
        return result;
    }

    /** Record that changes to `input` (or its descendants) invalidate `outputs`. */
    protected affects_declare(input: Plug, ...outputs: Plug[]): void {
        const existing: Plug[] = this.affectsMap.get(input) ?? [];
        for (const output of outputs) {
            if (!existing.includes(output)) existing.push(output);
        }
        this.affectsMap.set(input, existing);
    }

    // ─── Typed reads ────────────────────────────────────────────

    protected number_read(scope: EvaluationScope, plug: Plug, context: Context): number {
        const value: PlugValue = scope.value_get(plug, context);
        if (typeof value !== 'number') {
            throw new TypeError(`"${plug.fullName}" did not evaluate to a number`);
        }
        return value;
    }

    protected string_read(scope: EvaluationScope, plug: Plug, context: Context): string {
        const value: PlugValue = scope.value_get(plug, context);
        if (typeof value !== 'string') {
            throw new TypeError(`"${plug.fullName}" did not evaluate to a string`);
        }
        return value;
    }

    protected bool_read(scope: EvaluationScope, plug: Plug, context: Context): boolean {
        const value: PlugValue = scope.value_get(plug, context);
        if (typeof value !== 'boolean') {
            throw new TypeError(`"${plug.fullName}" did not evaluate to a boolean`);
        }
        return value;
    }
}
