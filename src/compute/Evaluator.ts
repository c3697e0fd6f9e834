/**
 * @file Evaluator
 *
 * Pull-based evaluation over a computation cache.
 *
 * Fingerprint rules, in order:
 *   1. a connected plug hashes as its input (retyped when the types differ)
 *   2. a plug with children hashes its type and its children
 *   3. an unconnected input leaf hashes its type and literal value
 *   4. an unconnected output leaf asks its node
 *
 * Fingerprints are memoized per (plug, dirty generation, context).
 * Values of computed outputs are cached by fingerprint; everything else
 * is cheap enough to read directly. A failure inside a node's `hash` or
 * `compute` surfaces as a `ComputeError` naming the plug, and nothing
 * is cached for it.
 *
 * @module compute
 */

import { ComputeError } from '../errors.js';
import { HashBuilder } from '../fingerprint/hasher.js';
import { silentLogger, type Logger } from '../log/logger.js';
import { ComputeCache } from '../cache/ComputeCache.js';
import type { Context } from '../context/Context.js';
import type { Fingerprint } from '../fingerprint/types.js';
import type { Node } from '../graph/Node.js';
import type { Plug } from '../graph/Plug.js';
import type { EvaluationScope, PlugValue } from '../graph/types.js';

export class Evaluator implements EvaluationScope {
    private static fallback: Evaluator | null = null;

    constructor(
        private readonly cache: ComputeCache,
        private readonly logger: Logger = silentLogger,
    ) {}

    /**
     * Evaluator for components outside any graph, over the process-wide
     * cache.
     */
    static default_get(): Evaluator {
        if (!Evaluator.fallback) {
            Evaluator.fallback = new Evaluator(ComputeCache.instance_get());
        }
        return Evaluator.fallback;
    }

    hash_get(plug: Plug, context: Context): Fingerprint {
        const key: string = `${plug.id}:${plug.generation}:${context.hash()}`;
        const memo: Fingerprint | undefined = this.cache.hash_get(key);
        if (memo !== undefined) return memo;

        const fingerprint: Fingerprint = this.hash_compute(plug, context);
        this.cache.hash_set(key, fingerprint);
        return fingerprint;
    }

    value_get(plug: Plug, context: Context): PlugValue {
        const input: Plug | null = plug.input;
        if (input) {
            const upstream: PlugValue = this.value_get(input, context);
            return plug.isValuePlug() ? plug.value_coerce(upstream) : upstream;
        }

        const children: Plug[] = plug.plugs_list();
        if (children.length > 0 || !plug.isValuePlug()) {
            const record: Record<string, PlugValue> = {};
            for (const child of children) {
                record[child.name] = this.value_get(child, context);
            }
            return record;
        }

        const node: Node | null = plug.node_get();
        if (plug.direction === 'in' || !node) {
            return plug.storedValue;
        }
        return this.computed_get(plug, node, context);
    }

    private hash_compute(plug: Plug, context: Context): Fingerprint {
        const input: Plug | null = plug.input;
        if (input) {
            const upstream: Fingerprint = this.hash_get(input, context);
            if (input.plugType === plug.plugType) return upstream;
            return new HashBuilder().append(plug.plugType, upstream).digest();
        }

        const children: Plug[] = plug.plugs_list();
        if (children.length > 0 || !plug.isValuePlug()) {
            const builder = new HashBuilder().append(plug.typeName);
            for (const child of children) {
                builder.append(child.name, this.hash_get(child, context));
            }
            return builder.digest();
        }

        const node: Node | null = plug.node_get();
        if (plug.direction === 'in' || !node) {
            return new HashBuilder().append(plug.plugType, plug.storedValue).digest();
        }
        try {
            return node.hash(plug, context, this);
        } catch (err: unknown) {
            throw computeError_wrap(plug, err);
        }
    }

    private computed_get(plug: Plug, node: Node, context: Context): PlugValue {
        const fingerprint: Fingerprint = this.hash_get(plug, context);
        const cached = this.cache.value_get(fingerprint);
        if (cached.hit) return cached.value;

        let value: PlugValue;
        try {
            value = node.compute(plug, context, this);
            if (plug.isValuePlug()) {
                plug.value_check(value);
            }
        } catch (err: unknown) {
            const wrapped: ComputeError = computeError_wrap(plug, err);
            this.logger.debug('compute', wrapped.message);
            throw wrapped;
        }
        this.cache.value_set(fingerprint, value);
        return value;
    }
}

/**
 * Evaluator serving `plug`: its graph's, or the process default for
 * detached plugs.
 */
export function evaluator_for(plug: Plug): EvaluationScope {
    return plug.host_get()?.scope ?? Evaluator.default_get();
}

/** Errors from upstream plugs already name the failing plug. */
function computeError_wrap(plug: Plug, err: unknown): ComputeError {
    return err instanceof ComputeError ? err : new ComputeError(plug.fullName, err);
}
