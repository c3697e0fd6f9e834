/**
 * @file Value Guards
 *
 * Narrowing helpers for structured plug values.
 *
 * @module graph
 */

import type { PlugValue } from './types.js';

export type PlugRecord = { readonly [key: string]: PlugValue };

export function record_is(value: PlugValue): value is PlugRecord {
    return typeof value === 'object' && value !== null && !list_is(value);
}

export function list_is(value: PlugValue): value is readonly PlugValue[] {
    return Array.isArray(value);
}

export function stringList_is(value: PlugValue): value is readonly string[] {
    return list_is(value) && value.every((item: PlugValue): boolean => typeof item === 'string');
}
