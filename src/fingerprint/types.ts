/**
 * @file Fingerprint Type Definitions
 *
 * A fingerprint summarizes everything that can influence one
 * (output plug, context) result. It is the key of the computation
 * cache: equal fingerprints must mean equal values, and a changed input
 * yields a new fingerprint so stale entries are simply never looked up.
 *
 * Content-addressed, not identity-addressed: two nodes of the same type
 * with identical inputs share fingerprints and therefore cache entries.
 *
 * @module fingerprint
 */

/** 128-bit fingerprint rendered as 32 lowercase hex characters. */
export type Fingerprint = string;

/**
 * Values a HashBuilder can absorb. Objects are hashed structurally with
 * sorted keys, so key order never changes a fingerprint.
 */
export type Hashable =
    | string
    | number
    | boolean
    | null
    | undefined
    | readonly Hashable[]
    | { readonly [key: string]: Hashable };
