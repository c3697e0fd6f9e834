/**
 * @file Error Taxonomy
 *
 * Every failure raised by the engine is a `RamifyError` carrying a stable
 * `code`. Compute and structural errors surface to the direct caller;
 * migration warnings are logged by the reconciler and never thrown out of
 * a reload; definition load errors are thrown only after a reload has
 * finished its bookkeeping.
 *
 * @module errors
 */

export type RamifyErrorCode =
    | 'COMPUTE'
    | 'STRUCTURAL'
    | 'MIGRATION'
    | 'DEFINITION_LOAD'
    | 'DEFINITION_SYNTAX'
    | 'REGISTRY';

/**
 * Base class for all engine errors.
 */
export class RamifyError extends Error {
    public readonly code: RamifyErrorCode;

    constructor(code: RamifyErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Raised when a node's `hash` or `compute` fails. Nothing is cached for
 * the fingerprint being evaluated.
 *
 * @property plugPath - Full path of the plug whose evaluation failed
 */
export class ComputeError extends RamifyError {
    public readonly plugPath: string;

    constructor(plugPath: string, cause: unknown) {
        super('COMPUTE', `Error computing "${plugPath}": ${error_message(cause)}`, { cause });
        this.plugPath = plugPath;
    }
}

/**
 * Raised by an invalid graph mutation, before anything is recorded.
 */
export class StructuralError extends RamifyError {
    constructor(message: string) {
        super('STRUCTURAL', message);
    }
}

/**
 * A per-plug failure while migrating state during a reference reload.
 * Constructed for logging; the reload carries on.
 */
export class MigrationWarning extends RamifyError {
    public readonly sourceId: string;
    public readonly targetName: string;

    constructor(sourceId: string, targetName: string, cause: unknown) {
        super('MIGRATION', error_message(cause), { cause });
        this.sourceId = sourceId;
        this.targetName = targetName;
    }

    /** Log context in the form `Loading "<source>" onto "<target>"`. */
    public get context(): string {
        return loadContext_format(this.sourceId, this.targetName);
    }
}

export function loadContext_format(sourceId: string, targetName: string): string {
    return `Loading "${sourceId}" onto "${targetName}"`;
}

/**
 * The definition source reported errors while executing.
 */
export class DefinitionLoadError extends RamifyError {
    public readonly sourceId: string;

    constructor(sourceId: string) {
        super('DEFINITION_LOAD', `Error loading reference "${sourceId}"`);
        this.sourceId = sourceId;
    }
}

/**
 * A definition document is not valid YAML or does not match the
 * definition schema.
 */
export class DefinitionSyntaxError extends RamifyError {
    public readonly sourceId: string;

    constructor(sourceId: string, detail: string) {
        super('DEFINITION_SYNTAX', `Invalid definition "${sourceId}": ${detail}`);
        this.sourceId = sourceId;
    }
}

/**
 * Unknown or duplicate node type.
 */
export class RegistryError extends RamifyError {
    constructor(message: string) {
        super('REGISTRY', message);
    }
}

/** Extract a printable message from anything thrown. */
export function error_message(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
