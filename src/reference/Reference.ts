/**
 * @file Reference
 *
 * A container whose contents come from an external definition. Loading
 * is a single undoable step: undo reloads whatever was loaded before,
 * with values and connections on the interface carried across both
 * ways.
 *
 * @module reference
 */

import { SubGraph } from '../graph/SubGraph.js';
import { Signal } from '../signals/Signal.js';
import { action_enact } from '../graph/enact.js';
import { DefinitionLoadError, StructuralError, loadContext_format } from '../errors.js';
import { reference_reload } from './reconcile.js';
import type { GraphHost } from '../graph/types.js';
import type { SourceLoader } from '../undo/commands.js';

export class Reference extends SubGraph implements SourceLoader {
    readonly referenceLoadedSignal = new Signal<Reference>();

    private loadedSource: string = '';
    private loadFailed: boolean = false;
    private loading: boolean = false;

    override get typeName(): string {
        return 'Reference';
    }

    /** Identifier of the loaded definition; empty when nothing is loaded. */
    get sourceId(): string {
        return this.loadedSource;
    }

    /** Whether the most recent (re)load reported errors. */
    get lastLoadFailed(): boolean {
        return this.loadFailed;
    }

    /**
     * Load (or reload) a definition.
     *
     * @throws StructuralError when the reference is not inside a graph
     * @throws DefinitionLoadError when the definition reported errors; the
     *   load has still happened and is recorded for undo
     */
    load(sourceId: string): void {
        if (!this.host_get()) {
            throw new StructuralError(`Reference "${this.fullName}" cannot load "${sourceId}" outside a graph`);
        }
        this.loading = true;
        try {
            action_enact(this, { kind: 'loadReference', reference: this, previous: this.loadedSource, next: sourceId });
        } finally {
            this.loading = false;
        }
        if (this.loadFailed) {
            throw new DefinitionLoadError(sourceId);
        }
    }

    /**
     * Apply a load. Called by the `loadReference` command in both
     * directions; outside `load` (undo, redo) errors are logged.
     *
     * @internal
     */
    source_apply(sourceId: string): void {
        const host: GraphHost | null = this.host_get();
        if (!host) {
            throw new StructuralError(`Reference "${this.fullName}" cannot load "${sourceId}" outside a graph`);
        }
        this.loadFailed = reference_reload(this, sourceId, host);
        this.loadedSource = sourceId;
        this.referenceLoadedSignal.emit(this);

        if (this.loadFailed && !this.loading) {
            host.logger.error(loadContext_format(sourceId, this.name), new DefinitionLoadError(sourceId).message);
        }
    }
}
