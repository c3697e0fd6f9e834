/**
 * @file Graph
 *
 * Root container. Owns the services every component reaches through
 * `host_get()`: the undo log, the computation cache, the metadata store,
 * the logger, the definition source used by references, and the
 * evaluator.
 *
 * Dirtied notifications are queued while an edit is in progress (an
 * undo scope, an enacted command, an undo or redo) and delivered, once
 * per plug, when the outermost one closes. Plugs that left the graph in
 * the meantime are dropped.
 *
 * @module graph
 */

import { SubGraph } from './SubGraph.js';
import { UndoLog } from '../undo/UndoLog.js';
import { ComputeCache } from '../cache/ComputeCache.js';
import { MetadataStore } from '../metadata/MetadataStore.js';
import { ConsoleLogger, type Logger } from '../log/logger.js';
import { SettingsService } from '../config/settings.js';
import { Evaluator } from '../compute/Evaluator.js';
import { dirtied_emit } from '../dirty/DirtyPropagator.js';
import type { Plug } from './Plug.js';
import type { EvaluationScope, GraphHost } from './types.js';
import type { DefinitionSource } from '../reference/types.js';

export interface GraphOptions {
    cache?: ComputeCache;
    metadata?: MetadataStore;
    logger?: Logger;
    definitionSource?: DefinitionSource | null;
}

export class Graph extends SubGraph implements GraphHost {
    readonly undoLog: UndoLog;
    readonly cache: ComputeCache;
    readonly metadata: MetadataStore;
    readonly logger: Logger;
    readonly scope: EvaluationScope;
    private source: DefinitionSource | null;
    private readonly deferred = new Set<Plug>();
    /** False while base constructors run, before the services exist. */
    private hosting: boolean = false;

    constructor(name: string = 'graph', options: GraphOptions = {}) {
        super(name);
        this.cache = options.cache ?? ComputeCache.instance_get();
        this.metadata = options.metadata ?? MetadataStore.instance_get();
        this.logger = options.logger ?? new ConsoleLogger(SettingsService.instance_get().snapshot().log_level);
        this.source = options.definitionSource ?? null;
        this.scope = new Evaluator(this.cache, this.logger);
        this.undoLog = new UndoLog({
            batch_exit: (): void => this.deferred_flush(),
        });
        this.hosting = true;
    }

    override get typeName(): string {
        return 'Graph';
    }

    get definitionSource(): DefinitionSource | null {
        return this.source;
    }

    definitionSource_set(source: DefinitionSource | null): void {
        this.source = source;
    }

    override host_get(): GraphHost | null {
        return this.hosting ? this : null;
    }

    dirtied_notify(plugs: readonly Plug[]): void {
        if (this.undoLog.batching) {
            for (const plug of plugs) this.deferred.add(plug);
            return;
        }
        dirtied_emit(plugs);
    }

    private deferred_flush(): void {
        const pending: Plug[] = Array.from(this.deferred);
        this.deferred.clear();
        dirtied_emit(pending.filter((plug: Plug): boolean => plug.root_get() === this));
    }
}
