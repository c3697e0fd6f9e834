/**
 * @file Enactment Helpers
 *
 * The sole mutation entry point. A command is handed to the undo log of
 * the component's host, which applies and records it; detached
 * components (no host) apply it directly with nothing recorded.
 *
 * @module graph
 */

import { command_apply, type GraphCommand } from '../undo/commands.js';
import type { ScopeMode } from '../undo/UndoLog.js';
import type { GraphHost } from './types.js';

interface HostResolvable {
    host_get(): GraphHost | null;
}

/** Apply `command` and record it on the host's undo log, if any. */
export function action_enact(component: HostResolvable, command: GraphCommand): void {
    const host: GraphHost | null = component.host_get();
    if (host) {
        host.undoLog.enact(command);
        return;
    }
    command_apply(command, 'forward');
}

/**
 * Run `fn` inside a named undo frame on the host's log. Without a host
 * the function simply runs.
 */
export function scope_run<T>(component: HostResolvable, label: string, fn: () => T, mode: ScopeMode = 'enabled'): T {
    const host: GraphHost | null = component.host_get();
    if (!host) return fn();
    return host.undoLog.scope_run(label, fn, mode);
}
