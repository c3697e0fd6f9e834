/**
 * @file Undo Log
 *
 * Records enacted commands into frames and replays them in either
 * direction.
 *
 *   - `enact` applies immediately, then records onto the open frame (or
 *     an implicit single-command frame when none is open).
 *   - Enabled scopes nest by merging into the outermost frame.
 *   - Disabled scopes apply without recording. They compose: recording
 *     resumes only when the outermost disabled scope closes, whatever is
 *     opened inside it.
 *   - Every scope, `enact` and replay is also a batch. Batches nest, and
 *     the `batch_exit` hook fires when the outermost one closes, so the
 *     host can treat everything inside as one logical edit.
 *
 * Not reentrant: undo and redo refuse to run while a scope is open.
 *
 * @module undo
 */

import { StructuralError } from '../errors.js';
import { command_apply, command_describe, type GraphCommand } from './commands.js';

export type ScopeMode = 'enabled' | 'disabled';

export interface UndoFrame {
    readonly label: string;
    readonly commands: readonly GraphCommand[];
}

/**
 * Notified when the outermost batch closes. A batch is any open scope,
 * a single `enact`, or an undo or redo replay.
 */
export interface UndoLogHooks {
    batch_exit?(): void;
}

interface OpenFrame {
    label: string;
    commands: GraphCommand[];
}

export class UndoLog {
    private readonly undoStack: UndoFrame[] = [];
    private redoStack: UndoFrame[] = [];
    private openFrame: OpenFrame | null = null;
    private enabledDepth: number = 0;
    private disabledDepth: number = 0;
    private replaying: boolean = false;
    private batchDepth: number = 0;

    constructor(private readonly hooks: UndoLogHooks = {}) {}

    /** Whether enacted commands are currently being recorded. */
    get recording(): boolean {
        return !this.replaying && this.disabledDepth === 0;
    }

    /** Whether a disabled scope is open. */
    get disabled(): boolean {
        return this.disabledDepth > 0;
    }

    /** Whether one logical edit is still in progress. */
    get batching(): boolean {
        return this.batchDepth > 0;
    }

    /**
     * Apply a command and record it.
     */
    enact(command: GraphCommand): void {
        this.batch_run((): void => {
            command_apply(command, 'forward');
            if (!this.recording) return;

            if (this.openFrame) {
                this.openFrame.commands.push(command);
                return;
            }
            this.frame_push({ label: command_describe(command), commands: [command] });
        });
    }

    /**
     * Run `fn` inside a frame. Commands enacted by `fn` (and anything it
     * calls) are recorded as one undoable unit, or not at all when the
     * scope is disabled.
     */
    scope_run<T>(label: string, fn: () => T, mode: ScopeMode = 'enabled'): T {
        return this.batch_run((): T => {
            if (mode === 'disabled') {
                return this.disabledScope_run(fn);
            }
            return this.enabledScope_run(label, fn);
        });
    }

    private enabledScope_run<T>(label: string, fn: () => T): T {
        this.enabledDepth++;
        if (this.enabledDepth === 1) {
            this.openFrame = { label, commands: [] };
        }
        try {
            return fn();
        } finally {
            this.enabledDepth--;
            if (this.enabledDepth === 0) {
                const frame: OpenFrame | null = this.openFrame;
                this.openFrame = null;
                if (frame && frame.commands.length > 0) {
                    this.frame_push(frame);
                }
            }
        }
    }

    /**
     * Reverse the most recent frame.
     *
     * @returns false when there is nothing to undo
     */
    undo(): boolean {
        this.idle_assert('undo');
        const frame: UndoFrame | undefined = this.undoStack.pop();
        if (!frame) return false;

        this.replay((): void => {
            for (let i = frame.commands.length - 1; i >= 0; i--) {
                command_apply(frame.commands[i], 'inverse');
            }
        });
        this.redoStack.push(frame);
        return true;
    }

    /**
     * Re-apply the most recently undone frame.
     *
     * @returns false when there is nothing to redo
     */
    redo(): boolean {
        this.idle_assert('redo');
        const frame: UndoFrame | undefined = this.redoStack.pop();
        if (!frame) return false;

        this.replay((): void => {
            for (const command of frame.commands) {
                command_apply(command, 'forward');
            }
        });
        this.undoStack.push(frame);
        return true;
    }

    canUndo(): boolean {
        return this.undoStack.length > 0;
    }

    canRedo(): boolean {
        return this.redoStack.length > 0;
    }

    /** Recorded frames, oldest first. */
    frames_list(): readonly UndoFrame[] {
        return [...this.undoStack];
    }

    /** Undone frames available to redo, most recently undone last. */
    redoFrames_list(): readonly UndoFrame[] {
        return [...this.redoStack];
    }

    clear(): void {
        this.undoStack.length = 0;
        this.redoStack = [];
    }

    private disabledScope_run<T>(fn: () => T): T {
        this.disabledDepth++;
        try {
            return fn();
        } finally {
            this.disabledDepth--;
        }
    }

    private batch_run<T>(fn: () => T): T {
        this.batchDepth++;
        try {
            return fn();
        } finally {
            this.batchDepth--;
            if (this.batchDepth === 0) {
                this.hooks.batch_exit?.();
            }
        }
    }

    private frame_push(frame: UndoFrame): void {
        this.undoStack.push({ label: frame.label, commands: [...frame.commands] });
        this.redoStack = [];
    }

    private replay(fn: () => void): void {
        this.batch_run((): void => {
            this.replaying = true;
            try {
                fn();
            } finally {
                this.replaying = false;
            }
        });
    }

    private idle_assert(operation: string): void {
        if (this.enabledDepth > 0 || this.disabledDepth > 0 || this.replaying) {
            throw new StructuralError(`Cannot ${operation} while an undo scope is open`);
        }
    }
}
