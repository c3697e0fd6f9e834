/**
 * @file Signal
 *
 * Typed facade over Node.js EventEmitter. Handlers run synchronously in
 * registration order; `subscribe` hands back the unsubscribe function.
 *
 * @module signals
 */

import { EventEmitter } from 'events';

export type SignalHandler<T> = (payload: T) => void;

/** Single channel per signal instance. */
const CHANNEL = 'signal' as const;

export class Signal<T> {
    private readonly emitter: EventEmitter;

    constructor() {
        this.emitter = new EventEmitter();
        // Graph observers are unbounded; suppress the default 10-listener warning.
        this.emitter.setMaxListeners(0);
    }

    /**
     * Subscribe to the signal.
     *
     * @returns Unsubscribe function.
     */
    subscribe(handler: SignalHandler<T>): () => void {
        this.emitter.on(CHANNEL, handler);
        return () => this.emitter.off(CHANNEL, handler);
    }

    /** Invoke every handler with the payload. */
    emit(payload: T): void {
        this.emitter.emit(CHANNEL, payload);
    }

    /** Number of registered handlers. */
    handlers_count(): number {
        return this.emitter.listenerCount(CHANNEL);
    }
}
