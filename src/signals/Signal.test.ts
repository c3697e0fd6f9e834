/**
 * @file Signal Tests
 *
 * @module signals
 */

import { describe, it, expect } from 'vitest';
import { Signal } from './Signal.js';

describe('signals/Signal', () => {

    it('should call handlers in registration order', () => {
        const signal = new Signal<number>();
        const seen: string[] = [];
        signal.subscribe((n: number): void => { seen.push(`a${n}`); });
        signal.subscribe((n: number): void => { seen.push(`b${n}`); });
        signal.emit(1);
        expect(seen).toEqual(['a1', 'b1']);
    });

    it('should stop calling a handler once unsubscribed', () => {
        const signal = new Signal<string>();
        const seen: string[] = [];
        const unsubscribe = signal.subscribe((s: string): void => { seen.push(s); });
        signal.emit('first');
        unsubscribe();
        signal.emit('second');
        expect(seen).toEqual(['first']);
        expect(signal.handlers_count()).toBe(0);
    });
});
