/**
 * @file Logger Tests
 *
 * @module log
 */

import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { ConsoleLogger, silentLogger } from './logger.js';

describe('log/ConsoleLogger', () => {

    beforeAll(() => {
        chalk.level = 0;
    });

    it('should format lines as tag, context and message', () => {
        const lines: string[] = [];
        const logger = new ConsoleLogger('debug', (line: string): void => { lines.push(line); });
        logger.warn('Loading "rig" onto "R"', 'bad plug');
        expect(lines).toEqual(['[RAMIFY][WARN] Loading "rig" onto "R": bad plug']);
    });

    it('should drop messages below the configured level', () => {
        const lines: string[] = [];
        const logger = new ConsoleLogger('warn', (line: string): void => { lines.push(line); });
        logger.debug('ctx', 'a');
        logger.info('ctx', 'b');
        logger.warn('ctx', 'c');
        logger.error('ctx', 'd');
        expect(lines).toEqual(['[RAMIFY][WARN] ctx: c', '[RAMIFY][ERROR] ctx: d']);
    });

    it('should emit nothing at the silent level', () => {
        const lines: string[] = [];
        const logger = new ConsoleLogger('silent', (line: string): void => { lines.push(line); });
        logger.error('ctx', 'boom');
        expect(lines).toEqual([]);
    });

    it('should accept messages on the silent logger', () => {
        expect(() => silentLogger.error('ctx', 'ignored')).not.toThrow();
    });
});
