/**
 * @file Engine Logger
 *
 * Structured message sink for engine events. Every message carries a
 * context (what was being done) and a message (what happened), so a
 * migration warning reads `Loading "rig.yaml" onto "R": ...`.
 *
 * @module log
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
    debug(context: string, message: string): void;
    info(context: string, message: string): void;
    warn(context: string, message: string): void;
    error(context: string, message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

type Writer = (line: string) => void;

/**
 * Console-backed logger. Lines are `[RAMIFY][LEVEL] context: message`,
 * coloured via chalk when the terminal supports it.
 */
export class ConsoleLogger implements Logger {
    constructor(
        private readonly level: LogLevel = 'warn',
        private readonly write: Writer = (line: string): void => console.error(line),
    ) {}

    public debug(context: string, message: string): void {
        this.line_emit('debug', context, message);
    }

    public info(context: string, message: string): void {
        this.line_emit('info', context, message);
    }

    public warn(context: string, message: string): void {
        this.line_emit('warn', context, message);
    }

    public error(context: string, message: string): void {
        this.line_emit('error', context, message);
    }

    private line_emit(level: Exclude<LogLevel, 'silent'>, context: string, message: string): void {
        if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;
        const tag: string = `[RAMIFY][${level.toUpperCase()}]`;
        this.write(`${tag_colour(level, tag)} ${context}: ${message}`);
    }
}

function tag_colour(level: Exclude<LogLevel, 'silent'>, tag: string): string {
    switch (level) {
        case 'debug': return chalk.dim(tag);
        case 'info':  return chalk.cyan(tag);
        case 'warn':  return chalk.yellow(tag);
        case 'error': return chalk.red(tag);
    }
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
    debug: (): void => {},
    info: (): void => {},
    warn: (): void => {},
    error: (): void => {},
};
