/**
 * passgate Logger
 * Level-gated console output with a fixed prefix.
 */

import type { LogLevel } from '../types/policy';
import { LOG_LEVELS } from '../types/policy';

const LEVELS: readonly LogLevel[] = LOG_LEVELS;
const PREFIX = '[passgate]';

/** Where log lines go. `console` satisfies this. */
export interface LogSink {
    error(message: string): void;
    warn(message: string): void;
    info(message: string): void;
    debug(message: string): void;
}

export type Logger = LogSink;

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && LEVELS.some((known) => known === value);
}

/**
 * Create a logger that drops anything more verbose than `level`.
 */
export function createLogger(level: LogLevel = 'warn', sink: LogSink = console): Logger {
    const currentLevel = LEVELS.indexOf(level);

    const enabled = (messageLevel: LogLevel): boolean =>
        currentLevel > 0 && LEVELS.indexOf(messageLevel) <= currentLevel;

    return {
        error(message: string): void {
            if (enabled('error')) sink.error(`${PREFIX} ${message}`);
        },
        warn(message: string): void {
            if (enabled('warn')) sink.warn(`${PREFIX} ${message}`);
        },
        info(message: string): void {
            if (enabled('info')) sink.info(`${PREFIX} ${message}`);
        },
        debug(message: string): void {
            if (enabled('debug')) sink.debug(`${PREFIX} ${message}`);
        },
    };
}
