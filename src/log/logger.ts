/**
 * @file Logger
 *
 * Console-backed logger with bracketed tags (`[ASSETFLOW][ENGINE] ...`)
 * and a minimum level. Levels are colored with chalk; chalk drops the
 * color itself when the stream is not a TTY.
 *
 * @module log
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
    /** Logger that appends one more tag and shares level and sink. */
    child(tag: string): Logger;
}

/** Where formatted lines go. `console` satisfies it. */
export interface LogSink {
    log(...args: unknown[]): void;
    warn(...args: unknown[]): void;
    error(...args: unknown[]): void;
}

export interface LoggerOptions {
    level?: LogLevel;
    tags?: string[];
    sink?: LogSink;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

const LEVEL_STYLE: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
    debug: chalk.gray,
    info: chalk.cyan,
    warn: chalk.yellow,
    error: chalk.red,
};

export function logLevel_is(value: string): value is LogLevel {
    return LOG_LEVELS.some((level: LogLevel): boolean => level === value);
}

/**
 * Create a logger. Tags default to `['ASSETFLOW']`.
 */
export function logger_create(options: LoggerOptions = {}): Logger {
    const minLevel: LogLevel = options.level ?? 'info';
    const tags: string[] = options.tags ?? ['ASSETFLOW'];
    const sink: LogSink = options.sink ?? console;

    const prefix: string = tags.map((tag: string): string => `[${tag}]`).join('');

    function line_write(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
        if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return;
        const text: string = `${LEVEL_STYLE[level](prefix)} ${message}`;
        switch (level) {
            case 'error':
                sink.error(text, ...args);
                break;
            case 'warn':
                sink.warn(text, ...args);
                break;
            default:
                sink.log(text, ...args);
        }
    }

    return {
        debug: (message: string, ...args: unknown[]): void => line_write('debug', message, args),
        info: (message: string, ...args: unknown[]): void => line_write('info', message, args),
        warn: (message: string, ...args: unknown[]): void => line_write('warn', message, args),
        error: (message: string, ...args: unknown[]): void => line_write('error', message, args),
        child: (tag: string): Logger => logger_create({ level: minLevel, tags: [...tags, tag], sink }),
    };
}

/** Logger that discards everything; the default for library components. */
export const silentLogger: Logger = logger_create({ level: 'silent' });
