/**
 * @file Logger
 *
 * Leveled, scope-prefixed logging for the build pipeline and CLI.
 * Lines go to stderr so that command output on stdout stays clean;
 * colours are applied with chalk, which drops them when the stream is
 * not a TTY.
 *
 * @module log
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

/** Destination for formatted log lines. */
export type LogSink = (line: string) => void;

export interface LoggerOptions {
    level?: LogLevel;
    sink?: LogSink;
}

const DEFAULT_LEVEL: LogLevel = level_parse(process.env.CARDSET_LOG_LEVEL) ?? 'info';

/**
 * Parse a level name, returning undefined for anything unrecognised.
 */
export function level_parse(raw: string | undefined): LogLevel | undefined {
    if (!raw) return undefined;
    const normalized: string = raw.trim().toLowerCase();
    return level_is(normalized) ? normalized : undefined;
}

function level_is(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

function line_colorize(level: LogLevel, text: string): string {
    switch (level) {
        case 'debug': return chalk.gray(text);
        case 'info':  return chalk.white(text);
        case 'warn':  return chalk.yellow(text);
        case 'error': return chalk.red(text);
    }
}

export class Logger {
    private readonly level: LogLevel | undefined;
    private readonly sink: LogSink;

    constructor(private readonly scope: string, options: LoggerOptions = {}) {
        this.level = options.level;
        this.sink = options.sink ?? ((line: string): void => { console.error(line); });
    }

    debug(message: string): void { this.emit('debug', message); }
    info(message: string): void { this.emit('info', message); }
    warn(message: string): void { this.emit('warn', message); }
    error(message: string): void { this.emit('error', message); }

    /** Derive a logger for a sub-scope sharing this logger's level and sink. */
    child(scope: string): Logger {
        return new Logger(`${this.scope}:${scope}`, { level: this.level, sink: this.sink });
    }

    private emit(level: LogLevel, message: string): void {
        const threshold: LogLevel = this.level ?? DEFAULT_LEVEL;
        if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
        const tag: string = level.toUpperCase().padEnd(5);
        this.sink(line_colorize(level, `${tag} [${this.scope}] ${message}`));
    }
}

export function logger_create(scope: string, options: LoggerOptions = {}): Logger {
    return new Logger(scope, options);
}

/**
 * Lazily yield `items` in order, logging `label: n/total` roughly every
 * tenth of the way and once at the end.
 */
export function* progress_iterate<T>(items: readonly T[], label: string, logger: Logger): Generator<T> {
    const total: number = items.length;
    const step: number = Math.max(1, Math.ceil(total / 10));
    for (let i = 0; i < total; i++) {
        yield items[i];
        const done: number = i + 1;
        if (done % step === 0 || done === total) {
            logger.info(`${label}: ${done}/${total}`);
        }
    }
}
