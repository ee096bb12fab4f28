import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
    debug: chalk.dim,
    info: chalk.cyan,
    warn: chalk.yellow,
    error: chalk.red,
};

export type LogSink = (line: string) => void;

/**
 * Leveled diagnostic logger.
 *
 * Writes to stderr so that reports and `--json` output on stdout stay clean.
 */
export class Logger {
    private level: LogLevel;
    private sink: LogSink;

    constructor(level: LogLevel = 'info', sink?: LogSink) {
        this.level = level;
        this.sink = sink ?? ((line) => process.stderr.write(line + '\n'));
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    debug(message: string, context?: Record<string, unknown>): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: Record<string, unknown>): void {
        this.log('error', message, context);
    }

    private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) {
            return;
        }

        let line = `${LEVEL_STYLE[level](`[${level}]`)} ${message}`;
        if (context) {
            line += chalk.dim(` ${JSON.stringify(context)}`);
        }

        this.sink(line);
    }
}

let _logger: Logger | undefined;

/**
 * Shared process logger. Created on first use at `info`.
 */
export function getLogger(): Logger {
    if (!_logger) {
        _logger = new Logger();
    }
    return _logger;
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}
