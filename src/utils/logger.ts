import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Minimal logging surface shared by the library and the CLI
 */
export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

type Sink = (line: string) => void;

const stderrSink: Sink = (line) => {
    process.stderr.write(line + '\n');
};

/**
 * Console logger colored with chalk. Writes to stderr so expanded prompt text
 * on stdout stays clean.
 */
export class ConsoleLogger implements Logger {
    private readonly threshold: number;

    constructor(level: LogLevel = 'info', private readonly sink: Sink = stderrSink) {
        this.threshold = LOG_LEVELS.indexOf(level);
    }

    debug(message: string): void {
        this.write('debug', chalk.dim(`  · ${message}`));
    }

    info(message: string): void {
        this.write('info', chalk.cyan(`  ℹ ${message}`));
    }

    warn(message: string): void {
        this.write('warn', chalk.yellow(`  ⚠ ${message}`));
    }

    error(message: string): void {
        this.write('error', chalk.red(`  ✗ ${message}`));
    }

    private write(level: Exclude<LogLevel, 'silent'>, line: string): void {
        if (LOG_LEVELS.indexOf(level) < this.threshold) return;
        this.sink(line);
    }
}

export const silentLogger: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
};

export function createLogger(level: LogLevel = 'info'): Logger {
    return level === 'silent' ? silentLogger : new ConsoleLogger(level);
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}
