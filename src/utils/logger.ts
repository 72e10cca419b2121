import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Leveled logger for diagnostics that are not part of command output.
 * Everything goes to stderr so stdout stays clean for `--format json`.
 */
export class Logger {
    private level: LogLevel;

    constructor(level?: LogLevel) {
        const fromEnv = process.env['PROMPTDECK_LOG_LEVEL'];
        this.level = level ?? (isLogLevel(fromEnv) ? fromEnv : 'warn');
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    debug(message: string): void {
        if (this.enabled('debug')) console.error(chalk.dim(`[debug] ${message}`));
    }

    info(message: string): void {
        if (this.enabled('info')) console.error(chalk.cyan('ℹ ') + message);
    }

    warn(message: string): void {
        if (this.enabled('warn')) console.error(chalk.yellow('⚠ ') + message);
    }

    error(message: string): void {
        if (this.enabled('error')) console.error(chalk.red('✗ ') + message);
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }
}

export const logger = new Logger();
