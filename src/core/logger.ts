/**
 * Backend Logger - named console logger with a minimum level
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
}

const LOG_LEVEL_VARIABLE = 'RESTORE_INFO_LOG_LEVEL';

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

function initialLevel(): LogLevel {
    const value = process.env[LOG_LEVEL_VARIABLE]?.trim().toLowerCase();
    return value !== undefined && isLogLevel(value) ? value : 'info';
}

let minimumLevel: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel): void {
    minimumLevel = level;
}

export function getLogLevel(): LogLevel {
    return minimumLevel;
}

class ConsoleLogger implements Logger {
    constructor(private readonly name: string) { }

    private static levelMap: Record<LogLevel, string> = {
        debug: "DBG",
        info: "INF",
        warn: "WRN",
        error: "ERR",
    };

    private isEnabled(level: LogLevel): boolean {
        return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minimumLevel);
    }

    private formatMessage(level: LogLevel, message: string): string {
        const now = new Date();
        const timestamp = now.toLocaleTimeString("en-GB", {
            hour: "2-digit",
            minute: "2-digit",
            second: "2-digit",
            hour12: false,
        });
        const ms = now.getMilliseconds().toString().padStart(3, "0");

        const lvl = ConsoleLogger.levelMap[level];
        return `${timestamp}.${ms} [${lvl}] ${this.name}: ${message}`;
    }

    debug(message: string, ...args: unknown[]): void {
        if (this.isEnabled('debug')) {
            console.debug(this.formatMessage("debug", message), ...args);
        }
    }

    info(message: string, ...args: unknown[]): void {
        if (this.isEnabled('info')) {
            console.log(this.formatMessage("info", message), ...args);
        }
    }

    warn(message: string, ...args: unknown[]): void {
        if (this.isEnabled('warn')) {
            console.warn(this.formatMessage("warn", message), ...args);
        }
    }

    error(message: string, ...args: unknown[]): void {
        console.error(this.formatMessage("error", message), ...args);
    }
}

/**
 * Creates a named logger instance
 */
export function logger(name: string): Logger {
    return new ConsoleLogger(name);
}
