import { isLogLevel, logger, LogLevel, setLogLevel } from '../core/logger';

const log = logger('SettingsService');

/**
 * Service for reading settings from the process environment
 */
export class SettingsService {
    static readonly LOG_LEVEL_VARIABLE = 'RESTORE_INFO_LOG_LEVEL';
    static readonly EXTENSIONS_DIR_VARIABLE = 'RESTORE_INFO_EXTENSIONS_DIR';

    private static readonly DEFAULT_LOG_LEVEL: LogLevel = 'info';
    private static readonly DEFAULT_EXTENSIONS_DIR = 'obj';

    /**
     * Gets the configured minimum log level
     */
    static getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
        const value = env[this.LOG_LEVEL_VARIABLE]?.trim().toLowerCase();
        if (!value) {
            return this.DEFAULT_LOG_LEVEL;
        }
        if (!isLogLevel(value)) {
            log.warn(`Ignoring invalid ${this.LOG_LEVEL_VARIABLE} value '${value}', using '${this.DEFAULT_LOG_LEVEL}'`);
            return this.DEFAULT_LOG_LEVEL;
        }
        return value;
    }

    /**
     * Gets the directory (relative to the project directory) used as the
     * default MSBuildProjectExtensionsPath
     */
    static getExtensionsDirectory(env: NodeJS.ProcessEnv = process.env): string {
        const value = env[this.EXTENSIONS_DIR_VARIABLE]?.trim();
        if (!value) {
            return this.DEFAULT_EXTENSIONS_DIR;
        }
        if (value.includes('..')) {
            log.warn(`Ignoring ${this.EXTENSIONS_DIR_VARIABLE} value '${value}' outside the project directory`);
            return this.DEFAULT_EXTENSIONS_DIR;
        }
        return value;
    }

    /**
     * Applies the environment's log level to all loggers
     */
    static applyLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
        const level = this.getLogLevel(env);
        setLogLevel(level);
        return level;
    }
}
