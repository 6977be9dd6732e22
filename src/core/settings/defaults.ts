/**
 * Default Settings
 *
 * Used when no settings.yml exists and for every field it leaves out.
 */
import type { Settings, LoggingConfig, CompileConfig, ExecuteConfig } from './types.js';

/**
 * Default logging configuration.
 */
export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
    enabled: true,
    level: 'info',
    file: null,
};

/**
 * Default compilation configuration.
 *
 * 1000 is SQLite's default `SQLITE_MAX_EXPR_DEPTH`.
 */
export const DEFAULT_COMPILE_CONFIG: CompileConfig = {
    maxExpressionDepth: 1000,
};

/**
 * Default execution configuration.
 */
export const DEFAULT_EXECUTE_CONFIG: ExecuteConfig = {
    database: ':memory:',
    prefix: null,
    finiOnFailure: true,
};

/**
 * Create a fresh copy of default settings.
 *
 * Nested objects are never shared between calls.
 */
export function createDefaultSettings(): Settings {

    return {
        logging: { ...DEFAULT_LOGGING_CONFIG },
        compile: { ...DEFAULT_COMPILE_CONFIG },
        execute: { ...DEFAULT_EXECUTE_CONFIG },
    };

}

/**
 * Settings directory relative to project root.
 */
export const SETTINGS_DIR_PATH = '.rowcast';

/**
 * Settings file location relative to project root.
 */
export const SETTINGS_FILE_PATH = '.rowcast/settings.yml';
