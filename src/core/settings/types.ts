/**
 * Settings Types
 *
 * Settings live in .rowcast/settings.yml next to the templates they run.
 * Every section is optional in the file and filled with defaults on load.
 *
 * @example
 * ```yaml
 * logging:
 *     level: warn
 *     file: .rowcast/rowcast.log
 * compile:
 *     maxExpressionDepth: 1000
 * execute:
 *     database: build/graph.db
 *     prefix: out
 *     finiOnFailure: true
 * ```
 */
import type { LogLevel } from '../logger/types.js';

/**
 * Logging configuration.
 */
export interface LoggingConfig {
    /** Enable logging */
    enabled: boolean;

    /** Minimum level to capture */
    level: LogLevel;

    /** JSON-lines log file, relative to the project root */
    file: string | null;
}

/**
 * Compilation configuration.
 */
export interface CompileConfig {
    /** Expression height past which generation fails */
    maxExpressionDepth: number;
}

/**
 * Execution configuration.
 */
export interface ExecuteConfig {
    /** SQLite database file; `:memory:` for a throwaway database */
    database: string;

    /** Directory side-effect files are written under; null writes nothing */
    prefix: string | null;

    /** Run fini sections after a failed body */
    finiOnFailure: boolean;
}

/**
 * Complete settings structure.
 */
export interface Settings {
    logging: LoggingConfig;
    compile: CompileConfig;
    execute: ExecuteConfig;
}
