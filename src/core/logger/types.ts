/**
 * Logger Types
 *
 * The logger turns observer events into console lines and, optionally,
 * JSON-lines file entries.
 */

/**
 * Configured verbosity. `verbose` admits debug entries and adds event
 * payloads to every line.
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'verbose';

/**
 * Severity of a single entry.
 */
export type EntryLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Most severe rank each configured level still admits.
 */
export const LEVEL_THRESHOLD: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    verbose: 4,
};

export const ENTRY_RANK: Record<EntryLevel, number> = {
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

/**
 * One line of the log file.
 *
 * @example
 * ```json
 * { "timestamp": "2024-01-15T10:30:00.000Z", "level": "info", "event": "effects:written", "message": "Wrote out/a.dot (120 bytes)" }
 * ```
 */
export interface LogEntry {
    timestamp: string;
    level: EntryLevel;
    event: string;
    message: string;

    /** Event payload, written at verbose level */
    data?: Record<string, unknown>;

    /** Fixed per-run context, such as the template path */
    context?: Record<string, unknown>;
}

export interface LoggerConfig {
    enabled: boolean;
    level: LogLevel;
}

export type LoggerState = 'idle' | 'running' | 'stopped';
