/**
 * Logger
 *
 * Stream-based logger subscribed to every observer event. Writes compact
 * lines to a console stream and JSON entries to an optional file stream.
 *
 * @example
 * ```typescript
 * import { createWriteStream } from 'node:fs'
 *
 * const logger = new Logger({
 *     config: { level: 'info' },
 *     console: process.stderr,
 *     file: createWriteStream('.rowcast/rowcast.log', { flags: 'a' }),
 * })
 *
 * logger.start()
 * // ... observer events are written as they are emitted
 * await logger.stop()
 * ```
 */
import type { Writable } from 'node:stream';

import { observer } from '../observer.js';
import { admits, classifyEvent } from './classifier.js';
import { formatColorLine } from './color.js';
import { generateMessage, serializeEntry, formatEntry } from './formatter.js';
import type { LoggerConfig, LoggerState, EntryLevel } from './types.js';

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {
    /** Logger configuration */
    config?: Partial<LoggerConfig>;

    /** Context to include with every file entry */
    context?: Record<string, unknown>;

    /** Console stream for compact lines (none when omitted) */
    console?: Writable;

    /** File stream for JSON entries; ended by `stop()`, dropped on its first error */
    file?: Writable;

    /** Color console lines with ansis */
    color?: boolean;
}

/**
 * Logger that captures observer events and writes to streams.
 */
export class Logger {

    #config: LoggerConfig;
    #context: Record<string, unknown>;
    #console: Writable | null;
    #file: Writable | null;
    #color: boolean;
    #state: LoggerState = 'idle';
    #unsubscribe: (() => void) | null = null;

    constructor(options: LoggerOptions = {}) {

        this.#config = { enabled: true, level: 'info', ...options.config };
        this.#context = options.context ?? {};
        this.#console = options.console ?? null;
        this.#file = options.file ?? null;
        this.#color = options.color ?? false;

        this.#file?.on('error', (error: Error) => {

            this.#file = null;
            observer.emit('error', { source: 'logger', error });

        });

    }

    /**
     * Get the current logger state.
     */
    get state(): LoggerState {

        return this.#state;

    }

    /**
     * Check if logging is enabled.
     */
    get isEnabled(): boolean {

        return this.#config.enabled && this.#config.level !== 'silent';

    }

    /**
     * Start capturing observer events.
     */
    start(): void {

        if (this.#state !== 'idle' || !this.isEnabled) {

            return;

        }

        this.#unsubscribe = observer.on(/./, (payload) => {

            const { event, data } = payload as {
                event: string;
                data: Record<string, unknown>;
            };

            this.#handleEvent(event, data);

        });

        this.#state = 'running';

    }

    /**
     * Stop capturing and end the file stream.
     */
    async stop(): Promise<void> {

        if (this.#state !== 'running') {

            return;

        }

        this.#unsubscribe?.();
        this.#unsubscribe = null;

        const file = this.#file;

        if (file) {

            await new Promise<void>((resolve) => {

                file.end(() => resolve());

            });

        }

        this.#state = 'stopped';

    }

    /**
     * Handle an observer event.
     */
    #handleEvent(event: string, data: Record<string, unknown>): void {

        const level = classifyEvent(event);

        if (!admits(this.#config.level, level)) {

            return;

        }

        this.#writeLine(level, event, generateMessage(event, data), data);

        if (this.#file) {

            const entry = formatEntry(event, data, this.#context, this.#config.level === 'verbose');

            this.#file.write(serializeEntry(entry));

        }

    }

    /**
     * Write a compact line to the console stream.
     */
    #writeLine(level: EntryLevel, event: string, message: string, data?: Record<string, unknown>): void {

        if (!this.#console) {

            return;

        }

        const verbose = this.#config.level === 'verbose' && data && Object.keys(data).length > 0;

        if (this.#color) {

            this.#console.write(formatColorLine(level, event, message, verbose ? data : undefined) + '\n');

            return;

        }

        const timestamp = new Date().toISOString();
        const levelLabel = level.toUpperCase().padEnd(5);

        let line = `[${timestamp}] [${levelLabel}] [${event}] ${message}`;

        if (verbose) {

            line += ` ${JSON.stringify(data)}`;

        }

        this.#console.write(line + '\n');

    }

    // ─────────────────────────────────────────────────────────────
    // Direct logging methods
    // ─────────────────────────────────────────────────────────────

    info(message: string, data?: Record<string, unknown>): void {

        this.#log('info', message, data);

    }

    warn(message: string, data?: Record<string, unknown>): void {

        this.#log('warn', message, data);

    }

    error(message: string, data?: Record<string, unknown>): void {

        this.#log('error', message, data);

    }

    debug(message: string, data?: Record<string, unknown>): void {

        this.#log('debug', message, data);

    }

    #log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {

        if (!this.isEnabled || this.#state !== 'running') {

            return;

        }

        if (!admits(this.#config.level, level)) {

            return;

        }

        this.#writeLine(level, 'log', message, data);

        if (this.#file) {

            this.#file.write(serializeEntry({
                timestamp: new Date().toISOString(),
                level,
                event: 'log',
                message,
                ...(data ? { data } : {}),
            }));

        }

    }

}
