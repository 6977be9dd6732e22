/**
 * Logger Module
 *
 * Captures observer events and writes them to the console and an
 * optional JSON-lines log file.
 */

// Types
export type {
    LogLevel,
    EntryLevel,
    LogEntry,
    LoggerConfig,
    LoggerState,
} from './types.js';

export { LEVEL_THRESHOLD, ENTRY_RANK } from './types.js';

// Classifier
export { classifyEvent, admits } from './classifier.js';

// Formatter
export { generateMessage, formatEntry, serializeEntry } from './formatter.js';
export { formatColorLine } from './color.js';

// Logger
export { Logger, type LoggerOptions } from './logger.js';
