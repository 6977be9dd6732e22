/**
 * Color Formatter
 *
 * Formats log entries with ANSI colors for console output.
 * Flattens data one level deep - nested objects are stringified.
 */
import ansis from 'ansis';
import { attemptSync } from '@logosdx/utils';

import type { EntryLevel } from './types.js';

/**
 * Level icons and colors.
 */
const LEVEL_STYLE: Record<EntryLevel, { icon: string; color: (s: string) => string }> = {
    error: { icon: '✗', color: (s) => ansis.red(s) },
    warn: { icon: '⚠', color: (s) => ansis.yellow(s) },
    info: { icon: '●', color: (s) => ansis.blue(s) },
    debug: { icon: '·', color: (s) => ansis.gray(s) },
};

/**
 * Format a value for single-line display.
 *
 * Primitives are displayed directly, objects are stringified.
 */
function formatValue(value: unknown): string {

    if (value === null || value === undefined) {

        return ansis.gray(String(value));

    }

    if (typeof value === 'string') {

        return value.length > 50 ? `"${value.slice(0, 47)}..."` : value;

    }

    if (typeof value === 'number' || typeof value === 'boolean') {

        return ansis.cyan(String(value));

    }

    if (value instanceof Error) {

        return ansis.red(value.message);

    }

    if (Array.isArray(value)) {

        if (value.length <= 3 && value.every((v) => typeof v === 'string' || typeof v === 'number')) {

            return `[${value.join(', ')}]`;

        }

        return ansis.gray(`[${value.length} items]`);

    }

    const [str, error] = attemptSync(() => JSON.stringify(value));

    if (error || str === undefined) {

        return ansis.gray('[object]');

    }

    return str.length > 60 ? str.slice(0, 57) + '...' : str;

}

/**
 * Format a log entry as a colored line.
 *
 * Format: `[icon] event  message  key=value key=value ...`
 *
 * @param level - Entry severity level
 * @param event - Observer event name
 * @param message - Human-readable message
 * @param data - Event payload (flattened one level deep)
 * @returns Colored line string (no newline)
 */
export function formatColorLine(
    level: EntryLevel,
    event: string,
    message: string,
    data?: Record<string, unknown>,
): string {

    const style = LEVEL_STYLE[level];

    let line = `${style.color(style.icon)} ${style.color(event)}  ${message}`;

    if (data && Object.keys(data).length > 0) {

        const pairs = Object.entries(data).map(([key, value]) => `${ansis.gray(key)}=${formatValue(value)}`);

        line += `  ${pairs.join(' ')}`;

    }

    return line;

}
