/**
 * Log Formatter
 *
 * Converts observer events into LogEntry objects and serializes them
 * for file output. Each entry is a single JSON line.
 */
import { attemptSync } from '@logosdx/utils'

import type { LogEntry } from './types.js'
import { classifyEvent } from './classifier.js'


/**
 * Name of the template an event refers to.
 */
function source(d: Record<string, unknown>): string {

    return typeof d['filepath'] === 'string' ? d['filepath'] : '<source>'
}


function ms(value: unknown): string {

    return typeof value === 'number' ? `${Math.round(value)}ms` : '?ms'
}


/**
 * Human-readable message templates for rowcast events.
 * Keys are event names, values are functions that generate messages from event data.
 */
const MESSAGE_TEMPLATES: Record<string, (data: Record<string, unknown>) => string> = {

    // Compilation
    'compile:before': (d) => `Compiling ${source(d)} (${d['bytes']} bytes)`,
    'compile:after': (d) => {

        const tables = Array.isArray(d['tables']) ? d['tables'].length : 0

        return `Compiled ${source(d)}: ${tables} tables, ${d['macros']} macros, ${d['statements']} file blocks (${ms(d['durationMs'])})`
    },
    'compile:failed': (d) => `Failed to compile ${source(d)} (${d['stage']}): ${d['error']}`,

    // Execution
    'stage:before': (d) => `Running ${d['stage']}`,
    'stage:after': (d) => `Finished ${d['stage']} (${ms(d['durationMs'])})`,
    'stage:failed': (d) => `${d['stage']} failed: ${d['error']}`,

    // Engine
    'engine:open': (d) => `Opened database ${d['database']}`,
    'engine:close': (d) => `Closed database ${d['database']}`,

    // Side effects
    'effects:written': (d) => `Wrote ${d['path']} (${d['bytes']} bytes)`,
    'effects:warning': (d) => String(d['message']),

    // Settings
    'settings:loaded': (d) => d['fromFile']
        ? `Settings loaded from ${d['path']}`
        : `No settings at ${d['path']}, using defaults`,

    // Generic error
    'error': (d) => `Error in ${d['source']}: ${d['error'] instanceof Error ? d['error'].message : String(d['error'])}`,
}


/**
 * Generate a human-readable message for an event.
 *
 * Uses templates for known events, falls back to generic format.
 *
 * @param event - Observer event name
 * @param data - Event payload
 * @returns Human-readable message
 *
 * @example
 * ```typescript
 * generateMessage('effects:written', { path: 'out/a.txt', bytes: 12 })
 * // 'Wrote out/a.txt (12 bytes)'
 *
 * generateMessage('custom:event', { id: 7 })
 * // 'custom event: id=7'
 * ```
 */
export function generateMessage(event: string, data: Record<string, unknown>): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        return template(data)
    }

    // Generic format: "Event occurred" or "Event: key=value, ..."
    const parts = Object.entries(data)
        .slice(0, 3)
        .map(([k, v]) => `${k}=${summarizeValue(v)}`)

    if (parts.length === 0) {

        return event.replace(/:/g, ' ')
    }

    return `${event.replace(/:/g, ' ')}: ${parts.join(', ')}`
}


/**
 * Summarize a value for log message display.
 * Truncates long strings and formats objects.
 */
function summarizeValue(value: unknown): string {

    if (value === null || value === undefined) {

        return String(value)
    }

    if (typeof value === 'string') {

        if (value.length > 50) {

            return `"${value.slice(0, 47)}..."`
        }

        return `"${value}"`
    }

    if (typeof value === 'number' || typeof value === 'boolean') {

        return String(value)
    }

    if (Array.isArray(value)) {

        return `[${value.length} items]`
    }

    if (typeof value === 'object') {

        return `{${Object.keys(value).length} keys}`
    }

    return String(value)
}


/**
 * Format an event into a LogEntry.
 *
 * @param event - Observer event name
 * @param data - Event payload
 * @param context - Additional context (template path, etc.)
 * @param includeData - Whether to include full payload (verbose mode)
 * @returns Formatted log entry
 *
 * @example
 * ```typescript
 * const entry = formatEntry('effects:written', { path: 'out/a.txt', bytes: 12 }, { template: 'graph.rt' }, true)
 * // {
 * //     timestamp: '2024-01-15T10:30:00.000Z',
 * //     level: 'info',
 * //     event: 'effects:written',
 * //     message: 'Wrote out/a.txt (12 bytes)',
 * //     data: { path: 'out/a.txt', bytes: 12 },
 * //     context: { template: 'graph.rt' }
 * // }
 * ```
 */
export function formatEntry(
    event: string,
    data: Record<string, unknown>,
    context?: Record<string, unknown>,
    includeData = false
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level: classifyEvent(event),
        event,
        message: generateMessage(event, data),
    }

    // Include full data at verbose level
    if (includeData && Object.keys(data).length > 0) {

        entry.data = sanitizeData(data)
    }

    // Include context if provided
    if (context && Object.keys(context).length > 0) {

        entry.context = context
    }

    return entry
}


/**
 * Make event data JSON-safe.
 * Errors and dates become plain values; anything unserializable becomes a string.
 */
function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {

    const result: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {

        if (value instanceof Error) {

            result[key] = {
                name: value.name,
                message: value.message,
                stack: value.stack?.split('\n').slice(0, 3).join('\n'),
            }
            continue
        }

        if (value instanceof Date) {

            result[key] = value.toISOString()
            continue
        }

        const [, err] = attemptSync(() => JSON.stringify(value))

        result[key] = err ? String(value) : value
    }

    return result
}


/**
 * Serialize a LogEntry to a JSON line for file output.
 *
 * @param entry - Log entry to serialize
 * @returns JSON string with newline
 */
export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry) + '\n'
}
