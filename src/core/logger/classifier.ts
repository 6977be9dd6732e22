/**
 * Severity of each rowcast event.
 *
 * Events outside the table fall back on their suffix, so a new
 * `*:failed` event still logs as an error.
 */
import type { RowcastEvents } from '../observer.js';
import type { EntryLevel, LogLevel } from './types.js';
import { ENTRY_RANK, LEVEL_THRESHOLD } from './types.js';

const EVENT_LEVELS: Record<keyof RowcastEvents, EntryLevel> = {
    'compile:before': 'debug',
    'compile:after': 'debug',
    'compile:failed': 'error',
    'stage:before': 'debug',
    'stage:after': 'debug',
    'stage:failed': 'error',
    'engine:open': 'debug',
    'engine:close': 'debug',
    'effects:written': 'info',
    'effects:warning': 'warn',
    'settings:loaded': 'debug',
    'error': 'error',
};

function isKnownEvent(event: string): event is keyof RowcastEvents {

    return Object.hasOwn(EVENT_LEVELS, event);

}

/**
 * @example
 * ```typescript
 * classifyEvent('effects:written')  // 'info'
 * classifyEvent('cache:failed')     // 'error'
 * classifyEvent('cache:hit')        // 'debug'
 * ```
 */
export function classifyEvent(event: string): EntryLevel {

    if (isKnownEvent(event)) return EVENT_LEVELS[event];
    if (/(^|:)(error|failed)$/.test(event)) return 'error';
    if (/:warning$/.test(event)) return 'warn';

    return 'debug';

}

/**
 * Whether an entry of `entry` severity is written at `level`.
 */
export function admits(level: LogLevel, entry: EntryLevel): boolean {

    return ENTRY_RANK[entry] <= LEVEL_THRESHOLD[level];

}
