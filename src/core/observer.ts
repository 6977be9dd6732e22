/**
 * Central event system for rowcast.
 *
 * Core modules emit events, the CLI and logger subscribe. Nothing in
 * `src/core` writes to the console directly.
 *
 * @example
 * ```typescript
 * // In core module - emit events at key points
 * observer.emit('compile:before', { filepath, bytes })
 *
 * // In CLI - subscribe to events
 * const cleanup = observer.on('effects:written', (data) => report(data.path))
 *
 * // Pattern matching for multiple events
 * observer.on(/^stage:/, ({ event, data }) => logStage(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'

import type { ErrorStage, ExecutionStage } from './template/errors.js'


/**
 * All events emitted by rowcast core modules.
 *
 * Events are namespaced by module:
 * - `compile:*` - Template compilation
 * - `stage:*` - Execution of init, body and fini
 * - `engine:*` - Database lifecycle
 * - `effects:*` - Side-effect file materialization
 * - `settings:*` - Settings load
 * - `error` - Catch-all errors
 */
export interface RowcastEvents {

    // Compilation
    'compile:before': { filepath: string | null; bytes: number }
    'compile:after': { filepath: string | null; durationMs: number; tables: string[]; macros: number; statements: number }
    'compile:failed': { filepath: string | null; stage: ErrorStage; error: string }

    // Execution
    'stage:before': { stage: ExecutionStage }
    'stage:after': { stage: ExecutionStage; durationMs: number }
    'stage:failed': { stage: ExecutionStage; error: string }

    // Engine
    'engine:open': { database: string }
    'engine:close': { database: string }

    // Side effects
    'effects:written': { path: string; bytes: number }
    'effects:warning': { message: string; count: number }

    // Settings
    'settings:loaded': { path: string; fromFile: boolean }

    // Errors
    'error': { source: string; error: Error; context?: Record<string, unknown> }
}

export type RowcastEventNames = Events<RowcastEvents>;
export type RowcastEventCallback<E extends RowcastEventNames> = ObserverEngine.EventCallback<RowcastEvents[E]>

/**
 * Global observer instance for rowcast.
 *
 * Enable spy mode with `ROWCAST_DEBUG=1` to trace every emit on stderr.
 *
 * @example
 * ```typescript
 * import { observer } from './observer.js'
 *
 * const cleanup = observer.on('stage:after', (data) => {
 *     console.log(`${data.stage} took ${data.durationMs}ms`)
 * })
 *
 * cleanup()
 * ```
 */
export const observer = new ObserverEngine<RowcastEvents>({
    name: 'rowcast',
    spy: process.env['ROWCAST_DEBUG']
        ? (action) => console.error(`[rowcast:${action.fn}] ${String(action.event)}`)
        : undefined
});

export type { ObserverEngine }
