/**
 * Execution harness over SQLite.
 *
 * @module
 */
export { ExecutionContext, withExecutionContext } from './context.js'
export { execute, WRITE_TABLE_DDL } from './harness.js'
export { renderScript } from './script.js'
export { createSqliteConnection } from './sqlite.js'
export type { SqliteConnection } from './sqlite.js'
export type {
    EngineDatabase,
    EngineOptions,
    ExecuteOptions,
    ExecutionResult,
    SideEffectRecord,
} from './types.js'
