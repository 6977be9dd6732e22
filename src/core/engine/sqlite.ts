/**
 * SQLite connection.
 *
 * better-sqlite3 wrapped by kysely. The raw handle is kept next to the
 * kysely instance: multi-statement scripts go through `exec()`, which
 * kysely's single-statement driver cannot run.
 */
import { Kysely, SqliteDialect } from 'kysely'
import Database from 'better-sqlite3'

import type { EngineDatabase } from './types.js'


export interface SqliteConnection {
    db: Kysely<EngineDatabase>
    raw: Database.Database
    destroy: () => Promise<void>
}


/**
 * Open a SQLite database.
 *
 * @example
 * ```typescript
 * // In-memory database
 * const conn = createSqliteConnection(':memory:')
 *
 * // File-based database
 * const conn = createSqliteConnection('./graph.db')
 *
 * await conn.destroy()
 * ```
 */
export function createSqliteConnection(filename: string): SqliteConnection {

    const raw = new Database(filename)

    const db = new Kysely<EngineDatabase>({
        dialect: new SqliteDialect({
            database: raw,
        }),
    })

    return {
        db,
        raw,
        destroy: () => db.destroy(),
    }
}
