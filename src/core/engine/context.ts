/**
 * Execution context.
 *
 * Owns one database connection for the length of a run. Callers acquire
 * it with `ExecutionContext.open()` and must `close()` it, or let
 * `withExecutionContext` do both.
 *
 * @example
 * ```typescript
 * const result = await withExecutionContext({ database: ':memory:' }, (ctx) =>
 *     execute(ctx, template, compiled),
 * )
 * ```
 */
import { attempt } from '@logosdx/utils'
import type { Kysely } from 'kysely'
import type Database from 'better-sqlite3'

import { observer } from '../observer.js'
import { createSqliteConnection } from './sqlite.js'
import type { SqliteConnection } from './sqlite.js'
import type { EngineDatabase, EngineOptions } from './types.js'


export class ExecutionContext {

    readonly database: string

    #conn: SqliteConnection
    #closed = false

    private constructor(database: string, conn: SqliteConnection) {

        this.database = database
        this.#conn = conn
    }

    /**
     * Open a database for one run.
     */
    static open(options: EngineOptions): ExecutionContext {

        const ctx = new ExecutionContext(options.database, createSqliteConnection(options.database))

        observer.emit('engine:open', { database: options.database })

        return ctx
    }

    get db(): Kysely<EngineDatabase> {

        this.#assertOpen()

        return this.#conn.db
    }

    /** better-sqlite3 handle, for multi-statement scripts */
    get raw(): Database.Database {

        this.#assertOpen()

        return this.#conn.raw
    }

    get isClosed(): boolean {

        return this.#closed
    }

    /**
     * Release the connection. Safe to call more than once.
     */
    async close(): Promise<void> {

        if (this.#closed) {

            return
        }

        this.#closed = true

        await this.#conn.destroy()

        observer.emit('engine:close', { database: this.database })
    }

    #assertOpen(): void {

        if (this.#closed) {

            throw new Error(`Execution context for ${this.database} is closed`)
        }
    }
}


/**
 * Run `fn` with a fresh context, closing it however `fn` ends.
 */
export async function withExecutionContext<T>(
    options: EngineOptions,
    fn: (ctx: ExecutionContext) => Promise<T>,
): Promise<T> {

    const ctx = ExecutionContext.open(options)
    const [result, err] = await attempt(() => fn(ctx))

    await ctx.close()

    if (err) {

        throw err
    }

    return result
}
