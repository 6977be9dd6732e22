/**
 * Execution harness.
 *
 * Runs a compiled template against the context's database:
 *
 * 1. init: recreate `sys_Write`, run the init sections
 * 2. body: check the tables the query reads, run the file statements, run the query
 * 3. read the `sys_Write` rows
 * 4. fini: run the fini sections, last declared first
 *
 * An init failure ends the run without fini. A body failure still runs
 * fini unless `finiOnFailure` is false; the body error is what the caller
 * sees.
 *
 * @example
 * ```typescript
 * const template = splitSections(source)
 * const compiled = compile(template)
 *
 * const result = await withExecutionContext({ database: ':memory:' }, (ctx) =>
 *     execute(ctx, template, compiled),
 * )
 *
 * process.stdout.write(result.text)
 * ```
 */
import { sql } from 'kysely'
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import { ExecutionError } from '../template/errors.js'
import type { ExecutionStage } from '../template/errors.js'
import { WRITE_TABLE } from '../template/schema.js'
import { sectionRanges } from '../template/sections.js'
import { quoteIdent } from '../template/sql.js'
import type { CompiledQuery, Template } from '../template/types.js'
import type { ExecutionContext } from './context.js'
import type { ExecuteOptions, ExecutionResult, SideEffectRecord } from './types.js'


/** Recreates the side-effect table at the start of every run */
export const WRITE_TABLE_DDL = [
    `DROP TABLE IF EXISTS ${quoteIdent(WRITE_TABLE)};`,
    `CREATE TABLE ${quoteIdent(WRITE_TABLE)} ("path" TEXT NOT NULL UNIQUE, "content" TEXT);`,
].join('\n')


/**
 * Run a compiled template.
 *
 * @throws ExecutionError tagged with the stage that failed
 */
export async function execute(
    ctx: ExecutionContext,
    template: Template,
    compiled: CompiledQuery,
    options: ExecuteOptions = {},
): Promise<ExecutionResult> {

    const start = performance.now()
    const finiOnFailure = options.finiOnFailure ?? true

    await runStage('init', async () => {

        ctx.raw.exec(WRITE_TABLE_DDL)

        for (const text of sectionTexts(template, 'init')) {

            ctx.raw.exec(text)
        }
    })

    const [body, bodyErr] = await attempt(() => runStage('body', async () => {

        await assertTables(ctx, compiled.tables)

        for (const statement of compiled.statements) {

            await sql.raw(statement).execute(ctx.db)
        }

        const result = await sql.raw(compiled.query).execute(ctx.db)
        const text = renderedText(result.rows)
        const effects = await readEffects(ctx)

        return { text, effects }
    }))

    if (bodyErr) {

        if (finiOnFailure) {

            // The body error wins; a fini failure here is only reported
            await attempt(() => runFini(ctx, template))
        }

        throw bodyErr
    }

    await runFini(ctx, template)

    return {
        ...body,
        durationMs: performance.now() - start,
    }
}


function sectionTexts(template: Template, kind: 'init' | 'fini'): string[] {

    return sectionRanges(template, kind)
        .map((range) => template.source.slice(range.start, range.end))
        .filter((text) => text.trim().length > 0)
}


async function runFini(ctx: ExecutionContext, template: Template): Promise<void> {

    await runStage('fini', async () => {

        for (const text of sectionTexts(template, 'fini')) {

            ctx.raw.exec(text)
        }
    })
}


/**
 * Run one stage, reporting it on the observer.
 *
 * Any failure comes out as an ExecutionError for the stage, carrying the
 * engine's message unchanged.
 */
async function runStage<T>(stage: ExecutionStage, fn: () => Promise<T>): Promise<T> {

    const start = performance.now()

    observer.emit('stage:before', { stage })

    const [result, err] = await attempt(fn)

    if (err) {

        const error = err instanceof ExecutionError
            ? err
            : new ExecutionError(stage, err.message, { cause: err })

        observer.emit('stage:failed', { stage, error: error.detail })

        throw error
    }

    observer.emit('stage:after', { stage, durationMs: performance.now() - start })

    return result
}


/**
 * Fail before running the query when a table it reads does not exist.
 *
 * Names are compared case-insensitively, as SQLite resolves them.
 */
async function assertTables(ctx: ExecutionContext, tables: readonly string[]): Promise<void> {

    if (tables.length === 0) {

        return
    }

    const existing = new Set<string>()
    const metadata = await ctx.db.introspection.getTables()

    for (const table of metadata) {

        existing.add(table.name.toLowerCase())
    }

    const temp = await sql<{ name: string }>`
        SELECT name FROM sqlite_temp_master WHERE type IN ('table', 'view')
    `.execute(ctx.db)

    for (const row of temp.rows) {

        existing.add(row.name.toLowerCase())
    }

    const missing = tables.filter((table) => !existing.has(table.toLowerCase()))

    if (missing.length > 0) {

        throw new ExecutionError('body', `no such table: ${missing.join(', ')}`)
    }
}


/**
 * The value of the single column of the single row the query returned.
 */
function renderedText(rows: readonly unknown[]): string {

    if (rows.length !== 1) {

        throw new ExecutionError('body', `Query returned ${rows.length} rows, expected 1`)
    }

    const row = rows[0]

    if (typeof row !== 'object' || row === null) {

        throw new ExecutionError('body', 'Query returned no columns')
    }

    const values = Object.values(row)

    if (values.length !== 1) {

        throw new ExecutionError('body', `Query returned ${values.length} columns, expected 1`)
    }

    const [value] = values

    if (typeof value !== 'string') {

        throw new ExecutionError('body', `Query returned ${value === null ? 'NULL' : typeof value}, expected text`)
    }

    return value
}


async function readEffects(ctx: ExecutionContext): Promise<SideEffectRecord[]> {

    const rows = await ctx.db
        .selectFrom('sys_Write')
        .select(['path', 'content'])
        .orderBy('path')
        .execute()

    return rows.map((row) => ({
        path: row.path,
        content: row.content ?? '',
    }))
}
