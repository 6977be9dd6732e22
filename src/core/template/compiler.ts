/**
 * Template compiler.
 *
 * Runs the whole front end: sections, lexer, parser, macro table,
 * generator. Compilation is synchronous and touches nothing but the
 * observer; `compileFile` only adds the read.
 *
 * @example
 * ```typescript
 * import { compile, compileFile } from './compiler.js'
 *
 * const compiled = compile(source)
 * const fromDisk = await compileFile('graph.rt')
 *
 * compiled.query       // SELECT printf(...) AS "rendered"
 * compiled.tables      // ['Edge']
 * ```
 */
import { readFile } from 'node:fs/promises'

import { attempt, attemptSync } from '@logosdx/utils'

import { observer } from '../observer.js'
import { TemplateError } from './errors.js'
import { QueryGenerator } from './generator.js'
import { tokenize } from './lexer.js'
import { buildMacroTable } from './macros.js'
import { parse } from './parser.js'
import { extractSchema } from './schema.js'
import { sectionRanges, splitSections } from './sections.js'
import type { CompiledQuery, Schema, Template } from './types.js'
import { sliceRanges } from './utils.js'


export interface CompileOptions {

    /** Where the source came from; reported in events only */
    filepath?: string

    /** Expression height past which generation fails (default 1000) */
    maxExpressionDepth?: number

    /** Table declarations; read from the init sections when omitted */
    schema?: Schema
}


/**
 * Compile a template into its query.
 *
 * @param source - Template text, or a template already split into sections
 * @throws LexError, ParseError, ResolutionError or GenerationError
 *
 * @example
 * ```typescript
 * const { query } = compile('%% body\n{% for Edge sep \', \' %}{{ up }}{% endfor %}')
 * ```
 */
export function compile(source: string | Template, options: CompileOptions = {}): CompiledQuery {

    const filepath = options.filepath ?? null
    const text = typeof source === 'string' ? source : source.source
    const start = performance.now()

    observer.emit('compile:before', { filepath, bytes: Buffer.byteLength(text, 'utf8') })

    const [compiled, err] = attemptSync(() => run(source, options))

    if (err) {

        observer.emit('compile:failed', {
            filepath,
            stage: err instanceof TemplateError ? err.stage : 'generate',
            error: err.message,
        })

        throw err
    }

    observer.emit('compile:after', {
        filepath,
        durationMs: performance.now() - start,
        tables: compiled.tables,
        macros: compiled.macros.length,
        statements: compiled.statements.length,
    })

    return compiled
}


/**
 * Read and compile a template file.
 *
 * @param filepath - Path to the template
 * @throws the read error, or any compile error
 */
export async function compileFile(filepath: string, options: CompileOptions = {}): Promise<CompiledQuery> {

    const [source, err] = await attempt(() => readFile(filepath, 'utf-8'))

    if (err) {

        observer.emit('error', { source: 'template', error: err, context: { filepath } })

        throw err
    }

    return compile(source, { ...options, filepath })
}


function run(source: string | Template, options: CompileOptions): CompiledQuery {

    const template = typeof source === 'string' ? splitSections(source) : source
    const tokens = tokenize(template.source, sectionRanges(template, 'body'))
    const root = parse(tokens, template.source)
    const macros = buildMacroTable(root, template.source)
    const schema = options.schema ?? extractSchema(sliceRanges(template.source, sectionRanges(template, 'init')))

    const generator = new QueryGenerator(macros, {
        schema,
        maxExpressionDepth: options.maxExpressionDepth,
    })

    const { query, statements, tables } = generator.generate(root)

    return {
        query,
        statements,
        tables,
        macros: macros.names(),
    }
}
