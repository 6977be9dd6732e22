/**
 * SQL-only rendering.
 *
 * The whole run as one script, for piping into the `sqlite3` shell or
 * reading what a template does without executing it.
 *
 * @example
 * ```typescript
 * const template = splitSections(source)
 *
 * process.stdout.write(renderScript(template, compile(template)))
 * ```
 */
import { sectionRanges } from '../template/sections.js'
import type { CompiledQuery, Template } from '../template/types.js'
import { WRITE_TABLE_DDL } from './harness.js'


export function renderScript(template: Template, compiled: CompiledQuery): string {

    const slice = (kind: 'init' | 'fini'): string[] => sectionRanges(template, kind)
        .map((range) => template.source.slice(range.start, range.end))

    const parts = [
        WRITE_TABLE_DDL,
        ...slice('init'),
        ...compiled.statements.map((statement) => `${statement};`),
        `${compiled.query};`,
        ...slice('fini'),
    ]

    return parts
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .join('\n') + '\n'
}
