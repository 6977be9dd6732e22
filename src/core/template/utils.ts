/**
 * Source position helpers.
 *
 * Stages work on character indexes into the template source; errors report
 * byte offsets plus line and column so they can be found in any editor.
 *
 * @example
 * ```typescript
 * locate('ab\ncd', 4)   // → { offset: 4, line: 2, column: 2 }
 * locate('é{%', 1)      // → { offset: 2, line: 1, column: 2 }
 * ```
 */
import type { SourceLocation } from './types.js'


/**
 * Resolve a character index into a source location.
 *
 * @param source - Full template source
 * @param index - Character index (clamped to the source length)
 */
export function locate(source: string, index: number): SourceLocation {

    const end = Math.max(0, Math.min(index, source.length))
    const before = source.slice(0, end)
    const lineStart = before.lastIndexOf('\n') + 1

    let line = 1

    for (let i = 0; i < end; i++) {

        if (source.charCodeAt(i) === 10) line++
    }

    return {
        offset: Buffer.byteLength(before, 'utf8'),
        line,
        column: end - lineStart + 1,
    }
}


/**
 * Join the text of several section ranges.
 */
export function sliceRanges(source: string, ranges: ReadonlyArray<{ start: number; end: number }>): string {

    return ranges.map((range) => source.slice(range.start, range.end)).join('')
}
