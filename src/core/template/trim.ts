/**
 * Whitespace trim markers.
 *
 * `{%-`, `{%--` and `{%---` trim the literal before a tag; `-%}`, `--%}`
 * and `---%}` trim the literal after it. The same markers work on `{{ }}`
 * and `{# #}`.
 *
 * ```
 * {% for Edge -%}     level 1: spaces and tabs up to the line break
 * {% for Edge --%}    level 2: also the line break
 * {% for Edge ---%}   level 3: all whitespace
 * ```
 *
 * Unmarked `{% %}` tags trim level 1 before and level 2 after
 * (`{% endmacro %}` level 2 before); `{%+` and `+%}` keep everything.
 * Unmarked `{{ }}` and `{# #}` trim nothing.
 */
import type { TrimLevel } from './types.js';

const LEADING: Record<Exclude<TrimLevel, 0>, RegExp> = {
    1: /^[ \t\f\v]*/,
    2: /^[ \t\f\v]*(?:\r\n|\n|\r)?/,
    3: /^\s*/,
};

const TRAILING: Record<Exclude<TrimLevel, 0>, RegExp> = {
    1: /[ \t\f\v]*$/,
    2: /(?:\r\n|\n|\r)?[ \t\f\v]*$/,
    3: /\s*$/,
};

/**
 * Trim the start of a literal that follows a tag.
 *
 * @example
 * ```typescript
 * trimStart('  \n  x', 1)  // → '\n  x'
 * trimStart('  \n  x', 2)  // → '  x'
 * trimStart('  \n  x', 3)  // → 'x'
 * ```
 */
export function trimStart(text: string, level: TrimLevel): string {

    return level === 0 ? text : text.replace(LEADING[level], '');

}

/**
 * Trim the end of a literal that precedes a tag.
 *
 * @example
 * ```typescript
 * trimEnd('x  \n  ', 1)  // → 'x  \n'
 * trimEnd('x  \n  ', 2)  // → 'x  '
 * trimEnd('x  \n  ', 3)  // → 'x'
 * ```
 */
export function trimEnd(text: string, level: TrimLevel): string {

    return level === 0 ? text : text.replace(TRAILING[level], '');

}

/**
 * Count a run of up to three trim dashes.
 */
export function toTrimLevel(count: number): TrimLevel {

    if (count <= 0) return 0;
    if (count === 1) return 1;
    if (count === 2) return 2;

    return 3;

}
