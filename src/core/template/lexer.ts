/**
 * Template lexer.
 *
 * Splits body sections into literal runs and tags in one forward pass:
 *
 * - `{% ... %}` block directives (`for`, `macro`, `file` and their `end` forms)
 * - `{{ ... }}` substitutions and `{{ call name(...) }}` macro calls
 * - `{# ... #}` comments, which nest
 *
 * Literal runs are kept byte for byte; escaping them is the generator's job.
 *
 * @example
 * ```typescript
 * const tokens = tokenize('a{{ up }}b')
 * // → [
 * //   { type: 'literal', text: 'a', offset: 0 },
 * //   { type: 'value', expr: 'up', offset: 1, trimBefore: 0, trimAfter: 0 },
 * //   { type: 'literal', text: 'b', offset: 9 },
 * // ]
 * ```
 */
import { LexError } from './errors.js';
import { toTrimLevel } from './trim.js';
import type { BlockKind, SectionRange, Token, TrimLevel } from './types.js';
import { locate } from './utils.js';

const CLOSERS = { '%': '%}', '{': '}}', '#': '#}' } as const;

type Opener = keyof typeof CLOSERS;

const BLOCK_KINDS: readonly BlockKind[] = ['for', 'macro', 'file'];

/**
 * Trims of an unmarked `{% %}` tag: the indentation before it, and the
 * rest of its line after it. A block tag alone on its line leaves no trace.
 */
const BLOCK_TRIM = { before: 1, after: 2 } as const;

/** A macro body also loses the line break before `{% endmacro %}` */
const MACRO_CLOSE_TRIM_BEFORE = 2;

interface Markers {
    before: TrimLevel | null;
    after: TrimLevel | null;
    start: number;
    end: number;
}

const CALL_RE = /^call\s+([A-Za-z_][A-Za-z0-9_]*)\s*\(([\s\S]*)\)$/;
const KEYWORD_RE = /^[A-Za-z]+/;

function isOpener(ch: string | undefined): ch is Opener {

    return ch === '%' || ch === '{' || ch === '#';

}

function isBlockKind(word: string): word is BlockKind {

    return BLOCK_KINDS.some((kind) => kind === word);

}

/**
 * Tokenize the body of a template.
 *
 * @param source - Full template source
 * @param ranges - Body section ranges; defaults to the whole source
 * @throws LexError for unterminated tags, strings or comments, unknown
 *   directives and malformed macro calls
 */
export function tokenize(source: string, ranges?: readonly SectionRange[]): Token[] {

    const lexer = new Lexer(source);

    for (const range of ranges ?? [{ start: 0, end: source.length }]) {

        lexer.scan(range.start, range.end);

    }

    return lexer.tokens;

}

class Lexer {

    readonly tokens: Token[] = [];

    #source: string;

    constructor(source: string) {

        this.#source = source;

    }

    scan(start: number, end: number): void {

        const source = this.#source;
        let literalStart = start;
        let i = start;

        while (i < end) {

            const ch = source[i];
            const next = i + 1 < end ? source[i + 1] : undefined;

            if (ch === '{' && isOpener(next)) {

                this.#literal(literalStart, i);
                i = next === '#'
                    ? this.#comment(i, end)
                    : this.#tag(i, end, next);
                literalStart = i;
                continue;

            }

            if (ch === '#' && next === '}') {

                throw this.#error("Unexpected '#}' outside a comment", i);

            }

            i++;

        }

        this.#literal(literalStart, end);

    }

    #literal(start: number, end: number): void {

        if (end > start) {

            this.tokens.push({
                type: 'literal',
                text: this.#source.slice(start, end),
                offset: start,
            });

        }

    }

    /**
     * Scan a nested `{# ... #}` comment; returns the index after it.
     */
    #comment(start: number, end: number): number {

        const source = this.#source;
        let depth = 1;
        let i = start + 2;

        while (i < end) {

            if (source.startsWith('{#', i)) {

                depth++;
                i += 2;

            }
            else if (source.startsWith('#}', i)) {

                depth--;
                i += 2;

                if (depth === 0) {

                    const { before, after } = this.#markers(start + 2, i - 2, false);

                    this.tokens.push({
                        type: 'comment',
                        offset: start,
                        trimBefore: before ?? 0,
                        trimAfter: after ?? 0,
                    });

                    return i;

                }

            }
            else {

                i++;

            }

        }

        throw this.#error('Unterminated comment', start);

    }

    /**
     * Scan a `{% %}` or `{{ }}` tag; returns the index after it.
     */
    #tag(start: number, end: number, opener: '%' | '{'): number {

        const source = this.#source;
        const closer = CLOSERS[opener];
        let i = start + 2;

        while (i < end) {

            if (source[i] === "'") {

                i = this.#string(i, end);
                continue;

            }

            if (source.startsWith(closer, i)) {

                this.#classify(opener, start, i);

                return i + 2;

            }

            i++;

        }

        throw this.#error(`Unterminated '{${opener}' tag`, start);

    }

    /**
     * Skip a single-quoted string inside a tag; returns the index after it.
     */
    #string(start: number, end: number): number {

        const source = this.#source;
        let i = start + 1;

        while (i < end) {

            if (source[i] === "'") {

                if (source[i + 1] === "'" && i + 1 < end) {

                    i += 2;
                    continue;

                }

                return i + 1;

            }

            i++;

        }

        throw this.#error('Unterminated string', start);

    }

    /**
     * Read trim markers just inside a tag's delimiters.
     *
     * Up to three dashes give a level; with `keep`, a single `+` asks for
     * no trimming. A side without a marker is `null`.
     */
    #markers(innerStart: number, innerEnd: number, keep: boolean): Markers {

        const source = this.#source;
        let lead = 0;
        let trail = 0;

        while (lead < 3 && innerStart + lead < innerEnd && source[innerStart + lead] === '-') lead++;

        while (
            trail < 3
            && innerEnd - trail - 1 >= innerStart + lead
            && source[innerEnd - trail - 1] === '-'
        ) trail++;

        let before: TrimLevel | null = lead > 0 ? toTrimLevel(lead) : null;
        let after: TrimLevel | null = trail > 0 ? toTrimLevel(trail) : null;

        if (keep && lead === 0 && source[innerStart] === '+') {

            before = 0;
            lead = 1;

        }

        if (keep && trail === 0 && innerEnd - 1 >= innerStart + lead && source[innerEnd - 1] === '+') {

            after = 0;
            trail = 1;

        }

        return { before, after, start: innerStart + lead, end: innerEnd - trail };

    }

    #classify(opener: '%' | '{', start: number, closeAt: number): void {

        const source = this.#source;
        const markers = this.#markers(start + 2, closeAt, opener === '%');
        const raw = source.slice(markers.start, markers.end);
        const content = raw.trim();
        const contentOffset = markers.start + (raw.length - raw.trimStart().length);
        const trims = { trimBefore: markers.before ?? 0, trimAfter: markers.after ?? 0 };

        if (content === '') {

            throw this.#error(opener === '%' ? 'Empty directive' : 'Empty substitution', start);

        }

        if (opener === '{') {

            if (/^call\b/.test(content)) {

                const match = CALL_RE.exec(content);

                if (!match) {

                    throw this.#error('Malformed macro call', start);

                }

                this.tokens.push({
                    type: 'call',
                    name: match[1] ?? '',
                    args: this.#splitArgs(match[2] ?? '', start),
                    offset: start,
                    ...trims,
                });

                return;

            }

            this.tokens.push({ type: 'value', expr: content, offset: start, ...trims });

            return;

        }

        const keyword = KEYWORD_RE.exec(content)?.[0] ?? '';
        const rest = content.slice(keyword.length);

        if (isBlockKind(keyword) && (rest === '' || /^\s/.test(rest))) {

            const args = rest.trim();

            this.tokens.push({
                type: 'open',
                kind: keyword,
                args,
                argsOffset: contentOffset + keyword.length + (rest.length - rest.trimStart().length),
                offset: start,
                trimBefore: markers.before ?? BLOCK_TRIM.before,
                trimAfter: markers.after ?? BLOCK_TRIM.after,
            });

            return;

        }

        const closing = keyword.startsWith('end') ? keyword.slice(3) : '';

        if (isBlockKind(closing)) {

            if (rest.trim() !== '') {

                throw this.#error(`Unexpected arguments to '${keyword}'`, start);

            }

            this.tokens.push({
                type: 'close',
                kind: closing,
                offset: start,
                trimBefore: markers.before ?? (closing === 'macro' ? MACRO_CLOSE_TRIM_BEFORE : BLOCK_TRIM.before),
                trimAfter: markers.after ?? BLOCK_TRIM.after,
            });

            return;

        }

        throw this.#error(`Unknown directive '${keyword || content}'`, start);

    }

    /**
     * Split macro call arguments on top-level commas.
     */
    #splitArgs(text: string, tagStart: number): string[] {

        if (text.trim() === '') {

            return [];

        }

        const args: string[] = [];
        let depth = 0;
        let current = '';

        for (let i = 0; i < text.length; i++) {

            const ch = text[i];

            if (ch === "'") {

                let j = i + 1;

                while (j < text.length && !(text[j] === "'" && text[j + 1] !== "'")) {

                    j += text[j] === "'" ? 2 : 1;

                }

                current += text.slice(i, j + 1);
                i = j;
                continue;

            }

            if (ch === '(') depth++;
            if (ch === ')') depth--;

            if (ch === ',' && depth === 0) {

                args.push(current.trim());
                current = '';
                continue;

            }

            current += ch;

        }

        args.push(current.trim());

        if (depth !== 0 || args.some((arg) => arg === '')) {

            throw this.#error('Malformed macro call', tagStart);

        }

        return args;

    }

    #error(message: string, index: number): LexError {

        return new LexError(message, locate(this.#source, index));

    }

}
